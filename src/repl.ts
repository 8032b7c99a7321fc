import * as readline from 'node:readline';
import type { Readable } from 'node:stream';

import { Tokenizer } from './frontend/lexer.js';
import { TokenKinds } from './frontend/tokens.js';

export const REPL_PROMPT = 'keel> ';

export interface ReplOutput {
  write(text: string): unknown;
}

/**
 * Token-kind summary for one line of input, plus the lexical error if the line has one.
 */
export function describeLine(line: string): string {
  const tokenizer = new Tokenizer(line, '<interactive>');
  const kinds = tokenizer
    .tokenize()
    .filter((t) => t.kind !== TokenKinds.EOF && t.kind !== TokenKinds.NEWLINE)
    .map((t) => `[${t.kind}]`);
  let out = `Tokens: ${kinds.join(' ')}\n`;
  if (tokenizer.hasError) out += `Error: ${tokenizer.lastError ?? 'unknown error'}\n`;
  return out;
}

/**
 * Interactive token mode: tokenizes each input line until `quit` or end of input.
 */
export async function runRepl(input: Readable, output: ReplOutput): Promise<void> {
  const rl = readline.createInterface({ input, terminal: false });

  output.write("Keel interactive mode. Type 'quit' to exit.\n");
  output.write(REPL_PROMPT);
  try {
    for await (const line of rl) {
      if (line === 'quit') break;
      if (line.length > 0) output.write(describeLine(line));
      output.write(REPL_PROMPT);
    }
  } finally {
    rl.close();
  }
  output.write('\nGoodbye!\n');
}
