import { describe, expect, it } from 'vitest';
import { Readable } from 'node:stream';

import { describeLine, REPL_PROMPT, runRepl } from '../src/repl.js';

describe('interactive mode', () => {
  it('summarizes the token kinds of a line', () => {
    expect(describeLine('return x;')).toBe('Tokens: [RETURN] [IDENTIFIER] [SEMICOLON]\n');
  });

  it('adds the lexical error when a line has one', () => {
    expect(describeLine('"open')).toBe('Tokens: [ERROR]\nError: Unterminated string\n');
  });

  it('tokenizes lines until quit', async () => {
    let out = '';
    const output = {
      write: (text: string): boolean => {
        out += text;
        return true;
      },
    };
    await runRepl(Readable.from(['int x = 1;\n', '@\n', '\n', 'quit\n', 'ignored\n']), output);
    expect(out).toBe(
      [
        "Keel interactive mode. Type 'quit' to exit.\n",
        REPL_PROMPT,
        'Tokens: [INT] [IDENTIFIER] [ASSIGN] [INTEGER] [SEMICOLON]\n',
        REPL_PROMPT,
        "Tokens: [ERROR]\nError: Unexpected character '@'\n",
        REPL_PROMPT,
        REPL_PROMPT,
        '\nGoodbye!\n',
      ].join(''),
    );
  });

  it('says goodbye at end of input without quit', async () => {
    let out = '';
    await runRepl(Readable.from([]), { write: (text: string) => (out += text) });
    expect(out).toBe(`Keel interactive mode. Type 'quit' to exit.\n${REPL_PROMPT}\nGoodbye!\n`);
  });
});
