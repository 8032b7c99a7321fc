/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `KEL001`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 *
 * The hundreds digit names the phase: 0 driver/internal, 1 tokenizer, 2 parser, 3 backend, 4 arena.
 */
export const DiagnosticIds = {
  /**
   * Unknown/unclassified diagnostic.
   *
   * Use a more specific ID when possible; this remains for forward compatibility.
   */
  Unknown: 'KEL000',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'KEL001',

  /** Unexpected exception inside a phase. */
  InternalError: 'KEL002',

  /** String literal reaches end of input without a closing quote. */
  UnterminatedString: 'KEL100',

  /** Character literal is empty, spans a newline or has no closing quote. */
  UnterminatedCharLiteral: 'KEL101',

  /** Multi-character operator that is not part of the language (e.g. `..`). */
  InvalidOperatorSequence: 'KEL102',

  /** Character that starts no token. */
  UnexpectedCharacter: 'KEL103',

  /** Token that cannot start or continue the current construct. */
  UnexpectedToken: 'KEL200',

  /** Left-hand side of `=` is not a bare identifier. */
  InvalidAssignmentTarget: 'KEL201',

  /** Required `;`, `)` or declaration name is missing. */
  MissingDelimiter: 'KEL202',

  /** Expression nests deeper than the parser accepts. */
  NestingTooDeep: 'KEL203',

  /** AST node kind the active backend cannot translate. */
  UnsupportedNode: 'KEL300',

  /** Output format is named but has no backend. */
  FormatNotImplemented: 'KEL301',

  /** Literal value the target language cannot spell (an infinite float, an out-of-range `int`). */
  UnrepresentableLiteral: 'KEL302',

  /** Arena ran out of capacity. */
  ArenaCapacityExceeded: 'KEL400',

  /** Allocation attempted from a released arena. */
  ArenaReleased: 'KEL401',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * IDs reported by the tokenizer.
 */
export type LexicalDiagnosticId =
  | typeof DiagnosticIds.UnterminatedString
  | typeof DiagnosticIds.UnterminatedCharLiteral
  | typeof DiagnosticIds.InvalidOperatorSequence
  | typeof DiagnosticIds.UnexpectedCharacter;

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

const LEXICAL_IDS: ReadonlySet<DiagnosticId> = new Set<DiagnosticId>([
  DiagnosticIds.UnterminatedString,
  DiagnosticIds.UnterminatedCharLiteral,
  DiagnosticIds.InvalidOperatorSequence,
  DiagnosticIds.UnexpectedCharacter,
]);

export function isLexicalDiagnosticId(id: DiagnosticId): id is LexicalDiagnosticId {
  return LEXICAL_IDS.has(id);
}
