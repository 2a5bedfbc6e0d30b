/**
 * Severity levels a rule can carry
 */
export type Severity = 'error' | 'warning' | 'info';

/**
 * Rule categories, one per area of the style guide
 */
export const RULE_CATEGORIES = [
  'access-control',
  'closures',
  'naming',
  'optionals',
  'spacing',
  'structure',
] as const;
export type RuleCategory = (typeof RULE_CATEGORIES)[number];

/**
 * Category of diagnostics raised by the tool itself rather than by a style rule
 */
export type DiagnosticCategory = RuleCategory | 'tool-error';

/**
 * Token kinds produced by the parser
 */
export type TokenKind =
  | 'identifier'
  | 'keyword'
  | 'attribute'
  | 'directive'
  | 'operator'
  | 'literal'
  | 'comment'
  | 'whitespace'
  | 'newline'
  | 'brace'
  | 'punctuation';

/**
 * A lexical token. Tokens cover the source text contiguously.
 */
export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  /** Start offset (inclusive) */
  readonly start: number;
  /** End offset (exclusive) */
  readonly end: number;
  /** 1-indexed line */
  readonly line: number;
  /** 1-indexed column */
  readonly column: number;
}

/**
 * A single text replacement
 */
export interface Edit {
  /** Start offset in file (0-indexed, inclusive) */
  readonly startOffset: number;
  /** End offset in file (0-indexed, exclusive) */
  readonly endOffset: number;
  /** Text to insert at the range */
  readonly text: string;
}

/**
 * Autofix for a violation. Edits are sorted by start offset and never overlap.
 */
export interface Fix {
  readonly edits: readonly Edit[];
}

/**
 * One concrete instance of a rule failing to hold
 */
export interface Violation {
  readonly ruleId: string;
  readonly category: DiagnosticCategory;
  readonly severity: Severity;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly message: string;
  readonly fix?: Fix;
}

/**
 * A violation positioned for output
 */
export interface Diagnostic {
  /** Path relative to cwd */
  path: string;
  /** 1-indexed start line */
  line: number;
  /** 1-indexed start column */
  column: number;
  /** 1-indexed end line */
  endLine: number;
  /** 1-indexed end column */
  endColumn: number;
  severity: Severity;
  category: DiagnosticCategory;
  /** Rule identifier, or the tool-error code for tool-level diagnostics */
  ruleId: string;
  message: string;
  /** Whether the rule offered an autofix */
  fixable: boolean;
  /** Whether the autofix was applied during this run */
  fixed: boolean;
}

/**
 * Per-file classification
 */
export type FileOutcome = 'clean' | 'violations-remain' | 'fixed' | 'tool-error';

/**
 * Process-level classification
 */
export type RunOutcome = 'clean' | 'violations-remain' | 'tool-error';

/**
 * Result of processing one file
 */
export interface FileResult {
  /** Path relative to cwd */
  path: string;
  /** Remaining diagnostics followed by fixed ones, each group in canonical order */
  diagnostics: Diagnostic[];
  /** Number of violations whose fixes were applied */
  fixedCount: number;
  /** Number of fix passes that changed the text */
  passes: number;
  outcome: FileOutcome;
  /** Final file text (equal to the input when nothing was fixed) */
  output: string;
  /** Whether output differs from the input */
  changed: boolean;
}

/**
 * Merged results of one invocation, files sorted by path
 */
export interface RunReport {
  files: FileResult[];
  /** Whether the run was interrupted before every file was processed */
  interrupted: boolean;
}

/**
 * Summary counts of remaining and fixed diagnostics
 */
export interface Summary {
  /** Files processed */
  files: number;
  /** Remaining error-level style diagnostics */
  errors: number;
  /** Remaining warning-level style diagnostics */
  warnings: number;
  /** Remaining info-level style diagnostics */
  info: number;
  /** Remaining tool-level diagnostics */
  toolErrors: number;
  /** Remaining diagnostics with an autofix available */
  fixable: number;
  /** Diagnostics fixed during the run */
  fixed: number;
}

/**
 * Output formats for the check command
 */
export type OutputFormat = 'text' | 'json';

/**
 * Global options shared by every rule
 */
export interface GlobalOptions {
  /** Upper bound on fix passes per file */
  maxFixIterations: number;
  /** Maximum line length */
  lineLength: number;
  /** Spaces per indentation level */
  indentWidth: number;
}

/**
 * Options for the check command after CLI flags and config are merged
 */
export interface CheckOptions {
  /** Files, directories or globs to check */
  paths: string[];
  /** Patterns to exclude */
  exclude: string[];
  /** Rewrite files with fixes applied */
  fix: boolean;
  format: OutputFormat;
  /** Pretty-print JSON output */
  pretty: boolean;
  /** Exit code threshold */
  failOn: Severity;
  /** Number of files processed at once */
  concurrency: number;
  /** Working directory */
  cwd: string;
  /** Suppress stderr progress */
  quiet: boolean;
  /** Show per-file progress */
  verbose: boolean;
  /** Colorize text output */
  color: boolean;
  /** Global rule options */
  options: GlobalOptions;
}
