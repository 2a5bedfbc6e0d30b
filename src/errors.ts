/**
 * Error types raised by stylegate.
 * Every error carries a stable code that doubles as the rule id of the
 * tool-level diagnostic it turns into.
 */

export type ErrorCode =
  | 'parse-failure'
  | 'config-error'
  | 'rule-fault'
  | 'fix-not-converged'
  | 'fix-parse-failure'
  | 'io-failure'
  | 'internal-error';

/**
 * Base error class for all stylegate errors.
 */
export class StylegateError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StylegateError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The parser rejected a file. Rule checking stops for that file only.
 */
export class ParseFailure extends StylegateError {
  constructor(
    message: string,
    public readonly offset: number
  ) {
    super('parse-failure', message, { offset });
    this.name = 'ParseFailure';
  }
}

/**
 * Invalid configuration. Fatal for the whole run.
 */
export class ConfigError extends StylegateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('config-error', message, details);
    this.name = 'ConfigError';
  }
}

/**
 * A rule threw while visiting a file.
 */
export class RuleFault extends StylegateError {
  constructor(
    public readonly ruleId: string,
    public readonly reason: unknown
  ) {
    super('rule-fault', `Rule ${ruleId} failed: ${describeError(reason)}`, { ruleId });
    this.name = 'RuleFault';
  }
}

/**
 * Fix passes hit the iteration bound with fixable violations still pending.
 */
export class FixNotConverged extends StylegateError {
  constructor(
    public readonly iterations: number,
    public readonly pendingRuleIds: string[]
  ) {
    super(
      'fix-not-converged',
      `Fixes did not converge after ${iterations} passes (pending: ${pendingRuleIds.join(', ')})`,
      { iterations, pendingRuleIds }
    );
    this.name = 'FixNotConverged';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
