/**
 * Error types for the decision engine.
 *
 * Per-file problems are never thrown; they travel as markers on the
 * FileRecord. These classes cover the failures that stop a whole run
 * (configuration) or a single cluster (search).
 */

export const ErrorCode = {
  CONFIG_ERROR: 'CONFIG_ERROR',
  SCAN_ERROR: 'SCAN_ERROR',
  SEARCH_INVARIANT_ERROR: 'SEARCH_INVARIANT_ERROR',
  SEARCH_BUDGET_ERROR: 'SEARCH_BUDGET_ERROR'
} as const

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode]

export abstract class SweepwiseError extends Error {
  abstract readonly code: ErrorCode
  readonly cause?: Error

  constructor(message: string, options?: { cause?: Error }) {
    super(message)
    this.name = this.constructor.name
    this.cause = options?.cause

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`
    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`
    }
    return result
  }
}

/**
 * Invalid settings file or option values.
 */
export class ConfigError extends SweepwiseError {
  readonly code = ErrorCode.CONFIG_ERROR

  constructor(
    message: string,
    readonly issues: string[] = [],
    options?: { cause?: Error }
  ) {
    super(message, options)
  }

  static fromIssues(source: string, issues: string[]): ConfigError {
    return new ConfigError(`Invalid configuration in ${source}: ${issues.join('; ')}`, issues)
  }
}

/**
 * A root directory could not be walked at all.
 */
export class ScanError extends SweepwiseError {
  readonly code = ErrorCode.SCAN_ERROR

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: Error }
  ) {
    super(message, options)
  }
}

/**
 * The search exhausted its frontier without reaching a terminal state.
 * Unreachable while KEEP stays legal; reported per cluster.
 */
export class SearchInvariantError extends SweepwiseError {
  readonly code = ErrorCode.SEARCH_INVARIANT_ERROR

  constructor(readonly clusterId: string, message: string) {
    super(message)
  }
}

export class SearchBudgetError extends SweepwiseError {
  readonly code = ErrorCode.SEARCH_BUDGET_ERROR

  constructor(
    readonly clusterId: string,
    readonly expanded: number
  ) {
    super(`Search for cluster ${clusterId} exceeded ${expanded} expansions`)
  }
}

export function isSweepwiseError(err: unknown): err is SweepwiseError {
  return err instanceof SweepwiseError
}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError
}

export function isSearchFailure(err: unknown): err is SearchInvariantError | SearchBudgetError {
  return err instanceof SearchInvariantError || err instanceof SearchBudgetError
}

export function ensureError(err: unknown): Error {
  if (err instanceof Error) {
    return err
  }
  return new Error(String(err))
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined
  }
  return undefined
}
