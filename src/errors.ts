/**
 * Error Types
 *
 * Named errors raised by the pipeline. Failures of external services are not
 * thrown; they travel as `Result` values (see types/common).
 */

/**
 * A raw record whose fields cannot be read as the expected types.
 * The batch driver counts it and moves on.
 */
export class NormalizationError extends Error {
  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message)
    this.name = 'NormalizationError'
  }
}

/**
 * An invalid option or config value.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * The input file is missing or unreadable. Fatal: the run stops before any
 * output is written.
 */
export class InputFileError extends Error {
  constructor(
    readonly path: string,
    reason: string
  ) {
    super(`Cannot read input file ${path}: ${reason}`)
    this.name = 'InputFileError'
  }
}
