/**
 * Base class for errors raised by the finance core.
 * `code` is stable and safe to expose to API clients.
 */
export class FinanceError extends Error {
  readonly code: string

  constructor(code: string, message: string) {
    super(message)
    this.code = code
    this.name = new.target.name
  }
}

/**
 * Malformed or contradictory date range passed to an aggregation
 */
export class InvalidFilterError extends FinanceError {
  constructor(message: string) {
    super('invalid_filter', message)
  }
}

/**
 * Simulation input outside its valid domain
 */
export class InvalidParameterError extends FinanceError {
  readonly parameter: string

  constructor(parameter: string, message: string) {
    super('invalid_parameter', message)
    this.parameter = parameter
  }
}

/**
 * Transaction rejected before it reaches the store
 */
export class ValidationError extends FinanceError {
  constructor(message: string) {
    super('validation_failed', message)
  }
}
