/**
 * Formula Errors
 *
 * Every failure aborts the whole evaluation: no partial design matrix is
 * returned. Each error carries a machine-readable `code` for programmatic
 * handling, alongside the user-facing message.
 */

export type FormulaErrorKind =
  | 'FormulaSyntaxError'
  | 'UnknownColumnError'
  | 'UnsupportedOperationError'
  | 'InvalidParameterError'
  | 'NumericEvaluationError'

export type FormulaErrorCode =
  // Syntax
  | 'SEPARATOR_COUNT'
  | 'DUPLICATE_TERM'
  | 'OPERATOR_ARITY'
  // Columns
  | 'UNKNOWN_COLUMN'
  // Unsupported
  | 'UNSUPPORTED_TERM'
  | 'MULTI_COLUMN_OPERAND'
  // Parameters
  | 'INVALID_DEGREE'
  | 'INVALID_CHUNKSIZE'
  // Numeric
  | 'INVALID_EXPONENT'
  | 'DOMAIN_ERROR'
  | 'UNKNOWN_TRANSFORM'
  | 'NON_NUMERIC_COLUMN'

export class FormulaError extends Error {
  readonly kind: FormulaErrorKind
  readonly code: FormulaErrorCode
  readonly details?: Record<string, unknown>

  constructor(
    kind: FormulaErrorKind,
    code: FormulaErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = kind
    this.kind = kind
    this.code = code
    this.details = details
  }
}

export class FormulaSyntaxError extends FormulaError {
  constructor(code: FormulaErrorCode, message: string, details?: Record<string, unknown>) {
    super('FormulaSyntaxError', code, message, details)
  }
}

export class UnknownColumnError extends FormulaError {
  readonly column: string

  constructor(column: string) {
    super('UnknownColumnError', 'UNKNOWN_COLUMN', `Column "${column}" is not in the dataset`, { column })
    this.column = column
  }
}

export class UnsupportedOperationError extends FormulaError {
  constructor(code: FormulaErrorCode, message: string, details?: Record<string, unknown>) {
    super('UnsupportedOperationError', code, message, details)
  }
}

export class InvalidParameterError extends FormulaError {
  constructor(code: FormulaErrorCode, message: string, details?: Record<string, unknown>) {
    super('InvalidParameterError', code, message, details)
  }
}

export class NumericEvaluationError extends FormulaError {
  constructor(
    code: FormulaErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super('NumericEvaluationError', code, message, details, options)
  }
}

export function isFormulaError(error: unknown): error is FormulaError {
  return error instanceof FormulaError
}
