/**
 * Formula Evaluation
 *
 * Entry point: `response ~ features` plus a dataset gives (X, y).
 */

import type { Dataset } from '@/types'
import type { AtomTerm, FormulaResult, ValidationResult } from './ast'
import { classifyAtom, parseFormula, splitFormula } from './parser'
import { expandFeatures } from './expander'
import { InvalidParameterError, UnknownColumnError, isFormulaError } from './errors'
import { LOG_PREFIX } from '@/lib/constants'

export type FormulaLogger = Pick<Console, 'debug' | 'warn'>

export interface FormulaOptions {
  /**
   * Reserved for chunked evaluation of large datasets. Accepted and
   * checked, but the whole dataset is always evaluated at once.
   */
  chunksize?: number
  /** Defaults to console */
  logger?: FormulaLogger
}

/**
 * Evaluates formulas against datasets. Instances hold only options, so one
 * instance can serve any number of calls, concurrent ones included.
 *
 * @example
 * ```typescript
 * const data = datasetFromColumns({ x: [1, 2, 3], y: [10, 20, 30] })
 * const { X, y } = new Formula().evaluate('y ~ 1 + x', data)
 * // X: [[1, 1], [1, 2], [1, 3]]
 * // y: [10, 20, 30]
 * ```
 */
export class Formula {
  readonly chunksize: number | undefined
  private readonly logger: FormulaLogger

  constructor(options: FormulaOptions = {}) {
    const { chunksize, logger = console } = options
    if (chunksize !== undefined && (!Number.isInteger(chunksize) || chunksize < 1)) {
      throw new InvalidParameterError('INVALID_CHUNKSIZE', `chunksize should be a positive integer, got ${chunksize}`, {
        chunksize,
      })
    }
    if (chunksize !== undefined) {
      logger.warn(`${LOG_PREFIX} chunksize=${chunksize} is reserved; evaluating all rows at once`)
    }
    this.chunksize = chunksize
    this.logger = logger
  }

  /**
   * @throws FormulaSyntaxError, UnknownColumnError, UnsupportedOperationError,
   *         InvalidParameterError or NumericEvaluationError. No partial
   *         result is returned.
   */
  evaluate(formula: string, dataset: Dataset): FormulaResult {
    const { response, features } = splitFormula(formula)

    if (!dataset.hasColumn(response)) {
      throw new UnknownColumnError(response)
    }
    const y = dataset.numericColumn(response)

    const { X, featureNames, shape } = expandFeatures(features, dataset)
    this.logger.debug(`${LOG_PREFIX} ${formula.trim()} -> ${shape[0]}x${shape[1]} design matrix`)

    return { X, y, featureNames, shape }
  }
}

/**
 * Evaluate a formula with default options.
 */
export function evaluateFormula(formula: string, dataset: Dataset, options?: FormulaOptions): FormulaResult {
  return new Formula(options).evaluate(formula, dataset)
}

/**
 * Dataset columns a formula reads, in first-use order.
 * Terms that cannot be classified are skipped.
 */
export function extractColumnRefs(formula: string, dataset: Pick<Dataset, 'hasColumn'>): string[] {
  const { response, terms } = parseFormula(formula)
  const columns = [response]

  for (const term of terms) {
    if (term.kind === 'intercept') continue
    const operands = term.kind === 'atom' ? [term.source] : term.operands

    for (const operand of operands) {
      const atom = tryClassifyAtom(operand, dataset)
      if (!atom) continue
      columns.push(atom.kind === 'power' ? atom.base : atom.column)
    }
  }

  return [...new Set(columns)]
}

function tryClassifyAtom(operand: string, dataset: Pick<Dataset, 'hasColumn'>): AtomTerm | null {
  try {
    return classifyAtom(operand, dataset)
  } catch (error) {
    if (isFormulaError(error)) return null
    throw error
  }
}

/**
 * Check a formula against a dataset without throwing.
 *
 * @example
 * ```typescript
 * const validation = validateFormula('y ~ poly(x, 0)', data)
 * if (!validation.isValid) {
 *   console.error(validation.errors[0].message)
 * }
 * ```
 */
export function validateFormula(formula: string, dataset: Dataset): ValidationResult {
  const silent: FormulaLogger = { debug: () => {}, warn: () => {} }

  try {
    new Formula({ logger: silent }).evaluate(formula, dataset)
  } catch (error) {
    if (!isFormulaError(error)) throw error
    return {
      isValid: false,
      errors: [{ kind: error.kind, code: error.code, message: error.message }],
      referencedColumns: safeColumnRefs(formula, dataset),
    }
  }

  return { isValid: true, errors: [], referencedColumns: extractColumnRefs(formula, dataset) }
}

function safeColumnRefs(formula: string, dataset: Dataset): string[] {
  try {
    return extractColumnRefs(formula, dataset)
  } catch (error) {
    if (isFormulaError(error)) return []
    throw error
  }
}
