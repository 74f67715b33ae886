/**
 * Model Formula Term Types
 *
 * Tagged variants produced by classifying the pieces of a formula.
 */

import type { Matrix, Vector } from '@/types'
import type { FormulaErrorCode, FormulaErrorKind } from './errors'

/**
 * Supported elementwise transforms.
 */
export type TransformName = 'log' | 'exp' | 'sin' | 'cos' | 'tan' | 'tanh' | 'sqrt'

/**
 * A single operand: anything that resolves against the dataset on its own.
 */
export type AtomTerm =
  | ColumnTerm
  | DummyTerm
  | TransformTerm
  | PowerTerm
  | PolyTerm

/** `age`: an existing column, taken as is */
export interface ColumnTerm {
  kind: 'column'
  source: string
  column: string
}

/** `c(group)`: one indicator column per category */
export interface DummyTerm {
  kind: 'dummy'
  source: string
  column: string
}

/** `log(income)` */
export interface TransformTerm {
  kind: 'transform'
  source: string
  transform: TransformName
  column: string
}

/** `I(x^2)`, `I(x^(1/2))`, `I(x^(1/2 1/4))` */
export interface PowerTerm {
  kind: 'power'
  source: string
  base: string
  /** Exponent text after `^`, trimmed and not yet interpreted */
  exponent: string
}

/** `poly(x, 3)` */
export interface PolyTerm {
  kind: 'poly'
  source: string
  column: string
  /** Degree text, validated when the term is resolved */
  degree: string
}

/**
 * One `+`-separated piece of the feature expression.
 */
export type FeatureTerm =
  | { kind: 'intercept'; source: string }
  | { kind: 'interaction'; source: string; operands: [string, string] }
  | { kind: 'cross'; source: string; operands: [string, string] }
  | { kind: 'atom'; source: string }

export interface ParsedFormula {
  response: string
  terms: FeatureTerm[]
}

/**
 * Columns contributed by one term, in generation order.
 */
export interface ResolvedColumnSet {
  names: string[]
  vectors: Vector[]
}

export interface FormulaResult {
  /** Design matrix, samples × features */
  X: Matrix
  /** Response values, one per sample */
  y: Vector
  /** Label for each column of X */
  featureNames: string[]
  /** [samples, features] */
  shape: [number, number]
}

export interface ValidationError {
  kind: FormulaErrorKind
  code: FormulaErrorCode
  message: string
}

/**
 * Validation result for a formula against a dataset.
 */
export interface ValidationResult {
  isValid: boolean
  errors: ValidationError[]
  /** Dataset columns the formula reads */
  referencedColumns: string[]
}
