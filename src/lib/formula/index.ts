/**
 * Model Formula Engine
 *
 * Builds a design matrix X and response vector y from an R-style formula
 * and a tabular dataset.
 *
 * @example
 * ```typescript
 * import { evaluateFormula } from '@/lib/formula'
 * import { datasetFromColumns } from '@/lib/dataset'
 *
 * const data = datasetFromColumns({ x: [1, 2], z: [3, 4], y: [0, 1] })
 * const { X, featureNames } = evaluateFormula('y ~ x*z', data)
 * // X: [[1, 3, 3], [2, 4, 8]]
 * // featureNames: ['x', 'z', 'x:z']
 * ```
 *
 * ## Supported Syntax
 *
 * **Structure:** `response ~ term + term + ...`, every term written once.
 *
 * **Terms:**
 * - `1` - Intercept, a column of ones
 * - `x` - Column as is (an exact column name always wins)
 * - `c(g)` - One indicator column per category of `g`
 * - `log(x)`, `exp`, `sin`, `cos`, `tan`, `tanh`, `sqrt` - Elementwise transform
 * - `I(x^2)`, `I(x^(0.5))`, `I(x^(1/2 1/4))` - Power, rational exponents summed exactly
 * - `poly(x, k)` - Powers 1 through k of `x`
 * - `a:b` - Product of two single-column terms
 * - `a*b` - `a`, `b` and `a:b`
 */

// Evaluation
export { Formula, evaluateFormula, validateFormula, extractColumnRefs } from './formula'
export type { FormulaOptions, FormulaLogger } from './formula'

// Parser
export { parseFormula, splitFormula, splitTerms, classifyFeature, classifyAtom } from './parser'

// Term resolution and assembly
export { resolveTerm, resolveAtom, resolveExponent, resolveDegree } from './evaluator'
export { expandFeatures, expandTerm } from './expander'
export { assemble, flattenGroups, transpose } from './assembler'
export type { AssembledMatrix } from './assembler'

// Transforms
export { TRANSFORM_SPECS, lookupTransform, isSupportedTransform, getSupportedTransforms } from './functions'
export type { TransformSpec } from './functions'

// Errors
export {
  FormulaError,
  FormulaSyntaxError,
  UnknownColumnError,
  UnsupportedOperationError,
  InvalidParameterError,
  NumericEvaluationError,
  isFormulaError,
} from './errors'
export type { FormulaErrorKind, FormulaErrorCode } from './errors'

// Term types
export type {
  AtomTerm,
  ColumnTerm,
  DummyTerm,
  TransformTerm,
  PowerTerm,
  PolyTerm,
  FeatureTerm,
  ParsedFormula,
  ResolvedColumnSet,
  FormulaResult,
  TransformName,
  ValidationResult,
  ValidationError,
} from './ast'
