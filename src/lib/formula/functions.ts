/**
 * Elementwise Transform Registry
 *
 * Maps the transform names accepted in `fn(column)` terms to numeric
 * functions. The set is closed: names outside it are rejected on lookup.
 */

import type { TransformName } from './ast'
import { NumericEvaluationError } from './errors'

export interface TransformSpec {
  /** Applied to each cell of the column */
  apply: (value: number) => number
  /** Description for error messages and listings */
  description: string
  /** Example term demonstrating usage */
  example: string
}

/**
 * Transforms follow IEEE-754: `log(0)` is -Infinity, `sqrt(-1)` is NaN.
 */
export const TRANSFORM_SPECS: Record<TransformName, TransformSpec> = {
  log: {
    apply: Math.log,
    description: 'log(column) - Natural logarithm',
    example: 'log(income)',
  },
  exp: {
    apply: Math.exp,
    description: 'exp(column) - e raised to the value',
    example: 'exp(rate)',
  },
  sin: {
    apply: Math.sin,
    description: 'sin(column) - Sine, radians',
    example: 'sin(angle)',
  },
  cos: {
    apply: Math.cos,
    description: 'cos(column) - Cosine, radians',
    example: 'cos(angle)',
  },
  tan: {
    apply: Math.tan,
    description: 'tan(column) - Tangent, radians',
    example: 'tan(angle)',
  },
  tanh: {
    apply: Math.tanh,
    description: 'tanh(column) - Hyperbolic tangent',
    example: 'tanh(score)',
  },
  sqrt: {
    apply: Math.sqrt,
    description: 'sqrt(column) - Square root',
    example: 'sqrt(area)',
  },
}

export function isSupportedTransform(name: string): name is TransformName {
  return Object.prototype.hasOwnProperty.call(TRANSFORM_SPECS, name)
}

/**
 * Get the elementwise function for a transform name.
 */
export function lookupTransform(name: string): (value: number) => number {
  if (!isSupportedTransform(name)) {
    throw new NumericEvaluationError('UNKNOWN_TRANSFORM', `Unknown transform: ${name}`, { transform: name })
  }
  return TRANSFORM_SPECS[name].apply
}

export function getSupportedTransforms(): TransformName[] {
  return Object.keys(TRANSFORM_SPECS).filter(isSupportedTransform)
}
