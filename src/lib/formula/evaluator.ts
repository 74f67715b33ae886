/**
 * Term Evaluator
 *
 * Resolves one atom term into numeric columns. The dataset is passed into
 * every call; nothing is stored between calls.
 */

import { add, fraction, number } from 'mathjs'
import type { Fraction } from 'mathjs'
import type { Dataset, Vector } from '@/types'
import type { AtomTerm, PolyTerm, PowerTerm, ResolvedColumnSet } from './ast'
import { classifyAtom } from './parser'
import { lookupTransform } from './functions'
import { InvalidParameterError, NumericEvaluationError, UnknownColumnError } from './errors'

const NUMERIC_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i
const INTEGER_LITERAL = /^[+-]?\d+$/

function requireColumn(dataset: Dataset, column: string): void {
  if (!dataset.hasColumn(column)) {
    throw new UnknownColumnError(column)
  }
}

function parseNumericLiteral(text: string, term: string): number {
  if (!NUMERIC_LITERAL.test(text)) {
    throw new NumericEvaluationError('INVALID_EXPONENT', `Could not convert exponent "${text}" to a number in ${term}`, {
      term,
      exponent: text,
    })
  }
  return Number(text)
}

/**
 * Sum whitespace-separated rational literals exactly: `1/2 1/4` is 3/4.
 */
function sumRationals(text: string, term: string): number {
  const parts = text.split(/\s+/).filter((part) => part !== '')
  try {
    const total = parts.reduce<Fraction>((sum, part) => add(sum, fraction(part)), fraction(0))
    return number(total)
  } catch (error) {
    throw new NumericEvaluationError(
      'INVALID_EXPONENT',
      `Could not read "${text}" as a sum of fractions in ${term}`,
      { term, exponent: text },
      { cause: error }
    )
  }
}

/**
 * Interpret the text after `^` in an `I()` term.
 *
 * - `2`, `-1`, `0.5`: numeric literal
 * - `(0.5)`: parenthesized numeric literal
 * - `(1/2)`, `(1/3 1/6)`: summed rationals
 */
export function resolveExponent(exponent: string, term: string): number {
  if (exponent.startsWith('(') && exponent.endsWith(')')) {
    const inner = exponent.slice(1, -1).trim()
    if (inner.includes('/')) {
      return sumRationals(inner, term)
    }
    return parseNumericLiteral(inner, term)
  }
  return parseNumericLiteral(exponent, term)
}

function resolvePower(term: PowerTerm, dataset: Dataset): Vector {
  requireColumn(dataset, term.base)
  const power = resolveExponent(term.exponent, term.source)
  const values = dataset.numericColumn(term.base)

  return values.map((value, row) => {
    const result = Math.pow(value, power)
    if (Number.isNaN(result) && !Number.isNaN(value)) {
      throw new NumericEvaluationError(
        'DOMAIN_ERROR',
        `${term.source} is undefined at row ${row}: ${value}^${power}`,
        { term: term.source, row, value, power }
      )
    }
    return result
  })
}

/**
 * Parse and check a `poly()` degree.
 */
export function resolveDegree(term: PolyTerm): number {
  if (!INTEGER_LITERAL.test(term.degree)) {
    throw new InvalidParameterError('INVALID_DEGREE', `Degree should be an integer in ${term.source}`, {
      term: term.source,
      degree: term.degree,
    })
  }
  const degree = Number.parseInt(term.degree, 10)
  if (degree < 1) {
    throw new InvalidParameterError('INVALID_DEGREE', `Power should be no smaller than 1 in ${term.source}`, {
      term: term.source,
      degree,
    })
  }
  return degree
}

/**
 * Resolve a classified atom into its columns, in generation order.
 */
export function resolveAtom(atom: AtomTerm, dataset: Dataset): ResolvedColumnSet {
  switch (atom.kind) {
    case 'column':
      return { names: [atom.column], vectors: [dataset.numericColumn(atom.column)] }

    case 'dummy': {
      requireColumn(dataset, atom.column)
      const { categories, indicators } = dataset.oneHot(atom.column)
      return {
        names: categories.map((category) => `${atom.source}[${String(category)}]`),
        vectors: indicators,
      }
    }

    case 'transform': {
      requireColumn(dataset, atom.column)
      const apply = lookupTransform(atom.transform)
      return { names: [atom.source], vectors: [dataset.numericColumn(atom.column).map(apply)] }
    }

    case 'power':
      return { names: [atom.source], vectors: [resolvePower(atom, dataset)] }

    case 'poly': {
      requireColumn(dataset, atom.column)
      const degree = resolveDegree(atom)
      const values = dataset.numericColumn(atom.column)
      const names: string[] = []
      const vectors: Vector[] = []
      for (let power = 1; power <= degree; power++) {
        names.push(`${atom.source}[${power}]`)
        vectors.push(values.map((value) => Math.pow(value, power)))
      }
      return { names, vectors }
    }

    default: {
      const unreachable: never = atom
      return unreachable
    }
  }
}

/**
 * Resolve a term string against a dataset.
 *
 * @example
 * ```typescript
 * resolveTerm('poly(x, 2)', dataset)
 * // { names: ['poly(x, 2)[1]', 'poly(x, 2)[2]'], vectors: [[1, 2], [1, 4]] }
 * ```
 */
export function resolveTerm(term: string, dataset: Dataset): ResolvedColumnSet {
  return resolveAtom(classifyAtom(term, dataset), dataset)
}
