/**
 * Model Formula Parser (Ohm.js)
 *
 * Splits `response ~ term + term ...` formulas and classifies each term.
 * Operator structure (`~`, `+`, `:`, `*`) is handled by plain splitting;
 * the atom forms (`c()`, transforms, `I()`, `poly()`) by an Ohm grammar.
 */

import * as ohm from 'ohm-js'
import type { Dataset } from '@/types'
import type { AtomTerm, FeatureTerm, ParsedFormula } from './ast'
import { isSupportedTransform } from './functions'
import { FormulaSyntaxError, NumericEvaluationError, UnsupportedOperationError } from './errors'
import {
  CROSS_OPERATOR,
  FORMULA_SEPARATOR,
  INTERACTION_OPERATOR,
  INTERCEPT_TERM,
  TERM_SEPARATOR,
} from '@/lib/constants'

/**
 * Ohm.js grammar for a single atom term.
 *
 * All rules are lexical: whitespace is only accepted where spelled out
 * (inside `I()` and around the `poly()` arguments).
 */
const grammarSource = `
ModelTerm {
  term = dummy | transform | power | poly

  // Categorical: c(group)
  dummy = "c(" name ")"

  // NOTE: tanh MUST come before tan, ordered choice commits to the first match
  transform = transformName "(" name ")"
  transformName = "tanh" | "tan" | "log" | "exp" | "sin" | "cos" | "sqrt"

  // Power: I(x^2), I(x^(0.5)), I(x^(1/2 1/4))
  power = "I(" powerBase "^" powerExponent ")"
  powerBase = (~"^" any)+
  powerExponent = (~(")" end) any)+

  // Polynomial: poly(x, 3)
  poly = "poly(" blank name blank "," blank degree blank ")"
  degree = (~(blank ")") any)+

  name = (alnum | "_")+
  blank = (" " | "\\t")*
}
`

const grammar = ohm.grammar(grammarSource)

const semantics = grammar.createSemantics()

semantics.addOperation<AtomTerm>('toTerm', {
  term(form) {
    return form.toTerm()
  },

  dummy(_open, name, _close) {
    return {
      kind: 'dummy',
      source: this.sourceString,
      column: name.sourceString,
    }
  },

  transform(fn, _open, name, _close) {
    const transform = fn.sourceString
    if (!isSupportedTransform(transform)) {
      throw new NumericEvaluationError('UNKNOWN_TRANSFORM', `Unknown transform: ${transform}`, { transform })
    }
    return {
      kind: 'transform',
      source: this.sourceString,
      transform,
      column: name.sourceString,
    }
  },

  power(_open, base, _caret, exponent, _close) {
    return {
      kind: 'power',
      source: this.sourceString,
      base: base.sourceString.trim(),
      exponent: exponent.sourceString.trim(),
    }
  },

  poly(_open, _b1, name, _b2, _comma, _b3, degree, _b4, _close) {
    return {
      kind: 'poly',
      source: this.sourceString,
      column: name.sourceString,
      degree: degree.sourceString,
    }
  },
})

/**
 * Split a formula into its response and feature expression.
 *
 * @throws FormulaSyntaxError unless there is exactly one `~`
 */
export function splitFormula(formula: string): { response: string; features: string } {
  const parts = formula.split(FORMULA_SEPARATOR)
  if (parts.length !== 2) {
    throw new FormulaSyntaxError(
      'SEPARATOR_COUNT',
      `${FORMULA_SEPARATOR} should be used exactly once to separate the response and the features`,
      { separators: parts.length - 1 }
    )
  }
  const [response, features] = parts.map((part) => part.trim())
  return { response, features }
}

/**
 * Split the feature expression on `+` into trimmed term strings.
 *
 * @throws FormulaSyntaxError if the same term is written twice
 */
export function splitTerms(features: string): string[] {
  const terms = features.split(TERM_SEPARATOR).map((term) => term.trim())
  const seen = new Set<string>()
  for (const term of terms) {
    if (seen.has(term)) {
      throw new FormulaSyntaxError('DUPLICATE_TERM', `The features should be different: "${term}" appears more than once`, {
        term,
      })
    }
    seen.add(term)
  }
  return terms
}

function splitBinary(term: string, operator: string): [string, string] {
  const operands = term.split(operator).map((operand) => operand.trim())
  if (operands.length !== 2) {
    throw new FormulaSyntaxError('OPERATOR_ARITY', `The operator ${operator} should be binary: "${term}"`, {
      term,
      operator,
      operands: operands.length,
    })
  }
  return [operands[0], operands[1]]
}

/**
 * Classify a feature term by its operator. Interaction takes precedence
 * over cross, so `a:b*c` is an interaction of `a` and `b*c`.
 */
export function classifyFeature(term: string): FeatureTerm {
  if (term === INTERCEPT_TERM) {
    return { kind: 'intercept', source: term }
  }
  if (term.includes(INTERACTION_OPERATOR)) {
    return { kind: 'interaction', source: term, operands: splitBinary(term, INTERACTION_OPERATOR) }
  }
  if (term.includes(CROSS_OPERATOR)) {
    return { kind: 'cross', source: term, operands: splitBinary(term, CROSS_OPERATOR) }
  }
  return { kind: 'atom', source: term }
}

/**
 * Parse the operator structure of a formula. Needs no data: atoms are
 * classified later, against the dataset they are evaluated on.
 *
 * @example
 * ```typescript
 * parseFormula('y ~ 1 + x:z')
 * // {
 * //   response: 'y',
 * //   terms: [
 * //     { kind: 'intercept', source: '1' },
 * //     { kind: 'interaction', source: 'x:z', operands: ['x', 'z'] },
 * //   ],
 * // }
 * ```
 */
export function parseFormula(formula: string): ParsedFormula {
  const { response, features } = splitFormula(formula)
  return {
    response,
    terms: splitTerms(features).map(classifyFeature),
  }
}

/**
 * Classify an atom term. A term that names an existing column is always
 * that column, so a column literally called `c(age)` shadows the dummy form.
 *
 * @throws UnsupportedOperationError if the term matches no known form
 */
export function classifyAtom(term: string, dataset: Pick<Dataset, 'hasColumn'>): AtomTerm {
  if (dataset.hasColumn(term)) {
    return { kind: 'column', source: term, column: term }
  }

  const matchResult = grammar.match(term, 'term')
  if (matchResult.failed()) {
    throw new UnsupportedOperationError('UNSUPPORTED_TERM', `The current operation is not supported: "${term}"`, {
      term,
    })
  }
  return semantics(matchResult).toTerm()
}

export { grammar, semantics }
