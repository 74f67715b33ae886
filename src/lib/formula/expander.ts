/**
 * Feature Expander
 *
 * Turns the feature side of a formula into design-matrix columns:
 * intercept, interactions (`x:z`), crosses (`x*z`) and atoms, in the
 * order they are written.
 */

import type { Dataset, Vector } from '@/types'
import type { FeatureTerm, ResolvedColumnSet } from './ast'
import { classifyFeature, splitTerms } from './parser'
import { resolveTerm } from './evaluator'
import { assemble, type AssembledMatrix } from './assembler'
import { UnsupportedOperationError } from './errors'
import { INTERACTION_OPERATOR } from '@/lib/constants'

/**
 * Resolve an interaction operand, which must be exactly one column.
 */
function resolveOperand(operand: string, term: string, dataset: Dataset): { name: string; vector: Vector } {
  const { names, vectors } = resolveTerm(operand, dataset)
  if (vectors.length !== 1) {
    throw new UnsupportedOperationError(
      'MULTI_COLUMN_OPERAND',
      `"${operand}" produces ${vectors.length} columns and cannot be an operand of "${term}"`,
      { term, operand, columns: vectors.length }
    )
  }
  return { name: names[0], vector: vectors[0] }
}

function multiply(left: Vector, right: Vector): Vector {
  return left.map((value, i) => value * right[i])
}

function ones(length: number): Vector {
  return new Array<number>(length).fill(1)
}

/**
 * Resolve one feature term into its column group.
 */
export function expandTerm(term: FeatureTerm, dataset: Dataset): ResolvedColumnSet {
  switch (term.kind) {
    case 'intercept':
      return { names: [term.source], vectors: [ones(dataset.rowCount())] }

    case 'interaction': {
      const [left, right] = term.operands.map((operand) => resolveOperand(operand, term.source, dataset))
      return {
        names: [`${left.name}${INTERACTION_OPERATOR}${right.name}`],
        vectors: [multiply(left.vector, right.vector)],
      }
    }

    // Main effects, then their product
    case 'cross': {
      const [left, right] = term.operands.map((operand) => resolveOperand(operand, term.source, dataset))
      return {
        names: [left.name, right.name, `${left.name}${INTERACTION_OPERATOR}${right.name}`],
        vectors: [left.vector, right.vector, multiply(left.vector, right.vector)],
      }
    }

    case 'atom':
      return resolveTerm(term.source, dataset)

    default: {
      const unreachable: never = term
      return unreachable
    }
  }
}

/**
 * Expand a `+`-joined feature expression into a design matrix.
 *
 * @throws FormulaSyntaxError on duplicate terms or non-binary operators,
 *         before any column is resolved
 */
export function expandFeatures(features: string, dataset: Dataset): AssembledMatrix {
  const terms = splitTerms(features).map(classifyFeature)
  const groups = terms.map((term) => expandTerm(term, dataset))
  return assemble(groups, dataset.rowCount())
}
