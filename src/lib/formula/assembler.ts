/**
 * Matrix Assembler
 *
 * Stacks per-term column groups into a samples × features matrix.
 * No scaling or deduplication: column order is exactly the flatten order.
 */

import type { Matrix, Vector } from '@/types'
import type { ResolvedColumnSet } from './ast'

export interface AssembledMatrix {
  X: Matrix
  featureNames: string[]
  shape: [number, number]
}

/**
 * Flatten column groups, keeping each group's internal order.
 */
export function flattenGroups(groups: ResolvedColumnSet[]): ResolvedColumnSet {
  return {
    names: groups.flatMap((group) => group.names),
    vectors: groups.flatMap((group) => group.vectors),
  }
}

/**
 * Transpose feature vectors (one per column) into sample rows.
 */
export function transpose(vectors: Vector[], rowCount: number): Matrix {
  const rows: Matrix = []
  for (let i = 0; i < rowCount; i++) {
    rows.push(vectors.map((vector) => vector[i]))
  }
  return rows
}

export function assemble(groups: ResolvedColumnSet[], rowCount: number): AssembledMatrix {
  const { names, vectors } = flattenGroups(groups)
  return {
    X: transpose(vectors, rowCount),
    featureNames: names,
    shape: [rowCount, vectors.length],
  }
}
