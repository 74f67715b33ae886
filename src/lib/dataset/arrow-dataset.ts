/**
 * Arrow-backed Dataset
 *
 * Wraps an apache-arrow Table so formulas can read its columns by name.
 */

import { tableFromArrays, tableFromIPC, tableFromJSON, type Table } from 'apache-arrow'
import type { CellValue, Dataset, OneHotEncoding, Vector } from '@/types'
import { NumericEvaluationError, UnknownColumnError } from '@/lib/formula/errors'

type Category = Exclude<CellValue, null>

/**
 * Normalize an Arrow cell to a plain value.
 * Int64 columns arrive as bigint, timestamps as Date.
 */
function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') return value
  if (typeof value === 'bigint') return Number(value)
  if (value instanceof Date) return value.getTime()
  return String(value)
}

function toNumber(value: CellValue, column: string, row: number): number {
  if (value === null) return Number.NaN
  if (typeof value === 'number') return value
  if (typeof value === 'boolean') return value ? 1 : 0
  throw new NumericEvaluationError(
    'NON_NUMERIC_COLUMN',
    `Column "${column}" has a non-numeric value at row ${row}: "${value}"`,
    { column, row, value }
  )
}

// numbers < booleans < strings
function categoryRank(value: Category): number {
  if (typeof value === 'number') return 0
  if (typeof value === 'boolean') return 1
  return 2
}

/**
 * Canonical category order: numbers ascending, then false/true, then
 * strings by code unit.
 */
export function compareCategories(a: Category, b: Category): number {
  const rank = categoryRank(a) - categoryRank(b)
  if (rank !== 0) return rank
  if (typeof a === 'number' && typeof b === 'number') return a - b
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b)
  const left = String(a)
  const right = String(b)
  if (left === right) return 0
  return left < right ? -1 : 1
}

function isCategory(value: CellValue): value is Category {
  return value !== null && !(typeof value === 'number' && Number.isNaN(value))
}

export class ArrowDataset implements Dataset {
  private readonly columns = new Map<string, CellValue[]>()

  constructor(readonly table: Table) {}

  columnNames(): string[] {
    return this.table.schema.fields.map((field) => field.name)
  }

  hasColumn(name: string): boolean {
    return this.columnNames().includes(name)
  }

  rowCount(): number {
    return this.table.numRows
  }

  columnValues(name: string): CellValue[] {
    return [...this.readColumn(name)]
  }

  numericColumn(name: string): Vector {
    return this.readColumn(name).map((value, row) => toNumber(value, name, row))
  }

  /**
   * Null and NaN cells belong to no category: their row is 0 in every
   * indicator.
   */
  oneHot(name: string): OneHotEncoding {
    const values = this.readColumn(name)
    const categories = [...new Set(values)]
      .filter(isCategory)
      .sort(compareCategories)

    return {
      categories,
      indicators: categories.map((category) => values.map((value) => (value === category ? 1 : 0))),
    }
  }

  private readColumn(name: string): CellValue[] {
    const cached = this.columns.get(name)
    if (cached) return cached

    const vector = this.hasColumn(name) ? this.table.getChild(name) : null
    if (!vector) {
      throw new UnknownColumnError(name)
    }
    const values = Array.from(vector, toCell)
    this.columns.set(name, values)
    return values
  }
}

/**
 * @example
 * ```typescript
 * const data = datasetFromColumns({ x: [1, 2, 3], g: ['a', 'b', 'a'] })
 * data.oneHot('g').indicators // [[1, 0, 1], [0, 1, 0]]
 * ```
 */
export function datasetFromColumns(columns: Record<string, readonly CellValue[]>): ArrowDataset {
  return new ArrowDataset(tableFromArrays(columns))
}

export function datasetFromRecords(records: Record<string, CellValue>[]): ArrowDataset {
  return new ArrowDataset(tableFromJSON(records))
}

/**
 * Load an Arrow IPC stream or file.
 */
export function datasetFromIPC(bytes: Uint8Array): ArrowDataset {
  return new ArrowDataset(tableFromIPC(bytes))
}
