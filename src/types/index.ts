/**
 * Shared data types for datasets and design matrices.
 */

/** A single dataset cell as it comes out of a column. */
export type CellValue = number | string | boolean | null

/** One numeric column, one entry per sample. */
export type Vector = number[]

/** Samples as rows, features as columns. */
export type Matrix = number[][]

/**
 * Tabular data source consumed by the formula engine.
 *
 * Implementations are read-only from the engine's point of view.
 */
export interface Dataset {
  /** Column names in storage order */
  columnNames(): string[]
  hasColumn(name: string): boolean
  /** Raw cell values, length rowCount() */
  columnValues(name: string): CellValue[]
  /** Cell values coerced to numbers (booleans become 0/1, nulls NaN) */
  numericColumn(name: string): Vector
  /**
   * One indicator vector per distinct value, in canonical category order.
   */
  oneHot(name: string): OneHotEncoding
  rowCount(): number
}

export interface OneHotEncoding {
  /** Distinct values, in the same order as `indicators` */
  categories: Exclude<CellValue, null>[]
  indicators: Vector[]
}
