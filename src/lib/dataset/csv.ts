/**
 * CSV Loading
 *
 * Parses CSV text with a header row into an Arrow-backed dataset.
 * Numeric-looking cells become numbers, empty cells become nulls.
 */

import { parse } from 'csv-parse/sync'
import type { CastingContext } from 'csv-parse'
import type { CellValue } from '@/types'
import { datasetFromRecords, type ArrowDataset } from './arrow-dataset'

export interface CsvOptions {
  /** Field delimiter, defaults to "," */
  delimiter?: string
}

function castCell(value: string, context: CastingContext): CellValue {
  if (context.header) return value
  if (value === '') return null
  const numeric = Number(value)
  return Number.isNaN(numeric) ? value : numeric
}

/**
 * @example
 * ```typescript
 * const data = datasetFromCsv('x,y\n1,10\n2,20\n')
 * data.numericColumn('y') // [10, 20]
 * ```
 */
export function datasetFromCsv(text: string, options: CsvOptions = {}): ArrowDataset {
  const records: Record<string, CellValue>[] = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    delimiter: options.delimiter ?? ',',
    cast: castCell,
  })
  return datasetFromRecords(records)
}
