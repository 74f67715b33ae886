export {
  ArrowDataset,
  compareCategories,
  datasetFromColumns,
  datasetFromRecords,
  datasetFromIPC,
} from './arrow-dataset'
export { datasetFromCsv } from './csv'
export type { CsvOptions } from './csv'
