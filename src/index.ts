export * from '@/lib/formula'
export * from '@/lib/dataset'
export type { CellValue, Dataset, Matrix, OneHotEncoding, Vector } from '@/types'
