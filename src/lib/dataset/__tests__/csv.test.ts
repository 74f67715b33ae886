import { describe, it, expect } from 'vitest'
import { datasetFromCsv } from '../csv'
import { evaluateFormula } from '@/lib/formula'

describe('datasetFromCsv', () => {
  it('casts numeric cells and keeps text', () => {
    const data = datasetFromCsv('x,g,y\n1,a,10\n2.5,b,20\n')

    expect(data.columnNames()).toEqual(['x', 'g', 'y'])
    expect(data.columnValues('x')).toEqual([1, 2.5])
    expect(data.columnValues('g')).toEqual(['a', 'b'])
  })

  it('reads empty cells as null', () => {
    const data = datasetFromCsv('x,y\n1,\n,4\n')
    expect(data.columnValues('x')).toEqual([1, null])
    expect(data.columnValues('y')).toEqual([null, 4])
  })

  it('accepts another delimiter', () => {
    const data = datasetFromCsv('x;y\n1;2\n', { delimiter: ';' })
    expect(data.numericColumn('y')).toEqual([2])
  })

  it('feeds formula evaluation', () => {
    const data = datasetFromCsv('g,x,y\nlow,1,0\nhigh,2,1\nlow,3,0\n')
    const { X, y, featureNames } = evaluateFormula('y ~ c(g) + x', data, {
      logger: { debug: () => {}, warn: () => {} },
    })

    expect(featureNames).toEqual(['c(g)[high]', 'c(g)[low]', 'x'])
    expect(X).toEqual([
      [0, 1, 1],
      [1, 0, 2],
      [0, 1, 3],
    ])
    expect(y).toEqual([0, 1, 0])
  })
})
