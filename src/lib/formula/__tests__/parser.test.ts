/**
 * Model Formula Parser Tests
 *
 * Tests for splitting formulas and classifying terms.
 */

import { describe, it, expect } from 'vitest'
import { classifyAtom, classifyFeature, parseFormula, splitFormula, splitTerms } from '../parser'
import { FormulaSyntaxError, UnsupportedOperationError } from '../errors'

function columns(...names: string[]) {
  const known = new Set(names)
  return { hasColumn: (name: string) => known.has(name) }
}

describe('splitFormula', () => {
  it('splits and trims response and features', () => {
    expect(splitFormula('  y ~ 1 + x  ')).toEqual({ response: 'y', features: '1 + x' })
  })

  it('rejects more than one separator', () => {
    expect(() => splitFormula('y ~ x ~ z')).toThrow(FormulaSyntaxError)
  })

  it('rejects a formula without separator', () => {
    expect(() => splitFormula('y + x')).toThrow(FormulaSyntaxError)
  })

  it('reports the separator count', () => {
    try {
      splitFormula('a ~ b ~ c ~ d')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(FormulaSyntaxError)
      expect(error).toMatchObject({ code: 'SEPARATOR_COUNT', details: { separators: 3 } })
    }
  })
})

describe('splitTerms', () => {
  it('splits on + and trims each term', () => {
    expect(splitTerms('1 +x+  log(z) ')).toEqual(['1', 'x', 'log(z)'])
  })

  it('rejects duplicate terms', () => {
    expect(() => splitTerms('x + z + x')).toThrow(FormulaSyntaxError)
  })

  it('compares terms after trimming', () => {
    expect(() => splitTerms('x +  x ')).toThrow(/"x" appears more than once/)
  })

  it('treats differently spelled terms as different', () => {
    expect(splitTerms('x:z + z:x')).toEqual(['x:z', 'z:x'])
  })
})

describe('classifyFeature', () => {
  it('classifies the intercept', () => {
    expect(classifyFeature('1')).toEqual({ kind: 'intercept', source: '1' })
  })

  it('classifies interactions with trimmed operands', () => {
    expect(classifyFeature('x : z')).toEqual({ kind: 'interaction', source: 'x : z', operands: ['x', 'z'] })
  })

  it('classifies crosses', () => {
    expect(classifyFeature('x*log(z)')).toEqual({ kind: 'cross', source: 'x*log(z)', operands: ['x', 'log(z)'] })
  })

  it('gives interaction precedence over cross', () => {
    expect(classifyFeature('a:b*c')).toEqual({ kind: 'interaction', source: 'a:b*c', operands: ['a', 'b*c'] })
  })

  it('rejects non-binary interactions', () => {
    expect(() => classifyFeature('a:b:c')).toThrow(/operator : should be binary/)
  })

  it('rejects non-binary crosses', () => {
    expect(() => classifyFeature('a*b*c')).toThrow(FormulaSyntaxError)
  })

  it('leaves everything else as an atom', () => {
    expect(classifyFeature('poly(x, 2)')).toEqual({ kind: 'atom', source: 'poly(x, 2)' })
  })
})

describe('parseFormula', () => {
  it('parses response and ordered terms', () => {
    expect(parseFormula('y ~ 1 + x + x:z')).toEqual({
      response: 'y',
      terms: [
        { kind: 'intercept', source: '1' },
        { kind: 'atom', source: 'x' },
        { kind: 'interaction', source: 'x:z', operands: ['x', 'z'] },
      ],
    })
  })

  it('checks duplicates before operator arity', () => {
    expect(() => parseFormula('y ~ a:b:c + a:b:c')).toThrow(/appears more than once/)
  })
})

describe('classifyAtom', () => {
  describe('raw columns', () => {
    it('returns existing columns as is', () => {
      expect(classifyAtom('age', columns('age'))).toEqual({ kind: 'column', source: 'age', column: 'age' })
    })

    it('lets an exact column name shadow the dummy form', () => {
      expect(classifyAtom('c(age)', columns('age', 'c(age)'))).toEqual({
        kind: 'column',
        source: 'c(age)',
        column: 'c(age)',
      })
    })
  })

  describe('dummy terms', () => {
    it('parses c(name)', () => {
      expect(classifyAtom('c(group_1)', columns())).toEqual({ kind: 'dummy', source: 'c(group_1)', column: 'group_1' })
    })

    it('rejects spaces inside c()', () => {
      expect(() => classifyAtom('c( g )', columns())).toThrow(UnsupportedOperationError)
    })
  })

  describe('transform terms', () => {
    it.each(['log', 'exp', 'sin', 'cos', 'tan', 'tanh', 'sqrt'])('parses %s(x)', (fn) => {
      expect(classifyAtom(`${fn}(x)`, columns())).toEqual({
        kind: 'transform',
        source: `${fn}(x)`,
        transform: fn,
        column: 'x',
      })
    })

    it('rejects unknown function names', () => {
      expect(() => classifyAtom('abs(x)', columns())).toThrow(UnsupportedOperationError)
    })
  })

  describe('power terms', () => {
    it('parses a plain exponent', () => {
      expect(classifyAtom('I(x^2)', columns())).toEqual({ kind: 'power', source: 'I(x^2)', base: 'x', exponent: '2' })
    })

    it('trims base and exponent', () => {
      expect(classifyAtom('I( x ^ (1/2) )', columns())).toEqual({
        kind: 'power',
        source: 'I( x ^ (1/2) )',
        base: 'x',
        exponent: '(1/2)',
      })
    })

    it('keeps a summed rational exponent whole', () => {
      expect(classifyAtom('I(x^(1/2 1/4))', columns())).toMatchObject({ exponent: '(1/2 1/4)' })
    })

    it('requires a ^', () => {
      expect(() => classifyAtom('I(x)', columns())).toThrow(UnsupportedOperationError)
    })
  })

  describe('polynomial terms', () => {
    it('parses poly(name, degree)', () => {
      expect(classifyAtom('poly(x,3)', columns())).toEqual({ kind: 'poly', source: 'poly(x,3)', column: 'x', degree: '3' })
    })

    it('accepts spaces around arguments', () => {
      expect(classifyAtom('poly( x , 2 )', columns())).toMatchObject({ column: 'x', degree: '2' })
    })

    it('carries the degree text unchecked', () => {
      expect(classifyAtom('poly(x, 0)', columns())).toMatchObject({ degree: '0' })
    })
  })

  it('rejects terms matching no form', () => {
    try {
      classifyAtom('x^2', columns('x'))
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedOperationError)
      expect(error).toMatchObject({ code: 'UNSUPPORTED_TERM', message: 'The current operation is not supported: "x^2"' })
    }
  })

  it('rejects unknown bare names', () => {
    expect(() => classifyAtom('missing', columns('x'))).toThrow(UnsupportedOperationError)
  })
})
