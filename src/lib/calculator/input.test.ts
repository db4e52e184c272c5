import { describe, it, expect } from 'vitest'
import { MAX_INPUT_LENGTH, appendDigit, appendOperator, backspace, currentSegment } from './input'
import type { KeypadDigit } from './types'

function type(...keys: KeypadDigit[]): string {
  return keys.reduce((input, key) => appendDigit(input, key), '')
}

describe('appendDigit', () => {
  it('appends digits', () => {
    expect(type('1', '2', '3')).toBe('123')
  })

  it('replaces a lone leading zero with the next digit', () => {
    expect(type('0', '5')).toBe('5')
    expect(type('0', '0')).toBe('0')
  })

  it('keeps the zero when a decimal point follows', () => {
    expect(type('0', '.', '5')).toBe('0.5')
  })

  it('appends a point to empty input', () => {
    expect(type('.')).toBe('.')
  })

  it('rejects a second point in the same segment', () => {
    expect(type('1', '.', '5', '.')).toBe('1.5')
  })

  it('allows a point in each operand', () => {
    expect(appendDigit('1.5+2', '.')).toBe('1.5+2.')
  })

  it('replaces a leading zero after an operator', () => {
    expect(appendDigit('3+0', '7')).toBe('3+7')
  })

  it('stops at the length cap', () => {
    const full = '1'.repeat(MAX_INPUT_LENGTH)
    expect(appendDigit(full, '2')).toBe(full)
    expect(appendDigit(full, '.')).toBe(full)
  })
})

describe('appendOperator', () => {
  it('does nothing on empty input', () => {
    expect(appendOperator('', '+')).toBe('')
  })

  it('appends an operator', () => {
    expect(appendOperator('12', '×')).toBe('12×')
  })

  it('replaces a trailing operator', () => {
    expect(appendOperator('12+', '÷')).toBe('12÷')
  })
})

describe('backspace', () => {
  it('removes the last character', () => {
    expect(backspace('12+')).toBe('12')
  })

  it('is a no-op on empty input', () => {
    expect(backspace('')).toBe('')
  })
})

describe('currentSegment', () => {
  it('returns the text after the last operator', () => {
    expect(currentSegment('1+2.5×34')).toBe('34')
    expect(currentSegment('42')).toBe('42')
    expect(currentSegment('42-')).toBe('')
  })
})
