/**
 * Keypad input editing
 *
 * The input string holds digits, at most one decimal point per operand
 * segment, and single operators between segments. Invalid keystrokes
 * return the input unchanged.
 */

import { isKeypadDigit, isOperator, type KeypadDigit, type Operator } from './types'

export const MAX_INPUT_LENGTH = 20

/** Text after the last operator */
export function currentSegment(input: string): string {
  for (let i = input.length - 1; i >= 0; i--) {
    if (isOperator(input[i])) return input.slice(i + 1)
  }
  return input
}

export function endsWithOperator(input: string): boolean {
  return input.length > 0 && isOperator(input[input.length - 1])
}

export function appendDigit(input: string, digit: KeypadDigit): string {
  if (!isKeypadDigit(digit)) return input

  const segment = currentSegment(input)

  if (digit === '.' && segment.includes('.')) return input

  // "0" then "5" reads as "5", never "05"
  if (digit !== '.' && segment === '0') {
    return input.slice(0, -1) + digit
  }

  if (input.length >= MAX_INPUT_LENGTH) return input

  return input + digit
}

export function appendOperator(input: string, op: Operator): string {
  if (!input || !isOperator(op)) return input
  if (endsWithOperator(input)) {
    return input.slice(0, -1) + op
  }
  return input + op
}

export function backspace(input: string): string {
  return input.slice(0, -1)
}
