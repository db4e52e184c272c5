export type Operator = '+' | '-' | '×' | '÷'

export type KeypadDigit = '0' | '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '.'

export const OPERATORS: readonly Operator[] = ['+', '-', '×', '÷']

export const KEYPAD_DIGITS: readonly KeypadDigit[] = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9', '.']

export function isOperator(value: string): value is Operator {
  return (OPERATORS as readonly string[]).includes(value)
}

export function isKeypadDigit(value: string): value is KeypadDigit {
  return (KEYPAD_DIGITS as readonly string[]).includes(value)
}
