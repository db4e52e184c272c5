/**
 * Keypad expression evaluation
 *
 * Expressions are operands joined by + - × ÷. × and ÷ bind tighter than
 * + and -, and each level reduces left to right (2+3×4 = 14).
 */

import { isOperator, type Operator } from './types'

interface ParsedExpression {
  first: number
  rest: Array<[Operator, number]>
}

const ALLOWED_CHARS = /^[\d.+\-×÷]+$/
const TRAILING_OPERATOR = /[+\-×÷]$/
const OPERAND = /^(\d+\.?\d*|\.\d+)$/

function toOperand(literal: string): number | null {
  if (!OPERAND.test(literal)) return null
  return Number(literal)
}

/**
 * Split an expression into operands and operators.
 * Returns null for anything that is not operand (operator operand)*.
 */
export function parseExpression(expression: string): ParsedExpression | null {
  const operands: number[] = []
  const operators: Operator[] = []
  let literal = ''

  for (const char of expression) {
    if (isOperator(char)) {
      const operand = toOperand(literal)
      if (operand === null) return null
      operands.push(operand)
      operators.push(char)
      literal = ''
    } else {
      literal += char
    }
  }

  const last = toOperand(literal)
  if (last === null) return null
  operands.push(last)

  const [first, ...others] = operands
  return {
    first,
    rest: operators.map((op, i): [Operator, number] => [op, others[i]]),
  }
}

function reduceExpression({ first, rest }: ParsedExpression): number {
  // × and ÷ first, collapsing into additive terms
  const terms: number[] = [first]
  const additive: Array<'+' | '-'> = []

  for (const [op, value] of rest) {
    const lastIndex = terms.length - 1
    if (op === '×') {
      terms[lastIndex] = terms[lastIndex] * value
    } else if (op === '÷') {
      terms[lastIndex] = terms[lastIndex] / value
    } else {
      additive.push(op)
      terms.push(value)
    }
  }

  return additive.reduce(
    (acc, op, i) => (op === '+' ? acc + terms[i + 1] : acc - terms[i + 1]),
    terms[0]
  )
}

/**
 * Evaluate keypad input to an amount. Never throws and never returns a
 * negative number; anything unparseable evaluates to 0.
 *
 * @example
 * evaluateInput('12.5+')  // => 12.5 (dangling operator ignored)
 * evaluateInput('2+3×4')  // => 14
 * evaluateInput('5-8')    // => 0
 */
export function evaluateInput(input: string): number {
  if (!input) return 0

  const cleaned = input.replace(TRAILING_OPERATOR, '')
  if (!cleaned || !ALLOWED_CHARS.test(cleaned)) return 0

  const parsed = parseExpression(cleaned)
  if (!parsed) return 0

  const result = reduceExpression(parsed)
  if (!Number.isFinite(result)) return 0

  return Math.max(0, result)
}
