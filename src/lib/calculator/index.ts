export type { KeypadDigit, Operator } from './types'
export { KEYPAD_DIGITS, OPERATORS, isKeypadDigit, isOperator } from './types'
export { evaluateInput, parseExpression } from './evaluate'
export {
  MAX_INPUT_LENGTH,
  appendDigit,
  appendOperator,
  backspace,
  currentSegment,
  endsWithOperator,
} from './input'
