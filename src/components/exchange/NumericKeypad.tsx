import type { ReactNode } from 'react'
import { BackspaceIcon } from '@heroicons/react/24/outline'
import { useExchangeStore } from '@/contexts/ExchangeStoreContext'
import type { KeypadDigit, Operator } from '@/lib/calculator'
import { cx } from '@/utils/cx'

type KeyVariant = 'number' | 'function' | 'clear' | 'swap'

interface KeyConfig {
  label: ReactNode
  ariaLabel?: string
  action: () => void
  variant: KeyVariant
  wide?: boolean
}

const VARIANT_CLASSES: Record<KeyVariant, string> = {
  number: 'text-xl font-semibold text-text active:bg-slate-200',
  function: 'text-lg font-semibold text-slate-600 active:bg-slate-200',
  clear: 'text-sm font-semibold text-danger active:bg-red-50',
  swap: 'text-sm font-semibold text-primary active:bg-blue-50',
}

function KeyButton({ config }: { config: KeyConfig }) {
  return (
    <button
      type="button"
      aria-label={config.ariaLabel}
      className={cx(
        'flex select-none items-center justify-center rounded-xl bg-surface transition-transform touch-manipulation active:scale-95',
        config.wide ? 'col-span-2 h-12' : 'h-14',
        VARIANT_CLASSES[config.variant]
      )}
      onPointerDown={(e) => {
        e.preventDefault() // keep focus where it is
        config.action()
      }}
    >
      {config.label}
    </button>
  )
}

const DIGIT_ROWS: Array<[KeypadDigit, KeypadDigit, KeypadDigit, Operator, string]> = [
  ['7', '8', '9', '+', 'Plus'],
  ['4', '5', '6', '-', 'Minus'],
  ['1', '2', '3', '×', 'Multiply'],
]

export function NumericKeypad() {
  const appendDigit = useExchangeStore((state) => state.appendDigit)
  const appendOperator = useExchangeStore((state) => state.appendOperator)
  const clearInput = useExchangeStore((state) => state.clearInput)
  const backspace = useExchangeStore((state) => state.backspace)
  const swapWithBase = useExchangeStore((state) => state.swapWithBase)

  const digitKey = (digit: KeypadDigit): KeyConfig => ({
    label: digit,
    action: () => appendDigit(digit),
    variant: 'number',
  })

  const operatorKey = (op: Operator, name: string): KeyConfig => ({
    label: op === '-' ? '−' : op,
    ariaLabel: name,
    action: () => appendOperator(op),
    variant: 'function',
  })

  const keys: KeyConfig[] = [
    { label: 'C', ariaLabel: 'Clear', action: clearInput, variant: 'clear', wide: true },
    { label: '⇄', ariaLabel: 'Move base to top', action: swapWithBase, variant: 'swap', wide: true },
    ...DIGIT_ROWS.flatMap(([a, b, c, op, name]) => [digitKey(a), digitKey(b), digitKey(c), operatorKey(op, name)]),
    { ...digitKey('.'), ariaLabel: 'Decimal point' },
    digitKey('0'),
    { label: <BackspaceIcon className="h-6 w-6" />, ariaLabel: 'Backspace', action: backspace, variant: 'function' },
    operatorKey('÷', 'Divide'),
  ]

  return (
    <div className="shrink-0 bg-surface-muted p-2 shadow-[0_-2px_12px_rgba(0,0,0,0.08)]">
      <div className="grid grid-cols-4 gap-1.5">
        {keys.map((key, i) => (
          <KeyButton key={i} config={key} />
        ))}
      </div>
    </div>
  )
}
