/**
 * Narrowing helpers for values read from JSON (network bodies, localStorage)
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
