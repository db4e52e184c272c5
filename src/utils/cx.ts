import { clsx, type ClassValue } from 'clsx'

/**
 * Join conditional class names
 */
export function cx(...inputs: ClassValue[]): string {
  return clsx(inputs)
}
