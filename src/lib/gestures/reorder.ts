export type DropPosition = 'before' | 'after' | 'on'

/**
 * Translate a list drop ("move X before/after Y") into from/to indices for
 * a splice-based move. Returns null when the drop changes nothing.
 *
 * @example
 * // [a, b, c, d]: drop a after c -> a lands at index 2
 * resolveReorder(['a', 'b', 'c', 'd'], 'a', 'c', 'after') // => { fromIndex: 0, toIndex: 2 }
 */
export function resolveReorder(
  ids: readonly string[],
  movedId: string,
  targetId: string,
  position: DropPosition
): { fromIndex: number; toIndex: number } | null {
  const fromIndex = ids.indexOf(movedId)
  const targetIndex = ids.indexOf(targetId)
  if (fromIndex === -1 || targetIndex === -1 || position === 'on') return null

  let toIndex = position === 'before' ? targetIndex : targetIndex + 1
  // Removing the moved row first shifts everything after it up by one
  if (fromIndex < toIndex) toIndex -= 1

  return toIndex === fromIndex ? null : { fromIndex, toIndex }
}
