/**
 * Ordering helpers for the image deck. Page order follows deck order, so
 * these are the only way callers rearrange pages before a build.
 */

function swap<T>(deck: readonly T[], a: number, b: number): T[] {
  const next = [...deck]
  const held = next[a]
  next[a] = next[b]
  next[b] = held
  return next
}

function inRange(deck: readonly unknown[], index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < deck.length
}

/**
 * Swap the entry at `index` with its predecessor. The first entry, or an
 * index outside the deck, leaves the order unchanged.
 */
export function swapWithPrevious<T>(deck: readonly T[], index: number): T[] {
  if (!inRange(deck, index) || index === 0) {
    return [...deck]
  }
  return swap(deck, index, index - 1)
}

/**
 * Swap the entry at `index` with its successor. The last entry, or an
 * index outside the deck, leaves the order unchanged.
 */
export function swapWithNext<T>(deck: readonly T[], index: number): T[] {
  if (!inRange(deck, index) || index === deck.length - 1) {
    return [...deck]
  }
  return swap(deck, index, index + 1)
}
