import { describe, expect, it } from 'vitest'

import { swapWithNext, swapWithPrevious } from '../../../src/lib/document/deck'

describe('deck ordering', () => {
  const deck = ['front.jpg', 'middle.jpg', 'back.jpg'] as const

  it('should move an entry up', () => {
    expect(swapWithPrevious(deck, 1)).toEqual(['middle.jpg', 'front.jpg', 'back.jpg'])
  })

  it('should move an entry down', () => {
    expect(swapWithNext(deck, 1)).toEqual(['front.jpg', 'back.jpg', 'middle.jpg'])
  })

  it('should leave the first entry in place when moving it up', () => {
    expect(swapWithPrevious(deck, 0)).toEqual([...deck])
  })

  it('should leave the last entry in place when moving it down', () => {
    expect(swapWithNext(deck, 2)).toEqual([...deck])
  })

  it('should ignore indexes outside the deck', () => {
    expect(swapWithPrevious(deck, 7)).toEqual([...deck])
    expect(swapWithNext(deck, -1)).toEqual([...deck])
    expect(swapWithNext(deck, 0.5)).toEqual([...deck])
  })

  it('should not modify the original deck', () => {
    const original = ['a', 'b']
    const moved = swapWithNext(original, 0)

    expect(moved).toEqual(['b', 'a'])
    expect(original).toEqual(['a', 'b'])
    expect(moved).not.toBe(original)
  })
})
