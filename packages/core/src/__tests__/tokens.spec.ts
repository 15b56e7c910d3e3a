import { describe, it, expect } from 'vitest'
import { estimateTokens, truncateToTokens } from '../tokens'

describe('estimateTokens', () => {
  it('is ceil(length / 4)', () => {
    expect(estimateTokens('')).toBe(0)
    expect(estimateTokens('abcd')).toBe(1)
    expect(estimateTokens('abcde')).toBe(2)
    expect(estimateTokens('x'.repeat(4000))).toBe(1000)
  })

  it('is monotonic in length', () => {
    let prev = 0
    for (let n = 0; n < 50; n++) {
      const t = estimateTokens('y'.repeat(n))
      expect(t).toBeGreaterThanOrEqual(prev)
      prev = t
    }
  })
})

describe('truncateToTokens', () => {
  it('keeps text that already fits', () => {
    expect(truncateToTokens('short', 10, '...')).toBe('short')
  })

  it('cuts to the budget including the marker', () => {
    const out = truncateToTokens('a'.repeat(100), 10, '...')
    expect(out).toBe('a'.repeat(37) + '...')
    expect(estimateTokens(out)).toBe(10)
  })
})
