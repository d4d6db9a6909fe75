import { describe, it, expect, afterEach, vi } from 'vitest'
import { Coverage } from '../coverage.js'
import { Fraction } from '../fraction.js'
import { CoverageNode } from '../node.js'
import { configureCoverageTree } from '../../config.js'

function moduleWithLines(covered: number, missed: number): CoverageNode {
  const created = new CoverageNode('module', 'app')
  created.addLeaf('line', new Coverage(covered, missed))
  return created
}

describe('computeDelta with large counters', () => {
  afterEach(() => {
    configureCoverageTree()
    vi.restoreAllMocks()
  })

  it('should stay exact while the common denominator fits', () => {
    const delta = moduleWithLines(1, 99_999_999).computeDelta(moduleWithLines(1, 199_999_999))

    expect(delta.get('line')?.toString()).toBe('1/200000000')
  })

  it('should approximate the delta when the exact result overflows', () => {
    const delta = moduleWithLines(50_000_004, 50_000_003).computeDelta(moduleWithLines(1, 100_000_036))

    expect(delta.get('line')?.equals(Fraction.of(1, 2))).toBe(true)
    expect(delta.get('module')).toBe(Fraction.ZERO)
  })

  it('should respect the configured largest denominator', () => {
    configureCoverageTree({ maxFallbackDenominator: 1 })

    const delta = moduleWithLines(50_000_004, 50_000_003).computeDelta(moduleWithLines(1, 100_000_036))

    expect(delta.get('line')?.toString()).toBe('0/1')
  })

  it('should log the approximation', () => {
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    configureCoverageTree({ log: true })

    const delta = moduleWithLines(1, 100_000_006).computeDelta(moduleWithLines(1, 100_000_036))

    expect(delta.get('line')).toBe(Fraction.ZERO)
    expect(consoleLogSpy).toHaveBeenCalledTimes(1)
    expect(String(consoleLogSpy.mock.calls[0][0]))
      .toContain('Exact delta 1/100000007 - 1/100000037 overflowed, using approximation of ')
  })
})
