/**
 * Coverage Counter
 *
 * Immutable (covered, missed) pair for one metric at one point of the tree.
 */

import { ContractViolationError } from '../errors.js'
import { NOT_AVAILABLE } from '../constants.js'
import { getActiveConfig } from '../config.js'
import { log, warn } from '../logger.js'
import { Fraction } from './fraction.js'

function assertCount(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ContractViolationError(`Coverage ${label} must be a non-negative integer, got ${value}`)
  }
}

const SATURATED = Number.MAX_SAFE_INTEGER

function saturate(value: number): number {
  return value > SATURATED ? SATURATED : value
}

function ratio(part: number, total: number): Fraction {
  if (total === 0) {
    return Fraction.ZERO
  }
  if (!Number.isSafeInteger(total)) {
    // saturated counters: the exact total is no longer representable
    return Fraction.fromNumber(part / total, getActiveConfig().maxFallbackDenominator)
  }
  return Fraction.of(part, total)
}

export class Coverage {
  /** The zero counter, identity of add() */
  static readonly NO_COVERAGE = new Coverage(0, 0)

  readonly covered: number
  readonly missed: number
  /** Set once an add() had to clamp a component; sums over such counters no longer warn */
  private saturated = false

  constructor(covered: number, missed: number) {
    assertCount(covered, 'covered')
    assertCount(missed, 'missed')
    this.covered = covered
    this.missed = missed
  }

  static fromTotal(covered: number, total: number): Coverage {
    if (total < covered) {
      throw new ContractViolationError(`Coverage total ${total} is smaller than covered ${covered}`)
    }
    return new Coverage(covered, total - covered)
  }

  get total(): number {
    return this.covered + this.missed
  }

  /**
   * Whether this counter has seen any occurrence at all
   */
  isSet(): boolean {
    return this.total > 0
  }

  add(other: Coverage): Coverage {
    const covered = this.covered + other.covered
    const missed = this.missed + other.missed
    const overflow = covered > SATURATED || missed > SATURATED
    const sum = new Coverage(saturate(covered), saturate(missed))
    sum.saturated = overflow || this.saturated || other.saturated
    if (overflow) {
      const message = `Coverage ${this.toString()} + ${other.toString()} saturated at ${SATURATED}`
      if (this.saturated || other.saturated) {
        log(message)
      } else {
        warn(message)
      }
    }
    return sum
  }

  /**
   * covered / total as an exact fraction. A counter without occurrences is 0.
   */
  get coveredPercentage(): Fraction {
    return ratio(this.covered, this.total)
  }

  /**
   * missed / total as an exact fraction. A counter without occurrences is 0.
   */
  get missedPercentage(): Fraction {
    return ratio(this.missed, this.total)
  }

  formatCoveredPercentage(locale?: string): string {
    return this.isSet() ? formatPercentage(this.coveredPercentage, locale) : NOT_AVAILABLE
  }

  formatMissedPercentage(locale?: string): string {
    return this.isSet() ? formatPercentage(this.missedPercentage, locale) : NOT_AVAILABLE
  }

  equals(other: Coverage): boolean {
    return this.covered === other.covered && this.missed === other.missed
  }

  toString(): string {
    return `${this.covered}/${this.total}`
  }
}

/**
 * Render a ratio as a percentage, e.g. 4/5 as "80.00%" in en-US or "80,00%" in de-DE.
 */
export function formatPercentage(ratio: Fraction, locale?: string): string {
  const config = getActiveConfig()
  const formatter = new Intl.NumberFormat(locale ?? config.locale, {
    minimumFractionDigits: config.fractionDigits,
    maximumFractionDigits: config.fractionDigits,
    useGrouping: false,
  })
  return `${formatter.format(ratio.toNumber() * 100)}%`
}
