/**
 * Exact rational numbers for coverage percentages.
 *
 * Numerator and denominator are kept as safe integers. Fractions are always
 * reduced and the denominator is always positive. Arithmetic that would
 * leave the safe integer range throws a FractionOverflowError instead of
 * silently losing precision.
 */

import { ContractViolationError, FractionOverflowError } from '../errors.js'

const MAX_CONTINUED_FRACTION_TERMS = 64
const APPROXIMATION_EPSILON = 1e-12

function gcd(a: number, b: number): number {
  let x = Math.abs(a)
  let y = Math.abs(b)
  while (y !== 0) {
    const t = x % y
    x = y
    y = t
  }
  return x
}

function checked(value: number, operation: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new FractionOverflowError(`Overflow during fraction ${operation}`)
  }
  return value
}

export class Fraction {
  static readonly ZERO = new Fraction(0, 1)
  static readonly ONE = new Fraction(1, 1)

  readonly numerator: number
  readonly denominator: number

  private constructor(numerator: number, denominator: number) {
    this.numerator = numerator
    this.denominator = denominator
  }

  /**
   * Create a reduced fraction
   */
  static of(numerator: number, denominator: number = 1): Fraction {
    if (!Number.isSafeInteger(numerator) || !Number.isSafeInteger(denominator)) {
      throw new ContractViolationError(`Fraction parts must be safe integers: ${numerator}/${denominator}`)
    }
    if (denominator === 0) {
      throw new ContractViolationError('Fraction denominator must not be zero')
    }
    if (numerator === 0) {
      return Fraction.ZERO
    }
    const divisor = gcd(numerator, denominator)
    const sign = denominator < 0 ? -1 : 1
    return new Fraction((sign * numerator) / divisor, (sign * denominator) / divisor)
  }

  /**
   * Approximate a floating-point value by a fraction using continued fractions.
   * The result is the closest convergent whose denominator does not exceed maxDenominator.
   */
  static fromNumber(value: number, maxDenominator: number = 1_000_000): Fraction {
    if (!Number.isFinite(value)) {
      throw new ContractViolationError(`Cannot convert ${value} to a fraction`)
    }
    const sign = value < 0 ? -1 : 1
    const target = Math.abs(value)

    let previousNumerator = 0
    let numerator = 1
    let previousDenominator = 1
    let denominator = 0
    let remainder = target

    for (let i = 0; i < MAX_CONTINUED_FRACTION_TERMS; i++) {
      const term = Math.floor(remainder)
      const nextNumerator = term * numerator + previousNumerator
      const nextDenominator = term * denominator + previousDenominator
      if (nextDenominator > maxDenominator || !Number.isSafeInteger(nextNumerator)) {
        break
      }
      previousNumerator = numerator
      numerator = nextNumerator
      previousDenominator = denominator
      denominator = nextDenominator

      const fractionalPart = remainder - term
      if (fractionalPart < APPROXIMATION_EPSILON
        || Math.abs(target - numerator / denominator) < APPROXIMATION_EPSILON) {
        break
      }
      remainder = 1 / fractionalPart
    }

    if (denominator === 0) {
      // even the integer part exceeds the precision budget
      return Fraction.of(sign * Math.round(target))
    }
    return Fraction.of(sign * numerator, denominator)
  }

  add(other: Fraction): Fraction {
    return this.combine(other, 1, 'addition')
  }

  subtract(other: Fraction): Fraction {
    return this.combine(other, -1, 'subtraction')
  }

  negate(): Fraction {
    return this.numerator === 0 ? this : new Fraction(-this.numerator, this.denominator)
  }

  compareTo(other: Fraction): number {
    return this.subtractForComparison(other)
  }

  equals(other: Fraction): boolean {
    return this.numerator === other.numerator && this.denominator === other.denominator
  }

  toNumber(): number {
    return this.numerator / this.denominator
  }

  toString(): string {
    return `${this.numerator}/${this.denominator}`
  }

  private subtractForComparison(other: Fraction): number {
    try {
      return Math.sign(this.subtract(other).numerator)
    } catch (error) {
      if (error instanceof FractionOverflowError) {
        return Math.sign(this.toNumber() - other.toNumber())
      }
      throw error
    }
  }

  /**
   * a/b ± c/d computed over the reduced common denominator:
   * with g = gcd(b, d), the result is (a*(d/g) ± c*(b/g)) / (b/g * d).
   */
  private combine(other: Fraction, sign: 1 | -1, operation: string): Fraction {
    if (other.numerator === 0) {
      return this
    }
    if (this.numerator === 0) {
      return sign === 1 ? other : other.negate()
    }
    const g = gcd(this.denominator, other.denominator)
    const left = checked(this.numerator * (other.denominator / g), operation)
    const right = checked(other.numerator * (this.denominator / g), operation)
    const numerator = checked(left + sign * right, operation)
    const denominator = checked((this.denominator / g) * other.denominator, operation)
    return Fraction.of(numerator, denominator)
  }
}
