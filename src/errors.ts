import type { CombineError } from './types.js'

export class CoverageTreeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CoverageTreeError'
  }
}

/**
 * A caller broke the contract of a tree operation. Not meant to be caught.
 */
export class ContractViolationError extends CoverageTreeError {
  constructor(message: string) {
    super(message)
    this.name = 'ContractViolationError'
  }
}

/**
 * Exact rational arithmetic left the safe integer range.
 */
export class FractionOverflowError extends CoverageTreeError {
  constructor(message: string) {
    super(message)
    this.name = 'FractionOverflowError'
  }
}

/**
 * Thrown by combineWithOrThrow() when two reports cannot be combined.
 */
export class CombineFailedError extends CoverageTreeError {
  readonly detail: CombineError

  constructor(detail: CombineError) {
    super(detail.message)
    this.name = 'CombineFailedError'
    this.detail = detail
  }
}
