import { ContractViolationError } from '../errors.js'
import { Coverage } from './coverage.js'
import { isLeafMetric, metricDisplayName } from './metric.js'
import type { CoverageMetric } from './metric.js'

/**
 * Measured counter for a leaf metric, hung directly off a tree node.
 */
export class CoverageLeaf {
  readonly metric: CoverageMetric
  readonly coverage: Coverage

  constructor(metric: CoverageMetric, coverage: Coverage) {
    if (!isLeafMetric(metric)) {
      throw new ContractViolationError(`${metricDisplayName(metric)} is a structural metric and cannot be a leaf`)
    }
    this.metric = metric
    this.coverage = coverage
  }

  /**
   * Returns the counter if this leaf measures the given metric, the zero counter otherwise
   */
  getCoverage(searchMetric: CoverageMetric): Coverage {
    return this.metric === searchMetric ? this.coverage : Coverage.NO_COVERAGE
  }

  equals(other: CoverageLeaf): boolean {
    return this.metric === other.metric && this.coverage.equals(other.coverage)
  }

  toString(): string {
    return `[${metricDisplayName(this.metric)}]: ${this.coverage.toString()}`
  }
}
