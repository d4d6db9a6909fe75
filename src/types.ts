/**
 * Shared result types for covtree operations
 */

import type { CoverageMetric } from './model/metric.js'
import type { CoverageNode } from './model/node.js'

/**
 * Why two reports could not be combined.
 *
 * - invalid-argument: the node passed in is not a module
 * - invalid-state: the node combineWith() was called on is not a module
 * - leaf-mismatch: two terminal nodes expose different metric sets
 * - total-mismatch: two terminal nodes measured a different total for the same metric
 */
export type CombineErrorKind = 'invalid-argument' | 'invalid-state' | 'leaf-mismatch' | 'total-mismatch'

export interface CombineError {
  kind: CombineErrorKind
  message: string
  /** Metric of the offending node */
  metric: CoverageMetric
  /** Name of the offending node */
  name: string
  /** Metric whose totals disagree (total-mismatch only) */
  leafMetric?: CoverageMetric
}

export type CombineResult =
  | { success: true; node: CoverageNode }
  | { success: false; error: CombineError }

/**
 * Outcome of reconciling the leaves of two terminal nodes.
 */
export type LeafMergeResult =
  | { success: true }
  | { success: false; error: CombineError }
