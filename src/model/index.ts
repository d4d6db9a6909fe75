/**
 * Coverage Model
 *
 * Metric catalog, counters and the coverage tree
 */

export {
  type CoverageMetric,
  type MetricInfo,
  ALL_METRICS,
  metricInfo,
  isLeafMetric,
  isStructuralMetric,
  metricDisplayName,
  compareMetrics,
  sortMetrics,
  parseMetric,
} from './metric.js'
export { Fraction } from './fraction.js'
export { Coverage, formatPercentage } from './coverage.js'
export { CoverageLeaf } from './leaf.js'
export { CoverageNode } from './node.js'
export { treesEqual } from './equality.js'
export { hashName } from './hash.js'
export { type TreeLike, preOrder, postOrder, findFirst } from './traversal.js'
