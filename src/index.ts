/**
 * covtree - Hierarchical Coverage Trees
 *
 * Public API. Report parsers build a tree with CoverageNode.addChild() and
 * CoverageNode.addLeaf(); renderers and trend trackers query it.
 *
 *   const module = new CoverageNode('module', 'app')
 *   const pkg = new CoverageNode('package', 'com.example')
 *   module.addChild(pkg)
 *   pkg.addLeaf('line', new Coverage(8, 2))
 *   module.printCoverageFor('line') // '80.00%'
 */

// ============================================================================
// Coverage Model
// ============================================================================
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
  Fraction,
  Coverage,
  formatPercentage,
  CoverageLeaf,
  CoverageNode,
  treesEqual,
  hashName,
  type TreeLike,
  preOrder,
  postOrder,
  findFirst,
} from './model/index.js'

// ============================================================================
// Results and Errors
// ============================================================================
export type {
  CombineError,
  CombineErrorKind,
  CombineResult,
  LeafMergeResult,
} from './types.js'
export {
  CoverageTreeError,
  ContractViolationError,
  FractionOverflowError,
  CombineFailedError,
} from './errors.js'

// ============================================================================
// Constants
// ============================================================================
export {
  ROOT_NAME,
  DEFAULT_PACKAGE_NAME,
  COMBINED_REPORT_NAME,
  PACKAGE_SEPARATOR,
  PATH_SEPARATOR,
  NOT_AVAILABLE,
} from './constants.js'

// ============================================================================
// Configuration and Logging
// ============================================================================
export {
  type CoverageTreeConfig,
  type ResolvedCoverageTreeConfig,
  CONFIG_FILE_NAME,
  FALLBACK_LOCALE,
  resolveLocale,
  DEFAULT_COVERAGE_TREE_CONFIG,
  resolveCoverageTreeConfig,
  configureCoverageTree,
  getActiveConfig,
  loadCoverageTreeConfig,
  clearConfigCache,
} from './config.js'
export {
  setLogging,
  setTiming,
  isLoggingEnabled,
  isTimingEnabled,
} from './logger.js'
