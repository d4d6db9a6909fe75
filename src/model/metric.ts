/**
 * Metric Catalog
 *
 * The closed, ordered set of coverage kinds. Structural metrics are
 * represented by tree nodes and measured by aggregating descendants; leaf
 * metrics are attached to nodes as counters.
 */

export type CoverageMetric =
  | 'module'
  | 'group'
  | 'package'
  | 'file'
  | 'class'
  | 'method'
  | 'line'
  | 'branch'
  | 'instruction'

export interface MetricInfo {
  displayName: string
  leaf: boolean
  rank: number
}

const METRIC_CATALOG: Readonly<Record<CoverageMetric, MetricInfo>> = {
  module: { displayName: 'Module', leaf: false, rank: 0 },
  group: { displayName: 'Group', leaf: false, rank: 1 },
  package: { displayName: 'Package', leaf: false, rank: 2 },
  file: { displayName: 'File', leaf: false, rank: 3 },
  class: { displayName: 'Class', leaf: false, rank: 4 },
  method: { displayName: 'Method', leaf: false, rank: 5 },
  line: { displayName: 'Line', leaf: true, rank: 6 },
  branch: { displayName: 'Branch', leaf: true, rank: 7 },
  instruction: { displayName: 'Instruction', leaf: true, rank: 8 },
}

/**
 * All metrics in catalog order
 */
export const ALL_METRICS: readonly CoverageMetric[] = [
  'module',
  'group',
  'package',
  'file',
  'class',
  'method',
  'line',
  'branch',
  'instruction',
]

export function metricInfo(metric: CoverageMetric): MetricInfo {
  return METRIC_CATALOG[metric]
}

export function isLeafMetric(metric: CoverageMetric): boolean {
  return METRIC_CATALOG[metric].leaf
}

export function isStructuralMetric(metric: CoverageMetric): boolean {
  return !METRIC_CATALOG[metric].leaf
}

export function metricDisplayName(metric: CoverageMetric): string {
  return METRIC_CATALOG[metric].displayName
}

/**
 * Comparator following the catalog order (module first, instruction last)
 */
export function compareMetrics(a: CoverageMetric, b: CoverageMetric): number {
  return METRIC_CATALOG[a].rank - METRIC_CATALOG[b].rank
}

/**
 * Returns the distinct metrics of the input in catalog order
 */
export function sortMetrics(metrics: Iterable<CoverageMetric>): CoverageMetric[] {
  return [...new Set(metrics)].sort(compareMetrics)
}

/**
 * Look up a metric by id or display name, ignoring case.
 */
export function parseMetric(value: string): CoverageMetric | undefined {
  const wanted = value.trim().toLowerCase()
  return ALL_METRICS.find(metric => metric === wanted)
}
