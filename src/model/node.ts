/**
 * Coverage Tree Node
 *
 * A hierarchical decomposition of coverage results. Structural nodes
 * (module, package, file, class, method) own child nodes and leaf counters;
 * every query aggregates bottom-up over the subtree.
 */

import { getActiveConfig } from '../config.js'
import {
  COMBINED_REPORT_NAME,
  DEFAULT_PACKAGE_NAME,
  PACKAGE_SEPARATOR,
  PATH_SEPARATOR,
  ROOT_NAME,
} from '../constants.js'
import { CombineFailedError, ContractViolationError, FractionOverflowError } from '../errors.js'
import { createTimer, log } from '../logger.js'
import type { CombineError, CombineErrorKind, CombineResult, LeafMergeResult } from '../types.js'
import { Coverage } from './coverage.js'
import { treesEqual } from './equality.js'
import { Fraction } from './fraction.js'
import { hashName } from './hash.js'
import { CoverageLeaf } from './leaf.js'
import { isLeafMetric, metricDisplayName, sortMetrics } from './metric.js'
import type { CoverageMetric } from './metric.js'
import { findFirst, postOrder, preOrder } from './traversal.js'

const COVERED_NODE = new Coverage(1, 0)
const MISSED_NODE = new Coverage(0, 1)

interface Aggregate {
  coverage: Coverage
  lines: Coverage
}

const NO_AGGREGATE: Aggregate = { coverage: Coverage.NO_COVERAGE, lines: Coverage.NO_COVERAGE }

function isBlank(value: string): boolean {
  return value.trim().length === 0
}

function nodeLabel(metric: CoverageMetric, name: string): string {
  return `${metricDisplayName(metric)} '${name}'`
}

function combineFailure(
  kind: CombineErrorKind,
  node: CoverageNode,
  message: string,
  leafMetric?: CoverageMetric
): { success: false; error: CombineError } {
  const error: CombineError = { kind, message, metric: node.getMetric(), name: node.getName() }
  if (leafMetric !== undefined) {
    error.leafMetric = leafMetric
  }
  return { success: false, error }
}

/**
 * minuend - subtrahend, approximated from floating-point values when the
 * exact result does not fit. The approximation is lossy: its denominator is
 * capped by the maxFallbackDenominator option.
 */
function safeSubtract(minuend: Fraction, subtrahend: Fraction): Fraction {
  try {
    return minuend.subtract(subtrahend)
  } catch (error) {
    if (!(error instanceof FractionOverflowError)) {
      throw error
    }
    const difference = minuend.toNumber() - subtrahend.toNumber()
    log(`Exact delta ${minuend.toString()} - ${subtrahend.toString()} overflowed, using approximation of ${difference}`)
    return Fraction.fromNumber(difference, getActiveConfig().maxFallbackDenominator)
  }
}

export class CoverageNode {
  private readonly metric: CoverageMetric
  private readonly name: string
  private readonly children: CoverageNode[] = []
  private leaves: CoverageLeaf[] = []
  private parent: CoverageNode | undefined

  constructor(metric: CoverageMetric, name: string) {
    this.metric = metric
    this.name = name
  }

  getMetric(): CoverageMetric {
    return this.metric
  }

  getName(): string {
    return this.name
  }

  getChildren(): readonly CoverageNode[] {
    return this.children
  }

  getLeaves(): readonly CoverageLeaf[] {
    return this.leaves
  }

  /**
   * The parent node, or undefined for the root of the tree
   */
  getParent(): CoverageNode | undefined {
    return this.parent
  }

  isRoot(): boolean {
    return this.parent === undefined
  }

  hasParent(): boolean {
    return !this.isRoot()
  }

  /**
   * Appends a child node. The child must be the root of its own tree and must
   * not be an ancestor of this node.
   */
  addChild(child: CoverageNode): void {
    if (child.parent !== undefined) {
      throw new ContractViolationError(
        `${child.toString()} already belongs to ${child.parent.toString()} and cannot be added to ${this.toString()}`)
    }
    for (let node: CoverageNode | undefined = this; node !== undefined; node = node.parent) {
      if (node === child) {
        throw new ContractViolationError(`Adding ${child.toString()} to ${this.toString()} would create a cycle`)
      }
    }
    this.attach(child)
  }

  /**
   * Appends a leaf counter to this node.
   */
  addLeaf(leaf: CoverageLeaf): void
  addLeaf(metric: CoverageMetric, coverage: Coverage): void
  addLeaf(leafOrMetric: CoverageLeaf | CoverageMetric, coverage?: Coverage): void {
    if (leafOrMetric instanceof CoverageLeaf) {
      this.leaves.push(leafOrMetric)
      return
    }
    if (coverage === undefined) {
      throw new ContractViolationError(`Missing counter for ${metricDisplayName(leafOrMetric)} leaf`)
    }
    this.leaves.push(new CoverageLeaf(leafOrMetric, coverage))
  }

  private attach(child: CoverageNode): void {
    this.children.push(child)
    child.parent = this
  }

  /**
   * Source path of this node: the parent's path joined with this node's name.
   * The root has an empty path and the default package resets the path.
   */
  getPath(): string {
    const chain: CoverageNode[] = []
    let current: CoverageNode = this
    while (current.parent !== undefined) {
      chain.push(current)
      current = current.parent
    }
    let path = ''
    for (let i = chain.length - 1; i >= 0; i--) {
      const localPath = chain[i].name
      if (localPath === DEFAULT_PACKAGE_NAME) {
        path = ''
      } else if (isBlank(path)) {
        path = localPath
      } else if (!isBlank(localPath)) {
        path = `${path}${PATH_SEPARATOR}${localPath}`
      }
    }
    return path
  }

  /**
   * Name of the parent, including all directly enclosing ancestors of the same
   * metric joined by '.', e.g. 'com.example' for a class in nested packages.
   * Returns ROOT_NAME for the root.
   */
  getParentName(): string {
    if (this.parent === undefined) {
      return ROOT_NAME
    }
    const type = this.parent.metric
    const parentsOfSameType: string[] = []
    for (let node: CoverageNode | undefined = this.parent; node !== undefined && node.metric === type; node = node.parent) {
      parentsOfSameType.unshift(node.name)
    }
    return parentsOfSameType.join('.')
  }

  /**
   * Distinct metrics of this subtree (node metrics and leaf metrics) in catalog order
   */
  getMetrics(): CoverageMetric[] {
    const metrics = new Set<CoverageMetric>()
    for (const node of preOrder<CoverageNode>(this)) {
      metrics.add(node.metric)
      node.leaves.forEach(leaf => metrics.add(leaf.metric))
    }
    return sortMetrics(metrics)
  }

  /**
   * Coverage of every metric of this subtree
   */
  getMetricsDistribution(): Map<CoverageMetric, Coverage> {
    return new Map(this.getMetrics().map((metric): [CoverageMetric, Coverage] => [metric, this.getCoverage(metric)]))
  }

  /**
   * Covered percentage of every metric of this subtree
   */
  getMetricsPercentages(): Map<CoverageMetric, Fraction> {
    return new Map(this.getMetrics().map((metric): [CoverageMetric, Fraction] => [
      metric,
      this.getCoverage(metric).coveredPercentage,
    ]))
  }

  /**
   * Covered percentage of the given metric, formatted for the locale
   * (default: the locale of the active configuration)
   */
  printCoverageFor(searchMetric: CoverageMetric, locale?: string): string {
    return this.getCoverage(searchMetric).formatCoveredPercentage(locale)
  }

  /**
   * Aggregated coverage of the given metric over this subtree.
   *
   * Leaf metrics sum all matching leaf counters. A structural metric counts
   * each node of that metric once: covered if the node has at least one
   * covered line, missed otherwise.
   */
  getCoverage(searchMetric: CoverageMetric): Coverage {
    const leafSearch = isLeafMetric(searchMetric)
    const aggregates = new Map<CoverageNode, Aggregate>()
    for (const node of postOrder<CoverageNode>(this)) {
      let coverage = Coverage.NO_COVERAGE
      let lines = Coverage.NO_COVERAGE
      for (const child of node.children) {
        const aggregate = aggregates.get(child) ?? NO_AGGREGATE
        coverage = coverage.add(aggregate.coverage)
        if (!leafSearch) {
          lines = lines.add(aggregate.lines)
        }
      }

      if (leafSearch) {
        coverage = node.sumLeaves(searchMetric, coverage)
      } else {
        // structural nodes count as covered once their subtree has a covered line
        lines = node.sumLeaves('line', lines)
        if (node.metric === searchMetric) {
          coverage = coverage.add(lines.covered > 0 ? COVERED_NODE : MISSED_NODE)
        }
      }
      aggregates.set(node, { coverage, lines })
    }
    return (aggregates.get(this) ?? NO_AGGREGATE).coverage
  }

  private sumLeaves(searchMetric: CoverageMetric, start: Coverage): Coverage {
    return this.leaves.reduce((sum, leaf) => sum.add(leaf.getCoverage(searchMetric)), start)
  }

  /**
   * Percentage-point difference of every metric of this tree against the
   * reference tree. Metrics missing in the reference count as 0.
   */
  computeDelta(reference: CoverageNode): Map<CoverageMetric, Fraction> {
    const referencePercentages = reference.getMetricsPercentages()
    const delta = new Map<CoverageMetric, Fraction>()
    this.getMetricsPercentages().forEach((value, metric) => {
      delta.set(metric, safeSubtract(value, referencePercentages.get(metric) ?? Fraction.ZERO))
    })
    return delta
  }

  /**
   * All nodes of this subtree with the given metric, children before parents.
   *
   * @throws ContractViolationError if the metric is a leaf metric
   */
  getAll(searchMetric: CoverageMetric): CoverageNode[] {
    if (isLeafMetric(searchMetric)) {
      throw new ContractViolationError(
        `Leaves like '${metricDisplayName(searchMetric)}' are not stored as inner nodes of the tree`)
    }
    return postOrder<CoverageNode>(this).filter(node => node.metric === searchMetric)
  }

  /**
   * First node (depth-first, this node before its children) with the given metric and name
   */
  find(searchMetric: CoverageMetric, searchName: string): CoverageNode | undefined {
    return findFirst<CoverageNode>(this, node => node.matches(searchMetric, searchName))
  }

  /**
   * First node with the given metric whose name or path hashes to the given value
   */
  findByHashCode(searchMetric: CoverageMetric, searchNameHashCode: number): CoverageNode | undefined {
    return findFirst<CoverageNode>(this, node => node.matchesHash(searchMetric, searchNameHashCode))
  }

  matches(searchMetric: CoverageMetric, searchName: string): boolean {
    return this.metric === searchMetric && this.name === searchName
  }

  matchesHash(searchMetric: CoverageMetric, searchNameHashCode: number): boolean {
    if (this.metric !== searchMetric) {
      return false
    }
    return hashName(this.name) === searchNameHashCode || hashName(this.getPath()) === searchNameHashCode
  }

  /**
   * Splits flat package names of a module ('a.b.c') into nested package nodes.
   * Changes the tree in place; other nodes are left untouched.
   */
  splitPackages(): void {
    if (this.metric !== 'module') {
      return
    }
    const current = [...this.children]
    if (!current.some(child => child.metric === 'package')) {
      return
    }

    this.children.length = 0
    let splitCount = 0
    for (const child of current) {
      const segments = child.metric === 'package'
        ? child.name.split(PACKAGE_SEPARATOR).filter(segment => segment.length > 0)
        : []
      if (segments.length > 1) {
        this.insertPackage(child, segments)
        splitCount++
      } else {
        this.attach(child)
      }
    }
    log(`Split ${splitCount} of ${current.length} children of ${this.toString()} into package hierarchies`)
  }

  private insertPackage(flatPackage: CoverageNode, segments: string[]): void {
    let level: CoverageNode = this
    for (const segment of segments) {
      level = level.packageChild(segment)
    }
    for (const child of flatPackage.children) {
      level.attach(child)
    }
    level.leaves.push(...flatPackage.leaves)
    flatPackage.children.length = 0
    flatPackage.leaves = []
    flatPackage.parent = undefined
  }

  private packageChild(childName: string): CoverageNode {
    const existing = this.children.find(child => child.metric === 'package' && child.name === childName)
    if (existing !== undefined) {
      return existing
    }
    const created = new CoverageNode('package', childName)
    this.attach(created)
    return created
  }

  /**
   * Deep copy of the subtree rooted at this node. The copy is a detached root.
   */
  copyTree(): CoverageNode {
    const root = new CoverageNode(this.metric, this.name)
    const pending: Array<[CoverageNode, CoverageNode]> = [[this, root]]
    while (pending.length > 0) {
      const pair = pending.pop()
      if (pair === undefined) break
      const [source, target] = pair
      for (const leaf of source.leaves) {
        target.leaves.push(new CoverageLeaf(leaf.metric, leaf.coverage))
      }
      for (const child of source.children) {
        const copy = new CoverageNode(child.metric, child.name)
        target.attach(copy)
        pending.push([child, copy])
      }
    }
    return root
  }

  /**
   * Combines two module reports into a new tree; neither input is changed.
   *
   * Modules with the same name are merged node by node. Modules with
   * different names become the two children of a new group node.
   */
  combineWith(other: CoverageNode): CombineResult {
    if (other.metric !== 'module') {
      return combineFailure('invalid-argument', other, `Provided node ${other.toString()} is not a module`)
    }
    if (this.metric !== 'module') {
      return combineFailure('invalid-state', this, `Cannot combine from non-module node ${this.toString()}`)
    }

    const stopTimer = createTimer(`combine ${this.name} with ${other.name}`)
    let combined: CoverageNode
    if (this.name === other.name) {
      log(`Merging reports of module '${this.name}'`)
      combined = this.copyTree()
      const merged = combined.safelyCombineChildren(other)
      if (!merged.success) {
        stopTimer()
        log(`Combine failed: ${merged.error.message}`)
        return merged
      }
    } else {
      log(`Grouping modules '${this.name}' and '${other.name}' into '${COMBINED_REPORT_NAME}'`)
      combined = new CoverageNode('group', COMBINED_REPORT_NAME)
      combined.attach(this.copyTree())
      combined.attach(other.copyTree())
    }
    stopTimer()
    return { success: true, node: combined }
  }

  /**
   * Like combineWith(), but throws a CombineFailedError instead of returning a failure
   */
  combineWithOrThrow(other: CoverageNode): CoverageNode {
    const result = this.combineWith(other)
    if (!result.success) {
      throw new CombineFailedError(result.error)
    }
    return result.node
  }

  /**
   * Merges the children of other into this (freshly copied) subtree.
   * Children are matched by name; unmatched children are copied over.
   */
  private safelyCombineChildren(other: CoverageNode): LeafMergeResult {
    const pending: Array<[CoverageNode, CoverageNode]> = [[this, other]]
    while (pending.length > 0) {
      const pair = pending.pop()
      if (pair === undefined) break
      const [mine, theirs] = pair

      if (mine.leaves.length > 0) {
        if (theirs.children.length === 0) {
          const merged = mine.mergeLeaves(mine.getMetricsDistribution(), theirs.getMetricsDistribution())
          if (!merged.success) {
            return merged
          }
          continue
        }
        // the structure of the other report wins over terminal data at this level
        mine.leaves = []
      }

      const matched: Array<[CoverageNode, CoverageNode]> = []
      for (const otherChild of theirs.children) {
        const existing = mine.children.find(child => child.name === otherChild.name)
        if (existing !== undefined) {
          matched.push([existing, otherChild])
        } else {
          mine.attach(otherChild.copyTree())
        }
      }
      for (let i = matched.length - 1; i >= 0; i--) {
        pending.push(matched[i])
      }
    }
    return { success: true }
  }

  /**
   * Replaces the leaves of this node with the better of both sides for every
   * leaf metric. Both sides must expose the same metrics with the same totals.
   * Nothing is changed when the check fails.
   */
  private mergeLeaves(
    metricsDistribution: Map<CoverageMetric, Coverage>,
    metricsDistributionOther: Map<CoverageMetric, Coverage>
  ): LeafMergeResult {
    const where = nodeLabel(this.metric, this.name)
    if (metricsDistribution.size !== metricsDistributionOther.size) {
      return combineFailure('leaf-mismatch', this, `Reports to combine have a mismatch of leaves in ${where}`)
    }

    const best = new Map<CoverageMetric, Coverage>()
    for (const [metric, mine] of metricsDistribution) {
      const theirs = metricsDistributionOther.get(metric)
      if (theirs === undefined) {
        return combineFailure('leaf-mismatch', this, `Reports to combine have a mismatch of leaves in ${where}`)
      }
      if (mine.total !== theirs.total) {
        return combineFailure('total-mismatch', this,
          `Reports to combine have a mismatch of total ${metricDisplayName(metric)} coverage in ${where}`, metric)
      }
      if (isLeafMetric(metric)) {
        best.set(metric, theirs.covered > mine.covered ? theirs : mine)
      }
    }

    // own leaf order first, then metrics only found below this node in catalog order
    const order = sortMetrics(best.keys())
    const ownMetrics = [...new Set(this.leaves.map(leaf => leaf.metric))]
    const merged: CoverageLeaf[] = []
    for (const metric of [...ownMetrics, ...order.filter(metric => !ownMetrics.includes(metric))]) {
      const coverage = best.get(metric)
      if (coverage !== undefined) {
        merged.push(new CoverageLeaf(metric, coverage))
      }
    }
    this.leaves = merged
    return { success: true }
  }

  /**
   * Structural equality with another tree, see treesEqual()
   */
  isEquivalentTo(other: CoverageNode): boolean {
    return treesEqual(this, other)
  }

  toString(): string {
    return `[${metricDisplayName(this.metric)}] ${this.name}`
  }
}
