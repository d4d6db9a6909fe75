import type { CoverageNode } from './node.js'

/**
 * Structural equality of two trees: metric, name, children and leaves,
 * compared recursively and in order. Parent links are ignored.
 *
 * Cost is proportional to the size of the smaller tree.
 */
export function treesEqual(a: CoverageNode, b: CoverageNode): boolean {
  const pending: Array<[CoverageNode, CoverageNode]> = [[a, b]]
  while (pending.length > 0) {
    const pair = pending.pop()
    if (pair === undefined) break
    const [left, right] = pair
    if (left === right) {
      continue
    }
    if (left.getMetric() !== right.getMetric() || left.getName() !== right.getName()) {
      return false
    }

    const leftLeaves = left.getLeaves()
    const rightLeaves = right.getLeaves()
    if (leftLeaves.length !== rightLeaves.length
      || leftLeaves.some((leaf, index) => !leaf.equals(rightLeaves[index]))) {
      return false
    }

    const leftChildren = left.getChildren()
    const rightChildren = right.getChildren()
    if (leftChildren.length !== rightChildren.length) {
      return false
    }
    leftChildren.forEach((child, index) => {
      pending.push([child, rightChildren[index]])
    })
  }
  return true
}
