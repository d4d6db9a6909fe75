/**
 * Tree Traversal
 *
 * Depth-first walks over any tree with ordered children. Both use an
 * explicit stack, so very deep coverage trees cannot exhaust the call stack.
 */

export interface TreeLike<T> {
  getChildren(): readonly T[]
}

/**
 * Nodes in pre-order: a node before its children, children in insertion order.
 */
export function preOrder<T extends TreeLike<T>>(root: T): T[] {
  const result: T[] = []
  const stack: T[] = [root]
  while (stack.length > 0) {
    const node = stack.pop()
    if (node === undefined) break
    result.push(node)
    const children = node.getChildren()
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i])
    }
  }
  return result
}

/**
 * Nodes in post-order: all children (in insertion order) before their parent.
 */
export function postOrder<T extends TreeLike<T>>(root: T): T[] {
  const result: T[] = []
  const stack: Array<{ node: T; expanded: boolean }> = [{ node: root, expanded: false }]
  while (stack.length > 0) {
    const frame = stack.pop()
    if (frame === undefined) break
    if (frame.expanded) {
      result.push(frame.node)
      continue
    }
    stack.push({ node: frame.node, expanded: true })
    const children = frame.node.getChildren()
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ node: children[i], expanded: false })
    }
  }
  return result
}

/**
 * First node in pre-order that satisfies the predicate
 */
export function findFirst<T extends TreeLike<T>>(root: T, predicate: (node: T) => boolean): T | undefined {
  const stack: T[] = [root]
  while (stack.length > 0) {
    const node = stack.pop()
    if (node === undefined) break
    if (predicate(node)) {
      return node
    }
    const children = node.getChildren()
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i])
    }
  }
  return undefined
}
