import { Coverage } from '../coverage.js'
import { CoverageNode } from '../node.js'
import type { CoverageMetric } from '../metric.js'

/** Create a node with the given children attached in order */
export function node(metric: CoverageMetric, name: string, ...children: CoverageNode[]): CoverageNode {
  const created = new CoverageNode(metric, name)
  children.forEach(child => created.addChild(child))
  return created
}

/** Create a method node carrying line (and optionally branch) counters */
export function method(name: string, lines: [number, number], branches?: [number, number]): CoverageNode {
  const created = new CoverageNode('method', name)
  created.addLeaf('line', new Coverage(lines[0], lines[1]))
  if (branches) {
    created.addLeaf('branch', new Coverage(branches[0], branches[1]))
  }
  return created
}

/**
 * app (module)
 * ├── com.example (package)
 * │   └── Main.ts (file)
 * │       ├── Main (class): main() line 5/6 branch 2/4, run() line 3/4 branch 1/2
 * │       └── Helper (class): help() line helpCovered/4
 * └── com.example.util (package)
 *     └── Util.ts (file)
 *         └── Util (class): util() line 2/4 instruction 10/20
 */
export function createSampleTree(helpCovered: number = 0): CoverageNode {
  const util = method('util()', [2, 2])
  util.addLeaf('instruction', new Coverage(10, 10))

  return node('module', 'app',
    node('package', 'com.example',
      node('file', 'Main.ts',
        node('class', 'Main',
          method('main()', [5, 1], [2, 2]),
          method('run()', [3, 1], [1, 1])),
        node('class', 'Helper',
          method('help()', [helpCovered, 4 - helpCovered])))),
    node('package', 'com.example.util',
      node('file', 'Util.ts',
        node('class', 'Util', util))))
}
