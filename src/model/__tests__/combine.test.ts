import { describe, it, expect, afterEach, vi } from 'vitest'
import { Coverage } from '../coverage.js'
import { treesEqual } from '../equality.js'
import { CoverageNode } from '../node.js'
import { CombineFailedError } from '../../errors.js'
import { setLogging } from '../../logger.js'
import type { CombineResult } from '../../types.js'
import { createSampleTree, method, node } from './fixtures.js'

function moduleWithLines(name: string, covered: number, missed: number): CoverageNode {
  const created = new CoverageNode('module', name)
  created.addLeaf('line', new Coverage(covered, missed))
  return created
}

function combined(result: CombineResult): CoverageNode {
  if (!result.success) {
    throw new Error(`Expected combine to succeed: ${result.error.message}`)
  }
  return result.node
}

describe('combineWith', () => {
  afterEach(() => {
    setLogging(false)
  })

  describe('preconditions', () => {
    it('should reject an argument that is not a module', () => {
      const result = createSampleTree().combineWith(node('package', 'p'))

      expect(result).toEqual({
        success: false,
        error: {
          kind: 'invalid-argument',
          message: 'Provided node [Package] p is not a module',
          metric: 'package',
          name: 'p',
        },
      })
    })

    it('should reject a receiver that is not a module', () => {
      const result = node('class', 'Main').combineWith(createSampleTree())

      expect(result).toEqual({
        success: false,
        error: {
          kind: 'invalid-state',
          message: 'Cannot combine from non-module node [Class] Main',
          metric: 'class',
          name: 'Main',
        },
      })
    })

    it('should report the argument first when both are not modules', () => {
      const result = node('class', 'A').combineWith(node('class', 'B'))

      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.kind).toBe('invalid-argument')
      }
    })
  })

  describe('modules with the same name', () => {
    it('should keep the counter with more covered items', () => {
      const result = combined(moduleWithLines('app', 5, 5).combineWith(moduleWithLines('app', 7, 3)))

      expect(result.getName()).toBe('app')
      expect(result.getLeaves()).toHaveLength(1)
      expect(result.getLeaves()[0].metric).toBe('line')
      expect(result.getLeaves()[0].coverage.equals(new Coverage(7, 3))).toBe(true)
    })

    it('should keep the receiver counter when it covers more', () => {
      const result = combined(moduleWithLines('app', 9, 1).combineWith(moduleWithLines('app', 7, 3)))

      expect(result.getLeaves()[0].coverage.equals(new Coverage(9, 1))).toBe(true)
    })

    it('should return an equal tree when combined with a copy of itself', () => {
      const tree = createSampleTree()

      const result = combined(tree.combineWith(tree.copyTree()))

      expect(treesEqual(result, tree)).toBe(true)
      expect(result).not.toBe(tree)
    })

    it('should keep the order of own leaves', () => {
      const run = new CoverageNode('method', 'run()')
      run.addLeaf('branch', new Coverage(1, 1))
      run.addLeaf('line', new Coverage(3, 1))
      const app = node('module', 'app', run)

      const result = combined(app.combineWith(app.copyTree()))

      expect(result.find('method', 'run()')?.getLeaves().map(leaf => leaf.toString()))
        .toEqual(['[Branch]: 1/2', '[Line]: 3/4'])
      expect(treesEqual(result, app)).toBe(true)
    })

    it('should merge method counters node by node', () => {
      const result = combined(createSampleTree(0).combineWith(createSampleTree(3)))

      expect(result.find('method', 'help()')?.getCoverage('line').equals(new Coverage(3, 1))).toBe(true)
      expect(result.getCoverage('line').toString()).toBe('13/18')
      expect(result.getCoverage('class').toString()).toBe('3/3')
    })

    it('should copy children that only the other report has', () => {
      const mine = createSampleTree()
      const other = node('module', 'app',
        node('package', 'com.example',
          node('file', 'Extra.ts', node('class', 'Extra', method('extra()', [1, 1])))))

      const result = combined(mine.combineWith(other))

      expect(result.find('package', 'com.example')?.getChildren().map(n => n.getName()))
        .toEqual(['Main.ts', 'Extra.ts'])
      expect(result.find('class', 'Extra')?.getParent()?.getName()).toBe('Extra.ts')
      expect(other.find('file', 'Extra.ts')?.getParent()?.getName()).toBe('com.example')
    })

    it('should not change the inputs', () => {
      const mine = createSampleTree(0)
      const other = createSampleTree(4)
      other.find('package', 'com.example')?.addChild(node('file', 'Extra.ts'))
      const mineBefore = mine.copyTree()
      const otherBefore = other.copyTree()

      mine.combineWith(other)

      expect(treesEqual(mine, mineBefore)).toBe(true)
      expect(treesEqual(other, otherBefore)).toBe(true)
    })

    it('should drop own leaves when the other report has children at that level', () => {
      const mine = moduleWithLines('app', 1, 1)
      const other = node('module', 'app', node('package', 'p'))

      const result = combined(mine.combineWith(other))

      expect(result.getLeaves()).toHaveLength(0)
      expect(result.getChildren().map(n => n.getName())).toEqual(['p'])
      expect(mine.getLeaves()).toHaveLength(1)
    })
  })

  describe('inconsistent reports', () => {
    it('should fail when the totals differ', () => {
      const result = moduleWithLines('app', 5, 5).combineWith(moduleWithLines('app', 7, 4))

      expect(result).toEqual({
        success: false,
        error: {
          kind: 'total-mismatch',
          message: "Reports to combine have a mismatch of total Line coverage in Module 'app'",
          metric: 'module',
          name: 'app',
          leafMetric: 'line',
        },
      })
    })

    it('should fail when the metrics differ', () => {
      const other = moduleWithLines('app', 5, 5)
      other.addLeaf('branch', new Coverage(1, 1))

      const result = moduleWithLines('app', 5, 5).combineWith(other)

      expect(result).toEqual({
        success: false,
        error: {
          kind: 'leaf-mismatch',
          message: "Reports to combine have a mismatch of leaves in Module 'app'",
          metric: 'module',
          name: 'app',
        },
      })
    })

    it('should identify the offending node deep in the tree', () => {
      const other = createSampleTree()
      other.find('method', 'run()')?.addLeaf('line', new Coverage(0, 1))

      const result = createSampleTree().combineWith(other)

      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error.kind).toBe('total-mismatch')
        expect(result.error.metric).toBe('method')
        expect(result.error.name).toBe('run()')
      }
    })

    it('should leave both inputs untouched on failure', () => {
      const mine = createSampleTree()
      const other = createSampleTree()
      other.find('method', 'util()')?.addLeaf('branch', new Coverage(1, 0))
      const mineBefore = mine.copyTree()
      const otherBefore = other.copyTree()

      const result = mine.combineWith(other)

      expect(result.success).toBe(false)
      expect(treesEqual(mine, mineBefore)).toBe(true)
      expect(treesEqual(other, otherBefore)).toBe(true)
    })
  })

  describe('modules with different names', () => {
    it('should group both modules below a combined report node', () => {
      const app = createSampleTree()
      const other = moduleWithLines('other', 1, 1)

      const result = combined(app.combineWith(other))

      expect(result.getMetric()).toBe('group')
      expect(result.getName()).toBe('Combined Report')
      expect(result.getChildren().map(n => n.getName())).toEqual(['app', 'other'])
      expect(treesEqual(result.getChildren()[0], app)).toBe(true)
      expect(treesEqual(result.getChildren()[1], other)).toBe(true)
      expect(result.getChildren()[0]).not.toBe(app)
      expect(app.isRoot()).toBe(true)
      expect(other.isRoot()).toBe(true)
    })

    it('should aggregate both modules', () => {
      const result = combined(createSampleTree().combineWith(moduleWithLines('other', 1, 1)))

      expect(result.getCoverage('module').toString()).toBe('2/2')
      expect(result.getCoverage('line').toString()).toBe('11/20')
    })
  })

  describe('combineWithOrThrow', () => {
    it('should return the combined tree', () => {
      const result = moduleWithLines('app', 5, 5).combineWithOrThrow(moduleWithLines('app', 7, 3))

      expect(result.getCoverage('line').toString()).toBe('7/10')
    })

    it('should throw with the failure detail', () => {
      expect(() => moduleWithLines('app', 5, 5).combineWithOrThrow(moduleWithLines('app', 1, 1)))
        .toThrow(CombineFailedError)

      try {
        moduleWithLines('app', 5, 5).combineWithOrThrow(node('file', 'x'))
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(CombineFailedError)
        if (error instanceof CombineFailedError) {
          expect(error.detail.kind).toBe('invalid-argument')
          expect(error.message).toBe('Provided node [File] x is not a module')
        }
      }
    })
  })

  it('should log the combine when logging is enabled', () => {
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    setLogging(true)

    createSampleTree().combineWith(moduleWithLines('other', 1, 1))

    expect(consoleLogSpy).toHaveBeenCalledWith("Grouping modules 'app' and 'other' into 'Combined Report'")
    consoleLogSpy.mockRestore()
  })
})
