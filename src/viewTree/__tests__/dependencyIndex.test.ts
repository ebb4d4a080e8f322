import { describe, expect, it } from 'vitest'
import { EMPTY_SCOPE } from '../../state/scopedReader'
import { StateStore } from '../../state/stateStore'
import { DependencyIndex, minimalUpdateSet } from '../dependencyIndex'
import { DependencyTracker } from '../dependencyTracker'
import { ViewNode, type ViewNodeKind } from '../viewNode'
import { isWithinNode } from '../viewTreeUpdater'

function node(id: string, kind: ViewNodeKind = 'component'): ViewNode {
  return new ViewNode({ id, documentId: null, kind, source: null, scope: EMPTY_SCOPE, slot: { kind: 'self' } })
}

describe('DependencyTracker', () => {
  it('attributes reads to the innermost open node only', () => {
    const store = new StateStore({ a: 1, b: 2 })
    const tracker = new DependencyTracker()
    const outer = node('outer', 'layout')
    const inner = node('inner')
    const detach = store.attachRecorder(tracker)

    tracker.track(outer, () => {
      store.get('a')
      tracker.track(inner, () => store.get('b'))
    })
    detach()

    expect([...outer.readPaths]).toEqual(['a'])
    expect([...inner.readPaths]).toEqual(['b'])
    expect(tracker.depth).toBe(0)
  })

  it('records writes made while a node is open', () => {
    const store = new StateStore()
    const tracker = new DependencyTracker()
    const n = node('n')
    const detach = store.attachRecorder(tracker)
    tracker.track(n, () => store.set('flag', true))
    detach()
    expect([...n.writePaths]).toEqual(['flag'])
  })

  it('closes the bracket when the body throws', () => {
    const tracker = new DependencyTracker()
    expect(() =>
      tracker.track(node('n'), () => {
        throw new Error('boom')
      }),
    ).toThrow('boom')
    expect(tracker.current).toBeNull()
  })

  it('rejects unbalanced brackets', () => {
    const tracker = new DependencyTracker()
    tracker.begin(node('a'))
    expect(() => tracker.end(node('b'))).toThrow("Unbalanced dependency tracking: expected 'b', found 'a'")
  })
})

describe('DependencyIndex', () => {
  function tree() {
    const root = node('root', 'root')
    const list = node('list', 'forEach')
    const title = node('title')
    const email = node('email')
    root.addChild(list)
    root.addChild(title)
    list.addChild(email)
    list.recordRead('items')
    title.recordRead('user.name')
    email.recordRead('user')
    return { root, list, title, email }
  }

  it('matches exact, parent and child paths', () => {
    const { root, list, title, email } = tree()
    const index = DependencyIndex.build(root)

    expect(index.nodesAffectedBy(['items'])).toEqual(new Set([list]))
    expect(index.nodesAffectedBy(['user.name'])).toEqual(new Set([title, email]))
    expect(index.nodesAffectedBy(['user'])).toEqual(new Set([email, title]))
    expect(index.nodesAffectedBy(['user.age'])).toEqual(new Set([email]))
    expect(index.nodesAffectedBy(['other']).size).toBe(0)
  })

  it('forgets removed subtrees', () => {
    const { root, list } = tree()
    const index = DependencyIndex.build(root)
    index.removeTree(list)
    expect(index.trackedPaths.sort()).toEqual(['user.name'])
  })

  it('skips disposed nodes', () => {
    const { root, title } = tree()
    const index = DependencyIndex.build(root)
    title.dispose()
    expect(index.nodesAffectedBy(['user.name'])).toEqual(new Set([root.findNode('email')]))
  })

  it('keeps only the topmost pending nodes', () => {
    const { list, title, email } = tree()
    expect(minimalUpdateSet(new Set([email, list, title]))).toEqual([list, title])
  })
})

describe('ViewNode', () => {
  it('walks, finds and replaces children', () => {
    const root = node('root', 'root')
    const a = node('a')
    const b = node('b')
    root.addChild(a)
    a.slot = { kind: 'child', index: 0 }

    expect([...root.walk()].map((n) => n.id)).toEqual(['root', 'a'])
    expect(a.pathFromRoot().map((n) => n.id)).toEqual(['root', 'a'])
    expect(a.isDescendantOf(root)).toBe(true)

    expect(root.replaceChild(a, b)).toBe(true)
    expect(a.disposed).toBe(true)
    expect(b.parent).toBe(root)
    expect(b.slot).toEqual({ kind: 'child', index: 0 })
    expect(root.findNode('b')).toBe(b)
    expect(root.replaceChild(a, b)).toBe(false)
  })
})

describe('isWithinNode', () => {
  it('matches the node and its descendants only', () => {
    expect(isWithinNode('root.children.1', 'root.children.1')).toBe(true)
    expect(isWithinNode('root.children.1.children.0', 'root.children.1')).toBe(true)
    expect(isWithinNode('root.children.1.template[2]', 'root.children.1.template')).toBe(true)
    expect(isWithinNode('root.children.10', 'root.children.1')).toBe(false)
  })
})
