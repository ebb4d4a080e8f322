import { describe, expect, it } from 'vitest'
import { parseDocument } from '../../document/validateDocument'
import type { RenderNode, RenderTree } from '../../ir/irTypes'
import { StateStore } from '../../state/stateStore'
import { ViewTreeUpdater } from '../../viewTree/viewTreeUpdater'
import { Resolver, resolveDocument } from '../resolver'

function texts(tree: RenderTree): string[] {
  const out: string[] = []
  const visit = (n: RenderNode) => {
    if (n.type === 'text') out.push(n.content)
    if (n.type === 'container') n.children.forEach(visit)
    if (n.type === 'sectionLayout') {
      for (const s of n.sections) {
        if (s.header) visit(s.header)
        s.children.forEach(visit)
      }
    }
  }
  tree.root.children.forEach(visit)
  return out
}

function setup(raw: unknown) {
  const document = parseDocument(raw)
  const store = new StateStore(document.state ?? {})
  const logs: string[] = []
  const resolver = new Resolver(document, store, { log: (m) => logs.push(m) })
  return { document, store, logs, resolver }
}

const counterDocument = {
  id: 'counter',
  state: { count: 0, title: 'Counter' },
  actions: { increment: { type: 'setState', path: 'count', value: '${count} + 1' } },
  root: {
    children: [
      {
        type: 'vstack',
        spacing: 12,
        children: [
          { type: 'label', text: '${title}' },
          { type: 'label', text: 'Count: ${count}' },
          { type: 'button', text: 'Add', actions: { onTap: 'increment' } },
        ],
      },
    ],
  },
}

describe('Resolver', () => {
  it('resolves a document into a render tree', () => {
    const { resolver } = setup(counterDocument)
    const { tree, errors, actionErrors } = resolver.resolve()

    expect(errors).toEqual([])
    expect(actionErrors).toEqual([])
    expect(tree.irVersion).toBe('0.1.0')
    expect(tree.documentId).toBe('counter')
    expect(tree.root.backgroundColor).toEqual({ red: 1, green: 1, blue: 1, alpha: 1 })
    expect(tree.root.colorScheme).toBe('system')
    expect(texts(tree)).toEqual(['Counter', 'Count: 0'])
    expect(tree.actions).toEqual({
      increment: { kind: 'setState', path: 'count', value: { kind: 'expression', expression: '${count} + 1' } },
    })

    const stack = tree.root.children[0]
    expect(stack?.type).toBe('container')
    if (stack?.type !== 'container') return
    expect(stack.spacing).toBe(12)
    const button = stack.children[2]
    expect(button?.type === 'button' && button.onTap).toEqual({ kind: 'reference', actionId: 'increment' })
  })

  it('applies text defaults', () => {
    const { resolver } = setup({ id: 'd', root: { children: [{ type: 'text', text: 'Hi' }] } })
    const node = resolver.resolve().tree.root.children[0]
    expect(node?.type === 'text' && node.appearance).toEqual({
      font: { family: null, size: 17, weight: 'regular' },
      textColor: { red: 0, green: 0, blue: 0, alpha: 1 },
      textAlignment: 'leading',
    })
  })

  it('produces identical trees for identical state', () => {
    const { resolver } = setup(counterDocument)
    expect(resolver.resolve().tree).toEqual(resolver.resolve().tree)
  })

  it('drops a subtree whose component type is unregistered and keeps its siblings', () => {
    const { resolver, logs } = setup({
      id: 'd',
      root: { children: [{ type: 'label', text: 'before' }, { type: 'chart', series: [1, 2] }, { type: 'label', text: 'after' }] },
    })
    const { tree, errors } = resolver.resolve()

    expect(texts(tree)).toEqual(['before', 'after'])
    expect(errors.map((e) => [e.kind, e.path])).toEqual([['unregisteredKind', 'root.children.1']])
    expect(logs).toEqual(["[resolve] root.children.1: No resolver registered for component type 'chart'"])
  })

  it('reports a style cycle as a node error', () => {
    const { resolver } = setup({
      id: 'd',
      styles: { a: { inherits: 'b' }, b: { inherits: 'a' } },
      root: { children: [{ type: 'label', text: 'x', styleId: 'a' }, { type: 'label', text: 'ok' }] },
    })
    const { tree, errors } = resolver.resolve()
    expect(texts(tree)).toEqual(['ok'])
    expect(errors).toHaveLength(1)
    expect(errors[0]?.kind).toBe('styleCycle')
    expect(errors[0]?.message).toBe('root.children.0: Style inheritance cycle: a -> b -> a')
  })

  it('repeats a template per item with scoped loop variables', () => {
    const { resolver } = setup({
      id: 'd',
      state: { item: 'outer', fruits: ['apple', 'pear'] },
      root: { children: [{ type: 'forEach', items: '${fruits}', template: { type: 'label', text: '${index}: ${item}' } }] },
    })
    const { tree } = resolver.resolve()
    expect(texts(tree)).toEqual(['0: apple', '1: pear'])
    const list = tree.root.children[0]
    expect(list?.type === 'container' && list.layout).toBe('vstack')
  })

  it('renders the empty view in place of an empty repeater', () => {
    const { resolver } = setup({
      id: 'd',
      state: { fruits: [] },
      root: {
        children: [
          {
            type: 'forEach',
            items: 'fruits',
            template: { type: 'label', text: '${item}' },
            emptyView: { type: 'label', text: 'Nothing yet' },
          },
        ],
      },
    })
    const { tree } = resolver.resolve()
    expect(tree.root.children[0]?.type).toBe('text')
    expect(texts(tree)).toEqual(['Nothing yet'])
  })

  it('resolves section layouts with data-driven items', () => {
    const { resolver } = setup({
      id: 'd',
      state: { rows: ['a', 'b', 'c'] },
      root: {
        children: [
          {
            type: 'sectionLayout',
            sections: [
              {
                layout: { type: 'grid', columns: 3 },
                header: { type: 'label', text: 'Grid' },
                dataSource: 'rows',
                itemTemplate: { type: 'label', text: '${item}' },
              },
            ],
          },
        ],
      },
    })
    const { tree } = resolver.resolve()
    expect(texts(tree)).toEqual(['Grid', 'a', 'b', 'c'])
    const layout = tree.root.children[0]
    if (layout?.type !== 'sectionLayout') throw new Error('expected a section layout')
    expect(layout.sections[0]?.config.columns).toEqual({ kind: 'fixed', count: 3 })
    expect(layout.sections[0]?.config.showsDividers).toBe(false)
  })

  it('is also available as a one-shot function', () => {
    const document = parseDocument(counterDocument)
    expect(texts(resolveDocument(document, new StateStore({ title: 'T', count: 4 }), { log: () => {} }).tree)).toEqual(['T', 'Count: 4'])
  })
})

describe('incremental re-resolution', () => {
  it('re-resolves only the node that read the changed key', () => {
    const { resolver, store } = setup(counterDocument)
    const { tree, viewTree } = resolver.resolveWithTracking()
    if (!viewTree) throw new Error('expected a view tree')
    const updater = new ViewTreeUpdater(tree, viewTree, resolver)

    store.set('count', 1)
    const update = updater.update(store.consumeDirtyPaths())

    expect(update.kind).toBe('patched')
    if (update.kind !== 'patched') return
    expect(update.updated.map((n) => n.id)).toEqual(['root.children.0.children.1'])
    expect(texts(update.tree)).toEqual(['Counter', 'Count: 1'])
    expect(resolver.resolutionCount('root.children.0.children.1')).toBe(2)
    expect(resolver.resolutionCount('root.children.0.children.0')).toBe(1)
    expect(resolver.resolutionCount('root.children.0')).toBe(1)
    expect(resolver.resolutionCount('root')).toBe(1)
  })

  it('matches a full resolution after a patch', () => {
    const { resolver, store } = setup(counterDocument)
    const { tree, viewTree } = resolver.resolveWithTracking()
    if (!viewTree) throw new Error('expected a view tree')
    const updater = new ViewTreeUpdater(tree, viewTree, resolver)

    store.set('count', 7)
    store.set('title', 'Tally')
    updater.update(store.consumeDirtyPaths())
    expect(updater.currentTree).toEqual(resolver.resolve().tree)
  })

  it('leaves the tree alone when nothing read the written path', () => {
    const { resolver, store } = setup(counterDocument)
    const { tree, viewTree } = resolver.resolveWithTracking()
    if (!viewTree) throw new Error('expected a view tree')
    const updater = new ViewTreeUpdater(tree, viewTree, resolver)

    store.set('unrelated', true)
    expect(updater.update(store.consumeDirtyPaths())).toEqual({ kind: 'unchanged' })
    expect(updater.currentTree).toBe(tree)
  })

  it('swaps between the empty view and the items when the array changes', () => {
    const { resolver, store } = setup({
      id: 'd',
      state: { fruits: [] },
      root: {
        children: [
          { type: 'label', text: 'Fruits' },
          { type: 'forEach', items: 'fruits', template: { type: 'label', text: '${item}' }, emptyView: { type: 'label', text: 'None' } },
        ],
      },
    })
    const { tree, viewTree } = resolver.resolveWithTracking()
    if (!viewTree) throw new Error('expected a view tree')
    const updater = new ViewTreeUpdater(tree, viewTree, resolver)
    expect(texts(tree)).toEqual(['Fruits', 'None'])

    store.append('fruits', 'kiwi')
    store.append('fruits', 'fig')
    const update = updater.update(store.consumeDirtyPaths())
    expect(update.kind === 'patched' && update.updated.map((n) => n.id)).toEqual(['root.children.1'])
    expect(texts(updater.currentTree)).toEqual(['Fruits', 'kiwi', 'fig'])

    store.set('fruits', [])
    updater.update(store.consumeDirtyPaths())
    expect(texts(updater.currentTree)).toEqual(['Fruits', 'None'])
  })

  it('splices a re-resolved section item in place', () => {
    const { resolver, store } = setup({
      id: 'd',
      state: { selected: 'none' },
      root: {
        children: [
          {
            type: 'sectionLayout',
            sections: [
              { layout: { type: 'list' }, children: [{ type: 'label', text: 'Static' }, { type: 'label', text: 'Picked ${selected}' }] },
            ],
          },
        ],
      },
    })
    const { tree, viewTree } = resolver.resolveWithTracking()
    if (!viewTree) throw new Error('expected a view tree')
    const updater = new ViewTreeUpdater(tree, viewTree, resolver)

    store.set('selected', 'two')
    const update = updater.update(store.consumeDirtyPaths())
    expect(update.kind === 'patched' && update.updated.map((n) => n.id)).toEqual(['root.children.0.sections.0.children.1'])
    expect(texts(updater.currentTree)).toEqual(['Static', 'Picked two'])
    expect(resolver.resolutionCount('root.children.0')).toBe(1)
  })
})
