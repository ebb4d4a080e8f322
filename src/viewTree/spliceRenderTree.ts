import type { IRSection, RenderNode, RenderTree, RootNode } from '../ir/irTypes'
import type { ViewNode, ViewSlot } from './viewNode'

function replaceIndex<T>(items: T[], index: number, update: (item: T) => T | null): T[] | null {
  if (index < 0 || index >= items.length) return null
  const current = items[index]
  if (current === undefined) return null
  const next = update(current)
  if (next === null) return null
  if (next === current) return items
  const out = items.slice()
  out[index] = next
  return out
}

function spliceSection(
  sections: IRSection[],
  slot: Extract<ViewSlot, { section: number }>,
  rest: ViewSlot[],
  replacement: RenderNode,
): IRSection[] | null {
  return replaceIndex(sections, slot.section, (section) => {
    switch (slot.kind) {
      case 'sectionHeader': {
        if (!section.header) return null
        const header = spliceNode(section.header, rest, replacement)
        return header ? { ...section, header } : null
      }
      case 'sectionFooter': {
        if (!section.footer) return null
        const footer = spliceNode(section.footer, rest, replacement)
        return footer ? { ...section, footer } : null
      }
      case 'sectionItem': {
        const children = replaceIndex(section.children, slot.index, (child) => spliceNode(child, rest, replacement))
        return children ? { ...section, children } : null
      }
    }
  })
}

// Replaces the node addressed by `slots` (relative to `node`), copying only the nodes on the way.
export function spliceNode(node: RenderNode, slots: ViewSlot[], replacement: RenderNode): RenderNode | null {
  const [slot, ...rest] = slots
  if (!slot) return replacement

  switch (slot.kind) {
    case 'self':
      return spliceNode(node, rest, replacement)
    case 'child': {
      if (node.type !== 'container') return null
      const children = replaceIndex(node.children, slot.index, (child) => spliceNode(child, rest, replacement))
      return children ? { ...node, children } : null
    }
    case 'sectionHeader':
    case 'sectionFooter':
    case 'sectionItem': {
      if (node.type !== 'sectionLayout') return null
      const sections = spliceSection(node.sections, slot, rest, replacement)
      return sections ? { ...node, sections } : null
    }
  }
}

export function spliceRoot(root: RootNode, slots: ViewSlot[], replacement: RenderNode): RootNode | null {
  const [slot, ...rest] = slots
  if (!slot || slot.kind !== 'child') return null
  const children = replaceIndex(root.children, slot.index, (child) => spliceNode(child, rest, replacement))
  return children ? { ...root, children } : null
}

export function slotsFromRoot(node: ViewNode): ViewSlot[] {
  return node
    .pathFromRoot()
    .slice(1)
    .map((n) => n.slot)
}

// Returns a new tree with `node`'s output replaced, or null when the slot chain no longer fits the tree.
export function spliceRenderTree(tree: RenderTree, node: ViewNode, replacement: RenderNode): RenderTree | null {
  const root = spliceRoot(tree.root, slotsFromRoot(node), replacement)
  return root ? { ...tree, root } : null
}
