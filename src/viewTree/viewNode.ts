import type { LayoutNode } from '../document/documentTypes'
import type { ScopeBindings } from '../state/scopedReader'

// Where a node's render output sits inside its parent's output.
export type ViewSlot =
  | { kind: 'self' }
  | { kind: 'child'; index: number }
  | { kind: 'sectionHeader'; section: number }
  | { kind: 'sectionFooter'; section: number }
  | { kind: 'sectionItem'; section: number; index: number }

export type ViewNodeKind = LayoutNode['kind'] | 'root'

export type ViewNodeInit = {
  id: string
  documentId: string | null
  kind: ViewNodeKind
  source: LayoutNode | null
  scope: ScopeBindings
  slot: ViewSlot
}

// Tracking shadow of one resolved layout node. Children are owned; `parent` is a back
// reference that is cleared on dispose.
export class ViewNode {
  readonly id: string
  readonly documentId: string | null
  readonly kind: ViewNodeKind
  readonly source: LayoutNode | null
  readonly scope: ScopeBindings
  slot: ViewSlot
  parent: ViewNode | null = null
  children: ViewNode[] = []
  readPaths = new Set<string>()
  writePaths = new Set<string>()
  resolutionCount = 0
  disposed = false

  constructor(init: ViewNodeInit) {
    this.id = init.id
    this.documentId = init.documentId
    this.kind = init.kind
    this.source = init.source
    this.scope = init.scope
    this.slot = init.slot
  }

  addChild(child: ViewNode): void {
    child.parent = this
    this.children.push(child)
  }

  recordRead(path: string): void {
    this.readPaths.add(path)
  }

  recordWrite(path: string): void {
    this.writePaths.add(path)
  }

  // Depth-first, self included.
  *walk(): Generator<ViewNode> {
    yield this
    for (const child of this.children) yield* child.walk()
  }

  findNode(id: string): ViewNode | null {
    for (const node of this.walk()) {
      if (node.id === id) return node
    }
    return null
  }

  findByDocumentId(documentId: string): ViewNode[] {
    return [...this.walk()].filter((n) => n.documentId === documentId)
  }

  // Root first, self last.
  pathFromRoot(): ViewNode[] {
    const out: ViewNode[] = []
    for (let cur: ViewNode | null = this; cur; cur = cur.parent) out.unshift(cur)
    return out
  }

  isDescendantOf(ancestor: ViewNode): boolean {
    for (let cur = this.parent; cur; cur = cur.parent) {
      if (cur === ancestor) return true
    }
    return false
  }

  // Swaps `previous` for `next` in place; `previous` is disposed.
  replaceChild(previous: ViewNode, next: ViewNode): boolean {
    const at = this.children.indexOf(previous)
    if (at < 0) return false
    next.parent = this
    next.slot = previous.slot
    this.children[at] = next
    previous.dispose()
    return true
  }

  dispose(): void {
    if (this.disposed) return
    for (const child of this.children) child.dispose()
    this.children = []
    this.parent = null
    this.readPaths.clear()
    this.writePaths.clear()
    this.disposed = true
  }
}
