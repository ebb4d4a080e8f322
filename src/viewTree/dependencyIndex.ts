import { parentPaths } from '../state/keyPath'
import type { ViewNode } from './viewNode'

// path → nodes that read it, rebuilt from a ViewNode tree.
export class DependencyIndex {
  private readonly byPath = new Map<string, Set<ViewNode>>()

  static build(root: ViewNode): DependencyIndex {
    const index = new DependencyIndex()
    index.addTree(root)
    return index
  }

  addTree(root: ViewNode): void {
    for (const node of root.walk()) {
      for (const path of node.readPaths) {
        let set = this.byPath.get(path)
        if (!set) {
          set = new Set()
          this.byPath.set(path, set)
        }
        set.add(node)
      }
    }
  }

  removeTree(root: ViewNode): void {
    const doomed = new Set(root.walk())
    for (const [path, set] of this.byPath) {
      for (const node of set) {
        if (doomed.has(node)) set.delete(node)
      }
      if (set.size === 0) this.byPath.delete(path)
    }
  }

  get trackedPaths(): string[] {
    return [...this.byPath.keys()]
  }

  // A write to `a.b` affects readers of `a.b`, of its parents (`a`) and of anything below it (`a.b.c`).
  nodesAffectedBy(paths: Iterable<string>): Set<ViewNode> {
    const out = new Set<ViewNode>()
    const add = (path: string) => {
      for (const node of this.byPath.get(path) ?? []) {
        if (!node.disposed) out.add(node)
      }
    }

    for (const path of paths) {
      add(path)
      for (const parent of parentPaths(path)) add(parent)
      for (const tracked of this.byPath.keys()) {
        if (tracked.startsWith(`${path}.`)) add(tracked)
      }
    }
    return out
  }
}

// Drops nodes whose ancestor is also pending; re-resolving the ancestor rebuilds them anyway.
export function minimalUpdateSet(nodes: Set<ViewNode>): ViewNode[] {
  return [...nodes].filter((node) => {
    for (let cur = node.parent; cur; cur = cur.parent) {
      if (nodes.has(cur)) return false
    }
    return true
  })
}
