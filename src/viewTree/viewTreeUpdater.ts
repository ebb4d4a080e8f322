import type { RenderTree } from '../ir/irTypes'
import type { Log } from '../log'
import type { ReresolveResult } from '../resolution/resolver'
import type { ResolutionError } from '../resolution/resolutionErrors'
import { DependencyIndex, minimalUpdateSet } from './dependencyIndex'
import { spliceRenderTree } from './spliceRenderTree'
import type { ViewNode } from './viewNode'

export type NodeReresolver = {
  reresolve: (node: ViewNode) => ReresolveResult
}

export type ViewTreeUpdate =
  | { kind: 'unchanged' }
  // `reresolved` lists every node path attempted, including those that kept their old output.
  | { kind: 'patched'; tree: RenderTree; updated: ViewNode[]; reresolved: string[]; errors: ResolutionError[] }
  // The root read state, or a splice no longer fit; the caller resolves from scratch.
  | { kind: 'fullResolveRequired'; reason: string }

// True when `path` names the node `nodeId` or something inside it.
export function isWithinNode(path: string, nodeId: string): boolean {
  if (!path.startsWith(nodeId)) return false
  const next = path.charAt(nodeId.length)
  return next === '' || next === '.' || next === '['
}

// Keeps a tracked render tree current by re-resolving only the nodes whose reads intersect
// the written paths.
export class ViewTreeUpdater {
  private index: DependencyIndex

  constructor(
    private tree: RenderTree,
    private viewTree: ViewNode,
    private readonly resolver: NodeReresolver,
    private readonly log?: Log,
  ) {
    this.index = DependencyIndex.build(viewTree)
  }

  get currentTree(): RenderTree {
    return this.tree
  }

  get root(): ViewNode {
    return this.viewTree
  }

  reset(tree: RenderTree, viewTree: ViewNode): void {
    if (viewTree !== this.viewTree) this.viewTree.dispose()
    this.tree = tree
    this.viewTree = viewTree
    this.index = DependencyIndex.build(viewTree)
  }

  affectedNodes(paths: Iterable<string>): ViewNode[] {
    return minimalUpdateSet(this.index.nodesAffectedBy(paths))
  }

  update(paths: Set<string>): ViewTreeUpdate {
    if (paths.size === 0) return { kind: 'unchanged' }
    const pending = this.affectedNodes(paths)
    if (pending.length === 0) return { kind: 'unchanged' }
    if (pending.some((n) => n.kind === 'root')) return { kind: 'fullResolveRequired', reason: 'root depends on a changed path' }

    let tree = this.tree
    const updated: ViewNode[] = []
    const reresolved: string[] = []
    const errors: ResolutionError[] = []

    for (const node of pending) {
      if (node.disposed) continue
      // Unindex before re-resolving; a successful pass disposes the old subtree.
      this.index.removeTree(node)
      reresolved.push(node.id)
      const result = this.resolver.reresolve(node)
      errors.push(...result.errors)
      if (!result.ok) {
        this.index.addTree(node)
        this.log?.(`[runtime] Keeping previous output for '${node.id}': ${result.error.message}`)
        continue
      }
      this.index.addTree(result.viewNode)
      const spliced = spliceRenderTree(tree, result.viewNode, result.node)
      if (!spliced) return { kind: 'fullResolveRequired', reason: `no slot for '${node.id}' in the current tree` }

      tree = spliced
      updated.push(result.viewNode)
    }

    this.tree = tree
    return { kind: 'patched', tree, updated, reresolved, errors }
  }
}
