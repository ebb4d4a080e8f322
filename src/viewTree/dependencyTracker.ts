import type { StateAccessRecorder } from '../state/stateStore'
import type { ViewNode } from './viewNode'

// Attributes store reads/writes to the innermost open node. Reads inside a nested bracket
// stay with that node and are not copied to its ancestors.
export class DependencyTracker implements StateAccessRecorder {
  private readonly stack: ViewNode[] = []

  get current(): ViewNode | null {
    return this.stack[this.stack.length - 1] ?? null
  }

  get depth(): number {
    return this.stack.length
  }

  begin(node: ViewNode): void {
    this.stack.push(node)
  }

  end(node: ViewNode): void {
    const top = this.stack.pop()
    if (top !== node) throw new Error(`Unbalanced dependency tracking: expected '${node.id}', found '${top?.id ?? '<empty>'}'`)
  }

  track<T>(node: ViewNode, body: () => T): T {
    this.begin(node)
    try {
      return body()
    } finally {
      this.end(node)
    }
  }

  recordRead(path: string): void {
    this.current?.recordRead(path)
  }

  recordWrite(path: string): void {
    this.current?.recordWrite(path)
  }
}
