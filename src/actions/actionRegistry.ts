import type { ActionHandler, ActionHandlerFn } from './actionTypes'

// Execution-time handlers keyed by action kind (or custom type). One instance per runtime.
export class ActionRegistry {
  private readonly handlers = new Map<string, ActionHandler>()

  constructor(handlers: Iterable<ActionHandler> = []) {
    for (const h of handlers) this.register(h)
  }

  register(handler: ActionHandler): void {
    this.handlers.set(handler.kind, handler)
  }

  registerClosure(kind: string, execute: ActionHandlerFn): void {
    this.register({ kind, execute })
  }

  handler(kind: string): ActionHandler | null {
    return this.handlers.get(kind) ?? null
  }

  hasHandler(kind: string): boolean {
    return this.handlers.has(kind)
  }

  get kinds(): string[] {
    return [...this.handlers.keys()]
  }

  // Handlers from `other` win on conflicts.
  merging(other: ActionRegistry): ActionRegistry {
    return new ActionRegistry([...this.handlers.values(), ...other.handlers.values()])
  }

  cancel(requestId: string, sessionId: string): void {
    for (const h of this.handlers.values()) h.cancel?.(requestId, sessionId)
  }

  cancelAll(sessionId: string): void {
    for (const h of this.handlers.values()) h.cancelAll?.(sessionId)
  }
}
