import { evaluate, interpolate } from '../bindings/expressionEvaluator'
import type { ActionBinding, DocumentAction } from '../document/documentTypes'
import type { ActionDefinition, IRActionBinding } from '../ir/irTypes'
import { defaultLog, errorMessage, type Log } from '../log'
import { EMPTY_SCOPE, scopedReader, type ScopeBindings } from '../state/scopedReader'
import type { StateStore } from '../state/stateStore'
import { ActionResolutionError } from './actionErrors'
import type { ActionRegistry } from './actionRegistry'
import type { ActionResolver } from './actionResolver'
import {
  handlerKey,
  type ActionDelegate,
  type ActionExecutionContext,
  type ActionOutcome,
  type ActionPresenters,
  type ActionStatus,
} from './actionTypes'

export type ExecutableAction = ActionBinding | IRActionBinding

export type ActionExecutorOptions = {
  store: StateStore
  registry: ActionRegistry
  resolver: ActionResolver
  actions: Record<string, DocumentAction>
  delegate?: ActionDelegate
  presenters?: ActionPresenters
  sessionId?: string
  log?: Log
}

export type ExecuteOptions = {
  scope?: ScopeBindings
  sessionId?: string
  requestId?: string
}

export function isIRActionBinding(binding: ExecutableAction): binding is IRActionBinding {
  if (typeof binding === 'string' || 'type' in binding) return false
  return binding.kind === 'reference' || binding.kind === 'inline'
}

// Runs actions against the store and the host. Independent invocations are not serialized;
// a sequence awaits each step before starting the next.
export class ActionExecutor {
  private readonly inflight = new Map<string, { sessionId: string; controller: AbortController }>()
  private readonly log: Log
  private nextRequest = 0

  constructor(private readonly options: ActionExecutorOptions) {
    this.log = options.log ?? defaultLog
  }

  get sessionId(): string {
    return this.options.sessionId ?? 'default'
  }

  get pendingRequests(): string[] {
    return [...this.inflight.keys()]
  }

  async execute(action: ExecutableAction, options: ExecuteOptions = {}): Promise<ActionOutcome> {
    const sessionId = options.sessionId ?? this.sessionId
    const requestId = options.requestId ?? `req-${++this.nextRequest}`
    const controller = new AbortController()
    this.inflight.set(requestId, { sessionId, controller })

    const reader = scopedReader(this.options.store, options.scope ?? EMPTY_SCOPE)
    const ctx: ActionExecutionContext = {
      store: this.options.store,
      reader,
      evaluate: (expr) => evaluate(expr, reader, { log: this.log }),
      interpolate: (template) => interpolate(template, reader, { log: this.log }),
      run: (binding) => this.runBinding(binding, ctx),
      presenters: this.options.presenters ?? {},
      signal: controller.signal,
      sessionId,
      requestId,
      log: this.log,
    }

    try {
      return await this.runBinding(action, ctx)
    } finally {
      this.inflight.delete(requestId)
    }
  }

  // Best effort: stops further steps and effects of the request; state already written stays.
  cancel(requestId: string, sessionId: string = this.sessionId): void {
    const entry = this.inflight.get(requestId)
    if (entry && entry.sessionId === sessionId) entry.controller.abort()
    this.options.registry.cancel(requestId, sessionId)
  }

  cancelAll(sessionId: string = this.sessionId): void {
    for (const entry of this.inflight.values()) {
      if (entry.sessionId === sessionId) entry.controller.abort()
    }
    this.options.registry.cancelAll(sessionId)
  }

  resolve(action: ExecutableAction, ctx: Pick<ActionExecutionContext, 'reader' | 'log'>): ActionDefinition {
    if (isIRActionBinding(action)) {
      if (action.kind === 'inline') return action.definition
      return this.options.resolver.resolveBinding(action.actionId, this.options.actions, ctx)
    }
    return this.options.resolver.resolveBinding(action, this.options.actions, ctx)
  }

  private async runBinding(action: ExecutableAction, ctx: ActionExecutionContext): Promise<ActionOutcome> {
    const outcome = (status: ActionStatus, error?: string): ActionOutcome =>
      error === undefined ? { status, requestId: ctx.requestId } : { status, requestId: ctx.requestId, error }

    if (ctx.signal.aborted) return outcome('cancelled')

    let definition: ActionDefinition
    try {
      definition = this.resolve(action, ctx)
    } catch (e) {
      const message = e instanceof ActionResolutionError ? e.message : errorMessage(e)
      this.log(`[actions] ${message}`)
      return outcome('failed', message)
    }

    const key = handlerKey(definition)
    try {
      const handler = this.options.registry.handler(key)
      if (handler) {
        await handler.execute(definition, ctx)
        return outcome(ctx.signal.aborted ? 'cancelled' : 'completed')
      }
      if (this.options.delegate && (await this.options.delegate.handleAction(definition, ctx))) {
        return outcome('completed')
      }
      this.log(`[actions] No handler registered for action kind '${key}'`)
      return outcome('unhandled')
    } catch (e) {
      const message = errorMessage(e)
      this.log(`[actions] '${key}' failed: ${message}`)
      return outcome('failed', message)
    }
  }
}
