import { ActionExecutor, type ExecutableAction, type ExecuteOptions } from '../actions/actionExecutor'
import type { ActionResolutionError } from '../actions/actionErrors'
import { ActionRegistry } from '../actions/actionRegistry'
import type { ActionDelegate, ActionOutcome, ActionPresenters } from '../actions/actionTypes'
import { arrayHandlers } from '../actions/handlers/arrayHandlers'
import { builtinHandlers } from '../actions/handlers/builtinHandlers'
import type { DocumentDefinition } from '../document/documentTypes'
import { DocumentValidationError, validateDocument, type ValidationWarning } from '../document/validateDocument'
import { getRuntimeFeatureFlags, type RuntimeFeatureFlags } from '../featureFlags'
import type { RenderTree } from '../ir/irTypes'
import { validateRenderTree } from '../ir/validateRenderTree'
import { defaultLog, type Log } from '../log'
import type { ResolverRegistries } from '../registry/registry'
import type { Renderer } from '../renderer/renderer'
import { Resolver, type ResolutionResult } from '../resolution/resolver'
import type { ResolutionError } from '../resolution/resolutionErrors'
import { StateStore, type Unsubscribe } from '../state/stateStore'
import type { DesignSystemProvider } from '../styles/styleResolver'
import type { ViewNode } from '../viewTree/viewNode'
import { isWithinNode, ViewTreeUpdater } from '../viewTree/viewTreeUpdater'

export type DocumentRuntimeOptions = {
  registries?: ResolverRegistries
  actionRegistry?: ActionRegistry
  delegate?: ActionDelegate
  presenters?: ActionPresenters
  designSystem?: DesignSystemProvider
  flags?: Partial<RuntimeFeatureFlags>
  sessionId?: string
  log?: Log
}

export type RenderUpdate =
  | { kind: 'full'; reason: string }
  | { kind: 'patched'; nodeIds: string[] }

export type RenderListener = (tree: RenderTree, update: RenderUpdate) => void

// Owns the store, the resolver and the action executor for one document. State writes mark
// paths dirty; a flush re-resolves the affected nodes and notifies listeners once.
export class DocumentRuntime {
  readonly store: StateStore
  readonly flags: RuntimeFeatureFlags
  readonly warnings: ValidationWarning[]
  private readonly resolver: Resolver
  private readonly executor: ActionExecutor
  private readonly listeners = new Set<RenderListener>()
  private readonly log: Log
  private readonly unsubscribeStore: Unsubscribe
  private updater: ViewTreeUpdater | null = null
  private current: RenderTree
  private lastErrors: ResolutionError[] = []
  private lastActionErrors: ActionResolutionError[] = []
  private scheduled = false
  private disposed = false

  constructor(
    readonly document: DocumentDefinition,
    options: DocumentRuntimeOptions = {},
    warnings: ValidationWarning[] = [],
  ) {
    this.log = options.log ?? defaultLog
    this.flags = getRuntimeFeatureFlags(options.flags)
    this.warnings = warnings
    for (const w of warnings) this.log(`[runtime] ${w.path}: ${w.message}`)

    this.store = new StateStore({}, { log: this.log })
    this.store.initialize(document.state)

    this.resolver = new Resolver(document, this.store, {
      registries: options.registries,
      designSystem: options.designSystem,
      log: this.log,
    })

    const handlers = new ActionRegistry([...builtinHandlers(), ...arrayHandlers()])
    this.executor = new ActionExecutor({
      store: this.store,
      registry: options.actionRegistry ? handlers.merging(options.actionRegistry) : handlers,
      resolver: this.resolver.registries.actions,
      actions: document.actions ?? {},
      delegate: options.delegate,
      presenters: options.presenters,
      sessionId: options.sessionId,
      log: this.log,
    })

    this.current = this.initialPass()
    this.unsubscribeStore = this.store.onStateChange(() => this.schedule())
  }

  // Validates `raw` and builds a runtime; throws DocumentValidationError on invalid input.
  static load(raw: unknown, options: DocumentRuntimeOptions = {}): DocumentRuntime {
    const result = validateDocument(raw)
    if (!result.ok) throw new DocumentValidationError(result.errors)
    return new DocumentRuntime(result.document, options, result.warnings)
  }

  get tree(): RenderTree {
    return this.current
  }

  get errors(): ResolutionError[] {
    return this.lastErrors
  }

  get actionErrors(): ActionResolutionError[] {
    return this.lastActionErrors
  }

  get viewTree(): ViewNode | null {
    return this.updater?.root ?? null
  }

  get pendingRequests(): string[] {
    return this.executor.pendingRequests
  }

  resolutionCount(path: string): number {
    return this.resolver.resolutionCount(path)
  }

  subscribe(listener: RenderListener): Unsubscribe {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  render<Output>(renderer: Renderer<Output>): Output {
    return renderer.render(this.current)
  }

  // Accepts an action id, an inline document action, or a binding from the render tree.
  execute(action: ExecutableAction, options: ExecuteOptions = {}): Promise<ActionOutcome> {
    if (this.disposed) return Promise.resolve({ status: 'cancelled', requestId: options.requestId ?? 'disposed' })
    return this.executor.execute(action, options)
  }

  cancel(requestId: string, sessionId?: string): void {
    this.executor.cancel(requestId, sessionId)
  }

  cancelAll(sessionId?: string): void {
    this.executor.cancelAll(sessionId)
  }

  // Applies pending state changes now instead of waiting for the scheduled microtask.
  flush(): void {
    this.scheduled = false
    if (this.disposed) return
    const paths = this.store.consumeDirtyPaths()
    if (paths.size === 0) return

    if (!this.updater) {
      this.fullPass('dependency tracking disabled')
      return
    }

    const update = this.updater.update(paths)
    switch (update.kind) {
      case 'unchanged':
        return
      case 'fullResolveRequired':
        this.fullPass(update.reason)
        return
      case 'patched':
        this.lastErrors = [
          ...this.lastErrors.filter((e) => !update.reresolved.some((id) => isWithinNode(e.path, id))),
          ...update.errors,
        ]
        this.commit(update.tree, { kind: 'patched', nodeIds: update.updated.map((n) => n.id) })
    }
  }

  dispose(): void {
    if (this.disposed) return
    this.executor.cancelAll()
    this.disposed = true
    this.unsubscribeStore()
    this.listeners.clear()
    this.updater?.root.dispose()
    this.updater = null
  }

  private schedule(): void {
    if (this.disposed) return
    if (!this.flags.batchUpdates) {
      this.flush()
      return
    }
    if (this.scheduled) return
    this.scheduled = true
    queueMicrotask(() => {
      if (this.scheduled) this.flush()
    })
  }

  private pass(): ResolutionResult {
    const result = this.flags.trackDependencies ? this.resolver.resolveWithTracking() : this.resolver.resolve()
    this.lastErrors = result.errors
    this.lastActionErrors = result.actionErrors
    return result
  }

  private initialPass(): RenderTree {
    const result = this.pass()
    if (result.viewTree) this.updater = new ViewTreeUpdater(result.tree, result.viewTree, this.resolver, this.log)
    this.check(result.tree)
    this.store.clearDirtyPaths()
    return result.tree
  }

  private fullPass(reason: string): void {
    const result = this.pass()
    if (result.viewTree) {
      if (this.updater) this.updater.reset(result.tree, result.viewTree)
      else this.updater = new ViewTreeUpdater(result.tree, result.viewTree, this.resolver, this.log)
    }
    this.commit(result.tree, { kind: 'full', reason })
  }

  private commit(tree: RenderTree, update: RenderUpdate): void {
    this.current = tree
    this.check(tree)
    for (const listener of [...this.listeners]) listener(tree, update)
  }

  private check(tree: RenderTree): void {
    if (!this.flags.validateRenderTree) return
    const result = validateRenderTree(tree)
    if (!result.ok) this.log(`[runtime] Render tree failed validation:\n${result.error}`)
  }
}
