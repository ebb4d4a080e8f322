import type { ActionResolutionError } from '../actions/actionErrors'
import type { DocumentDefinition } from '../document/documentTypes'
import { CURRENT_IR_VERSION, formatVersion } from '../document/documentVersion'
import { resolveEdgeInset, toNodeStyle } from '../ir/converters'
import type { RenderNode, RenderTree, RootNode } from '../ir/irTypes'
import { defaultLog, errorMessage, type Log } from '../log'
import { createDefaultRegistries } from '../registry/defaultRegistries'
import type { ResolverRegistries } from '../registry/registry'
import { EMPTY_SCOPE } from '../state/scopedReader'
import { StateStore } from '../state/stateStore'
import { parseColor } from '../styles/color'
import { EMPTY_STYLE, type ResolvedStyle } from '../styles/resolvedStyle'
import { StyleResolver, type DesignSystemProvider } from '../styles/styleResolver'
import { DependencyTracker } from '../viewTree/dependencyTracker'
import { ViewNode } from '../viewTree/viewNode'
import { createViewNode, resolveLayoutNode, ResolutionContext, type ResolutionEnvironment } from './resolutionContext'
import { ResolutionError } from './resolutionErrors'

export type ResolverOptions = {
  registries?: ResolverRegistries
  designSystem?: DesignSystemProvider
  log?: Log
}

export type ResolutionResult = {
  tree: RenderTree
  errors: ResolutionError[]
  actionErrors: ActionResolutionError[]
  viewTree: ViewNode | null
}

export type ReresolveResult =
  | { ok: true; node: RenderNode; viewNode: ViewNode; errors: ResolutionError[] }
  | { ok: false; error: ResolutionError; errors: ResolutionError[] }

export const ROOT_PATH = 'root'

// Walks a document into a render tree. One instance per document; the per-node resolution
// counts survive across passes.
export class Resolver {
  readonly registries: ResolverRegistries
  readonly styles: StyleResolver
  private readonly counts = new Map<string, number>()
  private readonly log: Log

  constructor(
    readonly document: DocumentDefinition,
    readonly store: StateStore = new StateStore(),
    options: ResolverOptions = {},
  ) {
    this.log = options.log ?? defaultLog
    this.registries = options.registries ?? createDefaultRegistries()
    this.styles = new StyleResolver(document.styles ?? {}, { designSystem: options.designSystem, log: this.log })
  }

  resolve(): ResolutionResult {
    return this.pass(null)
  }

  // Also builds the ViewNode tree with per-node read/write sets.
  resolveWithTracking(): ResolutionResult {
    return this.pass(new DependencyTracker())
  }

  // Re-resolves one tracked node in place and swaps it into its parent's children.
  reresolve(target: ViewNode): ReresolveResult {
    const parent = target.parent
    if (target.kind === 'root' || !target.source || !parent || target.disposed) {
      const error = new ResolutionError('invalidNode', target.id, 'Node cannot be re-resolved on its own')
      return { ok: false, error, errors: [error] }
    }

    const tracker = new DependencyTracker()
    const errors: ResolutionError[] = []
    const env = this.environment(tracker, errors)
    const source = target.source
    const fresh = createViewNode(source, target.id, target.scope, target.slot)
    try {
      const node = this.recording(tracker, () => resolveLayoutNode(source, new ResolutionContext(env, target.id, target.scope, fresh), fresh))
      parent.replaceChild(target, fresh)
      return { ok: true, node, viewNode: fresh, errors }
    } catch (e) {
      fresh.dispose()
      const error = e instanceof ResolutionError ? e : new ResolutionError('invalidNode', target.id, errorMessage(e))
      this.log(`[resolve] ${error.message}`)
      errors.push(error)
      return { ok: false, error, errors }
    }
  }

  resolutionCount(path: string): number {
    return this.counts.get(path) ?? 0
  }

  private recording<T>(tracker: DependencyTracker | null, body: () => T): T {
    if (!tracker) return body()
    const detach = this.store.attachRecorder(tracker)
    try {
      return body()
    } finally {
      detach()
    }
  }

  private environment(tracker: DependencyTracker | null, errors: ResolutionError[]): ResolutionEnvironment {
    return {
      document: this.document,
      store: this.store,
      styles: this.styles,
      registries: this.registries,
      tracker,
      errors,
      counts: this.counts,
      log: this.log,
    }
  }

  private pass(tracker: DependencyTracker | null): ResolutionResult {
    const errors: ResolutionError[] = []
    const env = this.environment(tracker, errors)
    const rootView = tracker
      ? new ViewNode({ id: ROOT_PATH, documentId: this.document.id, kind: 'root', source: null, scope: EMPTY_SCOPE, slot: { kind: 'self' } })
      : null

    const ctx = new ResolutionContext(env, ROOT_PATH, EMPTY_SCOPE, rootView)
    const root = this.recording(tracker, () => (tracker && rootView ? tracker.track(rootView, () => this.resolveRoot(ctx)) : this.resolveRoot(ctx)))

    const { actions, errors: actionErrors } = this.registries.actions.resolveAll(this.document.actions ?? {}, {
      reader: this.store,
      log: this.log,
    })

    return {
      tree: { irVersion: formatVersion(CURRENT_IR_VERSION), documentId: this.document.id, root, actions },
      errors,
      actionErrors,
      viewTree: rootView,
    }
  }

  private resolveRoot(ctx: ResolutionContext): RootNode {
    ctx.env.counts.set(ROOT_PATH, (ctx.env.counts.get(ROOT_PATH) ?? 0) + 1)
    const root = this.document.root

    let resolved: ResolvedStyle = EMPTY_STYLE
    try {
      resolved = ctx.resolveStyle(root.styleId)
    } catch (e) {
      const error = e instanceof ResolutionError ? e : new ResolutionError('invalidNode', ROOT_PATH, errorMessage(e))
      ctx.env.errors.push(error)
      this.log(`[resolve] ${error.message}`)
    }

    const insets = root.edgeInsets
    return {
      type: 'root',
      backgroundColor: parseColor(root.backgroundColor ?? resolved.backgroundColor ?? '#FFFFFF'),
      edgeInsets: {
        top: resolveEdgeInset(insets?.top),
        bottom: resolveEdgeInset(insets?.bottom),
        leading: resolveEdgeInset(insets?.leading),
        trailing: resolveEdgeInset(insets?.trailing),
      },
      colorScheme: root.colorScheme ?? 'system',
      style: toNodeStyle(resolved),
      onAppear: ctx.actionBinding(root.actions?.onAppear),
      onDisappear: ctx.actionBinding(root.actions?.onDisappear),
      children: ctx.resolveChildren(root.children),
    }
  }
}

// One-shot resolution without dependency tracking.
export function resolveDocument(document: DocumentDefinition, store: StateStore = new StateStore(document.state ?? {}), options: ResolverOptions = {}): ResolutionResult {
  return new Resolver(document, store, options).resolve()
}
