import { evaluate, evaluateCondition, interpolate } from '../bindings/expressionEvaluator'
import type { ActionBinding, DocumentDefinition, LayoutNode, Style } from '../document/documentTypes'
import type { IRActionBinding, RenderNode } from '../ir/irTypes'
import { errorMessage, type Log } from '../log'
import { getRegistryResolver, type ResolverRegistries } from '../registry/registry'
import { scopedReader, type ScopeBindings } from '../state/scopedReader'
import type { StateReader, StateStore } from '../state/stateStore'
import type { StateValue } from '../state/stateValue'
import type { ResolvedStyle } from '../styles/resolvedStyle'
import { StyleResolutionError, type StyleResolver } from '../styles/styleResolver'
import type { DependencyTracker } from '../viewTree/dependencyTracker'
import { ViewNode, type ViewSlot } from '../viewTree/viewNode'
import { ResolutionError, type ResolutionErrorKind } from './resolutionErrors'

// Shared by every context of one resolution pass.
export type ResolutionEnvironment = {
  document: DocumentDefinition
  store: StateStore
  styles: StyleResolver
  registries: ResolverRegistries
  tracker: DependencyTracker | null
  errors: ResolutionError[]
  // Resolutions per node path, kept across passes.
  counts: Map<string, number>
  log: Log
}

export function documentIdOf(node: LayoutNode): string | null {
  switch (node.kind) {
    case 'layout':
      return node.layout.id ?? null
    case 'forEach':
      return node.forEach.id ?? null
    case 'sectionLayout':
      return node.sectionLayout.id ?? null
    case 'component':
      return node.component.id ?? null
    case 'spacer':
      return null
  }
}

export class ResolutionContext {
  readonly reader: StateReader

  constructor(
    readonly env: ResolutionEnvironment,
    readonly path: string,
    readonly scope: ScopeBindings,
    readonly parent: ViewNode | null,
  ) {
    this.reader = scopedReader(env.store, scope)
  }

  get document(): DocumentDefinition {
    return this.env.document
  }

  get log(): Log {
    return this.env.log
  }

  read(path: string): StateValue | undefined {
    return this.reader.get(path)
  }

  evaluate(expr: string): StateValue | undefined {
    return evaluate(expr, this.reader, { log: this.env.log })
  }

  interpolate(template: string): string {
    return interpolate(template, this.reader, { log: this.env.log })
  }

  condition(expr: string): boolean {
    return evaluateCondition(expr, this.reader, { log: this.env.log })
  }

  withScope(bindings: ScopeBindings): ResolutionContext {
    return new ResolutionContext(this.env, this.path, { ...this.scope, ...bindings }, this.parent)
  }

  fail(kind: ResolutionErrorKind, message: string): ResolutionError {
    return new ResolutionError(kind, this.path, message)
  }

  resolveStyle(styleId: string | undefined, inline?: Style): ResolvedStyle {
    try {
      return this.env.styles.resolveWithInline(styleId, inline)
    } catch (e) {
      if (e instanceof StyleResolutionError) throw this.fail('styleCycle', e.message)
      throw e
    }
  }

  actionBinding(binding: ActionBinding | undefined): IRActionBinding | null {
    if (binding === undefined) return null
    if (typeof binding === 'string') return { kind: 'reference', actionId: binding }
    try {
      return { kind: 'inline', definition: this.env.registries.actions.resolve(binding, { reader: this.reader, log: this.env.log }) }
    } catch (e) {
      this.env.log(`[resolve] ${this.path}: inline action dropped: ${errorMessage(e)}`)
      return null
    }
  }

  // Resolves one child node. A failing child is reported and yields null.
  resolveNode(node: LayoutNode, segment: string, slot: ViewSlot): RenderNode | null {
    const path = `${this.path}.${segment}`
    const viewNode = this.env.tracker ? createViewNode(node, path, this.scope, slot) : null
    try {
      const out = resolveLayoutNode(node, new ResolutionContext(this.env, path, this.scope, viewNode), viewNode)
      if (viewNode) this.parent?.addChild(viewNode)
      return out
    } catch (e) {
      viewNode?.dispose()
      const error = e instanceof ResolutionError ? e : new ResolutionError('invalidNode', path, errorMessage(e))
      this.env.errors.push(error)
      this.env.log(`[resolve] ${error.message}`)
      return null
    }
  }

  // Output indices stay dense when a child fails, so slots follow the output, not the source.
  resolveChildren(nodes: LayoutNode[], segment = 'children'): RenderNode[] {
    const out: RenderNode[] = []
    nodes.forEach((node, i) => {
      const resolved = this.resolveNode(node, `${segment}.${i}`, { kind: 'child', index: out.length })
      if (resolved) out.push(resolved)
    })
    return out
  }
}

export function createViewNode(node: LayoutNode, path: string, scope: ScopeBindings, slot: ViewSlot): ViewNode {
  return new ViewNode({ id: path, documentId: documentIdOf(node), kind: node.kind, source: node, scope, slot })
}

// Runs the registered resolver for `node`, attributing store access to `viewNode` when tracking.
export function resolveLayoutNode(node: LayoutNode, ctx: ResolutionContext, viewNode: ViewNode | null): RenderNode {
  const count = (ctx.env.counts.get(ctx.path) ?? 0) + 1
  ctx.env.counts.set(ctx.path, count)
  const tracker = ctx.env.tracker
  if (!viewNode || !tracker) return dispatchLayoutNode(node, ctx)
  viewNode.resolutionCount = count
  return tracker.track(viewNode, () => dispatchLayoutNode(node, ctx))
}

function dispatchLayoutNode(node: LayoutNode, ctx: ResolutionContext): RenderNode {
  const { layouts, components } = ctx.env.registries
  switch (node.kind) {
    case 'layout':
      return layouts.layout({ node, ctx })
    case 'forEach':
      return layouts.forEach({ node, ctx })
    case 'sectionLayout':
      return layouts.sectionLayout({ node, ctx })
    case 'spacer':
      return layouts.spacer({ node, ctx })
    case 'component': {
      const type = node.component.type
      const resolver = getRegistryResolver(components, type)
      if (!resolver) throw ctx.fail('unregisteredKind', `No resolver registered for component type '${type}'`)
      return resolver({ node: node.component, ctx })
    }
  }
}
