import type { ActionBinding, DocumentAction } from '../document/documentTypes'
import type { ActionDefinition } from '../ir/irTypes'
import { errorMessage } from '../log'
import { ActionResolutionError } from './actionErrors'
import type { ActionResolutionContext, ActionResolverRegistry } from './actionTypes'
import { builtinActionResolvers, parameters } from './resolvers/builtinActionResolvers'

export class ActionResolver {
  private readonly registry: ActionResolverRegistry

  constructor(registry: ActionResolverRegistry = builtinActionResolvers()) {
    this.registry = { ...registry }
  }

  register(kind: string, resolver: ActionResolverRegistry[string]): void {
    this.registry[kind] = resolver
  }

  has(kind: string): boolean {
    return Object.hasOwn(this.registry, kind)
  }

  get kinds(): string[] {
    return Object.keys(this.registry)
  }

  merging(other: ActionResolverRegistry): ActionResolver {
    return new ActionResolver({ ...this.registry, ...other })
  }

  // Kinds without a resolver pass through as custom actions.
  resolve(action: DocumentAction, ctx: ActionResolutionContext): ActionDefinition {
    const resolver = this.has(action.type) ? this.registry[action.type] : undefined
    if (!resolver) return { kind: 'custom', type: action.type, parameters: parameters(action) }
    try {
      return resolver(action, ctx)
    } catch (e) {
      if (e instanceof ActionResolutionError) throw e
      throw new ActionResolutionError('resolutionFailed', action.type, `Resolving '${action.type}' failed: ${errorMessage(e)}`)
    }
  }

  resolveBinding(binding: ActionBinding, actions: Record<string, DocumentAction>, ctx: ActionResolutionContext): ActionDefinition {
    if (typeof binding !== 'string') return this.resolve(binding, ctx)
    const action = Object.hasOwn(actions, binding) ? actions[binding] : undefined
    if (!action) throw new ActionResolutionError('noResolverFound', binding, `No action named '${binding}'`)
    return this.resolve(action, ctx)
  }

  // Resolves every document action; failures are logged and left out.
  resolveAll(actions: Record<string, DocumentAction>, ctx: ActionResolutionContext): {
    actions: Record<string, ActionDefinition>
    errors: ActionResolutionError[]
  } {
    const out: Record<string, ActionDefinition> = {}
    const errors: ActionResolutionError[] = []
    for (const [id, action] of Object.entries(actions)) {
      try {
        out[id] = this.resolve(action, ctx)
      } catch (e) {
        const err = e instanceof ActionResolutionError ? e : new ActionResolutionError('resolutionFailed', action.type, errorMessage(e))
        ctx.log?.(`[actions] Action '${id}' skipped: ${err.message}`)
        errors.push(err)
      }
    }
    return { actions: out, errors }
  }
}
