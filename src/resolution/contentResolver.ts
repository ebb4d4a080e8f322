import { containsExpression } from '../bindings/expressionEvaluator'
import type { Component, DataReference } from '../document/documentTypes'
import { stringifyValue, type StateValue } from '../state/stateValue'
import type { ResolutionContext } from './resolutionContext'

export function resolveDataReference(ref: DataReference, ctx: ResolutionContext): string {
  if (ref.type === 'static') return ref.value ?? ''
  if (ref.path !== undefined) return stringifyValue(ctx.read(ref.path))
  return ctx.interpolate(ref.template ?? '')
}

export function resolveText(text: string | undefined, ctx: ResolutionContext): string {
  if (text === undefined) return ''
  return containsExpression(text) ? ctx.interpolate(text) : text
}

// dataSourceId, then `data.value`, then `text`.
export function resolveContent(component: Component, ctx: ResolutionContext): string {
  if (component.dataSourceId !== undefined) {
    const sources = ctx.document.dataSources ?? {}
    const source = Object.hasOwn(sources, component.dataSourceId) ? sources[component.dataSourceId] : undefined
    if (!source) {
      ctx.log(`[resolve] ${ctx.path}: unknown data source '${component.dataSourceId}'`)
      return ''
    }
    return resolveDataReference(source, ctx)
  }
  const value = component.data?.value
  if (value) return resolveDataReference(value, ctx)
  return resolveText(component.text, ctx)
}

// Current value behind a two-way binding.
export function resolveBoundValue(component: Component, ctx: ResolutionContext): StateValue | undefined {
  return component.bind === undefined ? undefined : ctx.read(component.bind)
}

// Literal number, a path, or an expression string.
export function resolveNumber(raw: number | string | undefined, ctx: ResolutionContext): number | undefined {
  if (raw === undefined) return undefined
  if (typeof raw === 'number') return raw
  const value = ctx.evaluate(raw)
  return typeof value === 'number' ? value : undefined
}
