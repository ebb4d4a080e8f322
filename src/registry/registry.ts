import type { ActionResolver } from '../actions/actionResolver'
import type { Component, LayoutNode, LayoutNodeKind, SectionLayoutConfig } from '../document/documentTypes'
import type { IRSectionConfig, RenderNode } from '../ir/irTypes'
import type { ResolutionContext } from '../resolution/resolutionContext'

export type ComponentResolver = (args: { node: Component; ctx: ResolutionContext }) => RenderNode

export type ComponentRegistry = Record<string, ComponentResolver>

export type LayoutKind = Exclude<LayoutNodeKind, 'component'>

export type LayoutNodeOf<K extends LayoutNodeKind> = Extract<LayoutNode, { kind: K }>

export type LayoutResolver<K extends LayoutKind> = (args: { node: LayoutNodeOf<K>; ctx: ResolutionContext }) => RenderNode

export type LayoutRegistry = { [K in LayoutKind]: LayoutResolver<K> }

export type SectionConfigResolver = (config: SectionLayoutConfig) => IRSectionConfig

export type SectionConfigRegistry = Record<string, SectionConfigResolver>

// Built once per runtime and handed to every resolution pass.
export type ResolverRegistries = {
  components: ComponentRegistry
  layouts: LayoutRegistry
  sections: SectionConfigRegistry
  actions: ActionResolver
}

export type RegistryOverrides = {
  components?: ComponentRegistry
  layouts?: Partial<LayoutRegistry>
  sections?: SectionConfigRegistry
  actions?: ActionResolver
}

export function getRegistryResolver<T>(registry: Record<string, T>, kind: string): T | null {
  return Object.hasOwn(registry, kind) ? (registry[kind] ?? null) : null
}

export function mergeRegistries(base: ResolverRegistries, overrides: RegistryOverrides = {}): ResolverRegistries {
  return {
    components: { ...base.components, ...overrides.components },
    layouts: { ...base.layouts, ...overrides.layouts },
    sections: { ...base.sections, ...overrides.sections },
    actions: overrides.actions ?? base.actions,
  }
}
