export * from './log'
export * from './featureFlags'

export * from './state/stateValue'
export * from './state/keyPath'
export * from './state/stateStore'
export * from './state/scopedReader'
export * from './bindings/expressionEvaluator'

export * from './document/documentTypes'
export * from './document/documentVersion'
export * from './document/validateDocument'

export * from './styles/color'
export * from './styles/resolvedStyle'
export * from './styles/styleResolver'

export type * from './ir/irTypes'
export * from './ir/converters'
export * from './ir/validateRenderTree'

export * from './viewTree/viewNode'
export * from './viewTree/dependencyTracker'
export * from './viewTree/dependencyIndex'
export * from './viewTree/spliceRenderTree'
export * from './viewTree/viewTreeUpdater'

export * from './registry/registry'
export * from './registry/defaultRegistries'

export * from './resolution/resolutionErrors'
export { ResolutionContext, type ResolutionEnvironment } from './resolution/resolutionContext'
export * from './resolution/resolver'
export { resolveCustomComponent } from './resolution/components/customComponentResolver'

export * from './actions/actionErrors'
export * from './actions/actionTypes'
export * from './actions/actionResolver'
export * from './actions/actionRegistry'
export * from './actions/actionExecutor'
export { builtinActionResolvers } from './actions/resolvers/builtinActionResolvers'
export { builtinHandlers } from './actions/handlers/builtinHandlers'
export { arrayHandlers } from './actions/handlers/arrayHandlers'

export * from './runtime/documentRuntime'
export type * from './renderer/renderer'
export * from './renderer/debugRenderer'
