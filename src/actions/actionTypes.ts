import type { ActionBinding, DocumentAction } from '../document/documentTypes'
import type { ActionDefinition, AlertButtonStyle, NavigationPresentation } from '../ir/irTypes'
import type { Log } from '../log'
import type { StateReader, StateStore } from '../state/stateStore'
import type { StateValue } from '../state/stateValue'

export type ActionResolutionContext = {
  reader: StateReader
  log?: Log
}

export type ActionResolverFn = (action: DocumentAction, ctx: ActionResolutionContext) => ActionDefinition

export type ActionResolverRegistry = Record<string, ActionResolverFn>

export type ActionStatus = 'completed' | 'cancelled' | 'unhandled' | 'failed'

export type ActionOutcome = {
  status: ActionStatus
  requestId: string
  error?: string
}

export type PresentedAlert = {
  title: string
  message: string | null
  buttons: Array<{ label: string; style: AlertButtonStyle; action: ActionBinding | null }>
}

// Platform effects supplied by the host.
export type ActionPresenters = {
  presentAlert?: (alert: PresentedAlert, execute: (binding: ActionBinding) => Promise<ActionOutcome>) => void
  navigate?: (destination: string, presentation: NavigationPresentation) => void
  dismiss?: () => void
}

export type ActionExecutionContext = {
  store: StateStore
  reader: StateReader
  evaluate: (expr: string) => StateValue | undefined
  interpolate: (template: string) => string
  // Resolves and runs a nested binding inside the same request.
  run: (binding: ActionBinding) => Promise<ActionOutcome>
  presenters: ActionPresenters
  signal: AbortSignal
  sessionId: string
  requestId: string
  log: Log
}

export type ActionHandlerFn = (definition: ActionDefinition, ctx: ActionExecutionContext) => void | Promise<void>

export type ActionHandler = {
  kind: string
  execute: ActionHandlerFn
  // Best effort; suppresses further effects of the request.
  cancel?: (requestId: string, sessionId: string) => void
  cancelAll?: (sessionId: string) => void
}

// Gets a look at actions no handler claimed. Returns true when it handled the action.
export type ActionDelegate = {
  handleAction: (definition: ActionDefinition, ctx: ActionExecutionContext) => boolean | Promise<boolean>
}

// Handler lookup key: built-in kinds by kind, custom actions by their type.
export function handlerKey(definition: ActionDefinition): string {
  return definition.kind === 'custom' ? definition.type : definition.kind
}
