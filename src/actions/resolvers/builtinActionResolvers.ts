import type { ActionBinding, DocumentAction } from '../../document/documentTypes'
import type { AlertButton, AlertButtonStyle, AlertConfig, NavigationPresentation, SetStateValue } from '../../ir/irTypes'
import { containsExpression } from '../../bindings/expressionEvaluator'
import { asString, isStateObject, type StateObject, type StateValue } from '../../state/stateValue'
import { ActionResolutionError } from '../actionErrors'
import type { ActionResolverRegistry } from '../actionTypes'

function requireString(action: DocumentAction, key: string): string {
  const value = action[key]
  if (typeof value !== 'string' || !value.trim()) {
    throw new ActionResolutionError('invalidParameters', action.type, `'${action.type}' needs a string '${key}'`)
  }
  return value
}

// `{"$expr": "..."}` or any string carrying `${…}` is evaluated when the action runs.
export function toSetStateValue(raw: StateValue): SetStateValue {
  if (isStateObject(raw) && typeof raw.$expr === 'string' && Object.keys(raw).length === 1) {
    return { kind: 'expression', expression: raw.$expr }
  }
  if (typeof raw === 'string' && containsExpression(raw)) return { kind: 'expression', expression: raw }
  return { kind: 'literal', value: raw }
}

export function parameters(action: DocumentAction): StateObject {
  const out: StateObject = {}
  for (const [key, value] of Object.entries(action)) {
    if (key !== 'type') out[key] = value
  }
  return out
}

export function toActionBinding(raw: StateValue | undefined): ActionBinding | null {
  if (typeof raw === 'string' && raw) return raw
  if (isStateObject(raw) && typeof raw.type === 'string' && raw.type) {
    return { ...raw, type: raw.type }
  }
  return null
}

const BUTTON_STYLES: readonly AlertButtonStyle[] = ['default', 'cancel', 'destructive']
const PRESENTATIONS: readonly NavigationPresentation[] = ['push', 'present', 'fullScreen']

function alertButtons(action: DocumentAction): AlertButton[] {
  const raw = action.buttons
  if (raw === undefined) return [{ label: 'OK', style: 'default', action: null }]
  if (!Array.isArray(raw)) throw new ActionResolutionError('invalidParameters', action.type, "'buttons' must be an array")

  return raw.map((item, i) => {
    if (!isStateObject(item)) throw new ActionResolutionError('invalidParameters', action.type, `buttons[${i}] must be an object`)
    const label = asString(item.label)
    if (!label) throw new ActionResolutionError('invalidParameters', action.type, `buttons[${i}] needs a 'label'`)
    const style = BUTTON_STYLES.find((s) => s === item.style) ?? 'default'
    return { label, style, action: toActionBinding(item.action) }
  })
}

export function builtinActionResolvers(): ActionResolverRegistry {
  return {
    dismiss: () => ({ kind: 'dismiss' }),

    setState: (action) => {
      const path = requireString(action, 'path')
      if (!Object.hasOwn(action, 'value')) {
        throw new ActionResolutionError('invalidParameters', action.type, "'setState' needs a 'value'")
      }
      return { kind: 'setState', path, value: toSetStateValue(action.value ?? null) }
    },

    toggleState: (action) => ({ kind: 'toggleState', path: requireString(action, 'path') }),

    showAlert: (action) => {
      const message = asString(action.message)
      const config: AlertConfig = {
        title: asString(action.title) ?? 'Alert',
        message: message === undefined ? null : containsExpression(message) ? { kind: 'template', template: message } : { kind: 'static', text: message },
        buttons: alertButtons(action),
      }
      return { kind: 'showAlert', config }
    },

    navigate: (action) => {
      const destination = requireString(action, 'destination')
      const raw = action.presentation
      const presentation = raw === undefined ? 'push' : PRESENTATIONS.find((p) => p === raw)
      if (!presentation) {
        throw new ActionResolutionError('invalidParameters', action.type, `Unknown presentation '${String(raw)}'`)
      }
      return { kind: 'navigate', destination, presentation }
    },

    sequence: (action) => {
      const raw = action.steps
      if (!Array.isArray(raw)) throw new ActionResolutionError('invalidParameters', action.type, "'sequence' needs a 'steps' array")
      const steps = raw.map((step, i) => {
        const binding = toActionBinding(step)
        if (!binding) throw new ActionResolutionError('invalidParameters', action.type, `steps[${i}] is not an action`)
        return binding
      })
      return { kind: 'sequence', steps }
    },
  }
}
