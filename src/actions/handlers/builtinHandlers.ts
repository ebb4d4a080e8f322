import type { ActionDefinition, SetStateValue } from '../../ir/irTypes'
import { asBool, type StateValue } from '../../state/stateValue'
import { ActionExecutionError } from '../actionErrors'
import type { ActionExecutionContext, ActionHandler, PresentedAlert } from '../actionTypes'

export function wrongKind(expected: string, definition: ActionDefinition): ActionExecutionError {
  return new ActionExecutionError('invalidParameterType', `Handler for '${expected}' received a '${definition.kind}' action`)
}

export function evaluateValue(value: SetStateValue, ctx: ActionExecutionContext): StateValue | undefined {
  return value.kind === 'literal' ? value.value : ctx.evaluate(value.expression)
}

const dismiss: ActionHandler = {
  kind: 'dismiss',
  execute: (definition, ctx) => {
    if (definition.kind !== 'dismiss') throw wrongKind('dismiss', definition)
    if (!ctx.presenters.dismiss) throw new ActionExecutionError('executionFailed', 'No presenter handles dismiss')
    ctx.presenters.dismiss()
  },
}

const setState: ActionHandler = {
  kind: 'setState',
  execute: (definition, ctx) => {
    if (definition.kind !== 'setState') throw wrongKind('setState', definition)
    const value = evaluateValue(definition.value, ctx)
    if (value === undefined) {
      ctx.log(`[actions] setState '${definition.path}': expression produced no value; state unchanged`)
      return
    }
    ctx.store.set(definition.path, value)
  },
}

const toggleState: ActionHandler = {
  kind: 'toggleState',
  execute: (definition, ctx) => {
    if (definition.kind !== 'toggleState') throw wrongKind('toggleState', definition)
    ctx.store.set(definition.path, !(asBool(ctx.reader.get(definition.path)) ?? false))
  },
}

const showAlert: ActionHandler = {
  kind: 'showAlert',
  execute: (definition, ctx) => {
    if (definition.kind !== 'showAlert') throw wrongKind('showAlert', definition)
    const present = ctx.presenters.presentAlert
    if (!present) throw new ActionExecutionError('executionFailed', 'No presenter handles showAlert')
    const { title, message, buttons } = definition.config
    const alert: PresentedAlert = {
      title,
      message: message === null ? null : message.kind === 'static' ? message.text : ctx.interpolate(message.template),
      buttons: buttons.map((b) => ({ label: b.label, style: b.style, action: b.action })),
    }
    present(alert, ctx.run)
  },
}

const navigate: ActionHandler = {
  kind: 'navigate',
  execute: (definition, ctx) => {
    if (definition.kind !== 'navigate') throw wrongKind('navigate', definition)
    if (!ctx.presenters.navigate) throw new ActionExecutionError('executionFailed', 'No presenter handles navigate')
    ctx.presenters.navigate(ctx.interpolate(definition.destination), definition.presentation)
  },
}

// Each step is resolved just before it runs, so it sees what earlier steps wrote.
const sequence: ActionHandler = {
  kind: 'sequence',
  execute: async (definition, ctx) => {
    if (definition.kind !== 'sequence') throw wrongKind('sequence', definition)
    for (const [i, step] of definition.steps.entries()) {
      if (ctx.signal.aborted) return
      const outcome = await ctx.run(step)
      if (outcome.status === 'failed') {
        throw new ActionExecutionError('executionFailed', `Sequence step ${i} failed: ${outcome.error ?? 'unknown error'}`)
      }
    }
  },
}

export function builtinHandlers(): ActionHandler[] {
  return [dismiss, setState, toggleState, showAlert, navigate, sequence]
}
