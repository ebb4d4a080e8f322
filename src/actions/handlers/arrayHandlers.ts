import type { ActionDefinition } from '../../ir/irTypes'
import { asInt, type StateObject, type StateValue } from '../../state/stateValue'
import { ActionExecutionError } from '../actionErrors'
import type { ActionExecutionContext, ActionHandler, ActionHandlerFn } from '../actionTypes'
import { toSetStateValue } from '../resolvers/builtinActionResolvers'
import { evaluateValue } from './builtinHandlers'

// Array helpers exposed as custom action types, e.g. `{ "type": "appendToArray", "path": "tags", "value": "${draft}" }`.

function customParameters(type: string, definition: ActionDefinition): StateObject {
  if (definition.kind !== 'custom' || definition.type !== type) {
    throw new ActionExecutionError('invalidParameterType', `Handler for '${type}' received a '${definition.kind}' action`)
  }
  return definition.parameters
}

function requirePath(type: string, params: StateObject): string {
  const path = params.path
  if (path === undefined) throw new ActionExecutionError('missingParameter', `'${type}' needs 'path'`)
  if (typeof path !== 'string' || !path) throw new ActionExecutionError('invalidParameterType', `'${type}' path must be a string`)
  return path
}

function requireValue(type: string, params: StateObject, ctx: ActionExecutionContext): StateValue {
  if (!Object.hasOwn(params, 'value')) throw new ActionExecutionError('missingParameter', `'${type}' needs 'value'`)
  const value = evaluateValue(toSetStateValue(params.value ?? null), ctx)
  if (value === undefined) throw new ActionExecutionError('executionFailed', `'${type}' value did not evaluate`)
  return value
}

function requireIndex(type: string, params: StateObject, ctx: ActionExecutionContext): number {
  const raw = params.index
  if (raw === undefined) throw new ActionExecutionError('missingParameter', `'${type}' needs 'index'`)
  const index = asInt(typeof raw === 'string' ? ctx.evaluate(raw) : raw)
  if (index === undefined) throw new ActionExecutionError('invalidParameterType', `'${type}' index must be an integer`)
  return index
}

function handler(kind: string, execute: (params: StateObject, ctx: ActionExecutionContext) => void): ActionHandler {
  const run: ActionHandlerFn = (definition, ctx) => execute(customParameters(kind, definition), ctx)
  return { kind, execute: run }
}

export function arrayHandlers(): ActionHandler[] {
  return [
    handler('appendToArray', (params, ctx) => {
      ctx.store.append(requirePath('appendToArray', params), requireValue('appendToArray', params, ctx))
    }),
    handler('removeFromArray', (params, ctx) => {
      const path = requirePath('removeFromArray', params)
      if (Object.hasOwn(params, 'index')) ctx.store.removeAt(path, requireIndex('removeFromArray', params, ctx))
      else ctx.store.removeByValue(path, requireValue('removeFromArray', params, ctx))
    }),
    handler('toggleInArray', (params, ctx) => {
      ctx.store.toggleMembership(requirePath('toggleInArray', params), requireValue('toggleInArray', params, ctx))
    }),
    handler('setArrayItem', (params, ctx) => {
      const path = requirePath('setArrayItem', params)
      const index = requireIndex('setArrayItem', params, ctx)
      const current = ctx.store.getArray(path)
      if (!current || index < 0 || index >= current.length) {
        throw new ActionExecutionError('executionFailed', `'setArrayItem' index ${index} is outside '${path}'`)
      }
      ctx.store.set(`${path}.${index}`, requireValue('setArrayItem', params, ctx))
    }),
    handler('clearArray', (params, ctx) => {
      ctx.store.set(requirePath('clearArray', params), [])
    }),
  ]
}
