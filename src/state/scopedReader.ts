import { getIn, parseKeyPath } from './keyPath'
import type { StateReader } from './stateStore'
import type { StateValue } from './stateValue'

// Loop variables and other names bound for one subtree; they shadow store keys of the same name.
export type ScopeBindings = Readonly<Record<string, StateValue>>

export const EMPTY_SCOPE: ScopeBindings = Object.freeze({})

export function scopedReader(store: StateReader, scope: ScopeBindings): StateReader {
  if (Object.keys(scope).length === 0) return store
  return {
    get: (path) => {
      const segments = parseKeyPath(path)
      const head = segments[0]
      if (typeof head === 'string' && Object.hasOwn(scope, head)) return getIn(scope[head], segments.slice(1))
      return store.get(path)
    },
  }
}
