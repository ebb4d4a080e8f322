// Values held by the state store and produced by expressions. Closed JSON union;
// `undefined` is reserved for "absent".
export type StateValue = null | boolean | number | string | StateValue[] | StateObject
export type StateObject = { [key: string]: StateValue }

export type StateValueKind = 'null' | 'bool' | 'int' | 'double' | 'string' | 'array' | 'object'

export function kindOf(v: StateValue): StateValueKind {
  if (v === null) return 'null'
  if (typeof v === 'boolean') return 'bool'
  if (typeof v === 'number') return Number.isInteger(v) ? 'int' : 'double'
  if (typeof v === 'string') return 'string'
  if (Array.isArray(v)) return 'array'
  return 'object'
}

export function isStateObject(v: StateValue | undefined): v is StateObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

export function asString(v: StateValue | undefined): string | undefined {
  return typeof v === 'string' ? v : undefined
}

export function asNumber(v: StateValue | undefined): number | undefined {
  return typeof v === 'number' ? v : undefined
}

export function asInt(v: StateValue | undefined): number | undefined {
  return typeof v === 'number' && Number.isInteger(v) ? v : undefined
}

export function asBool(v: StateValue | undefined): boolean | undefined {
  return typeof v === 'boolean' ? v : undefined
}

export function asArray(v: StateValue | undefined): StateValue[] | undefined {
  return Array.isArray(v) ? v : undefined
}

export function asObject(v: StateValue | undefined): StateObject | undefined {
  return isStateObject(v) ? v : undefined
}

export function stringifyValue(v: StateValue | undefined): string {
  if (v === undefined || v === null) return ''
  if (typeof v === 'string') return v
  if (typeof v === 'number' || typeof v === 'boolean') return String(v)
  return JSON.stringify(v)
}

export function stateValuesEqual(a: StateValue | undefined, b: StateValue | undefined): boolean {
  if (a === b) return true
  if (a === undefined || b === undefined || a === null || b === null) return false
  if (Array.isArray(a)) {
    const other = asArray(b)
    if (!other || a.length !== other.length) return false
    return a.every((item, i) => stateValuesEqual(item, other[i]))
  }
  const left = asObject(a)
  const right = asObject(b)
  if (!left || !right) return false
  const keys = Object.keys(left)
  if (keys.length !== Object.keys(right).length) return false
  return keys.every((k) => k in right && stateValuesEqual(left[k], right[k]))
}

// Converts host-supplied data into a state value. Functions, symbols and non-finite
// numbers have no state representation.
export function toStateValue(raw: unknown): StateValue | undefined {
  if (raw === null) return null
  if (typeof raw === 'boolean' || typeof raw === 'string') return raw
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : undefined
  if (Array.isArray(raw)) {
    return raw.map((item: unknown) => toStateValue(item) ?? null)
  }
  if (typeof raw === 'object') {
    const out: StateObject = {}
    for (const [key, item] of Object.entries(raw)) {
      const v = toStateValue(item)
      if (v !== undefined) out[key] = v
    }
    return out
  }
  return undefined
}
