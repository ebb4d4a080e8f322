import { isStateObject, type StateObject, type StateValue } from './stateValue'

export type PathSegment = string | number

const SEGMENT_RE = /\[(\d+)\]|([^.[\]]+)/g

// Accepts `user.name`, `items[0].title` and `items.0.title`.
export function parseKeyPath(path: string): PathSegment[] {
  const raw = String(path ?? '').trim()
  if (!raw) return []

  const out: PathSegment[] = []
  for (const m of raw.matchAll(SEGMENT_RE)) {
    if (m[1] !== undefined) {
      out.push(Number(m[1]))
      continue
    }
    const key = (m[2] ?? '').trim()
    if (!key) continue
    out.push(/^\d+$/.test(key) ? Number(key) : key)
  }
  return out
}

export function canonicalPath(path: string): string {
  return parseKeyPath(path).join('.')
}

export function rootKey(path: string): string | null {
  const first = parseKeyPath(path)[0]
  return typeof first === 'string' ? first : null
}

export function parentPaths(path: string): string[] {
  const segments = parseKeyPath(path)
  const out: string[] = []
  for (let i = 1; i < segments.length; i++) out.push(segments.slice(0, i).join('.'))
  return out
}

// True when one path addresses the other or something inside it.
export function pathsOverlap(a: string, b: string): boolean {
  const left = parseKeyPath(a)
  const right = parseKeyPath(b)
  if (left.length === 0 || right.length === 0) return false
  const n = Math.min(left.length, right.length)
  for (let i = 0; i < n; i++) {
    if (String(left[i]) !== String(right[i])) return false
  }
  return true
}

export function getIn(value: StateValue | undefined, segments: PathSegment[]): StateValue | undefined {
  let cur = value
  for (const seg of segments) {
    if (cur === undefined) return undefined
    if (typeof seg === 'number') {
      cur = Array.isArray(cur) && seg < cur.length ? cur[seg] : undefined
    } else {
      cur = isStateObject(cur) && Object.hasOwn(cur, seg) ? cur[seg] : undefined
    }
  }
  return cur
}

export function getByPath(root: StateObject, path: string): StateValue | undefined {
  const segments = parseKeyPath(path)
  if (segments.length === 0) return undefined
  return getIn(root, segments)
}

function setIn(container: StateValue | undefined, segments: PathSegment[], index: number, value: StateValue | undefined): StateValue {
  const seg = segments[index]
  const isLast = index === segments.length - 1

  if (typeof seg === 'number') {
    const arr = Array.isArray(container) ? [...container] : []
    while (arr.length <= seg) arr.push(null)
    arr[seg] = isLast ? value ?? null : setIn(arr[seg], segments, index + 1, value)
    return arr
  }

  const obj: StateObject = isStateObject(container) ? { ...container } : {}
  if (isLast) {
    if (value === undefined) delete obj[seg]
    else obj[seg] = value
    return obj
  }
  obj[seg] = setIn(Object.hasOwn(obj, seg) ? obj[seg] : undefined, segments, index + 1, value)
  return obj
}

// Largest number of null slots a single write may pad an array with.
export const MAX_INDEX_GAP = 1024

// True when writing `path` would index past the end of an array by more than MAX_INDEX_GAP.
export function exceedsIndexGap(root: StateObject, path: string): boolean {
  let cur: StateValue | undefined = root
  for (const seg of parseKeyPath(path)) {
    if (typeof seg === 'number') {
      const length = Array.isArray(cur) ? cur.length : 0
      if (seg > length + MAX_INDEX_GAP) return true
      cur = Array.isArray(cur) && seg < cur.length ? cur[seg] : undefined
    } else {
      cur = isStateObject(cur) && Object.hasOwn(cur, seg) ? cur[seg] : undefined
    }
  }
  return false
}

// Returns a copy of `root` with `value` written at `path`; `undefined` removes the key.
// Untouched branches are shared with the input. Writes past MAX_INDEX_GAP leave `root` as is.
export function setByPath(root: StateObject, path: string, value: StateValue | undefined): StateObject {
  const segments = parseKeyPath(path)
  if (segments.length === 0 || typeof segments[0] === 'number') return root
  if (exceedsIndexGap(root, path)) return root
  const next = setIn(root, segments, 0, value)
  return isStateObject(next) ? next : root
}
