import { createStore, type StoreApi } from 'zustand/vanilla'
import type { Log } from '../log'
import { canonicalPath, exceedsIndexGap, getByPath, parseKeyPath, pathsOverlap, setByPath } from './keyPath'
import { asArray, stateValuesEqual, type StateObject, type StateValue } from './stateValue'

export type StateChange = {
  path: string
  oldValue: StateValue | undefined
  newValue: StateValue | undefined
}

export type StateChangeCallback = (change: StateChange) => void
export type Unsubscribe = () => void

export type StateReader = {
  get: (path: string) => StateValue | undefined
}

export type StateAccessRecorder = {
  recordRead: (path: string) => void
  recordWrite: (path: string) => void
}

type StoreState = {
  values: StateObject
  changes: StateChange[]
}

type Update = { value: StateValue | undefined } | null

export type StateStoreOptions = {
  log?: Log
}

export class StateStoreReentrancyError extends Error {
  constructor(path: string) {
    super(`Cannot write "${path}" while a state change is being delivered`)
    this.name = 'StateStoreReentrancyError'
  }
}

export class StateStore implements StateReader {
  private readonly store: StoreApi<StoreState>
  private readonly dirty = new Set<string>()
  private recorder: StateAccessRecorder | null = null
  private locked = false
  private delivering = 0

  constructor(
    initial: Record<string, StateValue> = {},
    private readonly options: StateStoreOptions = {},
  ) {
    this.store = createStore<StoreState>()(() => ({ values: { ...initial }, changes: [] }))
  }

  // Seeds values without marking them dirty or notifying.
  initialize(state: Record<string, StateValue> | undefined): void {
    if (!state) return
    this.assertWritable('<initialize>')
    const values = { ...this.store.getState().values, ...state }
    this.store.setState({ values, changes: [] })
  }

  get(path: string): StateValue | undefined {
    const canonical = canonicalPath(path)
    if (!canonical) return undefined
    this.recorder?.recordRead(canonical)
    return getByPath(this.store.getState().values, canonical)
  }

  getArray(path: string): StateValue[] | undefined {
    return asArray(this.get(path))
  }

  arrayCount(path: string): number {
    return this.getArray(path)?.length ?? 0
  }

  arrayContains(path: string, value: StateValue): boolean {
    return (this.getArray(path) ?? []).some((item) => stateValuesEqual(item, value))
  }

  set(path: string, value: StateValue | undefined): void {
    this.write(path, () => ({ value }))
  }

  append(path: string, value: StateValue): void {
    this.write(path, (cur) => ({ value: [...(asArray(cur) ?? []), value] }))
  }

  removeByValue(path: string, value: StateValue): void {
    this.write(path, (cur) => {
      const arr = asArray(cur)
      if (!arr) return null
      return { value: arr.filter((item) => !stateValuesEqual(item, value)) }
    })
  }

  removeAt(path: string, index: number): void {
    this.write(path, (cur) => {
      const arr = asArray(cur)
      if (!arr || !Number.isInteger(index) || index < 0 || index >= arr.length) return null
      return { value: arr.filter((_, i) => i !== index) }
    })
  }

  toggleMembership(path: string, value: StateValue): void {
    this.write(path, (cur) => {
      const arr = asArray(cur) ?? []
      const at = arr.findIndex((item) => stateValuesEqual(item, value))
      return { value: at >= 0 ? arr.filter((_, i) => i !== at) : [...arr, value] }
    })
  }

  observe(path: string, callback: StateChangeCallback): Unsubscribe {
    const watched = canonicalPath(path)
    return this.store.subscribe((state) => {
      for (const change of state.changes) {
        if (pathsOverlap(change.path, watched)) this.deliver(callback, change)
      }
    })
  }

  onStateChange(callback: StateChangeCallback): Unsubscribe {
    return this.store.subscribe((state) => {
      for (const change of state.changes) this.deliver(callback, change)
    })
  }

  get hasDirtyPaths(): boolean {
    return this.dirty.size > 0
  }

  isDirty(path: string): boolean {
    for (const p of this.dirty) {
      if (pathsOverlap(p, path)) return true
    }
    return false
  }

  consumeDirtyPaths(): Set<string> {
    const out = new Set(this.dirty)
    this.dirty.clear()
    return out
  }

  clearDirtyPaths(): void {
    this.dirty.clear()
  }

  // Detached copy; editing it does not touch the store.
  snapshot(): StateObject {
    return structuredClone(this.store.getState().values)
  }

  restore(snapshot: StateObject): void {
    this.assertWritable('<restore>')
    const previous = this.store.getState().values
    const values = structuredClone(snapshot)
    const keys = new Set([...Object.keys(previous), ...Object.keys(values)])
    const changes: StateChange[] = []
    for (const key of keys) {
      const oldValue = Object.hasOwn(previous, key) ? previous[key] : undefined
      const newValue = Object.hasOwn(values, key) ? values[key] : undefined
      if (stateValuesEqual(oldValue, newValue)) continue
      changes.push({ path: key, oldValue, newValue })
      this.dirty.add(key)
    }
    this.store.setState({ values, changes })
  }

  // Attributes every subsequent read/write to `recorder` until the returned function runs.
  attachRecorder(recorder: StateAccessRecorder): () => void {
    const previous = this.recorder
    this.recorder = recorder
    return () => {
      this.recorder = previous
    }
  }

  private write(path: string, update: (current: StateValue | undefined) => Update): void {
    const canonical = canonicalPath(path)
    if (!canonical || typeof parseKeyPath(canonical)[0] !== 'string') return
    this.assertWritable(canonical)
    if (exceedsIndexGap(this.store.getState().values, canonical)) {
      this.options.log?.(`[state] Skipped write to '${canonical}': index too far past the end of the array`)
      return
    }

    this.locked = true
    let change: StateChange | null = null
    let values = this.store.getState().values
    try {
      const oldValue = getByPath(values, canonical)
      const next = update(oldValue)
      if (next) {
        values = setByPath(values, canonical, next.value)
        change = { path: canonical, oldValue, newValue: next.value }
        this.dirty.add(canonical)
      }
    } finally {
      this.locked = false
    }

    if (!change) return
    this.recorder?.recordWrite(canonical)
    this.store.setState({ values, changes: [change] })
  }

  private deliver(callback: StateChangeCallback, change: StateChange): void {
    this.delivering++
    try {
      callback(change)
    } finally {
      this.delivering--
    }
  }

  private assertWritable(path: string): void {
    if (this.locked || this.delivering > 0) throw new StateStoreReentrancyError(path)
  }
}
