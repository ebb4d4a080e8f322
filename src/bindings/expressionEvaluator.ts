import type { Log } from '../log'
import type { StateReader } from '../state/stateStore'
import { asArray, asBool, asInt, stateValuesEqual, stringifyValue, type StateValue } from '../state/stateValue'

// Small fixed grammar, evaluated without `eval`:
//   ${path}                     value at path
//   ${path} + N, ${path} - N    single-step integer arithmetic
//   cond ? 'a' : "b"            cond is path, !path, true, false or an array test
//   path.count / .isEmpty / .first / .last / .contains(x), path[i]
//   "text ${path} text"         template interpolation
// Anything else evaluates to undefined.

export type EvalOptions = {
  log?: Log
}

const MAX_DEPTH = 64

const PATH = String.raw`[A-Za-z_][\w]*(?:\.[\w]+|\[\d+\])*`
const PATH_RE = new RegExp(`^${PATH}$`)
const ARITH_RE = new RegExp(String.raw`^(?:\$\{\s*(${PATH})\s*\}|(${PATH}))\s*([+-])\s*(\d+)$`)
const ACCESSOR_RE = new RegExp(`^(${PATH})\\.(count|isEmpty|first|last)$`)
const CONTAINS_RE = new RegExp(String.raw`^(${PATH})\.contains\(([\s\S]*)\)$`)
const VAR_INDEX_RE = new RegExp(String.raw`^(${PATH})\[([A-Za-z_][\w]*)\]$`)
const NUMBER_RE = /^-?\d+(?:\.\d+)?$/
const TEMPLATE_RE = /\$\{([^}]+)\}/g

export function containsExpression(s: string): boolean {
  return s.includes('${') && s.includes('}')
}

export function isPureExpression(s: string): boolean {
  const t = s.trim()
  return t.startsWith('${') && t.endsWith('}')
}

export function unwrapExpression(s: string): string | null {
  if (!isPureExpression(s)) return null
  const t = s.trim()
  return t.slice(2, -1).trim()
}

export function evaluate(expr: string, reader: StateReader, options: EvalOptions = {}): StateValue | undefined {
  return evalAt(String(expr ?? ''), reader, options, 0)
}

export function interpolate(template: string, reader: StateReader, options: EvalOptions = {}): string {
  return interpolateAt(String(template ?? ''), reader, options, 0)
}

// Evaluates a ternary / standalone condition. Only booleans count as true.
export function evaluateCondition(expr: string, reader: StateReader, options: EvalOptions = {}): boolean {
  return conditionAt(expr, reader, options, 0)
}

function interpolateAt(template: string, reader: StateReader, options: EvalOptions, depth: number): string {
  return template.replace(TEMPLATE_RE, (_, inner: string) => stringifyValue(evalAt(inner, reader, options, depth + 1)))
}

function evalAt(raw: string, reader: StateReader, options: EvalOptions, depth: number): StateValue | undefined {
  if (depth > MAX_DEPTH) return undefined
  const s = raw.trim()
  if (!s) return undefined

  const literal = parseLiteral(s)
  if (literal !== undefined) return literal

  const ternary = splitTernary(s)
  if (ternary) {
    const branch = conditionAt(ternary.cond, reader, options, depth + 1) ? ternary.whenTrue : ternary.whenFalse
    return evalAt(branch, reader, options, depth + 1)
  }

  const inner = unwrapExpression(s)
  if (inner !== null && !inner.includes('${')) return evalAt(inner, reader, options, depth + 1)

  const arith = s.match(ARITH_RE)
  if (arith) {
    const path = arith[1] ?? arith[2] ?? ''
    const operand = reader.get(path)
    if (typeof operand !== 'number') {
      options.log?.(`[expr] '${path}' is not a number in '${s}'`)
      return undefined
    }
    const n = Number(arith[4])
    return arith[3] === '+' ? operand + n : operand - n
  }

  if (s.startsWith('!')) return !conditionAt(s.slice(1), reader, options, depth + 1)

  const accessor = evalArrayAccessor(s, reader, options, depth)
  if (accessor.matched) return accessor.value

  if (PATH_RE.test(s)) return reader.get(s)

  if (containsExpression(s)) return interpolateAt(s, reader, options, depth)

  options.log?.(`[expr] Unrecognized expression: ${s}`)
  return undefined
}

function conditionAt(raw: string, reader: StateReader, options: EvalOptions, depth: number): boolean {
  const s = raw.trim()
  if (s === 'true') return true
  if (s === 'false') return false
  if (s.startsWith('!')) return !conditionAt(s.slice(1), reader, options, depth + 1)
  return asBool(evalAt(s, reader, options, depth + 1)) ?? false
}

type AccessorResult = { matched: true; value: StateValue | undefined } | { matched: false }

function evalArrayAccessor(s: string, reader: StateReader, options: EvalOptions, depth: number): AccessorResult {
  const acc = s.match(ACCESSOR_RE)
  if (acc) {
    const base = reader.get(acc[1] ?? '')
    // `stats.count` on an object is a plain path
    if (base !== undefined && !Array.isArray(base)) return { matched: true, value: reader.get(s) }
    const arr = asArray(base) ?? []
    switch (acc[2]) {
      case 'count':
        return { matched: true, value: arr.length }
      case 'isEmpty':
        return { matched: true, value: arr.length === 0 }
      case 'first':
        return { matched: true, value: arr[0] }
      case 'last':
        return { matched: true, value: arr[arr.length - 1] }
    }
  }

  const contains = s.match(CONTAINS_RE)
  if (contains) {
    const arr = asArray(reader.get(contains[1] ?? ''))
    const needle = evalAt(contains[2] ?? '', reader, options, depth + 1)
    if (!arr || needle === undefined) return { matched: true, value: false }
    return { matched: true, value: arr.some((item) => stateValuesEqual(item, needle)) }
  }

  const indexed = s.match(VAR_INDEX_RE)
  if (indexed) {
    const arr = asArray(reader.get(indexed[1] ?? ''))
    const index = asInt(reader.get(indexed[2] ?? ''))
    if (!arr || index === undefined || index < 0) return { matched: true, value: undefined }
    return { matched: true, value: arr[index] }
  }

  return { matched: false }
}

function parseLiteral(s: string): StateValue | undefined {
  const quoted = s.match(/^'([^']*)'$/) ?? s.match(/^"([^"]*)"$/)
  if (quoted) return quoted[1] ?? ''
  if (s === 'true') return true
  if (s === 'false') return false
  if (s === 'null') return null
  if (NUMBER_RE.test(s)) return Number(s)
  return undefined
}

// Finds `cond ? a : b` at the top level, ignoring `?`/`:` inside quotes and `${…}`.
function splitTernary(s: string): { cond: string; whenTrue: string; whenFalse: string } | null {
  let quote: string | null = null
  let braces = 0
  let question = -1

  for (let i = 0; i < s.length; i++) {
    const ch = s[i]
    if (quote) {
      if (ch === quote) quote = null
      continue
    }
    if (ch === "'" || ch === '"') quote = ch
    else if (ch === '{') braces++
    else if (ch === '}') braces = Math.max(0, braces - 1)
    else if (braces === 0 && ch === '?' && question < 0) question = i
    else if (braces === 0 && ch === ':' && question >= 0) {
      return {
        cond: s.slice(0, question).trim(),
        whenTrue: s.slice(question + 1, i).trim(),
        whenFalse: s.slice(i + 1).trim(),
      }
    }
  }
  return null
}
