import { describe, expect, it } from 'vitest'
import { StateStore } from '../../state/stateStore'
import { scopedReader } from '../../state/scopedReader'
import { containsExpression, evaluate, evaluateCondition, interpolate, isPureExpression, unwrapExpression } from '../expressionEvaluator'

describe('expressionEvaluator', () => {
  const store = new StateStore({
    count: 5,
    zero: 0,
    name: 'John',
    isOn: true,
    items: ['a', 'b', 'c'],
    tags: ['ios', 'web'],
    stats: { count: 42 },
    user: { name: 'Ada' },
  })

  it('does single-step integer arithmetic', () => {
    expect(evaluate('${count} + 3', store)).toBe(8)
    expect(evaluate('${zero} - 1', store)).toBe(-1)
    expect(evaluate('count + 1', store)).toBe(6)
  })

  it('logs and yields undefined when the operand is not a number', () => {
    const logs: string[] = []
    expect(evaluate('${name} + 1', store, { log: (m) => logs.push(m) })).toBeUndefined()
    expect(logs).toEqual(["[expr] 'name' is not a number in '${name} + 1'"])
  })

  it('interpolates templates', () => {
    expect(interpolate('Hello ${name}!', store)).toBe('Hello John!')
    expect(interpolate('${user.name} has ${items.count} items', store)).toBe('Ada has 3 items')
    expect(interpolate('Missing: [${nope}]', store)).toBe('Missing: []')
  })

  it('supports array accessors', () => {
    expect(evaluate('${items.count}', store)).toBe(3)
    expect(evaluate('items.isEmpty', store)).toBe(false)
    expect(evaluate('items.first', store)).toBe('a')
    expect(evaluate('items.last', store)).toBe('c')
    expect(evaluate("${tags.contains('ios')}", store)).toBe(true)
    expect(evaluate("tags.contains('android')", store)).toBe(false)
    expect(evaluate('missing.count', store)).toBe(0)
  })

  it('reads .count on an object as a plain key', () => {
    expect(evaluate('stats.count', store)).toBe(42)
  })

  it('evaluates ternaries on booleans only', () => {
    expect(evaluate("${isOn} ? 'On' : 'Off'", store)).toBe('On')
    expect(evaluate("!isOn ? 'On' : 'Off'", store)).toBe('Off')
    expect(evaluate("count ? 'yes' : 'no'", store)).toBe('no')
    expect(evaluateCondition('items.isEmpty', store)).toBe(false)
  })

  it('parses literals', () => {
    expect(evaluate("'hi'", store)).toBe('hi')
    expect(evaluate('12.5', store)).toBe(12.5)
    expect(evaluate('null', store)).toBeNull()
  })

  it('indexes with a scoped variable', () => {
    const reader = scopedReader(store, { i: 1 })
    expect(evaluate('items[i]', reader)).toBe('b')
    expect(evaluate('items[1]', reader)).toBe('b')
  })

  it('recognizes expression strings', () => {
    expect(containsExpression('a ${b}')).toBe(true)
    expect(containsExpression('plain')).toBe(false)
    expect(isPureExpression(' ${count} ')).toBe(true)
    expect(isPureExpression('x ${count}')).toBe(false)
    expect(unwrapExpression('${ items }')).toBe('items')
  })

  it('logs unrecognized input', () => {
    const logs: string[] = []
    expect(evaluate('count * 2', store, { log: (m) => logs.push(m) })).toBeUndefined()
    expect(logs).toEqual(['[expr] Unrecognized expression: count * 2'])
  })
})
