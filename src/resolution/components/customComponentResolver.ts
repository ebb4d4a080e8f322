import { containsExpression } from '../../bindings/expressionEvaluator'
import type { ComponentResolver } from '../../registry/registry'
import { toStateValue, type StateObject } from '../../state/stateValue'
import { resolveNodeStyle } from '../nodeStyle'

const COMMON_KEYS = new Set(['type', 'id', 'styleId', 'style', 'padding'])

// Register under a host component type to pass its extra properties through as a `custom`
// node. String properties containing `${…}` are interpolated.
export const resolveCustomComponent: ComponentResolver = ({ node, ctx }) => {
  const { style } = resolveNodeStyle(node, ctx)
  const properties: StateObject = {}
  for (const [key, raw] of Object.entries(node)) {
    if (COMMON_KEYS.has(key)) continue
    const value = toStateValue(raw)
    if (value === undefined) continue
    properties[key] = typeof value === 'string' && containsExpression(value) ? ctx.interpolate(value) : value
  }
  return { type: 'custom', id: node.id ?? null, customType: node.type, properties, style }
}
