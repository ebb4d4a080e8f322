import { unwrapExpression } from '../../bindings/expressionEvaluator'
import type { ComponentResolver } from '../../registry/registry'
import { asBool, asNumber } from '../../state/stateValue'
import { parseColor } from '../../styles/color'
import { resolveBoundValue, resolveContent, resolveNumber } from '../contentResolver'
import { resolveNodeStyle } from '../nodeStyle'

export const resolveToggle: ComponentResolver = ({ node, ctx }) => {
  const { style, appearance } = resolveNodeStyle(node, ctx)
  return {
    type: 'toggle',
    id: node.id ?? null,
    label: resolveContent(node, ctx),
    isOn: asBool(resolveBoundValue(node, ctx)) ?? false,
    bindingPath: node.bind ?? null,
    appearance,
    style,
    onValueChanged: ctx.actionBinding(node.actions?.onValueChanged),
  }
}

export const resolveSlider: ComponentResolver = ({ node, ctx }) => {
  const { style } = resolveNodeStyle(node, ctx)
  const minValue = node.minValue ?? 0
  const maxValue = node.maxValue ?? 1
  const raw = asNumber(resolveBoundValue(node, ctx)) ?? minValue
  return {
    type: 'slider',
    id: node.id ?? null,
    value: Math.min(maxValue, Math.max(minValue, raw)),
    minValue,
    maxValue,
    bindingPath: node.bind ?? null,
    style,
    onValueChanged: ctx.actionBinding(node.actions?.onValueChanged),
  }
}

export const resolvePageIndicator: ComponentResolver = ({ node, ctx }) => {
  const { style } = resolveNodeStyle(node, ctx)
  const pageCount = node.pageCount ?? 0
  const current = resolveNumber(node.currentPage, ctx) ?? 0
  const binding = typeof node.currentPage === 'string' ? (unwrapExpression(node.currentPage) ?? node.currentPage) : null
  return {
    type: 'pageIndicator',
    id: node.id ?? null,
    currentPage: Math.max(0, Math.min(Math.trunc(current), pageCount - 1)),
    currentPageBinding: binding,
    pageCount,
    dotSize: node.dotSize ?? 8,
    dotSpacing: node.dotSpacing ?? 8,
    dotColor: parseColor(node.dotColor ?? '#C7C7CC'),
    currentDotColor: parseColor(node.currentDotColor ?? '#000000'),
    style,
  }
}
