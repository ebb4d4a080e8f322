import { unwrapExpression } from '../../bindings/expressionEvaluator'
import type { ForEach } from '../../document/documentTypes'
import { resolveAlignment, toNodeStyle } from '../../ir/converters'
import type { ContainerNode, RenderNode } from '../../ir/irTypes'
import type { LayoutResolver } from '../../registry/registry'
import { asArray } from '../../state/stateValue'
import { EMPTY_STYLE } from '../../styles/resolvedStyle'

function repeaterContainer(f: ForEach, children: RenderNode[]): ContainerNode {
  return {
    type: 'container',
    id: f.id ?? null,
    layout: f.layout,
    alignment: resolveAlignment(f.alignment, f.layout),
    spacing: f.spacing ?? 0,
    style: toNodeStyle(EMPTY_STYLE, f.padding),
    children,
  }
}

// One template instance per array element. Loop variables shadow outer names for that
// instance only; an empty array renders `emptyView` in place of the container.
export const resolveForEach: LayoutResolver<'forEach'> = ({ node, ctx }) => {
  const f = node.forEach
  const items = asArray(ctx.read(unwrapExpression(f.items) ?? f.items)) ?? []

  if (items.length === 0) {
    const empty = f.emptyView ? ctx.resolveNode(f.emptyView, 'emptyView', { kind: 'self' }) : null
    return empty ?? repeaterContainer(f, [])
  }

  const children: RenderNode[] = []
  items.forEach((item, index) => {
    const scoped = ctx.withScope({ [f.itemVariable]: item, [f.indexVariable]: index })
    const out = scoped.resolveNode(f.template, `template[${index}]`, { kind: 'child', index: children.length })
    if (out) children.push(out)
  })
  return repeaterContainer(f, children)
}
