import { resolveAlignment } from '../../ir/converters'
import type { LayoutResolver } from '../../registry/registry'
import { resolveNodeStyle } from '../nodeStyle'

export const resolveContainer: LayoutResolver<'layout'> = ({ node, ctx }) => {
  const layout = node.layout
  const { style } = resolveNodeStyle(layout, ctx)
  return {
    type: 'container',
    id: layout.id ?? null,
    layout: layout.type,
    alignment: resolveAlignment(layout.alignment, layout.type),
    spacing: layout.spacing ?? 0,
    style,
    children: ctx.resolveChildren(layout.children),
  }
}
