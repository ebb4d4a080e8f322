import type { Padding, Style } from '../document/documentTypes'
import { toNodeStyle } from '../ir/converters'
import type { IRNodeStyle, IRTextAppearance } from '../ir/irTypes'
import { BLACK, parseColor } from '../styles/color'
import type { ResolvedStyle } from '../styles/resolvedStyle'
import type { ResolutionContext } from './resolutionContext'

export const DEFAULT_FONT_SIZE = 17

export type StyledNode = {
  styleId?: string
  style?: Style
  padding?: Padding
}

export type NodeStyle = {
  resolved: ResolvedStyle
  style: IRNodeStyle
  appearance: IRTextAppearance
}

export function textAppearance(style: ResolvedStyle): IRTextAppearance {
  return {
    font: { family: style.fontFamily ?? null, size: style.fontSize ?? DEFAULT_FONT_SIZE, weight: style.fontWeight ?? 'regular' },
    textColor: style.textColor === undefined ? BLACK : parseColor(style.textColor),
    textAlignment: style.textAlignment ?? 'leading',
  }
}

export function resolveNodeStyle(node: StyledNode, ctx: ResolutionContext, styleId: string | undefined = node.styleId): NodeStyle {
  const resolved = ctx.resolveStyle(styleId, node.style)
  return {
    resolved,
    style: toNodeStyle(resolved, node.padding),
    appearance: textAppearance(resolved),
  }
}
