import type { AlignmentValue, ContainerType, DimensionValue, EdgeInsetSpec, Padding } from '../document/documentTypes'
import { parseColor, parseOptionalColor } from '../styles/color'
import type { ResolvedStyle } from '../styles/resolvedStyle'
import type {
  IRAlignment,
  IRDimension,
  IREdgeInset,
  IREdgeInsets,
  IRFrame,
  IRHorizontalAlignment,
  IRNodeStyle,
  IRVerticalAlignment,
} from './irTypes'

export const ZERO_INSETS: IREdgeInsets = { top: 0, bottom: 0, leading: 0, trailing: 0 }

// Specific edge beats its axis shorthand, which beats `all`.
export function resolvePadding(padding: Padding | undefined, base: IREdgeInsets = ZERO_INSETS): IREdgeInsets {
  if (!padding) return base
  return {
    top: padding.top ?? padding.vertical ?? padding.all ?? base.top,
    bottom: padding.bottom ?? padding.vertical ?? padding.all ?? base.bottom,
    leading: padding.leading ?? padding.horizontal ?? padding.all ?? base.leading,
    trailing: padding.trailing ?? padding.horizontal ?? padding.all ?? base.trailing,
  }
}

export function resolveDimension(value: DimensionValue | undefined): IRDimension | null {
  if (value === undefined) return null
  if (typeof value === 'number') return { kind: 'absolute', value }
  if (value.fractional !== undefined) return { kind: 'fractional', value: value.fractional }
  if (value.absolute !== undefined) return { kind: 'absolute', value: value.absolute }
  return null
}

export function resolveFrame(style: ResolvedStyle): IRFrame {
  return {
    width: resolveDimension(style.width),
    height: resolveDimension(style.height),
    minWidth: resolveDimension(style.minWidth),
    minHeight: resolveDimension(style.minHeight),
    maxWidth: resolveDimension(style.maxWidth),
    maxHeight: resolveDimension(style.maxHeight),
  }
}

const NINE_POINT: Record<string, IRAlignment> = {
  topLeading: { horizontal: 'leading', vertical: 'top' },
  top: { horizontal: 'center', vertical: 'top' },
  topTrailing: { horizontal: 'trailing', vertical: 'top' },
  leading: { horizontal: 'leading', vertical: 'center' },
  center: { horizontal: 'center', vertical: 'center' },
  trailing: { horizontal: 'trailing', vertical: 'center' },
  bottomLeading: { horizontal: 'leading', vertical: 'bottom' },
  bottom: { horizontal: 'center', vertical: 'bottom' },
  bottomTrailing: { horizontal: 'trailing', vertical: 'bottom' },
}

export const CENTER: IRAlignment = { horizontal: 'center', vertical: 'center' }

export function toHorizontalAlignment(raw: string | undefined, fallback: IRHorizontalAlignment = 'center'): IRHorizontalAlignment {
  return raw === 'leading' || raw === 'center' || raw === 'trailing' ? raw : fallback
}

export function toVerticalAlignment(raw: string | undefined, fallback: IRVerticalAlignment = 'center'): IRVerticalAlignment {
  return raw === 'top' || raw === 'center' || raw === 'bottom' ? raw : fallback
}

// vstack strings name the horizontal axis, hstack strings the vertical one, zstack strings
// are nine-point shortcuts. Anything unrecognized centers.
export function resolveAlignment(value: AlignmentValue | undefined, layout: ContainerType): IRAlignment {
  if (value === undefined) return CENTER
  if (typeof value !== 'string') {
    return { horizontal: value.horizontal ?? 'center', vertical: value.vertical ?? 'center' }
  }
  switch (layout) {
    case 'vstack':
      return { horizontal: toHorizontalAlignment(value), vertical: 'center' }
    case 'hstack':
      return { horizontal: 'center', vertical: toVerticalAlignment(value) }
    case 'zstack':
      return Object.hasOwn(NINE_POINT, value) ? (NINE_POINT[value] ?? CENTER) : CENTER
  }
}

export function resolveEdgeInset(spec: EdgeInsetSpec | undefined): IREdgeInset | null {
  if (spec === undefined) return null
  if (typeof spec === 'number') return { positioning: 'safeArea', value: spec }
  return { positioning: spec.positioning, value: spec.value }
}

// Converts a folded style into render-tree form. `padding` on the node beats the style's.
export function toNodeStyle(style: ResolvedStyle, padding?: Padding): IRNodeStyle {
  const borderWidth = style.borderWidth ?? 0
  const shadow = style.shadow
  return {
    padding: resolvePadding(padding, resolvePadding(style.padding)),
    backgroundColor: parseOptionalColor(style.backgroundColor),
    cornerRadius: style.cornerRadius ?? 0,
    border: borderWidth > 0 ? { width: borderWidth, color: parseColor(style.borderColor ?? '#000000') } : null,
    shadow: shadow
      ? { color: parseColor(shadow.color ?? '#00000033'), radius: shadow.radius ?? 0, x: shadow.x ?? 0, y: shadow.y ?? 0 }
      : null,
    tintColor: parseOptionalColor(style.tintColor),
    frame: resolveFrame(style),
  }
}
