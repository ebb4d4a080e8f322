import type { DimensionValue, FontWeight, Padding, ShadowSpec, Style } from '../document/documentTypes'

// Transient result of folding an inheritance chain. Never stored in the render tree.
export type ResolvedStyle = {
  fontFamily?: string
  fontSize?: number
  fontWeight?: FontWeight
  textColor?: string
  textAlignment?: 'leading' | 'center' | 'trailing'
  backgroundColor?: string
  cornerRadius?: number
  borderWidth?: number
  borderColor?: string
  tintColor?: string
  shadow?: ShadowSpec
  padding?: Padding
  width?: DimensionValue
  height?: DimensionValue
  minWidth?: DimensionValue
  minHeight?: DimensionValue
  maxWidth?: DimensionValue
  maxHeight?: DimensionValue
}

export const EMPTY_STYLE: ResolvedStyle = Object.freeze({})

const SCALAR_KEYS = [
  'fontFamily',
  'fontSize',
  'fontWeight',
  'textColor',
  'textAlignment',
  'backgroundColor',
  'cornerRadius',
  'borderWidth',
  'borderColor',
  'tintColor',
] as const

const DIMENSION_KEYS = ['width', 'height', 'minWidth', 'minHeight', 'maxWidth', 'maxHeight'] as const

const SHADOW_KEYS = ['color', 'radius', 'x', 'y'] as const
const PADDING_KEYS = ['top', 'bottom', 'leading', 'trailing', 'horizontal', 'vertical', 'all'] as const

// An explicitly present composite with every sub-field absent clears the inherited value.
export function isClearSentinel<T extends object>(value: T | undefined, keys: readonly (keyof T)[]): boolean {
  return value !== undefined && keys.every((k) => value[k] === undefined)
}

function mergeComposite<T extends object>(inherited: T | undefined, own: T | undefined, keys: readonly (keyof T)[]): T | undefined {
  if (own === undefined) return inherited
  if (isClearSentinel(own, keys)) return undefined
  const out: T = { ...(inherited ?? own) }
  for (const k of keys) {
    if (own[k] !== undefined) out[k] = own[k]
  }
  return out
}

type Edge = 'top' | 'bottom' | 'leading' | 'trailing'

const EDGE_AXES: ReadonlyArray<[Edge, 'vertical' | 'horizontal']> = [
  ['top', 'vertical'],
  ['bottom', 'vertical'],
  ['leading', 'horizontal'],
  ['trailing', 'horizontal'],
]

function edgeOf(padding: Padding | undefined, edge: Edge, axis: 'vertical' | 'horizontal'): number | undefined {
  return padding?.[edge] ?? padding?.[axis] ?? padding?.all
}

// Padding folds per resolved edge: whatever `own` says about an edge, through any shorthand,
// replaces the inherited edge.
function mergePadding(inherited: Padding | undefined, own: Padding | undefined): Padding | undefined {
  if (own === undefined) return inherited
  if (isClearSentinel(own, PADDING_KEYS)) return undefined
  const out: Padding = {}
  for (const [edge, axis] of EDGE_AXES) {
    const value = edgeOf(own, edge, axis) ?? edgeOf(inherited, edge, axis)
    if (value !== undefined) out[edge] = value
  }
  return out
}

// Applies `own` on top of `inherited`: scalars overwrite, dimensions replace wholesale and
// shadow merges per sub-field and padding per edge unless `own` carries the clear sentinel.
export function mergeStyle(inherited: ResolvedStyle, own: Style | ResolvedStyle | undefined): ResolvedStyle {
  if (!own) return inherited
  const out: ResolvedStyle = { ...inherited }

  for (const k of SCALAR_KEYS) assignDefined(out, own, k)
  for (const k of DIMENSION_KEYS) assignDefined(out, own, k)

  const shadow = mergeComposite(inherited.shadow, own.shadow, SHADOW_KEYS)
  if (shadow === undefined) delete out.shadow
  else out.shadow = shadow

  const padding = mergePadding(inherited.padding, own.padding)
  if (padding === undefined) delete out.padding
  else out.padding = padding

  return out
}

function assignDefined<K extends keyof ResolvedStyle>(target: ResolvedStyle, source: ResolvedStyle, key: K) {
  const value = source[key]
  if (value !== undefined) target[key] = value
}

// Folds a root→leaf chain of styles.
export function foldStyles(chain: Array<Style | ResolvedStyle>): ResolvedStyle {
  return chain.reduce<ResolvedStyle>((acc, style) => mergeStyle(acc, style), EMPTY_STYLE)
}
