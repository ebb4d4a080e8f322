import type { Component } from '../../document/documentTypes'
import { resolveDimension } from '../../ir/converters'
import type { IRGradientStop, IRShape, IRUnitPoint } from '../../ir/irTypes'
import type { ComponentResolver } from '../../registry/registry'
import { parseColor } from '../../styles/color'
import { resolveNodeStyle } from '../nodeStyle'
import type { ResolutionContext } from '../resolutionContext'
import { resolveImageSource } from './imageSource'

export const resolveImage: ComponentResolver = ({ node, ctx }) => {
  const source = resolveImageSource(node.image, ctx)
  if (!source) throw ctx.fail('invalidNode', 'Image needs a source')
  const { style } = resolveNodeStyle(node, ctx)
  return {
    type: 'image',
    id: node.id ?? null,
    source,
    placeholder: resolveImageSource(node.image?.placeholder, ctx),
    loading: resolveImageSource(node.image?.loading, ctx),
    style,
  }
}

const UNIT_POINTS: Record<string, IRUnitPoint> = {
  topLeading: { x: 0, y: 0 },
  top: { x: 0.5, y: 0 },
  topTrailing: { x: 1, y: 0 },
  leading: { x: 0, y: 0.5 },
  center: { x: 0.5, y: 0.5 },
  trailing: { x: 1, y: 0.5 },
  bottomLeading: { x: 0, y: 1 },
  bottom: { x: 0.5, y: 1 },
  bottomTrailing: { x: 1, y: 1 },
}

function unitPoint(raw: string | undefined, fallback: IRUnitPoint): IRUnitPoint {
  return raw !== undefined && Object.hasOwn(UNIT_POINTS, raw) ? (UNIT_POINTS[raw] ?? fallback) : fallback
}

function gradientStops(node: Component): IRGradientStop[] {
  const stops = node.gradientColors ?? []
  const last = Math.max(1, stops.length - 1)
  return stops.map((stop, i) => {
    const light = parseColor(stop.color ?? stop.lightColor ?? '')
    const dark = stop.color !== undefined ? light : parseColor(stop.darkColor ?? '')
    return { light, dark, location: stop.location ?? (stops.length === 1 ? 0 : i / last) }
  })
}

export const resolveGradient: ComponentResolver = ({ node, ctx }) => {
  const { style } = resolveNodeStyle(node, ctx)
  return {
    type: 'gradient',
    id: node.id ?? null,
    stops: gradientStops(node),
    start: unitPoint(node.gradientStart, { x: 0.5, y: 0 }),
    end: unitPoint(node.gradientEnd, { x: 0.5, y: 1 }),
    style,
  }
}

function resolveShape(node: Component, cornerRadius: number, ctx: ResolutionContext): IRShape {
  switch (node.shapeType) {
    case 'rectangle':
      return { kind: 'rectangle' }
    case 'circle':
      return { kind: 'circle' }
    case 'roundedRectangle':
      return { kind: 'roundedRectangle', cornerRadius: node.cornerRadius ?? cornerRadius }
    case 'capsule':
      return { kind: 'capsule' }
    case 'ellipse':
      return { kind: 'ellipse' }
    case undefined:
      throw ctx.fail('invalidNode', "Shape needs a 'shapeType'")
  }
}

export const resolveShapeComponent: ComponentResolver = ({ node, ctx }) => {
  const { resolved, style } = resolveNodeStyle(node, ctx)
  return {
    type: 'shape',
    id: node.id ?? null,
    shape: resolveShape(node, style.cornerRadius, ctx),
    fillColor: parseColor(resolved.backgroundColor ?? '#000000'),
    style,
  }
}

export const resolveDivider: ComponentResolver = ({ node, ctx }) => {
  const { resolved, style } = resolveNodeStyle(node, ctx)
  const height = resolveDimension(resolved.height)
  return {
    type: 'divider',
    id: node.id ?? null,
    color: parseColor(resolved.backgroundColor ?? '#C6C6C8'),
    thickness: height?.kind === 'absolute' ? height.value : 1,
    style,
  }
}
