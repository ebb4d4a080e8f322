import type { Component } from '../../document/documentTypes'
import type { ButtonStateStyle } from '../../ir/irTypes'
import type { ComponentResolver } from '../../registry/registry'
import { stringifyValue } from '../../state/stateValue'
import { resolveBoundValue, resolveContent } from '../contentResolver'
import { resolveNodeStyle } from '../nodeStyle'
import type { ResolutionContext } from '../resolutionContext'
import { resolveImageSource } from './imageSource'

export const resolveLabel: ComponentResolver = ({ node, ctx }) => {
  const { style, appearance } = resolveNodeStyle(node, ctx)
  return { type: 'text', id: node.id ?? null, content: resolveContent(node, ctx), appearance, style }
}

function stateStyle(node: Component, styleId: string | undefined, ctx: ResolutionContext): ButtonStateStyle | null {
  if (styleId === undefined) return null
  const { style, appearance } = resolveNodeStyle(node, ctx, styleId)
  return { style, appearance }
}

export const resolveButton: ComponentResolver = ({ node, ctx }) => {
  const { style, appearance } = resolveNodeStyle(node, ctx, node.styles?.normal ?? node.styleId)
  return {
    type: 'button',
    id: node.id ?? null,
    label: resolveContent(node, ctx),
    appearance,
    style,
    selectedStyle: stateStyle(node, node.styles?.selected, ctx),
    disabledStyle: stateStyle(node, node.styles?.disabled, ctx),
    isSelected: node.isSelectedBinding === undefined ? false : ctx.condition(node.isSelectedBinding),
    image: resolveImageSource(node.image, ctx),
    imagePlacement: node.imagePlacement ?? 'leading',
    imageSpacing: node.imageSpacing ?? 8,
    buttonShape: node.buttonShape ?? null,
    fillWidth: node.fillWidth ?? false,
    onTap: ctx.actionBinding(node.actions?.onTap),
  }
}

export const resolveTextField: ComponentResolver = ({ node, ctx }) => {
  const { style, appearance } = resolveNodeStyle(node, ctx)
  return {
    type: 'textField',
    id: node.id ?? null,
    placeholder: node.placeholder ?? '',
    text: node.bind === undefined ? resolveContent(node, ctx) : stringifyValue(resolveBoundValue(node, ctx)),
    bindingPath: node.bind ?? null,
    appearance,
    style,
    onValueChanged: ctx.actionBinding(node.actions?.onValueChanged),
  }
}
