import type { IRActionBinding, IRImageSource, IRSection, RenderNode, RenderTree } from '../ir/irTypes'
import { colorToHex } from '../styles/color'
import type { Renderer } from './renderer'

export type DebugRendererOptions = {
  indent?: string
}

function quote(text: string): string {
  return JSON.stringify(text)
}

function binding(name: string, b: IRActionBinding | null): string[] {
  if (!b) return []
  return [b.kind === 'reference' ? `${name}=@${b.actionId}` : `${name}=<${b.definition.kind}>`]
}

function image(source: IRImageSource): string {
  switch (source.kind) {
    case 'system':
      return `system:${source.name}`
    case 'asset':
      return `asset:${source.name}`
    case 'url':
      return `url:${source.url}`
    case 'activityIndicator':
      return 'activityIndicator'
  }
}

function head(node: RenderNode): string {
  const id = node.type !== 'spacer' && node.id ? `#${node.id}` : ''
  const parts: string[] = []
  switch (node.type) {
    case 'container':
      parts.push(`${node.layout}${id}`, `spacing=${node.spacing}`)
      break
    case 'sectionLayout':
      parts.push(`sectionLayout${id}`, `sections=${node.sections.length}`)
      break
    case 'text':
      parts.push(`text${id}`, quote(node.content))
      break
    case 'button':
      parts.push(`button${id}`, quote(node.label))
      if (node.isSelected) parts.push('selected')
      parts.push(...binding('onTap', node.onTap))
      break
    case 'textField':
      parts.push(`textField${id}`, quote(node.text))
      if (node.bindingPath) parts.push(`bind=${node.bindingPath}`)
      break
    case 'toggle':
      parts.push(`toggle${id}`, quote(node.label), node.isOn ? 'on' : 'off')
      break
    case 'slider':
      parts.push(`slider${id}`, `${node.value} in ${node.minValue}...${node.maxValue}`)
      break
    case 'image':
      parts.push(`image${id}`, image(node.source))
      break
    case 'gradient':
      parts.push(`gradient${id}`, node.stops.map((s) => colorToHex(s.light)).join(','))
      break
    case 'shape':
      parts.push(`shape${id}`, node.shape.kind, colorToHex(node.fillColor))
      break
    case 'spacer':
      parts.push('spacer')
      if (node.minLength !== null) parts.push(`min=${node.minLength}`)
      break
    case 'divider':
      parts.push(`divider${id}`, colorToHex(node.color))
      break
    case 'pageIndicator':
      parts.push(`pageIndicator${id}`, `${node.currentPage + 1}/${node.pageCount}`)
      break
    case 'custom':
      parts.push(`custom:${node.customType}${id}`)
      break
  }
  return parts.join(' ')
}

// Indented one-line-per-node dump. Handy in tests and when diffing two resolutions.
export class DebugRenderer implements Renderer<string> {
  private readonly indent: string

  constructor(options: DebugRendererOptions = {}) {
    this.indent = options.indent ?? '  '
  }

  render(tree: RenderTree): string {
    const lines: string[] = []
    const root = tree.root
    lines.push(
      [`root ${tree.documentId}`, `ir=${tree.irVersion}`, `background=${colorToHex(root.backgroundColor)}`, ...binding('onAppear', root.onAppear)].join(' '),
    )
    for (const child of root.children) this.node(child, 1, lines)
    return lines.join('\n')
  }

  private node(node: RenderNode, depth: number, lines: string[]): void {
    lines.push(this.indent.repeat(depth) + head(node))
    if (node.type === 'container') {
      for (const child of node.children) this.node(child, depth + 1, lines)
    } else if (node.type === 'sectionLayout') {
      for (const section of node.sections) this.section(section, depth + 1, lines)
    }
  }

  private section(section: IRSection, depth: number, lines: string[]): void {
    const id = section.id ? `#${section.id}` : ''
    lines.push(`${this.indent.repeat(depth)}section${id} ${section.layoutType} items=${section.children.length}`)
    if (section.header) {
      lines.push(`${this.indent.repeat(depth + 1)}header:`)
      this.node(section.header, depth + 2, lines)
    }
    for (const child of section.children) this.node(child, depth + 1, lines)
    if (section.footer) {
      lines.push(`${this.indent.repeat(depth + 1)}footer:`)
      this.node(section.footer, depth + 2, lines)
    }
  }
}

export function renderDebugText(tree: RenderTree, options?: DebugRendererOptions): string {
  return new DebugRenderer(options).render(tree)
}
