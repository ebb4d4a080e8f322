import { unwrapExpression } from '../../bindings/expressionEvaluator'
import type { SectionDefinition } from '../../document/documentTypes'
import type { IRSection, RenderNode } from '../../ir/irTypes'
import { getRegistryResolver, type LayoutResolver } from '../../registry/registry'
import { asArray } from '../../state/stateValue'
import type { ResolutionContext } from '../resolutionContext'

function sectionItems(section: SectionDefinition, s: number, ctx: ResolutionContext): RenderNode[] {
  const out: RenderNode[] = []
  const template = section.itemTemplate

  if (section.dataSource !== undefined && template) {
    const items = asArray(ctx.read(unwrapExpression(section.dataSource) ?? section.dataSource)) ?? []
    items.forEach((item, index) => {
      const scoped = ctx.withScope({ [section.itemVariable]: item, [section.indexVariable]: index })
      const node = scoped.resolveNode(template, `sections.${s}.items[${index}]`, { kind: 'sectionItem', section: s, index: out.length })
      if (node) out.push(node)
    })
    return out
  }

  const children = section.children ?? []
  children.forEach((child, i) => {
    const node = ctx.resolveNode(child, `sections.${s}.children.${i}`, { kind: 'sectionItem', section: s, index: out.length })
    if (node) out.push(node)
  })
  return out
}

export const resolveSectionLayout: LayoutResolver<'sectionLayout'> = ({ node, ctx }) => {
  const layout = node.sectionLayout
  const sections = layout.sections.map((section, s): IRSection => {
    const type = section.layout.type
    const resolveConfig = getRegistryResolver(ctx.env.registries.sections, type)
    if (!resolveConfig) throw ctx.fail('unregisteredKind', `No section layout resolver registered for '${type}'`)

    return {
      id: section.id ?? null,
      layoutType: type,
      config: resolveConfig(section.layout),
      header: section.header ? ctx.resolveNode(section.header, `sections.${s}.header`, { kind: 'sectionHeader', section: s }) : null,
      footer: section.footer ? ctx.resolveNode(section.footer, `sections.${s}.footer`, { kind: 'sectionFooter', section: s }) : null,
      stickyHeader: section.stickyHeader ?? false,
      children: sectionItems(section, s, ctx),
    }
  })

  return {
    type: 'sectionLayout',
    id: layout.id ?? null,
    sectionSpacing: layout.sectionSpacing ?? 0,
    sections,
  }
}
