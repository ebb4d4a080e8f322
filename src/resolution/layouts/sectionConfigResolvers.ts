import type { ColumnConfig, SectionLayoutConfig } from '../../document/documentTypes'
import { resolveDimension, resolvePadding } from '../../ir/converters'
import type { IRColumns, IRSectionConfig } from '../../ir/irTypes'
import type { SectionConfigRegistry, SectionConfigResolver } from '../../registry/registry'

export function resolveColumns(columns: ColumnConfig | undefined, fallback = 2): IRColumns {
  if (columns === undefined) return { kind: 'fixed', count: fallback }
  if (typeof columns === 'number') return { kind: 'fixed', count: columns }
  return { kind: 'adaptive', minWidth: columns.adaptive.minWidth }
}

function baseConfig(config: SectionLayoutConfig, defaults: { itemSpacing: number; showsDividers: boolean }): IRSectionConfig {
  const dims = config.itemDimensions
  return {
    alignment: config.alignment ?? 'leading',
    itemSpacing: config.itemSpacing ?? defaults.itemSpacing,
    lineSpacing: config.lineSpacing ?? 8,
    contentInsets: resolvePadding(config.contentInsets),
    itemDimensions: dims
      ? { width: resolveDimension(dims.width), height: resolveDimension(dims.height), aspectRatio: dims.aspectRatio ?? null }
      : null,
    showsIndicators: config.showsIndicators ?? false,
    isPagingEnabled: config.isPagingEnabled ?? false,
    snapBehavior: config.snapBehavior ?? 'none',
    columns: null,
    showsDividers: config.showsDividers ?? defaults.showsDividers,
  }
}

const horizontal: SectionConfigResolver = (config) => baseConfig(config, { itemSpacing: 12, showsDividers: false })

const list: SectionConfigResolver = (config) => baseConfig(config, { itemSpacing: 8, showsDividers: true })

const grid: SectionConfigResolver = (config) => ({
  ...baseConfig(config, { itemSpacing: 8, showsDividers: false }),
  columns: resolveColumns(config.columns),
})

const flow: SectionConfigResolver = (config) => baseConfig(config, { itemSpacing: 8, showsDividers: false })

export function defaultSectionConfigResolvers(): SectionConfigRegistry {
  return { horizontal, list, grid, flow }
}
