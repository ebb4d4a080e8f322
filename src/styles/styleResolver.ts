import type { Style } from '../document/documentTypes'
import type { Log } from '../log'
import { EMPTY_STYLE, foldStyles, mergeStyle, type ResolvedStyle } from './resolvedStyle'

// Host-provided styles addressed as `@name` from documents.
export type DesignSystemProvider = {
  style: (name: string) => Style | undefined
}

export type StyleResolverOptions = {
  designSystem?: DesignSystemProvider
  log?: Log
}

export class StyleResolutionError extends Error {
  readonly chain: string[]

  constructor(chain: string[]) {
    super(`Style inheritance cycle: ${chain.join(' -> ')}`)
    this.name = 'StyleResolutionError'
    this.chain = chain
  }
}

export class StyleResolver {
  private readonly cache = new Map<string, ResolvedStyle>()

  constructor(
    private readonly styles: Record<string, Style>,
    private readonly options: StyleResolverOptions = {},
  ) {}

  // Folds the inheritance chain of `styleId` root→leaf. Unknown ids resolve to an empty style.
  resolve(styleId: string | undefined): ResolvedStyle {
    if (!styleId) return EMPTY_STYLE
    const cached = this.cache.get(styleId)
    if (cached) return cached

    const resolved = foldStyles(this.chainFor(styleId).reverse())
    this.cache.set(styleId, resolved)
    return resolved
  }

  // Named style first, then the node's inline style on top.
  resolveWithInline(styleId: string | undefined, inline: Style | undefined): ResolvedStyle {
    const base = this.resolve(styleId)
    if (!inline) return base
    const parent = inline.inherits ? this.resolve(inline.inherits) : EMPTY_STYLE
    return mergeStyle(mergeStyle(base, parent), inline)
  }

  // Leaf first.
  chainFor(styleId: string): Style[] {
    const chain: Style[] = []
    const seen: string[] = []
    let id: string | undefined = styleId

    while (id !== undefined) {
      if (seen.includes(id)) throw new StyleResolutionError([...seen, id])
      seen.push(id)
      const style = this.lookup(id)
      if (!style) {
        this.options.log?.(`[style] Unknown style '${id}'`)
        break
      }
      chain.push(style)
      id = style.inherits
    }
    return chain
  }

  invalidate(): void {
    this.cache.clear()
  }

  private lookup(id: string): Style | undefined {
    if (id.startsWith('@')) return this.options.designSystem?.style(id.slice(1))
    return Object.hasOwn(this.styles, id) ? this.styles[id] : undefined
  }
}
