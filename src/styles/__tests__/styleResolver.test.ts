import { describe, expect, it } from 'vitest'
import type { Style } from '../../document/documentTypes'
import { parseColor, tryParseColor } from '../color'
import { mergeStyle } from '../resolvedStyle'
import { StyleResolutionError, StyleResolver } from '../styleResolver'

describe('StyleResolver', () => {
  const card: Style = {
    backgroundColor: '#FFFFFF',
    cornerRadius: 12,
    shadow: { color: '#000', radius: 8, x: 0, y: 4 },
    padding: { all: 16 },
  }

  it('clears an inherited shadow with an all-absent shadow and keeps the rest', () => {
    const resolver = new StyleResolver({ card, flatCard: { inherits: 'card', shadow: {} } })
    expect(resolver.resolve('flatCard')).toEqual({
      backgroundColor: '#FFFFFF',
      cornerRadius: 12,
      padding: { top: 16, bottom: 16, leading: 16, trailing: 16 },
    })
  })

  it('clears across a three-link chain until the leaf sets it again', () => {
    const a: Style = { shadow: { color: '#111', radius: 2 } }
    const b: Style = { inherits: 'a', shadow: {} }
    const silent = new StyleResolver({ a, b, c: { inherits: 'b', fontSize: 20 } })
    expect(silent.resolve('c').shadow).toBeUndefined()

    const reset = new StyleResolver({ a, b, c: { inherits: 'b', shadow: { radius: 6, y: 1 } } })
    expect(reset.resolve('c').shadow).toEqual({ radius: 6, y: 1 })
  })

  it('merges shadow sub-fields when the leaf is not a clear', () => {
    const resolver = new StyleResolver({ card, lifted: { inherits: 'card', shadow: { radius: 16 } } })
    expect(resolver.resolve('lifted').shadow).toEqual({ color: '#000', radius: 16, x: 0, y: 4 })
  })

  it('clears padding only when every shorthand is absent', () => {
    const resolver = new StyleResolver({
      card,
      bare: { inherits: 'card', padding: {} },
      tight: { inherits: 'card', padding: { top: 4 } },
    })
    expect(resolver.resolve('bare').padding).toBeUndefined()
    expect(resolver.resolve('tight').padding).toEqual({ top: 4, bottom: 16, leading: 16, trailing: 16 })
  })

  it('lets a leaf shorthand override an inherited specific edge', () => {
    const resolver = new StyleResolver({
      base: { padding: { top: 4, leading: 2 } },
      leaf: { inherits: 'base', padding: { vertical: 10 } },
      wide: { inherits: 'leaf', padding: { all: 6 } },
    })
    expect(resolver.resolve('leaf').padding).toEqual({ top: 10, bottom: 10, leading: 2 })
    expect(resolver.resolve('wide').padding).toEqual({ top: 6, bottom: 6, leading: 6, trailing: 6 })
  })

  it('replaces dimensions wholesale', () => {
    const resolver = new StyleResolver({
      base: { width: { fractional: 0.5 }, height: 40 },
      child: { inherits: 'base', width: { absolute: 120 } },
    })
    const resolved = resolver.resolve('child')
    expect(resolved.width).toEqual({ absolute: 120 })
    expect(resolved.height).toBe(40)
  })

  it('throws on an inheritance cycle with the chain', () => {
    const resolver = new StyleResolver({ a: { inherits: 'b' }, b: { inherits: 'c' }, c: { inherits: 'a' } })
    expect(() => resolver.resolve('a')).toThrow(StyleResolutionError)
    try {
      resolver.resolve('a')
    } catch (e) {
      expect(e instanceof StyleResolutionError ? e.chain : null).toEqual(['a', 'b', 'c', 'a'])
    }
  })

  it('logs unknown ids and resolves them to an empty style', () => {
    const logs: string[] = []
    const resolver = new StyleResolver({}, { log: (m) => logs.push(m) })
    expect(resolver.resolve('ghost')).toEqual({})
    expect(logs).toEqual(["[style] Unknown style 'ghost'"])
  })

  it('looks up @ references through the design system', () => {
    const resolver = new StyleResolver(
      { primaryButton: { inherits: '@accent', fontWeight: 'bold' } },
      { designSystem: { style: (name) => (name === 'accent' ? { textColor: '#FF0000' } : undefined) } },
    )
    expect(resolver.resolve('primaryButton')).toEqual({ textColor: '#FF0000', fontWeight: 'bold' })
  })

  it('applies the inline style last', () => {
    const resolver = new StyleResolver({ card })
    const resolved = resolver.resolveWithInline('card', { cornerRadius: 0, shadow: {} })
    expect(resolved.cornerRadius).toBe(0)
    expect(resolved.shadow).toBeUndefined()
    expect(resolved.backgroundColor).toBe('#FFFFFF')
  })

  it('does not mutate the inherited style while merging', () => {
    const inherited = { shadow: { radius: 1 } }
    mergeStyle(inherited, { shadow: { x: 3 } })
    expect(inherited).toEqual({ shadow: { radius: 1 } })
  })
})

describe('colors', () => {
  it('parses hex forms', () => {
    expect(parseColor('#FFF')).toEqual({ red: 1, green: 1, blue: 1, alpha: 1 })
    expect(parseColor('#FF000080')).toEqual({ red: 1, green: 0, blue: 0, alpha: 0.502 })
  })

  it('parses rgba()', () => {
    expect(parseColor('rgba(255, 0, 0, 0.5)')).toEqual({ red: 1, green: 0, blue: 0, alpha: 0.5 })
  })

  it('maps clear and falls back to black for garbage', () => {
    expect(parseColor('clear')).toEqual({ red: 0, green: 0, blue: 0, alpha: 0 })
    expect(tryParseColor('blurple')).toBeNull()
    expect(parseColor('blurple')).toEqual({ red: 0, green: 0, blue: 0, alpha: 1 })
  })
})
