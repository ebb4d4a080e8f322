import { describe, expect, it } from 'vitest'
import { EMPTY_STYLE } from '../../styles/resolvedStyle'
import { resolveAlignment, resolveDimension, resolveEdgeInset, resolvePadding, toNodeStyle } from '../converters'

describe('converters', () => {
  it('expands axis shorthands to the same insets as explicit edges', () => {
    const shorthand = resolvePadding({ horizontal: 16, vertical: 12 })
    const explicit = resolvePadding({ top: 12, bottom: 12, leading: 16, trailing: 16 })
    expect(shorthand).toEqual(explicit)
    expect(shorthand).toEqual({ top: 12, bottom: 12, leading: 16, trailing: 16 })
  })

  it('lets a specific edge beat its axis and `all`', () => {
    expect(resolvePadding({ all: 4, horizontal: 8, leading: 2 })).toEqual({ top: 4, bottom: 4, leading: 2, trailing: 8 })
  })

  it('falls back to the base insets for unset edges', () => {
    expect(resolvePadding({ top: 1 }, { top: 9, bottom: 9, leading: 9, trailing: 9 })).toEqual({ top: 1, bottom: 9, leading: 9, trailing: 9 })
  })

  it('reads dimensions', () => {
    expect(resolveDimension(120)).toEqual({ kind: 'absolute', value: 120 })
    expect(resolveDimension({ fractional: 0.5 })).toEqual({ kind: 'fractional', value: 0.5 })
    expect(resolveDimension(undefined)).toBeNull()
  })

  it('maps string alignments per container axis', () => {
    expect(resolveAlignment('leading', 'vstack')).toEqual({ horizontal: 'leading', vertical: 'center' })
    expect(resolveAlignment('top', 'hstack')).toEqual({ horizontal: 'center', vertical: 'top' })
    expect(resolveAlignment('bottomTrailing', 'zstack')).toEqual({ horizontal: 'trailing', vertical: 'bottom' })
    expect(resolveAlignment({ vertical: 'top' }, 'zstack')).toEqual({ horizontal: 'center', vertical: 'top' })
    expect(resolveAlignment(undefined, 'vstack')).toEqual({ horizontal: 'center', vertical: 'center' })
  })

  it('treats a bare number edge inset as safe-area relative', () => {
    expect(resolveEdgeInset(20)).toEqual({ positioning: 'safeArea', value: 20 })
    expect(resolveEdgeInset({ positioning: 'absolute', value: 0 })).toEqual({ positioning: 'absolute', value: 0 })
    expect(resolveEdgeInset(undefined)).toBeNull()
  })

  it('converts an empty style to concrete defaults', () => {
    expect(toNodeStyle(EMPTY_STYLE)).toEqual({
      padding: { top: 0, bottom: 0, leading: 0, trailing: 0 },
      backgroundColor: null,
      cornerRadius: 0,
      border: null,
      shadow: null,
      tintColor: null,
      frame: { width: null, height: null, minWidth: null, minHeight: null, maxWidth: null, maxHeight: null },
    })
  })

  it('emits a border only for a positive width and fills shadow defaults', () => {
    const style = toNodeStyle({ borderWidth: 2, shadow: { radius: 4 }, padding: { all: 8 } }, { top: 0 })
    expect(style.border).toEqual({ width: 2, color: { red: 0, green: 0, blue: 0, alpha: 1 } })
    expect(style.shadow).toEqual({ color: { red: 0, green: 0, blue: 0, alpha: 0.2 }, radius: 4, x: 0, y: 0 })
    expect(style.padding).toEqual({ top: 0, bottom: 8, leading: 8, trailing: 8 })
    expect(toNodeStyle({ borderWidth: 0, borderColor: '#FF0000' }).border).toBeNull()
  })
})
