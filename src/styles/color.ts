import type { IRColor } from '../ir/irTypes'

export const BLACK: IRColor = { red: 0, green: 0, blue: 0, alpha: 1 }
export const WHITE: IRColor = { red: 1, green: 1, blue: 1, alpha: 1 }
export const CLEAR: IRColor = { red: 0, green: 0, blue: 0, alpha: 0 }

const HEX_RE = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i
const RGBA_RE = /^rgba?\(\s*([\d.]+)\s*,\s*([\d.]+)\s*,\s*([\d.]+)\s*(?:,\s*([\d.]+)\s*)?\)$/i

const clamp01 = (n: number) => Math.min(1, Math.max(0, n))
const round = (n: number) => Math.round(n * 10000) / 10000

function channel(hex: string): number {
  return round(parseInt(hex, 16) / 255)
}

// Returns null when `raw` is not a color we understand.
export function tryParseColor(raw: string): IRColor | null {
  const s = raw.trim()
  const lower = s.toLowerCase()
  if (lower === 'clear' || lower === 'transparent') return CLEAR

  const hex = s.match(HEX_RE)
  if (hex) {
    let digits = hex[1] ?? ''
    if (digits.length === 3) digits = [...digits].map((d) => d + d).join('')
    return {
      red: channel(digits.slice(0, 2)),
      green: channel(digits.slice(2, 4)),
      blue: channel(digits.slice(4, 6)),
      alpha: digits.length === 8 ? channel(digits.slice(6, 8)) : 1,
    }
  }

  const rgba = s.match(RGBA_RE)
  if (rgba) {
    const rgb = (v: string | undefined) => round(clamp01(Number(v) / 255))
    const color = {
      red: rgb(rgba[1]),
      green: rgb(rgba[2]),
      blue: rgb(rgba[3]),
      alpha: rgba[4] === undefined ? 1 : clamp01(Number(rgba[4])),
    }
    if (Object.values(color).some(Number.isNaN)) return null
    return color
  }

  return null
}

// Invalid colors fall back to opaque black.
export function parseColor(raw: string): IRColor {
  return tryParseColor(raw) ?? BLACK
}

export function parseOptionalColor(raw: string | undefined): IRColor | null {
  return raw === undefined ? null : parseColor(raw)
}

export function colorToHex(c: IRColor): string {
  const hex = (n: number) => Math.round(clamp01(n) * 255).toString(16).padStart(2, '0')
  const base = `#${hex(c.red)}${hex(c.green)}${hex(c.blue)}`
  return c.alpha >= 1 ? base : `${base}${hex(c.alpha)}`
}
