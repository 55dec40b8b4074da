import namedColors from '../data/named_colors.json'
import { gradientRef, NO_PAINT, Paint, solid, SolidPaint } from '../types/paint'
import { consoleWarningSink, WarningSink } from '../utils/log'
import { ParseError } from './exceptions'

const NAMED_COLORS = new Map<string, number[]>(Object.entries(namedColors))

const URL_REGEX = /^url\(\s*#([^)\s]+)\s*\)/
const RGB_REGEX = /^rgba?\(([^)]*)\)$/
const HEX_REGEX = /^#([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/
const CHANNEL_REGEX = /^[-+]?(?:\d+\.?\d*|\.\d+)(%?)$/

function clampChannel(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)))
}

function parseChannel(text: string): number {
  const match = CHANNEL_REGEX.exec(text)
  if (!match) {
    throw new ParseError(`Invalid colour channel: ${text}`)
  }
  const value = parseFloat(text)
  return clampChannel(match[1] ? (value * 255) / 100 : value)
}

function parseAlpha(text: string): number {
  const match = CHANNEL_REGEX.exec(text)
  if (!match) {
    throw new ParseError(`Invalid colour alpha: ${text}`)
  }
  const value = parseFloat(text)
  return clampChannel((match[1] ? value / 100 : value) * 255)
}

function parseHex(hex: string): SolidPaint {
  if (hex.length === 3) {
    const [r, g, b] = [...hex].map((digit) => parseInt(digit, 16) * 17)
    return solid(r, g, b)
  }
  return solid(
    parseInt(hex.slice(0, 2), 16),
    parseInt(hex.slice(2, 4), 16),
    parseInt(hex.slice(4, 6), 16)
  )
}

function parseFunctional(args: string): SolidPaint {
  const parts = args
    .split(/\s*,\s*|\s+/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)

  if (parts.length !== 3 && parts.length !== 4) {
    throw new ParseError(`Expected 3 or 4 colour components, got ${parts.length}`)
  }

  const [r, g, b] = parts.slice(0, 3).map(parseChannel)
  const a = parts.length === 4 ? parseAlpha(parts[3]) : 255
  return solid(r, g, b, a)
}

function parseColorValue(value: string): Paint {
  const urlMatch = URL_REGEX.exec(value)
  if (urlMatch) {
    return gradientRef(urlMatch[1])
  }

  const hexMatch = HEX_REGEX.exec(value)
  if (hexMatch) {
    return parseHex(hexMatch[1])
  }

  const rgbMatch = RGB_REGEX.exec(value)
  if (rgbMatch) {
    return parseFunctional(rgbMatch[1])
  }

  const keyword = value.toLowerCase()
  if (keyword === 'transparent') {
    return solid(0, 0, 0, 0)
  }
  const named = NAMED_COLORS.get(keyword)
  if (named) {
    const [r, g, b] = named
    return solid(r, g, b)
  }

  throw new ParseError('Unrecognised colour syntax')
}

/**
 * Parses a fill or stroke value.
 *
 * Absent or empty text yields `fallback`, letting callers tell "unspecified" apart from an
 * explicit `none`. Malformed input resolves to no paint and is reported through `warn`.
 */
export function parseColor(
  text: string | undefined,
  fallback: Paint,
  warn: WarningSink = consoleWarningSink
): Paint {
  const value = text?.trim()
  if (!value) {
    return fallback
  }
  if (value === 'none') {
    return NO_PAINT
  }

  try {
    return parseColorValue(value)
  } catch (error) {
    if (error instanceof ParseError) {
      warn(`Could not parse colour '${value}': ${error.message}`)
      return NO_PAINT
    }
    throw error
  }
}
