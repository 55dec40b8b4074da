import { Point } from '../types/base'
import { ParseError } from './exceptions'

// A single ASCII letter, or a decimal number with optional sign, fraction and exponent.
const TOKEN_REGEX = /[A-Za-z]|[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/g
const LETTER_REGEX = /^[A-Za-z]$/
const LENGTH_REGEX = /^\s*([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)\s*(px)?\s*$/

export function tokenize(text: string): string[] {
  return text.match(TOKEN_REGEX) ?? []
}

export function isLetterToken(token: string): boolean {
  return LETTER_REGEX.test(token)
}

export function parseStyleMap(text: string): Map<string, string> {
  const styles = new Map<string, string>()

  for (const entry of text.split(';')) {
    const iColon = entry.indexOf(':')
    if (iColon < 0) {
      continue
    }
    const key = entry.slice(0, iColon).trim()
    if (key) {
      styles.set(key, entry.slice(iColon + 1).trim())
    }
  }

  return styles
}

export function parseNumber(value: string | undefined, name: string): number {
  if (!value) {
    throw new ParseError(`Missing ${name} attribute`)
  }
  const num = parseFloat(value)
  if (isNaN(num)) {
    throw new ParseError(`Invalid ${name}: ${value}`)
  }
  return num
}

export function parseOptionalNumber(
  value: string | undefined,
  name: string,
  fallback: number
): number {
  return value === undefined || value.trim() === '' ? fallback : parseNumber(value, name)
}

// Reads a length given in user units, optionally suffixed with `px`. Anything else is null.
export function parseLength(value: string | undefined): number | null {
  if (!value) {
    return null
  }
  const match = LENGTH_REGEX.exec(value)
  return match ? parseFloat(match[1]) : null
}

export function parsePoints(pointsStr: string): Point[] {
  const tokens = tokenize(pointsStr)
  if (tokens.length % 2 !== 0) {
    throw new ParseError(`Odd number of coordinates in points: ${pointsStr}`)
  }

  const points: Point[] = []
  for (let i = 0; i < tokens.length; i += 2) {
    if (isLetterToken(tokens[i]) || isLetterToken(tokens[i + 1])) {
      throw new ParseError(`Invalid point value in points: ${pointsStr}`)
    }
    points.push({ x: parseFloat(tokens[i]), y: parseFloat(tokens[i + 1]) })
  }
  return points
}
