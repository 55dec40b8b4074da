import {
  BEZIER_POINTS,
  CIRCLE_POINTS,
  MAX_FLATTEN_POINTS,
  MERGE_TOLERANCE
} from '../constants'
import { ParseError } from '../parsers/exceptions'
import { ParseOptions, ResolvedParseOptions } from '../types/options'
import { consoleWarningSink } from './log'

function requirePositiveInteger(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ParseError(`Invalid ${name}: ${value}`)
  }
  return value
}

export function resolveOptions(options: ParseOptions = {}): ResolvedParseOptions {
  const tolerance = options.tolerance ?? MERGE_TOLERANCE
  if (!(tolerance >= 0)) {
    throw new ParseError(`Invalid tolerance: ${tolerance}`)
  }

  return {
    bezierPoints: requirePositiveInteger(options.bezierPoints ?? BEZIER_POINTS, 'bezierPoints'),
    circlePoints: requirePositiveInteger(options.circlePoints ?? CIRCLE_POINTS, 'circlePoints'),
    tolerance,
    invertY: options.invertY ?? false,
    maxFlattenPoints: requirePositiveInteger(
      options.maxFlattenPoints ?? MAX_FLATTEN_POINTS,
      'maxFlattenPoints'
    ),
    strokeFromFill: options.strokeFromFill ?? true,
    fitViewBox: options.fitViewBox ?? false,
    warn: options.warn ?? consoleWarningSink
  }
}
