import { WarningSink } from '../utils/log'

// Options that control flattening resolution and paint resolution.
export type ParseOptions = {
  bezierPoints?: number
  circlePoints?: number
  tolerance?: number
  invertY?: boolean
  maxFlattenPoints?: number
  strokeFromFill?: boolean // Stroke with the fill paint when the stroke is fully transparent.
  fitViewBox?: boolean // Map the root viewBox onto an explicit width and height.
  warn?: WarningSink
}

export type ResolvedParseOptions = Required<ParseOptions>
