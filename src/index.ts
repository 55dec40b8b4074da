export { DocumentCache } from './cache/document_cache'
export { CurveFlattener } from './bezier/flatten'
export {
  applyOpacity,
  createRootContext,
  deriveContext,
  ParseContext,
  resolvePaints
} from './document/context'
export { SvgDocument, SvgPath, SvgPathInit } from './document/document'
export { DocumentWalker } from './document/walker'
export {
  Gradient,
  GradientRegistry,
  GradientStop,
  GradientUnits,
  LinearGradient,
  PaintServer,
  RadialGradient,
  SpreadMethod
} from './gradients/gradient'
export { loadSvg, parse, parseString } from './main'
export { parseColor } from './parsers/color'
export { ParseError } from './parsers/exceptions'
export { PathBuilder } from './paths/builder'
export { SvgPathInterpreter } from './paths/interpreter'
export { ShapeReadError, ShapeReader } from './paths/shapes'
export { SvgReader, SvgReadError } from './reader/base'
export { TessellationError, triangulate } from './tessellation/tessellator'
export { BoundingBox, Loop, Point, ViewBox } from './types/base'
export { ParseOptions } from './types/options'
export { NO_PAINT, Paint, PaintType, Rgba } from './types/paint'
export { SvgNode } from './types/svg'
export { WarningSink } from './utils/log'
export { AffineTransform, DegenerateTransformError } from './utils/transform'
