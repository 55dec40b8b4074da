export enum ElementType {
  Anchor = 'a',
  Circle = 'circle',
  Definitions = 'defs',
  Description = 'desc',
  Ellipse = 'ellipse',
  Group = 'g',
  Line = 'line',
  LinearGradient = 'linearGradient',
  Metadata = 'metadata',
  Path = 'path',
  Polygon = 'polygon',
  Polyline = 'polyline',
  RadialGradient = 'radialGradient',
  Rectangle = 'rect',
  Stop = 'stop',
  Style = 'style',
  Svg = 'svg',
  Switch = 'switch',
  Title = 'title'
}

export const CONTAINER_ELEMENTS: ReadonlySet<string> = new Set([
  ElementType.Svg,
  ElementType.Group,
  ElementType.Anchor,
  ElementType.Switch
])

export const SHAPE_ELEMENTS: ReadonlySet<string> = new Set([
  ElementType.Path,
  ElementType.Rectangle,
  ElementType.Circle,
  ElementType.Ellipse,
  ElementType.Line,
  ElementType.Polyline,
  ElementType.Polygon
])

export const GRADIENT_ELEMENTS: ReadonlySet<string> = new Set([
  ElementType.LinearGradient,
  ElementType.RadialGradient
])

// Elements carrying no geometry or paint of their own.
export const IGNORED_ELEMENTS: ReadonlySet<string> = new Set([
  ElementType.Title,
  ElementType.Description,
  ElementType.Metadata,
  ElementType.Style,
  ElementType.Stop
])
