import { ParseError } from '../parsers/exceptions'
import { parseColor } from '../parsers/color'
import { parseStyleMap } from '../parsers/values'
import { BoundingBox, Point } from '../types/base'
import { ElementType } from '../types/elements'
import { PaintType, Rgba, solid } from '../types/paint'
import { SvgNode } from '../types/svg'
import { WarningSink } from '../utils/log'
import { AffineTransform, DegenerateTransformError } from '../utils/transform'

// Anything a gradient paint reference can resolve to.
export interface PaintServer {
  readonly id: string
  interpolate(point: Point, bounds?: BoundingBox): Rgba
}

export type GradientStop = {
  offset: number
  color: Rgba
}

export enum SpreadMethod {
  Pad = 'pad',
  Reflect = 'reflect',
  Repeat = 'repeat'
}

export enum GradientUnits {
  UserSpaceOnUse = 'userSpaceOnUse',
  ObjectBoundingBox = 'objectBoundingBox'
}

const TRANSPARENT: Rgba = { r: 0, g: 0, b: 0, a: 0 }

export class GradientRegistry {
  private readonly servers = new Map<string, PaintServer>()

  register(id: string, server: PaintServer): void {
    this.servers.set(id, server)
  }

  get(id: string): PaintServer | undefined {
    return this.servers.get(id)
  }

  has(id: string): boolean {
    return this.servers.has(id)
  }

  get ids(): string[] {
    return [...this.servers.keys()]
  }
}

// Presentation attribute with the inline style taking precedence.
function readProperty(element: SvgNode, name: string): string | undefined {
  const style = element.attributes['style']
  return (style ? parseStyleMap(style).get(name) : undefined) ?? element.attributes[name]
}

// A number, or a percentage read as a fraction.
export function parseFraction(value: string | undefined, name: string, fallback: number): number {
  const text = value?.trim()
  if (!text) {
    return fallback
  }
  const num = parseFloat(text)
  if (isNaN(num)) {
    throw new ParseError(`Invalid ${name}: ${value}`)
  }
  return text.endsWith('%') ? num / 100 : num
}

function readStops(element: SvgNode, warn: WarningSink): GradientStop[] {
  const stops: GradientStop[] = []
  let previousOffset = 0

  for (const child of element.children) {
    if (child.tag !== ElementType.Stop) {
      continue
    }

    const offset = Math.max(
      previousOffset,
      Math.min(1, Math.max(0, parseFraction(child.attributes['offset'], 'offset', 0)))
    )
    previousOffset = offset

    const opacity = Math.min(
      1,
      Math.max(0, parseFraction(readProperty(child, 'stop-opacity'), 'stop-opacity', 1))
    )
    const paint = parseColor(readProperty(child, 'stop-color'), solid(0, 0, 0), warn)
    const color = paint.type === PaintType.Solid ? paint.color : TRANSPARENT

    stops.push({ offset, color: { ...color, a: Math.round(color.a * opacity) } })
  }

  return stops
}

function applySpread(t: number, spread: SpreadMethod): number {
  switch (spread) {
    case SpreadMethod.Repeat:
      return t - Math.floor(t)
    case SpreadMethod.Reflect: {
      const m = t - 2 * Math.floor(t / 2)
      return m > 1 ? 2 - m : m
    }
    default:
      return Math.min(1, Math.max(0, t))
  }
}

function interpolateStops(stops: GradientStop[], t: number): Rgba {
  if (stops.length === 0) {
    return { ...TRANSPARENT }
  }
  if (t <= stops[0].offset) {
    return { ...stops[0].color }
  }

  for (let i = 1; i < stops.length; i++) {
    const previous = stops[i - 1]
    const next = stops[i]
    if (t > next.offset) {
      continue
    }
    const span = next.offset - previous.offset
    if (span === 0) {
      return { ...next.color }
    }
    const f = (t - previous.offset) / span
    const mix = (from: number, to: number) => Math.round(from + (to - from) * f)
    return {
      r: mix(previous.color.r, next.color.r),
      g: mix(previous.color.g, next.color.g),
      b: mix(previous.color.b, next.color.b),
      a: mix(previous.color.a, next.color.a)
    }
  }

  return { ...stops[stops.length - 1].color }
}

/**
 * Shared behaviour of `linearGradient` and `radialGradient`: colour stops, `href` stop
 * inheritance, `gradientUnits`, `gradientTransform` and `spreadMethod`.
 */
export abstract class Gradient implements PaintServer {
  public readonly units: GradientUnits
  public readonly spread: SpreadMethod
  private readonly ownStops: GradientStop[]
  private readonly href?: string
  private readonly inverseTransform: AffineTransform

  constructor(
    public readonly id: string,
    element: SvgNode,
    private readonly registry: GradientRegistry,
    warn: WarningSink
  ) {
    this.ownStops = readStops(element, warn)
    this.href = element.attributes['href']?.trim().replace(/^#/, '')
    this.units =
      element.attributes['gradientUnits'] === GradientUnits.UserSpaceOnUse
        ? GradientUnits.UserSpaceOnUse
        : GradientUnits.ObjectBoundingBox

    const spread = element.attributes['spreadMethod']
    this.spread =
      spread === SpreadMethod.Reflect || spread === SpreadMethod.Repeat ? spread : SpreadMethod.Pad

    const transform = AffineTransform.parse(element.attributes['gradientTransform'])
    try {
      this.inverseTransform = transform.invert()
    } catch (error) {
      if (!(error instanceof DegenerateTransformError)) {
        throw error
      }
      warn(`Gradient ${id} has a singular gradientTransform; ignoring it`)
      this.inverseTransform = AffineTransform.identity()
    }
  }

  // Own stops, or those of the referenced gradient when this one declares none.
  get stops(): GradientStop[] {
    const visited = new Set<string>([this.id])
    let gradient: Gradient = this
    while (gradient.ownStops.length === 0 && gradient.href && !visited.has(gradient.href)) {
      visited.add(gradient.href)
      const referenced = this.registry.get(gradient.href)
      if (!(referenced instanceof Gradient)) {
        break
      }
      gradient = referenced
    }
    return gradient.ownStops
  }

  interpolate(point: Point, bounds?: BoundingBox): Rgba {
    let local = point
    if (this.units === GradientUnits.ObjectBoundingBox && bounds) {
      const width = bounds.xMax - bounds.xMin
      const height = bounds.yMax - bounds.yMin
      local = {
        x: width > 0 ? (point.x - bounds.xMin) / width : 0,
        y: height > 0 ? (point.y - bounds.yMin) / height : 0
      }
    }
    const t = this.computeOffset(this.inverseTransform.apply(local))
    return interpolateStops(this.stops, applySpread(t, this.spread))
  }

  // Gradient parameter at a point in the gradient's own coordinate system.
  protected abstract computeOffset(point: Point): number
}

export class LinearGradient extends Gradient {
  public readonly start: Point
  public readonly end: Point

  constructor(id: string, element: SvgNode, registry: GradientRegistry, warn: WarningSink) {
    super(id, element, registry, warn)
    const attributes = element.attributes
    this.start = {
      x: parseFraction(attributes['x1'], 'x1', 0),
      y: parseFraction(attributes['y1'], 'y1', 0)
    }
    this.end = {
      x: parseFraction(attributes['x2'], 'x2', 1),
      y: parseFraction(attributes['y2'], 'y2', 0)
    }
  }

  protected computeOffset(point: Point): number {
    const dx = this.end.x - this.start.x
    const dy = this.end.y - this.start.y
    const lengthSquared = dx * dx + dy * dy
    if (lengthSquared === 0) {
      return 1
    }
    return ((point.x - this.start.x) * dx + (point.y - this.start.y) * dy) / lengthSquared
  }
}

export class RadialGradient extends Gradient {
  public readonly center: Point
  public readonly focus: Point
  public readonly radius: number

  constructor(id: string, element: SvgNode, registry: GradientRegistry, warn: WarningSink) {
    super(id, element, registry, warn)
    const attributes = element.attributes
    this.center = {
      x: parseFraction(attributes['cx'], 'cx', 0.5),
      y: parseFraction(attributes['cy'], 'cy', 0.5)
    }
    this.focus = {
      x: parseFraction(attributes['fx'], 'fx', this.center.x),
      y: parseFraction(attributes['fy'], 'fy', this.center.y)
    }
    this.radius = parseFraction(attributes['r'], 'r', 0.5)
  }

  // Solves for t such that the point lies on the circle of radius t·r centred at
  // focus + t·(center − focus).
  protected computeOffset(point: Point): number {
    if (this.radius <= 0) {
      return 1
    }

    const dx = point.x - this.focus.x
    const dy = point.y - this.focus.y
    const ex = this.center.x - this.focus.x
    const ey = this.center.y - this.focus.y

    const a = ex * ex + ey * ey - this.radius * this.radius
    const b = dx * ex + dy * ey
    const c = dx * dx + dy * dy

    if (Math.abs(a) < 1e-12) {
      return b === 0 ? 0 : c / (2 * b)
    }
    const discriminant = b * b - a * c
    if (discriminant < 0) {
      return 0
    }
    return (b - Math.sqrt(discriminant)) / a
  }
}
