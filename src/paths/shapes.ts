import { ParseError } from '../parsers/exceptions'
import { parseNumber, parseOptionalNumber, parsePoints } from '../parsers/values'
import { ElementType } from '../types/elements'
import { SvgNode } from '../types/svg'
import { WarningSink } from '../utils/log'
import { PathBuilder } from './builder'
import { SvgPathInterpreter } from './interpreter'

export class ShapeReadError extends ParseError {
  constructor(message: string) {
    super(message)
    this.name = 'ShapeReadError'
  }
}

/**
 * Lowers a shape element onto a PathBuilder. Rectangles, circles, ellipses and point lists are
 * expressed as the same move/line/arc/close operations path data uses.
 */
export class ShapeReader {
  constructor(
    private readonly circlePoints: number,
    private readonly warn: WarningSink
  ) {}

  private readPath(element: SvgNode, builder: PathBuilder): void {
    new SvgPathInterpreter(builder, this.warn).run(element.attributes['d'] ?? '')
  }

  private readRectangle(element: SvgNode, builder: PathBuilder): void {
    const x = parseOptionalNumber(element.attributes['x'], 'x', 0)
    const y = parseOptionalNumber(element.attributes['y'], 'y', 0)
    const w = parseNumber(element.attributes['width'], 'width')
    const h = parseNumber(element.attributes['height'], 'height')
    if (w < 0 || h < 0) {
      throw new ShapeReadError(`Negative rectangle size: ${w} x ${h}`)
    }

    // A missing radius copies the other one.
    const rxAttr = element.attributes['rx']
    const ryAttr = element.attributes['ry']
    let rx = parseOptionalNumber(rxAttr, 'rx', 0)
    let ry = parseOptionalNumber(ryAttr, 'ry', 0)
    if (rxAttr === undefined && ryAttr !== undefined) {
      rx = ry
    }
    if (ryAttr === undefined && rxAttr !== undefined) {
      ry = rx
    }
    rx = Math.min(Math.abs(rx), w / 2)
    ry = Math.min(Math.abs(ry), h / 2)

    if (rx === 0 || ry === 0) {
      builder.moveTo({ x, y })
      builder.lineTo({ x: x + w, y })
      builder.lineTo({ x: x + w, y: y + h })
      builder.lineTo({ x, y: y + h })
      builder.closePath()
      return
    }

    // Rounded corners: straight edges joined by quarter arcs.
    builder.moveTo({ x, y: y + ry })
    builder.lineTo({ x, y: y + h - ry })
    builder.arcTo(rx, ry, 0, false, false, { x: x + rx, y: y + h })
    builder.lineTo({ x: x + w - rx, y: y + h })
    builder.arcTo(rx, ry, 0, false, false, { x: x + w, y: y + h - ry })
    builder.lineTo({ x: x + w, y: y + ry })
    builder.arcTo(rx, ry, 0, false, false, { x: x + w - rx, y })
    builder.lineTo({ x: x + rx, y })
    builder.arcTo(rx, ry, 0, false, false, { x, y: y + ry })
    builder.closePath()
  }

  private readEllipse(
    builder: PathBuilder,
    cx: number,
    cy: number,
    rx: number,
    ry: number
  ): void {
    for (let i = 0; i < this.circlePoints; i++) {
      const theta = (2 * i * Math.PI) / this.circlePoints
      const point = { x: cx + rx * Math.cos(theta), y: cy + ry * Math.sin(theta) }
      if (i === 0) {
        builder.moveTo(point)
      } else {
        builder.lineTo(point)
      }
    }
    builder.closePath()
  }

  private readCircle(element: SvgNode, builder: PathBuilder): void {
    const r = parseNumber(element.attributes['r'], 'r')
    if (r < 0) {
      throw new ShapeReadError(`Negative circle radius: ${r}`)
    }
    this.readEllipse(
      builder,
      parseOptionalNumber(element.attributes['cx'], 'cx', 0),
      parseOptionalNumber(element.attributes['cy'], 'cy', 0),
      r,
      r
    )
  }

  private readEllipseElement(element: SvgNode, builder: PathBuilder): void {
    this.readEllipse(
      builder,
      parseOptionalNumber(element.attributes['cx'], 'cx', 0),
      parseOptionalNumber(element.attributes['cy'], 'cy', 0),
      parseNumber(element.attributes['rx'], 'rx'),
      parseNumber(element.attributes['ry'], 'ry')
    )
  }

  private readLine(element: SvgNode, builder: PathBuilder): void {
    builder.moveTo({
      x: parseOptionalNumber(element.attributes['x1'], 'x1', 0),
      y: parseOptionalNumber(element.attributes['y1'], 'y1', 0)
    })
    builder.lineTo({
      x: parseOptionalNumber(element.attributes['x2'], 'x2', 0),
      y: parseOptionalNumber(element.attributes['y2'], 'y2', 0)
    })
  }

  private readPointList(element: SvgNode, builder: PathBuilder, close: boolean): void {
    const pointsStr = element.attributes['points']
    if (!pointsStr) {
      throw new ShapeReadError('Missing points attribute')
    }

    parsePoints(pointsStr).forEach((point, i) => {
      if (i === 0) {
        builder.moveTo(point)
      } else {
        builder.lineTo(point)
      }
    })
    if (close) {
      builder.closePath()
    }
  }

  public read(element: SvgNode, builder: PathBuilder): void {
    switch (element.tag) {
      case ElementType.Path:
        return this.readPath(element, builder)
      case ElementType.Rectangle:
        return this.readRectangle(element, builder)
      case ElementType.Circle:
        return this.readCircle(element, builder)
      case ElementType.Ellipse:
        return this.readEllipseElement(element, builder)
      case ElementType.Line:
        return this.readLine(element, builder)
      case ElementType.Polyline:
        return this.readPointList(element, builder, false)
      case ElementType.Polygon:
        return this.readPointList(element, builder, true)
      default:
        throw new ShapeReadError(`Unsupported shape type: ${element.tag}`)
    }
  }
}
