import { CurveFlattener } from '../bezier/flatten'
import {
  GradientRegistry,
  LinearGradient,
  PaintServer,
  RadialGradient
} from '../gradients/gradient'
import { ParseError } from '../parsers/exceptions'
import { parseLength, tokenize } from '../parsers/values'
import { PathBuilder } from '../paths/builder'
import { ShapeReader } from '../paths/shapes'
import { SvgReadError } from '../reader/base'
import { TessellationError, triangulate } from '../tessellation/tessellator'
import { Point, ViewBox } from '../types/base'
import {
  CONTAINER_ELEMENTS,
  ElementType,
  GRADIENT_ELEMENTS,
  IGNORED_ELEMENTS,
  SHAPE_ELEMENTS
} from '../types/elements'
import { ResolvedParseOptions } from '../types/options'
import { PaintType } from '../types/paint'
import { SvgNode } from '../types/svg'
import { AffineTransform } from '../utils/transform'
import { createRootContext, deriveContext, ParseContext, resolvePaints } from './context'
import { SvgDocument, SvgPath } from './document'

const ASPECT_RATIO_REGEX = /^(none|x(Min|Mid|Max)Y(Min|Mid|Max))(?:\s+(meet|slice))?$/

type Viewport = {
  width: number
  height: number
  transform: AffineTransform
}

function alignFactor(align: string | undefined): number {
  return align === 'Min' ? 0 : align === 'Max' ? 1 : 0.5
}

function describeElement(element: SvgNode): string {
  const id = element.attributes['id']
  return id ? `<${element.tag} id="${id}">` : `<${element.tag}>`
}

function childText(element: SvgNode, tag: string): string | undefined {
  return element.children.find((child) => child.tag === tag)?.text.trim()
}

/**
 * Walks an SvgNode tree depth first and collects one SvgPath per shape element.
 *
 * Faults stay local: a malformed transform or opacity drops the element and its subtree, and
 * malformed geometry drops only the element's own path. Both are reported as warnings.
 */
export class DocumentWalker {
  private readonly flattener: CurveFlattener
  private readonly shapeReader: ShapeReader
  private paths: SvgPath[] = []
  private gradients = new GradientRegistry()

  constructor(private readonly options: ResolvedParseOptions) {
    this.flattener = new CurveFlattener(options)
    this.shapeReader = new ShapeReader(options.circlePoints, options.warn)
  }

  walk(root: SvgNode): SvgDocument {
    if (root.tag !== ElementType.Svg) {
      throw new SvgReadError(`Expected an <svg> root element, found <${root.tag}>`)
    }

    this.paths = []
    this.gradients = new GradientRegistry()

    const viewport = this.readViewport(root)
    let context = createRootContext(viewport.transform)
    try {
      // The root's transform attribute does not apply; its paint properties do.
      const attributes = { ...root.attributes, transform: '' }
      context = deriveContext(context, { ...root, attributes }, this.options.warn)
    } catch (error) {
      this.warnOrThrow(error, `Ignoring presentation attributes on ${describeElement(root)}`)
    }

    for (const child of root.children) {
      this.walkElement(child, context, false)
    }

    return new SvgDocument(
      this.paths,
      viewport.width,
      viewport.height,
      viewport.transform,
      this.gradients
    )
  }

  private walkElement(element: SvgNode, parent: ParseContext, inDefinitions: boolean): void {
    const tag = element.tag

    if (IGNORED_ELEMENTS.has(tag)) {
      return
    }
    if (GRADIENT_ELEMENTS.has(tag)) {
      this.registerGradient(element)
      return
    }
    if (tag === ElementType.Definitions) {
      for (const child of element.children) {
        this.walkElement(child, parent, true)
      }
      return
    }

    const isShape = SHAPE_ELEMENTS.has(tag)
    if (!isShape && !CONTAINER_ELEMENTS.has(tag)) {
      this.options.warn(`Skipping unsupported element ${describeElement(element)}`)
      return
    }

    let context: ParseContext
    try {
      context = deriveContext(parent, element, this.options.warn)
    } catch (error) {
      this.warnOrThrow(error, `Skipping ${describeElement(element)} and its children`)
      return
    }

    // Shapes inside <defs> are templates, not drawing.
    if (isShape && !inDefinitions) {
      this.emitShape(element, context)
    }

    for (const child of element.children) {
      this.walkElement(child, context, inDefinitions)
    }
  }

  private emitShape(element: SvgNode, context: ParseContext): void {
    const builder = new PathBuilder(this.flattener, this.options.tolerance)
    try {
      this.shapeReader.read(element, builder)
    } catch (error) {
      this.warnOrThrow(error, `Skipping geometry of ${describeElement(element)}`)
      return
    }

    const loops = builder.finish()
    const { fill, stroke } = resolvePaints(context, this.options.strokeFromFill)

    let triangles: Point[] | null = null
    if (fill.type !== PaintType.None) {
      try {
        triangles = triangulate(loops)
      } catch (error) {
        if (!(error instanceof TessellationError)) {
          throw error
        }
        this.options.warn(`Could not fill ${describeElement(element)}: ${error.message}`)
      }
    }

    this.paths.push(
      new SvgPath({
        loops,
        triangles,
        fill,
        stroke,
        transform: context.transform,
        id: element.attributes['id'],
        title: childText(element, ElementType.Title),
        description: childText(element, ElementType.Description)
      })
    )
  }

  private registerGradient(element: SvgNode): void {
    const id = element.attributes['id']
    if (!id) {
      this.options.warn(`Ignoring ${describeElement(element)} without an id`)
      return
    }

    let server: PaintServer
    try {
      server =
        element.tag === ElementType.LinearGradient
          ? new LinearGradient(id, element, this.gradients, this.options.warn)
          : new RadialGradient(id, element, this.gradients, this.options.warn)
    } catch (error) {
      this.warnOrThrow(error, `Ignoring ${describeElement(element)}`)
      return
    }
    this.gradients.register(id, server)
  }

  private readViewBox(value: string | undefined): ViewBox | null {
    if (value === undefined) {
      return null
    }
    const values = tokenize(value).map(Number)
    if (values.length !== 4 || values.some(isNaN) || values[2] <= 0 || values[3] <= 0) {
      this.options.warn(`Ignoring invalid viewBox: ${value}`)
      return null
    }
    const [xMin, yMin, width, height] = values
    return { xMin, yMin, width, height }
  }

  /**
   * Document size and the transform from user space into it. The root transform is the identity,
   * or a vertical flip with `invertY`. With `fitViewBox`, a viewBox is first fitted to an explicit
   * width and height per `preserveAspectRatio`.
   */
  private readViewport(root: SvgNode): Viewport {
    const viewBox = this.readViewBox(root.attributes['viewBox'])
    const positive = (value: number | null) => (value !== null && value > 0 ? value : null)
    const explicitWidth = positive(parseLength(root.attributes['width']))
    const explicitHeight = positive(parseLength(root.attributes['height']))

    const width = explicitWidth ?? viewBox?.width ?? 0
    const height = explicitHeight ?? viewBox?.height ?? 0
    if (width === 0 || height === 0) {
      this.options.warn('Document has no usable width, height or viewBox')
    }

    // A viewBox alone sets the size and leaves coordinates as they are.
    let transform = AffineTransform.identity()
    const hasExplicitSize = explicitWidth !== null || explicitHeight !== null
    if (viewBox && hasExplicitSize && this.options.fitViewBox) {
      transform = this.fitViewBox(viewBox, width, height, root.attributes['preserveAspectRatio'])
    }
    if (this.options.invertY) {
      transform = AffineTransform.fromValues(1, 0, 0, -1, 0, height).compose(transform)
    }

    return { width, height, transform }
  }

  private fitViewBox(
    viewBox: ViewBox,
    width: number,
    height: number,
    preserveAspectRatio: string | undefined
  ): AffineTransform {
    const sx = width / viewBox.width
    const sy = height / viewBox.height

    const value = preserveAspectRatio?.trim() || 'xMidYMid meet'
    const match = ASPECT_RATIO_REGEX.exec(value)
    if (!match) {
      this.options.warn(`Ignoring invalid preserveAspectRatio: ${value}`)
    }
    const [align, xAlign, yAlign, mode] = match
      ? match.slice(1)
      : ['xMidYMid', 'Mid', 'Mid', 'meet']

    if (align === 'none') {
      return AffineTransform.fromValues(sx, 0, 0, sy, -viewBox.xMin * sx, -viewBox.yMin * sy)
    }

    const s = mode === 'slice' ? Math.max(sx, sy) : Math.min(sx, sy)
    const tx = -viewBox.xMin * s + alignFactor(xAlign) * (width - viewBox.width * s)
    const ty = -viewBox.yMin * s + alignFactor(yAlign) * (height - viewBox.height * s)
    return AffineTransform.fromValues(s, 0, 0, s, tx, ty)
  }

  private warnOrThrow(error: unknown, action: string): void {
    if (!(error instanceof ParseError)) {
      throw error
    }
    this.options.warn(`${action}: ${error.message}`)
  }
}
