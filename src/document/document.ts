import { GradientRegistry, PaintServer } from '../gradients/gradient'
import { BoundingBox, Loop, Point } from '../types/base'
import { Paint } from '../types/paint'
import { computeBoundingBox } from '../utils/geometry'
import { AffineTransform } from '../utils/transform'

export type SvgPathInit = {
  loops: Loop[]
  triangles: Point[] | null
  fill: Paint
  stroke: Paint
  transform: AffineTransform
  id?: string
  title?: string
  description?: string
}

/**
 * One drawable shape. Geometry is kept in the element's local coordinates alongside the
 * accumulated transform that places it in the document.
 *
 * `triangles` is a flat list read in groups of three, or null when the shape has no fill or could
 * not be tessellated.
 */
export class SvgPath {
  public readonly loops: ReadonlyArray<Loop>
  public readonly triangles: ReadonlyArray<Point> | null
  public readonly fill: Paint
  public readonly stroke: Paint
  public readonly transform: AffineTransform
  public readonly id?: string
  public readonly title?: string
  public readonly description?: string

  constructor(init: SvgPathInit) {
    this.loops = init.loops
    this.triangles = init.triangles
    this.fill = init.fill
    this.stroke = init.stroke
    this.transform = init.transform
    this.id = init.id
    this.title = init.title
    this.description = init.description
  }

  get worldLoops(): Loop[] {
    return this.loops.map((loop) => loop.map((point) => this.transform.apply(point)))
  }

  get worldTriangles(): Point[] | null {
    return this.triangles ? this.triangles.map((point) => this.transform.apply(point)) : null
  }

  // Local-space bounds of the outline, or null for a shape without points.
  get bounds(): BoundingBox | null {
    return computeBoundingBox(this.loops.flat())
  }
}

export class SvgDocument {
  private readonly pathsById = new Map<string, SvgPath>()

  constructor(
    public readonly paths: ReadonlyArray<SvgPath>,
    public readonly width: number,
    public readonly height: number,
    public readonly rootTransform: AffineTransform,
    public readonly gradients: GradientRegistry
  ) {
    // The last path registered under an id wins.
    for (const path of paths) {
      if (path.id) {
        this.pathsById.set(path.id, path)
      }
    }
  }

  pathById(id: string): SvgPath | undefined {
    return this.pathsById.get(id)
  }

  gradient(id: string): PaintServer | undefined {
    return this.gradients.get(id)
  }
}
