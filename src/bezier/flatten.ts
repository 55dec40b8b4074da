import { Point } from '../types/base'

export type FlatteningOptions = {
  bezierPoints: number
  circlePoints: number
  maxFlattenPoints: number
}

// Signed angle between u and v, in (-π, π].
function computeVectorAngle(u: Point, v: Point): number {
  const cos = (u.x * v.x + u.y * v.y) / Math.sqrt((u.x ** 2 + u.y ** 2) * (v.x ** 2 + v.y ** 2))
  const angle = Math.acos(Math.min(1, Math.max(-1, cos)))
  return u.x * v.y > u.y * v.x ? angle : -angle
}

// Bernstein basis of the cubic Bezier sampled at n + 1 evenly spaced t in [0, 1].
export function computeBezierCoefficients(n: number): [number, number, number, number][] {
  const coefficients: [number, number, number, number][] = []
  for (let i = 0; i <= n; i++) {
    const t = i / n
    const mt = 1 - t
    coefficients.push([mt ** 3, 3 * t * mt ** 2, 3 * t ** 2 * mt, t ** 3])
  }
  return coefficients
}

/**
 * Turns curved segments into polylines at a fixed resolution.
 *
 * The Bezier basis is sampled once on construction; afterwards the flattener holds no state and
 * can be shared by every builder of a parse.
 */
export class CurveFlattener {
  private readonly coefficients: [number, number, number, number][]

  constructor(private readonly options: FlatteningOptions) {
    this.coefficients = computeBezierCoefficients(
      Math.min(options.bezierPoints, options.maxFlattenPoints)
    )
  }

  // Samples the cubic from p0 to p3, both endpoints included.
  cubic(p0: Point, p1: Point, p2: Point, p3: Point): Point[] {
    return this.coefficients.map(([t0, t1, t2, t3]) => ({
      x: t0 * p0.x + t1 * p1.x + t2 * p2.x + t3 * p3.x,
      y: t0 * p0.y + t1 * p1.y + t2 * p2.y + t3 * p3.y
    }))
  }

  quadratic(start: Point, control: Point, end: Point): Point[] {
    // Degree elevation onto the cubic basis.
    const control1 = {
      x: start.x + (2 / 3) * (control.x - start.x),
      y: start.y + (2 / 3) * (control.y - start.y)
    }
    const control2 = {
      x: end.x + (2 / 3) * (control.x - end.x),
      y: end.y + (2 / 3) * (control.y - end.y)
    }
    return this.cubic(start, control1, control2, end)
  }

  /**
   * Flattens an SVG elliptical arc from `start` to `end`, returning the points after `start`.
   * The last point is always `end` itself.
   *
   * Follows the endpoint-to-center conversion of
   * https://www.w3.org/TR/SVG11/implnote.html#ArcImplementationNotes, except that radii too
   * small to span the chord are not scaled up: the radicand is clamped to zero and the arc is
   * drawn about the chord midpoint. That fallback is lossy for malformed radii.
   */
  arc(
    start: Point,
    rx: number,
    ry: number,
    xAxisRotation: number,
    largeArc: boolean,
    sweep: boolean,
    end: Point
  ): Point[] {
    if (start.x === end.x && start.y === end.y) {
      return []
    }

    rx = Math.abs(rx)
    ry = Math.abs(ry)
    if (rx === 0 || ry === 0) {
      return [{ ...end }]
    }

    const phi = (xAxisRotation * Math.PI) / 180
    const cp = Math.cos(phi)
    const sp = Math.sin(phi)

    // Chord midpoint offset in the ellipse's frame.
    const dx = 0.5 * (start.x - end.x)
    const dy = 0.5 * (start.y - end.y)
    const x_ = cp * dx + sp * dy
    const y_ = -sp * dx + cp * dy

    const radicand =
      ((rx * ry) ** 2 - (rx * y_) ** 2 - (ry * x_) ** 2) / ((rx * y_) ** 2 + (ry * x_) ** 2)
    let r = Math.sqrt(Math.max(0, radicand))
    if (largeArc === sweep) {
      r = -r
    }

    const cx_ = (r * rx * y_) / ry
    const cy_ = (-r * ry * x_) / rx
    const cx = cp * cx_ - sp * cy_ + 0.5 * (start.x + end.x)
    const cy = sp * cx_ + cp * cy_ + 0.5 * (start.y + end.y)

    const u = { x: (x_ - cx_) / rx, y: (y_ - cy_) / ry }
    const v = { x: (-x_ - cx_) / rx, y: (-y_ - cy_) / ry }
    const psi = computeVectorAngle({ x: 1, y: 0 }, u)
    let delta = computeVectorAngle(u, v)
    if (sweep && delta < 0) {
      delta += 2 * Math.PI
    }
    if (!sweep && delta > 0) {
      delta -= 2 * Math.PI
    }

    const nSegments = Math.min(
      Math.max(Math.floor(Math.abs((this.options.circlePoints * delta) / (2 * Math.PI))), 1),
      this.options.maxFlattenPoints
    )

    const points: Point[] = []
    for (let i = 1; i < nSegments; i++) {
      const theta = psi + (i * delta) / nSegments
      const ct = Math.cos(theta)
      const st = Math.sin(theta)
      points.push({
        x: cp * rx * ct - sp * ry * st + cx,
        y: sp * rx * ct + cp * ry * st + cy
      })
    }
    points.push({ ...end })

    return points
  }
}
