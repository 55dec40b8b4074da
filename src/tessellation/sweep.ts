import { EPS_PARAM } from '../intersections/constants'
import { forEachNearbyPair, getLineLineIntersection, Line } from '../intersections/intersections'
import { Point } from '../types/base'
import { isLeft } from '../utils/geometry'

type EdgeSplit = {
  t: number
  point: Point
}

type SweepSegment = {
  top: Point // Endpoint with the smaller y.
  bottom: Point
  direction: number // +1 when the original edge runs towards +y, -1 otherwise.
}

type SlabCrossing = {
  xTop: number
  xMid: number
  xBottom: number
  direction: number
}

// Smallest doubled area kept for an emitted triangle.
const MIN_DOUBLE_AREA = 1e-12

/**
 * Splits every edge at each point where it meets another edge, so that afterwards edges only
 * meet at shared endpoints or overlap entirely. Intersection vertices are computed once and
 * shared by both edges.
 */
export function splitEdgesAtIntersections(edges: Line[]): Line[] {
  const splits: EdgeSplit[][] = edges.map(() => [])

  // Intersections may sit a parameter epsilon past an endpoint, so the x slack scales with extent.
  const extent = edges.reduce(
    (largest, edge) => Math.max(largest, Math.abs(edge.start.x), Math.abs(edge.end.x)),
    1
  )
  forEachNearbyPair(edges, 2 * EPS_PARAM * extent, (i, j) => {
    for (const { point, t1, t2 } of getLineLineIntersection(edges[i], edges[j])) {
      if (t1 > EPS_PARAM && t1 < 1 - EPS_PARAM) {
        splits[i].push({ t: t1, point })
      }
      if (t2 > EPS_PARAM && t2 < 1 - EPS_PARAM) {
        splits[j].push({ t: t2, point })
      }
    }
    return true
  })

  const pieces: Line[] = []
  edges.forEach((edge, i) => {
    const points = [edge.start, ...splits[i].sort((a, b) => a.t - b.t).map((s) => s.point)]
    points.push(edge.end)

    let start = points[0]
    for (const point of points.slice(1)) {
      if (point.x !== start.x || point.y !== start.y) {
        pieces.push({ start, end: point })
        start = point
      }
    }
  })

  return pieces
}

function computeXAt(segment: SweepSegment, y: number): number {
  if (y <= segment.top.y) {
    return segment.top.x
  }
  if (y >= segment.bottom.y) {
    return segment.bottom.x
  }
  const t = (y - segment.top.y) / (segment.bottom.y - segment.top.y)
  return segment.top.x + t * (segment.bottom.x - segment.top.x)
}

function pushTriangle(triangles: Point[], a: Point, b: Point, c: Point): void {
  if (Math.abs(isLeft(a, b, c)) > MIN_DOUBLE_AREA) {
    triangles.push({ ...a }, { ...b }, { ...c })
  }
}

/**
 * Non-zero fill of arbitrary (self-intersecting, overlapping) edges by trapezoidal
 * decomposition.
 *
 * The plane is cut into horizontal slabs at every vertex height. No two edges cross inside a
 * slab, so the edges spanning it keep one left-to-right order; walking that order while summing
 * edge directions gives the winding number of each span, and every maximal span with nonzero
 * winding is emitted as a trapezoid of two triangles.
 */
export function triangulateSweep(edges: Line[]): Point[] {
  const segments: SweepSegment[] = splitEdgesAtIntersections(edges)
    .filter((edge) => edge.start.y !== edge.end.y)
    .map((edge) =>
      edge.start.y < edge.end.y
        ? { top: edge.start, bottom: edge.end, direction: 1 }
        : { top: edge.end, bottom: edge.start, direction: -1 }
    )
    .sort((a, b) => a.top.y - b.top.y)

  const ys = [...new Set(segments.flatMap((s) => [s.top.y, s.bottom.y]))].sort((a, b) => a - b)

  const triangles: Point[] = []
  let active: SweepSegment[] = []
  let iNext = 0

  for (let k = 0; k + 1 < ys.length; k++) {
    const yTop = ys[k]
    const yBottom = ys[k + 1]
    const yMid = (yTop + yBottom) / 2

    while (iNext < segments.length && segments[iNext].top.y <= yTop) {
      active.push(segments[iNext])
      iNext++
    }
    active = active.filter((segment) => segment.bottom.y > yTop)

    const crossings: SlabCrossing[] = active
      .map((segment) => ({
        xTop: computeXAt(segment, yTop),
        xMid: computeXAt(segment, yMid),
        xBottom: computeXAt(segment, yBottom),
        direction: segment.direction
      }))
      .sort((a, b) => a.xMid - b.xMid)

    let winding = 0
    let left: SlabCrossing | null = null
    for (const crossing of crossings) {
      const before = winding
      winding += crossing.direction
      if (before === 0 && winding !== 0) {
        left = crossing
      } else if (before !== 0 && winding === 0 && left) {
        const a = { x: left.xTop, y: yTop }
        const b = { x: crossing.xTop, y: yTop }
        const c = { x: crossing.xBottom, y: yBottom }
        const d = { x: left.xBottom, y: yBottom }
        pushTriangle(triangles, a, b, c)
        pushTriangle(triangles, a, c, d)
        left = null
      }
    }
  }

  return triangles
}
