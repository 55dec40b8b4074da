import { Point } from '../types/base'
import { EPS_INTERSECTION, EPS_PARAM } from './constants'

export interface Line {
  start: Point
  end: Point
}

export interface LineIntersection {
  point: Point
  t1: number // How far into line 1 the intersection is, [0, 1].
  t2: number // How far into line 2 the intersection is, [0, 1].
}

function isParameterOnSegment(t: number): boolean {
  return t >= -EPS_PARAM && t <= 1 + EPS_PARAM
}

function clampParameter(t: number): number {
  return Math.min(1, Math.max(0, t))
}

// Endpoints of `other` lying on `line`, for collinear overlaps.
function getCollinearContacts(line: Line, other: Line, swap: boolean): LineIntersection[] {
  const dx = line.end.x - line.start.x
  const dy = line.end.y - line.start.y
  const lengthSquared = dx * dx + dy * dy
  const contacts: LineIntersection[] = []

  const candidates: [Point, number][] = [
    [other.start, 0],
    [other.end, 1]
  ]
  for (const [point, tOther] of candidates) {
    const t = ((point.x - line.start.x) * dx + (point.y - line.start.y) * dy) / lengthSquared
    if (isParameterOnSegment(t)) {
      const tLine = clampParameter(t)
      contacts.push(
        swap
          ? { point: { ...point }, t1: tOther, t2: tLine }
          : { point: { ...point }, t1: tLine, t2: tOther }
      )
    }
  }

  return contacts
}

/**
 * Finds where two segments meet, endpoints included.
 *
 * Crossing segments give at most one intersection. Collinear overlapping segments give the
 * endpoints of each that lie on the other. Intersections close to an endpoint take that
 * endpoint's exact coordinates so that both segments split at the same point.
 */
export function getLineLineIntersection(line1: Line, line2: Line): LineIntersection[] {
  const d1x = line1.end.x - line1.start.x
  const d1y = line1.end.y - line1.start.y
  const d2x = line2.end.x - line2.start.x
  const d2y = line2.end.y - line2.start.y

  const length1 = Math.hypot(d1x, d1y)
  const length2 = Math.hypot(d2x, d2y)
  if (length1 < EPS_INTERSECTION || length2 < EPS_INTERSECTION) {
    return []
  }

  const dx = line2.start.x - line1.start.x
  const dy = line2.start.y - line1.start.y
  const denominator = d1x * d2y - d1y * d2x

  // Parallel: only collinear segments can touch.
  if (Math.abs(denominator) <= EPS_INTERSECTION * length1 * length2) {
    const offset = Math.abs(dx * d1y - dy * d1x) / length1
    if (offset > EPS_INTERSECTION * Math.max(1, length1)) {
      return []
    }
    return [
      ...getCollinearContacts(line1, line2, false),
      ...getCollinearContacts(line2, line1, true)
    ]
  }

  let t1 = (dx * d2y - dy * d2x) / denominator
  let t2 = (dx * d1y - dy * d1x) / denominator
  if (!isParameterOnSegment(t1) || !isParameterOnSegment(t2)) {
    return []
  }
  t1 = clampParameter(t1)
  t2 = clampParameter(t2)

  let point: Point
  if (t2 <= EPS_PARAM) {
    point = { ...line2.start }
  } else if (t2 >= 1 - EPS_PARAM) {
    point = { ...line2.end }
  } else if (t1 <= EPS_PARAM) {
    point = { ...line1.start }
  } else if (t1 >= 1 - EPS_PARAM) {
    point = { ...line1.end }
  } else {
    point = { x: line1.start.x + t1 * d1x, y: line1.start.y + t1 * d1y }
  }

  return [{ point, t1, t2 }]
}

export function doBoundingBoxesOverlap(line1: Line, line2: Line, epsilon: number): boolean {
  return !(
    Math.max(line1.start.x, line1.end.x) < Math.min(line2.start.x, line2.end.x) - epsilon ||
    Math.max(line2.start.x, line2.end.x) < Math.min(line1.start.x, line1.end.x) - epsilon ||
    Math.max(line1.start.y, line1.end.y) < Math.min(line2.start.y, line2.end.y) - epsilon ||
    Math.max(line2.start.y, line2.end.y) < Math.min(line1.start.y, line1.end.y) - epsilon
  )
}

/**
 * Visits every pair of segments whose x ranges come within `epsilon` of each other, as indices
 * `i < j` into `lines`. Segments are swept in order of their smallest x, so a pair far apart in x
 * is never visited. The sweep stops as soon as `visit` returns false.
 */
export function forEachNearbyPair(
  lines: readonly Line[],
  epsilon: number,
  visit: (i: number, j: number) => boolean
): void {
  const order = lines
    .map((line, i) => ({
      i,
      minX: Math.min(line.start.x, line.end.x),
      maxX: Math.max(line.start.x, line.end.x)
    }))
    .sort((a, b) => a.minX - b.minX)

  for (let p = 0; p < order.length; p++) {
    const current = order[p]
    for (let q = p + 1; q < order.length; q++) {
      const other = order[q]
      if (other.minX > current.maxX + epsilon) {
        break
      }
      if (!visit(Math.min(current.i, other.i), Math.max(current.i, other.i))) {
        return
      }
    }
  }
}
