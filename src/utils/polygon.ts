import { Point } from '../types/base'
import { isLeft } from './geometry'

/**
 * Winding number of an implicitly closed polygon around `point`, counted along a ray towards
 * +x: edges crossing it with increasing y count +1 when the point is on their left, edges with
 * decreasing y count -1 when it is on their right.
 */
export function computeWindingNumber(point: Point, polygon: Point[]): number {
  let windingNumber = 0

  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const from = polygon[j]
    const to = polygon[i]

    if (from.y <= point.y && to.y > point.y && isLeft(from, to, point) > 0) {
      windingNumber++
    } else if (from.y > point.y && to.y <= point.y && isLeft(from, to, point) < 0) {
      windingNumber--
    }
  }

  return windingNumber
}

// Sum of the winding numbers of several polygons, as seen by the non-zero fill rule.
export function computeTotalWindingNumber(point: Point, polygons: Point[][]): number {
  return polygons.reduce((total, polygon) => total + computeWindingNumber(point, polygon), 0)
}

export function isPointInsidePolygon(point: Point, polygon: Point[]): boolean {
  return computeWindingNumber(point, polygon) !== 0
}
