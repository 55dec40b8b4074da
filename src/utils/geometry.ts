import { BoundingBox, Point } from '../types/base'

export function calculatePolygonArea(points: Point[]): number {
  // Signed area by the shoelace formula; positive for counter-clockwise in a y-up frame.
  // https://en.wikipedia.org/wiki/Shoelace_formula
  let area = 0
  const n = points.length

  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n
    area += points[i].x * points[j].y
    area -= points[j].x * points[i].y
  }

  return area / 2
}

export function calculateTriangleArea(a: Point, b: Point, c: Point): number {
  return Math.abs(isLeft(a, b, c)) / 2
}

// Total unsigned area of a flat triangle list.
export function calculateMeshArea(triangles: readonly Point[]): number {
  let area = 0
  for (let i = 0; i + 2 < triangles.length; i += 3) {
    area += calculateTriangleArea(triangles[i], triangles[i + 1], triangles[i + 2])
  }
  return area
}

export function isLeft(lineStart: Point, lineEnd: Point, point: Point): number {
  // The 2D cross product of AB and AP vectors.
  return (
    (lineEnd.x - lineStart.x) * (point.y - lineStart.y) -
    (point.x - lineStart.x) * (lineEnd.y - lineStart.y)
  )
}

export function computeBoundingBox(points: Point[]): BoundingBox | null {
  if (points.length === 0) {
    return null
  }

  let xMin = Infinity
  let yMin = Infinity
  let xMax = -Infinity
  let yMax = -Infinity
  for (const point of points) {
    xMin = Math.min(xMin, point.x)
    yMin = Math.min(yMin, point.y)
    xMax = Math.max(xMax, point.x)
    yMax = Math.max(yMax, point.y)
  }
  return { xMin, yMin, xMax, yMax }
}
