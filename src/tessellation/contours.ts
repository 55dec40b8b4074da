import { Loop, Point } from '../types/base'
import { Line } from '../intersections/intersections'

export class TessellationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TessellationError'
  }
}

// A directed boundary edge, tagged with its position in its contour.
export interface ContourEdge extends Line {
  iContour: number
  iEdge: number
  nEdges: number
}

function isSamePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y
}

/**
 * Normalizes loops into implicitly closed contours: the closing duplicate and repeated
 * consecutive points are removed, and contours with fewer than three points are dropped since
 * they enclose no area.
 */
export function prepareContours(loops: readonly Loop[]): Point[][] {
  const contours: Point[][] = []

  for (const loop of loops) {
    const contour: Point[] = []
    for (const point of loop) {
      if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
        throw new TessellationError(`Non-finite vertex (${point.x}, ${point.y})`)
      }
      if (contour.length === 0 || !isSamePoint(contour[contour.length - 1], point)) {
        contour.push({ x: point.x, y: point.y })
      }
    }
    while (contour.length > 1 && isSamePoint(contour[0], contour[contour.length - 1])) {
      contour.pop()
    }
    if (contour.length >= 3) {
      contours.push(contour)
    }
  }

  return contours
}

export function collectEdges(contours: Point[][]): ContourEdge[] {
  const edges: ContourEdge[] = []
  contours.forEach((contour, iContour) => {
    const nEdges = contour.length
    contour.forEach((start, iEdge) => {
      edges.push({ start, end: contour[(iEdge + 1) % nEdges], iContour, iEdge, nEdges })
    })
  })
  return edges
}

export function areEdgesAdjacent(edge1: ContourEdge, edge2: ContourEdge): boolean {
  return (
    edge1.iContour === edge2.iContour &&
    ((edge1.iEdge + 1) % edge1.nEdges === edge2.iEdge ||
      (edge2.iEdge + 1) % edge2.nEdges === edge1.iEdge)
  )
}
