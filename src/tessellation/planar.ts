import earcut from 'earcut'
import { EPS_GEOMETRY } from '../constants'
import {
  doBoundingBoxesOverlap,
  forEachNearbyPair,
  getLineLineIntersection
} from '../intersections/intersections'
import { Point } from '../types/base'
import { calculatePolygonArea } from '../utils/geometry'
import { isPointInsidePolygon } from '../utils/polygon'
import { areEdgesAdjacent, ContourEdge } from './contours'

// Consecutive edges folding back over each other.
function isBacktrack(edge1: ContourEdge, edge2: ContourEdge): boolean {
  const ax = edge1.end.x - edge1.start.x
  const ay = edge1.end.y - edge1.start.y
  const bx = edge2.end.x - edge2.start.x
  const by = edge2.end.y - edge2.start.y
  const cross = ax * by - ay * bx
  const dot = ax * bx + ay * by
  return Math.abs(cross) <= EPS_GEOMETRY * Math.hypot(ax, ay) * Math.hypot(bx, by) && dot < 0
}

// True when no two edges meet, other than consecutive edges at their shared vertex.
export function isPlanarInput(edges: ContourEdge[]): boolean {
  let planar = true
  forEachNearbyPair(edges, EPS_GEOMETRY, (i, j) => {
    const edge1 = edges[i]
    const edge2 = edges[j]
    if (!doBoundingBoxesOverlap(edge1, edge2, EPS_GEOMETRY)) {
      return true
    }
    if (areEdgesAdjacent(edge1, edge2)) {
      planar = !isBacktrack(edge1, edge2)
    } else {
      planar = getLineLineIntersection(edge1, edge2).length === 0
    }
    return planar
  })
  return planar
}

/**
 * Triangulates contours that neither cross nor touch.
 *
 * Such contours nest as a tree. The winding number just inside a contour is the sum of the
 * orientations of every contour enclosing it, itself included; each contour with a nonzero
 * interior winding is a filled face whose holes are its direct children.
 */
export function triangulatePlanar(contours: Point[][]): Point[] {
  const areas = contours.map(calculatePolygonArea)
  const parents: number[] = contours.map(() => -1)
  const windings: number[] = areas.map((area) => Math.sign(area))

  contours.forEach((contour, j) => {
    contours.forEach((other, i) => {
      if (i === j || !isPointInsidePolygon(contour[0], other)) {
        return
      }
      windings[j] += Math.sign(areas[i])
      const iParent = parents[j]
      if (iParent < 0 || Math.abs(areas[i]) < Math.abs(areas[iParent])) {
        parents[j] = i
      }
    })
  })

  const triangles: Point[] = []
  contours.forEach((outer, j) => {
    if (windings[j] === 0 || areas[j] === 0) {
      return
    }

    const vertices: Point[] = [...outer]
    const holeIndices: number[] = []
    contours.forEach((hole, k) => {
      if (parents[k] === j) {
        holeIndices.push(vertices.length)
        vertices.push(...hole)
      }
    })

    const flat: number[] = []
    vertices.forEach((vertex) => flat.push(vertex.x, vertex.y))
    for (const index of earcut(flat, holeIndices, 2)) {
      triangles.push({ ...vertices[index] })
    }
  })

  return triangles
}
