import { describe, expect, it } from '@jest/globals'
import { splitEdgesAtIntersections } from '../src/tessellation/sweep'
import { TessellationError, triangulate } from '../src/tessellation/tessellator'
import { Loop, Point } from '../src/types/base'
import { calculateMeshArea, calculatePolygonArea } from '../src/utils/geometry'
import { computeTotalWindingNumber } from '../src/utils/polygon'

function square(x: number, y: number, size: number, reversed = false): Loop {
  const loop = [
    { x, y },
    { x: x + size, y },
    { x: x + size, y: y + size },
    { x, y: y + size }
  ]
  return reversed ? loop.reverse() : loop
}

function centroids(triangles: Point[]): Point[] {
  const points: Point[] = []
  for (let i = 0; i + 2 < triangles.length; i += 3) {
    points.push({
      x: (triangles[i].x + triangles[i + 1].x + triangles[i + 2].x) / 3,
      y: (triangles[i].y + triangles[i + 1].y + triangles[i + 2].y) / 3
    })
  }
  return points
}

describe('triangulate', () => {
  describe('Simple input', () => {
    it('should return nothing for no loops or loops without area', () => {
      expect(triangulate([])).toEqual([])
      expect(
        triangulate([
          [
            { x: 0, y: 0 },
            { x: 5, y: 5 }
          ]
        ])
      ).toEqual([])
    })

    it('should split a square into two triangles', () => {
      const triangles = triangulate([square(0, 0, 10)])
      expect(triangles).toHaveLength(6)
      expect(calculateMeshArea(triangles)).toBeCloseTo(100)
    })

    it('should ignore an explicit closing point', () => {
      const open = square(0, 0, 10)
      const closed = [...open, { x: 0, y: 0 }]
      expect(triangulate([closed])).toEqual(triangulate([open]))
    })

    it('should fill disjoint loops independently', () => {
      const triangles = triangulate([square(0, 0, 10), square(20, 0, 10)])
      expect(calculateMeshArea(triangles)).toBeCloseTo(200)
    })
  })

  describe('Holes', () => {
    it('should leave a hole wound against its outer loop', () => {
      const loops = [square(0, 0, 10), square(3, 3, 4, true)]
      const triangles = triangulate(loops)
      expect(calculateMeshArea(triangles)).toBeCloseTo(84)
      for (const centroid of centroids(triangles)) {
        expect(computeTotalWindingNumber(centroid, loops)).not.toBe(0)
      }
    })

    it('should fill a nested loop wound like its outer loop', () => {
      const triangles = triangulate([square(0, 0, 10), square(3, 3, 4)])
      expect(calculateMeshArea(triangles)).toBeCloseTo(100)
    })
  })

  describe('Intersecting input', () => {
    it('should fill both lobes of a bowtie', () => {
      const bowtie = [
        { x: 0, y: 0 },
        { x: 10, y: 10 },
        { x: 10, y: 0 },
        { x: 0, y: 10 }
      ]
      expect(calculateMeshArea(triangulate([bowtie]))).toBeCloseTo(50)
    })

    it('should take the union of overlapping loops wound the same way', () => {
      const triangles = triangulate([square(0, 0, 10), square(5, 5, 10)])
      expect(calculateMeshArea(triangles)).toBeCloseTo(175)
    })

    it('should cancel the overlap of loops wound against each other', () => {
      const loops = [square(0, 0, 10), square(5, 5, 10, true)]
      const triangles = triangulate(loops)
      expect(calculateMeshArea(triangles)).toBeCloseTo(150)
      for (const centroid of centroids(triangles)) {
        expect(computeTotalWindingNumber(centroid, loops)).not.toBe(0)
      }
    })

    it('should handle loops that share an edge', () => {
      const triangles = triangulate([square(0, 0, 10), square(10, 0, 10)])
      expect(calculateMeshArea(triangles)).toBeCloseTo(200)
    })
  })

  it('should fill a long contour without comparing every pair of edges', () => {
    const n = 20000
    const loop: Loop = []
    for (let i = 0; i < n; i++) {
      const angle = (2 * Math.PI * i) / n
      const radius = i % 2 === 0 ? 10 : 9.5
      loop.push({ x: radius * Math.cos(angle), y: radius * Math.sin(angle) })
    }

    const started = Date.now()
    const triangles = triangulate([loop])
    expect(Date.now() - started).toBeLessThan(3000)
    expect(calculateMeshArea(triangles)).toBeCloseTo(Math.abs(calculatePolygonArea(loop)), 1)
  })

  it('should reject non-finite coordinates', () => {
    const loop = [
      { x: 0, y: 0 },
      { x: NaN, y: 0 },
      { x: 5, y: 5 }
    ]
    expect(() => triangulate([loop])).toThrow(TessellationError)
  })
})

describe('splitEdgesAtIntersections', () => {
  it('should split crossing edges at their shared point', () => {
    const pieces = splitEdgesAtIntersections([
      { start: { x: 0, y: 0 }, end: { x: 10, y: 10 } },
      { start: { x: 10, y: 0 }, end: { x: 0, y: 10 } }
    ])
    expect(pieces).toEqual([
      { start: { x: 0, y: 0 }, end: { x: 5, y: 5 } },
      { start: { x: 5, y: 5 }, end: { x: 10, y: 10 } },
      { start: { x: 10, y: 0 }, end: { x: 5, y: 5 } },
      { start: { x: 5, y: 5 }, end: { x: 0, y: 10 } }
    ])
  })
})
