import { describe, expect, it } from '@jest/globals'
import {
  forEachNearbyPair,
  getLineLineIntersection,
  Line
} from '../../src/intersections/intersections'

function segment(x1: number, y1: number, x2: number, y2: number): Line {
  return { start: { x: x1, y: y1 }, end: { x: x2, y: y2 } }
}

describe('getLineLineIntersection', () => {
  describe('Crossings', () => {
    it('should meet diagonals at their midpoints', () => {
      expect(getLineLineIntersection(segment(0, 0, 4, 4), segment(0, 4, 4, 0))).toEqual([
        { point: { x: 2, y: 2 }, t1: 0.5, t2: 0.5 }
      ])
    })

    it('should miss segments that would only cross when extended', () => {
      expect(getLineLineIntersection(segment(0, 0, 2, 0), segment(3, -1, 3, 1))).toEqual([])
    })
  })

  describe('Contacts', () => {
    it('should report a T-junction at the stem endpoint', () => {
      expect(getLineLineIntersection(segment(0, 0, 10, 0), segment(4, 0, 4, 6))).toEqual([
        { point: { x: 4, y: 0 }, t1: 0.4, t2: 0 }
      ])
    })

    it('should report a shared vertex at the end of one and the start of the other', () => {
      expect(getLineLineIntersection(segment(0, 0, 5, 0), segment(5, 0, 5, 5))).toEqual([
        { point: { x: 5, y: 0 }, t1: 1, t2: 0 }
      ])
    })

    it('should report both ends of a collinear overlap', () => {
      const contacts = getLineLineIntersection(segment(0, 0, 6, 0), segment(4, 0, 10, 0))

      expect(contacts.map((contact) => contact.point)).toEqual([
        { x: 4, y: 0 },
        { x: 6, y: 0 }
      ])
      expect(contacts[0].t1).toBeCloseTo(2 / 3)
      expect(contacts[0].t2).toBe(0)
      expect(contacts[1].t1).toBe(1)
      expect(contacts[1].t2).toBeCloseTo(1 / 3)
    })

    it('should report collinear segments touching end to end from both sides', () => {
      expect(getLineLineIntersection(segment(0, 0, 5, 0), segment(5, 0, 9, 0))).toEqual([
        { point: { x: 5, y: 0 }, t1: 1, t2: 0 },
        { point: { x: 5, y: 0 }, t1: 1, t2: 0 }
      ])
    })

    it('should snap a contact within a parameter epsilon onto the exact endpoint', () => {
      const [contact] = getLineLineIntersection(segment(0, 0, 10, 0), segment(4, 1e-12, 4, 5))
      expect(contact.point).toEqual({ x: 4, y: 1e-12 })
      expect(contact.t2).toBe(0)
    })
  })

  describe('Misses', () => {
    it('should ignore parallel segments apart from each other', () => {
      expect(getLineLineIntersection(segment(0, 0, 10, 0), segment(0, 5, 10, 5))).toEqual([])
    })

    it('should ignore zero-length segments', () => {
      expect(getLineLineIntersection(segment(1, 1, 1, 1), segment(0, 0, 2, 2))).toEqual([])
    })
  })
})

describe('forEachNearbyPair', () => {
  const lines = [
    segment(0, 0, 1, 1),
    segment(0.5, 0, 2, 0),
    segment(3, 0, 4, 0),
    segment(1.5, 2, 3.5, 2)
  ]

  it('should visit only pairs whose x ranges overlap', () => {
    const pairs: [number, number][] = []
    forEachNearbyPair(lines, 0, (i, j) => {
      pairs.push([i, j])
      return true
    })
    expect(pairs).toEqual([
      [0, 1],
      [1, 3],
      [2, 3]
    ])
  })

  it('should widen each range by epsilon', () => {
    const pairs: [number, number][] = []
    forEachNearbyPair([segment(0, 0, 1, 0), segment(1.5, 0, 2, 0)], 0.5, (i, j) => {
      pairs.push([i, j])
      return true
    })
    expect(pairs).toEqual([[0, 1]])
  })

  it('should stop once the visitor returns false', () => {
    let visits = 0
    forEachNearbyPair(lines, 0, () => {
      visits++
      return false
    })
    expect(visits).toBe(1)
  })
})
