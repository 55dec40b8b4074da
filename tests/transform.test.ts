import { describe, expect, it } from '@jest/globals'
import { ParseError } from '../src/parsers/exceptions'
import { AffineTransform, DegenerateTransformError } from '../src/utils/transform'

describe('AffineTransform', () => {
  describe('Parsing', () => {
    it('should treat missing or blank text as the identity', () => {
      expect(AffineTransform.parse(undefined).toArray()).toEqual([1, 0, 0, 1, 0, 0])
      expect(AffineTransform.parse('   ').toArray()).toEqual([1, 0, 0, 1, 0, 0])
    })

    it('should parse a matrix', () => {
      expect(AffineTransform.parse('matrix(1 2 3 4 5 6)').toArray()).toEqual([1, 2, 3, 4, 5, 6])
    })

    it('should default the y translation to zero', () => {
      expect(AffineTransform.parse('translate(7)').apply({ x: 1, y: 1 })).toEqual({ x: 8, y: 1 })
    })

    it('should default the y scale to the x scale', () => {
      expect(AffineTransform.parse('scale(3)').apply({ x: 1, y: 2 })).toEqual({ x: 3, y: 6 })
    })

    it('should compose a list left to right', () => {
      // Scale first, then translate.
      const transform = AffineTransform.parse('translate(10, 20) scale(2)')
      expect(transform.apply({ x: 1, y: 1 })).toEqual({ x: 12, y: 22 })
    })

    it('should rotate by degrees about a pivot', () => {
      const point = AffineTransform.parse('rotate(90 5 5)').apply({ x: 10, y: 5 })
      expect(point.x).toBeCloseTo(5)
      expect(point.y).toBeCloseTo(10)
    })

    it('should parse skews', () => {
      const skewX = AffineTransform.parse('skewX(45)').apply({ x: 0, y: 2 })
      expect(skewX.x).toBeCloseTo(2)
      expect(skewX.y).toBeCloseTo(2)

      const skewY = AffineTransform.parse('skewY(45)').apply({ x: 3, y: 0 })
      expect(skewY.x).toBeCloseTo(3)
      expect(skewY.y).toBeCloseTo(3)
    })

    it('should reject a wrong number of arguments', () => {
      expect(() => AffineTransform.parse('matrix(1 2 3)')).toThrow(ParseError)
      expect(() => AffineTransform.parse('rotate(1 2)')).toThrow(ParseError)
    })

    it('should reject unknown text', () => {
      expect(() => AffineTransform.parse('shear(2)')).toThrow(ParseError)
      expect(() => AffineTransform.parse('translate(1) bogus')).toThrow(ParseError)
    })
  })

  describe('Algebra', () => {
    it('should apply the child transform before the parent', () => {
      const parent = AffineTransform.translate(10, 0)
      const child = AffineTransform.scale(2)
      expect(parent.compose(child).apply({ x: 1, y: 1 })).toEqual({ x: 12, y: 2 })
      expect(child.compose(parent).apply({ x: 1, y: 1 })).toEqual({ x: 22, y: 2 })
    })

    it('should round trip a point through the inverse', () => {
      const transform = AffineTransform.parse('translate(3 -4) rotate(30) scale(2 0.5)')
      const point = { x: 7.5, y: -1.25 }
      const back = transform.invert().apply(transform.apply(point))
      expect(back.x).toBeCloseTo(point.x)
      expect(back.y).toBeCloseTo(point.y)
    })

    it('should compose with its inverse to the identity', () => {
      const transform = AffineTransform.fromValues(2, 1, -1, 3, 4, 5)
      expect(transform.compose(transform.invert()).equals(AffineTransform.identity())).toBe(true)
    })

    it('should refuse to invert a singular transform', () => {
      expect(() => AffineTransform.scale(0, 1).invert()).toThrow(DegenerateTransformError)
      expect(() => AffineTransform.fromValues(1, 2, 2, 4, 0, 0).invert()).toThrow(
        DegenerateTransformError
      )
    })

    it('should report the determinant', () => {
      expect(AffineTransform.fromValues(2, 1, -1, 3, 4, 5).determinant()).toBe(7)
    })

    it('should export a column-major 4x4 matrix', () => {
      expect(AffineTransform.fromValues(1, 2, 3, 4, 5, 6).toHomogeneous4x4()).toEqual([
        1, 2, 0, 0, 3, 4, 0, 0, 0, 0, 1, 0, 5, 6, 0, 1
      ])
    })
  })
})
