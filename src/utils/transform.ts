import { ParseError } from '../parsers/exceptions'
import { isLetterToken, tokenize } from '../parsers/values'
import { Point } from '../types/base'

export class DegenerateTransformError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'DegenerateTransformError'
  }
}

export enum TransformType {
  Translate = 'translate',
  Scale = 'scale',
  Rotate = 'rotate',
  SkewX = 'skewX',
  SkewY = 'skewY',
  Matrix = 'matrix'
}

const TRANSFORM_REGEX = /(translate|scale|rotate|matrix|skewX|skewY)\s*\(([^)]*)\)/g

function parseArguments(type: string, valuesStr: string, allowedCounts: number[]): number[] {
  const tokens = tokenize(valuesStr)
  if (tokens.some(isLetterToken) || !allowedCounts.includes(tokens.length)) {
    throw new ParseError(`Invalid ${type} arguments: (${valuesStr.trim()})`)
  }
  return tokens.map(Number)
}

/**
 * A 2D affine map.
 *
 * ```
 * [a, c, e]
 * [b, d, f]
 * [0, 0, 1]
 * ```
 *
 * See https://www.w3.org/TR/SVG11/coords.html.
 */
export class AffineTransform {
  constructor(
    public readonly a: number = 1,
    public readonly b: number = 0,
    public readonly c: number = 0,
    public readonly d: number = 1,
    public readonly e: number = 0,
    public readonly f: number = 0
  ) {}

  // Static factory methods.
  static identity(): AffineTransform {
    return new AffineTransform()
  }

  static fromValues(
    a: number,
    b: number,
    c: number,
    d: number,
    e: number,
    f: number
  ): AffineTransform {
    return new AffineTransform(a, b, c, d, e, f)
  }

  static translate(x: number, y: number = 0): AffineTransform {
    return new AffineTransform(1, 0, 0, 1, x, y)
  }

  static scale(x: number, y: number = x): AffineTransform {
    return new AffineTransform(x, 0, 0, y, 0, 0)
  }

  // Rotation by `angle` degrees about the pivot (cx, cy).
  static rotate(angle: number, cx: number = 0, cy: number = 0): AffineTransform {
    const rad = (angle * Math.PI) / 180
    const cos = Math.cos(rad)
    const sin = Math.sin(rad)
    return new AffineTransform(
      cos,
      sin,
      -sin,
      cos,
      -cx * cos + cy * sin + cx,
      -cx * sin - cy * cos + cy
    )
  }

  static skewX(angle: number): AffineTransform {
    return new AffineTransform(1, 0, Math.tan((angle * Math.PI) / 180), 1, 0, 0)
  }

  static skewY(angle: number): AffineTransform {
    return new AffineTransform(1, Math.tan((angle * Math.PI) / 180), 0, 1, 0, 0)
  }

  /**
   * Parses an SVG `transform` attribute. Lists are composed left to right, so
   * `translate(10) scale(2)` scales first and then translates. Absent or blank text is the
   * identity.
   */
  static parse(transformStr: string | undefined): AffineTransform {
    if (!transformStr || !transformStr.trim()) {
      return new AffineTransform()
    }

    let transform = new AffineTransform()
    let match: RegExpExecArray | null
    let unmatched = ''
    let iLastEnd = 0

    TRANSFORM_REGEX.lastIndex = 0
    while ((match = TRANSFORM_REGEX.exec(transformStr)) !== null) {
      unmatched += transformStr.slice(iLastEnd, match.index)
      iLastEnd = match.index + match[0].length

      const [, type, valuesStr] = match
      switch (type) {
        case TransformType.Matrix: {
          const [a, b, c, d, e, f] = parseArguments(type, valuesStr, [6])
          transform = transform.compose(new AffineTransform(a, b, c, d, e, f))
          break
        }
        case TransformType.Translate: {
          const [tx, ty = 0] = parseArguments(type, valuesStr, [1, 2])
          transform = transform.compose(AffineTransform.translate(tx, ty))
          break
        }
        case TransformType.Scale: {
          const [sx, sy = sx] = parseArguments(type, valuesStr, [1, 2])
          transform = transform.compose(AffineTransform.scale(sx, sy))
          break
        }
        case TransformType.Rotate: {
          const [angle, cx = 0, cy = 0] = parseArguments(type, valuesStr, [1, 3])
          transform = transform.compose(AffineTransform.rotate(angle, cx, cy))
          break
        }
        case TransformType.SkewX: {
          const [angle] = parseArguments(type, valuesStr, [1])
          transform = transform.compose(AffineTransform.skewX(angle))
          break
        }
        case TransformType.SkewY: {
          const [angle] = parseArguments(type, valuesStr, [1])
          transform = transform.compose(AffineTransform.skewY(angle))
          break
        }
      }
    }
    unmatched += transformStr.slice(iLastEnd)

    // Only separators may remain between the recognised items.
    if (!/^[\s,]*$/.test(unmatched)) {
      throw new ParseError(`Invalid transform: ${transformStr}`)
    }

    return transform
  }

  apply(point: Point): Point {
    return {
      x: this.a * point.x + this.c * point.y + this.e,
      y: this.b * point.x + this.d * point.y + this.f
    }
  }

  // this ∘ other: `other` is applied first, then this.
  compose(other: AffineTransform): AffineTransform {
    return new AffineTransform(
      this.a * other.a + this.c * other.b,
      this.b * other.a + this.d * other.b,
      this.a * other.c + this.c * other.d,
      this.b * other.c + this.d * other.d,
      this.a * other.e + this.c * other.f + this.e,
      this.b * other.e + this.d * other.f + this.f
    )
  }

  determinant(): number {
    return this.a * this.d - this.b * this.c
  }

  invert(): AffineTransform {
    const det = this.determinant()
    if (det === 0 || !Number.isFinite(det)) {
      throw new DegenerateTransformError(`Cannot invert transform ${this.toString()}`)
    }
    return new AffineTransform(
      this.d / det,
      -this.b / det,
      -this.c / det,
      this.a / det,
      (this.c * this.f - this.d * this.e) / det,
      (this.b * this.e - this.a * this.f) / det
    )
  }

  // Column-major 4x4 matrix with the z row and column left as identity.
  toHomogeneous4x4(): number[] {
    return [
      this.a, this.b, 0, 0,
      this.c, this.d, 0, 0,
      0, 0, 1, 0,
      this.e, this.f, 0, 1
    ]
  }

  toArray(): [number, number, number, number, number, number] {
    return [this.a, this.b, this.c, this.d, this.e, this.f]
  }

  equals(other: AffineTransform, epsilon: number = 1e-9): boolean {
    const mine = this.toArray()
    return other.toArray().every((value, i) => Math.abs(value - mine[i]) <= epsilon)
  }

  toString(): string {
    return `matrix(${this.toArray().join(', ')})`
  }
}
