export type Point = {
  x: number
  y: number
}

// An ordered run of points. Closed when the last point duplicates the first.
export type Loop = Point[]

export type ViewBox = {
  xMin: number
  yMin: number
  width: number
  height: number
}

export type BoundingBox = {
  xMin: number
  yMin: number
  xMax: number
  yMax: number
}
