import { CurveFlattener } from '../bezier/flatten'
import { Loop, Point } from '../types/base'

// Drops every point within `tolerance` (squared distance) of the last point kept.
export function mergeAdjacentPoints(loop: Loop, tolerance: number): Loop {
  if (loop.length === 0) {
    return []
  }

  const merged: Loop = [loop[0]]
  for (const point of loop) {
    const last = merged[merged.length - 1]
    if ((point.x - last.x) ** 2 + (point.y - last.y) ** 2 > tolerance) {
      merged.push(point)
    }
  }
  return merged
}

/**
 * Accumulates the loops of a single shape element.
 *
 * One builder is created per element and discarded once `finish` has been called, so no drawing
 * state leaks from one element into the next.
 */
export class PathBuilder {
  private current: Point = { x: 0, y: 0 }
  private subpathStart: Point = { x: 0, y: 0 }
  private loop: Loop = []
  private readonly loops: Loop[] = []

  // Second control point of the previous curve, for the S and T shorthands.
  private lastCubicControl: Point | null = null
  private lastQuadraticControl: Point | null = null

  constructor(
    private readonly flattener: CurveFlattener,
    private readonly tolerance: number
  ) {}

  get position(): Point {
    return { ...this.current }
  }

  get previousCubicControl(): Point | null {
    return this.lastCubicControl
  }

  get previousQuadraticControl(): Point | null {
    return this.lastQuadraticControl
  }

  moveTo(point: Point): void {
    this.finishOpenLoop()
    this.current = { ...point }
    this.subpathStart = { ...point }
    this.loop = [{ ...point }]
    this.resetControls()
  }

  lineTo(point: Point): void {
    this.ensureLoopStarted()
    this.loop.push({ ...point })
    this.current = { ...point }
    this.resetControls()
  }

  curveTo(control1: Point, control2: Point, end: Point): void {
    this.ensureLoopStarted()
    this.loop.push(...this.flattener.cubic(this.current, control1, control2, end))
    this.current = { ...end }
    this.lastCubicControl = { ...control2 }
    this.lastQuadraticControl = null
  }

  quadraticTo(control: Point, end: Point): void {
    this.ensureLoopStarted()
    this.loop.push(...this.flattener.quadratic(this.current, control, end))
    this.current = { ...end }
    this.lastCubicControl = null
    this.lastQuadraticControl = { ...control }
  }

  arcTo(
    rx: number,
    ry: number,
    xAxisRotation: number,
    largeArc: boolean,
    sweep: boolean,
    end: Point
  ): void {
    this.ensureLoopStarted()
    this.loop.push(
      ...this.flattener.arc(this.current, rx, ry, xAxisRotation, largeArc, sweep, end)
    )
    this.current = { ...end }
    this.resetControls()
  }

  closePath(): void {
    this.resetControls()
    if (this.loop.length === 0) {
      return
    }
    this.loop.push({ ...this.loop[0] })
    this.loops.push(this.loop)
    this.loop = []
    this.current = { ...this.subpathStart }
  }

  // Finalizes the in-progress loop and returns every loop with adjacent duplicates merged.
  // Loops that collapse to a single point are dropped.
  finish(): Loop[] {
    this.finishOpenLoop()
    return this.loops
      .map((loop) => mergeAdjacentPoints(loop, this.tolerance))
      .filter((loop) => loop.length > 1)
  }

  // A drawing command after Z continues from the subpath start in a fresh loop.
  private ensureLoopStarted(): void {
    if (this.loop.length === 0) {
      this.subpathStart = { ...this.current }
      this.loop.push({ ...this.current })
    }
  }

  private finishOpenLoop(): void {
    if (this.loop.length > 1) {
      this.loops.push(this.loop)
    }
    this.loop = []
  }

  private resetControls(): void {
    this.lastCubicControl = null
    this.lastQuadraticControl = null
  }
}
