import { Loop, Point } from '../types/base'
import { collectEdges, prepareContours } from './contours'
import { isPlanarInput, triangulatePlanar } from './planar'
import { triangulateSweep } from './sweep'

export { TessellationError } from './contours'

/**
 * Fills `loops` under the non-zero winding rule. Loops are implicitly closed; holes are loops
 * wound against their enclosing loop. The result is a flat triangle list, read in consecutive
 * groups of three.
 *
 * Contours that neither cross nor touch are triangulated with earcut. Anything else goes through
 * a trapezoidal sweep that splits edges at their intersections first.
 *
 * Throws TessellationError on non-finite input. All working state is local to the call.
 */
export function triangulate(loops: readonly Loop[]): Point[] {
  const contours = prepareContours(loops)
  if (contours.length === 0) {
    return []
  }

  const edges = collectEdges(contours)
  if (isPlanarInput(edges)) {
    return triangulatePlanar(contours)
  }
  return triangulateSweep(edges)
}
