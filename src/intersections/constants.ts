// General case. Used for line-line intersection, and for point degeneracy checks etc.
export const EPS_INTERSECTION = 1e-9

// Parameter space equivalence: t-values this close to 0 or 1 snap to the segment's endpoint.
export const EPS_PARAM = 1e-9
