// Number of line segments each cubic Bezier is flattened into.
export const BEZIER_POINTS = 20

// Number of segments in a full circle; arcs get a proportional share.
export const CIRCLE_POINTS = 24

// Squared distance below which adjacent loop points are merged.
export const MERGE_TOLERANCE = 0.001

// Upper bound on samples emitted for a single curve or arc.
export const MAX_FLATTEN_POINTS = 10000

// Geometric epsilon for the tessellator's intersection and orientation tests.
export const EPS_GEOMETRY = 1e-9
