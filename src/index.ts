export * from './types/base'
export * from './types/intersections'
export * from './types/spline'
export * from './exceptions'
export * from './utils/vector'
export { computeCircumcircle } from './utils/geometry'
export type { Bezier, BezierControlPoints } from './bezier/core'
export {
  bezierControlPoints,
  computeBezierTangent,
  createBezier,
  evaluateBezier,
  sliceBezier
} from './bezier/core'
export { computeBezierLength } from './bezier/math'
export { computeSubdivisionPoints, splitBezierAtParams } from './bezier/split'
export { computeAabb, doBoxesOverlap, getBezierSliceBounds } from './intersections/bezier_helpers'
export { collectBroadPhaseCandidates, findCandidateIntervals } from './intersections/broad_phase'
export { refineCandidate } from './intersections/narrow_phase'
export {
  dedupeSolutions,
  getBezierBezierIntersection,
  getBezierIntersectionParams,
  resolveIntersectionOptions
} from './intersections/intersections'
export { createSpline, getSplineSegments, subdivideSpline, subdivideSplines } from './paths/spline'
