// Distance below which a refined solution counts as a real intersection.
export const EPS_INTERSECTION = 1e-3

// Bezier-Bezier broad phase. Depth 8 gives at most 4^8 leaf rectangles.
export const BROAD_PHASE_DEPTH = 8
export const EPS_BBOX = 1e-3 // Box inflation when testing slice overlap.

// Bezier-Bezier narrow phase.
export const EPS_REFINE = 1e-6 // Parameter width at which refinement stops.

// Two solutions closer than 0.1 in (tA, tB) are the same intersection. Squared.
export const EPS_ROOT_DUPE_SQUARED = 0.01
