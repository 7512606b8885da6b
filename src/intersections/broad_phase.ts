import { Bezier } from '../bezier/core'
import { IntersectionCandidate } from '../types/intersections'
import { doBoxesOverlap, getBezierSliceBounds } from './bezier_helpers'
import { BROAD_PHASE_DEPTH, EPS_BBOX } from './constants'

export function collectBroadPhaseCandidates(
  candidates: IntersectionCandidate[],
  depth: number,
  bezierA: Bezier,
  bezierB: Bezier,
  aMin: number,
  aMax: number,
  bMin: number,
  bMax: number,
  tolerance: number = EPS_BBOX
): void {
  const boundsA = getBezierSliceBounds(bezierA, aMin, aMax)
  const boundsB = getBezierSliceBounds(bezierB, bMin, bMax)
  if (!doBoxesOverlap(boundsA, boundsB, tolerance)) return

  if (depth === 0) {
    candidates.push({ aMin, aMax, bMin, bMax })
    return
  }

  // Quadrant order is fixed: aLeft x bLeft, aLeft x bRight, aRight x bLeft, aRight x bRight.
  const next = depth - 1
  const aMid = (aMin + aMax) * 0.5
  const bMid = (bMin + bMax) * 0.5
  collectBroadPhaseCandidates(candidates, next, bezierA, bezierB, aMin, aMid, bMin, bMid, tolerance)
  collectBroadPhaseCandidates(candidates, next, bezierA, bezierB, aMin, aMid, bMid, bMax, tolerance)
  collectBroadPhaseCandidates(candidates, next, bezierA, bezierB, aMid, aMax, bMin, bMid, tolerance)
  collectBroadPhaseCandidates(candidates, next, bezierA, bezierB, aMid, aMax, bMid, bMax, tolerance)
}

export function findCandidateIntervals(
  bezierA: Bezier,
  bezierB: Bezier,
  depth: number = BROAD_PHASE_DEPTH,
  tolerance: number = EPS_BBOX
): IntersectionCandidate[] {
  const candidates: IntersectionCandidate[] = []
  collectBroadPhaseCandidates(candidates, depth, bezierA, bezierB, 0, 1, 0, 1, tolerance)
  return candidates
}
