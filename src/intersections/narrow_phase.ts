import { Bezier, evaluateBezier } from '../bezier/core'
import { IntersectionCandidate, RefinedSolution } from '../types/intersections'
import { computePointToPointDistance } from '../utils/vector'
import { EPS_REFINE } from './constants'

// Which quarter pair came closest; decides which halves survive.
enum QuarterPair {
  A1B1 = 'A1B1',
  A2B1 = 'A2B1',
  A1B2 = 'A1B2',
  A2B2 = 'A2B2'
}

export function refineCandidate(
  candidate: IntersectionCandidate,
  bezierA: Bezier,
  bezierB: Bezier,
  tolerance: number = EPS_REFINE
): RefinedSolution {
  let { aMin, aMax, bMin, bMax } = candidate
  let minDist = computePointToPointDistance(
    evaluateBezier(aMin, bezierA),
    evaluateBezier(bMin, bezierB)
  )

  while (aMax - aMin > tolerance || bMax - bMin > tolerance) {
    const aMid = (aMin + aMax) * 0.5
    const bMid = (bMin + bMax) * 0.5
    const a1 = evaluateBezier((aMin + aMid) * 0.5, bezierA)
    const a2 = evaluateBezier((aMid + aMax) * 0.5, bezierA)
    const b1 = evaluateBezier((bMin + bMid) * 0.5, bezierB)
    const b2 = evaluateBezier((bMid + bMax) * 0.5, bezierB)

    // Strict comparison keeps the earliest pair on ties.
    const pairs: [QuarterPair, number][] = [
      [QuarterPair.A1B1, computePointToPointDistance(a1, b1)],
      [QuarterPair.A2B1, computePointToPointDistance(a2, b1)],
      [QuarterPair.A1B2, computePointToPointDistance(a1, b2)],
      [QuarterPair.A2B2, computePointToPointDistance(a2, b2)]
    ]
    let [best, bestDist] = pairs[0]
    for (const [pair, dist] of pairs.slice(1)) {
      if (dist < bestDist) {
        best = pair
        bestDist = dist
      }
    }
    minDist = bestDist

    switch (best) {
      case QuarterPair.A1B1:
        aMax = aMid
        bMax = bMid
        break
      case QuarterPair.A2B1:
        aMin = aMid
        bMax = bMid
        break
      case QuarterPair.A1B2:
        aMax = aMid
        bMin = bMid
        break
      case QuarterPair.A2B2:
        aMin = aMid
        bMin = bMid
        break
    }
  }

  return { paramA: aMin, paramB: bMin, distance: minDist }
}
