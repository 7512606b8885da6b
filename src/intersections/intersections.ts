import { Bezier, evaluateBezier } from '../bezier/core'
import {
  Intersection,
  IntersectionOptions,
  IntersectionResult,
  RefinedSolution
} from '../types/intersections'
import { findCandidateIntervals } from './broad_phase'
import {
  BROAD_PHASE_DEPTH,
  EPS_BBOX,
  EPS_INTERSECTION,
  EPS_REFINE,
  EPS_ROOT_DUPE_SQUARED
} from './constants'
import { refineCandidate } from './narrow_phase'

export function resolveIntersectionOptions(
  options: IntersectionOptions = {}
): Required<IntersectionOptions> {
  return {
    tolerance: options.tolerance ?? EPS_INTERSECTION,
    boxTolerance: options.boxTolerance ?? EPS_BBOX,
    depth: options.depth ?? BROAD_PHASE_DEPTH,
    refineTolerance: options.refineTolerance ?? EPS_REFINE
  }
}

/**
 * Collapses solutions that sit within 0.1 of each other in (tA, tB) space, keeping the
 * one with the smaller distance. Losers are returned with `distance` set to Infinity.
 *
 * Every pair is visited once; this is not a transitive clustering.
 */
export function dedupeSolutions(solutions: readonly RefinedSolution[]): RefinedSolution[] {
  const out = solutions.map((solution) => ({ ...solution }))

  for (let i = 0; i < out.length; i++) {
    for (let j = 0; j < out.length; j++) {
      if (out[i].distance === Infinity) break
      if (i === j || out[j].distance === Infinity) continue

      const diffA = out[i].paramA - out[j].paramA
      const diffB = out[i].paramB - out[j].paramB
      if (diffA * diffA + diffB * diffB < EPS_ROOT_DUPE_SQUARED) {
        if (out[i].distance < out[j].distance) {
          out[j].distance = Infinity
        } else {
          out[i].distance = Infinity
        }
      }
    }
  }

  return out
}

function findSolutions(
  bezierA: Bezier,
  bezierB: Bezier,
  options: Required<IntersectionOptions>
): RefinedSolution[] {
  const candidates = findCandidateIntervals(bezierA, bezierB, options.depth, options.boxTolerance)
  const refined = candidates.map((candidate) =>
    refineCandidate(candidate, bezierA, bezierB, options.refineTolerance)
  )
  return dedupeSolutions(refined).filter((solution) => solution.distance < options.tolerance)
}

/**
 * Parameters at which two cubics meet.
 *
 * `paramsA` and `paramsB` are sorted independently of each other. With more than one
 * hit, `paramsA[i]` and `paramsB[i]` may belong to different intersections; use
 * getBezierBezierIntersection when the pairing matters.
 */
export function getBezierIntersectionParams(
  bezierA: Bezier,
  bezierB: Bezier,
  options: IntersectionOptions = {}
): IntersectionResult {
  const solutions = findSolutions(bezierA, bezierB, resolveIntersectionOptions(options))

  const paramsA = solutions.map((solution) => solution.paramA).sort((a, b) => a - b)
  const paramsB = solutions.map((solution) => solution.paramB).sort((a, b) => a - b)

  return { paramsA, paramsB }
}

// Paired hits, ordered along the first curve.
export function getBezierBezierIntersection(
  bezier1: Bezier,
  bezier2: Bezier,
  options: IntersectionOptions = {}
): Intersection[] {
  return findSolutions(bezier1, bezier2, resolveIntersectionOptions(options))
    .map((solution) => ({
      point: evaluateBezier(solution.paramA, bezier1),
      t1: solution.paramA,
      t2: solution.paramB,
      distance: solution.distance
    }))
    .sort((a, b) => a.t1 - b.t1)
}
