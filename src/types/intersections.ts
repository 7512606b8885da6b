import { Point3 } from './base'

// A rectangle of the joint (tA, tB) domain that may hold an intersection.
export type IntersectionCandidate = {
  aMin: number
  aMax: number
  bMin: number
  bMax: number
}

export type RefinedSolution = {
  paramA: number
  paramB: number
  distance: number // Infinity once discarded as a duplicate.
}

// Both lists are sorted ascending on their own; index i of one need not pair with
// index i of the other when there are several hits.
export type IntersectionResult = {
  paramsA: number[]
  paramsB: number[]
}

export interface Intersection {
  point: Point3 // Point on the first curve.
  t1: number
  t2: number
  distance: number // Gap between the two curves at (t1, t2).
}

export type IntersectionOptions = {
  tolerance?: number // Maximum curve gap for an accepted hit.
  boxTolerance?: number // Box inflation in the broad phase.
  depth?: number // Broad phase subdivision levels.
  refineTolerance?: number // Narrow phase parameter width.
}
