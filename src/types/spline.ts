import { Bezier } from '../bezier/core'
import { Point3 } from './base'

export type SplinePoint = {
  co: Point3
  handleLeft: Point3
  handleRight: Point3
}

export type Spline = {
  id: string
  cyclic: boolean
  points: SplinePoint[]
}

// Knots beginIndex -> endIndex of a spline. endIndex is 0 for the closing segment.
export type SplineSegment = {
  splineId: string
  beginIndex: number
  endIndex: number
  bezier: Bezier
}

// Sorted parameters at which to split the segment starting at beginIndex.
export type SubdivisionPlan = {
  splineId: string
  beginIndex: number
  params: number[]
}
