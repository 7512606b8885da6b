import { InvalidParameterError } from '../exceptions'
import { Point3, Vector3 } from '../types/base'
import { addVectors, scaleVector, subtractVectors } from '../utils/vector'

export interface Bezier {
  readonly start: Point3
  readonly control1: Point3
  readonly control2: Point3
  readonly end: Point3
}

export type BezierControlPoints = readonly [Point3, Point3, Point3, Point3]

export function createBezier(points: BezierControlPoints): Bezier {
  const [start, control1, control2, end] = points
  return { start, control1, control2, end }
}

export function bezierControlPoints(bezier: Bezier): Point3[] {
  return [bezier.start, bezier.control1, bezier.control2, bezier.end]
}

export function evaluateBezier(t: number, bezier: Bezier): Point3 {
  const mt = 1 - t
  const mt2 = mt * mt
  const t2 = t * t
  const a = mt2 * mt
  const b = 3 * mt2 * t
  const c = 3 * mt * t2
  const d = t2 * t

  return {
    x: a * bezier.start.x + b * bezier.control1.x + c * bezier.control2.x + d * bezier.end.x,
    y: a * bezier.start.y + b * bezier.control1.y + c * bezier.control2.y + d * bezier.end.y,
    z: a * bezier.start.z + b * bezier.control1.z + c * bezier.control2.z + d * bezier.end.z
  }
}

// One third of the derivative. Not normalized.
export function computeBezierTangent(t: number, bezier: Bezier): Vector3 {
  const mt = 1 - t
  const d0 = subtractVectors(bezier.control1, bezier.start)
  const d1 = subtractVectors(bezier.control2, bezier.control1)
  const d2 = subtractVectors(bezier.end, bezier.control2)

  return addVectors(
    addVectors(scaleVector(d0, mt * mt), scaleVector(d1, 2 * mt * t)),
    scaleVector(d2, t * t)
  )
}

export function sliceBezier(bezier: Bezier, minParam: number, maxParam: number): Bezier {
  if (minParam > maxParam) {
    throw new InvalidParameterError(
      `Invalid slice parameters: ${minParam} must not exceed ${maxParam}.`
    )
  }

  const fromPoint = evaluateBezier(minParam, bezier)
  const fromTangent = computeBezierTangent(minParam, bezier)
  const toPoint = evaluateBezier(maxParam, bezier)
  const toTangent = computeBezierTangent(maxParam, bezier)
  const paramDiff = maxParam - minParam

  return {
    start: fromPoint,
    control1: addVectors(fromPoint, scaleVector(fromTangent, paramDiff)),
    control2: subtractVectors(toPoint, scaleVector(toTangent, paramDiff)),
    end: toPoint
  }
}
