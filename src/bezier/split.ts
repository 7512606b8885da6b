import { InvalidParameterError } from '../exceptions'
import { Point3 } from '../types/base'
import { addVectors, scaleVector, subtractVectors } from '../utils/vector'
import { Bezier, computeBezierTangent, evaluateBezier } from './core'

function assertSplitParams(params: readonly number[]): void {
  params.forEach((param, index) => {
    if (!(param > 0 && param < 1)) {
      throw new InvalidParameterError(`Split parameter ${param} must lie strictly inside (0, 1).`)
    }
    if (index > 0 && param <= params[index - 1]) {
      throw new InvalidParameterError('Split parameters must be strictly ascending.')
    }
  })
}

/**
 * Control points that split `bezier` at every value of `params` while keeping its shape.
 *
 * Layout: the new right handle of `start`, then `(leftHandle, point, rightHandle)` for
 * each param in order, then the new left handle of `end`. Applying the points to an
 * editable curve is left to the caller.
 */
export function computeSubdivisionPoints(bezier: Bezier, params: readonly number[]): Point3[] {
  if (params.length === 0) {
    return []
  }
  assertSplitParams(params)

  const first = params[0]
  const last = params[params.length - 1]
  const newPoints: Point3[] = []

  const startHandle = subtractVectors(bezier.control1, bezier.start)
  newPoints.push(addVectors(bezier.start, scaleVector(startHandle, first)))

  params.forEach((param, index) => {
    const paramLeft = index > 0 ? param - params[index - 1] : param
    const paramRight = index < params.length - 1 ? params[index + 1] - param : 1 - param

    const point = evaluateBezier(param, bezier)
    const tangent = computeBezierTangent(param, bezier)
    newPoints.push(subtractVectors(point, scaleVector(tangent, paramLeft)))
    newPoints.push(point)
    newPoints.push(addVectors(point, scaleVector(tangent, paramRight)))
  })

  const endHandle = subtractVectors(bezier.end, bezier.control2)
  newPoints.push(subtractVectors(bezier.end, scaleVector(endHandle, 1 - last)))

  return newPoints
}

// The pieces described by computeSubdivisionPoints, as standalone cubics.
export function splitBezierAtParams(bezier: Bezier, params: readonly number[]): Bezier[] {
  const newPoints = computeSubdivisionPoints(bezier, params)
  if (newPoints.length === 0) {
    return [bezier]
  }

  const pieces: Bezier[] = []
  let start = bezier.start
  let control1 = newPoints[0]
  for (let i = 0; i < params.length; i++) {
    const [leftHandle, point, rightHandle] = newPoints.slice(3 * i + 1, 3 * i + 4)
    pieces.push({ start, control1, control2: leftHandle, end: point })
    start = point
    control1 = rightHandle
  }
  pieces.push({ start, control1, control2: newPoints[newPoints.length - 1], end: bezier.end })

  return pieces
}
