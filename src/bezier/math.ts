import { N_ARC_LENGTH_SAMPLES } from '../constants'
import { InvalidParameterError } from '../exceptions'
import { dotProduct, subtractVectors } from '../utils/vector'
import { Bezier } from './core'

// Coefficients of |T(t)|^2 as a quartic in t, lowest order first, where T is the
// tangent returned by computeBezierTangent.
export function computeTangentNormCoefficients(bezier: Bezier): number[] {
  const d0 = subtractVectors(bezier.control1, bezier.start)
  const d1 = subtractVectors(bezier.control2, bezier.control1)
  const d2 = subtractVectors(bezier.end, bezier.control2)

  // Dot products among the three deltas.
  const d00 = dotProduct(d0, d0)
  const d01 = dotProduct(d0, d1)
  const d02 = dotProduct(d0, d2)
  const d11 = dotProduct(d1, d1)
  const d12 = dotProduct(d1, d2)
  const d22 = dotProduct(d2, d2)

  // T(t) = d0 + 2t(d1 - d0) + t^2(d0 - 2d1 + d2).
  return [
    d00,
    4 * (d01 - d00),
    6 * d00 + 4 * d11 + 2 * d02 - 12 * d01,
    12 * d01 + 4 * (d12 - d00 - d02) - 8 * d11,
    d00 + d22 + 2 * d02 + 4 * (d11 - d01 - d12)
  ]
}

export function evaluatePolynomial(coefficients: number[], t: number): number {
  // Horner's scheme, coefficients lowest order first.
  let value = 0
  for (let i = coefficients.length - 1; i >= 0; i--) {
    value = value * t + coefficients[i]
  }
  return value
}

export function computeBezierLength(
  bezier: Bezier,
  tMin: number = 0,
  tMax: number = 1,
  samples: number = N_ARC_LENGTH_SAMPLES
): number {
  // See: https://en.wikipedia.org/wiki/Arc_length#Finding_arc_lengths_by_integrating
  if (!Number.isInteger(samples) || samples < 1) {
    throw new InvalidParameterError(`Sample count must be a positive integer, got ${samples}.`)
  }
  if (tMin > tMax) {
    throw new InvalidParameterError(`Invalid length window: ${tMin} must not exceed ${tMax}.`)
  }

  const coefficients = computeTangentNormCoefficients(bezier)
  // Clamped: rounding leaves the quartic slightly negative where the tangent vanishes.
  const speed = (t: number) => Math.sqrt(Math.max(0, evaluatePolynomial(coefficients, t)))

  // Composite trapezoidal rule over samples + 1 evenly spaced points.
  const step = (tMax - tMin) / samples
  let sum = 0
  let previous = speed(tMin)
  for (let i = 1; i <= samples; i++) {
    const value = speed(tMin + step * i)
    sum += (previous + value) * 0.5
    previous = value
  }

  // The tangent is a third of the derivative.
  return 3 * sum * step
}

