import { describe, expect, it } from '@jest/globals'
import { computeCircumcircle } from '../src/utils/geometry'
import {
  computePointToPointDistance,
  crossProduct,
  dotProduct,
  normalizeVector,
  vectorLength
} from '../src/utils/vector'
import { expectPointClose, point } from './helpers'

describe('Vector helpers', () => {
  it('computes dot and cross products', () => {
    expect(dotProduct(point(1, 2, 3), point(4, -5, 6))).toBe(12)
    expect(crossProduct(point(1, 0, 0), point(0, 1, 0))).toEqual(point(0, 0, 1))
  })

  it('returns the zero vector when normalizing a zero-length vector', () => {
    expect(normalizeVector(point(0, 0, 0))).toEqual(point(0, 0, 0))
    expect(vectorLength(normalizeVector(point(3, 4, 12)))).toBeCloseTo(1)
  })

  it('measures point distance in 3D', () => {
    expect(computePointToPointDistance(point(1, 1, 1), point(4, 5, 13))).toBe(13)
  })
})

describe('Circumcircle', () => {
  it('finds the unit circle through three points on it', () => {
    const circle = computeCircumcircle(point(1, 0), point(0, 1), point(-1, 0))

    expect(circle).not.toBeNull()
    if (circle) {
      expectPointClose(circle.center, point(0, 0, 0))
      expect(circle.radius).toBeCloseTo(1)
      expectPointClose(circle.plane.normal, point(0, 0, 1))
      expect(circle.plane.distance).toBeCloseTo(0)
    }
  })

  it('places the plane at the height of a lifted triangle', () => {
    const circle = computeCircumcircle(point(1, 0, 5), point(0, 1, 5), point(-1, 0, 5))

    expect(circle).not.toBeNull()
    if (circle) {
      expectPointClose(circle.center, point(0, 0, 5))
      expect(circle.plane.distance).toBeCloseTo(5)
    }
  })

  it('is equidistant from the three points of a skewed triangle', () => {
    const a = point(1, 2, 3)
    const b = point(4, 0, 1)
    const c = point(-2, 1, 5)
    const circle = computeCircumcircle(a, b, c)

    expect(circle).not.toBeNull()
    if (circle) {
      for (const p of [a, b, c]) {
        expect(computePointToPointDistance(circle.center, p)).toBeCloseTo(circle.radius, 10)
        expect(dotProduct(circle.plane.normal, p)).toBeCloseTo(circle.plane.distance, 10)
      }
      expect(vectorLength(circle.plane.normal)).toBeCloseTo(1, 12)
    }
  })

  it('returns null for collinear points', () => {
    expect(computeCircumcircle(point(0, 0, 0), point(1, 1, 1), point(2, 2, 2))).toBeNull()
  })

  it('returns null when two points coincide', () => {
    expect(computeCircumcircle(point(1, 2, 3), point(1, 2, 3), point(0, 0, 0))).toBeNull()
  })
})
