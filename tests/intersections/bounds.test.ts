import { describe, expect, it } from '@jest/globals'
import { EmptyInputError } from '../../src/exceptions'
import {
  computeAabb,
  doBoxesOverlap,
  getBezierSliceBounds
} from '../../src/intersections/bezier_helpers'
import { AABB } from '../../src/types/base'
import { bezier, point } from '../helpers'

describe('Axis-aligned bounding boxes', () => {
  it('collapses to the point for a single point', () => {
    const box = computeAabb([point(1, -2, 3)])
    expect(box).toEqual({ center: point(1, -2, 3), dimensions: point(0, 0, 0) })
  })

  it('stores half-extents', () => {
    const box = computeAabb([point(0, 0, 0), point(4, -2, 1), point(2, 6, -3)])
    expect(box.center).toEqual(point(2, 2, -1))
    expect(box.dimensions).toEqual(point(2, 4, 2))
  })

  it('contains every input point', () => {
    const points = [point(-1.5, 2, 0.25), point(3, 7, -4), point(0.5, -6, 9), point(2, 2, 2)]
    const box = computeAabb(points)
    for (const p of points) {
      for (const axis of ['x', 'y', 'z'] as const) {
        expect(Math.abs(p[axis] - box.center[axis])).toBeLessThanOrEqual(box.dimensions[axis])
      }
    }
  })

  it('throws on an empty point set', () => {
    expect(() => computeAabb([])).toThrow(EmptyInputError)
  })

  it('bounds a slice of a curve by its control hull', () => {
    const curve = bezier([0, 0, 0], [0, 2, 0], [2, 2, 0], [2, 0, 0])
    const box = getBezierSliceBounds(curve, 0, 1)
    expect(box).toEqual({ center: point(1, 1, 0), dimensions: point(1, 1, 0) })
  })
})

describe('Box overlap', () => {
  const unit: AABB = { center: point(0, 0, 0), dimensions: point(1, 1, 1) }

  it('detects overlapping boxes', () => {
    const other: AABB = { center: point(1.5, 0.5, -0.5), dimensions: point(1, 1, 1) }
    expect(doBoxesOverlap(unit, other)).toBe(true)
  })

  it('treats touching faces as overlapping', () => {
    const other: AABB = { center: point(2, 0, 0), dimensions: point(1, 1, 1) }
    expect(doBoxesOverlap(unit, other)).toBe(true)
  })

  it('separates on a single axis', () => {
    const other: AABB = { center: point(0, 0, 2.5), dimensions: point(1, 1, 1) }
    expect(doBoxesOverlap(unit, other)).toBe(false)
  })

  it('bridges a gap smaller than the tolerance', () => {
    const other: AABB = { center: point(0, 2.0005, 0), dimensions: point(1, 1, 1) }
    expect(doBoxesOverlap(unit, other)).toBe(false)
    expect(doBoxesOverlap(unit, other, 0.001)).toBe(true)
  })
})
