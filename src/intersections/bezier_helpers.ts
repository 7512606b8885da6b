import { Bezier, bezierControlPoints, sliceBezier } from '../bezier/core'
import { EmptyInputError } from '../exceptions'
import { AABB, Point3 } from '../types/base'

export function computeAabb(points: readonly Point3[]): AABB {
  if (points.length === 0) {
    throw new EmptyInputError('Cannot compute bounding box of empty points array.')
  }

  const min = { ...points[0] }
  const max = { ...points[0] }
  for (const point of points) {
    min.x = Math.min(min.x, point.x)
    min.y = Math.min(min.y, point.y)
    min.z = Math.min(min.z, point.z)
    max.x = Math.max(max.x, point.x)
    max.y = Math.max(max.y, point.y)
    max.z = Math.max(max.z, point.z)
  }

  return {
    center: {
      x: (min.x + max.x) * 0.5,
      y: (min.y + max.y) * 0.5,
      z: (min.z + max.z) * 0.5
    },
    dimensions: {
      x: (max.x - min.x) * 0.5,
      y: (max.y - min.y) * 0.5,
      z: (max.z - min.z) * 0.5
    }
  }
}

// Separating-axis test on each axis, with both boxes grown by `tolerance`.
export function doBoxesOverlap(a: AABB, b: AABB, tolerance: number = 0): boolean {
  const axes = ['x', 'y', 'z'] as const
  for (const axis of axes) {
    const gap = Math.abs(a.center[axis] - b.center[axis])
    if (gap > a.dimensions[axis] + b.dimensions[axis] + tolerance) {
      return false
    }
  }
  return true
}

// Control-point hull bounds of the curve restricted to [minParam, maxParam].
export function getBezierSliceBounds(bezier: Bezier, minParam: number, maxParam: number): AABB {
  return computeAabb(bezierControlPoints(sliceBezier(bezier, minParam, maxParam)))
}
