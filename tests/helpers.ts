import { expect } from '@jest/globals'
import { Bezier, createBezier } from '../src/bezier/core'
import { Point3 } from '../src/types/base'

export function point(x: number, y: number, z: number = 0): Point3 {
  return { x, y, z }
}

export function bezier(...coords: [number, number, number][]): Bezier {
  const [p0, p1, p2, p3] = coords.map(([x, y, z]) => point(x, y, z))
  return createBezier([p0, p1, p2, p3])
}

export function expectPointClose(actual: Point3, expected: Point3, digits: number = 10): void {
  expect(actual.x).toBeCloseTo(expected.x, digits)
  expect(actual.y).toBeCloseTo(expected.y, digits)
  expect(actual.z).toBeCloseTo(expected.z, digits)
}
