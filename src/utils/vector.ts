import { Point3, Vector3 } from '../types/base'

export function addVectors(v1: Vector3, v2: Vector3): Vector3 {
  return { x: v1.x + v2.x, y: v1.y + v2.y, z: v1.z + v2.z }
}

export function subtractVectors(v1: Vector3, v2: Vector3): Vector3 {
  return { x: v1.x - v2.x, y: v1.y - v2.y, z: v1.z - v2.z }
}

export function scaleVector(vector: Vector3, factor: number): Vector3 {
  return { x: vector.x * factor, y: vector.y * factor, z: vector.z * factor }
}

export function dotProduct(v1: Vector3, v2: Vector3): number {
  return v1.x * v2.x + v1.y * v2.y + v1.z * v2.z
}

export function crossProduct(v1: Vector3, v2: Vector3): Vector3 {
  return {
    x: v1.y * v2.z - v1.z * v2.y,
    y: v1.z * v2.x - v1.x * v2.z,
    z: v1.x * v2.y - v1.y * v2.x
  }
}

export function vectorLength(vector: Vector3): number {
  return Math.sqrt(dotProduct(vector, vector))
}

export function normalizeVector(vector: Vector3): Vector3 {
  const length = vectorLength(vector)
  if (length === 0) {
    return { x: 0, y: 0, z: 0 }
  }
  return scaleVector(vector, 1 / length)
}

export function computePointToPointDistance(point1: Point3, point2: Point3): number {
  return vectorLength(subtractVectors(point1, point2))
}
