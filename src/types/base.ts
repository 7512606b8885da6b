export type Point3 = {
  x: number
  y: number
  z: number
}

export type Vector3 = {
  x: number
  y: number
  z: number
}

// Points p satisfying normal · p = distance. The normal is unit length.
export type Plane = {
  normal: Vector3
  distance: number
}

export type Circle = {
  plane: Plane
  center: Point3
  radius: number
}

// Half-extents, not full widths.
export type AABB = {
  center: Point3
  dimensions: Vector3
}
