import { Circle, Point3 } from '../types/base'
import {
  addVectors,
  crossProduct,
  dotProduct,
  scaleVector,
  subtractVectors,
  vectorLength
} from './vector'

export function computeCircumcircle(a: Point3, b: Point3, c: Point3): Circle | null {
  // See: https://en.wikipedia.org/wiki/Circumscribed_circle#Cartesian_coordinates_from_cross-_and_dot-products
  const dirBA = subtractVectors(a, b)
  const dirCB = subtractVectors(b, c)
  const dirAC = subtractVectors(c, a)
  const normal = crossProduct(dirBA, dirCB)

  const lengthBA = vectorLength(dirBA)
  const lengthCB = vectorLength(dirCB)
  const lengthAC = vectorLength(dirAC)
  const lengthN = vectorLength(normal)

  // Collinear points, no finite circle.
  if (lengthN === 0) {
    return null
  }

  // Barycentric weights of the circumcenter.
  const factor = -1 / (2 * lengthN * lengthN)
  const alpha = dotProduct(dirBA, dirAC) * lengthCB * lengthCB * factor
  const beta = dotProduct(dirBA, dirCB) * lengthAC * lengthAC * factor
  const gamma = dotProduct(dirAC, dirCB) * lengthBA * lengthBA * factor

  const center = addVectors(
    addVectors(scaleVector(a, alpha), scaleVector(b, beta)),
    scaleVector(c, gamma)
  )
  const radius = (lengthBA * lengthCB * lengthAC) / (2 * lengthN)
  const unitNormal = scaleVector(normal, 1 / lengthN)

  return {
    plane: { normal: unitNormal, distance: dotProduct(center, unitNormal) },
    center,
    radius
  }
}
