import { computeSubdivisionPoints } from '../bezier/split'
import { InvalidParameterError } from '../exceptions'
import { Spline, SplinePoint, SplineSegment, SubdivisionPlan } from '../types/spline'
import { newId } from '../utils/ids'

export function createSpline(points: readonly SplinePoint[], cyclic: boolean = false): Spline {
  return {
    id: newId('spline'),
    cyclic,
    points: points.map((point) => ({ ...point }))
  }
}

export function getSplineSegments(spline: Spline): SplineSegment[] {
  const segments: SplineSegment[] = []
  const count = spline.points.length
  if (count < 2) {
    return segments
  }

  const lastBegin = spline.cyclic ? count - 1 : count - 2
  for (let beginIndex = 0; beginIndex <= lastBegin; beginIndex++) {
    const endIndex = (beginIndex + 1) % count
    const begin = spline.points[beginIndex]
    const end = spline.points[endIndex]
    segments.push({
      splineId: spline.id,
      beginIndex,
      endIndex,
      bezier: {
        start: begin.co,
        control1: begin.handleRight,
        control2: end.handleLeft,
        end: end.co
      }
    })
  }

  return segments
}

function cleanParams(spline: Spline, beginIndex: number, params: readonly number[]): number[] {
  const inside = params.filter((param) => param > 0 && param < 1)
  if (inside.length !== params.length) {
    const dropped = params.length - inside.length
    console.warn(
      `Dropped ${dropped} split parameter(s) outside (0, 1) on ${spline.id}:${beginIndex}.`
    )
  }
  return [...new Set(inside)].sort((a, b) => a - b)
}

/**
 * Returns a copy of `spline` with every planned split applied. Each split keeps the
 * curve's shape: the neighbouring handles are shortened and one knot is inserted per
 * parameter.
 */
export function subdivideSpline(spline: Spline, plans: readonly SubdivisionPlan[]): Spline {
  const segments = new Map(
    getSplineSegments(spline).map((segment): [number, SplineSegment] => [
      segment.beginIndex,
      segment
    ])
  )

  // Several plans may target one segment; merge them before splitting.
  const paramsByBegin = new Map<number, number[]>()
  for (const plan of plans) {
    if (plan.splineId !== spline.id) {
      throw new InvalidParameterError(`Plan for ${plan.splineId} applied to ${spline.id}.`)
    }
    if (!segments.has(plan.beginIndex)) {
      throw new InvalidParameterError(
        `No segment starts at index ${plan.beginIndex} on ${spline.id}.`
      )
    }
    const merged = paramsByBegin.get(plan.beginIndex) ?? []
    paramsByBegin.set(plan.beginIndex, [...merged, ...plan.params])
  }

  const points = spline.points.map((point) => ({ ...point }))

  // Highest index first, so earlier insertions never shift a pending segment.
  const begins = [...paramsByBegin.keys()].sort((a, b) => b - a)
  for (const beginIndex of begins) {
    const segment = segments.get(beginIndex)
    const params = cleanParams(spline, beginIndex, paramsByBegin.get(beginIndex) ?? [])
    if (!segment || params.length === 0) continue

    const newPoints = computeSubdivisionPoints(segment.bezier, params)
    points[segment.beginIndex].handleRight = newPoints[0]
    points[segment.endIndex].handleLeft = newPoints[newPoints.length - 1]

    const inserted: SplinePoint[] = params.map((_, i) => ({
      handleLeft: newPoints[3 * i + 1],
      co: newPoints[3 * i + 2],
      handleRight: newPoints[3 * i + 3]
    }))
    points.splice(segment.beginIndex + 1, 0, ...inserted)
  }

  return { ...spline, points }
}

export function subdivideSplines(
  splines: readonly Spline[],
  plans: readonly SubdivisionPlan[]
): Spline[] {
  const plansBySpline = new Map<string, SubdivisionPlan[]>()
  for (const plan of plans) {
    const group = plansBySpline.get(plan.splineId) ?? []
    group.push(plan)
    plansBySpline.set(plan.splineId, group)
  }

  const known = new Set(splines.map((spline) => spline.id))
  for (const splineId of plansBySpline.keys()) {
    if (!known.has(splineId)) {
      console.warn(`Ignoring subdivision plans for unknown spline ${splineId}`)
    }
  }

  return splines.map((spline) => subdivideSpline(spline, plansBySpline.get(spline.id) ?? []))
}
