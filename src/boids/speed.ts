import * as vec from './vector'
import type { Vector2 } from './vocabulary/schemas/primitives'
import type { FlockParameters } from './vocabulary/schemas/simulation'

/**
 * Clamp the velocity's magnitude into [minSpeed, maxSpeed], keeping its
 * heading. A zero velocity has no heading and is returned unchanged.
 *
 * Both bounds are checked against the speed before any rescale.
 */
export function clampSpeed(
  velocity: Vector2,
  parameters: Pick<FlockParameters, 'minSpeed' | 'maxSpeed'>
): Vector2 {
  const { minSpeed, maxSpeed } = parameters
  const speed = vec.magnitude(velocity)

  if (speed === 0) return velocity

  let clamped = velocity
  if (speed < minSpeed) {
    clamped = vec.setMagnitude(velocity, minSpeed)
  }
  if (speed > maxSpeed) {
    clamped = vec.setMagnitude(velocity, maxSpeed)
  }
  return clamped
}

export const speedOf = vec.magnitude
