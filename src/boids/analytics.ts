import { iterateBoids, type Flock } from './flock'
import { speedOf } from './speed'
import * as vec from './vector'
import { roleKeywords, scoutGroupKeywords } from './vocabulary/keywords'
import type { Vector2 } from './vocabulary/schemas/primitives'

export type RoleCounts = {
  common: number
  scoutRight: number
  scoutLeft: number
}

export type FlockStats = {
  size: number
  roles: RoleCounts
  /** Mean position, zero for an empty flock */
  centroid: Vector2
  /** Mean velocity, zero for an empty flock */
  averageVelocity: Vector2
  averageSpeed: number
  minSpeed: number
  maxSpeed: number
}

export function countRoles(flock: Flock): RoleCounts {
  const counts: RoleCounts = { common: 0, scoutRight: 0, scoutLeft: 0 }

  for (const boid of iterateBoids(flock)) {
    switch (boid.role.kind) {
      case roleKeywords.common:
        counts.common++
        break
      case roleKeywords.scout:
        if (boid.role.group === scoutGroupKeywords.right) {
          counts.scoutRight++
        } else {
          counts.scoutLeft++
        }
        break
    }
  }

  return counts
}

/**
 * Summary numbers for a flock, for logs and headless runs
 */
export function computeFlockStats(flock: Flock): FlockStats {
  const size = flock.length
  const roles = countRoles(flock)

  if (size === 0) {
    return {
      size,
      roles,
      centroid: { x: 0, y: 0 },
      averageVelocity: { x: 0, y: 0 },
      averageSpeed: 0,
      minSpeed: 0,
      maxSpeed: 0,
    }
  }

  let positionSum: Vector2 = { x: 0, y: 0 }
  let velocitySum: Vector2 = { x: 0, y: 0 }
  let speedSum = 0
  let minSpeed = Infinity
  let maxSpeed = 0

  for (const boid of iterateBoids(flock)) {
    positionSum = vec.add(positionSum, boid.position)
    velocitySum = vec.add(velocitySum, boid.velocity)
    const speed = speedOf(boid.velocity)
    speedSum += speed
    minSpeed = Math.min(minSpeed, speed)
    maxSpeed = Math.max(maxSpeed, speed)
  }

  return {
    size,
    roles,
    centroid: vec.divide(positionSum, size),
    averageVelocity: vec.divide(velocitySum, size),
    averageSpeed: speedSum / size,
    minSpeed,
    maxSpeed,
  }
}

export function formatFlockStats(stats: FlockStats): string {
  const { roles, centroid, averageVelocity } = stats
  return [
    `boids=${stats.size}`,
    `common=${roles.common} scoutRight=${roles.scoutRight} scoutLeft=${roles.scoutLeft}`,
    `centroid=(${centroid.x.toFixed(1)}, ${centroid.y.toFixed(1)})`,
    `heading=(${averageVelocity.x.toFixed(2)}, ${averageVelocity.y.toFixed(2)})`,
    `speed avg=${stats.averageSpeed.toFixed(2)} min=${stats.minSpeed.toFixed(2)} max=${stats.maxSpeed.toFixed(2)}`,
  ].join(' | ')
}
