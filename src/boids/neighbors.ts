import type { Boid, BoidSnapshot } from './vocabulary/schemas/entities'
import type { Vector2 } from './vocabulary/schemas/primitives'
import type { FlockParameters } from './vocabulary/schemas/simulation'

/**
 * Neighbor Summary - what one boid perceives of the flock during one tick
 *
 * Two independent signals are collected:
 * - boids inside the protected range add their offset to `closeOffset`
 *   (separation). That field is a raw sum and is never averaged.
 * - boids in the band between protected and visual range add their
 *   position and velocity to the running sums and bump `count`
 *   (cohesion and alignment).
 *
 * Summaries are rebuilt from scratch every tick and owned by a single
 * boid's update.
 */
export type NeighborSummary = {
  averagePosition: Vector2
  averageVelocity: Vector2
  closeOffset: Vector2
  count: number
}

type NeighborParameters = Pick<FlockParameters, 'visualRange' | 'protectedRange'>

export function createNeighborSummary(): NeighborSummary {
  return {
    averagePosition: { x: 0, y: 0 },
    averageVelocity: { x: 0, y: 0 },
    closeOffset: { x: 0, y: 0 },
    count: 0,
  }
}

/**
 * Fold one other boid into `summary`.
 *
 * The prefilter is an axis-aligned box of half-width `visualRange`, not a
 * circle: a boid closer than `visualRange` but offset by at least
 * `visualRange` on one axis is ignored. The box gates both branches.
 */
export function accumulateNeighbor(
  boid: Pick<Boid, 'position'>,
  other: BoidSnapshot,
  summary: NeighborSummary,
  parameters: NeighborParameters
): void {
  const { visualRange, protectedRange } = parameters
  const dx = boid.position.x - other.position.x
  const dy = boid.position.y - other.position.y

  if (Math.abs(dx) >= visualRange || Math.abs(dy) >= visualRange) return

  const squaredDistance = dx * dx + dy * dy

  if (squaredDistance < protectedRange * protectedRange) {
    summary.closeOffset.x += dx
    summary.closeOffset.y += dy
  } else if (squaredDistance < visualRange * visualRange) {
    summary.averagePosition.x += other.position.x
    summary.averagePosition.y += other.position.y
    summary.averageVelocity.x += other.velocity.x
    summary.averageVelocity.y += other.velocity.y
    summary.count++
  }
}

/**
 * Turn the running sums into averages. Does nothing when no boid was seen
 * in visual range; callers must check `count` before reading the averages.
 */
export function averageNeighborSummary(summary: NeighborSummary): void {
  if (summary.count === 0) return

  const count = summary.count
  summary.averagePosition.x /= count
  summary.averagePosition.y /= count
  summary.averageVelocity.x /= count
  summary.averageVelocity.y /= count
}

/**
 * Full pairwise scan of the snapshot for one boid. `selfSlot` is the boid's
 * own position in the snapshot and is the only record skipped, so a boid
 * never counts itself and two boids never hide each other, whatever their
 * ids.
 */
export function evaluateNeighborhood(
  boid: Pick<Boid, 'position'>,
  selfSlot: number,
  snapshot: ReadonlyArray<BoidSnapshot>,
  parameters: NeighborParameters
): NeighborSummary {
  const summary = createNeighborSummary()

  for (let slot = 0; slot < snapshot.length; slot++) {
    const other = snapshot[slot]
    if (!other || slot === selfSlot) continue
    accumulateNeighbor(boid, other, summary, parameters)
  }

  averageNeighborSummary(summary)
  return summary
}
