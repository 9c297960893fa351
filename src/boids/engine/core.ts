import { updateBoid } from '@/boids/boid'
import { iterateBoids, snapshotFlock, type Flock } from '@/boids/flock'
import { profilerKeywords } from '@/boids/vocabulary/keywords'
import type { ArenaBounds } from '@/boids/vocabulary/schemas/primitives'
import type { FlockParameters } from '@/boids/vocabulary/schemas/simulation'
import type { Profiler } from '@/resources/profiler'

/**
 * Core Engine Logic - one simulation step
 *
 * Pure apart from mutating the flock it is handed. No timers, no I/O, no
 * randomness: the same flock, arena and parameters always produce the same
 * result.
 */

/**
 * Advance every boid by one tick.
 *
 * All boids are frozen into a snapshot first; neighbor scans read only the
 * snapshot while writes go to the live boids, so a boid processed late in
 * the loop still sees the pre-tick state of the ones before it.
 */
export const step = (
  flock: Flock,
  arena: ArenaBounds,
  parameters: FlockParameters,
  profiler?: Profiler
): void => {
  profiler?.start(profilerKeywords.engineStep)

  const snapshot = snapshotFlock(flock)
  const context = { snapshot, arena, parameters, profiler }

  // Same iteration as snapshotFlock, so slots line up with the snapshot
  let slot = 0
  for (const boid of iterateBoids(flock)) {
    profiler?.start(profilerKeywords.boidUpdate)
    updateBoid(boid, slot++, context)
    profiler?.end(profilerKeywords.boidUpdate)
  }

  profiler?.end(profilerKeywords.engineStep)
}
