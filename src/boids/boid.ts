import type { DomainRNG } from '@/lib/seededRandom'
import type { Profiler } from '@/resources/profiler'
import { integratePosition } from './integrator'
import { evaluateNeighborhood } from './neighbors'
import { steer } from './rules'
import { clampSpeed } from './speed'
import { profilerKeywords, scoutGroupKeywords } from './vocabulary/keywords'
import type { Boid, FlockSnapshot } from './vocabulary/schemas/entities'
import {
  commonRole,
  scoutRole,
  type ArenaBounds,
  type Role,
} from './vocabulary/schemas/primitives'
import type {
  FlockParameters,
  SpawnConfig,
} from './vocabulary/schemas/simulation'

/**
 * Highest value of the role roll. Rolls are integers in [0, ROLE_ROLL_MAX].
 */
export const ROLE_ROLL_MAX = 100

/**
 * Smallest integer roll at or above `fraction` of the roll range. Rounded to
 * six places first so 1 - 0.05 - 0.05 lands on 90, not 89.99999999999999.
 */
function rollThreshold(fraction: number): number {
  return Math.ceil(Number((ROLE_ROLL_MAX * fraction).toFixed(6)))
}

/**
 * Map a role roll to a role.
 *
 * The top `scoutTwoChance` slice of the roll range becomes left-drifting
 * scouts, the `scoutOneChance` slice below it right-drifting scouts, and
 * everything else follows the flock.
 */
export function roleForRoll(
  roll: number,
  spawn: Pick<SpawnConfig, 'scoutOneChance' | 'scoutTwoChance'>
): Role {
  const scoutTwoThreshold = rollThreshold(1 - spawn.scoutTwoChance)
  const scoutOneThreshold = rollThreshold(
    1 - spawn.scoutTwoChance - spawn.scoutOneChance
  )

  if (spawn.scoutTwoChance > 0 && roll >= scoutTwoThreshold) {
    return scoutRole(scoutGroupKeywords.left)
  }
  if (spawn.scoutOneChance > 0 && roll >= scoutOneThreshold) {
    return scoutRole(scoutGroupKeywords.right)
  }
  return commonRole
}

export type BoidCreationContext = {
  spawn: SpawnConfig
  rng: DomainRNG
}

/**
 * Create a boid at a random integer position inside the spawn square,
 * standing still, with a rolled role
 */
export function createBoid(index: number, context: BoidCreationContext): Boid {
  const { spawn, rng } = context

  const position = {
    x: rng.intBetween(spawn.min, spawn.max),
    y: rng.intBetween(spawn.min, spawn.max),
  }
  const role = roleForRoll(rng.intBetween(0, ROLE_ROLL_MAX), spawn)

  return {
    id: `boid-${index}`,
    index,
    position,
    velocity: { x: 0, y: 0 },
    role,
  }
}

export function spawnBoids(context: BoidCreationContext): Boid[] {
  const boids: Boid[] = []
  for (let i = 0; i < context.spawn.flockSize; i++) {
    boids.push(createBoid(i, context))
  }
  return boids
}

export type BoidUpdateContext = {
  snapshot: FlockSnapshot
  arena: ArenaBounds
  parameters: FlockParameters
  profiler?: Profiler
}

/**
 * Run the per-boid pipeline against the tick's snapshot:
 * neighbors, steering, speed clamp, integration. Writes to the live boid.
 * `slot` is the boid's position in the snapshot.
 */
export function updateBoid(
  boid: Boid,
  slot: number,
  context: BoidUpdateContext
): void {
  const { snapshot, arena, parameters, profiler } = context

  profiler?.start(profilerKeywords.neighborScan)
  const summary = evaluateNeighborhood(boid, slot, snapshot, parameters)
  profiler?.end(profilerKeywords.neighborScan)

  const steered = steer(boid, summary, { arena, parameters, profiler })
  const velocity = clampSpeed(steered, parameters)
  const position = integratePosition(boid.position, velocity, arena)

  boid.velocity.x = velocity.x
  boid.velocity.y = velocity.y
  boid.position.x = position.x
  boid.position.y = position.y
}
