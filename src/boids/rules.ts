import type { Profiler } from '../resources/profiler'
import type { NeighborSummary } from './neighbors'
import { profilerKeywords, roleKeywords, scoutGroupKeywords } from './vocabulary/keywords'
import type { Boid } from './vocabulary/schemas/entities'
import type { ArenaBounds, Role, Vector2 } from './vocabulary/schemas/primitives'
import type { FlockParameters } from './vocabulary/schemas/simulation'

/**
 * Steering Rules
 *
 * Each rule takes the boid's current velocity and returns the next one.
 * They are applied in a fixed order by `steer`:
 * cohesion, alignment, avoidance, edge-turning, role bias.
 *
 * The first three read averaged neighbor data and only run when the boid
 * saw at least one neighbor in visual range. Edge-turning and role bias
 * always run.
 */

type Kinematics = Pick<Boid, 'position' | 'velocity'>

/**
 * Cohesion: steer toward the neighbors' center of mass.
 *
 * The velocity-matching term is folded in here as well as applied by
 * `alignment`; the flock is tuned around matching twice per tick.
 */
export function cohesion(
  boid: Kinematics,
  summary: NeighborSummary,
  parameters: Pick<FlockParameters, 'centeringFactor' | 'matchingFactor'>
): Vector2 {
  const { centeringFactor, matchingFactor } = parameters
  const { position, velocity } = boid
  return {
    x:
      velocity.x +
      (summary.averagePosition.x - position.x) * centeringFactor +
      (summary.averageVelocity.x - velocity.x) * matchingFactor,
    y:
      velocity.y +
      (summary.averagePosition.y - position.y) * centeringFactor +
      (summary.averageVelocity.y - velocity.y) * matchingFactor,
  }
}

/**
 * Alignment: steer toward the neighbors' average velocity
 */
export function alignment(
  velocity: Vector2,
  summary: NeighborSummary,
  parameters: Pick<FlockParameters, 'matchingFactor'>
): Vector2 {
  const { matchingFactor } = parameters
  return {
    x: velocity.x + (summary.averageVelocity.x - velocity.x) * matchingFactor,
    y: velocity.y + (summary.averageVelocity.y - velocity.y) * matchingFactor,
  }
}

/**
 * Avoidance: push away from boids inside the protected range
 */
export function avoidance(
  velocity: Vector2,
  summary: NeighborSummary,
  parameters: Pick<FlockParameters, 'avoidanceFactor'>
): Vector2 {
  const { avoidanceFactor } = parameters
  return {
    x: velocity.x + summary.closeOffset.x * avoidanceFactor,
    y: velocity.y + summary.closeOffset.y * avoidanceFactor,
  }
}

/**
 * Edge-turning: within `edgeMargin` of an edge, nudge velocity back inward.
 * Axes are independent, so a boid in a corner turns on both.
 */
export function turnAtEdges(
  position: Vector2,
  velocity: Vector2,
  arena: ArenaBounds,
  parameters: Pick<FlockParameters, 'turnFactor' | 'edgeMargin'>
): Vector2 {
  const { turnFactor, edgeMargin } = parameters
  const halfWidth = arena.width / 2
  const halfHeight = arena.height / 2
  let { x, y } = velocity

  if (position.x <= -halfWidth + edgeMargin) {
    x += turnFactor
  } else if (position.x >= halfWidth - edgeMargin) {
    x -= turnFactor
  }

  if (position.y <= -halfHeight + edgeMargin) {
    y += turnFactor
  } else if (position.y >= halfHeight - edgeMargin) {
    y -= turnFactor
  }

  return { x, y }
}

/**
 * Role bias: scouts blend a constant sideways drift into vx.
 * Group 1 drifts right, group 2 drifts left, common boids are untouched.
 */
export function applyRoleBias(
  velocity: Vector2,
  role: Role,
  parameters: Pick<FlockParameters, 'bias'>
): Vector2 {
  const { bias } = parameters

  switch (role.kind) {
    case roleKeywords.common:
      return velocity
    case roleKeywords.scout:
      return {
        x:
          role.group === scoutGroupKeywords.right
            ? (1 - bias) * velocity.x + bias
            : (1 - bias) * velocity.x - bias,
        y: velocity.y,
      }
  }
}

export type SteeringContext = {
  arena: ArenaBounds
  parameters: FlockParameters
  profiler?: Profiler
}

/**
 * Apply every rule in order and return the boid's new (unclamped) velocity
 */
export function steer(
  boid: Kinematics & Pick<Boid, 'role'>,
  summary: NeighborSummary,
  context: SteeringContext
): Vector2 {
  const { arena, parameters, profiler } = context
  let velocity: Vector2 = { x: boid.velocity.x, y: boid.velocity.y }

  if (summary.count > 0) {
    profiler?.start(profilerKeywords.ruleCohesion)
    velocity = cohesion(boid, summary, parameters)
    profiler?.end(profilerKeywords.ruleCohesion)

    profiler?.start(profilerKeywords.ruleAlignment)
    velocity = alignment(velocity, summary, parameters)
    profiler?.end(profilerKeywords.ruleAlignment)

    profiler?.start(profilerKeywords.ruleAvoidance)
    velocity = avoidance(velocity, summary, parameters)
    profiler?.end(profilerKeywords.ruleAvoidance)
  }

  profiler?.start(profilerKeywords.ruleEdgeTurning)
  velocity = turnAtEdges(boid.position, velocity, arena, parameters)
  profiler?.end(profilerKeywords.ruleEdgeTurning)

  profiler?.start(profilerKeywords.ruleRoleBias)
  velocity = applyRoleBias(velocity, boid.role, parameters)
  profiler?.end(profilerKeywords.ruleRoleBias)

  return velocity
}
