import type { ArenaBounds, Vector2 } from './vocabulary/schemas/primitives'

/**
 * Clamp one coordinate to [-half, half].
 *
 * Above the positive bound snaps down, at-or-below the negative bound
 * snaps up.
 */
function clampAxis(value: number, half: number): number {
  if (value > half) return half
  if (value <= -half) return -half
  return value
}

export function clampToArena(position: Vector2, arena: ArenaBounds): Vector2 {
  return {
    x: clampAxis(position.x, arena.width / 2),
    y: clampAxis(position.y, arena.height / 2),
  }
}

/**
 * Advance one tick: one full velocity unit, no time-delta scaling, then
 * keep the boid inside the arena.
 */
export function integratePosition(
  position: Vector2,
  velocity: Vector2,
  arena: ArenaBounds
): Vector2 {
  return clampToArena(
    { x: position.x + velocity.x, y: position.y + velocity.y },
    arena
  )
}

export function isInsideArena(position: Vector2, arena: ArenaBounds): boolean {
  const halfWidth = arena.width / 2
  const halfHeight = arena.height / 2
  return (
    position.x >= -halfWidth &&
    position.x <= halfWidth &&
    position.y >= -halfHeight &&
    position.y <= halfHeight
  )
}
