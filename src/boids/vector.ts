import type { Vector2 } from './vocabulary/schemas/primitives'

export function add(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x + b.x, y: a.y + b.y }
}

export function divide(v: Vector2, scalar: number): Vector2 {
  if (scalar === 0) return { x: 0, y: 0 }
  return { x: v.x / scalar, y: v.y / scalar }
}

export function magnitude(v: Vector2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y)
}

/**
 * Rescale `v` to `mag` keeping its heading. A zero vector has no heading
 * and is returned as zero.
 */
export function setMagnitude(v: Vector2, mag: number): Vector2 {
  const current = magnitude(v)
  if (current === 0) return { x: 0, y: 0 }
  return { x: (v.x / current) * mag, y: (v.y / current) * mag }
}

export function copy(v: Vector2): Vector2 {
  return { x: v.x, y: v.y }
}
