import { z } from 'zod'
import { roleSchema, vectorSchema } from './primitives'

/**
 * Entity Schemas - Things that exist in the arena
 *
 * Dependencies: primitives
 */

// ============================================
// Boid Schema
// ============================================

/**
 * Boid - one simulated individual
 *
 * `index` is the boid's position in the flock and never changes, so
 * iteration order is stable from tick to tick. `role` is fixed at creation.
 * Velocity is expressed in arena units per tick.
 */
export const boidSchema = z.object({
  id: z.string(),
  index: z.number().int().nonnegative(),
  position: vectorSchema,
  velocity: vectorSchema,
  role: roleSchema,
})

export type Boid = z.infer<typeof boidSchema>

/**
 * Frozen copy of a boid taken at the start of a tick. Neighbor evaluation
 * only ever reads these.
 */
export type BoidSnapshot = Readonly<{
  id: string
  index: number
  position: Readonly<Boid['position']>
  velocity: Readonly<Boid['velocity']>
  role: Readonly<Boid['role']>
}>

export type FlockSnapshot = ReadonlyArray<BoidSnapshot>
