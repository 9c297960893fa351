import { z } from 'zod'
import { roleKeywords, scoutGroupKeywords } from '../keywords'

/**
 * Primitive Schemas - Foundational types with zero schema dependencies
 *
 * Only keywords are imported here. Everything else composes upward from
 * these building blocks.
 */

/**
 * Vector2 - 2D position or velocity
 */
export const vectorSchema = z.object({
  x: z.number(),
  y: z.number(),
})

export type Vector2 = z.infer<typeof vectorSchema>

/**
 * Arena Bounds - full width and height of the arena, centered on the origin
 *
 * Positions live in [-width/2, width/2] x [-height/2, height/2].
 */
export const arenaBoundsSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
})

export type ArenaBounds = z.infer<typeof arenaBoundsSchema>

// ============================================
// Role Schemas
// ============================================

export const scoutGroupSchema = z.union([
  z.literal(scoutGroupKeywords.right),
  z.literal(scoutGroupKeywords.left),
])

export type ScoutGroup = z.infer<typeof scoutGroupSchema>

const commonRoleSchema = z.object({
  kind: z.literal(roleKeywords.common),
})

const scoutRoleSchema = z.object({
  kind: z.literal(roleKeywords.scout),
  group: scoutGroupSchema,
})

/**
 * Role Schema - Common boids follow the flock, scouts drift sideways
 * looking for food and only loosely follow it.
 */
export const roleSchema = z.discriminatedUnion('kind', [
  commonRoleSchema,
  scoutRoleSchema,
])

export type CommonRole = z.infer<typeof commonRoleSchema>
export type ScoutRole = z.infer<typeof scoutRoleSchema>
export type Role = z.infer<typeof roleSchema>

export const commonRole: CommonRole = { kind: roleKeywords.common }

export const scoutRole = (group: ScoutGroup): ScoutRole => ({
  kind: roleKeywords.scout,
  group,
})
