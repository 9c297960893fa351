import { z } from 'zod'

/**
 * Simulation Schemas - Tunable parameters, spawning and profiles
 *
 * These are global simulation parameters, never per-boid state. Defaults are
 * the tuning the flock was designed around; profiles override them.
 *
 * Dependencies: none
 */

// ============================================
// Flock Parameters
// ============================================

export const flockParametersBaseSchema = z.object({
  /** How much velocity is added per tick when a boid is near an edge */
  turnFactor: z.number().nonnegative().default(1),
  /** Half-width of the box in which a boid sees neighbors */
  visualRange: z.number().positive().default(50),
  /** Radius in which a boid wants to be alone */
  protectedRange: z.number().nonnegative().default(10),
  /** Cohesion: pull toward the neighbors' center of mass */
  centeringFactor: z.number().nonnegative().default(0.0005),
  /** Separation: push away from boids in protected range */
  avoidanceFactor: z.number().nonnegative().default(0.1),
  /** Alignment: match the neighbors' average velocity */
  matchingFactor: z.number().nonnegative().default(0.15),
  maxSpeed: z.number().positive().default(6),
  minSpeed: z.number().nonnegative().default(5.5),
  /** Scouts' sideways drift, blended into vx every tick */
  bias: z.number().min(0).max(1).default(0.05),
  /** Distance from an arena edge at which boids start turning back */
  edgeMargin: z.number().nonnegative().default(200),
})

export const flockParametersSchema = flockParametersBaseSchema.superRefine(
  (parameters, ctx) => {
    if (parameters.protectedRange > parameters.visualRange) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['protectedRange'],
        message: 'protectedRange must not exceed visualRange',
      })
    }
    if (parameters.minSpeed > parameters.maxSpeed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minSpeed'],
        message: 'minSpeed must not exceed maxSpeed',
      })
    }
  }
)

export type FlockParameters = z.infer<typeof flockParametersSchema>
export type FlockParametersInput = z.input<typeof flockParametersSchema>

// ============================================
// Spawn Config
// ============================================

/**
 * Spawn Config - How the initial flock is laid out
 *
 * Positions are integers drawn uniformly from [min, max] on both axes.
 * Role chances are fractions of the population.
 */
export const spawnConfigSchema = z
  .object({
    flockSize: z.number().int().nonnegative().default(300),
    min: z.number().int().default(-500),
    max: z.number().int().default(300),
    scoutOneChance: z.number().min(0).max(1).default(0.05),
    scoutTwoChance: z.number().min(0).max(1).default(0.05),
  })
  .superRefine((spawn, ctx) => {
    if (spawn.min > spawn.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['min'],
        message: 'spawn min must not exceed spawn max',
      })
    }
    if (spawn.scoutOneChance + spawn.scoutTwoChance > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['scoutTwoChance'],
        message: 'scout chances must sum to at most 1',
      })
    }
  })

export type SpawnConfig = z.infer<typeof spawnConfigSchema>

// ============================================
// Simulation Profile
// ============================================

/**
 * Simulation Profile - a named, seeded preset for a whole run
 */
export const simulationProfileSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  seed: z.string().min(1),
  spawn: spawnConfigSchema,
  parameters: flockParametersSchema,
})

export type SimulationProfile = z.infer<typeof simulationProfileSchema>
export type SimulationProfileInput = z.input<typeof simulationProfileSchema>
