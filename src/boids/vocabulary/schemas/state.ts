import { z } from 'zod'
import { arenaBoundsSchema } from './primitives'
import { flockParametersSchema, spawnConfigSchema } from './simulation'

/**
 * State Schemas - Shape of the runtime store
 *
 * Dependencies: primitives, simulation
 */

export const runtimeConfigSchema = z.object({
  profileId: z.string(),
  randomSeed: z.string(),
  spawn: spawnConfigSchema,
  parameters: flockParametersSchema,
})

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>

/**
 * `arena` stays null until the host reports a size. While it is null the
 * tick driver stays idle.
 */
export const runtimeStoreSchema = z.object({
  config: runtimeConfigSchema,
  arena: arenaBoundsSchema.nullable(),
})

export type RuntimeStore = z.infer<typeof runtimeStoreSchema>
