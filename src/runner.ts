/**
 * Headless runner
 *
 * Starts the simulation system, attaches an arena of the requested size,
 * runs a fixed number of frames and reports flock statistics.
 */

import { parseArgs } from 'node:util'
import { z } from 'zod'
import { formatFlockStats } from './boids/analytics'
import { ConfigurationError } from './boids/validation'
import { defaultProfileId, getProfileIds } from './profiles'
import { startSimulation, stopSimulation } from './system'

export const runnerOptionsSchema = z.object({
  profile: z.string().default(defaultProfileId),
  frames: z.coerce.number().int().nonnegative().default(600),
  width: z.coerce.number().positive().default(1280),
  height: z.coerce.number().positive().default(720),
  fps: z.coerce.number().positive().default(60),
  seed: z.string().optional(),
  reportEvery: z.coerce.number().int().positive().default(120),
  profileTiming: z.boolean().default(false),
})

export type RunnerOptions = z.infer<typeof runnerOptionsSchema>

export function parseRunnerArgs(argv: string[]): RunnerOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      profile: { type: 'string' },
      frames: { type: 'string' },
      width: { type: 'string' },
      height: { type: 'string' },
      fps: { type: 'string' },
      seed: { type: 'string' },
      'report-every': { type: 'string' },
      'profile-timing': { type: 'boolean' },
    },
    strict: true,
  })

  const result = runnerOptionsSchema.safeParse({
    profile: values.profile,
    frames: values.frames,
    width: values.width,
    height: values.height,
    fps: values.fps,
    seed: values.seed,
    reportEvery: values['report-every'],
    profileTiming: values['profile-timing'],
  })
  if (!result.success) {
    throw new ConfigurationError('runner options', result.error.issues)
  }
  if (!getProfileIds().includes(result.data.profile)) {
    throw new Error(
      `Unknown profile "${result.data.profile}". Available profiles: ${getProfileIds().join(', ')}`
    )
  }
  return result.data
}

export async function run(options: RunnerOptions): Promise<void> {
  const system = await startSimulation()

  try {
    const { runtimeStore, randomness, engine, viewport, updateLoop, profiler } =
      system

    if (runtimeStore.getConfig().profileId !== options.profile) {
      runtimeStore.loadProfile(options.profile)
    }
    if (options.seed !== undefined) {
      randomness.setSeed(options.seed)
      engine.reset()
    }
    if (options.profileTiming) {
      profiler.enable()
    }

    viewport.resize(options.width, options.height)
    const arena = viewport.getBounds()
    if (arena === null) {
      throw new Error('Viewport reported no arena bounds after resize')
    }
    console.log(
      `[runner] Profile "${runtimeStore.getConfig().profileId}" in a ${arena.width}x${arena.height} arena`
    )
    console.log(`[runner] frame 0 | ${formatFlockStats(engine.getStats())}`)

    const unsubscribe = updateLoop.subscribe((_result, frameIndex) => {
      const frame = frameIndex + 1
      if (frame % options.reportEvery === 0) {
        console.log(
          `[runner] frame ${frame} | ${formatFlockStats(engine.getStats())}`
        )
      }
    })

    const stepped = await updateLoop.run(options.frames, options.fps)
    unsubscribe()

    console.log(
      `[runner] Done: ${stepped}/${options.frames} frames stepped | ${formatFlockStats(engine.getStats())}`
    )
    if (options.profileTiming) {
      profiler.printSummary()
    }
  } finally {
    await stopSimulation(system)
  }
}
