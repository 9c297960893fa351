import { haltSystem, startSystem, type StartedSystem } from 'braided'
import type { FrameScheduler } from './lib/updateLoop'
import { engine } from './resources/engine'
import { profiler } from './resources/profiler'
import { randomness } from './resources/randomness'
import { runtimeStore } from './resources/runtimeStore'
import { time } from './resources/time'
import { createUpdateLoopResource } from './resources/updateLoop'
import { viewport } from './resources/viewport'

/**
 * Every resource of the simulation. Only the frame scheduler varies: timers
 * for real runs, a hand-fired one in tests.
 */
export const createSystemConfig = (scheduler?: FrameScheduler) => ({
  runtimeStore,
  time,
  profiler,
  randomness,
  viewport,
  engine,
  updateLoop: createUpdateLoopResource(scheduler),
})

export type SimulationSystemConfig = ReturnType<typeof createSystemConfig>

export const systemConfig: SimulationSystemConfig = createSystemConfig()

export type SimulationSystem = StartedSystem<SimulationSystemConfig>

/**
 * Start every resource. Any resource that failed to start is reported and
 * the partially started system is halted before rethrowing.
 */
export async function startSimulation(
  config: SimulationSystemConfig = systemConfig
): Promise<SimulationSystem> {
  const { system, errors } = await startSystem(config)

  if (errors.size > 0) {
    const details = Array.from(errors.entries())
      .map(([resourceId, error]) => `${resourceId}: ${error.message}`)
      .join(', ')
    console.error(`[system] Failed to start: ${details}`)
    await haltSystem(config, system)
    throw new Error(`System start failed: ${details}`)
  }

  console.log('[system] Started')
  return system
}

export async function stopSimulation(
  system: SimulationSystem,
  config: SimulationSystemConfig = systemConfig
): Promise<void> {
  await haltSystem(config, system)
  console.log('[system] Halted')
}
