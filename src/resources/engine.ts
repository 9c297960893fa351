import { defineResource, type StartedResource } from 'braided'
import {
  computeFlockStats,
  formatFlockStats,
  type FlockStats,
} from '../boids/analytics'
import { spawnBoids } from '../boids/boid'
import {
  createTickDriver,
  type DriverState,
  type TickResult,
} from '../boids/engine/driver'
import { createFlock, findBoidById, snapshotFlock, type Flock } from '../boids/flock'
import { rngDomainKeywords } from '../boids/vocabulary/keywords'
import type { Boid, FlockSnapshot } from '../boids/vocabulary/schemas/entities'
import type { Profiler } from './profiler'
import type { RandomnessResource } from './randomness'
import type { RuntimeStoreResource } from './runtimeStore'
import type { TimeResource } from './time'

export type BoidEngine = {
  /** One driver tick: steps the flock when arena bounds are known */
  update: () => TickResult
  /** Re-spawn the flock from the current profile and seed */
  reset: () => void
  /**
   * The live boids the next tick will move. Writes to their vectors change
   * the simulation; use `snapshot` for a copy that stays put.
   */
  getBoids: () => ReadonlyArray<Boid>
  /** Live boid, same caveat as `getBoids` */
  getBoidById: (boidId: string) => Boid | undefined
  /** Frozen copy of the flock as it is now */
  snapshot: () => FlockSnapshot
  getStats: () => FlockStats
  getDriverState: () => DriverState
  /** Stop following profile switches */
  dispose: () => void
}

export const engine = defineResource({
  dependencies: ['runtimeStore', 'profiler', 'randomness', 'time'],
  start: ({
    runtimeStore,
    profiler,
    randomness,
    time,
  }: {
    runtimeStore: RuntimeStoreResource
    profiler: Profiler
    randomness: RandomnessResource
    time: TimeResource
  }): BoidEngine => {
    const spawnFlock = (): Flock => {
      const { spawn, randomSeed } = runtimeStore.getConfig()
      // Re-seed so a reset with the same seed yields the same flock
      randomness.setSeed(randomSeed)
      return createFlock(
        spawnBoids({ spawn, rng: randomness.domain(rngDomainKeywords.spawning) })
      )
    }

    let flock = spawnFlock()
    console.log(`[engine] Spawned ${flock.length} boids`)

    const driver = createTickDriver({
      getFlock: () => flock,
      getArena: () => runtimeStore.getArena(),
      getParameters: () => runtimeStore.getConfig().parameters,
      getProfiler: () => profiler,
      onStateChange: (next, previous) => {
        console.log(`[engine] Driver ${previous} -> ${next}`)
      },
    })

    // Profile switches change spawn settings and seed, so re-spawn
    const unsubscribe = runtimeStore.store.subscribe((state, previous) => {
      if (state.config.profileId !== previous.config.profileId) {
        console.log(`[engine] Profile switched to "${state.config.profileId}"`)
        reset()
      }
    })

    const update = (): TickResult => {
      const result = driver.tick()
      if (result.stepped) {
        time.tick()
      }
      return result
    }

    const reset = () => {
      flock = spawnFlock()
      time.reset()
      console.log(`[engine] Reset with ${flock.length} boids`)
    }

    const api: BoidEngine = {
      update,
      reset,
      getBoids: () => flock,
      getBoidById: (boidId: string) => findBoidById(flock, boidId),
      snapshot: () => snapshotFlock(flock),
      getStats: () => computeFlockStats(flock),
      getDriverState: () => driver.getState(),
      dispose: unsubscribe,
    }

    return api
  },
  halt: (api: BoidEngine) => {
    api.dispose()
    console.log(`[engine] Halted: ${formatFlockStats(api.getStats())}`)
  },
})

export type EngineResource = StartedResource<typeof engine>
