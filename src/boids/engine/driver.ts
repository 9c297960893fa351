import type { Flock } from '@/boids/flock'
import { driverStateKeywords } from '@/boids/vocabulary/keywords'
import type { ArenaBounds } from '@/boids/vocabulary/schemas/primitives'
import type { FlockParameters } from '@/boids/vocabulary/schemas/simulation'
import type { Profiler } from '@/resources/profiler'
import { step } from './core'

export type DriverState =
  (typeof driverStateKeywords)[keyof typeof driverStateKeywords]

export type TickResult = {
  state: DriverState
  stepped: boolean
}

export type TickDriverHandlers = {
  getFlock: () => Flock
  /** Null while the host has not reported a size yet */
  getArena: () => ArenaBounds | null
  getParameters: () => FlockParameters
  getProfiler?: () => Profiler | undefined
  onStateChange?: (next: DriverState, previous: DriverState) => void
}

/**
 * Tick Driver - two states, no terminal one
 *
 * idle:     no arena bounds yet, ticks do nothing
 * stepping: bounds known, every tick runs one full `step`
 *
 * Each tick re-reads the bounds, so losing them drops back to idle and
 * getting them again resumes stepping.
 */
export const createTickDriver = (handlers: TickDriverHandlers) => {
  const { getFlock, getArena, getParameters, getProfiler, onStateChange } =
    handlers

  let state: DriverState = driverStateKeywords.idle
  let stepCount = 0

  const transition = (next: DriverState) => {
    if (next === state) return
    const previous = state
    state = next
    onStateChange?.(next, previous)
  }

  const tick = (): TickResult => {
    const arena = getArena()

    if (arena === null) {
      transition(driverStateKeywords.idle)
      return { state, stepped: false }
    }

    transition(driverStateKeywords.stepping)
    step(getFlock(), arena, getParameters(), getProfiler?.())
    stepCount++
    return { state, stepped: true }
  }

  return {
    tick,
    getState: () => state,
    getStepCount: () => stepCount,
  }
}

export type TickDriver = ReturnType<typeof createTickDriver>
