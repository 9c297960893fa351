import { defineResource, type StartedResource } from 'braided'
import { createStore, type StoreApi } from 'zustand/vanilla'

/**
 * Time Resource - simulation frame counting and run control
 *
 * The simulation advances in whole frames: one frame is one tick of the
 * flock, with no delta-time scaling. This resource counts them and holds
 * the pause / single-step flags the update loop consults.
 */

export type TimeState = {
  /** Frames the engine actually stepped */
  simulationFrame: number
  isPaused: boolean
  /** Frame-rate multiplier (0.1x - 4x) applied by the update loop */
  timeScale: number
  /** Set by `step()` while paused; the loop runs one frame and clears it */
  stepRequested: boolean
}

export const MIN_TIME_SCALE = 0.1
export const MAX_TIME_SCALE = 4

const initialTimeState = (): TimeState => ({
  simulationFrame: 0,
  isPaused: false,
  timeScale: 1,
  stepRequested: false,
})

export type TimeAPI = {
  getState: () => TimeState
  getFrame: () => number
  pause: () => void
  resume: () => void
  setTimeScale: (scale: number) => void
  step: () => void
  clearStepRequest: () => void
  tick: () => void
  reset: () => void
  store: StoreApi<TimeState>
}

export function createTime(): TimeAPI {
  const store = createStore<TimeState>()(initialTimeState)

  return {
    getState: () => ({ ...store.getState() }),
    getFrame: () => store.getState().simulationFrame,

    pause: () => store.setState({ isPaused: true }),
    resume: () => store.setState({ isPaused: false, stepRequested: false }),

    setTimeScale: (scale: number) => {
      if (scale < MIN_TIME_SCALE || scale > MAX_TIME_SCALE) {
        throw new Error(
          `Time scale must be between ${MIN_TIME_SCALE} and ${MAX_TIME_SCALE}`
        )
      }
      store.setState({ timeScale: scale })
    },

    step: () => {
      if (!store.getState().isPaused) return
      store.setState({ stepRequested: true })
    },

    clearStepRequest: () => store.setState({ stepRequested: false }),

    tick: () =>
      store.setState((state) => ({
        simulationFrame: state.simulationFrame + 1,
      })),

    reset: () => store.setState(initialTimeState()),

    store,
  }
}

export const time = defineResource({
  start: (): TimeAPI => createTime(),
  halt: () => {
    // No cleanup needed
  },
})

export type TimeResource = StartedResource<typeof time>
