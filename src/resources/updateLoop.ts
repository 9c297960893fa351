import { defineResource, type StartedResource } from 'braided'
import type { TickResult } from '../boids/engine/driver'
import {
  createUpdateLoop,
  timeoutScheduler,
  type FrameScheduler,
} from '@/lib/updateLoop'
import type { EngineResource } from './engine'
import type { TimeResource } from './time'

export const DEFAULT_TARGET_FPS = 60

export type FrameListener = (result: TickResult, frameIndex: number) => void

/**
 * Update Loop Resource - the per-frame tick signal
 *
 * Every frame the engine gets one tick, unless time is paused. While paused
 * a requested single step runs exactly one tick.
 */
export const createUpdateLoopResource = (
  scheduler: FrameScheduler = timeoutScheduler
) =>
  defineResource({
    dependencies: ['engine', 'time'],
    start: ({ engine, time }: { engine: EngineResource; time: TimeResource }) => {
      let targetFps = DEFAULT_TARGET_FPS
      const listeners = new Set<FrameListener>()
      const failureListeners = new Set<(error: unknown) => void>()

      const tickFrame = (frameIndex: number) => {
        const { isPaused, stepRequested } = time.getState()

        let result: TickResult
        if (isPaused && !stepRequested) {
          result = { state: engine.getDriverState(), stepped: false }
        } else {
          result = engine.update()
          if (stepRequested) {
            time.clearStepRequest()
          }
        }

        for (const listener of listeners) {
          listener(result, frameIndex)
        }
      }

      // A failed frame stops the loop and rejects every pending `run`
      const runFrame = (frameIndex: number) => {
        try {
          tickFrame(frameIndex)
        } catch (error) {
          console.error(`[updateLoop] Frame ${frameIndex} failed:`, error)
          stop()
          for (const onFailure of failureListeners) {
            onFailure(error)
          }
        }
      }

      const loop = createUpdateLoop(
        {
          onStart: () => console.log(`[updateLoop] Started at ${targetFps} fps`),
          onStop: () => console.log('[updateLoop] Stopped'),
          onFrame: runFrame,
          getFrameIntervalMs: () => 1000 / targetFps,
          getTimeScale: () => time.getState().timeScale,
        },
        scheduler
      )

      const start = (fps: number = targetFps) => {
        if (fps <= 0) {
          throw new Error(`Target fps must be positive, got ${fps}`)
        }
        targetFps = fps
        loop.start()
      }

      const stop = () => {
        loop.stop()
      }

      /**
       * Run `frameCount` frames, then stop. Resolves with the number of
       * frames in which the flock actually moved; rejects with the error of
       * a failed frame.
       */
      const run = (frameCount: number, fps: number = targetFps) =>
        new Promise<number>((resolve, reject) => {
          let seen = 0
          let stepped = 0

          if (frameCount <= 0) {
            resolve(0)
            return
          }

          const detach = () => {
            listeners.delete(listener)
            failureListeners.delete(onFailure)
          }

          const listener: FrameListener = (result) => {
            seen++
            if (result.stepped) stepped++
            if (seen >= frameCount) {
              detach()
              stop()
              resolve(stepped)
            }
          }

          const onFailure = (error: unknown) => {
            detach()
            reject(error)
          }

          listeners.add(listener)
          failureListeners.add(onFailure)
          start(fps)
        })

      return {
        start,
        stop,
        run,
        pause: () => time.pause(),
        resume: () => time.resume(),
        step: () => time.step(),
        subscribe: (listener: FrameListener) => {
          listeners.add(listener)
          return () => {
            listeners.delete(listener)
          }
        },
        isRunning: () => loop.isRunning(),
        isPaused: () => time.getState().isPaused,
      }
    },
    halt: ({ stop }: { stop: () => void }) => {
      stop()
    },
  })

export type UpdateLoopResource = StartedResource<
  ReturnType<typeof createUpdateLoopResource>
>
