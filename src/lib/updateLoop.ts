/**
 * Frame scheduler. Under Node the default is a plain timeout; tests pass a
 * manual one and fire frames themselves.
 */
export type FrameScheduler = {
  /** Run `callback` after `delayMs`; returns a function that cancels it */
  schedule: (callback: () => void, delayMs: number) => () => void
}

export const timeoutScheduler: FrameScheduler = {
  schedule: (callback, delayMs) => {
    const timeout = setTimeout(callback, delayMs)
    return () => clearTimeout(timeout)
  },
}

type UpdateLoopHandlers = {
  onStart: () => void
  onStop: () => void
  /** Called once per frame while running */
  onFrame: (frameIndex: number) => void
  /** Base frame interval, before the time scale is applied */
  getFrameIntervalMs: () => number
  getTimeScale: () => number // default: 1x
}

export const createUpdateLoop = (
  handlers: UpdateLoopHandlers,
  scheduler: FrameScheduler = timeoutScheduler
) => {
  let cancelNext: (() => void) | null = null
  let isRunning = false
  let frameIndex = 0

  const { onStart, onStop, onFrame, getFrameIntervalMs, getTimeScale } =
    handlers

  const nextDelay = () => getFrameIntervalMs() / getTimeScale()

  const frame = () => {
    cancelNext = null
    if (!isRunning) return
    onFrame(frameIndex++)
    // onFrame may have stopped the loop
    if (isRunning) {
      cancelNext = scheduler.schedule(frame, nextDelay())
    }
  }

  const start = () => {
    if (isRunning) return
    isRunning = true
    cancelNext = scheduler.schedule(frame, nextDelay())
    onStart()
  }

  const stop = () => {
    if (!isRunning) return
    isRunning = false
    if (cancelNext) {
      cancelNext()
      cancelNext = null
    }
    onStop()
  }

  return {
    start,
    stop,
    isRunning: () => isRunning,
    getFrameIndex: () => frameIndex,
  }
}

export type UpdateLoop = ReturnType<typeof createUpdateLoop>
