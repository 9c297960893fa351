import { describe, expect, it, vi } from 'vitest'
import { createUpdateLoop } from '../updateLoop'
import { manualScheduler } from './manualScheduler'

describe('updateLoop', () => {
  const setup = (timeScale = 1) => {
    const manual = manualScheduler()
    const handlers = {
      onStart: vi.fn(),
      onStop: vi.fn(),
      onFrame: vi.fn(),
      getFrameIntervalMs: () => 20,
      getTimeScale: () => timeScale,
    }
    const loop = createUpdateLoop(handlers, manual.scheduler)
    return { manual, handlers, loop }
  }

  it('runs one frame per scheduled callback with increasing indices', () => {
    const { manual, handlers, loop } = setup()

    loop.start()
    manual.fire()
    manual.fire()
    manual.fire()

    expect(handlers.onStart).toHaveBeenCalledTimes(1)
    expect(handlers.onFrame.mock.calls).toEqual([[0], [1], [2]])
    expect(loop.getFrameIndex()).toBe(3)
  })

  it('divides the frame interval by the time scale', () => {
    const { manual, loop } = setup(2)

    loop.start()
    manual.fire()

    expect(manual.delays).toEqual([10, 10])
  })

  it('ignores a second start while running', () => {
    const { manual, handlers, loop } = setup()

    loop.start()
    loop.start()

    expect(handlers.onStart).toHaveBeenCalledTimes(1)
    expect(manual.delays).toHaveLength(1)
  })

  it('cancels the pending frame on stop', () => {
    const { manual, handlers, loop } = setup()

    loop.start()
    loop.stop()

    expect(manual.hasPending()).toBe(false)
    expect(loop.isRunning()).toBe(false)
    expect(handlers.onStop).toHaveBeenCalledTimes(1)
    expect(handlers.onFrame).not.toHaveBeenCalled()
  })

  it('does not reschedule when a frame stops the loop', () => {
    const { manual, handlers, loop } = setup()
    handlers.onFrame.mockImplementation(() => loop.stop())

    loop.start()
    manual.fire()

    expect(handlers.onFrame).toHaveBeenCalledTimes(1)
    expect(manual.hasPending()).toBe(false)
  })
})
