import { describe, expect, it, vi } from 'vitest'
import { createFlock } from '@/boids/flock'
import type { ArenaBounds } from '@/boids/vocabulary/schemas/primitives'
import { makeBoid, testParameters } from '../../__tests__/fixtures'
import { createTickDriver } from '../driver'

describe('tick driver', () => {
  const setup = () => {
    const flock = createFlock([makeBoid(0, { x: 0, y: 0 }, { x: 6, y: 0 })])
    let arena: ArenaBounds | null = null
    const onStateChange = vi.fn()
    const driver = createTickDriver({
      getFlock: () => flock,
      getArena: () => arena,
      getParameters: () => testParameters,
      onStateChange,
    })
    return {
      flock,
      driver,
      onStateChange,
      setArena: (next: ArenaBounds | null) => {
        arena = next
      },
    }
  }

  it('starts idle and leaves the flock alone without arena bounds', () => {
    const { flock, driver, onStateChange } = setup()

    expect(driver.tick()).toEqual({ state: 'idle', stepped: false })
    expect(flock[0]?.position).toEqual({ x: 0, y: 0 })
    expect(driver.getStepCount()).toBe(0)
    expect(onStateChange).not.toHaveBeenCalled()
  })

  it('steps once per tick once bounds are known', () => {
    const { flock, driver, onStateChange, setArena } = setup()
    setArena({ width: 10000, height: 10000 })

    expect(driver.tick()).toEqual({ state: 'stepping', stepped: true })
    expect(driver.tick()).toEqual({ state: 'stepping', stepped: true })

    expect(flock[0]?.position).toEqual({ x: 12, y: 0 })
    expect(driver.getStepCount()).toBe(2)
    expect(onStateChange).toHaveBeenCalledTimes(1)
    expect(onStateChange).toHaveBeenCalledWith('stepping', 'idle')
  })

  it('drops back to idle when bounds go away and resumes when they return', () => {
    const { flock, driver, onStateChange, setArena } = setup()
    setArena({ width: 10000, height: 10000 })
    driver.tick()

    setArena(null)
    expect(driver.tick()).toEqual({ state: 'idle', stepped: false })
    expect(driver.getState()).toBe('idle')
    expect(flock[0]?.position).toEqual({ x: 6, y: 0 })

    setArena({ width: 10000, height: 10000 })
    driver.tick()
    expect(driver.getState()).toBe('stepping')
    expect(onStateChange).toHaveBeenNthCalledWith(2, 'idle', 'stepping')
    expect(onStateChange).toHaveBeenNthCalledWith(3, 'stepping', 'idle')
  })
})
