import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '@/boids/validation'
import { createRuntimeStore } from '../runtimeStore'

describe('runtimeStore', () => {
  it('starts from the default profile with no arena', () => {
    const runtime = createRuntimeStore()

    expect(runtime.getConfig().profileId).toBe('classic-flock')
    expect(runtime.getConfig().randomSeed).toBe('classic-flock-42')
    expect(runtime.getConfig().spawn.flockSize).toBe(300)
    expect(runtime.getArena()).toBeNull()
  })

  it('merges and validates parameter updates', () => {
    const runtime = createRuntimeStore()

    const parameters = runtime.updateParameters({ visualRange: 80 })

    expect(parameters.visualRange).toBe(80)
    expect(parameters.protectedRange).toBe(10)
    expect(runtime.getConfig().parameters).toEqual(parameters)
  })

  it('rejects parameter updates that break cross-field rules', () => {
    const runtime = createRuntimeStore()
    const before = runtime.getConfig()

    expect(() => runtime.updateParameters({ minSpeed: 7 })).toThrow(
      ConfigurationError
    )
    expect(runtime.getConfig()).toBe(before)
  })

  it('validates arena bounds', () => {
    const runtime = createRuntimeStore()

    runtime.setArena({ width: 640, height: 480 })
    expect(runtime.getArena()).toEqual({ width: 640, height: 480 })

    expect(() => runtime.setArena({ width: 0, height: 480 })).toThrow(
      'Invalid arena bounds: width: Number must be greater than 0'
    )

    runtime.clearArena()
    expect(runtime.getArena()).toBeNull()
  })

  it('switches profiles without dropping the arena', () => {
    const runtime = createRuntimeStore()
    runtime.setArena({ width: 640, height: 480 })

    runtime.loadProfile('tight-swarm')

    expect(runtime.getConfig().profileId).toBe('tight-swarm')
    expect(runtime.getConfig().spawn.flockSize).toBe(120)
    expect(runtime.getArena()).toEqual({ width: 640, height: 480 })
  })

  it('refuses unknown profiles', () => {
    expect(() => createRuntimeStore('missing')).toThrow(
      'Profile not found: missing'
    )
  })

  it('does not share parameter objects with the profile registry', () => {
    const first = createRuntimeStore()
    first.updateParameters({ bias: 0.5 })

    expect(createRuntimeStore().getConfig().parameters.bias).toBe(0.05)
  })
})
