import { describe, expect, it } from 'vitest'
import { parseSimulationProfile } from '@/boids/validation'
import {
  defaultProfileId,
  getProfile,
  getProfileIds,
  getProfileList,
  profiles,
} from '../index'

describe('profiles', () => {
  it('registers every profile under its own id', () => {
    for (const [id, profile] of Object.entries(profiles)) {
      expect(profile.id).toBe(id)
    }
    expect(getProfileIds()).toEqual([
      'classic-flock',
      'scout-expedition',
      'tight-swarm',
    ])
  })

  it.each(getProfileIds())('%s passes validation unchanged', (id) => {
    const profile = getProfile(id)
    expect(parseSimulationProfile(profile)).toEqual(profile)
  })

  it('defaults to the classic flock', () => {
    expect(defaultProfileId).toBe('classic-flock')
  })

  it('lists names and descriptions', () => {
    const list = getProfileList()
    expect(list).toHaveLength(3)
    expect(list[0]).toEqual({
      id: 'classic-flock',
      name: 'Classic Flock',
      description: 'Reference flocking tuning with a few scouts on each side',
    })
  })

  it('names the available profiles when one is missing', () => {
    expect(() => getProfile('nope')).toThrow(
      'Profile not found: nope. Available profiles: classic-flock, scout-expedition, tight-swarm'
    )
  })
})
