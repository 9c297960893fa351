import { describe, expect, it } from 'vitest'
import {
  ConfigurationError,
  formatIssues,
  parseArenaBounds,
  parseFlockParameters,
  parseSimulationProfile,
} from '../validation'
import { testParameters } from './fixtures'

const captureError = (fn: () => unknown): ConfigurationError => {
  try {
    fn()
  } catch (error) {
    if (error instanceof ConfigurationError) return error
    throw error
  }
  throw new Error('expected a ConfigurationError')
}

describe('validation', () => {
  describe('parseFlockParameters', () => {
    it('fills every missing field with the default tuning', () => {
      expect(parseFlockParameters({})).toEqual(testParameters)
    })

    it('keeps supplied values', () => {
      expect(parseFlockParameters({ maxSpeed: 8, minSpeed: 3 })).toMatchObject({
        maxSpeed: 8,
        minSpeed: 3,
        visualRange: 50,
      })
    })

    it('rejects a protected range wider than the visual range', () => {
      const error = captureError(() =>
        parseFlockParameters({ protectedRange: 60 })
      )

      expect(error.issues.map((issue) => issue.path)).toEqual([
        ['protectedRange'],
      ])
      expect(error.message).toBe(
        'Invalid flock parameters: protectedRange: protectedRange must not exceed visualRange'
      )
    })

    it('rejects a minimum speed above the maximum', () => {
      const error = captureError(() =>
        parseFlockParameters({ minSpeed: 7, maxSpeed: 6 })
      )
      expect(error.issues[0]?.path).toEqual(['minSpeed'])
    })

    it('rejects a bias outside [0, 1]', () => {
      const error = captureError(() => parseFlockParameters({ bias: 1.5 }))
      expect(error.issues[0]?.path).toEqual(['bias'])
    })
  })

  describe('parseSimulationProfile', () => {
    const profile = {
      id: 'custom',
      name: 'Custom',
      description: 'A custom run',
      seed: 'custom-seed',
      spawn: {},
      parameters: {},
    }

    it('fills spawn and parameter defaults', () => {
      const parsed = parseSimulationProfile(profile)

      expect(parsed.spawn).toEqual({
        flockSize: 300,
        min: -500,
        max: 300,
        scoutOneChance: 0.05,
        scoutTwoChance: 0.05,
      })
      expect(parsed.parameters).toEqual(testParameters)
    })

    it('rejects scout chances that add up to more than everyone', () => {
      const error = captureError(() =>
        parseSimulationProfile({
          ...profile,
          spawn: { scoutOneChance: 0.6, scoutTwoChance: 0.6 },
        })
      )
      expect(error.issues[0]?.path).toEqual(['spawn', 'scoutTwoChance'])
    })

    it('rejects an inverted spawn square', () => {
      const error = captureError(() =>
        parseSimulationProfile({ ...profile, spawn: { min: 10, max: -10 } })
      )
      expect(error.issues[0]?.path).toEqual(['spawn', 'min'])
    })
  })

  describe('parseArenaBounds', () => {
    it('accepts positive sizes', () => {
      expect(parseArenaBounds({ width: 1, height: 2 })).toEqual({
        width: 1,
        height: 2,
      })
    })

    it('rejects empty or negative sizes', () => {
      const error = captureError(() =>
        parseArenaBounds({ width: 0, height: -1 })
      )
      expect(error.issues.map((issue) => issue.path)).toEqual([
        ['width'],
        ['height'],
      ])
    })
  })

  describe('formatIssues', () => {
    it('prefixes issues with their path when they have one', () => {
      expect(
        formatIssues([
          { code: 'custom', path: [], message: 'whole object is wrong' },
          { code: 'custom', path: ['spawn', 'min'], message: 'too big' },
        ])
      ).toBe('whole object is wrong; spawn.min: too big')
    })
  })
})
