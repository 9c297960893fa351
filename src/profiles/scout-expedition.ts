import type { SimulationProfile } from '../boids/vocabulary/schemas/simulation'

/**
 * Scout Expedition - a quarter of the flock drifts sideways
 *
 * Stronger bias and more scouts pull the flock apart into left and right
 * wings.
 */
export const scoutExpeditionProfile: SimulationProfile = {
  id: 'scout-expedition',
  name: 'Scout Expedition',
  description: 'Many scouts with a strong sideways drift',
  seed: 'scout-expedition-7',

  spawn: {
    flockSize: 200,
    min: -300,
    max: 300,
    scoutOneChance: 0.12,
    scoutTwoChance: 0.12,
  },

  parameters: {
    turnFactor: 1,
    visualRange: 60,
    protectedRange: 10,
    centeringFactor: 0.0005,
    avoidanceFactor: 0.1,
    matchingFactor: 0.1,
    maxSpeed: 6,
    minSpeed: 4,
    bias: 0.1,
    edgeMargin: 150,
  },
}
