import type { SimulationProfile } from '../boids/vocabulary/schemas/simulation'

/**
 * Tight Swarm - small, slow and sticky
 */
export const tightSwarmProfile: SimulationProfile = {
  id: 'tight-swarm',
  name: 'Tight Swarm',
  description: 'Dense, slow swarm with strong cohesion and no scouts',
  seed: 'tight-swarm-3',

  spawn: {
    flockSize: 120,
    min: -150,
    max: 150,
    scoutOneChance: 0,
    scoutTwoChance: 0,
  },

  parameters: {
    turnFactor: 0.5,
    visualRange: 40,
    protectedRange: 8,
    centeringFactor: 0.002,
    avoidanceFactor: 0.05,
    matchingFactor: 0.2,
    maxSpeed: 4,
    minSpeed: 2,
    bias: 0,
    edgeMargin: 100,
  },
}
