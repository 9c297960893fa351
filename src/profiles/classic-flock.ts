import type { SimulationProfile } from '../boids/vocabulary/schemas/simulation'

/**
 * Classic Flock - the reference tuning
 *
 * 300 boids spawned in the lower-left of the arena, about one in ten a
 * scout. Loose cohesion, strong alignment, speeds held in a narrow
 * 5.5-6 band so the flock reads as one body that splits and re-forms.
 */
export const classicFlockProfile: SimulationProfile = {
  id: 'classic-flock',
  name: 'Classic Flock',
  description: 'Reference flocking tuning with a few scouts on each side',
  seed: 'classic-flock-42',

  spawn: {
    flockSize: 300,
    min: -500,
    max: 300,
    scoutOneChance: 0.05,
    scoutTwoChance: 0.05,
  },

  parameters: {
    turnFactor: 1,
    visualRange: 50,
    protectedRange: 10,
    centeringFactor: 0.0005,
    avoidanceFactor: 0.1,
    matchingFactor: 0.15,
    maxSpeed: 6,
    minSpeed: 5.5,
    bias: 0.05,
    edgeMargin: 200,
  },
}
