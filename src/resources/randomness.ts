/**
 * Randomness Resource - seeded RNG for everything that is not the step itself
 *
 * The step function has no randomness. Only spawning draws numbers, from
 * the `spawning` domain, so a seed and a profile fully decide the flock.
 */

import { defineResource } from 'braided'
import type { RuntimeStoreResource } from './runtimeStore'
import { createSeededRNG, type DomainRNG } from '@/lib/seededRandom'

export interface RandomnessResource {
  getMasterSeed(): string
  getMasterSeedNumber(): number
  domain(name: string): DomainRNG
  getDomains(): string[]
  /** Re-seed every domain. Streams restart from their first value. */
  setSeed(newSeed: string | number): void
}

export const randomness = defineResource({
  dependencies: ['runtimeStore'],
  start: ({
    runtimeStore,
  }: {
    runtimeStore: RuntimeStoreResource
  }): RandomnessResource => {
    const seed = runtimeStore.getConfig().randomSeed
    let rng = createSeededRNG(seed)

    console.log(
      `[randomness] Initialized with seed: "${seed}" (${rng.getMasterSeedNumber()})`
    )

    return {
      getMasterSeed: () => rng.getMasterSeed(),
      getMasterSeedNumber: () => rng.getMasterSeedNumber(),
      domain: (name: string) => rng.domain(name),
      getDomains: () => rng.getDomains(),

      setSeed: (newSeed: string | number) => {
        const seed = String(newSeed)
        runtimeStore.setSeed(seed)
        rng = createSeededRNG(seed)
        console.log(
          `[randomness] Re-seeded with: "${seed}" (${rng.getMasterSeedNumber()})`
        )
      },
    }
  },
  halt: () => {
    // RNG holds no external resources
  },
})
