import { defineResource, type StartedResource } from 'braided'
import type { StoreApi } from 'zustand/vanilla'
import { createStore } from 'zustand/vanilla'
import { defaultProfileId, getProfile } from '../profiles'
import { parseArenaBounds, parseFlockParameters } from '../boids/validation'
import type { ArenaBounds } from '../boids/vocabulary/schemas/primitives'
import type {
  FlockParameters,
  FlockParametersInput,
  SimulationProfile,
} from '../boids/vocabulary/schemas/simulation'
import type {
  RuntimeConfig,
  RuntimeStore,
} from '../boids/vocabulary/schemas/state'

export type RuntimeStoreApi = StoreApi<RuntimeStore>

export function configFromProfile(profile: SimulationProfile): RuntimeConfig {
  return {
    profileId: profile.id,
    randomSeed: profile.seed,
    spawn: { ...profile.spawn },
    parameters: { ...profile.parameters },
  }
}

/**
 * Create the store and its commands. Every write is validated first, so the
 * store never holds a configuration the engine cannot run.
 */
export function createRuntimeStore(initialProfileId: string = defaultProfileId) {
  const profile = getProfile(initialProfileId)

  const store = createStore<RuntimeStore>()(() => ({
    config: configFromProfile(profile),
    arena: null,
  }))

  /**
   * Switch to another profile. Keeps the arena: the viewport did not change.
   */
  function loadProfile(profileId: string) {
    const next = getProfile(profileId)
    store.setState({ config: configFromProfile(next) })
  }

  function updateParameters(patch: Partial<FlockParametersInput>): FlockParameters {
    const { config } = store.getState()
    const parameters = parseFlockParameters({ ...config.parameters, ...patch })
    store.setState({ config: { ...config, parameters } })
    return parameters
  }

  function setSeed(seed: string) {
    const { config } = store.getState()
    store.setState({ config: { ...config, randomSeed: seed } })
  }

  function setArena(bounds: ArenaBounds) {
    store.setState({ arena: parseArenaBounds(bounds) })
  }

  function clearArena() {
    store.setState({ arena: null })
  }

  return {
    store,
    loadProfile,
    updateParameters,
    setSeed,
    setArena,
    clearArena,
    getConfig: () => store.getState().config,
    getArena: () => store.getState().arena,
  }
}

export const runtimeStore = defineResource({
  dependencies: [],
  start: () => createRuntimeStore(),
  halt: () => {
    // Nothing to release
  },
})

export type RuntimeStoreResource = StartedResource<typeof runtimeStore>
