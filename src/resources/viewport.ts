import { defineResource, type StartedResource } from 'braided'
import type { ArenaBounds } from '../boids/vocabulary/schemas/primitives'
import type { RuntimeStoreResource } from './runtimeStore'

/**
 * Viewport Resource - where the arena bounds come from
 *
 * The host (a window, a terminal, a test) reports its size through
 * `resize`. Until it does, or after `detach`, the store's arena is null and
 * the engine idles.
 */
export type ViewportAPI = {
  resize: (width: number, height: number) => void
  detach: () => void
  getBounds: () => ArenaBounds | null
}

export const viewport = defineResource({
  dependencies: ['runtimeStore'],
  start: ({
    runtimeStore,
  }: {
    runtimeStore: RuntimeStoreResource
  }): ViewportAPI => ({
    resize: (width: number, height: number) => {
      runtimeStore.setArena({ width, height })
    },
    detach: () => {
      runtimeStore.clearArena()
    },
    getBounds: () => runtimeStore.getArena(),
  }),
  halt: (api: ViewportAPI) => {
    api.detach()
  },
})

export type ViewportResource = StartedResource<typeof viewport>
