import * as vec from './vector'
import type {
  Boid,
  BoidSnapshot,
  FlockSnapshot,
} from './vocabulary/schemas/entities'

/**
 * Flock - the ordered, fixed-size collection of live boids
 *
 * Order is the boid's `index` and stays stable for the life of the
 * simulation, which keeps iteration deterministic. There is no add or remove:
 * the population is decided at spawn time.
 */
export type Flock = Boid[]

/**
 * Build a flock from boids, re-indexing them by their position in the array
 */
export function createFlock(boids: ReadonlyArray<Boid>): Flock {
  return boids.map((boid, index) => ({
    ...boid,
    index,
    position: vec.copy(boid.position),
    velocity: vec.copy(boid.velocity),
  }))
}

export function* iterateBoids(flock: Flock): Generator<Boid, void, void> {
  for (let i = 0; i < flock.length; i++) {
    const boid = flock[i]
    if (!boid) continue
    yield boid
  }
}

/**
 * Mutable access by index. Undefined when the index is out of range.
 */
export function getBoidAt(flock: Flock, index: number): Boid | undefined {
  return flock[index]
}

export function flockSize(flock: Flock): number {
  return flock.length
}

export function findBoidById(flock: Flock, id: string): Boid | undefined {
  for (const boid of iterateBoids(flock)) {
    if (boid.id === id) return boid
  }
  return undefined
}

export function snapshotBoid(boid: Boid): BoidSnapshot {
  return Object.freeze({
    id: boid.id,
    index: boid.index,
    position: Object.freeze({ x: boid.position.x, y: boid.position.y }),
    velocity: Object.freeze({ x: boid.velocity.x, y: boid.velocity.y }),
    role: Object.freeze({ ...boid.role }),
  })
}

/**
 * Freeze the whole flock as it is right now. Taken once per tick, before any
 * boid is mutated, so every boid reacts to the same frame.
 */
export function snapshotFlock(flock: Flock): FlockSnapshot {
  const snapshot: BoidSnapshot[] = []
  for (const boid of iterateBoids(flock)) {
    snapshot.push(snapshotBoid(boid))
  }
  return Object.freeze(snapshot)
}

/**
 * Independent deep copy of a live flock
 */
export function cloneFlock(flock: Flock): Flock {
  return flock.map((boid) => ({
    ...boid,
    position: vec.copy(boid.position),
    velocity: vec.copy(boid.velocity),
    role: { ...boid.role },
  }))
}
