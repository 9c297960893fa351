import { describe, expect, it } from 'vitest'
import {
  cloneFlock,
  createFlock,
  findBoidById,
  flockSize,
  getBoidAt,
  iterateBoids,
  snapshotFlock,
} from '../flock'
import { scoutRole } from '../vocabulary/schemas/primitives'
import { makeBoid } from './fixtures'

describe('flock store', () => {
  const boids = [
    makeBoid(7, { x: 1, y: 2 }, { x: 3, y: 4 }),
    makeBoid(3, { x: 5, y: 6 }, { x: 7, y: 8 }, scoutRole(2)),
  ]

  it('re-indexes boids by position and copies their vectors', () => {
    const flock = createFlock(boids)

    expect(flock.map((boid) => boid.index)).toEqual([0, 1])
    expect(flock.map((boid) => boid.id)).toEqual(['boid-7', 'boid-3'])

    const first = getBoidAt(flock, 0)
    if (!first) throw new Error('expected a boid at index 0')
    first.position.x = 99

    expect(boids[0]?.position.x).toBe(1)
  })

  it('iterates in store order', () => {
    const flock = createFlock(boids)
    expect(Array.from(iterateBoids(flock), (boid) => boid.id)).toEqual([
      'boid-7',
      'boid-3',
    ])
    expect(flockSize(flock)).toBe(2)
  })

  it('gives mutable access by index and lookup by id', () => {
    const flock = createFlock(boids)
    const second = getBoidAt(flock, 1)
    if (!second) throw new Error('expected a boid at index 1')

    second.velocity.x = -1

    expect(findBoidById(flock, 'boid-3')?.velocity.x).toBe(-1)
    expect(getBoidAt(flock, 2)).toBeUndefined()
    expect(findBoidById(flock, 'missing')).toBeUndefined()
  })

  it('snapshots are frozen copies unaffected by later mutation', () => {
    const flock = createFlock(boids)
    const snapshot = snapshotFlock(flock)

    const first = getBoidAt(flock, 0)
    if (!first) throw new Error('expected a boid at index 0')
    first.position.x = 42
    first.velocity.y = 42

    expect(snapshot[0]?.position).toEqual({ x: 1, y: 2 })
    expect(snapshot[0]?.velocity).toEqual({ x: 3, y: 4 })
    expect(Object.isFrozen(snapshot)).toBe(true)
    expect(Object.isFrozen(snapshot[0]?.position)).toBe(true)
    expect(snapshot[1]?.role).toEqual({ kind: 'scout', group: 2 })
  })

  it('clones deeply', () => {
    const flock = createFlock(boids)
    const clone = cloneFlock(flock)

    const original = getBoidAt(flock, 0)
    if (!original) throw new Error('expected a boid at index 0')
    original.velocity.x = 1000

    expect(clone[0]?.velocity.x).toBe(3)
    expect(clone).not.toBe(flock)
  })
})
