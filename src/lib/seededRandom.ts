/**
 * Seeded Random Number Generator
 *
 * A single master seed fans out into independent per-domain streams, so
 * drawing more numbers in one domain never shifts the sequence of another.
 *
 * @example
 * const rng = createSeededRNG('classic-flock-42')
 * const spawning = rng.domain('spawning')
 * spawning.intBetween(-500, 300) // same value every run for this seed
 */

/**
 * cyrb53 string hash
 */
function hashString(str: string): number {
  let h1 = 0xdeadbeef
  let h2 = 0x41c6ce57

  for (let i = 0; i < str.length; i++) {
    const ch = str.charCodeAt(i)
    h1 = Math.imul(h1 ^ ch, 2654435761)
    h2 = Math.imul(h2 ^ ch, 1597334677)
  }

  h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507)
  h1 ^= Math.imul(h2 ^ (h2 >>> 13), 3266489909)
  h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507)
  h2 ^= Math.imul(h1 ^ (h1 >>> 13), 3266489909)

  return 4294967296 * (2097151 & h2) + (h1 >>> 0)
}

/**
 * Mulberry32, values in [0, 1)
 */
function createPRNG(seed: number): () => number {
  let state = seed

  return function next(): number {
    state |= 0
    state = (state + 0x6d2b79f5) | 0
    let t = Math.imul(state ^ (state >>> 15), 1 | state)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export interface DomainRNG {
  /** Next number in [0, 1) */
  next(): number

  /** Number in [min, max) */
  range(min: number, max: number): number

  /** Integer in [min, max], both ends included */
  intBetween(min: number, max: number): number

  /** Random element, undefined for an empty array */
  pick<T>(array: ReadonlyArray<T>): T | undefined

  /** True with the given probability (0-1) */
  chance(probability: number): boolean
}

function createDomainRNG(seed: number): DomainRNG {
  const prng = createPRNG(seed)

  return {
    next: () => prng(),

    range: (min: number, max: number) => min + prng() * (max - min),

    intBetween: (min: number, max: number) =>
      min + Math.floor(prng() * (max - min + 1)),

    pick: <T>(array: ReadonlyArray<T>): T | undefined =>
      array[Math.floor(prng() * array.length)],

    chance: (probability: number) => prng() < probability,
  }
}

export interface SeededRNG {
  getMasterSeed(): string
  getMasterSeedNumber(): number
  /** Get or lazily create the stream for `name` */
  domain(name: string): DomainRNG
  getDomains(): string[]
}

export function createSeededRNG(masterSeed: string | number): SeededRNG {
  const masterSeedStr = String(masterSeed)
  const masterSeedNum =
    typeof masterSeed === 'number' ? masterSeed : hashString(masterSeedStr)

  const domains = new Map<string, DomainRNG>()

  return {
    getMasterSeed: () => masterSeedStr,
    getMasterSeedNumber: () => masterSeedNum,

    domain: (name: string) => {
      const existing = domains.get(name)
      if (existing) return existing

      // Domain seed is derived from "masterSeed:domainName"
      const created = createDomainRNG(hashString(`${masterSeedStr}:${name}`))
      domains.set(name, created)
      return created
    },

    getDomains: () => Array.from(domains.keys()),
  }
}
