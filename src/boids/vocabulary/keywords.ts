/**
 * Vocabulary - Single source of truth for the simulation's string constants
 *
 * Schemas, rules and resources import these instead of repeating literals,
 * so a renamed keyword is a compile error everywhere it is used.
 */

// ============================================
// Role Keywords
// ============================================

export const roleKeywords = {
  common: 'common',
  scout: 'scout',
} as const

/**
 * Scout groups - group 1 drifts right (positive x), group 2 drifts left
 */
export const scoutGroupKeywords = {
  right: 1,
  left: 2,
} as const

// ============================================
// Driver Keywords
// ============================================

export const driverStateKeywords = {
  idle: 'idle',
  stepping: 'stepping',
} as const

// ============================================
// RNG Domain Keywords
// ============================================

export const rngDomainKeywords = {
  spawning: 'spawning',
} as const

// ============================================
// Profiler Section Keywords
// ============================================

export const profilerKeywords = {
  engineStep: 'engine.step',
  boidUpdate: 'boid.update',
  neighborScan: 'boid.neighbors',
  ruleCohesion: 'rule.cohesion',
  ruleAlignment: 'rule.alignment',
  ruleAvoidance: 'rule.avoidance',
  ruleEdgeTurning: 'rule.edgeTurning',
  ruleRoleBias: 'rule.roleBias',
} as const
