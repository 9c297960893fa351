/**
 * Profile Registry - every available simulation profile
 *
 * To add a profile, create a file in this directory exporting a
 * SimulationProfile and register it below.
 */

import type { SimulationProfile } from '../boids/vocabulary/schemas/simulation'
import { classicFlockProfile } from './classic-flock'
import { scoutExpeditionProfile } from './scout-expedition'
import { tightSwarmProfile } from './tight-swarm'

/**
 * Key = profile ID
 */
export const profiles: Record<string, SimulationProfile> = {
  [classicFlockProfile.id]: classicFlockProfile,
  [scoutExpeditionProfile.id]: scoutExpeditionProfile,
  [tightSwarmProfile.id]: tightSwarmProfile,
}

export const defaultProfileId = classicFlockProfile.id

export function getProfile(profileId: string): SimulationProfile {
  const profile = profiles[profileId]
  if (!profile) {
    throw new Error(
      `Profile not found: ${profileId}. Available profiles: ${getProfileIds().join(', ')}`
    )
  }
  return profile
}

export function getProfileIds(): string[] {
  return Object.keys(profiles)
}

export function getProfileList(): Array<{
  id: string
  name: string
  description: string
}> {
  return Object.values(profiles).map((profile) => ({
    id: profile.id,
    name: profile.name,
    description: profile.description,
  }))
}
