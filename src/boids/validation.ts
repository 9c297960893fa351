import { z } from 'zod'
import {
  arenaBoundsSchema,
  type ArenaBounds,
} from './vocabulary/schemas/primitives'
import {
  flockParametersSchema,
  simulationProfileSchema,
  type FlockParameters,
  type SimulationProfile,
} from './vocabulary/schemas/simulation'

/**
 * Thrown when configuration fails validation. Carries the zod issues so
 * callers can point at the offending fields.
 */
export class ConfigurationError extends Error {
  readonly issues: z.ZodIssue[]

  constructor(subject: string, issues: z.ZodIssue[]) {
    super(`Invalid ${subject}: ${formatIssues(issues)}`)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

export function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ')
}

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  subject: string,
  input: unknown
): z.infer<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new ConfigurationError(subject, result.error.issues)
  }
  return result.data
}

export function parseFlockParameters(input: unknown): FlockParameters {
  return parseWith(flockParametersSchema, 'flock parameters', input)
}

export function parseSimulationProfile(input: unknown): SimulationProfile {
  return parseWith(simulationProfileSchema, 'simulation profile', input)
}

export function parseArenaBounds(input: unknown): ArenaBounds {
  return parseWith(arenaBoundsSchema, 'arena bounds', input)
}
