import type { Boid } from '../vocabulary/schemas/entities'
import { commonRole, type Role } from '../vocabulary/schemas/primitives'
import type { FlockParameters } from '../vocabulary/schemas/simulation'

export const testParameters: FlockParameters = {
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
}

export function makeBoid(
  index: number,
  position: { x: number; y: number },
  velocity: { x: number; y: number } = { x: 0, y: 0 },
  role: Role = commonRole
): Boid {
  return {
    id: `boid-${index}`,
    index,
    position: { ...position },
    velocity: { ...velocity },
    role,
  }
}
