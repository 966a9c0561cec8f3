import { makeSeededRng, hashStringToInt } from './rng.js'

export const TERRAIN_TYPES = [
  'grass',
  'water',
  'rock',
  'sand',
  'mud',
  'boost',
] as const

export type TerrainType = (typeof TERRAIN_TYPES)[number]

export type Terrain = Readonly<{
  type: TerrainType
  speedModifier: number
  energyDrain: number
}>

/**
 * Terrain collaborator consumed by the engine. Implementations must be pure:
 * the same distance always yields the same terrain for one race.
 */
export interface TerrainLookup {
  terrainAt(distance: number): Terrain
}

export const TERRAIN_PROFILES: Readonly<Record<TerrainType, Terrain>> =
  Object.freeze({
    grass: Object.freeze({ type: 'grass', speedModifier: 1.0, energyDrain: 1.0 }),
    water: Object.freeze({ type: 'water', speedModifier: 0.7, energyDrain: 1.2 }),
    rock: Object.freeze({ type: 'rock', speedModifier: 0.6, energyDrain: 1.3 }),
    sand: Object.freeze({ type: 'sand', speedModifier: 0.8, energyDrain: 1.1 }),
    mud: Object.freeze({ type: 'mud', speedModifier: 0.5, energyDrain: 1.5 }),
    boost: Object.freeze({ type: 'boost', speedModifier: 1.5, energyDrain: 0.8 }),
  })

export const DEFAULT_SEGMENT_LENGTH = 10

export function isTerrainType(value: unknown): value is TerrainType {
  return (
    typeof value === 'string' &&
    (TERRAIN_TYPES as readonly string[]).includes(value)
  )
}

export function uniformTrack(type: TerrainType = 'grass'): TerrainLookup {
  const terrain = TERRAIN_PROFILES[type]
  return { terrainAt: () => terrain }
}

/**
 * Track made of fixed-length segments. Distances before the start or past
 * the last segment clamp to the nearest segment.
 */
export function segmentedTrack(
  types: readonly TerrainType[],
  segmentLength = DEFAULT_SEGMENT_LENGTH,
): TerrainLookup {
  const segments = Object.freeze([...types])
  return {
    terrainAt(distance: number): Terrain {
      if (segments.length === 0) return TERRAIN_PROFILES.grass
      const idx = Math.min(
        Math.max(0, Math.floor(distance / segmentLength)),
        segments.length - 1,
      )
      return TERRAIN_PROFILES[segments[idx]]
    },
  }
}

// Cumulative weights, checked in order
const GENERATION_WEIGHTS: ReadonlyArray<readonly [TerrainType, number]> = [
  ['grass', 0.6],
  ['water', 0.75],
  ['rock', 0.85],
  ['sand', 0.93],
  ['mud', 0.97],
  ['boost', 1],
]

/** Seeded demo track; the same seed always yields the same layout. */
export function generateTrack(
  trackLength: number,
  seed: string,
  segmentLength = DEFAULT_SEGMENT_LENGTH,
): TerrainType[] {
  const rng = makeSeededRng(hashStringToInt(seed))
  const count = Math.floor(trackLength / segmentLength) + 1
  const track: TerrainType[] = []
  for (let i = 0; i < count; i++) {
    const roll = rng()
    const hit = GENERATION_WEIGHTS.find(([, upTo]) => roll < upTo)
    track.push(hit ? hit[0] : 'grass')
  }
  return track
}
