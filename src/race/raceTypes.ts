import type { TerrainType } from './terrain.js'

/**
 * One racer at one tick. Immutable.
 */
export interface RacerState {
  readonly id: string
  readonly name: string
  readonly x: number // track position
  readonly y: number // lane offset
  readonly angle: number
  readonly currentEnergy: number
  readonly maxEnergy: number
  readonly isResting: boolean
  readonly finished: boolean
  readonly rank: number | null // 1-indexed, set once
  readonly genome: string
}

export interface TerrainSegment {
  readonly startDistance: number
  readonly endDistance: number
  readonly terrainType: TerrainType
}

/**
 * Complete race state at a single tick
 */
export interface RaceSnapshot {
  readonly tick: number
  readonly elapsedMs: number
  readonly courseId: string
  readonly trackLength: number
  readonly turtles: ReadonlyArray<RacerState>
  readonly terrainAhead: ReadonlyArray<TerrainSegment>
  readonly finished: boolean
  readonly winnerId: string | null
}

export interface RaceConfig {
  readonly trackLength: number
  readonly tickRate: number // Hz, 1..120
  readonly maxTicks: number // forced draw after this many ticks
}

export const DEFAULT_RACE_CONFIG: RaceConfig = Object.freeze({
  trackLength: 1500,
  tickRate: 30,
  maxTicks: 5000,
})

export interface RaceStanding {
  readonly racerId: string
  readonly name: string
  readonly rank: number
  readonly distance: number
  readonly finished: boolean
}

/**
 * Final results of a completed race
 */
export interface RaceSummary {
  readonly raceId: string
  readonly courseId: string
  readonly startedAt: string
  readonly endedAt: string
  readonly totalTicks: number
  readonly winnerId: string | null
  readonly standings: ReadonlyArray<RaceStanding>
}

export const SPEED_MULTIPLIERS = [1, 2, 4] as const
export type SpeedMultiplier = (typeof SPEED_MULTIPLIERS)[number]

export function isSpeedMultiplier(value: unknown): value is SpeedMultiplier {
  return value === 1 || value === 2 || value === 4
}
