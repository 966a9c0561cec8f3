import { performance } from 'perf_hooks'
import {
  DEFAULT_RACE_CONFIG,
  type RaceConfig,
  type RaceSnapshot,
  type RacerState,
  type TerrainSegment,
} from './raceTypes.js'
import type { Racer } from './turtle.js'
import {
  segmentedTrack,
  uniformTrack,
  type TerrainLookup,
  type TerrainType,
} from './terrain.js'
import { ConfigurationError } from '../errors.js'
import { logEvent, logDebug } from '../utils/logEvent.js'

export const LANE_SPACING = 40
export const LOOKAHEAD_SEGMENTS = 5
export const LOOKAHEAD_SEGMENT_LENGTH = 100

export type RaceEngineOptions = {
  /** Pre-generated track: a lookup, or segment types at the default spacing */
  track?: TerrainLookup | readonly TerrainType[]
  courseId?: string
  /** Monotonic milliseconds; only used for elapsedMs */
  clock?: () => number
  lookaheadSegments?: number
  lookaheadSegmentLength?: number
}

export function validateRaceConfig(config: RaceConfig): RaceConfig {
  const { trackLength, tickRate, maxTicks } = config
  if (!Number.isFinite(trackLength) || trackLength <= 0) {
    throw new ConfigurationError(`trackLength must be > 0, got ${trackLength}`)
  }
  if (!Number.isInteger(tickRate) || tickRate < 1 || tickRate > 120) {
    throw new ConfigurationError(
      `tickRate must be an integer in [1, 120], got ${tickRate}`,
    )
  }
  if (!Number.isInteger(maxTicks) || maxTicks <= 0) {
    throw new ConfigurationError(`maxTicks must be a positive integer, got ${maxTicks}`)
  }
  return Object.freeze({ trackLength, tickRate, maxTicks })
}

function toLookup(track: RaceEngineOptions['track']): TerrainLookup {
  if (!track) return uniformTrack('grass')
  if ('terrainAt' in track) return track
  return segmentedTrack(track)
}

/**
 * Deterministic fixed-timestep simulation of one race.
 *
 * The engine borrows its racers for the race's lifetime and is the only
 * thing that moves them. It knows nothing about clocks beyond the anchor
 * used for `elapsedMs`, nor about broadcasting.
 */
export class RaceEngine {
  readonly config: RaceConfig
  readonly courseId: string
  readonly racers: ReadonlyArray<Racer>

  private readonly terrain: TerrainLookup
  private readonly clock: () => number
  private readonly lookaheadSegments: number
  private readonly lookaheadSegmentLength: number

  private tick = 0
  private startTime: number | null = null
  private finished = false
  private winner: Racer | null = null
  private readonly finishOrder: Racer[] = []

  constructor(
    racers: ReadonlyArray<Racer>,
    config: Partial<RaceConfig> = {},
    options: RaceEngineOptions = {},
  ) {
    this.config = validateRaceConfig({ ...DEFAULT_RACE_CONFIG, ...config })
    this.racers = Object.freeze([...racers])
    this.courseId = options.courseId ?? 'default'
    this.terrain = toLookup(options.track)
    this.clock = options.clock ?? (() => performance.now())
    this.lookaheadSegments = options.lookaheadSegments ?? LOOKAHEAD_SEGMENTS
    this.lookaheadSegmentLength =
      options.lookaheadSegmentLength ?? LOOKAHEAD_SEGMENT_LENGTH

    for (const racer of this.racers) racer.resetForRace()

    logEvent('engine:init', {
      courseId: this.courseId,
      racerCount: this.racers.length,
      trackLength: this.config.trackLength,
      tickRate: this.config.tickRate,
      maxTicks: this.config.maxTicks,
    })
  }

  get currentTick(): number {
    return this.tick
  }

  /**
   * Advance every unfinished racer by one tick. Once the race has finished
   * this does nothing and returns the current snapshot.
   */
  advance(dt: number = 1 / this.config.tickRate): RaceSnapshot {
    if (this.finished) return this.snapshot()

    if (this.startTime === null) this.startTime = this.clock()
    this.tick += 1

    try {
      this.updateRacers(dt)
    } finally {
      // the tick cap must hold even if a racer blew up mid-update
      this.checkFinish()
    }

    return this.snapshot()
  }

  private updateRacers(dt: number): void {
    const { trackLength, tickRate } = this.config
    for (const racer of this.racers) {
      if (racer.finished) continue

      const terrain = this.terrain.terrainAt(racer.distance)
      const speed = racer.updatePhysics(terrain)
      racer.distance += speed * dt * tickRate

      if (racer.distance >= trackLength) {
        racer.distance = trackLength
        racer.finished = true
        this.finishOrder.push(racer)
        racer.rank = this.finishOrder.length
        logEvent('engine:racer-finished', {
          courseId: this.courseId,
          racerId: racer.id,
          name: racer.name,
          rank: racer.rank,
          tick: this.tick,
        })
      }
    }
    logDebug('engine:tick', {
      tick: this.tick,
      distances: this.racers.map((r) => Number(r.distance.toFixed(2))),
    })
  }

  private checkFinish(): void {
    const allFinished = this.racers.every((r) => r.finished)
    const capReached = this.tick >= this.config.maxTicks
    if (!allFinished && !capReached) return

    this.finished = true
    this.winner = this.finishOrder[0] ?? null
    logEvent('engine:finished', {
      courseId: this.courseId,
      winnerId: this.winner?.id ?? null,
      winnerName: this.winner?.name ?? 'DRAW',
      totalTicks: this.tick,
      reason: allFinished ? 'all_finished' : 'tick_cap',
    })
  }

  /** Immutable view of the current tick. */
  snapshot(): RaceSnapshot {
    const elapsedMs =
      this.startTime === null ? 0 : Math.max(0, this.clock() - this.startTime)

    const turtles: RacerState[] = this.racers.map((racer, i) =>
      Object.freeze({
        id: racer.id,
        name: racer.name,
        x: racer.distance,
        y: i * LANE_SPACING,
        angle: 0,
        currentEnergy: racer.currentEnergy,
        maxEnergy: racer.maxEnergy,
        isResting: racer.isResting,
        finished: racer.finished,
        rank: racer.rank,
        genome: racer.genome,
      }),
    )

    return Object.freeze({
      tick: this.tick,
      elapsedMs,
      courseId: this.courseId,
      trackLength: this.config.trackLength,
      turtles: Object.freeze(turtles),
      terrainAhead: this.terrainAhead(),
      finished: this.finished,
      winnerId: this.winner?.id ?? null,
    })
  }

  private terrainAhead(): ReadonlyArray<TerrainSegment> {
    const unfinished = this.racers.filter((r) => !r.finished)
    if (unfinished.length === 0) return Object.freeze([])

    const { trackLength } = this.config
    const from = Math.min(...unfinished.map((r) => r.distance))
    const segments: TerrainSegment[] = []
    for (let i = 0; i < this.lookaheadSegments; i++) {
      const start = from + i * this.lookaheadSegmentLength
      if (start >= trackLength) break
      segments.push(
        Object.freeze({
          startDistance: start,
          endDistance: Math.min(start + this.lookaheadSegmentLength, trackLength),
          terrainType: this.terrain.terrainAt(start).type,
        }),
      )
    }
    return Object.freeze(segments)
  }

  isFinished(): boolean {
    return this.finished
  }

  /** Winner once finished; null while running or on a draw. */
  getWinner(): Racer | null {
    return this.winner
  }

  getFinishOrder(): ReadonlyArray<Racer> {
    return Object.freeze([...this.finishOrder])
  }

  /** Furthest first; equal distances by rank, unranked last. */
  getStandings(): Racer[] {
    const rankKey = (r: Racer) => r.rank ?? Number.POSITIVE_INFINITY
    return [...this.racers].sort((a, b) => {
      if (a.distance !== b.distance) return b.distance - a.distance
      const ra = rankKey(a)
      const rb = rankKey(b)
      if (ra === rb) return 0
      return ra - rb
    })
  }
}
