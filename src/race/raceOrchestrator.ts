import { performance } from 'perf_hooks'
import { setTimeout as sleep } from 'timers/promises'
import { RaceEngine, type RaceEngineOptions } from './raceEngine.js'
import {
  isSpeedMultiplier,
  type RaceSnapshot,
  type RaceSummary,
  type SpeedMultiplier,
} from './raceTypes.js'
import type { Racer } from './turtle.js'
import { toWireSnapshot, type SyncMessage } from './wire.js'
import type { RacePersistence } from '../persistence/racePersistence.js'
import type { EngineMetrics } from '../metrics/engineMetrics.js'
import { ConfigurationError, PersistenceError, errorMessage } from '../errors.js'
import { logEvent, logDebug } from '../utils/logEvent.js'

/** Physics backlog beyond this is dropped so a stalled process does not fast-forward. */
export const MAX_BACKLOG_MS = 200

export type StepPlan = Readonly<{
  /** Scaled physics time owed before any step runs, capped at MAX_BACKLOG_MS. */
  startBacklogMs: number
  steps: number
}>

/**
 * Physics steps for one loop iteration. Wall time is scaled by the speed
 * multiplier, and at most `multiplier` steps run per iteration.
 */
export function planSteps(
  backlogMs: number,
  elapsedMs: number,
  stepMs: number,
  multiplier: SpeedMultiplier,
): StepPlan {
  const startBacklogMs = Math.min(backlogMs + elapsedMs * multiplier, MAX_BACKLOG_MS)
  return { startBacklogMs, steps: Math.min(Math.floor(startBacklogMs / stepMs), multiplier) }
}

export interface SnapshotBroadcaster {
  /** Resolves with the number of observers reached. */
  broadcastSnapshot(snapshot: RaceSnapshot): Promise<number>
}

export type RaceOrchestratorOptions = {
  physicsHz?: number
  broadcastHz?: number
  trackLength?: number
  maxTicks?: number
  track?: RaceEngineOptions['track']
  courseId?: string
  raceId?: string
  persistence?: RacePersistence | null
  metrics?: EngineMetrics
  clock?: () => number
  yieldMs?: number
  onComplete?: (summary: RaceSummary) => void
}

/**
 * Drives one RaceEngine in real time: fixed-step physics from an accumulator,
 * snapshots fanned out at a lower rate, results persisted once at the end.
 * Physics never waits on the network; a slow broadcast costs frames, not ticks.
 */
export class RaceOrchestrator {
  readonly raceId: string
  readonly engine: RaceEngine
  readonly physicsHz: number
  readonly broadcastHz: number

  private readonly broadcaster: SnapshotBroadcaster
  private readonly persistence: RacePersistence | null
  private readonly metrics: EngineMetrics | null
  private readonly clock: () => number
  private readonly yieldMs: number
  private readonly onComplete: ((summary: RaceSummary) => void) | null

  private running = false
  private complete = false
  private stopRequested = false
  private loopPromise: Promise<void> | null = null
  private inFlight: Promise<void> | null = null
  private snapshot: RaceSnapshot | null = null
  private multiplier: SpeedMultiplier = 1
  private startedAt: Date | null = null

  constructor(
    racers: ReadonlyArray<Racer>,
    broadcaster: SnapshotBroadcaster,
    options: RaceOrchestratorOptions = {},
  ) {
    const physicsHz = options.physicsHz ?? 60
    const broadcastHz = options.broadcastHz ?? 30
    if (!Number.isFinite(broadcastHz) || broadcastHz < 1 || broadcastHz > physicsHz) {
      throw new ConfigurationError(
        `broadcastHz must be in [1, ${physicsHz}], got ${broadcastHz}`,
      )
    }
    this.physicsHz = physicsHz
    this.broadcastHz = broadcastHz
    this.raceId = options.raceId ?? `race-${Date.now()}`
    this.broadcaster = broadcaster
    this.persistence = options.persistence ?? null
    this.metrics = options.metrics ?? null
    this.clock = options.clock ?? (() => performance.now())
    this.yieldMs = options.yieldMs ?? 1
    this.onComplete = options.onComplete ?? null

    this.engine = new RaceEngine(
      racers,
      {
        tickRate: physicsHz,
        ...(options.trackLength !== undefined ? { trackLength: options.trackLength } : {}),
        ...(options.maxTicks !== undefined ? { maxTicks: options.maxTicks } : {}),
      },
      {
        track: options.track,
        courseId: options.courseId,
        clock: this.clock,
      },
    )
  }

  get isRunning(): boolean {
    return this.running
  }

  get isComplete(): boolean {
    return this.complete
  }

  get latestSnapshot(): RaceSnapshot | null {
    return this.snapshot
  }

  get speedMultiplier(): SpeedMultiplier {
    return this.multiplier
  }

  start(): void {
    if (this.running || this.complete) return
    this.running = true
    this.stopRequested = false
    this.startedAt = new Date()
    this.snapshot = this.engine.snapshot()
    this.metrics?.startRace(1000 / this.physicsHz)
    logEvent('orchestrator:start', {
      raceId: this.raceId,
      courseId: this.engine.courseId,
      racers: this.engine.racers.length,
      physicsHz: this.physicsHz,
      broadcastHz: this.broadcastHz,
    })
    this.loopPromise = this.run()
  }

  /** Ends the loop and waits for the final broadcast and persistence pass. */
  async stop(): Promise<void> {
    if (!this.loopPromise) return
    if (this.running && !this.stopRequested) {
      this.stopRequested = true
      logEvent('orchestrator:stop-requested', { raceId: this.raceId, tick: this.engine.currentTick })
    }
    await this.loopPromise
  }

  /** Resolves once the loop has fully exited; immediately if never started. */
  done(): Promise<void> {
    return this.loopPromise ?? Promise.resolve()
  }

  setSpeed(multiplier: number): boolean {
    if (!isSpeedMultiplier(multiplier)) {
      logEvent('orchestrator:speed-rejected', { raceId: this.raceId, requested: multiplier }, 'warn')
      return false
    }
    this.multiplier = multiplier
    logEvent('orchestrator:speed', { raceId: this.raceId, speed: multiplier })
    return true
  }

  getSyncData(): SyncMessage {
    return {
      type: 'sync',
      track_length: this.engine.config.trackLength,
      physics_hz: this.physicsHz,
      broadcast_hz: this.broadcastHz,
      current_tick: this.engine.currentTick,
      snapshot: this.snapshot ? toWireSnapshot(this.snapshot) : null,
    }
  }

  private async run(): Promise<void> {
    try {
      await this.loop()
    } catch (e) {
      logEvent('orchestrator:loop-error', { raceId: this.raceId, error: errorMessage(e) }, 'error')
    }
    try {
      await this.finish()
    } catch (e) {
      logEvent('orchestrator:finish-error', { raceId: this.raceId, error: errorMessage(e) }, 'error')
    }
  }

  private async loop(): Promise<void> {
    const stepSeconds = 1 / this.physicsHz
    const stepMs = 1000 / this.physicsHz
    const broadcastIntervalMs = 1000 / this.broadcastHz
    let last = this.clock()
    let lastBroadcast = Number.NEGATIVE_INFINITY
    let acc = 0

    while (!this.stopRequested && !this.engine.isFinished()) {
      const now = this.clock()
      const plan = planSteps(acc, now - last, stepMs, this.multiplier)
      last = now
      acc = plan.startBacklogMs

      for (let i = 0; i < plan.steps && !this.engine.isFinished(); i++) {
        acc -= stepMs
        if (!this.step(stepSeconds, acc)) break
      }

      if (now - lastBroadcast >= broadcastIntervalMs) {
        lastBroadcast = now
        this.scheduleBroadcast()
      }

      await sleep(this.yieldMs)
    }
  }

  /** False when the tick threw; the previous snapshot is kept. */
  private step(dt: number, backlogMs: number): boolean {
    this.metrics?.beforeTick()
    try {
      this.snapshot = this.engine.advance(dt)
      return true
    } catch (e) {
      logEvent(
        'orchestrator:tick-error',
        { raceId: this.raceId, tick: this.engine.currentTick, error: errorMessage(e) },
        'error',
      )
      return false
    } finally {
      this.metrics?.afterTick(backlogMs)
    }
  }

  private scheduleBroadcast(): void {
    const snapshot = this.snapshot
    if (!snapshot) return
    if (this.inFlight) {
      this.metrics?.incDroppedFrames()
      logDebug('orchestrator:frame-dropped', { raceId: this.raceId, tick: snapshot.tick })
      return
    }
    this.inFlight = this.broadcast(snapshot).finally(() => {
      this.inFlight = null
    })
  }

  private async broadcast(snapshot: RaceSnapshot): Promise<void> {
    const t0 = performance.now()
    try {
      await this.broadcaster.broadcastSnapshot(snapshot)
      this.metrics?.recordBroadcast(performance.now() - t0)
    } catch (e) {
      logEvent(
        'orchestrator:broadcast-error',
        { raceId: this.raceId, tick: snapshot.tick, error: errorMessage(e) },
        'error',
      )
    }
  }

  private async finish(): Promise<void> {
    if (this.inFlight) await this.inFlight

    const finalSnapshot = this.engine.snapshot()
    this.snapshot = finalSnapshot
    await this.broadcast(finalSnapshot)
    await this.persistResults(finalSnapshot)

    this.running = false
    this.complete = true

    const summary = this.summarize()
    logEvent('orchestrator:complete', {
      raceId: this.raceId,
      winnerId: summary.winnerId,
      totalTicks: summary.totalTicks,
      stopped: this.stopRequested,
    })
    if (this.onComplete) {
      try {
        this.onComplete(summary)
      } catch (e) {
        logEvent('orchestrator:on-complete-error', { raceId: this.raceId, error: errorMessage(e) }, 'error')
      }
    }
  }

  private async persistResults(snapshot: RaceSnapshot): Promise<void> {
    const persistence = this.persistence
    if (!persistence) return

    const standings = this.engine.getStandings()
    for (const [i, racer] of standings.entries()) {
      if (!racer.persistent) continue
      try {
        await persistence.saveRaceResult(this.raceId, racer, {
          rank: i + 1,
          finalDistance: racer.distance,
          finalTimeMs: racer.finished ? snapshot.elapsedMs : 0,
          finished: racer.finished,
        })
      } catch (e) {
        const err =
          e instanceof PersistenceError
            ? e
            : new PersistenceError(this.raceId, racer.id, errorMessage(e), { cause: e })
        logEvent(
          'persist:failed',
          { raceId: err.raceId, racerId: err.racerId, error: err.message },
          'error',
        )
      }
    }
  }

  private summarize(): RaceSummary {
    return Object.freeze({
      raceId: this.raceId,
      courseId: this.engine.courseId,
      startedAt: (this.startedAt ?? new Date()).toISOString(),
      endedAt: new Date().toISOString(),
      totalTicks: this.engine.currentTick,
      winnerId: this.engine.getWinner()?.id ?? null,
      standings: Object.freeze(
        this.engine.getStandings().map((r, i) =>
          Object.freeze({
            racerId: r.id,
            name: r.name,
            rank: i + 1,
            distance: r.distance,
            finished: r.finished,
          }),
        ),
      ),
    })
  }
}
