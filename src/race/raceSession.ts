import { RaceOrchestrator, type SnapshotBroadcaster } from './raceOrchestrator.js'
import { NpcPool } from './npcPool.js'
import { Turtle } from './turtle.js'
import { generateTrack } from './terrain.js'
import type { RaceSummary } from './raceTypes.js'
import type { SyncMessage } from './wire.js'
import type { RacePersistence } from '../persistence/racePersistence.js'
import type { EngineMetrics } from '../metrics/engineMetrics.js'
import type { RaceDefaults } from '../config.js'
import { ConfigurationError } from '../errors.js'
import { logEvent } from '../utils/logEvent.js'

export const HISTORY_LIMIT = 20

export type RaceOverrides = Partial<
  Pick<RaceDefaults, 'physicsHz' | 'broadcastHz' | 'trackLength' | 'maxTicks'>
>

export type StartRaceResult =
  | { ok: true; raceId: string }
  | { ok: false; reason: 'already_running' }
  | { ok: false; reason: 'invalid_config'; message: string }

export type RaceSessionOptions = {
  defaults: RaceDefaults
  broadcaster: SnapshotBroadcaster
  persistence?: RacePersistence | null
  metrics?: EngineMetrics
  npcPool?: NpcPool
  yieldMs?: number
}

function houseTurtles(): Turtle[] {
  return [
    new Turtle({
      id: 'speedster',
      name: 'Speedster',
      stats: { speed: 12, maxEnergy: 60, recovery: 2, swim: 5, climb: 5 },
      traits: { body: 'speckled', shell: 'stripes', limb: 'fins', color: [220, 60, 40] },
    }),
    new Turtle({
      id: 'tank',
      name: 'Tank',
      stats: { speed: 8, maxEnergy: 100, recovery: 8, swim: 5, climb: 5 },
      traits: { body: 'marbled', shell: 'rings', limb: 'feet', color: [90, 90, 110] },
    }),
    new Turtle({
      id: 'balanced',
      name: 'Balanced',
      stats: { speed: 10, maxEnergy: 80, recovery: 5, swim: 5, climb: 5 },
    }),
  ]
}

/**
 * The one race slot the server exposes: at most one race runs at a time,
 * finished races are kept as summaries.
 */
export class RaceSession {
  private readonly defaults: RaceDefaults
  private readonly broadcaster: SnapshotBroadcaster
  private readonly persistence: RacePersistence | null
  private readonly metrics: EngineMetrics | undefined
  private readonly npcPool: NpcPool
  private readonly yieldMs: number | undefined
  private readonly history: RaceSummary[] = []
  private current: RaceOrchestrator | null = null
  private stopping: Promise<void> | null = null

  constructor(options: RaceSessionOptions) {
    this.defaults = options.defaults
    this.broadcaster = options.broadcaster
    this.persistence = options.persistence ?? null
    this.metrics = options.metrics
    this.npcPool = options.npcPool ?? new NpcPool()
    this.yieldMs = options.yieldMs
  }

  get isRunning(): boolean {
    return this.current?.isRunning ?? false
  }

  get currentRace(): RaceOrchestrator | null {
    return this.current
  }

  startRace(overrides: RaceOverrides = {}): StartRaceResult {
    // a race that is stopping still owns its racers until its results are saved
    if (this.isRunning || this.stopping) return { ok: false, reason: 'already_running' }

    const settings = { ...this.defaults, ...overrides }
    const raceId = `race-${Date.now()}`
    const racers = [...houseTurtles(), ...this.npcPool.getRacers(settings.npcFillers)]

    let orchestrator: RaceOrchestrator
    try {
      orchestrator = new RaceOrchestrator(racers, this.broadcaster, {
        raceId,
        courseId: `course-${raceId}`,
        physicsHz: settings.physicsHz,
        broadcastHz: settings.broadcastHz,
        trackLength: settings.trackLength,
        maxTicks: settings.maxTicks,
        track: generateTrack(settings.trackLength, raceId),
        persistence: this.persistence,
        metrics: this.metrics,
        yieldMs: this.yieldMs,
        onComplete: (summary) => this.record(summary),
      })
    } catch (e) {
      if (e instanceof ConfigurationError) {
        logEvent('session:invalid-config', { error: e.message }, 'warn')
        return { ok: false, reason: 'invalid_config', message: e.message }
      }
      throw e
    }

    this.current = orchestrator
    orchestrator.start()
    return { ok: true, raceId }
  }

  /**
   * Stops the current race and clears the slot once its final broadcast and
   * persistence pass are done. False when there was none or it is already stopping.
   */
  async stopRace(): Promise<boolean> {
    const race = this.current
    if (!race || this.stopping) return false
    this.stopping = race.stop().finally(() => {
      this.stopping = null
      if (this.current === race) this.current = null
    })
    await this.stopping
    return true
  }

  setSpeed(multiplier: number): boolean {
    if (!this.current || !this.current.isRunning) return false
    return this.current.setSpeed(multiplier)
  }

  /** Sync payload for late joiners; null unless a race is running. */
  getSyncData(): SyncMessage | null {
    if (!this.current || !this.current.isRunning) return null
    return this.current.getSyncData()
  }

  /** Most recent first. */
  getHistory(): ReadonlyArray<RaceSummary> {
    return [...this.history].reverse()
  }

  findRace(raceId: string): RaceSummary | null {
    return this.history.find((s) => s.raceId === raceId) ?? null
  }

  async shutdown(): Promise<void> {
    if (this.stopping) await this.stopping
    await this.stopRace()
  }

  private record(summary: RaceSummary): void {
    this.history.push(summary)
    if (this.history.length > HISTORY_LIMIT) this.history.shift()
    logEvent('session:race-recorded', {
      raceId: summary.raceId,
      winnerId: summary.winnerId,
      historySize: this.history.length,
    })
  }
}
