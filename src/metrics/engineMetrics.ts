import { performance } from 'perf_hooks'

export type WindowSummary = Readonly<{
  count: number
  avg: number
  max: number
}>

export type MetricsSnapshot = Readonly<{
  raceStartedAt: number | null
  tickIntervalMs: number
  ticksTotal: number
  tickRate: number // ticks in the last second
  tickWallAvgMs: number
  tickCpuAvgMs: number
  tickBacklog: WindowSummary // physics time still owed after each tick
  ws: Readonly<{
    clientCount: number
    broadcastsTotal: number
    droppedFrames: number
    sendFailures: number
    zombieEvictions: number
    broadcastAvgMs: number
  }>
}>

/** Fixed-size window over the most recent samples. */
export class RollingWindow {
  private readonly samples: number[] = []
  private next = 0

  constructor(private readonly size: number) {}

  add(sample: number): void {
    if (this.samples.length < this.size) {
      this.samples.push(sample)
    } else {
      this.samples[this.next] = sample
    }
    this.next = (this.next + 1) % this.size
  }

  summary(): WindowSummary {
    const count = this.samples.length
    if (count === 0) return { count: 0, avg: 0, max: 0 }
    const total = this.samples.reduce((acc, s) => acc + s, 0)
    return { count, avg: total / count, max: Math.max(...this.samples) }
  }

  reset(): void {
    this.samples.length = 0
    this.next = 0
  }
}

const WINDOW = 200
const RATE_WINDOW_MS = 1000

type ConnectionCounters = {
  clientCount: number
  broadcastsTotal: number
  droppedFrames: number
  sendFailures: number
  zombieEvictions: number
}

/**
 * Counters and rolling timings for the physics loop and the broadcast path.
 * One instance per server, handed to whoever records into it.
 */
export class EngineMetrics {
  private tickIntervalMs = 1000 / 60
  private raceStartedAt: number | null = null
  private ticksTotal = 0

  private readonly wall = new RollingWindow(WINDOW)
  private readonly cpu = new RollingWindow(WINDOW)
  private readonly backlog = new RollingWindow(WINDOW)
  private readonly broadcastMs = new RollingWindow(WINDOW)
  private recentTicks: number[] = []

  private tickStartedAt = 0
  private tickCpuBase = process.cpuUsage()

  private readonly counters: ConnectionCounters = {
    clientCount: 0,
    broadcastsTotal: 0,
    droppedFrames: 0,
    sendFailures: 0,
    zombieEvictions: 0,
  }

  startRace(tickIntervalMs: number): void {
    this.resetMetrics()
    this.tickIntervalMs = tickIntervalMs
    this.raceStartedAt = performance.now()
  }

  beforeTick(): void {
    this.tickStartedAt = performance.now()
    this.tickCpuBase = process.cpuUsage()
  }

  afterTick(backlogMs: number): void {
    const end = performance.now()
    const { user, system } = process.cpuUsage(this.tickCpuBase)
    this.wall.add(end - this.tickStartedAt)
    this.cpu.add((user + system) / 1000)
    this.backlog.add(backlogMs)

    this.recentTicks.push(end)
    this.recentTicks = this.recentTicks.filter((t) => end - t <= RATE_WINDOW_MS)
    this.ticksTotal++
  }

  getMetrics(): MetricsSnapshot {
    const now = performance.now()
    return Object.freeze({
      raceStartedAt: this.raceStartedAt,
      tickIntervalMs: this.tickIntervalMs,
      ticksTotal: this.ticksTotal,
      tickRate: this.recentTicks.filter((t) => now - t <= RATE_WINDOW_MS).length,
      tickWallAvgMs: this.wall.summary().avg,
      tickCpuAvgMs: this.cpu.summary().avg,
      tickBacklog: this.backlog.summary(),
      ws: Object.freeze({
        ...this.counters,
        broadcastAvgMs: this.broadcastMs.summary().avg,
      }),
    })
  }

  /** Per-race timings reset; connection counters are server-lifetime. */
  resetMetrics(): void {
    this.raceStartedAt = null
    this.ticksTotal = 0
    this.recentTicks = []
    for (const w of [this.wall, this.cpu, this.backlog, this.broadcastMs]) w.reset()
    this.counters.droppedFrames = 0
  }

  setClientCount(n: number): void {
    this.counters.clientCount = n
  }

  recordBroadcast(durationMs: number): void {
    this.counters.broadcastsTotal++
    this.broadcastMs.add(durationMs)
  }

  incDroppedFrames(n = 1): void {
    this.counters.droppedFrames += n
  }

  incSendFailures(n = 1): void {
    this.counters.sendFailures += n
  }

  incZombieEvictions(n = 1): void {
    this.counters.zombieEvictions += n
  }
}
