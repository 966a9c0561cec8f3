import { randomUUID } from 'crypto'
import type { RaceSnapshot } from '../race/raceTypes.js'
import type { SnapshotBroadcaster } from '../race/raceOrchestrator.js'
import { serializeSnapshot, type ServerMessage } from '../race/wire.js'
import { MasterTimeline } from '../timeline/masterTimeline.js'
import type { EngineMetrics } from '../metrics/engineMetrics.js'
import { TransportError, errorMessage } from '../errors.js'
import { logEvent, logDebug } from '../utils/logEvent.js'

export const ZOMBIE_CLEANUP_TIMER = 'connections:zombie-cleanup'

/** The socket-facing half of a connection; the ws adapter supplies it. */
export interface ClientTransport {
  send(message: string): Promise<void>
  close(code?: number, reason?: string): void
}

export class ClientConnection {
  readonly id: string
  readonly connectedAt: number
  lastActivity: number
  messagesSent = 0

  constructor(
    readonly transport: ClientTransport,
    now: number,
  ) {
    this.id = `conn-${randomUUID().slice(0, 8)}`
    this.connectedAt = now
    this.lastActivity = now
  }
}

export type ConnectionManagerOptions = {
  zombieTimeoutMs?: number
  sendTimeoutMs?: number
  timeline?: MasterTimeline
  metrics?: EngineMetrics
  clock?: () => number
}

/**
 * Owns the set of observers. Broadcasts are serialized so every connection
 * sees frames in order; sends within one broadcast run concurrently and a
 * connection that fails one is evicted once the fan-out is done.
 */
export class ConnectionManager implements SnapshotBroadcaster {
  readonly zombieTimeoutMs: number
  readonly sendTimeoutMs: number

  private readonly connections = new Map<string, ClientConnection>()
  private readonly inFlight = new Set<string>()
  private readonly timeline: MasterTimeline
  private readonly metrics: EngineMetrics | null
  private readonly clock: () => number
  private broadcastLock: Promise<void> = Promise.resolve()
  private cleanupRunning = false

  constructor(options: ConnectionManagerOptions = {}) {
    this.zombieTimeoutMs = options.zombieTimeoutMs ?? 300_000
    this.sendTimeoutMs = options.sendTimeoutMs ?? 5_000
    this.timeline = options.timeline ?? new MasterTimeline()
    this.metrics = options.metrics ?? null
    this.clock = options.clock ?? Date.now
  }

  get connectionCount(): number {
    return this.connections.size
  }

  getConnection(id: string): ClientConnection | undefined {
    return this.connections.get(id)
  }

  connect(transport: ClientTransport): ClientConnection {
    const conn = new ClientConnection(transport, this.clock())
    this.connections.set(conn.id, conn)
    this.metrics?.setClientCount(this.connections.size)
    logEvent('connections:connected', {
      connectionId: conn.id,
      total: this.connections.size,
    })
    return conn
  }

  /** Idempotent; true only when the connection was actually removed. */
  disconnect(conn: ClientConnection): boolean {
    if (!this.connections.delete(conn.id)) return false
    this.metrics?.setClientCount(this.connections.size)
    logEvent('connections:disconnected', {
      connectionId: conn.id,
      sessionMs: this.clock() - conn.connectedAt,
      messagesSent: conn.messagesSent,
      total: this.connections.size,
    })
    return true
  }

  touch(conn: ClientConnection): void {
    conn.lastActivity = this.clock()
  }

  /** One attempt; never removes the connection. */
  async sendTo(conn: ClientConnection, message: string): Promise<boolean> {
    try {
      await withTimeout(conn.transport.send(message), this.sendTimeoutMs, conn.id)
      conn.messagesSent++
      conn.lastActivity = this.clock()
      return true
    } catch (e) {
      const err =
        e instanceof TransportError
          ? e
          : new TransportError(conn.id, errorMessage(e), { cause: e })
      this.metrics?.incSendFailures()
      logEvent(
        'connections:send-failed',
        { connectionId: err.connectionId, error: err.message },
        'warn',
      )
      return false
    }
  }

  /** Resolves with the number of successful sends. */
  async broadcast(message: string): Promise<number> {
    if (this.connections.size === 0) return 0
    return this.withBroadcastLock(async () => {
      const targets = Array.from(this.connections.values())
      if (targets.length === 0) return 0

      for (const c of targets) this.inFlight.add(c.id)
      let results: boolean[]
      try {
        results = await Promise.all(targets.map((c) => this.sendTo(c, message)))
      } finally {
        for (const c of targets) this.inFlight.delete(c.id)
      }

      const failed = targets.filter((_, i) => !results[i])
      for (const c of failed) this.evict(c, 'send_failed', 1011)
      logDebug('connections:broadcast', {
        targets: targets.length,
        failed: failed.length,
      })
      return targets.length - failed.length
    })
  }

  broadcastSnapshot(snapshot: RaceSnapshot): Promise<number> {
    return this.broadcast(serializeSnapshot(snapshot))
  }

  broadcastJson(value: ServerMessage): Promise<number> {
    return this.broadcast(JSON.stringify(value))
  }

  /** Evicts idle connections that are not mid-send. */
  async cleanupZombies(): Promise<number> {
    const now = this.clock()
    const stale = Array.from(this.connections.values()).filter(
      (c) => now - c.lastActivity > this.zombieTimeoutMs && !this.inFlight.has(c.id),
    )
    for (const c of stale) {
      logEvent('connections:zombie-evicted', {
        connectionId: c.id,
        idleMs: now - c.lastActivity,
      })
      this.evict(c, 'idle', 1001)
    }
    if (stale.length > 0) this.metrics?.incZombieEvictions(stale.length)
    return stale.length
  }

  startZombieCleanup(intervalMs: number = 60_000): void {
    this.timeline.setInterval(ZOMBIE_CLEANUP_TIMER, intervalMs, () => {
      if (this.cleanupRunning) return
      this.cleanupRunning = true
      void this.cleanupZombies()
        .catch((e) => {
          logEvent('connections:cleanup-error', { error: errorMessage(e) }, 'error')
        })
        .finally(() => {
          this.cleanupRunning = false
        })
    })
    logEvent('connections:cleanup-started', {
      intervalMs,
      zombieTimeoutMs: this.zombieTimeoutMs,
    })
  }

  stopZombieCleanup(): void {
    this.timeline.clear(ZOMBIE_CLEANUP_TIMER)
  }

  closeAll(): void {
    for (const c of Array.from(this.connections.values())) {
      this.evict(c, 'shutdown', 1001)
    }
  }

  private evict(conn: ClientConnection, reason: string, code: number): void {
    if (!this.disconnect(conn)) return
    try {
      conn.transport.close(code, reason)
    } catch (e) {
      logEvent(
        'connections:close-failed',
        { connectionId: conn.id, reason, error: errorMessage(e) },
        'warn',
      )
    }
  }

  private withBroadcastLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.broadcastLock.then(fn)
    this.broadcastLock = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }
}

async function withTimeout<T>(
  p: Promise<T>,
  ms: number,
  connectionId: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransportError(connectionId, `send timed out after ${ms}ms`)),
      ms,
    )
  })
  try {
    return await Promise.race([p, timeout])
  } finally {
    clearTimeout(timer)
  }
}
