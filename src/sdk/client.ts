import WebSocket from 'ws'
import type { ClientCommand } from '../websocket/commands.js'
import { isSnapshotMessage, type ServerMessage, type WireSnapshot } from '../race/wire.js'
import type { SpeedMultiplier } from '../race/raceTypes.js'

export type ClientOptions = {
  url: string
}

type Waiter = {
  match: (m: ServerMessage) => boolean
  resolve: (m: ServerMessage) => void
  reject: (e: Error) => void
  timer: NodeJS.Timeout
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Shape check only; field values are trusted once the envelope matches. */
export function isServerMessage(value: unknown): value is ServerMessage {
  if (!isRecord(value)) return false
  switch (value.type) {
    case 'sync':
      return typeof value.current_tick === 'number'
    case 'pong':
      return typeof value.timestamp === 'number'
    case 'error':
      return typeof value.message === 'string'
    case undefined:
      return typeof value.tick === 'number' && Array.isArray(value.turtles)
    default:
      return false
  }
}

/**
 * Observer client for the race WebSocket.
 */
export class RaceClient {
  private ws: WebSocket | null = null
  private readonly opts: ClientOptions
  private waiters: Waiter[] = []
  onMessage: ((m: ServerMessage) => void) | null = null
  onSnapshot: ((s: WireSnapshot) => void) | null = null

  constructor(opts: ClientOptions) {
    this.opts = opts
  }

  connect(): Promise<void> {
    const ws = new WebSocket(this.opts.url)
    this.ws = ws
    ws.on('message', (data, isBinary) => {
      if (isBinary) return
      let parsed: unknown
      try {
        parsed = JSON.parse(data.toString())
      } catch {
        return // not ours
      }
      if (isServerMessage(parsed)) this.dispatch(parsed)
    })
    ws.on('close', () => this.failWaiters(new Error('connection closed')))
    ws.on('error', (err) => this.failWaiters(err))
    return new Promise((resolve, reject) => {
      ws.once('open', () => resolve())
      ws.once('error', reject)
    })
  }

  /** Resolves with the next message matching `match`. */
  waitFor(match: (m: ServerMessage) => boolean, timeoutMs = 5_000): Promise<ServerMessage> {
    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        match,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter)
          reject(new Error(`no matching message within ${timeoutMs}ms`))
        }, timeoutMs),
      }
      this.waiters.push(waiter)
    })
  }

  send(command: ClientCommand): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      throw new Error('client is not connected')
    }
    this.ws.send(JSON.stringify(command))
  }

  start(): void {
    this.send({ action: 'start' })
  }

  stop(): void {
    this.send({ action: 'stop' })
  }

  setSpeed(speed: SpeedMultiplier): void {
    this.send({ action: 'set_speed', speed })
  }

  ping(): void {
    this.send({ action: 'ping' })
  }

  close(): Promise<void> {
    const ws = this.ws
    this.ws = null
    if (!ws || ws.readyState === WebSocket.CLOSED) return Promise.resolve()
    return new Promise((resolve) => {
      ws.once('close', () => resolve())
      ws.close()
    })
  }

  private dispatch(m: ServerMessage): void {
    this.onMessage?.(m)
    if (isSnapshotMessage(m)) this.onSnapshot?.(m)
    const hits = this.waiters.filter((w) => w.match(m))
    this.waiters = this.waiters.filter((w) => !hits.includes(w))
    for (const w of hits) {
      clearTimeout(w.timer)
      w.resolve(m)
    }
  }

  private failWaiters(err: Error): void {
    const pending = this.waiters
    this.waiters = []
    for (const w of pending) {
      clearTimeout(w.timer)
      w.reject(err)
    }
  }
}
