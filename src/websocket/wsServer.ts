import type { Server } from 'http'
import { WebSocketServer, WebSocket, type RawData } from 'ws'
import type { ClientConnection, ClientTransport, ConnectionManager } from './connectionManager.js'
import { parseClientCommand, type ClientCommand } from './commands.js'
import type { RaceSession } from '../race/raceSession.js'
import type { ServerMessage } from '../race/wire.js'
import { MalformedInputError, errorMessage } from '../errors.js'
import { logEvent } from '../utils/logEvent.js'

export const WS_PATH = '/ws/race'

/** Adapts a ws socket to the promise-based transport the manager expects. */
export function wsTransport(ws: WebSocket): ClientTransport {
  return {
    send: (message) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new Error(`socket not open (readyState=${ws.readyState})`))
          return
        }
        ws.send(message, (err) => (err ? reject(err) : resolve()))
      }),
    close: (code, reason) => ws.close(code, reason),
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8')
  return data.toString('utf8')
}

/**
 * WebSocket endpoint for race observers
 */
export class RaceWebSocketServer {
  private wss: WebSocketServer | null = null

  constructor(
    private readonly connections: ConnectionManager,
    private readonly session: RaceSession,
  ) {}

  attach(server: Server): void {
    this.wss = new WebSocketServer({ server, path: WS_PATH })
    this.wss.on('connection', (ws) => this.onConnection(ws))
    this.wss.on('error', (err) => {
      logEvent('ws:server-error', { error: errorMessage(err) }, 'error')
    })
    logEvent('ws:init', { path: WS_PATH })
  }

  /** Stops accepting sockets; open connections are closed by the manager. */
  close(): Promise<void> {
    const wss = this.wss
    if (!wss) return Promise.resolve()
    this.wss = null
    return new Promise((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()))
    })
  }

  private onConnection(ws: WebSocket): void {
    const conn = this.connections.connect(wsTransport(ws))

    // Late joiner: current race parameters and latest snapshot
    const sync = this.session.getSyncData()
    if (sync) void this.reply(conn, sync)

    ws.on('message', (data, isBinary) => {
      this.connections.touch(conn)
      if (isBinary) {
        logEvent('ws:malformed-input', { connectionId: conn.id, error: 'binary frame' }, 'warn')
        return
      }
      const cmd = parseClientCommand(rawToString(data))
      if (cmd instanceof MalformedInputError) {
        logEvent(
          'ws:malformed-input',
          { connectionId: conn.id, error: cmd.message },
          'warn',
        )
        return
      }
      this.handleCommand(conn, cmd).catch((e) => {
        logEvent(
          'ws:command-error',
          { connectionId: conn.id, action: cmd.action, error: errorMessage(e) },
          'error',
        )
      })
    })
    ws.on('close', () => {
      this.connections.disconnect(conn)
    })
    ws.on('error', (err) => {
      logEvent('ws:client-error', { connectionId: conn.id, error: errorMessage(err) }, 'warn')
      this.connections.disconnect(conn)
    })
  }

  private async handleCommand(conn: ClientConnection, cmd: ClientCommand): Promise<void> {
    switch (cmd.action) {
      case 'start': {
        const result = this.session.startRace()
        if (result.ok) return
        await this.reply(conn, {
          type: 'error',
          message:
            result.reason === 'already_running' ? 'Race already running' : result.message,
        })
        return
      }
      case 'stop':
        await this.session.stopRace()
        return
      case 'set_speed':
        this.session.setSpeed(cmd.speed)
        return
      case 'ping':
        await this.reply(conn, { type: 'pong', timestamp: Date.now() / 1000 })
        return
    }
  }

  private async reply(conn: ClientConnection, message: ServerMessage): Promise<void> {
    await this.connections.sendTo(conn, JSON.stringify(message))
  }
}
