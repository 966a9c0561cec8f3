import express from 'express'
import http from 'http'
import { pathToFileURL } from 'url'
import { loadConfig, type AppConfig } from './config.js'
import { RaceWebSocketServer, WS_PATH } from './websocket/wsServer.js'
import { ConnectionManager } from './websocket/connectionManager.js'
import { RaceSession } from './race/raceSession.js'
import { NpcPool } from './race/npcPool.js'
import {
  createRaceRoutes,
  createServiceRoutes,
  jsonErrorHandler,
} from './api/raceRoutes.js'
import {
  createRacePersistence,
  resultReaderFor,
  type RacePersistence,
} from './persistence/racePersistence.js'
import { EngineMetrics } from './metrics/engineMetrics.js'
import { initCloudWatch, toMetricData } from './metrics/cloudwatch.js'
import { MasterTimeline } from './timeline/masterTimeline.js'
import { rateLimit } from './utils/rateLimit.js'
import { logEvent } from './utils/logEvent.js'
import { errorMessage } from './errors.js'

const METRICS_PUSH_TIMER = 'metrics:push'

export type RaceServerDeps = {
  /** null disables persistence; omitted builds it from config */
  persistence?: RacePersistence | null
  npcPool?: NpcPool
  yieldMs?: number
}

export type RaceServer = {
  readonly http: http.Server
  readonly session: RaceSession
  readonly connections: ConnectionManager
  readonly metrics: EngineMetrics
  /** Resolves with the bound port (useful with port 0). */
  listen(port: number): Promise<number>
  shutdown(): Promise<void>
}

export function createRaceServer(
  config: AppConfig,
  deps: RaceServerDeps = {},
): RaceServer {
  const metrics = new EngineMetrics()
  const timeline = new MasterTimeline()
  const connections = new ConnectionManager({
    zombieTimeoutMs: config.connections.zombieTimeoutMs,
    sendTimeoutMs: config.connections.sendTimeoutMs,
    timeline,
    metrics,
  })
  const persistence =
    deps.persistence !== undefined
      ? deps.persistence
      : createRacePersistence(config.persistence)
  const session = new RaceSession({
    defaults: config.race,
    broadcaster: connections,
    persistence,
    metrics,
    npcPool: deps.npcPool,
    yieldMs: deps.yieldMs,
  })
  const limiter = rateLimit(config.rateLimit)
  const cloudwatch = initCloudWatch(config.metrics)

  const app = express()

  // Middleware
  app.use(express.json())

  // Routes
  const routeDeps = {
    session,
    connections,
    metrics,
    limiter,
    results: resultReaderFor(persistence),
  }
  app.use(createServiceRoutes(routeDeps))
  app.use('/race', createRaceRoutes(routeDeps))
  app.use(jsonErrorHandler)

  const server = http.createServer(app)
  const wsServer = new RaceWebSocketServer(connections, session)
  wsServer.attach(server)

  let shuttingDown: Promise<void> | null = null

  return {
    http: server,
    session,
    connections,
    metrics,

    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        server.once('error', reject)
        server.listen(port, () => {
          server.off('error', reject)
          const addr = server.address()
          const bound = typeof addr === 'object' && addr !== null ? addr.port : port
          connections.startZombieCleanup(config.connections.zombieCleanupIntervalMs)
          if (cloudwatch) {
            timeline.setInterval(METRICS_PUSH_TIMER, config.metrics.pushIntervalMs, () => {
              void cloudwatch.push(toMetricData(metrics.getMetrics()))
            })
          }
          logEvent('server:listening', { port: bound, wsPath: WS_PATH })
          resolve(bound)
        })
      })
    },

    shutdown(): Promise<void> {
      if (!shuttingDown) {
        shuttingDown = (async () => {
          await session.shutdown()
          connections.stopZombieCleanup()
          timeline.shutdown()
          // the ws server reports closed only once every client socket is gone
          connections.closeAll()
          await wsServer.close()
          if (server.listening) {
            await new Promise<void>((resolve, reject) => {
              server.close((err) => (err ? reject(err) : resolve()))
            })
          }
          await limiter.close()
          logEvent('server:closed', {})
        })()
      }
      return shuttingDown
    },
  }
}

async function main(): Promise<void> {
  const config = loadConfig()
  const server = createRaceServer(config)
  await server.listen(config.port)

  // Graceful shutdown
  const onSignal = (signal: NodeJS.Signals) => {
    logEvent('server:shutdown', { signal })
    server.shutdown().then(
      () => process.exit(0),
      (e) => {
        logEvent('server:shutdown-failed', { error: errorMessage(e) }, 'error')
        process.exit(1)
      },
    )
  }
  process.once('SIGTERM', onSignal)
  process.once('SIGINT', onSignal)
}

const entry = process.argv[1]
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((e) => {
    logEvent('server:fatal', { error: errorMessage(e) }, 'error')
    process.exit(1)
  })
}
