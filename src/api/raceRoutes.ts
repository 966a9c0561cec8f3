import { Router, type ErrorRequestHandler, type RequestHandler } from 'express'
import type { RaceSession, RaceOverrides } from '../race/raceSession.js'
import type { EngineMetrics } from '../metrics/engineMetrics.js'
import type { ConnectionManager } from '../websocket/connectionManager.js'
import type { RaceResultReader } from '../persistence/racePersistence.js'
import { errorMessage } from '../errors.js'
import { logEvent } from '../utils/logEvent.js'

export type RaceRoutesDeps = {
  session: RaceSession
  connections: ConnectionManager
  metrics: EngineMetrics
  limiter?: RequestHandler
  results?: RaceResultReader | null
}

const OVERRIDE_KEYS = ['physicsHz', 'broadcastHz', 'trackLength', 'maxTicks'] as const

/** Numeric overrides from a request body; anything else is ignored. */
function readOverrides(body: unknown): RaceOverrides {
  const overrides: { -readonly [K in keyof RaceOverrides]: RaceOverrides[K] } = {}
  if (typeof body !== 'object' || body === null) return overrides
  for (const key of OVERRIDE_KEYS) {
    const value: unknown = Reflect.get(body, key)
    if (typeof value === 'number') overrides[key] = value
  }
  return overrides
}

/** Service routes mounted at the root: health and metrics. */
export function createServiceRoutes(deps: RaceRoutesDeps): Router {
  const router = Router()

  router.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      connections: deps.connections.connectionCount,
      raceRunning: deps.session.isRunning,
      timestamp: new Date().toISOString(),
    })
  })

  router.get('/metrics', (req, res) => {
    res.json(deps.metrics.getMetrics())
  })

  return router
}

/** Race routes, mounted at /race. */
export function createRaceRoutes(deps: RaceRoutesDeps): Router {
  const { session } = deps
  const results = deps.results ?? null
  const router = Router()
  const limit: RequestHandler = deps.limiter ?? ((req, res, next) => next())

  /**
   * GET /race/current - Sync payload of the running race
   */
  router.get('/current', (req, res) => {
    const sync = session.getSyncData()
    if (!sync) return res.status(404).json({ error: 'No race running' })
    res.json(sync)
  })

  /**
   * GET /race/history - Last 20 race summaries, newest first
   */
  router.get('/history', (req, res) => {
    res.json(session.getHistory())
  })

  /**
   * GET /race/results/:raceId - Summary from history, else the saved records
   */
  router.get('/results/:raceId', (req, res, next) => {
    const { raceId } = req.params
    const summary = session.findRace(raceId)
    if (summary) return res.json(summary)
    if (!results) return res.status(404).json({ error: 'Race not found' })
    results
      .readRaceResults(raceId)
      .then((records) => {
        if (records.length === 0) return res.status(404).json({ error: 'Race not found' })
        res.json({ raceId, results: records })
      })
      .catch(next)
  })

  /**
   * GET /race/stats/:racerId - Lifetime totals of a persistent racer
   */
  router.get('/stats/:racerId', (req, res, next) => {
    if (!results) return res.status(404).json({ error: 'No stats for racer' })
    results
      .readAggregate(req.params.racerId)
      .then((aggregate) => {
        if (!aggregate) return res.status(404).json({ error: 'No stats for racer' })
        res.json(aggregate)
      })
      .catch(next)
  })

  /**
   * POST /race/start - Start a demo race
   */
  router.post('/start', limit, (req, res) => {
    const result = session.startRace(readOverrides(req.body))
    if (result.ok) return res.status(201).json({ raceId: result.raceId })
    if (result.reason === 'already_running') {
      return res.status(409).json({ error: 'Race already running' })
    }
    res.status(400).json({ error: result.message })
  })

  router.post('/stop', limit, (req, res, next) => {
    session
      .stopRace()
      .then((stopped) => {
        res.json({ stopped })
      })
      .catch(next)
  })

  router.post('/speed', limit, (req, res) => {
    const speed: unknown =
      typeof req.body === 'object' && req.body !== null
        ? Reflect.get(req.body, 'speed')
        : undefined
    if (typeof speed !== 'number' || !session.setSpeed(speed)) {
      return res.status(400).json({ error: 'speed must be 1, 2 or 4 while a race is running' })
    }
    res.json({ speed })
  })

  return router
}

/** Final JSON error handler. */
export const jsonErrorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  logEvent('http:error', { path: req.path, error: errorMessage(err) }, 'error')
  if (res.headersSent) return next(err)
  res.status(500).json({ error: errorMessage(err) })
}
