import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createRaceServer, type RaceServer } from '../server.js'
import { loadConfig } from '../config.js'
import { RaceClient } from '../sdk/client.js'
import { NpcPool } from '../race/npcPool.js'
import { makeSeededRng } from '../race/rng.js'
import { isSnapshotMessage, type ServerMessage } from '../race/wire.js'

const config = loadConfig({
  PORT: '0',
  TRACK_LENGTH: '100000',
  NPC_FILLERS: '1',
})

const isType =
  (type: string) =>
  (m: ServerMessage): boolean =>
    'type' in m && m.type === type

describe('race server', () => {
  let server: RaceServer
  let base: string
  let wsUrl: string
  const clients: RaceClient[] = []

  async function connectClient(): Promise<{ client: RaceClient; received: ServerMessage[] }> {
    const client = new RaceClient({ url: wsUrl })
    const received: ServerMessage[] = []
    client.onMessage = (m) => received.push(m)
    await client.connect()
    clients.push(client)
    return { client, received }
  }

  beforeEach(async () => {
    server = createRaceServer(config, {
      persistence: null,
      npcPool: new NpcPool(4, makeSeededRng(21)),
    })
    const port = await server.listen(0)
    base = `http://localhost:${port}`
    wsUrl = `ws://localhost:${port}/ws/race`
  })

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((c) => c.close()))
    await server.shutdown()
  })

  it('answers health checks', async () => {
    const res = await fetch(`${base}/health`)
    expect(res.status).toBe(200)
    const body: unknown = await res.json()
    expect(body).toMatchObject({ status: 'healthy', connections: 0, raceRunning: false })
  })

  it('replies to ping with a pong in seconds', async () => {
    const { client } = await connectClient()
    const pong = client.waitFor(isType('pong'))
    client.ping()
    const msg = await pong
    expect(msg).toMatchObject({ type: 'pong' })
    if (!('type' in msg) || msg.type !== 'pong') return
    expect(Math.abs(msg.timestamp - Date.now() / 1000)).toBeLessThan(5)
  })

  it('runs a race driven over the socket', async () => {
    const { client: a } = await connectClient()

    const firstFrame = a.waitFor((m) => isSnapshotMessage(m) && m.tick > 0)
    a.start()
    const frame = await firstFrame
    if (!isSnapshotMessage(frame)) throw new Error('expected a snapshot')
    expect(frame.turtles.map((t) => t.name).slice(0, 3)).toEqual(['Speedster', 'Tank', 'Balanced'])
    expect(frame.turtles).toHaveLength(4)

    // a second start is refused
    const refusal = a.waitFor(isType('error'))
    a.start()
    expect(await refusal).toEqual({ type: 'error', message: 'Race already running' })

    // late joiner gets the sync payload
    const { received } = await connectClient()
    await vi.waitFor(() => expect(received.some(isType('sync'))).toBe(true))
    const sync = received.find(isType('sync'))
    expect(sync).toMatchObject({ type: 'sync', track_length: 100000, physics_hz: 60, broadcast_hz: 30 })

    const current = await fetch(`${base}/race/current`)
    expect(current.status).toBe(200)
    const conflict = await fetch(`${base}/race/start`, { method: 'POST' })
    expect(conflict.status).toBe(409)

    a.setSpeed(4)
    await vi.waitFor(() => expect(server.session.currentRace?.speedMultiplier).toBe(4))

    a.stop()
    await vi.waitFor(() => expect(server.session.isRunning).toBe(false))
    await vi.waitFor(() => expect(server.session.getHistory()).toHaveLength(1))

    const history = await fetch(`${base}/race/history`)
    const summaries: unknown = await history.json()
    expect(Array.isArray(summaries) && summaries.length).toBe(1)
    const raceId = server.session.getHistory()[0]?.raceId
    const result = await fetch(`${base}/race/results/${raceId}`)
    expect(result.status).toBe(200)
  })

  it('maps HTTP race control onto the session', async () => {
    const bad = await fetch(`${base}/race/start`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ broadcastHz: 500 }),
    })
    expect(bad.status).toBe(400)
    expect(await bad.json()).toEqual({ error: 'broadcastHz must be in [1, 60], got 500' })

    expect((await fetch(`${base}/race/current`)).status).toBe(404)
    expect((await fetch(`${base}/race/results/race-missing`)).status).toBe(404)

    const rejectedSpeed = await fetch(`${base}/race/speed`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ speed: 2 }),
    })
    expect(rejectedSpeed.status).toBe(400)

    const started = await fetch(`${base}/race/start`, { method: 'POST' })
    expect(started.status).toBe(201)
    const startedBody: unknown = await started.json()
    expect(startedBody).toEqual({ raceId: expect.stringMatching(/^race-\d+$/) })

    const speed = await fetch(`${base}/race/speed`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ speed: 2 }),
    })
    expect(await speed.json()).toEqual({ speed: 2 })

    const stopped = await fetch(`${base}/race/stop`, { method: 'POST' })
    expect(await stopped.json()).toEqual({ stopped: true })
    const again = await fetch(`${base}/race/stop`, { method: 'POST' })
    expect(await again.json()).toEqual({ stopped: false })
  })
})
