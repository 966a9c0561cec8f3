import { describe, it, expect, vi } from 'vitest'
import { RaceSession, HISTORY_LIMIT } from '../raceSession.js'
import { NpcPool } from '../npcPool.js'
import { makeSeededRng } from '../rng.js'
import type { RaceDefaults } from '../../config.js'
import { RecordingBroadcaster } from './helpers.js'

const defaults: RaceDefaults = {
  physicsHz: 60,
  broadcastHz: 30,
  trackLength: 100_000,
  maxTicks: 5_000,
  npcFillers: 2,
}

function makeSession() {
  return new RaceSession({
    defaults,
    broadcaster: new RecordingBroadcaster(),
    persistence: null,
    npcPool: new NpcPool(5, makeSeededRng(9)),
  })
}

describe('RaceSession', () => {
  it('starts one race at a time', async () => {
    const session = makeSession()
    const first = session.startRace()
    expect(first.ok).toBe(true)
    expect(session.isRunning).toBe(true)
    expect(session.startRace()).toEqual({ ok: false, reason: 'already_running' })
    await session.shutdown()
    expect(session.isRunning).toBe(false)
  })

  it('returns configuration errors to the caller', () => {
    const session = makeSession()
    expect(session.startRace({ broadcastHz: 100 })).toEqual({
      ok: false,
      reason: 'invalid_config',
      message: 'broadcastHz must be in [1, 60], got 100',
    })
    expect(session.isRunning).toBe(false)
  })

  it('races the house turtles plus NPC fillers and records the result', async () => {
    const session = makeSession()
    const started = session.startRace()
    if (!started.ok) throw new Error('race did not start')

    const sync = session.getSyncData()
    expect(sync?.type).toBe('sync')
    expect(sync?.track_length).toBe(100_000)
    expect(sync?.snapshot?.turtles).toHaveLength(5)
    expect(sync?.snapshot?.turtles.slice(0, 3).map((t) => t.name)).toEqual([
      'Speedster',
      'Tank',
      'Balanced',
    ])

    expect(await session.stopRace()).toBe(true)
    expect(await session.stopRace()).toBe(false)
    expect(session.getSyncData()).toBeNull()

    const summary = session.findRace(started.raceId)
    expect(summary?.standings).toHaveLength(5)
    expect(summary?.winnerId).toBeNull()
    expect(session.getHistory().map((s) => s.raceId)).toEqual([started.raceId])
  })

  it('refuses a new race until the stopped one has finished with its racers', async () => {
    const session = makeSession()
    const first = session.startRace()
    if (!first.ok) throw new Error('race did not start')
    const firstRace = session.currentRace
    if (!firstRace) throw new Error('no current race')
    await vi.waitFor(() => expect(firstRace.engine.currentTick).toBeGreaterThanOrEqual(5))

    const stopping = session.stopRace()
    expect(session.startRace()).toEqual({ ok: false, reason: 'already_running' })
    expect(await session.stopRace()).toBe(false)
    expect(await stopping).toBe(true)

    const summary = session.findRace(first.raceId)
    expect(summary?.totalTicks).toBeGreaterThanOrEqual(5)
    expect(summary?.standings.every((s) => s.distance > 0)).toBe(true)
    const finalDistances = firstRace.latestSnapshot?.turtles.map((t) => t.x) ?? []
    expect(finalDistances.every((x) => x > 0)).toBe(true)

    await new Promise((resolve) => setTimeout(resolve, 2))
    const second = session.startRace()
    expect(second.ok).toBe(true)
    const secondRace = session.currentRace
    expect(secondRace).not.toBe(firstRace)
    // house turtles are built fresh for every race
    for (const racer of secondRace?.engine.racers.slice(0, 3) ?? []) {
      expect(firstRace.engine.racers).not.toContain(racer)
    }
    expect(firstRace.latestSnapshot?.turtles.map((t) => t.x)).toEqual(finalDistances)
    await session.shutdown()
  })

  it('applies speed changes only while a race runs', async () => {
    const session = makeSession()
    expect(session.setSpeed(2)).toBe(false)
    session.startRace()
    expect(session.setSpeed(3)).toBe(false)
    expect(session.setSpeed(2)).toBe(true)
    expect(session.currentRace?.speedMultiplier).toBe(2)
    await session.shutdown()
  })

  it('keeps a bounded history', async () => {
    const session = makeSession()
    for (let i = 0; i < HISTORY_LIMIT + 1; i++) {
      expect(session.startRace().ok).toBe(true)
      await session.stopRace()
    }
    expect(session.getHistory()).toHaveLength(20)
    expect(session.findRace('race-missing')).toBeNull()
  })
})
