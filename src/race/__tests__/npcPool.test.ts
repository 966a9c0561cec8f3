import { describe, it, expect } from 'vitest'
import { NpcPool } from '../npcPool.js'
import { makeSeededRng } from '../rng.js'

const NAME_PATTERN =
  /^(SpeedyBot|ShellShock|TurboNPC|SlowPoke|MechaTurtle|DriftKing|RoboRacer|ByteShell|Glitch|Vector|Ping|Packet|Socket)\d{1,2}$/

describe('NpcPool', () => {
  it('fills itself to the cache size', () => {
    expect(new NpcPool(12, makeSeededRng(1)).size).toBe(12)
  })

  it('hands out distinct, non-persistent fillers with bounded stats', () => {
    const pool = new NpcPool(20, makeSeededRng(7))
    const racers = pool.getRacers(5)
    expect(racers).toHaveLength(5)
    expect(new Set(racers.map((r) => r.id)).size).toBe(5)
    for (const r of racers) {
      expect(r.id).toMatch(/^npc-[0-9a-f]{8}$/)
      expect(r.name).toMatch(NAME_PATTERN)
      expect(r.persistent).toBe(false)
      expect(r.stats.speed).toBeGreaterThanOrEqual(8)
      expect(r.stats.speed).toBeLessThanOrEqual(12)
      expect(r.stats.maxEnergy).toBeGreaterThanOrEqual(80)
      expect(r.stats.maxEnergy).toBeLessThanOrEqual(120)
      expect(r.stats.recovery).toBeGreaterThanOrEqual(3)
      expect(r.stats.recovery).toBeLessThanOrEqual(7)
      expect(r.stats.swim).toBe(5)
      expect(r.stats.climb).toBe(5)
    }
  })

  it('clamps the request to the pool size', () => {
    const pool = new NpcPool(4, makeSeededRng(3))
    expect(pool.getRacers(50)).toHaveLength(4)
    expect(pool.getRacers(-1)).toHaveLength(0)
  })

  it('returns racers reset for a new race', () => {
    const pool = new NpcPool(3, makeSeededRng(5))
    const [first] = pool.getRacers(1)
    expect(first).toBeDefined()
    if (!first) return
    first.distance = 300
    first.finished = true
    // take everything so the same NPC comes back if it was not retired
    const again = pool.getRacers(3)
    for (const r of again) {
      expect(r.distance).toBe(0)
      expect(r.finished).toBe(false)
    }
  })

  it('retires NPCs after their uses and replaces them', () => {
    const pool = new NpcPool(6, makeSeededRng(11))
    const originals = new Set(pool.getRacers(6).map((r) => r.id))
    // every NPC has at most 10 uses; after 10 full draws all originals are gone
    for (let i = 0; i < 9; i++) pool.getRacers(6)
    const fresh = pool.getRacers(6)
    expect(fresh).toHaveLength(6)
    expect(fresh.some((r) => originals.has(r.id))).toBe(false)
    expect(pool.size).toBe(6)
  })
})
