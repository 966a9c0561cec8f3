import { randomUUID } from 'crypto'
import { Turtle } from './turtle.js'
import {
  BODY_PATTERNS,
  LIMB_SHAPES,
  SHELL_PATTERNS,
  type VisualTraits,
} from './genomeCodec.js'
import { pickOne, randomBetween, randomInt, type Rng } from './rng.js'
import { logEvent } from '../utils/logEvent.js'

const NPC_NAMES = [
  'SpeedyBot',
  'ShellShock',
  'TurboNPC',
  'SlowPoke',
  'MechaTurtle',
  'DriftKing',
  'RoboRacer',
  'ByteShell',
  'Glitch',
  'Vector',
  'Ping',
  'Packet',
  'Socket',
] as const

const MIN_USES = 3
const MAX_USES = 10

type PoolEntry = { turtle: Turtle; usesLeft: number }

function randomTraits(rng: Rng): VisualTraits {
  return {
    body: pickOne(rng, BODY_PATTERNS),
    shell: pickOne(rng, SHELL_PATTERNS),
    limb: pickOne(rng, LIMB_SHAPES),
    color: [randomInt(rng, 0, 255), randomInt(rng, 0, 255), randomInt(rng, 0, 255)],
  }
}

/**
 * Reusable filler racers. NPCs are never persisted; each one is retired after
 * a few races and replaced by a freshly generated one.
 */
export class NpcPool {
  private readonly entries: PoolEntry[] = []

  constructor(
    readonly cacheSize = 100,
    private readonly rng: Rng = Math.random,
  ) {
    this.replenish()
  }

  get size(): number {
    return this.entries.length
  }

  /** Distinct NPCs, reset and ready to race. `count` is clamped to the pool. */
  getRacers(count: number): Turtle[] {
    const n = Math.max(0, Math.min(Math.floor(count), this.entries.length))
    const picked: PoolEntry[] = []
    const candidates = [...this.entries]
    for (let i = 0; i < n; i++) {
      const idx = Math.floor(this.rng() * candidates.length)
      const [entry] = candidates.splice(idx, 1)
      if (entry) picked.push(entry)
    }

    let retired = 0
    for (const entry of picked) {
      entry.turtle.resetForRace()
      entry.usesLeft -= 1
      if (entry.usesLeft <= 0) {
        this.entries.splice(this.entries.indexOf(entry), 1)
        retired++
      }
    }
    if (retired > 0) {
      logEvent('npc:retired', { count: retired })
      this.replenish()
    }
    return picked.map((e) => e.turtle)
  }

  private replenish(): void {
    while (this.entries.length < this.cacheSize) {
      this.entries.push({
        turtle: this.generate(),
        usesLeft: randomInt(this.rng, MIN_USES, MAX_USES),
      })
    }
  }

  private generate(): Turtle {
    const rng = this.rng
    return new Turtle({
      id: `npc-${randomUUID().slice(0, 8)}`,
      name: `${pickOne(rng, NPC_NAMES)}${randomInt(rng, 1, 99)}`,
      stats: {
        speed: randomBetween(rng, 8, 12),
        maxEnergy: randomBetween(rng, 80, 120),
        recovery: randomBetween(rng, 3, 7),
        swim: 5,
        climb: 5,
      },
      traits: randomTraits(rng),
      persistent: false,
    })
  }
}
