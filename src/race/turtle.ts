import { randomUUID } from 'crypto'
import type { Terrain } from './terrain.js'
import {
  DEFAULT_TRAITS,
  encodeGenome,
  type VisualTraits,
} from './genomeCodec.js'

/**
 * What the engine needs from a racer. The engine borrows racers for one
 * race: it resets them on construction and mutates position/finish state
 * each tick; physics stays with the racer.
 */
export interface Racer {
  readonly id: string
  readonly name: string
  readonly maxEnergy: number
  readonly genome: string
  /** false for synthetic fillers whose results are never saved */
  readonly persistent: boolean
  distance: number
  currentEnergy: number
  isResting: boolean
  finished: boolean
  rank: number | null
  resetForRace(): void
  /** Advance one tick on `terrain`; returns raw speed (0 while resting). */
  updatePhysics(terrain: Terrain): number
}

export type TurtleStats = {
  speed: number
  maxEnergy: number
  recovery: number
  swim: number
  climb: number
  stamina: number
}

export type TurtleInit = {
  id?: string
  name: string
  stats: Omit<TurtleStats, 'stamina'> & { stamina?: number }
  traits?: Partial<VisualTraits>
  persistent?: boolean
}

// Shared physics constants
export const TERRAIN_DIFFICULTY = 0.8
export const BASE_ENERGY_DRAIN = 0.5
export const RECOVERY_RATE = 0.1
export const RECOVERY_THRESHOLD = 0.5

export function shortId(): string {
  return randomUUID().slice(0, 8)
}

export class Turtle implements Racer {
  readonly id: string
  readonly name: string
  readonly stats: Readonly<TurtleStats>
  readonly traits: VisualTraits
  readonly persistent: boolean
  readonly genome: string

  distance = 0
  currentEnergy: number
  isResting = false
  finished = false
  rank: number | null = null

  constructor(init: TurtleInit) {
    this.id = init.id ?? shortId()
    this.name = init.name
    this.stats = Object.freeze({
      ...init.stats,
      stamina: init.stats.stamina ?? 0,
    })
    this.traits = Object.freeze({ ...DEFAULT_TRAITS, ...init.traits })
    this.persistent = init.persistent ?? true
    this.genome = encodeGenome(this.traits)
    this.currentEnergy = this.stats.maxEnergy
  }

  get maxEnergy(): number {
    return this.stats.maxEnergy
  }

  resetForRace(): void {
    this.currentEnergy = this.stats.maxEnergy
    this.distance = 0
    this.isResting = false
    this.finished = false
    this.rank = null
  }

  updatePhysics(terrain: Terrain): number {
    if (this.finished) return 0

    const { speed, maxEnergy, recovery, swim, climb, stamina } = this.stats

    if (this.isResting) {
      const rate = RECOVERY_RATE * (1 + stamina / 20)
      this.currentEnergy += recovery * rate
      if (this.currentEnergy >= maxEnergy * RECOVERY_THRESHOLD) {
        this.isResting = false
      }
      return 0
    }

    const sm = terrain.speedModifier
    let moveSpeed = speed
    switch (terrain.type) {
      case 'water':
        moveSpeed *= (swim / 10) * sm
        break
      case 'rock':
        moveSpeed *= (climb / 10) * sm
        break
      case 'sand':
        moveSpeed *= (1 + recovery / 15) * sm
        break
      case 'mud':
        moveSpeed *= (this.currentEnergy / maxEnergy) * sm
        break
      case 'boost':
        moveSpeed *= sm * 1.2
        break
      default:
        moveSpeed *= sm
    }

    this.currentEnergy -= BASE_ENERGY_DRAIN * TERRAIN_DIFFICULTY * terrain.energyDrain
    if (this.currentEnergy <= 0) {
      // exhausted: no movement from the next tick until recovered
      this.currentEnergy = 0
      this.isResting = true
    }

    return moveSpeed
  }
}
