import type { Racer } from '../turtle.js'
import type { RaceSnapshot } from '../raceTypes.js'
import type { SnapshotBroadcaster } from '../raceOrchestrator.js'
import { encodeGenome } from '../genomeCodec.js'

/** Racer that moves at a fixed speed whatever the terrain. */
export class ConstantRacer implements Racer {
  readonly maxEnergy = 100
  readonly genome = encodeGenome()
  distance = 0
  currentEnergy = 100
  isResting = false
  finished = false
  rank: number | null = null
  calls = 0

  constructor(
    readonly id: string,
    public speed: number,
    readonly persistent = true,
    readonly name = id,
  ) {}

  resetForRace(): void {
    this.distance = 0
    this.currentEnergy = this.maxEnergy
    this.isResting = false
    this.finished = false
    this.rank = null
  }

  updatePhysics(): number {
    this.calls++
    return this.speed
  }
}

/** Throws on the listed (1-based) physics calls, moves normally otherwise. */
export class FlakyRacer extends ConstantRacer {
  constructor(
    id: string,
    speed: number,
    private readonly failOn: readonly number[],
  ) {
    super(id, speed)
  }

  override updatePhysics(): number {
    const speed = super.updatePhysics()
    if (this.failOn.includes(this.calls)) throw new Error(`physics failure on call ${this.calls}`)
    return speed
  }
}

export class RecordingBroadcaster implements SnapshotBroadcaster {
  readonly snapshots: RaceSnapshot[] = []

  async broadcastSnapshot(snapshot: RaceSnapshot): Promise<number> {
    this.snapshots.push(snapshot)
    return 1
  }

  get last(): RaceSnapshot | undefined {
    return this.snapshots[this.snapshots.length - 1]
  }
}
