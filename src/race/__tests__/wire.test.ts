import { describe, it, expect } from 'vitest'
import { RaceEngine } from '../raceEngine.js'
import { isSnapshotMessage, serializeSnapshot, toWireSnapshot } from '../wire.js'
import { ConstantRacer } from './helpers.js'

describe('toWireSnapshot', () => {
  it('uses snake_case and omits unset rank and winner', () => {
    const engine = new RaceEngine([new ConstantRacer('a', 10, true, 'Alpha')], { trackLength: 100 })
    const wire = toWireSnapshot(engine.advance())
    expect(wire).toEqual({
      tick: 1,
      elapsed_ms: wire.elapsed_ms,
      course_id: 'default',
      track_length: 100,
      turtles: [
        {
          id: 'a',
          name: 'Alpha',
          x: 10,
          y: 0,
          angle: 0,
          current_energy: 100,
          max_energy: 100,
          is_resting: false,
          finished: false,
          genome: 'B0-S0-P0-C228B22',
        },
      ],
      terrain_ahead: [
        { start_distance: 10, end_distance: 100, terrain_type: 'grass' },
      ],
      finished: false,
    })
    expect('winner_id' in wire).toBe(false)
    expect('rank' in (wire.turtles[0] ?? {})).toBe(false)
  })

  it('includes rank and winner once set', () => {
    const engine = new RaceEngine([new ConstantRacer('a', 100)], { trackLength: 100 })
    const wire = toWireSnapshot(engine.advance())
    expect(wire.winner_id).toBe('a')
    expect(wire.turtles[0]?.rank).toBe(1)
    expect(wire.terrain_ahead).toEqual([])
  })
})

describe('serializeSnapshot', () => {
  it('produces JSON that reads back as a snapshot message', () => {
    const engine = new RaceEngine([new ConstantRacer('a', 1)])
    const parsed: unknown = JSON.parse(serializeSnapshot(engine.snapshot()))
    expect(parsed).toEqual(toWireSnapshot(engine.snapshot()))
    expect(isSnapshotMessage(toWireSnapshot(engine.snapshot()))).toBe(true)
    expect(isSnapshotMessage({ type: 'pong', timestamp: 1 })).toBe(false)
  })
})
