import type { RaceSnapshot, RacerState, TerrainSegment } from './raceTypes.js'
import type { TerrainType } from './terrain.js'

/**
 * JSON shapes observers receive. Field names are snake_case on the wire;
 * a null `rank` or `winner_id` is left out rather than sent.
 */
export type WireTurtle = {
  id: string
  name: string
  x: number
  y: number
  angle: number
  current_energy: number
  max_energy: number
  is_resting: boolean
  finished: boolean
  rank?: number
  genome: string
}

export type WireTerrainSegment = {
  start_distance: number
  end_distance: number
  terrain_type: TerrainType
}

export type WireSnapshot = {
  tick: number
  elapsed_ms: number
  course_id: string
  track_length: number
  turtles: WireTurtle[]
  terrain_ahead: WireTerrainSegment[]
  finished: boolean
  winner_id?: string
}

export type SyncMessage = {
  type: 'sync'
  track_length: number
  physics_hz: number
  broadcast_hz: number
  current_tick: number
  snapshot: WireSnapshot | null
}

export type PongMessage = { type: 'pong'; timestamp: number }
export type ErrorMessage = { type: 'error'; message: string }

export type ServerMessage = WireSnapshot | SyncMessage | PongMessage | ErrorMessage

function toWireTurtle(t: RacerState): WireTurtle {
  return {
    id: t.id,
    name: t.name,
    x: t.x,
    y: t.y,
    angle: t.angle,
    current_energy: t.currentEnergy,
    max_energy: t.maxEnergy,
    is_resting: t.isResting,
    finished: t.finished,
    ...(t.rank !== null ? { rank: t.rank } : {}),
    genome: t.genome,
  }
}

function toWireSegment(s: TerrainSegment): WireTerrainSegment {
  return {
    start_distance: s.startDistance,
    end_distance: s.endDistance,
    terrain_type: s.terrainType,
  }
}

export function toWireSnapshot(snapshot: RaceSnapshot): WireSnapshot {
  return {
    tick: snapshot.tick,
    elapsed_ms: snapshot.elapsedMs,
    course_id: snapshot.courseId,
    track_length: snapshot.trackLength,
    turtles: snapshot.turtles.map(toWireTurtle),
    terrain_ahead: snapshot.terrainAhead.map(toWireSegment),
    finished: snapshot.finished,
    ...(snapshot.winnerId !== null ? { winner_id: snapshot.winnerId } : {}),
  }
}

export function serializeSnapshot(snapshot: RaceSnapshot): string {
  return JSON.stringify(toWireSnapshot(snapshot))
}

export function isSnapshotMessage(msg: ServerMessage): msg is WireSnapshot {
  return !('type' in msg)
}
