import { isSpeedMultiplier, type SpeedMultiplier } from '../race/raceTypes.js'
import { MalformedInputError } from '../errors.js'

export type ClientCommand =
  | { action: 'start' }
  | { action: 'stop' }
  | { action: 'set_speed'; speed: SpeedMultiplier }
  | { action: 'ping' }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Parse one inbound text frame. Never throws; bad input comes back as an error value. */
export function parseClientCommand(raw: string): ClientCommand | MalformedInputError {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch {
    return new MalformedInputError('invalid JSON', raw)
  }
  if (!isRecord(data)) {
    return new MalformedInputError('command must be a JSON object', raw)
  }

  const { action, speed } = data
  switch (action) {
    case 'start':
      return { action: 'start' }
    case 'stop':
      return { action: 'stop' }
    case 'ping':
      return { action: 'ping' }
    case 'set_speed':
      if (!isSpeedMultiplier(speed)) {
        return new MalformedInputError(
          `invalid speed ${JSON.stringify(speed ?? null)}; expected 1, 2 or 4`,
          raw,
        )
      }
      return { action: 'set_speed', speed }
    default:
      return new MalformedInputError(
        `unknown action ${JSON.stringify(action ?? null)}`,
        raw,
      )
  }
}
