export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const ts = () => new Date().toISOString()

const silent = () => process.env.LOG_SILENT === 'true'
const verbose = () => process.env.LOG_VERBOSE === 'true'

export function logEvent(
  eventType: string,
  payload: Record<string, unknown>,
  level: LogLevel = 'info',
): void {
  if (silent()) return
  if (level === 'debug' && !verbose()) return
  const raceId = payload.raceId
  const base = {
    ts: ts(),
    level,
    eventType,
    ...(typeof raceId === 'string' ? { raceId } : {}),
  }
  const line = JSON.stringify({ ...base, detail: payload })
  if (level === 'error') console.error(line)
  else if (level === 'warn') console.warn(line)
  else console.log(line)
}

// Per-tick chatter; only with LOG_VERBOSE=true
export function logDebug(
  eventType: string,
  payload: Record<string, unknown>,
): void {
  logEvent(eventType, payload, 'debug')
}
