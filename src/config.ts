import { ConfigurationError } from './errors.js'

export type RaceDefaults = Readonly<{
  physicsHz: number
  broadcastHz: number
  trackLength: number
  maxTicks: number
  npcFillers: number
}>

export type ConnectionSettings = Readonly<{
  zombieTimeoutMs: number
  zombieCleanupIntervalMs: number
  sendTimeoutMs: number
}>

export type PersistenceSettings = Readonly<{
  dataDir: string | null
  s3Bucket: string | null
  s3Prefix: string
  region: string
}>

export type MetricsSettings = Readonly<{
  cloudwatchNamespace: string | null
  region: string
  pushIntervalMs: number
}>

export type RateLimitSettings = Readonly<{
  enabled: boolean
  provider: 'memory' | 'redis'
  redisUrl: string
  max: number
  windowMs: number
}>

export type AppConfig = Readonly<{
  port: number
  race: RaceDefaults
  connections: ConnectionSettings
  persistence: PersistenceSettings
  metrics: MetricsSettings
  rateLimit: RateLimitSettings
}>

type Env = Readonly<Record<string, string | undefined>>

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  check: (n: number) => boolean = (n) => n > 0,
): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number(raw)
  if (!Number.isFinite(n) || !check(n)) {
    throw new ConfigurationError(`${name} has invalid value "${raw}"`)
  }
  return n
}

function readString(env: Env, name: string): string | null {
  const raw = env[name]?.trim()
  return raw ? raw : null
}

const isInt = (n: number) => Number.isInteger(n)

/**
 * Build the server configuration from environment variables.
 * Throws ConfigurationError on the first invalid value.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const region = readString(env, 'AWS_REGION') ?? 'us-east-1'

  const physicsHz = readNumber(
    env,
    'PHYSICS_HZ',
    60,
    (n) => isInt(n) && n >= 1 && n <= 120,
  )
  const broadcastHz = readNumber(
    env,
    'BROADCAST_HZ',
    30,
    (n) => n > 0 && n <= physicsHz,
  )

  const provider = (env.RATE_LIMIT_PROVIDER ?? 'memory').toLowerCase()
  if (provider !== 'memory' && provider !== 'redis') {
    throw new ConfigurationError(
      `RATE_LIMIT_PROVIDER must be "memory" or "redis", got "${provider}"`,
    )
  }

  return Object.freeze({
    port: readNumber(env, 'PORT', 3001, (n) => isInt(n) && n >= 0),
    race: Object.freeze({
      physicsHz,
      broadcastHz,
      trackLength: readNumber(env, 'TRACK_LENGTH', 1500),
      maxTicks: readNumber(env, 'MAX_TICKS', 5000, (n) => isInt(n) && n > 0),
      npcFillers: readNumber(env, 'NPC_FILLERS', 2, (n) => isInt(n) && n >= 0),
    }),
    connections: Object.freeze({
      zombieTimeoutMs: readNumber(env, 'ZOMBIE_TIMEOUT_MS', 300_000),
      zombieCleanupIntervalMs: readNumber(
        env,
        'ZOMBIE_CLEANUP_INTERVAL_MS',
        60_000,
      ),
      sendTimeoutMs: readNumber(env, 'SEND_TIMEOUT_MS', 5_000),
    }),
    persistence: Object.freeze({
      dataDir: readString(env, 'PERSIST_DIR'),
      s3Bucket: readString(env, 'PERSIST_S3_BUCKET'),
      s3Prefix: readString(env, 'PERSIST_S3_PREFIX') ?? 'races',
      region,
    }),
    metrics: Object.freeze({
      cloudwatchNamespace: readString(env, 'CLOUDWATCH_NAMESPACE'),
      region,
      pushIntervalMs: readNumber(env, 'METRICS_PUSH_INTERVAL_MS', 60_000),
    }),
    rateLimit: Object.freeze({
      enabled: env.RATE_LIMIT === '1',
      provider,
      redisUrl: readString(env, 'REDIS_URL') ?? 'redis://localhost:6379',
      max: readNumber(env, 'RATE_LIMIT_MAX', 30, (n) => isInt(n) && n > 0),
      windowMs: readNumber(env, 'RATE_LIMIT_WINDOW_MS', 60_000),
    }),
  })
}
