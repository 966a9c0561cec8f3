import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { createClient } from 'redis'
import type { RateLimitSettings } from '../config.js'
import { errorMessage } from '../errors.js'
import { logEvent } from './logEvent.js'

type Bucket = { tokens: number; last: number }
type RedisClient = ReturnType<typeof createClient>

export type RateLimiter = RequestHandler & { close(): Promise<void> }

function clientKey(req: Request): string {
  const fwd = req.headers['x-forwarded-for']
  const first = Array.isArray(fwd) ? fwd[0] : fwd?.split(',')[0]
  return first?.trim() || req.ip || 'unknown'
}

/**
 * Token-bucket limiter for mutating routes. With the redis provider a fixed
 * window counter is shared across instances; if redis is unreachable the
 * in-memory bucket takes over.
 */
export function rateLimit(
  settings: RateLimitSettings,
  now: () => number = Date.now,
): RateLimiter {
  const buckets = new Map<string, Bucket>()
  const refillRate = settings.max / (settings.windowMs / 1000)
  let redisClient: RedisClient | null = null
  let redisConnecting: Promise<RedisClient | null> | null = null

  async function getRedis(): Promise<RedisClient | null> {
    if (redisClient) return redisClient
    if (!redisConnecting) {
      redisConnecting = (async () => {
        try {
          const c: RedisClient = createClient({
            url: settings.redisUrl,
            socket: { connectTimeout: 2_000, reconnectStrategy: false },
          })
          c.on('error', (e) => {
            logEvent('ratelimit:redis-error', { error: errorMessage(e) }, 'warn')
          })
          await c.connect()
          redisClient = c
          return c
        } catch (e) {
          logEvent('ratelimit:redis-unavailable', { error: errorMessage(e) }, 'warn')
          return null
        } finally {
          redisConnecting = null
        }
      })()
    }
    return redisConnecting
  }

  async function allowRedis(key: string): Promise<boolean | null> {
    const r = await getRedis()
    if (!r) return null
    const ttl = Math.ceil(settings.windowMs / 1000)
    try {
      const val = await r.incr(`rl:${key}`)
      if (val === 1) await r.expire(`rl:${key}`, ttl)
      return val <= settings.max
    } catch (e) {
      logEvent('ratelimit:redis-fallback', { error: errorMessage(e) }, 'warn')
      // reconnect on the next request
      if (redisClient === r) redisClient = null
      return null
    }
  }

  function allowMemory(key: string): boolean {
    const t = now()
    let b = buckets.get(key)
    if (!b) {
      b = { tokens: settings.max, last: t }
      buckets.set(key, b)
    }
    const elapsed = (t - b.last) / 1000
    b.tokens = Math.min(settings.max, b.tokens + elapsed * refillRate)
    b.last = t
    if (b.tokens >= 1) {
      b.tokens -= 1
      return true
    }
    return false
  }

  const handler = (req: Request, res: Response, next: NextFunction): void => {
    if (!settings.enabled) return next()
    const key = clientKey(req)
    const decide =
      settings.provider === 'redis'
        ? allowRedis(key).then((ok) => ok ?? allowMemory(key))
        : Promise.resolve(allowMemory(key))
    decide
      .then((ok) => {
        if (ok) return next()
        logEvent('ratelimit:rejected', { key, path: req.path }, 'warn')
        res.status(429).json({ error: 'rate_limited' })
      })
      .catch(next)
  }

  return Object.assign(handler, {
    async close(): Promise<void> {
      const c = redisClient
      redisClient = null
      if (c) await c.quit()
    },
  })
}
