/**
 * @topicsweep/redis - Redis connection utilities
 *
 * Builds ioredis options from an explicit connection config so callers
 * validate configuration before any socket is opened. The collector is a
 * short-lived CLI: commands fail fast instead of queueing forever while the
 * store is unreachable.
 */

import Redis, { type RedisOptions } from 'ioredis'
import { createLogger } from '@topicsweep/logger'

const log = createLogger('redis')

export interface RedisConnectionConfig {
  host: string
  port: number
  password?: string
  username?: string
  /** Managed Redis providers (e.g. Upstash) require TLS */
  tls: boolean
}

export interface RedisClientOptions {
  /** Reconnect attempts before the client gives up (default: 3) */
  maxReconnectAttempts?: number
  connectTimeoutMs?: number
  commandTimeoutMs?: number
}

const RECONNECT_ERRORS = [
  'READONLY',
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
]

/**
 * Parse a redis:// or rediss:// URL into a connection config.
 * The rediss scheme turns TLS on.
 */
export function parseRedisUrl(redisUrl: string): RedisConnectionConfig {
  const url = new URL(redisUrl)
  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') {
    throw new Error(`Unsupported Redis URL scheme: ${url.protocol}`)
  }
  return {
    host: url.hostname,
    port: parseInt(url.port || '6379', 10),
    password: url.password ? decodeURIComponent(url.password) : undefined,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    tls: url.protocol === 'rediss:',
  }
}

/**
 * Connection info for logging (password never included).
 */
export function getRedisConnectionInfo(config: RedisConnectionConfig): string {
  const auth = config.password ? '***@' : ''
  return `${config.tls ? 'rediss' : 'redis'}://${auth}${config.host}:${config.port}`
}

/**
 * ioredis options with keepalive, bounded timeouts and capped backoff.
 */
export function buildRedisOptions(
  config: RedisConnectionConfig,
  options: RedisClientOptions = {}
): RedisOptions {
  const maxReconnectAttempts = options.maxReconnectAttempts ?? 3
  const connectionInfo = getRedisConnectionInfo(config)

  return {
    host: config.host,
    port: config.port,
    password: config.password,
    username: config.username,
    tls: config.tls ? { servername: config.host } : undefined,

    // One retry per command, then surface the error to the caller
    maxRetriesPerRequest: 1,

    keepAlive: 10000,
    connectTimeout: options.connectTimeoutMs ?? 5000,
    commandTimeout: options.commandTimeoutMs ?? 10000,

    retryStrategy(times: number) {
      if (times > maxReconnectAttempts) {
        log.error('Giving up on reconnect', { attempts: times, connection: connectionInfo })
        return null
      }
      const delay = Math.min(times * 500, 5000)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },

    reconnectOnError(err: Error) {
      if (RECONNECT_ERRORS.some((e) => err.message.includes(e))) {
        log.warn('Reconnecting due to error', { error: err.message })
        return true
      }
      return false
    },
  }
}

/**
 * Create a dedicated client. The caller owns it and must quit() it.
 */
export function createRedisClient(
  config: RedisConnectionConfig,
  options: RedisClientOptions = {}
): Redis {
  const client = new Redis(buildRedisOptions(config, options))
  const connectionInfo = getRedisConnectionInfo(config)

  client.on('error', (err: Error) => {
    log.error('Connection error', { connection: connectionInfo, error: err.message })
  })
  client.on('connect', () => {
    log.info('Connected', { connection: connectionInfo })
  })

  return client
}

export interface WarmupOptions {
  maxAttempts?: number
  /** First retry delay, doubled per attempt (default: 1000) */
  baseDelayMs?: number
}

/**
 * Ping the store with retries before a run starts.
 *
 * @returns true if a PING succeeded, false after all attempts failed
 */
export async function warmupRedis(
  config: RedisConnectionConfig,
  options: WarmupOptions = {}
): Promise<boolean> {
  const maxAttempts = options.maxAttempts ?? 3
  const baseDelayMs = options.baseDelayMs ?? 1000
  const connectionInfo = getRedisConnectionInfo(config)

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const client = new Redis({
      ...buildRedisOptions(config),
      maxRetriesPerRequest: 1,
      retryStrategy: () => null,
      lazyConnect: true,
    })

    try {
      log.info('Warmup attempt', { attempt, maxAttempts, connection: connectionInfo })
      await client.connect()
      await client.ping()
      log.info('Warmup successful')
      return true
    } catch (error) {
      log.warn('Warmup failed', { attempt, error: error instanceof Error ? error.message : String(error) })
    } finally {
      client.disconnect()
    }

    if (attempt < maxAttempts) {
      const delayMs = Math.min(baseDelayMs * Math.pow(2, attempt - 1), 30000)
      await new Promise((resolve) => setTimeout(resolve, delayMs))
    }
  }

  log.error('Warmup failed after all attempts', { maxAttempts, connection: connectionInfo })
  return false
}

export { Redis }
export type { RedisOptions }
