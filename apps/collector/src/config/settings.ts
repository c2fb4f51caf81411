/**
 * Collector settings, validated from the environment.
 *
 * Store credentials are required; everything else has a default. Validation
 * runs before any client is created so a misconfigured job fails without
 * touching the network.
 */

import { z } from 'zod'
import { parseRedisUrl, type RedisConnectionConfig } from '@topicsweep/redis'
import { ConfigurationError } from '../lib/errors.js'

export const COLLECTION_MODES = ['newsletters', 'articles', 'both'] as const
export type CollectionMode = (typeof COLLECTION_MODES)[number]

export const SOURCE_KINDS = ['web-search', 'curated', 'fallback'] as const
export type SourceKind = (typeof SOURCE_KINDS)[number]

export const DEFAULT_TRUSTED_DOMAINS = [
  'github.com',
  'medium.com',
  'dev.to',
  'hackernoon.com',
  'stackoverflow.com',
  'reddit.com',
  'twitter.com',
  'youtube.com',
  'producthunt.com',
  'news.ycombinator.com',
]

/** Hosts that publish long-form technical writing */
export const DEFAULT_PUBLISHER_KEYWORDS = ['github', 'medium', 'dev.to', 'hackernoon', 'substack']

export interface CollectorSettings {
  redis: RedisConnectionConfig
  namespace: string
  topic: string
  /** Explicit query list; null means derive from topic and mode */
  queries: string[] | null
  targetCount: number
  /** null means twice the number of queries */
  maxAttempts: number | null
  source: SourceKind
  attemptDelayMs: number
  search: {
    timeoutMs: number
    maxResults: number
    keywords: string[]
  }
  validator: {
    timeoutMs: number
    lenient: boolean
    trustedDomains: string[]
  }
}

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

const listString = z.string().transform((value) =>
  value
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean)
)

const envSchema = z
  .object({
    REDIS_URL: z.string().url().optional(),
    REDIS_HOST: z.string().min(1).optional(),
    REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
    REDIS_PASSWORD: z.string().min(1).optional(),
    REDIS_TLS: booleanString.default('true'),

    COLLECTOR_NAMESPACE: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, 'letters, digits, "-" and "_" only')
      .default('topicsweep'),
    COLLECTOR_TOPIC: z.string().min(1).default('TypeScript'),
    COLLECTOR_QUERIES: z.string().optional(),
    COLLECTOR_TARGET_COUNT: z.coerce.number().int().min(0).default(5),
    COLLECTOR_MAX_ATTEMPTS: z.coerce.number().int().min(1).optional(),
    COLLECTOR_SOURCE: z.enum(SOURCE_KINDS).default('fallback'),
    COLLECTOR_ATTEMPT_DELAY_MS: z.coerce.number().int().min(0).default(2000),

    SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    SEARCH_MAX_RESULTS: z.coerce.number().int().positive().default(10),
    SEARCH_KEYWORDS: listString.optional(),

    VALIDATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    VALIDATOR_LENIENT: booleanString.default('true'),
    TRUSTED_DOMAINS: listString.optional(),
  })
  .superRefine((env, ctx) => {
    if (env.REDIS_URL) return
    if (!env.REDIS_HOST) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['REDIS_HOST'], message: 'Required (or set REDIS_URL)' })
    }
    if (!env.REDIS_PASSWORD) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['REDIS_PASSWORD'], message: 'Required (or set REDIS_URL)' })
    }
  })

type ParsedEnv = z.infer<typeof envSchema>

/** Unset and empty variables are treated the same */
function dropEmpty(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim()
    }
  }
  return result
}

function resolveRedis(env: ParsedEnv): RedisConnectionConfig {
  if (env.REDIS_URL) {
    const parsed = parseRedisUrl(env.REDIS_URL)
    if (!parsed.password) {
      throw new ConfigurationError(['REDIS_URL: must include a password'])
    }
    return parsed
  }
  return {
    host: env.REDIS_HOST ?? '',
    port: env.REDIS_PORT,
    password: env.REDIS_PASSWORD,
    tls: env.REDIS_TLS,
  }
}

export function topicKeywords(topic: string): string[] {
  return topic
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length >= 3)
}

/**
 * @throws ConfigurationError listing every invalid variable
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): CollectorSettings {
  const result = envSchema.safeParse(dropEmpty(env))
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    )
  }

  const parsed = result.data
  let redis: RedisConnectionConfig
  try {
    redis = resolveRedis(parsed)
  } catch (error) {
    if (error instanceof ConfigurationError) throw error
    throw new ConfigurationError([`REDIS_URL: ${error instanceof Error ? error.message : String(error)}`])
  }

  const queries = parsed.COLLECTOR_QUERIES
    ? parsed.COLLECTOR_QUERIES.split('|').map((query) => query.trim()).filter(Boolean)
    : null

  return {
    redis,
    namespace: parsed.COLLECTOR_NAMESPACE,
    topic: parsed.COLLECTOR_TOPIC,
    queries: queries && queries.length > 0 ? queries : null,
    targetCount: parsed.COLLECTOR_TARGET_COUNT,
    maxAttempts: parsed.COLLECTOR_MAX_ATTEMPTS ?? null,
    source: parsed.COLLECTOR_SOURCE,
    attemptDelayMs: parsed.COLLECTOR_ATTEMPT_DELAY_MS,
    search: {
      timeoutMs: parsed.SEARCH_TIMEOUT_MS,
      maxResults: parsed.SEARCH_MAX_RESULTS,
      keywords:
        parsed.SEARCH_KEYWORDS ?? [...topicKeywords(parsed.COLLECTOR_TOPIC), ...DEFAULT_PUBLISHER_KEYWORDS],
    },
    validator: {
      timeoutMs: parsed.VALIDATOR_TIMEOUT_MS,
      lenient: parsed.VALIDATOR_LENIENT,
      trustedDomains: parsed.TRUSTED_DOMAINS ?? DEFAULT_TRUSTED_DOMAINS,
    },
  }
}
