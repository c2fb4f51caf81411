/**
 * Wiring shared by CLI commands. Commands take a context so tests can swap
 * the store, source and validator for in-process stand-ins.
 */

import { createRedisClient, getRedisConnectionInfo, warmupRedis } from '@topicsweep/redis'
import type { UrlValidator } from '../collector/collector.js'
import type { CollectorSettings, SourceKind } from '../config/settings.js'
import { loggers } from '../config/logger.js'
import { StoreUnavailableError } from '../lib/errors.js'
import { createCandidateSource, type CandidateSource, type SourceConfig } from '../sources/index.js'
import { RedisStoreBackend } from '../store/backend.js'
import { FingerprintStore } from '../store/fingerprint-store.js'
import { LinkValidator } from '../validator/link-validator.js'

const log = loggers.cli

export interface CommandContext {
  env: Record<string, string | undefined>
  /** stdout sink for summaries and listings */
  out: (text: string) => void
  openStore(settings: CollectorSettings): Promise<FingerprintStore>
  createSource(config: SourceConfig): CandidateSource
  createValidator(settings: CollectorSettings): UrlValidator
  clock?: () => Date
  sleep?: (ms: number) => Promise<void>
}

export function buildSourceConfig(settings: CollectorSettings, kind: SourceKind): SourceConfig {
  const webSearch = {
    kind: 'web-search' as const,
    timeoutMs: settings.search.timeoutMs,
    maxResults: settings.search.maxResults,
    keywords: settings.search.keywords,
  }
  const curated = {
    kind: 'curated' as const,
    topic: settings.topic,
    maxResults: settings.search.maxResults,
  }

  switch (kind) {
    case 'web-search':
      return webSearch
    case 'curated':
      return curated
    case 'fallback':
      return { kind: 'fallback', primary: webSearch, secondary: curated }
  }
}

/**
 * Warm up, connect and ping the store.
 *
 * @throws StoreUnavailableError
 */
export async function openRedisStore(settings: CollectorSettings): Promise<FingerprintStore> {
  const connection = getRedisConnectionInfo(settings.redis)
  if (!(await warmupRedis(settings.redis, { maxAttempts: 2 }))) {
    throw new StoreUnavailableError('connect', { cause: new Error(`cannot reach ${connection}`) })
  }

  const store = new FingerprintStore(new RedisStoreBackend(createRedisClient(settings.redis)), settings.namespace)
  try {
    await store.ping()
  } catch (error) {
    await store.close()
    throw error
  }
  log.info('Store ready', { connection, namespace: settings.namespace })
  return store
}

export function createDefaultContext(): CommandContext {
  return {
    env: process.env,
    out: (text) => console.log(text),
    openStore: openRedisStore,
    createSource: createCandidateSource,
    createValidator: (settings) =>
      new LinkValidator({
        trustedDomains: settings.validator.trustedDomains,
        timeoutMs: settings.validator.timeoutMs,
        lenient: settings.validator.lenient,
      }),
  }
}
