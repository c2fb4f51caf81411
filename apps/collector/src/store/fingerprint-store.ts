/**
 * Fingerprint Store
 *
 * Membership tests and persistence over four key families (see keys.ts).
 *
 * Writes are not transactional across keys. The fingerprint set is written
 * first and is the only structure dedup decisions read; metadata, the URL
 * string and the timeline entry may lag behind it after a partial failure.
 */

import { loggers } from '../config/logger.js'
import {
  StoreUnavailableError,
  StoreWriteError,
  isConnectionError,
} from '../lib/errors.js'
import type { StoreBackend } from './backend.js'
import { storeKeys, type StoreKeys } from './keys.js'
import type { CollectionStats, TimelineEntry, URLRecord } from './types.js'

const log = loggers.store

export interface TimelineQuery {
  /** Inclusive lower bound on collected_at */
  since?: Date
  /** Inclusive upper bound on collected_at */
  until?: Date
  limit?: number
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000)
}

function toMetadataFields(record: URLRecord): Record<string, string> {
  return {
    url: record.normalizedUrl,
    raw_url: record.rawUrl,
    title: record.title ?? '',
    description: record.description ?? '',
    source: record.sourceLabel ?? '',
    search_query: record.searchQuery ?? '',
    collected_at: record.collectedAt.toISOString(),
    hash: record.fingerprint,
  }
}

function toInt(value: string | undefined): number {
  const parsed = value === undefined ? NaN : parseInt(value, 10)
  return Number.isFinite(parsed) ? parsed : 0
}

export class FingerprintStore {
  readonly keys: StoreKeys

  constructor(
    private readonly backend: StoreBackend,
    readonly namespace: string
  ) {
    this.keys = storeKeys(namespace)
  }

  async ping(): Promise<void> {
    try {
      await this.backend.ping()
    } catch (error) {
      throw new StoreUnavailableError('ping', { cause: error })
    }
  }

  /**
   * O(1) membership test against the fingerprint set.
   *
   * @throws StoreUnavailableError on any backend failure
   */
  async exists(fingerprint: string): Promise<boolean> {
    try {
      return await this.backend.sismember(this.keys.urls, fingerprint)
    } catch (error) {
      throw new StoreUnavailableError('exists', { cause: error })
    }
  }

  /**
   * Persist a record across all key families.
   *
   * @throws StoreUnavailableError if the fingerprint set cannot be reached
   * @throws StoreWriteError if any write failed
   */
  async put(record: URLRecord): Promise<void> {
    const { fingerprint } = record
    const committed: string[] = []
    const failed: string[] = []
    let firstError: unknown

    try {
      await this.backend.sadd(this.keys.urls, fingerprint)
      committed.push('urls')
    } catch (error) {
      if (isConnectionError(error)) {
        throw new StoreUnavailableError('put', { cause: error })
      }
      throw new StoreWriteError(fingerprint, committed, ['urls'], { cause: error })
    }

    const steps: Array<[string, () => Promise<void>]> = [
      ['url', () => this.backend.set(this.keys.url(fingerprint), record.normalizedUrl)],
      ['metadata', () => this.backend.hset(this.keys.metadata(fingerprint), toMetadataFields(record))],
      [
        'timeline',
        () => this.backend.zadd(this.keys.timeline, toEpochSeconds(record.collectedAt), fingerprint),
      ],
    ]

    for (const [name, step] of steps) {
      try {
        await step()
        committed.push(name)
      } catch (error) {
        failed.push(name)
        firstError ??= error
      }
    }

    if (failed.length > 0) {
      log.warn('Partial write', { fingerprint, committed, failed })
      throw new StoreWriteError(fingerprint, committed, failed, { cause: firstError })
    }
  }

  /**
   * Increment aggregate counters and overwrite last-run fields.
   */
  async recordRunStats(newCount: number, attempts: number, at: Date = new Date()): Promise<void> {
    try {
      await this.backend.hincrby(this.keys.stats, 'total_collections', 1)
      await this.backend.hincrby(this.keys.stats, 'total_added', newCount)
      await this.backend.hset(this.keys.stats, {
        last_collection: at.toISOString(),
        last_added_count: String(newCount),
        last_attempts: String(attempts),
      })
    } catch (error) {
      throw new StoreUnavailableError('record_run_stats', { cause: error })
    }
  }

  async readStats(): Promise<CollectionStats> {
    let fields: Record<string, string>
    try {
      fields = await this.backend.hgetall(this.keys.stats)
    } catch (error) {
      throw new StoreUnavailableError('read_stats', { cause: error })
    }
    return {
      lastCollection: fields.last_collection ?? null,
      totalCollections: toInt(fields.total_collections),
      lastAddedCount: toInt(fields.last_added_count),
      totalAdded: toInt(fields.total_added),
      lastAttempts: toInt(fields.last_attempts),
    }
  }

  async count(): Promise<number> {
    try {
      return await this.backend.scard(this.keys.urls)
    } catch (error) {
      throw new StoreUnavailableError('count', { cause: error })
    }
  }

  /**
   * Chronological read over the timeline, joined with URL and metadata.
   * Entries whose URL string is missing fall back to the metadata url field.
   */
  async readTimeline(query: TimelineQuery = {}): Promise<TimelineEntry[]> {
    try {
      const members = await this.backend.zrangebyscore(this.keys.timeline, {
        min: query.since ? toEpochSeconds(query.since) : undefined,
        max: query.until ? toEpochSeconds(query.until) : undefined,
        limit: query.limit,
      })

      const entries: TimelineEntry[] = []
      for (const { member, score } of members) {
        const [url, metadata] = await Promise.all([
          this.backend.get(this.keys.url(member)),
          this.backend.hgetall(this.keys.metadata(member)),
        ])
        entries.push({
          fingerprint: member,
          collectedAtEpoch: score,
          url: url ?? metadata.url ?? null,
          metadata,
        })
      }
      return entries
    } catch (error) {
      throw new StoreUnavailableError('read_timeline', { cause: error })
    }
  }

  async close(): Promise<void> {
    try {
      await this.backend.quit()
    } catch (error) {
      log.warn('Failed to close store connection', {}, error)
    }
  }
}
