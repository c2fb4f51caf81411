/**
 * Collector Loop
 *
 * INIT → SEARCHING → {STORING, SKIPPING} → (loop) → DONE | EXHAUSTED
 *
 * Cycles the query list round-robin, pulling candidates until targetCount
 * new unique URLs are stored or maxAttempts attempts are used. Candidates are
 * handled one at a time in source order; the first occurrence of a
 * fingerprint within a run wins.
 *
 * Only a store outage escapes, as RunAbortedError carrying the partial run.
 * Everything else is tallied on the run.
 */

import { loggers } from '../config/logger.js'
import {
  ConfigurationError,
  InvalidUrlError,
  RunAbortedError,
  StoreUnavailableError,
  StoreWriteError,
  describeCause,
} from '../lib/errors.js'
import { fingerprintOf, type NormalizedUrl } from '../normalizer/url.js'
import type { CandidateSource, RawCandidate } from '../sources/types.js'
import type { StatsRecorder } from '../stats/recorder.js'
import type { FingerprintStore } from '../store/fingerprint-store.js'
import type { URLRecord } from '../store/types.js'
import { createRun, finish, recordError, transition, type CollectionRun } from './run.js'

const log = loggers.collector

export interface UrlValidator {
  isAcceptable(url: string): Promise<boolean>
}

export interface CollectorDeps {
  store: FingerprintStore
  source: CandidateSource
  validator: UrlValidator
  stats: StatsRecorder
  /** Source of timestamps and freshness tokens */
  clock?: () => Date
  sleep?: (ms: number) => Promise<void>
}

export interface CollectOptions {
  targetCount: number
  maxAttempts: number
  queries: readonly string[]
  /** Pause between attempts (not after the last one) */
  attemptDelayMs?: number
}

type CandidateOutcome = 'stored' | 'duplicate' | 'rejected' | 'invalid' | 'write_failed'

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

export class Collector {
  private readonly clock: () => Date
  private readonly sleep: (ms: number) => Promise<void>

  constructor(private readonly deps: CollectorDeps) {
    this.clock = deps.clock ?? (() => new Date())
    this.sleep = deps.sleep ?? defaultSleep
  }

  /**
   * @throws RunAbortedError when the store cannot be reached (stats are not flushed)
   */
  async collect(options: CollectOptions): Promise<CollectionRun> {
    const { targetCount, maxAttempts, queries } = options
    if (queries.length === 0) {
      throw new ConfigurationError(['queries: at least one query is required'])
    }

    const run = createRun(targetCount, maxAttempts, this.clock())
    const seen = new Set<string>()

    log.info('Collection started', {
      targetCount,
      maxAttempts,
      queries: queries.length,
      source: this.deps.source.label,
    })

    try {
      while (run.newCount < targetCount && run.attemptsUsed < maxAttempts) {
        const query = queries[run.attemptsUsed % queries.length]
        const freshnessToken = Math.floor(this.clock().getTime() / 1000)

        transition(run, 'SEARCHING')
        run.sourcesQueried++
        log.info('Attempt started', {
          attempt: run.attemptsUsed + 1,
          query,
          remaining: targetCount - run.newCount,
        })

        await this.runAttempt(run, query, freshnessToken, seen)

        run.attemptsUsed++

        if (run.newCount < targetCount && run.attemptsUsed < maxAttempts && options.attemptDelayMs) {
          await this.sleep(options.attemptDelayMs)
        }
      }
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error
      recordError(run, `Run aborted: ${error.message}`)
      run.finishedAt = this.clock()
      log.error('Collection aborted', { operation: error.operation, newCount: run.newCount }, error)
      throw new RunAbortedError(run, error)
    }

    const terminal = finish(run, this.clock())
    await this.deps.stats.flush(run, run.finishedAt ?? this.clock())

    log.info('Collection finished', {
      state: terminal,
      newCount: run.newCount,
      duplicateCount: run.duplicateCount,
      rejectedCount: run.rejectedCount,
      errorCount: run.errorCount,
      attempts: run.attemptsUsed,
    })
    if (terminal === 'EXHAUSTED') {
      log.warn('Target not reached', { newCount: run.newCount, targetCount })
    }

    return run
  }

  private async runAttempt(
    run: CollectionRun,
    query: string,
    freshnessToken: number,
    seen: Set<string>
  ): Promise<void> {
    try {
      for await (const candidate of this.deps.source.fetch(query, freshnessToken)) {
        const outcome = await this.processCandidate(run, candidate, query, seen)
        log.debug('Candidate processed', { url: candidate.url, outcome })
        if (run.newCount >= run.targetCount) {
          log.info('Target reached', { newCount: run.newCount })
          return
        }
      }
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error
      // Sources fail open; anything reaching here broke that contract
      log.error('Source failed', { query, source: this.deps.source.label }, error)
      recordError(run, `Search error for "${query}": ${describeCause(error)}`)
    }
  }

  private async processCandidate(
    run: CollectionRun,
    candidate: RawCandidate,
    query: string,
    seen: Set<string>
  ): Promise<CandidateOutcome> {
    run.discoveredCount++

    let normalized: NormalizedUrl
    try {
      normalized = fingerprintOf(candidate.url)
    } catch (error) {
      if (!(error instanceof InvalidUrlError)) throw error
      transition(run, 'SKIPPING')
      recordError(run, error.message)
      return 'invalid'
    }

    const { fingerprint } = normalized
    if (seen.has(fingerprint) || (await this.deps.store.exists(fingerprint))) {
      transition(run, 'SKIPPING')
      run.duplicateCount++
      log.debug('Duplicate', { url: normalized.normalizedUrl })
      return 'duplicate'
    }
    seen.add(fingerprint)

    if (!(await this.deps.validator.isAcceptable(normalized.rawUrl))) {
      transition(run, 'SKIPPING')
      run.rejectedCount++
      log.info('Rejected by validator', { url: normalized.rawUrl })
      return 'rejected'
    }

    const record: URLRecord = {
      ...normalized,
      title: candidate.title,
      description: candidate.description,
      sourceLabel: candidate.sourceLabel,
      searchQuery: query,
      collectedAt: this.clock(),
    }

    transition(run, 'STORING')
    try {
      await this.deps.store.put(record)
    } catch (error) {
      if (!(error instanceof StoreWriteError)) throw error
      log.warn('Store write failed', { fingerprint, committed: error.committed, failed: error.failed })
      recordError(run, `Storage error: ${error.message}`)
      return 'write_failed'
    }

    run.newCount++
    run.stored.push(record)
    log.info('Stored', { url: record.normalizedUrl, progress: `${run.newCount}/${run.targetCount}` })
    return 'stored'
  }
}
