import { Collector } from '../../collector/collector.js'
import { buildQueries } from '../../collector/queries.js'
import { createRun, recordError, type CollectionRun } from '../../collector/run.js'
import { loggers } from '../../config/logger.js'
import { loadSettings, type CollectionMode, type SourceKind } from '../../config/settings.js'
import { RunAbortedError, StoreUnavailableError } from '../../lib/errors.js'
import { StatsRecorder } from '../../stats/recorder.js'
import type { FingerprintStore } from '../../store/fingerprint-store.js'
import { buildSourceConfig, type CommandContext } from '../context.js'
import { buildSummary, formatSummary, type StoreStatus } from '../summary.js'

const log = loggers.cli

export interface CollectCommandOptions {
  mode: CollectionMode
  targetCount?: number
  maxAttempts?: number
  source?: SourceKind
  json: boolean
}

async function countOrNull(store: FingerprintStore): Promise<number | null> {
  try {
    return await store.count()
  } catch (error) {
    log.warn('Could not count stored URLs', {}, error)
    return null
  }
}

/**
 * Run one collection cycle and print its summary.
 *
 * @returns exit code: 0 for DONE and EXHAUSTED alike, 1 when the store is
 * unreachable (the summary is still printed)
 * @throws ConfigurationError before any network activity
 */
export async function runCollectCommand(
  options: CollectCommandOptions,
  context: CommandContext
): Promise<number> {
  const settings = loadSettings(context.env)

  const queries = settings.queries ?? buildQueries(settings.topic, options.mode)
  const targetCount = options.targetCount ?? settings.targetCount
  const maxAttempts = options.maxAttempts ?? settings.maxAttempts ?? queries.length * 2
  const sourceKind = options.source ?? settings.source
  const clock = context.clock ?? (() => new Date())

  log.info('Collect command', {
    mode: options.mode,
    topic: settings.topic,
    targetCount,
    maxAttempts,
    source: sourceKind,
  })

  const print = (run: CollectionRun, storeStatus: StoreStatus, totalUrlsInStore: number | null) => {
    const summary = buildSummary(run, {
      topic: settings.topic,
      mode: options.mode,
      totalUrlsInStore,
      storeStatus,
    })
    context.out(options.json ? JSON.stringify(summary) : formatSummary(summary))
  }

  let store: FingerprintStore
  try {
    store = await context.openStore(settings)
  } catch (error) {
    if (!(error instanceof StoreUnavailableError)) throw error
    log.error('Store not reachable', { operation: error.operation }, error)
    const run = createRun(targetCount, maxAttempts, clock())
    recordError(run, `Run aborted: ${error.message}`)
    run.finishedAt = clock()
    print(run, 'UNAVAILABLE', null)
    return 1
  }

  try {
    const collector = new Collector({
      store,
      source: context.createSource(buildSourceConfig(settings, sourceKind)),
      validator: context.createValidator(settings),
      stats: new StatsRecorder(store),
      clock: context.clock,
      sleep: context.sleep,
    })

    const run = await collector.collect({
      targetCount,
      maxAttempts,
      queries,
      attemptDelayMs: settings.attemptDelayMs,
    })

    print(run, 'ACTIVE', await countOrNull(store))
    return 0
  } catch (error) {
    if (!(error instanceof RunAbortedError)) throw error
    print(error.run, 'UNAVAILABLE', null)
    return 1
  } finally {
    await store.close()
  }
}
