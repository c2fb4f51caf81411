/**
 * Stats Recorder
 *
 * Folds a finished run into the aggregate stats hash. Read-modify-write:
 * correct for one runner per namespace, not for overlapping runs.
 */

import { recordError, type CollectionRun } from '../collector/run.js'
import { loggers } from '../config/logger.js'
import { describeCause } from '../lib/errors.js'
import type { FingerprintStore } from '../store/fingerprint-store.js'

const log = loggers.stats

export class StatsRecorder {
  constructor(private readonly store: FingerprintStore) {}

  /**
   * @returns false if the stats write failed (recorded on the run)
   */
  async flush(run: CollectionRun, at: Date): Promise<boolean> {
    try {
      await this.store.recordRunStats(run.newCount, run.attemptsUsed, at)
      log.info('Run stats recorded', { newCount: run.newCount, attempts: run.attemptsUsed })
      return true
    } catch (error) {
      const message = `Stats update failed: ${describeCause(error)}`
      log.error('Run stats not recorded', { newCount: run.newCount }, error)
      recordError(run, message)
      return false
    }
  }
}
