/**
 * End-of-run summary shown on stdout.
 */

import { isTerminal, type CollectionRun, type TerminalState } from '../collector/run.js'
import type { CollectionMode } from '../config/settings.js'

export type StoreStatus = 'ACTIVE' | 'UNAVAILABLE'

/** ABORTED marks a run cut off before reaching a terminal state */
export type SummaryState = TerminalState | 'ABORTED'

export interface RunSummary {
  timestamp: string
  topic: string
  mode: CollectionMode
  state: SummaryState
  targetCount: number
  attempts: number
  sourcesQueried: number
  urlsDiscovered: number
  duplicatesFiltered: number
  rejected: number
  newUrlsAdded: number
  totalUrlsInStore: number | null
  storeStatus: StoreStatus
  errors: string[]
}

const RULE = '='.repeat(60)
const MAX_LISTED_ERRORS = 5

export function buildSummary(
  run: CollectionRun,
  context: {
    topic: string
    mode: CollectionMode
    totalUrlsInStore: number | null
    storeStatus: StoreStatus
  }
): RunSummary {
  return {
    timestamp: (run.finishedAt ?? run.startedAt).toISOString(),
    topic: context.topic,
    mode: context.mode,
    state: isTerminal(run.state) ? run.state : 'ABORTED',
    targetCount: run.targetCount,
    attempts: run.attemptsUsed,
    sourcesQueried: run.sourcesQueried,
    urlsDiscovered: run.discoveredCount,
    duplicatesFiltered: run.duplicateCount,
    rejected: run.rejectedCount,
    newUrlsAdded: run.newCount,
    totalUrlsInStore: context.totalUrlsInStore,
    storeStatus: context.storeStatus,
    errors: [...run.errors],
  }
}

function row(label: string, value: string | number): string {
  return `${`${label}:`.padEnd(21)}${value}`
}

export function formatSummary(summary: RunSummary): string {
  const lines = [
    RULE,
    'COLLECTION CYCLE SUMMARY',
    RULE,
    row('Timestamp', summary.timestamp),
    row('Topic', summary.topic),
    row('Mode', summary.mode),
    row('State', summary.state),
    row('Sources Queried', summary.sourcesQueried),
    row('URLs Discovered', summary.urlsDiscovered),
    row('Duplicates Filtered', summary.duplicatesFiltered),
    row('Rejected', summary.rejected),
    row('New URLs Added', `${summary.newUrlsAdded}/${summary.targetCount}`),
    row('Total URLs in DB', summary.totalUrlsInStore ?? 'Unknown'),
    row('Store Connection', summary.storeStatus),
    '',
  ]

  if (summary.errors.length === 0) {
    lines.push(row('Errors', 'None'))
  } else {
    lines.push(`Errors (${summary.errors.length}):`)
    for (const error of summary.errors.slice(0, MAX_LISTED_ERRORS)) {
      lines.push(`  - ${error}`)
    }
    if (summary.errors.length > MAX_LISTED_ERRORS) {
      lines.push(`  ... and ${summary.errors.length - MAX_LISTED_ERRORS} more`)
    }
  }

  lines.push(RULE)
  return lines.join('\n')
}
