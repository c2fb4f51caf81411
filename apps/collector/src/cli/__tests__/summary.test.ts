import { describe, expect, it } from 'vitest'
import { createRun, finish, recordError, transition } from '../../collector/run'
import { buildSummary, formatSummary } from '../summary'

const RULE = '='.repeat(60)

function sampleRun(errors: string[] = []) {
  const run = createRun(5, 12, new Date('2024-03-01T11:59:00.000Z'))
  transition(run, 'SEARCHING')
  run.attemptsUsed = 3
  run.sourcesQueried = 3
  run.discoveredCount = 14
  run.duplicateCount = 6
  run.rejectedCount = 2
  run.newCount = 5
  for (const error of errors) recordError(run, error)
  finish(run, new Date('2024-03-01T12:00:00.000Z'))
  return run
}

describe('buildSummary', () => {
  it('copies run counters and context', () => {
    expect(
      buildSummary(sampleRun(['oops']), {
        topic: 'TypeScript',
        mode: 'articles',
        totalUrlsInStore: 42,
        storeStatus: 'ACTIVE',
      })
    ).toEqual({
      timestamp: '2024-03-01T12:00:00.000Z',
      topic: 'TypeScript',
      mode: 'articles',
      state: 'DONE',
      targetCount: 5,
      attempts: 3,
      sourcesQueried: 3,
      urlsDiscovered: 14,
      duplicatesFiltered: 6,
      rejected: 2,
      newUrlsAdded: 5,
      totalUrlsInStore: 42,
      storeStatus: 'ACTIVE',
      errors: ['oops'],
    })
  })
})

describe('formatSummary', () => {
  it('renders the summary block', () => {
    const summary = buildSummary(sampleRun(), {
      topic: 'TypeScript',
      mode: 'both',
      totalUrlsInStore: 42,
      storeStatus: 'ACTIVE',
    })

    expect(formatSummary(summary).split('\n')).toEqual([
      RULE,
      'COLLECTION CYCLE SUMMARY',
      RULE,
      'Timestamp:           2024-03-01T12:00:00.000Z',
      'Topic:               TypeScript',
      'Mode:                both',
      'State:               DONE',
      'Sources Queried:     3',
      'URLs Discovered:     14',
      'Duplicates Filtered: 6',
      'Rejected:            2',
      'New URLs Added:      5/5',
      'Total URLs in DB:    42',
      'Store Connection:    ACTIVE',
      '',
      'Errors:              None',
      RULE,
    ])
  })

  it('shows Unknown when the store count is unavailable', () => {
    const summary = buildSummary(sampleRun(), {
      topic: 'TypeScript',
      mode: 'both',
      totalUrlsInStore: null,
      storeStatus: 'ACTIVE',
    })

    expect(formatSummary(summary).split('\n')[12]).toBe('Total URLs in DB:    Unknown')
  })

  it('lists the first five errors and counts the rest', () => {
    const errors = ['e1', 'e2', 'e3', 'e4', 'e5', 'e6', 'e7']
    const summary = buildSummary(sampleRun(errors), {
      topic: 'TypeScript',
      mode: 'both',
      totalUrlsInStore: 42,
      storeStatus: 'ACTIVE',
    })

    expect(formatSummary(summary).split('\n').slice(15)).toEqual([
      'Errors (7):',
      '  - e1',
      '  - e2',
      '  - e3',
      '  - e4',
      '  - e5',
      '  ... and 2 more',
      RULE,
    ])
  })

  it('labels a run that never reached a terminal state ABORTED', () => {
    const run = createRun(5, 12, new Date('2024-03-01T11:59:00.000Z'))
    transition(run, 'SEARCHING')
    recordError(run, 'Run aborted: Store unavailable during exists: Connection is closed.')
    run.finishedAt = new Date('2024-03-01T12:00:00.000Z')

    const summary = buildSummary(run, {
      topic: 'TypeScript',
      mode: 'both',
      totalUrlsInStore: null,
      storeStatus: 'UNAVAILABLE',
    })

    expect(summary.state).toBe('ABORTED')
    expect(formatSummary(summary).split('\n')[6]).toBe('State:               ABORTED')
    expect(formatSummary(summary).split('\n')[13]).toBe('Store Connection:    UNAVAILABLE')
  })
})
