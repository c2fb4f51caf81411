/**
 * CollectionRun
 *
 * One execution of the collector loop. Created at INIT, mutated only by the
 * loop, flushed into aggregate stats at a terminal state and then dropped.
 */

import { CollectorError, ERROR_CODES } from '../lib/errors.js'
import type { URLRecord } from '../store/types.js'

export type RunState = 'INIT' | 'SEARCHING' | 'STORING' | 'SKIPPING' | 'DONE' | 'EXHAUSTED'

export type TerminalState = Extract<RunState, 'DONE' | 'EXHAUSTED'>

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  INIT: ['SEARCHING', 'DONE', 'EXHAUSTED'],
  SEARCHING: ['STORING', 'SKIPPING', 'SEARCHING', 'DONE', 'EXHAUSTED'],
  STORING: ['STORING', 'SKIPPING', 'SEARCHING', 'DONE', 'EXHAUSTED'],
  SKIPPING: ['STORING', 'SKIPPING', 'SEARCHING', 'DONE', 'EXHAUSTED'],
  DONE: [],
  EXHAUSTED: [],
}

export interface CollectionRun {
  readonly targetCount: number
  readonly maxAttempts: number
  state: RunState
  attemptsUsed: number
  sourcesQueried: number
  discoveredCount: number
  newCount: number
  duplicateCount: number
  rejectedCount: number
  errorCount: number
  errors: string[]
  stored: URLRecord[]
  readonly startedAt: Date
  finishedAt: Date | null
}

export function createRun(targetCount: number, maxAttempts: number, startedAt: Date): CollectionRun {
  return {
    targetCount,
    maxAttempts,
    state: 'INIT',
    attemptsUsed: 0,
    sourcesQueried: 0,
    discoveredCount: 0,
    newCount: 0,
    duplicateCount: 0,
    rejectedCount: 0,
    errorCount: 0,
    errors: [],
    stored: [],
    startedAt,
    finishedAt: null,
  }
}

/** A loop bug, never an expected condition */
export class IllegalTransitionError extends CollectorError {
  readonly code = ERROR_CODES.ILLEGAL_TRANSITION
  readonly isOperational = false

  constructor(from: RunState, to: RunState) {
    super(`Illegal run transition ${from} → ${to}`)
  }
}

export function transition(run: CollectionRun, next: RunState): void {
  if (!TRANSITIONS[run.state].includes(next)) {
    throw new IllegalTransitionError(run.state, next)
  }
  run.state = next
}

export function isTerminal(state: RunState): state is TerminalState {
  return state === 'DONE' || state === 'EXHAUSTED'
}

export function recordError(run: CollectionRun, message: string): void {
  run.errorCount++
  run.errors.push(message)
}

export function finish(run: CollectionRun, finishedAt: Date): TerminalState {
  const terminal: TerminalState = run.newCount >= run.targetCount ? 'DONE' : 'EXHAUSTED'
  transition(run, terminal)
  run.finishedAt = finishedAt
  return terminal
}
