/**
 * Candidate source selection.
 */

import { loggers } from '../config/logger.js'
import { CuratedSource } from './curated.js'
import type { CandidateSource, RawCandidate, SourceConfig } from './types.js'
import { WebSearchSource } from './web-search.js'

const log = loggers.sources

/**
 * Yields the primary's candidates; only if it yielded nothing, the secondary's.
 */
export class FallbackSource implements CandidateSource {
  readonly kind = 'fallback' as const
  readonly label: string

  constructor(
    private readonly primary: CandidateSource,
    private readonly secondary: CandidateSource
  ) {
    this.label = `${primary.label} → ${secondary.label}`
  }

  async *fetch(query: string, freshnessToken: number): AsyncGenerator<RawCandidate> {
    let yielded = false
    for await (const candidate of this.primary.fetch(query, freshnessToken)) {
      yielded = true
      yield candidate
    }
    if (yielded) return

    log.info('Primary source empty, using fallback', {
      query,
      primary: this.primary.label,
      secondary: this.secondary.label,
    })
    yield* this.secondary.fetch(query, freshnessToken)
  }
}

export function createCandidateSource(config: SourceConfig): CandidateSource {
  switch (config.kind) {
    case 'web-search':
      return new WebSearchSource(config)
    case 'curated':
      return new CuratedSource(config)
    case 'fallback':
      return new FallbackSource(createCandidateSource(config.primary), createCandidateSource(config.secondary))
  }
}

export * from './types.js'
export { CuratedSource } from './curated.js'
export { WebSearchSource } from './web-search.js'
