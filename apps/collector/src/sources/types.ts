/**
 * Candidate Source Types
 *
 * A source yields raw (url, metadata) candidates for a query. Every call
 * returns a fresh lazy, finite sequence. Sources fail open: an error or
 * timeout ends the sequence instead of throwing.
 */

export interface RawCandidate {
  url: string
  title?: string
  description?: string
  sourceLabel: string
}

export type CandidateSourceKind = 'web-search' | 'curated' | 'fallback'

export interface CandidateSource {
  readonly kind: CandidateSourceKind
  readonly label: string
  /**
   * @param freshnessToken - epoch seconds; varies output between runs
   */
  fetch(query: string, freshnessToken: number): AsyncIterable<RawCandidate>
}

export interface WebSearchSourceConfig {
  kind: 'web-search'
  timeoutMs: number
  maxResults: number
  /** Lowercase substrings a result URL must contain; empty keeps everything */
  keywords: string[]
}

export interface CuratedSourceConfig {
  kind: 'curated'
  topic: string
  maxResults: number
  /** Defaults to data/curated-sources.json */
  templates?: CuratedTemplate[]
}

export interface FallbackSourceConfig {
  kind: 'fallback'
  primary: WebSearchSourceConfig | CuratedSourceConfig
  secondary: WebSearchSourceConfig | CuratedSourceConfig
}

export type SourceConfig = WebSearchSourceConfig | CuratedSourceConfig | FallbackSourceConfig

/**
 * A curated URL template. Placeholders:
 * - {token}    freshness token
 * - {token%N}  freshness token modulo N
 * - {query}    URL-encoded query
 */
export interface CuratedTemplate {
  url: string
  title?: string
}

export const DEFAULT_SEARCH_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9',
} as const
