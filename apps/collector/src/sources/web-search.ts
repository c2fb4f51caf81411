/**
 * Web Search Source
 *
 * Scrapes the DuckDuckGo HTML endpoint (no API key). Result anchors point at
 * a redirect carrying the target in its `uddg` parameter.
 */

import * as cheerio from 'cheerio'
import { loggers } from '../config/logger.js'
import { DEFAULT_SEARCH_HEADERS, type CandidateSource, type RawCandidate, type WebSearchSourceConfig } from './types.js'

const log = loggers.sources.child('web-search')

export const WEB_SEARCH_LABEL = 'Web Search'
export const SEARCH_ENDPOINT = 'https://html.duckduckgo.com/html/'

export interface SearchHit {
  url: string
  title: string
  snippet: string
}

/**
 * Resolve a result href to its destination, or null when it is not a result.
 */
export function unwrapResultHref(href: string): string | null {
  let parsed: URL
  try {
    parsed = new URL(href, 'https://duckduckgo.com')
  } catch {
    return null
  }
  const target = parsed.searchParams.get('uddg')
  if (target) return target
  if (parsed.hostname.endsWith('duckduckgo.com')) return null
  return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed.toString() : null
}

/**
 * Extract result links from a results page, in page order, first hit per URL.
 */
export function parseSearchResults(html: string): SearchHit[] {
  const $ = cheerio.load(html)
  const hits: SearchHit[] = []
  const seen = new Set<string>()

  $('a.result__a, a[href*="uddg="]').each((_, element) => {
    const anchor = $(element)
    const href = anchor.attr('href')
    if (!href) return
    const url = unwrapResultHref(href)
    if (!url || seen.has(url)) return
    seen.add(url)
    hits.push({
      url,
      title: anchor.text().trim(),
      snippet: anchor.closest('.result').find('.result__snippet').first().text().trim(),
    })
  })

  return hits
}

export function matchesKeywords(url: string, keywords: readonly string[]): boolean {
  if (keywords.length === 0) return true
  const lower = url.toLowerCase()
  return keywords.some((keyword) => lower.includes(keyword))
}

export class WebSearchSource implements CandidateSource {
  readonly kind = 'web-search' as const
  readonly label = WEB_SEARCH_LABEL

  constructor(private readonly config: WebSearchSourceConfig) {}

  async *fetch(query: string, _freshnessToken: number): AsyncGenerator<RawCandidate> {
    const html = await this.fetchResultsPage(query)
    if (html === null) return

    let yielded = 0
    for (const hit of parseSearchResults(html)) {
      if (yielded >= this.config.maxResults) return
      if (!matchesKeywords(hit.url, this.config.keywords)) continue
      yielded++
      yield {
        url: hit.url,
        title: hit.title || `Search result for: ${query}`,
        description: hit.snippet || 'Found via web search',
        sourceLabel: WEB_SEARCH_LABEL,
      }
    }
  }

  /**
   * @returns page HTML, or null on any failure (logged)
   */
  private async fetchResultsPage(query: string): Promise<string | null> {
    const url = new URL(SEARCH_ENDPOINT)
    url.searchParams.set('q', query)

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs)

    try {
      const response = await fetch(url.toString(), {
        method: 'GET',
        headers: { ...DEFAULT_SEARCH_HEADERS },
        signal: controller.signal,
        redirect: 'follow',
      })
      if (!response.ok) {
        log.warn('Search request failed', { query, status: response.status })
        return null
      }
      return await response.text()
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        log.warn('Search request timed out', { query, timeoutMs: this.config.timeoutMs })
      } else {
        log.warn('Search request errored', { query }, error)
      }
      return null
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
