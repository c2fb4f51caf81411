/**
 * Link Validator
 *
 * Trusted hosts are accepted without a request. Other URLs get a HEAD
 * (GET when HEAD is not allowed) bounded by a timeout. Timeouts and network
 * errors resolve to the configured lenient outcome; isAcceptable never throws.
 */

import psl from 'psl'
import { loggers } from '../config/logger.js'

const log = loggers.validator

export interface LinkValidatorOptions {
  trustedDomains: readonly string[]
  timeoutMs: number
  /** Outcome for timeouts and network errors */
  lenient: boolean
  userAgent?: string
}

export type ValidationOutcome =
  | 'trusted'
  | 'reachable'
  | 'unreachable'
  | 'invalid'
  | 'timeout_lenient'
  | 'timeout_strict'
  | 'error_lenient'
  | 'error_strict'

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; topicsweep/1.0)'

/** Statuses meaning "HEAD not supported here", retried as GET */
const HEAD_UNSUPPORTED = new Set([405, 501])

export class LinkValidator {
  private readonly trusted: Set<string>

  constructor(private readonly options: LinkValidatorOptions) {
    this.trusted = new Set(options.trustedDomains.map((domain) => domain.toLowerCase().replace(/^www\./, '')))
  }

  /**
   * Host equal to or under a trusted domain, or sharing its registrable domain.
   */
  isTrustedHost(hostname: string): boolean {
    const host = hostname.toLowerCase().replace(/^www\./, '')
    if (this.trusted.has(host)) return true
    for (const domain of this.trusted) {
      if (host.endsWith(`.${domain}`)) return true
    }
    const registrable = psl.get(host)
    return registrable !== null && this.trusted.has(registrable)
  }

  async isAcceptable(url: string): Promise<boolean> {
    const outcome = await this.check(url)
    log.debug('Validated', { url, outcome })
    return outcome === 'trusted' || outcome === 'reachable' || outcome.endsWith('_lenient')
  }

  async check(url: string): Promise<ValidationOutcome> {
    let parsed: URL
    try {
      parsed = new URL(url)
    } catch {
      return 'invalid'
    }
    if ((parsed.protocol !== 'http:' && parsed.protocol !== 'https:') || !parsed.hostname) {
      return 'invalid'
    }

    if (this.isTrustedHost(parsed.hostname)) {
      return 'trusted'
    }

    try {
      let status = await this.request(url, 'HEAD')
      if (HEAD_UNSUPPORTED.has(status)) {
        status = await this.request(url, 'GET')
      }
      return status < 400 ? 'reachable' : 'unreachable'
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'AbortError'
      if (timedOut) {
        log.info('Validation timed out', { url, timeoutMs: this.options.timeoutMs, lenient: this.options.lenient })
        return this.options.lenient ? 'timeout_lenient' : 'timeout_strict'
      }
      log.info('Validation errored', { url, lenient: this.options.lenient, error: String(error) })
      return this.options.lenient ? 'error_lenient' : 'error_strict'
    }
  }

  private async request(url: string, method: 'HEAD' | 'GET'): Promise<number> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs)

    try {
      const response = await fetch(url, {
        method,
        headers: { 'User-Agent': this.options.userAgent ?? DEFAULT_USER_AGENT },
        redirect: 'follow',
        signal: controller.signal,
      })
      if (method === 'GET') {
        // Only the status matters; release the connection
        await response.body?.cancel()
      }
      return response.status
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
