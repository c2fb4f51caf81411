/**
 * URL Normalization
 *
 * Rules, in order:
 * 1. Lowercase scheme and host
 * 2. Enforce https (upgrade http)
 * 3. Strip leading `www.` labels while a registrable domain remains
 * 4. Remove fragment identifiers (#...)
 *
 * Path and query are left as discovered. Query parameters are not sorted and
 * tracking parameters are not removed, so `?utm_source=a` and `?utm_source=b`
 * stay distinct.
 */

import { createHash } from 'crypto'
import psl from 'psl'
import { InvalidUrlError } from '../lib/errors.js'

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:'])

/**
 * `www.www.example.com` → `example.com`, but `www.com` stays as is.
 */
function stripWwwLabels(hostname: string): string {
  let host = hostname
  while (host.startsWith('www.') && psl.get(host.slice(4)) !== null) {
    host = host.slice(4)
  }
  return host
}

/**
 * Canonicalize a URL into its comparison key.
 *
 * @throws InvalidUrlError if the URL cannot be parsed or is not http(s)
 */
export function normalizeUrl(rawUrl: string): string {
  let parsed: URL
  try {
    parsed = new URL(rawUrl.trim())
  } catch {
    throw new InvalidUrlError(rawUrl, 'unparseable')
  }

  if (!SUPPORTED_PROTOCOLS.has(parsed.protocol)) {
    throw new InvalidUrlError(rawUrl, `unsupported scheme ${parsed.protocol}`)
  }
  if (!parsed.hostname) {
    throw new InvalidUrlError(rawUrl, 'missing host')
  }

  // WHATWG URL already lowercases scheme and host. Switching to https clears
  // an explicit :443; http's default :80 was never kept.
  parsed.protocol = 'https:'

  parsed.hostname = stripWwwLabels(parsed.hostname)

  parsed.hash = ''

  return parsed.toString()
}

/**
 * SHA-256 of the normalized URL, hex encoded (64 chars).
 */
export function fingerprintUrl(normalizedUrl: string): string {
  return createHash('sha256').update(normalizedUrl).digest('hex')
}

export interface NormalizedUrl {
  rawUrl: string
  normalizedUrl: string
  fingerprint: string
}

/**
 * Normalize and fingerprint in one step.
 *
 * @throws InvalidUrlError
 */
export function fingerprintOf(rawUrl: string): NormalizedUrl {
  const normalizedUrl = normalizeUrl(rawUrl)
  return {
    rawUrl,
    normalizedUrl,
    fingerprint: fingerprintUrl(normalizedUrl),
  }
}
