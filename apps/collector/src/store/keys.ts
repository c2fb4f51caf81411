/**
 * Key families for one store namespace.
 */
export interface StoreKeys {
  /** Set of every known fingerprint */
  urls: string
  /** Sorted set: fingerprint scored by collected_at epoch seconds */
  timeline: string
  /** Hash of aggregate run counters */
  stats: string
  /** String holding the normalized URL */
  url(fingerprint: string): string
  /** Hash of per-record metadata */
  metadata(fingerprint: string): string
}

export function storeKeys(namespace: string): StoreKeys {
  return {
    urls: `${namespace}:urls`,
    timeline: `${namespace}:urls:timeline`,
    stats: `${namespace}:stats`,
    url: (fingerprint) => `${namespace}:url:${fingerprint}`,
    metadata: (fingerprint) => `${namespace}:url:${fingerprint}:metadata`,
  }
}
