/**
 * The persisted unit. Created once per fingerprint, never mutated.
 */
export interface URLRecord {
  rawUrl: string
  normalizedUrl: string
  fingerprint: string
  title?: string
  description?: string
  sourceLabel?: string
  searchQuery?: string
  collectedAt: Date
}

export interface CollectionStats {
  /** ISO timestamp of the last finished run */
  lastCollection: string | null
  totalCollections: number
  lastAddedCount: number
  totalAdded: number
  lastAttempts: number
}

export interface TimelineEntry {
  fingerprint: string
  collectedAtEpoch: number
  url: string | null
  metadata: Record<string, string>
}
