import { loadSettings } from '../../config/settings.js'
import { UsageError } from '../../lib/errors.js'
import type { CommandContext } from '../context.js'

export interface ListCommandOptions {
  since?: string
  limit?: number
  json: boolean
}

const RULE = '='.repeat(70)

function parseSince(value: string | undefined): Date | undefined {
  if (value === undefined) return undefined
  const date = new Date(value)
  if (Number.isNaN(date.getTime())) {
    throw new UsageError(`--since expects an ISO date, got "${value}"`)
  }
  return date
}

function field(metadata: Record<string, string>, key: string): string {
  return metadata[key] || 'N/A'
}

/**
 * Print aggregate stats and stored URLs, oldest first.
 */
export async function runListCommand(options: ListCommandOptions, context: CommandContext): Promise<number> {
  const since = parseSince(options.since)
  const settings = loadSettings(context.env)
  const store = await context.openStore(settings)

  try {
    const [stats, total, entries] = await Promise.all([
      store.readStats(),
      store.count(),
      store.readTimeline({ since, limit: options.limit }),
    ])

    if (options.json) {
      context.out(JSON.stringify({ namespace: settings.namespace, stats, total, entries }))
      return 0
    }

    const lines = [RULE, `COLLECTED URLS (${settings.namespace})`, RULE, '', 'Collection Statistics:']
    lines.push(`  Last Collection: ${stats.lastCollection ?? 'N/A'}`)
    lines.push(`  Total Collections: ${stats.totalCollections}`)
    lines.push(`  Last Added Count: ${stats.lastAddedCount}`)
    lines.push(`  Total Added: ${stats.totalAdded}`)
    lines.push('', `Total Unique URLs: ${total}`, '')

    entries.forEach((entry, index) => {
      lines.push(`${index + 1}. URL: ${entry.url ?? 'N/A'}`)
      lines.push(`   Title: ${field(entry.metadata, 'title')}`)
      lines.push(`   Source: ${field(entry.metadata, 'source')}`)
      lines.push(`   Description: ${field(entry.metadata, 'description')}`)
      lines.push(`   Collected: ${field(entry.metadata, 'collected_at')}`)
      lines.push(`   Search Query: ${field(entry.metadata, 'search_query')}`)
    })

    lines.push(RULE)
    context.out(lines.join('\n'))
    return 0
  } finally {
    await store.close()
  }
}
