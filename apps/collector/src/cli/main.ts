import { setLogLevel } from '@topicsweep/logger'
import { loggers } from '../config/logger.js'
import { COLLECTION_MODES, SOURCE_KINDS } from '../config/settings.js'
import { CollectorError, UsageError, exitCodeFor } from '../lib/errors.js'
import { runCollectCommand } from './commands/collect.js'
import { runListCommand } from './commands/list.js'
import type { CommandContext } from './context.js'
import { asChoice, asCount, asString, parseFlags } from './parse-flags.js'

const log = loggers.cli

export const HELP_TEXT = [
  'topicsweep - topic URL collector',
  '',
  'Commands:',
  '  collect [--mode newsletters|articles|both] [--target N] [--max-attempts N]',
  '          [--source web-search|curated|fallback] [--json]',
  '  list    [--since <ISO date>] [--limit N] [--json]',
  '',
  '  --verbose  log at debug level',
  '',
  'Store credentials come from REDIS_HOST/REDIS_PORT/REDIS_PASSWORD or REDIS_URL.',
].join('\n')

/**
 * @returns process exit code
 */
export async function main(argv: string[], context: CommandContext): Promise<number> {
  const [command, ...rest] = argv
  const flags = parseFlags(rest)

  if (!command || command === '--help' || command === '-h' || flags.help === true) {
    context.out(HELP_TEXT)
    return 0
  }

  if (flags.verbose === true) {
    setLogLevel('debug')
  }

  try {
    switch (command) {
      case 'collect':
        return await runCollectCommand(
          {
            mode: asChoice('mode', flags.mode, COLLECTION_MODES) ?? 'both',
            targetCount: asCount('target', flags.target),
            maxAttempts: asCount('max-attempts', flags['max-attempts']),
            source: asChoice('source', flags.source, SOURCE_KINDS),
            json: flags.json === true,
          },
          context
        )
      case 'list':
        return await runListCommand(
          {
            since: asString(flags.since),
            limit: asCount('limit', flags.limit),
            json: flags.json === true,
          },
          context
        )
      default:
        throw new UsageError(`Unknown command: ${command}`)
    }
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message)
      context.out(HELP_TEXT)
    } else if (error instanceof CollectorError && error.isOperational) {
      log.error('Command failed', { code: error.code }, error)
      console.error(`[FAILED] ${error.message}`)
    } else {
      log.fatal('Unexpected failure', {}, error)
    }
    return exitCodeFor(error)
  }
}
