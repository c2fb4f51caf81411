/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/collector/.env.local outside production. Scheduled runs (cron,
 * CI) inject variables directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'

if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
