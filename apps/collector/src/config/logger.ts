/**
 * Collector Logger Configuration
 */

import { createLogger } from '@topicsweep/logger'

export const logger = createLogger('collector')

export const loggers = {
  collector: logger.child('loop'),
  store: logger.child('store'),
  sources: logger.child('sources'),
  validator: logger.child('validator'),
  stats: logger.child('stats'),
  cli: logger.child('cli'),
}
