/**
 * Structured Logger
 *
 * Creates the pino logger shared by every component of a run. Logs go to
 * stderr as JSON so stdout stays free for command output (`validate`).
 * Components derive their own child logger, e.g. `logger.child({ component: 'GcThrottle' })`.
 */

import pino from 'pino'

export type Logger = pino.Logger

export function createLogger(level = 'info'): Logger {
  return pino({ level, base: { app: 'txpublish' } }, pino.destination(2))
}
