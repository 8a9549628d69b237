/**
 * GC Throttle
 *
 * Runs garbage collection at most once per interval. The last attempt is
 * persisted per repository at `<cacheDir>/<repo>.last_gc` as a bare decimal
 * Unix timestamp. The timestamp is written before GC starts, so a collection
 * that crashes or hangs is not retried on every following run.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { GcOutcome, RepoName } from '@txpublish/core'
import type { Logger } from '../logger'
import { GC_RETENTION_WINDOW, type StorageTool } from '../storage/storage-tool'

export interface GcThrottleConfig {
  repo: RepoName

  /** Directory holding the timestamp file. */
  cacheDir: string

  /** Minimum minutes between collections. */
  intervalMinutes: number

  /**
   * Clock returning Unix seconds.
   * @default () => Math.floor(Date.now() / 1000)
   */
  now?: () => number
}

export interface GcRunOptions {
  /** Collect even when the interval has not elapsed. */
  force?: boolean
}

/**
 * Parse persisted GC state. Anything but a non-negative integer reads as 0
 * (never run), which forces a collection.
 */
export function parseLastRun(content: string): number {
  const trimmed = content.trim()
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : 0
}

/**
 * Path of the timestamp file for a repository.
 */
export function gcStatePath(cacheDir: string, repo: RepoName): string {
  return join(cacheDir, `${repo}.last_gc`)
}

export class GcThrottle {
  private _log: Logger
  private now: () => number

  constructor(
    private readonly storage: StorageTool,
    private readonly config: GcThrottleConfig,
    logger: Logger,
  ) {
    this._log = logger.child({ component: 'GcThrottle' })
    this.now = config.now ?? (() => Math.floor(Date.now() / 1000))
  }

  get statePath(): string {
    return gcStatePath(this.config.cacheDir, this.config.repo)
  }

  /**
   * Collect garbage if the interval has elapsed. Never throws: GC must not
   * block publication, so every failure is logged and reported as `failed`.
   * State that cannot be read counts as no prior run, and state that cannot
   * be written does not hold the collection back.
   */
  async run(options: GcRunOptions = {}): Promise<GcOutcome> {
    const lastRun = await this.readLastRun()
    const now = this.now()
    const elapsed = now - lastRun
    const interval = this.config.intervalMinutes * 60
    const force = options.force ?? false

    if (!force && elapsed < interval) {
      this._log.info({ lastRun, elapsed, interval }, 'GC interval not elapsed, skipping')
      return 'skipped'
    }

    await this.writeLastRun(now)
    this._log.info({ lastRun, elapsed, interval, force }, 'Running GC')

    try {
      const result = await this.storage.gc(this.config.repo, GC_RETENTION_WINDOW)
      if (result.exitCode !== 0) {
        this._log.warn({ exitCode: result.exitCode, stderr: result.stderr.trim() }, 'GC failed')
        return 'failed'
      }
    } catch (err) {
      this._log.warn({ err }, 'GC could not be started')
      return 'failed'
    }

    this._log.info({ retention: GC_RETENTION_WINDOW }, 'GC completed')
    return 'collected'
  }

  /**
   * Timestamp of the last attempt; 0 when absent, corrupt or unreadable.
   */
  private async readLastRun(): Promise<number> {
    try {
      return parseLastRun(await readFile(this.statePath, 'utf-8'))
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        this._log.info({ path: this.statePath }, 'No GC state yet, creating it')
      } else {
        this._log.warn({ err, path: this.statePath }, 'Could not read GC state, treating as never run')
      }
      return 0
    }
  }

  private async writeLastRun(now: number): Promise<void> {
    try {
      await mkdir(this.config.cacheDir, { recursive: true })
      await writeFile(this.statePath, String(now), 'utf-8')
    } catch (err) {
      this._log.warn({ err, path: this.statePath }, 'Could not record GC start time')
    }
  }
}
