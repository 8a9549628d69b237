/**
 * Sync Job Runner
 *
 * Turns a SyncJobSpec into one invocation of the synchronization tool and
 * reports its exit status. The runner does not decide what a non-zero exit
 * means; the orchestrator does.
 */

import type { SyncJobSpec } from '@txpublish/core'
import type { Logger } from '../logger'
import type { CommandRunner } from '../process/runner'

/**
 * Result of one sync job.
 */
export interface SyncResult {
  /** Name of the job. */
  job: string

  /** Whether the tool exited 0. */
  success: boolean

  /** Exit code of the sync tool. */
  exitCode: number

  /** Duration of the job in milliseconds. */
  duration: number
}

export interface SyncJobRunnerConfig {
  /**
   * Path to the sync tool.
   * @example '/usr/bin/repo-sync'
   */
  syncPath: string

  /**
   * Environment handed to the tool, e.g. the credential location.
   */
  env?: Record<string, string>
}

/**
 * Build the sync tool's argument list for a job.
 *
 * Flags come first, each omitted when unset or empty, followed by the source
 * (`primary` or `primary,secondary`) and the destination.
 */
export function buildSyncArgs(job: SyncJobSpec): string[] {
  const args: string[] = []

  if (job.concurrency !== undefined) {
    args.push('--concurrency', String(job.concurrency))
  }
  if (job.metadataConcurrency !== undefined) {
    args.push('--metadata-concurrency', String(job.metadataConcurrency))
  }
  if (job.maxTime !== undefined) {
    args.push('--max-time', String(job.maxTime))
  }
  if (job.ignore.length > 0) {
    args.push('--ignore', job.ignore.join(','))
  }
  if (job.include.length > 0) {
    args.push('--include', job.include.join(','))
  }

  args.push(job.secondarySource ? `${job.source},${job.secondarySource}` : job.source)
  args.push(job.destination)

  return args
}

export class SyncJobRunner {
  constructor(
    private readonly runner: CommandRunner,
    private readonly config: SyncJobRunnerConfig,
  ) {}

  /**
   * Full command line for a job, tool first.
   */
  commandLine(job: SyncJobSpec): string[] {
    return [this.config.syncPath, ...buildSyncArgs(job)]
  }

  /**
   * Run one job to completion. Rejects only when the tool cannot be launched.
   *
   * @param logger - Job-scoped logger, e.g. `logger.child({ job: job.name })`
   */
  async run(job: SyncJobSpec, logger: Logger): Promise<SyncResult> {
    const args = buildSyncArgs(job)
    logger.info({ command: this.config.syncPath, args }, 'Starting sync job')

    const result = await this.runner.run(this.config.syncPath, args, {
      env: this.config.env,
      passthrough: true,
    })

    logger.info({ exitCode: result.exitCode, duration: result.duration }, 'Sync job finished')
    return {
      job: job.name,
      success: result.exitCode === 0,
      exitCode: result.exitCode,
      duration: result.duration,
    }
  }
}
