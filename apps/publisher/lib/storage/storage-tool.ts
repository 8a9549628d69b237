/**
 * Storage Tool Interface
 *
 * The repository's transaction state lives entirely in the external storage
 * tool; the orchestrator observes it only through exit codes. Keeping the
 * operations behind an interface lets the orchestrator be tested without the
 * tool, and a different storage backend be swapped in.
 */

import type { RepoName } from '@txpublish/core'
import type { Logger } from '../logger'
import type { CommandResult, CommandRunner } from '../process/runner'

/**
 * How far back GC keeps unreferenced objects.
 */
export const GC_RETENTION_WINDOW = '2 days ago'

export interface PublishOptions {
  /** Authorization file attached to the commit. */
  authzFile?: string
}

export interface StorageTool {
  /** Discard an open transaction. Non-zero when none is open. */
  abort(repo: RepoName): Promise<CommandResult>

  /** Open a transaction. */
  startTransaction(repo: RepoName): Promise<CommandResult>

  /** Commit the open transaction. */
  publish(repo: RepoName, options?: PublishOptions): Promise<CommandResult>

  /** Collect objects unreferenced since the retention window. */
  gc(repo: RepoName, retentionWindow: string): Promise<CommandResult>
}

/**
 * StorageTool backed by a `cvmfs_server`-style command line.
 */
export class CommandStorageTool implements StorageTool {
  private _log: Logger

  constructor(
    private readonly runner: CommandRunner,
    private readonly executable: string,
    logger: Logger,
  ) {
    this._log = logger.child({ component: 'StorageTool' })
  }

  abort(repo: RepoName): Promise<CommandResult> {
    return this.invoke(['abort', '-f', repo])
  }

  startTransaction(repo: RepoName): Promise<CommandResult> {
    return this.invoke(['transaction', repo])
  }

  publish(repo: RepoName, options: PublishOptions = {}): Promise<CommandResult> {
    const args = ['publish']
    if (options.authzFile) {
      args.push('-Z', options.authzFile)
    }
    args.push(repo)
    return this.invoke(args)
  }

  gc(repo: RepoName, retentionWindow: string): Promise<CommandResult> {
    return this.invoke(['gc', '-f', '-t', retentionWindow, repo])
  }

  private async invoke(args: string[]): Promise<CommandResult> {
    this._log.info({ command: this.executable, args }, 'Running storage command')
    const result = await this.runner.run(this.executable, args)
    this._log.info({ args, exitCode: result.exitCode, duration: result.duration }, 'Storage command finished')
    return result
  }
}
