/**
 * Proxy Credential Tool
 *
 * Queries and renews the time-limited credential through `voms-proxy-info`
 * and `voms-proxy-init` style command lines.
 */

import type { CredentialState } from '@txpublish/core'
import { CredentialCheckError } from '../errors'
import type { Logger } from '../logger'
import type { CommandOptions, CommandResult, CommandRunner } from '../process/runner'

/**
 * Validity requested on renewal (7 days, `hours:minutes`).
 */
export const RENEWAL_VALIDITY = '168:00'

export interface RenewOptions {
  /** Extension attribute to request. */
  voms?: string
  /** Validity window, `hours:minutes`. */
  validity: string
}

export interface CredentialTool {
  /**
   * Report the current credential. Rejects with CredentialCheckError when the
   * state cannot be determined.
   */
  inspect(voms?: string): Promise<CredentialState>

  /** Issue a new credential; resolves to the tool's exit code. */
  renew(options: RenewOptions): Promise<number>
}

export interface ProxyCredentialToolConfig {
  /** Credential inspection executable. */
  infoCommand: string
  /** Credential issuance executable. */
  initCommand: string
  /** Credential file; the tool default applies when unset. */
  proxyPath?: string
}

/**
 * Parse a `-timeleft`/`-actimeleft` answer (seconds, possibly followed by a newline).
 */
export function parseSeconds(output: string): number | undefined {
  const match = output.trim().match(/^(-?\d+)$/)
  if (!match) return undefined
  return Math.max(0, Number.parseInt(match[1], 10))
}

export class ProxyCredentialTool implements CredentialTool {
  private _log: Logger

  constructor(
    private readonly runner: CommandRunner,
    private readonly config: ProxyCredentialToolConfig,
    logger: Logger,
  ) {
    this._log = logger.child({ component: 'ProxyCredentialTool' })
  }

  async inspect(voms?: string): Promise<CredentialState> {
    const timeLeft = await this.query('-timeleft')
    if (timeLeft === undefined) {
      return { exists: false, timeLeftSeconds: 0 }
    }
    if (!voms) {
      return { exists: true, timeLeftSeconds: timeLeft }
    }

    const extensionTimeLeft = await this.query('-actimeleft')
    return {
      exists: true,
      timeLeftSeconds: timeLeft,
      extensionTimeLeftSeconds: extensionTimeLeft ?? 0,
    }
  }

  async renew(options: RenewOptions): Promise<number> {
    const args = ['-valid', options.validity]
    if (this.config.proxyPath) {
      args.push('-out', this.config.proxyPath)
    }
    if (options.voms) {
      args.push('-voms', options.voms)
    }

    this._log.info({ command: this.config.initCommand, args }, 'Renewing credential')
    const result = await this.runner.run(this.config.initCommand, args, this.commandOptions())
    if (result.exitCode !== 0) {
      this._log.warn({ exitCode: result.exitCode, stderr: result.stderr.trim() }, 'Credential renewal failed')
    }
    return result.exitCode
  }

  /**
   * Run one info query. Resolves to undefined when the tool answers that no
   * usable credential exists (non-zero exit, no output); rejects when the answer
   * cannot be interpreted.
   */
  private async query(flag: '-timeleft' | '-actimeleft'): Promise<number | undefined> {
    const args = this.config.proxyPath ? ['-file', this.config.proxyPath, flag] : [flag]
    this._log.info({ command: this.config.infoCommand, args }, 'Checking credential')

    let result: CommandResult
    try {
      result = await this.runner.run(this.config.infoCommand, args, this.commandOptions())
    } catch (err) {
      throw new CredentialCheckError(`Could not run ${this.config.infoCommand}`, { cause: err })
    }
    const { stdout, exitCode } = result

    if (exitCode !== 0) {
      if (stdout.trim() === '') return undefined
      throw new CredentialCheckError(`${this.config.infoCommand} ${flag} exited with code ${exitCode}`)
    }

    const seconds = parseSeconds(stdout)
    if (seconds === undefined) {
      throw new CredentialCheckError(`Unexpected ${this.config.infoCommand} ${flag} output: ${stdout.trim()}`)
    }
    return seconds
  }

  private commandOptions(): CommandOptions {
    return this.config.proxyPath ? { env: { X509_USER_PROXY: this.config.proxyPath } } : {}
  }
}
