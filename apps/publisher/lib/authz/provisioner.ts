/**
 * Authorization Provisioner
 *
 * Resolves the authorization file attached to the commit: nothing, a static
 * file, or a temporary file written by a generator command. Generated files
 * are handed out as a lease the orchestrator releases when its run ends.
 */

import { mkdtemp, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { AuthorizationMaterial, AuthorizationSettings } from '@txpublish/core'
import { AuthorizationError } from '../errors'
import type { Logger } from '../logger'
import type { CommandRunner } from '../process/runner'

/** Placeholder replaced by the temporary file path in the generator command. */
export const OUTPUT_PLACEHOLDER = '{output}'

/**
 * Authorization material scoped to one run.
 */
export interface AuthorizationLease {
  material: AuthorizationMaterial

  /** Remove anything the provisioner created. Safe to call more than once. */
  release(): Promise<void>
}

export interface AuthorizationProvisionerConfig {
  /** Shell running the generator command. */
  shell: string

  /**
   * Directory temporary files are created under.
   * @default os.tmpdir()
   */
  tempDir?: string
}

const SHELL_SAFE = /^[A-Za-z0-9_./@%+=:,-]+$/

function shellQuote(value: string): string {
  return SHELL_SAFE.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`
}

/**
 * Substitute the output path into a generator command template.
 * Without a placeholder the path is appended as the last argument.
 */
export function renderCommand(template: string, outputPath: string): string {
  const quoted = shellQuote(outputPath)
  if (template.includes(OUTPUT_PLACEHOLDER)) {
    return template.split(OUTPUT_PLACEHOLDER).join(quoted)
  }
  return `${template} ${quoted}`
}

const NO_LEASE: AuthorizationLease = {
  material: { kind: 'none' },
  release: async () => {},
}

export class AuthorizationProvisioner {
  private _log: Logger

  constructor(
    private readonly runner: CommandRunner,
    private readonly config: AuthorizationProvisionerConfig,
    logger: Logger,
  ) {
    this._log = logger.child({ component: 'AuthorizationProvisioner' })
  }

  async provision(settings: AuthorizationSettings | undefined): Promise<AuthorizationLease> {
    const file = settings?.file
    const command = settings?.command

    if (command) {
      if (file) {
        this._log.warn(
          { file, command },
          'Both a static authorization file and a generator command are configured; using the command',
        )
      }
      return this.generate(command)
    }

    if (file) {
      this._log.info({ path: file }, 'Using static authorization file')
      return { material: { kind: 'static', path: file }, release: async () => {} }
    }

    this._log.info('No authorization file configured')
    return NO_LEASE
  }

  private async generate(template: string): Promise<AuthorizationLease> {
    const dir = await mkdtemp(join(this.config.tempDir ?? tmpdir(), 'txpublish-authz-'))
    const path = join(dir, 'authz')
    let released = false
    const release = async () => {
      if (released) return
      released = true
      await rm(dir, { recursive: true, force: true })
      this._log.info({ path }, 'Removed generated authorization file')
    }

    try {
      await writeFile(path, '', { mode: 0o600 })
      const command = renderCommand(template, path)
      this._log.info({ command }, 'Generating authorization file')

      const result = await this.runner.run(this.config.shell, ['-c', command])
      if (result.exitCode !== 0) {
        throw new AuthorizationError(
          `Authorization command failed (exit code ${result.exitCode}): ${result.stderr.trim()}`,
        )
      }

      const { size } = await stat(path)
      if (size === 0) {
        this._log.warn({ path }, 'Authorization command produced an empty file')
      }
    } catch (err) {
      await release()
      if (err instanceof AuthorizationError) throw err
      throw new AuthorizationError('Authorization command could not be run', { cause: err })
    }

    return { material: { kind: 'generated', path }, release }
  }
}
