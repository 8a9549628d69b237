/**
 * Command Runner
 *
 * Every external collaborator (sync tool, storage tool, credential tools,
 * authorization generator) is driven through this one seam. A call spawns
 * exactly one child process and resolves once it exits; the exit code is
 * returned, never interpreted. Only a failure to launch rejects.
 */

import { spawn } from 'node:child_process'
import { constants } from 'node:os'
import { CommandLaunchError } from '../errors'

export interface CommandResult {
  /** Exit code of the child; a child killed by a signal reports 128 + signal number. */
  exitCode: number

  /** Captured stdout (empty when output is passed through). */
  stdout: string

  /** Captured stderr (empty when output is passed through). */
  stderr: string

  /** Wall-clock duration in milliseconds. */
  duration: number
}

export interface CommandOptions {
  /**
   * Extra environment variables, merged over the current environment.
   * @example { X509_USER_PROXY: '/var/lib/txpublish/proxy' }
   */
  env?: Record<string, string>

  /**
   * Hand the child our stdout/stderr instead of capturing them.
   * Used for long-running tools whose progress belongs in the cron log.
   * @default false
   */
  passthrough?: boolean
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals))

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>
}

export class ChildProcessRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const startTime = Date.now()

    return new Promise((resolve, reject) => {
      let stdout = ''
      let stderr = ''

      const proc = spawn(command, args, {
        env: { ...process.env, ...options.env },
        stdio: options.passthrough ? ['ignore', 'inherit', 'inherit'] : ['ignore', 'pipe', 'pipe'],
      })

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString()
      })

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString()
      })

      proc.on('close', (code, signal) => {
        const exitCode = code ?? (signal ? 128 + (SIGNAL_NUMBERS.get(signal) ?? 0) : 1)
        resolve({ exitCode, stdout, stderr, duration: Date.now() - startTime })
      })

      proc.on('error', (err) => {
        reject(new CommandLaunchError(command, err))
      })
    })
  }
}
