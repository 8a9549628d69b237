/**
 * Domain Error Types
 *
 * Every fatal condition of a publication run has its own error class carrying
 * the process exit status the CLI terminates with.
 */

export { ConfigError } from '@txpublish/core'

/**
 * Storage tool operations that can fail fatally.
 */
export type TransactionOperation = 'start' | 'publish'

/**
 * An external command could not be launched (missing binary, permissions).
 */
export class CommandLaunchError extends Error {
  readonly exitCode = 69

  constructor(
    public readonly command: string,
    cause: Error,
  ) {
    super(`Failed to launch ${command}: ${cause.message}`, { cause })
    this.name = 'CommandLaunchError'
  }
}

export class TransactionError extends Error {
  readonly exitCode = 3

  constructor(
    public readonly operation: TransactionOperation,
    public readonly repo: string,
    public readonly commandExitCode: number,
  ) {
    super(`Failed to ${operation === 'start' ? 'start transaction' : 'publish'} for ${repo} (exit code ${commandExitCode})`)
    this.name = 'TransactionError'
  }
}

export class SyncJobError extends Error {
  readonly exitCode = 4

  constructor(
    public readonly job: string,
    public readonly commandExitCode: number,
  ) {
    super(`Sync job ${job} failed (exit code ${commandExitCode})`)
    this.name = 'SyncJobError'
  }
}

export class CredentialRenewalError extends Error {
  readonly exitCode = 5

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CredentialRenewalError'
  }
}

/**
 * The credential tool could not report the credential state.
 * Never fatal: the renewal policy answers it by renewing.
 */
export class CredentialCheckError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CredentialCheckError'
  }
}

export class AuthorizationError extends Error {
  readonly exitCode = 6

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'AuthorizationError'
  }
}

/**
 * Type guard for domain errors carrying a process exit status.
 */
export function isDomainError(err: unknown): err is Error & { exitCode: number } {
  return err instanceof Error && 'exitCode' in err && typeof err.exitCode === 'number'
}

/**
 * Exit status for an error escaping a run.
 */
export function exitCodeFor(err: unknown): number {
  return isDomainError(err) ? err.exitCode : 1
}
