/**
 * Publication Orchestrator
 *
 * Drives one publication run for one repository:
 *
 *   abort stale → GC throttle → authorization → credential → start
 *     → sync jobs (in declared order) → publish
 *
 * A failed job step rolls the open transaction back exactly once and the
 * failure propagates; publish is never reached. Failures before the
 * transaction opens need no rollback.
 */

import type {
  AuthorizationMaterial,
  CredentialOutcome,
  GcOutcome,
  PublicationConfig,
  SyncJobSpec,
} from '@txpublish/core'
import type { AuthorizationLease, AuthorizationProvisioner } from '../authz/provisioner'
import type { CredentialRenewalPolicy } from '../credential/policy'
import { SyncJobError, TransactionError } from '../errors'
import type { GcThrottle } from '../gc/throttle'
import type { Logger } from '../logger'
import type { PublishMetrics } from '../metrics/publish'
import { writeMetricsFile } from '../metrics/textfile'
import type { CommandResult } from '../process/runner'
import type { StorageTool } from '../storage/storage-tool'
import type { SyncJobRunner, SyncResult } from '../sync/runner'

/**
 * Outcome of the job step. The orchestrator turns a failure into a rollback
 * followed by rethrowing `error`.
 */
export type JobsOutcome =
  | { ok: true; results: SyncResult[] }
  | { ok: false; results: SyncResult[]; job: string; error: Error }

/**
 * Summary of a committed run.
 */
export interface PublicationReport {
  repo: string
  gc: GcOutcome
  credential: CredentialOutcome
  authorization: AuthorizationMaterial['kind']
  jobs: SyncResult[]
  /** Duration of the run in milliseconds. */
  duration: number
}

export interface PublicationOrchestratorDeps {
  config: PublicationConfig
  storage: StorageTool
  gcThrottle: GcThrottle
  provisioner: AuthorizationProvisioner
  credentials: CredentialRenewalPolicy
  syncRunner: SyncJobRunner
  metrics: PublishMetrics
  logger: Logger
}

export class PublicationOrchestrator {
  private config: PublicationConfig
  private storage: StorageTool
  private gcThrottle: GcThrottle
  private provisioner: AuthorizationProvisioner
  private credentials: CredentialRenewalPolicy
  private syncRunner: SyncJobRunner
  private metrics: PublishMetrics
  private _log: Logger

  constructor(deps: PublicationOrchestratorDeps) {
    this.config = deps.config
    this.storage = deps.storage
    this.gcThrottle = deps.gcThrottle
    this.provisioner = deps.provisioner
    this.credentials = deps.credentials
    this.syncRunner = deps.syncRunner
    this.metrics = deps.metrics
    this._log = deps.logger.child({ component: 'PublicationOrchestrator', repo: deps.config.repo })
  }

  /**
   * Run one publication. Resolves once the transaction is committed; rejects
   * with the first fatal error otherwise.
   */
  async run(): Promise<PublicationReport> {
    const startTime = Date.now()
    let committed = false

    try {
      await this.abortStale()

      const gc = await this.gcThrottle.run()
      this.metrics.recordGc(gc)

      const lease = await this.provisioner.provision(this.config.authorization)
      try {
        const credential = await this.credentials.ensure(this.config.authorization)
        this.metrics.recordCredential(credential)

        await this.startTransaction()

        const outcome = await this.runJobs()
        if (!outcome.ok) {
          this._log.error({ job: outcome.job, err: outcome.error }, 'Sync job failed, rolling back')
          await this.rollback()
          throw outcome.error
        }

        await this.commit(lease)
        committed = true

        const report: PublicationReport = {
          repo: this.config.repo,
          gc,
          credential,
          authorization: lease.material.kind,
          jobs: outcome.results,
          duration: Date.now() - startTime,
        }
        this._log.info(
          { jobs: report.jobs.length, duration: report.duration },
          'Publication committed',
        )
        return report
      } finally {
        await this.releaseLease(lease)
      }
    } finally {
      await this.flushMetrics(committed, Date.now() - startTime)
    }
  }

  /**
   * Run every job in declared order, stopping at the first failure.
   */
  async runJobs(): Promise<JobsOutcome> {
    const results: SyncResult[] = []

    for (const job of this.config.jobs) {
      const jobLog = this._log.child({ job: job.name })
      let result: SyncResult
      try {
        result = await this.syncRunner.run(job, jobLog)
      } catch (err) {
        return { ok: false, results, job: job.name, error: toError(err) }
      }

      results.push(result)
      this.metrics.recordJob(result)

      if (!result.success) {
        if (this.config.failOnJobError) {
          return {
            ok: false,
            results,
            job: job.name,
            error: new SyncJobError(job.name, result.exitCode),
          }
        }
        jobLog.warn({ exitCode: result.exitCode }, 'Sync job exited non-zero, continuing')
      }
    }

    return { ok: true, results }
  }

  /**
   * Command line each job would run, for dry inspection.
   */
  describeJobs(): Array<{ job: SyncJobSpec; command: string[] }> {
    return this.config.jobs.map((job) => ({ job, command: this.syncRunner.commandLine(job) }))
  }

  private async abortStale(): Promise<void> {
    try {
      const result = await this.storage.abort(this.config.repo)
      if (result.exitCode === 0) {
        this._log.info('Aborted stale transaction')
      } else {
        this._log.info({ exitCode: result.exitCode }, 'No stale transaction to abort')
      }
    } catch (err) {
      this._log.warn({ err }, 'Stale transaction abort could not be run')
    }
  }

  private async startTransaction(): Promise<void> {
    let result: CommandResult
    try {
      result = await this.storage.startTransaction(this.config.repo)
    } catch (err) {
      await this.rollback()
      throw err
    }
    if (result.exitCode !== 0) {
      await this.rollback()
      throw new TransactionError('start', this.config.repo, result.exitCode)
    }
    this._log.info('Transaction started')
  }

  /**
   * Best-effort abort of the open transaction. Never throws, so the error
   * that caused the rollback is the one that propagates.
   */
  private async rollback(): Promise<void> {
    try {
      const result = await this.storage.abort(this.config.repo)
      if (result.exitCode === 0) {
        this._log.info('Transaction rolled back')
      } else {
        this._log.warn({ exitCode: result.exitCode }, 'Rollback exited non-zero')
      }
    } catch (err) {
      this._log.warn({ err }, 'Rollback could not be run')
    }
  }

  private async commit(lease: AuthorizationLease): Promise<void> {
    const authzFile = lease.material.kind === 'none' ? undefined : lease.material.path
    const result = await this.storage.publish(this.config.repo, { authzFile })
    if (result.exitCode !== 0) {
      throw new TransactionError('publish', this.config.repo, result.exitCode)
    }
  }

  private async releaseLease(lease: AuthorizationLease): Promise<void> {
    try {
      await lease.release()
    } catch (err) {
      this._log.warn({ err }, 'Could not remove generated authorization file')
    }
  }

  private async flushMetrics(committed: boolean, duration: number): Promise<void> {
    this.metrics.recordRun(committed, duration, new Date())
    if (!this.config.metricsFile) return

    try {
      await writeMetricsFile(this.metrics.registry, this.config.metricsFile)
    } catch (err) {
      this._log.warn({ err, path: this.config.metricsFile }, 'Could not write metrics file')
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}
