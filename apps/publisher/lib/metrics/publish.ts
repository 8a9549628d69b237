/**
 * Publication Metrics
 *
 * One registry per run. A publication is a short-lived batch process, so the
 * registry is written to a textfile for node_exporter instead of being scraped.
 */

import type { CredentialOutcome, GcOutcome } from '@txpublish/core'
import { Counter, Gauge, Registry } from 'prom-client'
import type { SyncResult } from '../sync/runner'

export class PublishMetrics {
  readonly registry = new Registry()

  readonly lastRun = new Gauge({
    name: 'txpublish_publish_last_run_timestamp_seconds',
    help: 'Unix time the last publication run finished',
    labelNames: ['repo'],
    registers: [this.registry],
  })

  readonly success = new Gauge({
    name: 'txpublish_publish_success',
    help: '1 if the last publication run committed, 0 otherwise',
    labelNames: ['repo'],
    registers: [this.registry],
  })

  readonly duration = new Gauge({
    name: 'txpublish_publish_duration_seconds',
    help: 'Duration of the last publication run',
    labelNames: ['repo'],
    registers: [this.registry],
  })

  readonly jobExitCode = new Gauge({
    name: 'txpublish_sync_job_exit_code',
    help: 'Exit code of the sync tool, per job',
    labelNames: ['repo', 'job'],
    registers: [this.registry],
  })

  readonly jobDuration = new Gauge({
    name: 'txpublish_sync_job_duration_seconds',
    help: 'Duration of the sync tool, per job',
    labelNames: ['repo', 'job'],
    registers: [this.registry],
  })

  readonly gcRuns = new Counter({
    name: 'txpublish_gc_runs_total',
    help: 'GC throttle decisions by result',
    labelNames: ['repo', 'result'],
    registers: [this.registry],
  })

  readonly credentialRenewals = new Counter({
    name: 'txpublish_credential_renewals_total',
    help: 'Credential renewals performed',
    labelNames: ['repo'],
    registers: [this.registry],
  })

  constructor(private readonly repo: string) {}

  recordGc(outcome: GcOutcome): void {
    this.gcRuns.inc({ repo: this.repo, result: outcome })
  }

  recordCredential(outcome: CredentialOutcome): void {
    if (outcome === 'renewed') {
      this.credentialRenewals.inc({ repo: this.repo })
    }
  }

  recordJob(result: SyncResult): void {
    this.jobExitCode.set({ repo: this.repo, job: result.job }, result.exitCode)
    this.jobDuration.set({ repo: this.repo, job: result.job }, result.duration / 1000)
  }

  recordRun(committed: boolean, durationMs: number, finishedAt: Date): void {
    this.success.set({ repo: this.repo }, committed ? 1 : 0)
    this.duration.set({ repo: this.repo }, durationMs / 1000)
    this.lastRun.set({ repo: this.repo }, Math.floor(finishedAt.getTime() / 1000))
  }
}
