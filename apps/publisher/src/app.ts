/**
 * App: wires the publication components into a dependency graph.
 *
 * Callers own the configuration and the logger. App owns everything built
 * from them. Used by the CLI entrypoint (index.ts) and by the tests, which
 * pass a fake CommandRunner instead of spawning real tools.
 */

import type { PublicationConfig } from '@txpublish/core'
import { AuthorizationProvisioner } from '../lib/authz/provisioner'
import { CredentialRenewalPolicy } from '../lib/credential/policy'
import { ProxyCredentialTool } from '../lib/credential/proxy-tool'
import { GcThrottle } from '../lib/gc/throttle'
import type { Logger } from '../lib/logger'
import { PublishMetrics } from '../lib/metrics'
import { ChildProcessRunner, type CommandRunner } from '../lib/process/runner'
import { PublicationOrchestrator } from '../lib/publish/orchestrator'
import { CommandStorageTool, type StorageTool } from '../lib/storage/storage-tool'
import { SyncJobRunner } from '../lib/sync'

export interface AppConfig {
  publication: PublicationConfig
  logger: Logger
  /** State directory used when the publication sets no `cache_dir`. */
  defaultCacheDir: string
  /** Runner for every external tool (default: real child processes) */
  runner?: CommandRunner
  /** Clock returning Unix seconds, for the GC throttle */
  now?: () => number
  /** Directory for generated authorization files (default: os.tmpdir()) */
  tempDir?: string
}

export class App {
  readonly storage: StorageTool
  readonly gcThrottle: GcThrottle
  readonly provisioner: AuthorizationProvisioner
  readonly credentials: CredentialRenewalPolicy
  readonly syncRunner: SyncJobRunner
  readonly metrics: PublishMetrics
  readonly orchestrator: PublicationOrchestrator

  constructor(config: AppConfig) {
    const { publication, logger } = config
    const runner = config.runner ?? new ChildProcessRunner()
    const { tools } = publication
    const proxyPath = publication.authorization?.proxy

    this.storage = new CommandStorageTool(runner, tools.storage, logger)

    this.gcThrottle = new GcThrottle(
      this.storage,
      {
        repo: publication.repo,
        cacheDir: publication.cacheDir ?? config.defaultCacheDir,
        intervalMinutes: publication.gcIntervalMinutes,
        now: config.now,
      },
      logger,
    )

    this.provisioner = new AuthorizationProvisioner(
      runner,
      { shell: tools.shell, tempDir: config.tempDir },
      logger,
    )

    const credentialTool = new ProxyCredentialTool(
      runner,
      { infoCommand: tools.proxyInfo, initCommand: tools.proxyInit, proxyPath },
      logger,
    )
    this.credentials = new CredentialRenewalPolicy(credentialTool, logger)

    this.syncRunner = new SyncJobRunner(runner, {
      syncPath: tools.sync,
      env: proxyPath ? { X509_USER_PROXY: proxyPath } : undefined,
    })

    this.metrics = new PublishMetrics(publication.repo)

    this.orchestrator = new PublicationOrchestrator({
      config: publication,
      storage: this.storage,
      gcThrottle: this.gcThrottle,
      provisioner: this.provisioner,
      credentials: this.credentials,
      syncRunner: this.syncRunner,
      metrics: this.metrics,
      logger,
    })
  }
}
