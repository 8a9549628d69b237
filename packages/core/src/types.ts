/**
 * Core types for the txpublish publication orchestrator
 */

// =============================================================================
// Identifiers
// =============================================================================

/**
 * Name of the repository being published.
 * Also used to name the repository's persisted state files.
 * @example 'data.example.org'
 */
export type RepoName = string

/**
 * Name of a sync job, taken from its key in the `jobs` section.
 * @example 'detector-calibration'
 */
export type JobName = string

// =============================================================================
// Sync Jobs
// =============================================================================

/**
 * One configured unit of work that mirrors a source into the repository.
 * Unset optional values mean the flag is omitted and the sync tool's
 * default applies.
 */
export interface SyncJobSpec {
  /**
   * Job name, used in logs and metrics labels.
   * @example 'detector-calibration'
   */
  name: JobName

  /**
   * Worker count for file transfers.
   * @example 8
   */
  concurrency?: number

  /**
   * Worker count for metadata operations (listing, stat).
   * @example 16
   */
  metadataConcurrency?: number

  /**
   * Time budget handed to the sync tool, in seconds.
   * @example 3600
   */
  maxTime?: number

  /**
   * Patterns the sync tool must skip.
   * @example ['*.tmp', '.snapshot']
   */
  ignore: readonly string[]

  /**
   * Patterns the sync tool restricts itself to.
   * @example ['*.root']
   */
  include: readonly string[]

  /**
   * Primary source location.
   * @example '/data/a'
   */
  source: string

  /**
   * Optional bulk-transfer source, passed as `primary,secondary`.
   * @example 'https://bulk.example.org/data/a'
   */
  secondarySource?: string

  /**
   * Destination path inside the repository.
   * @example '/repo/a'
   */
  destination: string
}

// =============================================================================
// Authorization & Credentials
// =============================================================================

/**
 * Authorization section of the publication configuration.
 * `file` and `command` are alternatives; when both are set the command wins.
 */
export interface AuthorizationSettings {
  /**
   * Static authorization file attached to the commit.
   * @example '/etc/txpublish/authz'
   */
  file?: string

  /**
   * Command that writes an authorization file. `{output}` is replaced by the
   * path of a temporary file; without a placeholder the path is appended.
   * @example 'generate-authz --output {output}'
   */
  command?: string

  /**
   * Extension attribute the credential must carry.
   * @example 'example:/example/Role=publisher'
   */
  voms?: string

  /**
   * Location of the credential file.
   * @example '/var/lib/txpublish/proxy'
   */
  proxy?: string

  /**
   * Minimum remaining lifetime before the credential is renewed.
   * @default 6
   */
  minLifetimeHours: number
}

/**
 * Live view of the current credential, as reported by the credential tool.
 */
export interface CredentialState {
  /** Whether a credential file exists at all. */
  exists: boolean

  /**
   * Seconds until the credential expires (0 when expired or missing).
   * @example 36000
   */
  timeLeftSeconds: number

  /**
   * Seconds until the extension attribute expires.
   * Only present when an extension attribute was asked for.
   */
  extensionTimeLeftSeconds?: number
}

/**
 * Authorization material active for one run.
 * - `none`: publish without an authorization file
 * - `static`: a configured file, left in place after the run
 * - `generated`: a temporary file produced by the configured command,
 *   removed when the run ends
 */
export type AuthorizationMaterial =
  | { kind: 'none' }
  | { kind: 'static'; path: string }
  | { kind: 'generated'; path: string }

// =============================================================================
// Tools
// =============================================================================

/**
 * Executables for the external collaborators.
 */
export interface ToolPaths {
  /**
   * File-synchronization tool.
   * @default 'repo-sync'
   */
  sync: string

  /**
   * Storage/transaction tool (abort, transaction, publish, gc).
   * @default 'cvmfs_server'
   */
  storage: string

  /**
   * Credential inspection tool.
   * @default 'voms-proxy-info'
   */
  proxyInfo: string

  /**
   * Credential issuance tool.
   * @default 'voms-proxy-init'
   */
  proxyInit: string

  /**
   * Shell used to run the authorization generator command.
   * @default '/bin/sh'
   */
  shell: string
}

// =============================================================================
// Publication Configuration
// =============================================================================

/**
 * Fully validated publication configuration.
 * Parsed once per run and frozen.
 */
export interface PublicationConfig {
  /**
   * Repository to publish into.
   * @example 'data.example.org'
   */
  repo: RepoName

  /**
   * Directory holding per-repository state (the GC timestamp file).
   * Falls back to the process-level cache directory when unset.
   * @example '/var/cache/txpublish'
   */
  cacheDir?: string

  /**
   * Minimum time between garbage collections, in minutes.
   * @default 1440
   */
  gcIntervalMinutes: number

  /**
   * Treat a non-zero sync exit code as a job failure that rolls back
   * the transaction.
   * @default true
   */
  failOnJobError: boolean

  /**
   * Prometheus textfile written after each run.
   * @example '/var/lib/node_exporter/txpublish.prom'
   */
  metricsFile?: string

  /** External tool executables. */
  tools: ToolPaths

  /** Authorization and credential settings; absent means unauthenticated. */
  authorization?: AuthorizationSettings

  /** Sync jobs in declaration order. */
  jobs: readonly SyncJobSpec[]
}

// =============================================================================
// Outcomes
// =============================================================================

/**
 * What the GC throttle did this cycle.
 * - `skipped`: the interval has not elapsed
 * - `collected`: GC ran and exited 0
 * - `failed`: GC was attempted and failed (logged, never fatal)
 */
export type GcOutcome = 'skipped' | 'collected' | 'failed'

/**
 * What the credential policy did this run.
 */
export type CredentialOutcome = 'not-configured' | 'valid' | 'renewed'
