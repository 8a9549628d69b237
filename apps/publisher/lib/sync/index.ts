/**
 * Sync Module
 *
 * Runs the external synchronization tool, one process per configured job.
 */

export { SyncJobRunner, type SyncJobRunnerConfig, type SyncResult, buildSyncArgs } from './runner'
