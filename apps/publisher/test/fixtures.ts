/**
 * Shared test fixtures using Faker.js
 *
 * Factory functions for publication data and a scriptable fake CommandRunner
 * standing in for the external tools.
 */

import type { PublicationConfig, SyncJobSpec, ToolPaths } from '@txpublish/core'
import { faker } from '@faker-js/faker'
import pino from 'pino'
import { type Mock, vi } from 'vitest'
import type { Logger } from '../lib/logger'
import type { CommandOptions, CommandResult, CommandRunner } from '../lib/process/runner'

export const silentLogger: Logger = pino({ level: 'silent' })

export const TOOLS: ToolPaths = {
  sync: 'repo-sync',
  storage: 'cvmfs_server',
  proxyInfo: 'voms-proxy-info',
  proxyInit: 'voms-proxy-init',
  shell: '/bin/sh',
}

// =============================================================================
// Publication Fixtures
// =============================================================================

export function createRepoName(): string {
  return `${faker.internet.domainWord()}.example.org`
}

export function createSyncJobSpec(overrides?: Partial<SyncJobSpec>): SyncJobSpec {
  const dir = faker.string.alphanumeric(8).toLowerCase()
  return {
    name: `job-${faker.string.alphanumeric(6).toLowerCase()}`,
    source: `/data/${dir}`,
    destination: `/repo/${dir}`,
    ignore: [],
    include: [],
    ...overrides,
  }
}

export function createPublicationConfig(overrides?: Partial<PublicationConfig>): PublicationConfig {
  return {
    repo: createRepoName(),
    gcIntervalMinutes: 1440,
    failOnJobError: true,
    tools: TOOLS,
    jobs: [createSyncJobSpec()],
    ...overrides,
  }
}

// =============================================================================
// Command Runner
// =============================================================================

export interface RecordedCommand {
  command: string
  args: string[]
  options?: CommandOptions
}

/**
 * Handler deciding what a fake command does. Return a partial result, or
 * throw to simulate a launch failure.
 */
export type CommandHandler = (call: RecordedCommand) => Partial<CommandResult> | Promise<Partial<CommandResult>>

export interface MockRunner extends CommandRunner {
  run: Mock<CommandRunner['run']>
  /** Every call so far, in order */
  calls: RecordedCommand[]
  /** Calls rendered as `command arg arg`, in order */
  lines(): string[]
}

export function commandResult(overrides?: Partial<CommandResult>): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', duration: 5, ...overrides }
}

/**
 * Fake runner recording every call. Commands exit 0 with no output unless
 * the handler says otherwise.
 */
export function createMockRunner(handler?: CommandHandler): MockRunner {
  const calls: RecordedCommand[] = []

  const run = vi.fn<CommandRunner['run']>(async (command, args, options) => {
    const call: RecordedCommand = { command, args: [...args], options }
    calls.push(call)
    const partial = handler ? await handler(call) : {}
    return commandResult(partial)
  })

  return {
    run,
    calls,
    lines: () => calls.map((call) => [call.command, ...call.args].join(' ')),
  }
}
