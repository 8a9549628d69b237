/**
 * SyncJobRunner Unit Tests
 */

import { describe, expect, test } from 'vitest'
import { createMockRunner, createSyncJobSpec, silentLogger } from '../../test/fixtures'
import { SyncJobRunner, buildSyncArgs } from './runner'

describe('buildSyncArgs', () => {
  test('minimal job is source then destination', () => {
    const job = createSyncJobSpec({ source: '/data/a', destination: '/repo/a' })

    expect(buildSyncArgs(job)).toEqual(['/data/a', '/repo/a'])
  })

  test('flags precede the positional arguments in a fixed order', () => {
    const job = createSyncJobSpec({
      source: '/data/a',
      secondarySource: '/mirror/a',
      destination: '/repo/a',
      concurrency: 8,
      metadataConcurrency: 4,
      maxTime: 3600,
      ignore: ['*.tmp', '.git'],
      include: ['lib'],
    })

    expect(buildSyncArgs(job)).toEqual([
      '--concurrency', '8',
      '--metadata-concurrency', '4',
      '--max-time', '3600',
      '--ignore', '*.tmp,.git',
      '--include', 'lib',
      '/data/a,/mirror/a',
      '/repo/a',
    ])
  })

  test('empty lists produce no flags', () => {
    const job = createSyncJobSpec({ source: 's', destination: 'd', ignore: [], include: [], maxTime: 60 })

    expect(buildSyncArgs(job)).toEqual(['--max-time', '60', 's', 'd'])
  })
})

describe('SyncJobRunner', () => {
  test('commandLine starts with the tool', () => {
    const runner = new SyncJobRunner(createMockRunner(), { syncPath: '/usr/bin/repo-sync' })
    const job = createSyncJobSpec({ source: '/data/a', destination: '/repo/a' })

    expect(runner.commandLine(job)).toEqual(['/usr/bin/repo-sync', '/data/a', '/repo/a'])
  })

  test('runs the tool with passthrough output and the credential environment', async () => {
    const commands = createMockRunner()
    const runner = new SyncJobRunner(commands, {
      syncPath: 'repo-sync',
      env: { X509_USER_PROXY: '/var/lib/proxy' },
    })
    const job = createSyncJobSpec({ source: '/data/a', destination: '/repo/a' })

    const result = await runner.run(job, silentLogger)

    expect(result).toEqual({ job: job.name, success: true, exitCode: 0, duration: 5 })
    expect(commands.calls).toEqual([
      {
        command: 'repo-sync',
        args: ['/data/a', '/repo/a'],
        options: { env: { X509_USER_PROXY: '/var/lib/proxy' }, passthrough: true },
      },
    ])
  })

  test('reports a non-zero exit without throwing', async () => {
    const commands = createMockRunner(() => ({ exitCode: 23, duration: 40 }))
    const runner = new SyncJobRunner(commands, { syncPath: 'repo-sync' })
    const job = createSyncJobSpec()

    const result = await runner.run(job, silentLogger)

    expect(result).toEqual({ job: job.name, success: false, exitCode: 23, duration: 40 })
  })

  test('a launch failure rejects', async () => {
    const commands = createMockRunner(() => {
      throw new Error('spawn repo-sync ENOENT')
    })
    const runner = new SyncJobRunner(commands, { syncPath: 'repo-sync' })

    await expect(runner.run(createSyncJobSpec(), silentLogger)).rejects.toThrow('spawn repo-sync ENOENT')
  })
})
