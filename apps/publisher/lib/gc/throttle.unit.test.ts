/**
 * GcThrottle Unit Tests
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { commandResult, silentLogger } from '../../test/fixtures'
import type { StorageTool } from '../storage/storage-tool'
import { GcThrottle, gcStatePath, parseLastRun } from './throttle'

const NOW = 1_700_000_000
const DAY = 24 * 60 * 60

function createStorage(gc: StorageTool['gc'] = async () => commandResult()) {
  return {
    abort: vi.fn<StorageTool['abort']>(async () => commandResult()),
    startTransaction: vi.fn<StorageTool['startTransaction']>(async () => commandResult()),
    publish: vi.fn<StorageTool['publish']>(async () => commandResult()),
    gc: vi.fn<StorageTool['gc']>(gc),
  }
}

describe('parseLastRun', () => {
  test('parses a timestamp with surrounding whitespace', () => {
    expect(parseLastRun(' 1700000000\n')).toBe(1700000000)
  })

  test.each(['', 'yesterday', '-5', '17e8', '1.5'])('reads %s as never run', (content) => {
    expect(parseLastRun(content)).toBe(0)
  })
})

describe('GcThrottle', () => {
  const repo = 'test.example.org'
  let cacheDir: string

  beforeEach(async () => {
    cacheDir = await mkdtemp(join(tmpdir(), 'gc-throttle-test-'))
  })

  afterEach(async () => {
    await rm(cacheDir, { recursive: true, force: true })
  })

  function createThrottle(storage: StorageTool, dir = cacheDir) {
    return new GcThrottle(
      storage,
      { repo, cacheDir: dir, intervalMinutes: 1440, now: () => NOW },
      silentLogger,
    )
  }

  test('state lives beside other repositories in the cache directory', () => {
    expect(gcStatePath('/var/cache/txpublish', repo)).toBe('/var/cache/txpublish/test.example.org.last_gc')
  })

  test('creates missing state and collects', async () => {
    const storage = createStorage()
    const dir = join(cacheDir, 'nested')

    expect(await createThrottle(storage, dir).run()).toBe('collected')
    expect(storage.gc).toHaveBeenCalledWith(repo, '2 days ago')
    expect(await readFile(gcStatePath(dir, repo), 'utf-8')).toBe(String(NOW))
  })

  test('hourly interval without prior state collects and records the start time', async () => {
    const storage = createStorage()
    const throttle = new GcThrottle(
      storage,
      { repo, cacheDir, intervalMinutes: 60, now: () => NOW },
      silentLogger,
    )

    expect(await throttle.run()).toBe('collected')
    expect(await readFile(throttle.statePath, 'utf-8')).toBe(String(NOW))
    expect(await createThrottle(storage).run()).toBe('skipped')
  })

  test('skips while the interval has not elapsed', async () => {
    const storage = createStorage()
    const statePath = gcStatePath(cacheDir, repo)
    await writeFile(statePath, String(NOW - DAY + 1))

    expect(await createThrottle(storage).run()).toBe('skipped')
    expect(storage.gc).not.toHaveBeenCalled()
    expect(await readFile(statePath, 'utf-8')).toBe(String(NOW - DAY + 1))
  })

  test('collects once the interval has elapsed exactly', async () => {
    const storage = createStorage()
    await writeFile(gcStatePath(cacheDir, repo), String(NOW - DAY))

    expect(await createThrottle(storage).run()).toBe('collected')
  })

  test('force collects inside the interval', async () => {
    const storage = createStorage()
    await writeFile(gcStatePath(cacheDir, repo), String(NOW - 60))

    expect(await createThrottle(storage).run({ force: true })).toBe('collected')
    expect(storage.gc).toHaveBeenCalledTimes(1)
  })

  test('corrupt state forces a collection and is replaced', async () => {
    const storage = createStorage()
    const statePath = gcStatePath(cacheDir, repo)
    await writeFile(statePath, 'not a timestamp at all, much longer than ten digits')

    expect(await createThrottle(storage).run()).toBe('collected')
    expect(await readFile(statePath, 'utf-8')).toBe(String(NOW))
  })

  test('writes the timestamp before collecting', async () => {
    const statePath = gcStatePath(cacheDir, repo)
    let seenDuringGc = ''
    const storage = createStorage(async () => {
      seenDuringGc = await readFile(statePath, 'utf-8')
      return commandResult()
    })

    await createThrottle(storage).run()

    expect(seenDuringGc).toBe(String(NOW))
  })

  test('a failed collection is reported, not thrown, and still throttles', async () => {
    const storage = createStorage(async () => commandResult({ exitCode: 1, stderr: 'locked' }))

    expect(await createThrottle(storage).run()).toBe('failed')
    expect(await readFile(gcStatePath(cacheDir, repo), 'utf-8')).toBe(String(NOW))
  })

  test('a collection that cannot start is reported as failed', async () => {
    const storage = createStorage(async () => {
      throw new Error('spawn cvmfs_server ENOENT')
    })

    expect(await createThrottle(storage).run()).toBe('failed')
  })

  test('unreadable state counts as never run and still collects', async () => {
    const storage = createStorage()
    await mkdir(gcStatePath(cacheDir, repo))
    const throttle = new GcThrottle(
      storage,
      { repo, cacheDir, intervalMinutes: 60, now: () => NOW },
      silentLogger,
    )

    expect(await throttle.run()).toBe('collected')
    expect(storage.gc).toHaveBeenCalledTimes(1)
    expect(storage.gc).toHaveBeenCalledWith(repo, '2 days ago')
  })

  test('state that cannot be written does not hold back the collection', async () => {
    const storage = createStorage()
    const blocker = join(cacheDir, 'file')
    await writeFile(blocker, '')

    expect(await createThrottle(storage, join(blocker, 'sub')).run()).toBe('collected')
    expect(storage.gc).toHaveBeenCalledTimes(1)
  })
})
