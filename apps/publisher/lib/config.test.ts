import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { loadProcessSettings } from './config'

const KEYS = ['TXPUBLISH_CONFIG', 'TXPUBLISH_LOG_LEVEL', 'TXPUBLISH_CACHE_DIR']

describe('loadProcessSettings', () => {
  let saved: Record<string, string | undefined>

  beforeEach(() => {
    saved = Object.fromEntries(KEYS.map((key) => [key, process.env[key]]))
    for (const key of KEYS) delete process.env[key]
  })

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key]
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
  })

  test('defaults', () => {
    expect(loadProcessSettings()).toEqual({
      configPath: '/etc/txpublish/publish.yaml',
      logLevel: 'info',
      cacheDir: '/var/cache/txpublish',
    })
  })

  test('environment overrides', () => {
    process.env.TXPUBLISH_CONFIG = '/srv/publish.yaml'
    process.env.TXPUBLISH_LOG_LEVEL = 'debug'
    process.env.TXPUBLISH_CACHE_DIR = 'state'

    const settings = loadProcessSettings()

    expect(settings.configPath).toBe('/srv/publish.yaml')
    expect(settings.logLevel).toBe('debug')
    expect(settings.cacheDir).toBe(`${process.cwd()}/state`)
  })
})
