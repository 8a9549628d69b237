import { resolve } from 'node:path'

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue
}

function getEnvPath(key: string, defaultValue: string): string {
  const value = process.env[key] ?? defaultValue
  // Resolve relative paths from current working directory
  return value.startsWith('/') ? value : resolve(process.cwd(), value)
}

/**
 * Process-level settings. Everything about the repository itself lives in
 * the publication file; these only locate it and tune the process.
 */
export interface ProcessSettings {
  /** Publication file loaded when `--config` is not given. */
  configPath: string
  /** pino level when `--log-level` is not given. */
  logLevel: string
  /** State directory used when the publication file sets no `cache_dir`. */
  cacheDir: string
}

export function loadProcessSettings(): ProcessSettings {
  return {
    configPath: getEnvPath('TXPUBLISH_CONFIG', '/etc/txpublish/publish.yaml'),
    logLevel: getEnvString('TXPUBLISH_LOG_LEVEL', 'info'),
    cacheDir: getEnvPath('TXPUBLISH_CACHE_DIR', '/var/cache/txpublish'),
  }
}

export const settings: ProcessSettings = loadProcessSettings()
