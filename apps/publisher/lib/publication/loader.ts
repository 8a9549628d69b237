import { readFileSync } from 'node:fs'
import { ConfigError, type PublicationConfig, safeParsePublicationConfig } from '@txpublish/core'
import { YAMLParseError, parse as parseYaml } from 'yaml'

/**
 * Interpolate environment variables in a string
 * Supports ${VAR} syntax, only replaces if the env var exists in the environment
 */
export function interpolateEnvVars(content: string, env: NodeJS.ProcessEnv = process.env): string {
  return content.replace(/\$\{([^}]+)\}/g, (match, varName: string) => env[varName] ?? match)
}

/**
 * Parse and validate publication YAML content
 *
 * @param source - Label used in error messages, usually the file path
 */
export function parsePublicationYaml(
  content: string,
  source: string,
  env: NodeJS.ProcessEnv = process.env,
): PublicationConfig {
  let rawYaml: unknown
  try {
    rawYaml = parseYaml(interpolateEnvVars(content, env))
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigError(source, [{ path: '/', message: error.message }])
    }
    throw error
  }

  const result = safeParsePublicationConfig(rawYaml ?? {})
  if (!result.success) {
    throw new ConfigError(source, result.errors)
  }
  return result.data
}

/**
 * Load and validate a publication YAML file
 * Environment variables in ${VAR} format are interpolated from process.env
 */
export function loadPublicationFile(filePath: string): PublicationConfig {
  let content: string
  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(filePath, [{ path: '/', message: 'File does not exist' }])
    }
    throw error
  }
  return parsePublicationYaml(content, filePath)
}
