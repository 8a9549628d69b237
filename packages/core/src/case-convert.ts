/**
 * Case conversion for configuration keys (snake_case YAML → camelCase TypeScript)
 */

import type { CamelCasedPropertiesDeep } from 'type-fest'

/**
 * Convert a string from snake_case to camelCase
 * @example snakeToCamel('metadata_concurrency') // 'metadataConcurrency'
 */
export function snakeToCamel(str: string): string {
  return str.replace(/_([a-z0-9])/g, (_, letter: string) => letter.toUpperCase())
}

function convertKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(convertKeys)
  }
  if (value === null || typeof value !== 'object') {
    return value
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, child]) => [snakeToCamel(key), convertKeys(child)]),
  )
}

/**
 * Recursively convert object keys from snake_case to camelCase.
 * Only plain data is expected (parsed YAML/JSON); class instances lose their prototype.
 */
export function snakeToCamelDeep<T>(obj: T): CamelCasedPropertiesDeep<T> {
  return convertKeys(obj) as CamelCasedPropertiesDeep<T>
}

export type { CamelCasedPropertiesDeep }
