import { z } from 'zod'
import { snakeToCamelDeep } from '../case-convert'
import type { AuthorizationSettings, PublicationConfig, SyncJobSpec, ToolPaths } from '../types'

/**
 * Split a comma-and-whitespace delimited list, dropping empty tokens.
 * @example parseTokenList('*.tmp, .snapshot,,  core.*') // ['*.tmp', '.snapshot', 'core.*']
 */
export function parseTokenList(value: string): string[] {
  return value.split(/[\s,]+/).filter((token) => token.length > 0)
}

// Positive integer, given either as a YAML number or as a string of digits
const positiveInt = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(/^\d+$/, 'Must be a positive integer')
      .transform((value) => Number.parseInt(value, 10)),
  ])
  .pipe(z.number().int('Must be a positive integer').positive('Must be a positive integer'))

const tokenList = z
  .union([
    z.string().transform(parseTokenList),
    z.array(z.string()).transform((items) => items.flatMap(parseTokenList)),
  ])
  .optional()
  .transform((tokens) => tokens ?? [])

const nonEmptyString = z.string().trim().min(1, 'Must not be empty')

function requiredKey(key: string) {
  return z
    .string({ required_error: `Missing required key "${key}"` })
    .trim()
    .min(1, `"${key}" must not be empty`)
}

// Repository names end up in file names, so no path separators
const repoNamePattern = /^[A-Za-z0-9][A-Za-z0-9._-]*$/

// Job names start with a letter so YAML key order is preserved as declared
const jobNamePattern = /^[A-Za-z][A-Za-z0-9._-]*$/

// =============================================================================
// Sync Job
// =============================================================================

/**
 * Sync job section schema (snake_case, as written in YAML)
 */
export const syncJobSchema = z.object({
  source: requiredKey('source').describe('Primary source location'),
  secondary_source: nonEmptyString.optional().describe('Bulk-transfer source'),
  destination: requiredKey('destination').describe('Destination path inside the repository'),
  concurrency: positiveInt.optional().describe('Transfer worker count'),
  metadata_concurrency: positiveInt.optional().describe('Metadata worker count'),
  max_time: positiveInt.optional().describe('Time budget in seconds'),
  ignore: tokenList.describe('Patterns to skip'),
  include: tokenList.describe('Patterns to restrict to'),
})

// =============================================================================
// Authorization
// =============================================================================

export const authorizationSchema = z.object({
  file: nonEmptyString.optional().describe('Static authorization file'),
  command: nonEmptyString
    .optional()
    .describe('Command writing an authorization file; {output} is the target path'),
  voms: nonEmptyString.optional().describe('Required credential extension attribute'),
  proxy: nonEmptyString.optional().describe('Credential file location'),
  min_lifetime_hours: z
    .number()
    .positive()
    .optional()
    .default(6)
    .describe('Renew the credential below this remaining lifetime'),
})

// =============================================================================
// Tools
// =============================================================================

export const toolsSchema = z
  .object({
    sync: nonEmptyString.default('repo-sync'),
    storage: nonEmptyString.default('cvmfs_server'),
    proxy_info: nonEmptyString.default('voms-proxy-info'),
    proxy_init: nonEmptyString.default('voms-proxy-init'),
    shell: nonEmptyString.default('/bin/sh'),
  })
  .default({})

// =============================================================================
// Publication
// =============================================================================

/**
 * Publication file schema. Job sections are validated one by one through
 * {@link safeParseSyncJobSpec} so every job is resolved the same way.
 */
export const publicationSchema = z.object({
  repo: requiredKey('repo').pipe(
    z.string().regex(repoNamePattern, 'Must be alphanumeric with dots, dashes or underscores'),
  ),
  cache_dir: nonEmptyString.optional(),
  gc_interval: positiveInt.optional().default(1440).describe('Minutes between garbage collections'),
  fail_on_job_error: z.boolean().optional().default(true),
  metrics_file: nonEmptyString.optional(),
  tools: toolsSchema,
  authorization: authorizationSchema.optional(),
  jobs: z
    .record(z.string().regex(jobNamePattern, 'Job names must start with a letter'), z.unknown())
    .optional()
    .default({}),
})

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validation error with path
 */
export interface ValidationError {
  path: string
  message: string
}

/**
 * Parse result type
 */
export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] }

/**
 * Configuration that failed validation.
 */
export class ConfigError extends Error {
  /** Process exit status (EX_CONFIG). */
  readonly exitCode = 78

  constructor(
    public readonly source: string,
    public readonly errors: ValidationError[],
  ) {
    const errorList = errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')
    super(`Invalid publication configuration in ${source}:\n${errorList}`)
    this.name = 'ConfigError'
  }
}

function toValidationErrors(error: z.ZodError, prefix: string[] = []): ValidationError[] {
  return error.issues.map((issue) => ({
    path: [...prefix, ...issue.path].join('.') || '/',
    message: issue.message,
  }))
}

/**
 * Safely resolve one job section into a SyncJobSpec
 */
export function safeParseSyncJobSpec(name: string, section: unknown): ParseResult<SyncJobSpec> {
  const result = syncJobSchema.safeParse(section ?? {})
  if (!result.success) {
    return { success: false, errors: toValidationErrors(result.error, ['jobs', name]) }
  }
  return { success: true, data: { name, ...snakeToCamelDeep(result.data) } }
}

/**
 * Resolve one job section into a SyncJobSpec, throwing ConfigError when
 * `source` or `destination` is missing or a value does not validate.
 */
export function resolveSyncJobSpec(name: string, section: unknown): SyncJobSpec {
  const result = safeParseSyncJobSpec(name, section)
  if (!result.success) {
    throw new ConfigError(`job "${name}"`, result.errors)
  }
  return result.data
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

/**
 * Safely parse publication data into a frozen PublicationConfig
 */
export function safeParsePublicationConfig(data: unknown): ParseResult<PublicationConfig> {
  const result = publicationSchema.safeParse(data)
  if (!result.success) {
    return { success: false, errors: toValidationErrors(result.error) }
  }

  const raw = result.data
  const errors: ValidationError[] = []
  const jobs: SyncJobSpec[] = []
  for (const [name, section] of Object.entries(raw.jobs)) {
    const job = safeParseSyncJobSpec(name, section)
    if (job.success) {
      jobs.push(job.data)
    } else {
      errors.push(...job.errors)
    }
  }
  if (errors.length > 0) {
    return { success: false, errors }
  }

  const tools: ToolPaths = snakeToCamelDeep(raw.tools)
  const authorization: AuthorizationSettings | undefined = raw.authorization
    ? snakeToCamelDeep(raw.authorization)
    : undefined

  const config: PublicationConfig = {
    repo: raw.repo,
    cacheDir: raw.cache_dir,
    gcIntervalMinutes: raw.gc_interval,
    failOnJobError: raw.fail_on_job_error,
    metricsFile: raw.metrics_file,
    tools,
    authorization,
    jobs,
  }
  return { success: true, data: deepFreeze(config) }
}

/**
 * Parse publication data, throwing ConfigError on invalid input
 */
export function parsePublicationConfig(data: unknown, source = 'configuration'): PublicationConfig {
  const result = safeParsePublicationConfig(data)
  if (!result.success) {
    throw new ConfigError(source, result.errors)
  }
  return result.data
}
