#!/usr/bin/env tsx
import { program } from 'commander'
import { settings } from '../lib/config'
import { exitCodeFor } from '../lib/errors'
import { type Logger, createLogger } from '../lib/logger'
import { loadPublicationFile } from '../lib/publication'
import { App } from './app'

interface CommonOptions {
  config: string
  logLevel: string
}

function createApp(options: CommonOptions): { app: App; logger: Logger } {
  const logger = createLogger(options.logLevel)
  const publication = loadPublicationFile(options.config)
  const app = new App({ publication, logger, defaultCacheDir: settings.cacheDir })
  return { app, logger }
}

function fail(error: unknown): void {
  console.error(error instanceof Error ? error.message : String(error))
  process.exitCode = exitCodeFor(error)
}

program
  .name('txpublish')
  .description('Publish synchronized content into a transactional repository')
  .version('0.1.0')

// ─────────────────────────────────────────────────────────────────────────────
// Publication
// ─────────────────────────────────────────────────────────────────────────────

program
  .command('publish', { isDefault: true })
  .description('Run every sync job inside one transaction and commit it')
  .option('-c, --config <path>', 'Publication file', settings.configPath)
  .option('-l, --log-level <level>', 'Log level', settings.logLevel)
  .action(async (options: CommonOptions) => {
    try {
      const { app, logger } = createApp(options)
      const report = await app.orchestrator.run()
      logger.info({ report }, 'Publication finished')
    } catch (e) {
      fail(e)
    }
  })

// ─────────────────────────────────────────────────────────────────────────────
// Maintenance
// ─────────────────────────────────────────────────────────────────────────────

program
  .command('gc')
  .description('Run garbage collection if the configured interval has elapsed')
  .option('-c, --config <path>', 'Publication file', settings.configPath)
  .option('-l, --log-level <level>', 'Log level', settings.logLevel)
  .option('-f, --force', 'Collect even if the interval has not elapsed', false)
  .action(async (options: CommonOptions & { force: boolean }) => {
    try {
      const { app } = createApp(options)
      const outcome = await app.gcThrottle.run({ force: options.force })
      console.log(`GC ${outcome} (state: ${app.gcThrottle.statePath})`)
      if (outcome === 'failed') {
        process.exitCode = 1
      }
    } catch (e) {
      fail(e)
    }
  })

program
  .command('validate')
  .description('Validate the publication file and print each job command line')
  .option('-c, --config <path>', 'Publication file', settings.configPath)
  .option('-l, --log-level <level>', 'Log level', settings.logLevel)
  .action((options: CommonOptions) => {
    try {
      const { app } = createApp(options)
      const jobs = app.orchestrator.describeJobs()
      console.log(`Configuration OK: ${options.config}`)
      console.log(`${jobs.length} job(s):`)
      for (const { job, command } of jobs) {
        console.log(`  ${job.name.padEnd(24)} ${command.join(' ')}`)
      }
    } catch (e) {
      fail(e)
    }
  })

await program.parseAsync()
