// File: src/commands/report.ts
// Default command: collect region/service availability and write the requested report formats

import { Command } from 'commander'
import { ReportCommandOptions } from '../types'
import { resolveSettings, parseInteger, parsePositiveNumber } from '../config/settings'
import {
  DEFAULT_CALL_TIMEOUT_SECONDS,
  DEFAULT_MATRIX_FILE,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_WORKERS,
  DEFAULT_REGIONS_FILE,
} from '../config/constants'
import { DataCache } from '../core/cache'
import { DataCollector } from '../core/collector'
import { applyFilters, hasFilters } from '../core/filters'
import { describeError, exitCodeFor } from '../core/errors'
import { SsmInfrastructureSource, loadFeedLaunchDates, verifyCredentials } from '../services'
import { createDefaultRegistry, generateOutputs } from '../outputs'
import { createSSMClient, createSTSClient } from '../utils/clients'
import { createLogger } from '../utils/logger'
import { createProgressReporter } from '../utils/progress'
import { formatOutput } from '../utils/formatter'
import { addCommonOptions } from './options'

const EXAMPLES = `
Examples:
  $ aws-region-report                                   Collect (or reuse the cache) and write CSV files
  $ aws-region-report --format csv json excel           Several formats in one run
  $ aws-region-report --profile prod --region eu-west-1 Use a named profile and region
  $ aws-region-report --refresh-cache --max-workers 20  Discard the cache and collect again
  $ aws-region-report --include-service "ec2*" --format table
`

/**
 * Register the report command. It is the default command, so running the
 * binary without a subcommand produces a report.
 */
export function registerReportCommands(program: Command): void {
  const command = program
    .command('report', { isDefault: true })
    .description('Collect service availability for every AWS region and write reports')

  addCommonOptions(command)
    .option('-f, --format <formats...>', 'Output formats to generate (see the formats command)')
    .option('--max-workers <count>', `Concurrent region/service units (default: ${DEFAULT_MAX_WORKERS})`, parseInteger)
    .option('--max-retries <count>', `Attempts per API call (default: ${DEFAULT_MAX_RETRIES})`, parseInteger)
    .option(
      '--timeout <seconds>',
      `Timeout for a single API call (default: ${DEFAULT_CALL_TIMEOUT_SECONDS})`,
      parsePositiveNumber,
    )
    .option('--deadline <seconds>', 'Abort a fresh collection that takes longer than this', parsePositiveNumber)
    .option('--no-cache', 'Ignore the cache and do not write one')
    .option('--refresh-cache', 'Delete the cache before collecting')
    .option('--no-launch-dates', 'Skip the region launch announcement feed')
    .option('--feed-url <url>', 'Region launch announcement feed')
    .option('--allow-http', 'Accept a plain http feed URL')
    .option('--include-service <patterns...>', 'Only report services matching these globs (code or name)')
    .option('--exclude-service <patterns...>', 'Leave out services matching these globs (code or name)')
    .option('--include-region <patterns...>', 'Only report regions matching these globs (code or name)')
    .option('--exclude-region <patterns...>', 'Leave out regions matching these globs (code or name)')
    .option('--min-services <count>', 'Leave out regions offering fewer services than this', parseInteger)
    .option(
      '--regions-file <file>',
      `Region/service CSV file name; other formats reuse its stem (default: ${DEFAULT_REGIONS_FILE})`,
    )
    .option('--matrix-file <file>', `Service/region matrix CSV file name (default: ${DEFAULT_MATRIX_FILE})`)
    .addHelpText('after', EXAMPLES)
    .action(async (options: ReportCommandOptions) => {
      await runReport(options)
    })
}

/**
 * Implementation of the report command
 */
async function runReport(options: ReportCommandOptions): Promise<void> {
  let logger = createLogger()

  try {
    const settings = resolveSettings(options)
    logger = createLogger(settings.logLevel, settings.quiet)

    // Unknown formats are rejected before any AWS call
    const generators = createDefaultRegistry().resolve(settings.formats)

    const cache = new DataCache({ filePath: settings.cacheFile, ttlHours: settings.cacheHours, logger })
    if (settings.refreshCache) {
      const removed = await cache.clear()
      logger.info(removed ? `Removed cache file ${cache.filePath}` : 'No cache file to remove')
    }

    const sts = createSTSClient(settings)
    const collector = new DataCollector({
      source: new SsmInfrastructureSource(createSSMClient(settings)),
      cache,
      settings,
      logger,
      progress: createProgressReporter(settings.quiet),
      loadFeed: () =>
        loadFeedLaunchDates(settings.feedUrl, {
          timeoutSeconds: settings.callTimeoutSeconds,
          allowHttpFallback: settings.allowHttpFallback,
          logger,
        }),
      verifyAccess: async () => {
        const identity = await verifyCredentials(sts)
        logger.debug(`Authenticated as ${identity.arn}`)
      },
    })

    const profile = settings.awsProfile ?? 'default'
    logger.info(`Collecting AWS region data (profile: ${profile}, region: ${settings.awsRegion})`)
    const { dataset, fromCache } = await collector.collect()

    const reported = hasFilters(settings) ? applyFilters(dataset, settings, logger) : dataset
    const { files, failed } = await generateOutputs(reported, generators, {
      outputDir: settings.outputDir,
      logger,
      generatedAt: new Date(),
      regionsFile: settings.regionsFile,
      matrixFile: settings.matrixFile,
    })

    if (!settings.quiet) {
      formatOutput(
        [
          { Metric: 'Regions', Value: Object.keys(reported.regions).length },
          { Metric: 'Services', Value: Object.keys(reported.services).length },
          { Metric: 'Service availability entries', Value: reported.availability.length },
          { Metric: 'Failed regions', Value: reported.failedRegions.join(', ') || 'None' },
          { Metric: 'Data source', Value: fromCache ? `cache (${dataset.metadata.collectedAt})` : 'fresh collection' },
          { Metric: 'Collection time (s)', Value: dataset.metadata.durationSeconds },
          { Metric: 'Files written', Value: files.length },
        ],
        'table',
        'Report complete',
      )
      files.forEach((file) => console.log(`  ${file}`))
    }

    if (failed.length > 0) {
      logger.error(`Some formats could not be generated: ${failed.join(', ')}`)
      process.exit(1)
    }
  } catch (error) {
    logger.error(`Report failed: ${describeError(error)}`)
    process.exit(exitCodeFor(error))
  }
}
