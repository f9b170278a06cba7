// File: src/commands/cache.ts
// Cache inspection and removal commands

import { Command } from 'commander'
import { CacheCommandOptions, CacheStats, Logger } from '../types'
import { resolveSettings } from '../config/settings'
import { DataCache } from '../core/cache'
import { describeError, exitCodeFor } from '../core/errors'
import { createLogger } from '../utils/logger'
import { formatOutput } from '../utils/formatter'
import { addCommonOptions } from './options'

export function registerCacheCommands(program: Command): void {
  addCommonOptions(program.command('cache-stats').description('Show the status and contents of the data cache'))
    .option('-o, --output <format>', 'Output format (json, table)', 'table')
    .action(async (options: CacheCommandOptions) => {
      await showCacheStats(options)
    })

  addCommonOptions(program.command('clear-cache').description('Delete the data cache file')).action(
    async (options: CacheCommandOptions) => {
      await clearCache(options)
    },
  )
}

// Settings are resolved the same way as for a report, so both commands find the same file
function openCache(options: CacheCommandOptions): { logger: Logger; cache: DataCache } {
  const settings = resolveSettings(options)
  const logger = createLogger(settings.logLevel, settings.quiet)
  return { logger, cache: new DataCache({ filePath: settings.cacheFile, ttlHours: settings.cacheHours, logger }) }
}

/**
 * Flatten cache stats into labelled rows for the table view
 */
export function cacheStatsRows(stats: CacheStats): Array<{ Property: string; Value: string | number }> {
  const rows: Array<{ Property: string; Value: string | number | undefined }> = [
    { Property: 'Status', Value: stats.status },
    { Property: 'File', Value: stats.filePath },
    { Property: 'TTL (hours)', Value: stats.ttlHours },
    { Property: 'Collected at', Value: stats.collectedAt },
    { Property: 'Age (hours)', Value: stats.ageHours === undefined ? undefined : Number(stats.ageHours.toFixed(2)) },
    { Property: 'Size (bytes)', Value: stats.sizeBytes },
    { Property: 'Regions', Value: stats.regionCount },
    { Property: 'Services', Value: stats.serviceCount },
    { Property: 'Availability entries', Value: stats.edgeCount },
    { Property: 'Failed regions', Value: stats.failedRegionCount },
    { Property: 'Error', Value: stats.error },
  ]

  return rows.flatMap(({ Property, Value }) => (Value === undefined ? [] : [{ Property, Value }]))
}

async function showCacheStats(options: CacheCommandOptions): Promise<void> {
  try {
    const { cache } = openCache(options)
    const stats = await cache.stats()

    if (options.output === 'json') {
      formatOutput({ ...stats }, 'json')
    } else {
      formatOutput(cacheStatsRows(stats), 'table', 'Cache')
    }
  } catch (error) {
    console.error(`Error reading cache statistics: ${describeError(error)}`)
    process.exit(exitCodeFor(error))
  }
}

async function clearCache(options: CacheCommandOptions): Promise<void> {
  try {
    const { cache } = openCache(options)
    const removed = await cache.clear()
    console.log(removed ? `Removed cache file ${cache.filePath}` : `No cache file at ${cache.filePath}`)
  } catch (error) {
    console.error(`Error clearing cache: ${describeError(error)}`)
    process.exit(exitCodeFor(error))
  }
}
