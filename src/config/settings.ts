// File: src/config/settings.ts
// Run settings: built once from command-line flags and the environment, then passed down explicitly

import * as path from 'path'
import { InvalidArgumentError } from 'commander'
import { z } from 'zod'
import { ReportCommandOptions } from '../types'
import { FatalConfigurationError } from '../core/errors'
import { LOG_LEVELS } from '../utils/logger'
import {
  CACHE_DIRECTORY,
  CACHE_FILE_NAME,
  DEFAULT_CACHE_HOURS,
  DEFAULT_CALL_TIMEOUT_SECONDS,
  DEFAULT_FEED_URL,
  DEFAULT_FORMATS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MATRIX_FILE,
  DEFAULT_MAX_WORKERS,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_REGION,
  DEFAULT_REGIONS_FILE,
  MAX_CACHE_HOURS,
} from './constants'

const patternList = z.array(z.string().min(1)).default([])

// Written inside the csv directory, so no path separators
const csvFileName = z.string().regex(/^[^/\\]+\.csv$/i, 'must be a file name ending in .csv, without a directory')

export const settingsSchema = z.object({
  outputDir: z.string().min(1),
  regionsFile: csvFileName,
  matrixFile: csvFileName,
  formats: z.array(z.string().min(1)).min(1),
  awsProfile: z.string().min(1).optional(),
  awsRegion: z.string().regex(/^[a-z]{2}(-[a-z]+)+-\d+$/, 'must look like a region code, e.g. us-east-1'),
  maxWorkers: z.number().int().min(1).max(100),
  maxRetries: z.number().int().min(1).max(10),
  callTimeoutSeconds: z.number().positive().max(600),
  cacheEnabled: z.boolean(),
  cacheHours: z.number().positive().max(MAX_CACHE_HOURS),
  cacheFile: z.string().min(1),
  refreshCache: z.boolean(),
  launchDates: z.boolean(),
  feedUrl: z.string().url(),
  allowHttpFallback: z.boolean(),
  collectionDeadlineSeconds: z.number().positive().optional(),
  includeServices: patternList,
  excludeServices: patternList,
  includeRegions: patternList,
  excludeRegions: patternList,
  minServices: z.number().int().nonnegative().default(0),
  logLevel: z.enum(LOG_LEVELS),
  quiet: z.boolean(),
})

export type Settings = z.infer<typeof settingsSchema>

type Environment = Record<string, string | undefined>

/**
 * Build validated settings from command options and environment variables
 *
 * Flags win over `AWS_PROFILE` and `AWS_REGION`; everything else falls back to defaults.
 *
 * @throws FatalConfigurationError when any value is out of range
 */
export function resolveSettings(options: Partial<ReportCommandOptions>, env: Environment = process.env): Settings {
  const outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR

  const candidate = {
    outputDir,
    regionsFile: options.regionsFile ?? DEFAULT_REGIONS_FILE,
    matrixFile: options.matrixFile ?? DEFAULT_MATRIX_FILE,
    formats: options.format ?? DEFAULT_FORMATS,
    awsProfile: options.profile || env.AWS_PROFILE || undefined,
    awsRegion: options.region || env.AWS_REGION || DEFAULT_REGION,
    maxWorkers: options.maxWorkers ?? DEFAULT_MAX_WORKERS,
    maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
    callTimeoutSeconds: options.timeout ?? DEFAULT_CALL_TIMEOUT_SECONDS,
    cacheEnabled: options.cache ?? true,
    cacheHours: options.cacheHours ?? DEFAULT_CACHE_HOURS,
    cacheFile: options.cacheFile ?? path.join(outputDir, CACHE_DIRECTORY, CACHE_FILE_NAME),
    refreshCache: options.refreshCache ?? false,
    launchDates: options.launchDates ?? true,
    feedUrl: options.feedUrl ?? DEFAULT_FEED_URL,
    allowHttpFallback: options.allowHttp ?? false,
    collectionDeadlineSeconds: options.deadline,
    includeServices: options.includeService,
    excludeServices: options.excludeService,
    includeRegions: options.includeRegion,
    excludeRegions: options.excludeRegion,
    minServices: options.minServices,
    logLevel: options.logLevel ?? 'info',
    quiet: options.quiet ?? false,
  }

  const parsed = settingsSchema.safeParse(candidate)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new FatalConfigurationError(`Invalid configuration: ${problems.join('; ')}`, { problems })
  }

  return parsed.data
}

/**
 * Commander argument parser for whole numbers
 */
export function parseInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.')
  }
  return parsed
}

/**
 * Commander argument parser for positive numbers, fractions allowed
 */
export function parsePositiveNumber(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive number.')
  }
  return parsed
}
