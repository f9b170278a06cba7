// File: src/core/cache.ts
// Durable, TTL-bounded cache holding one full collection result.
// A missing, unreadable or tampered file is always a cache miss, never an error.

import { promises as fs } from 'fs'
import * as path from 'path'
import { createHash, randomBytes } from 'crypto'
import { z } from 'zod'
import { CacheEntry, CacheStats, Dataset, Logger } from '../types'
import { CacheCorruptionError, describeError } from './errors'

const CACHE_VERSION = 1
const MS_PER_HOUR = 3_600_000

const regionSchema = z.object({
  code: z.string().min(1),
  displayName: z.string(),
  launchDate: z.string().optional(),
  launchDateSource: z.enum(['RSS', 'SSM', 'Unknown']),
  announcementUrl: z.string().optional(),
  partition: z.string(),
  availabilityZoneCount: z.number().int().nonnegative(),
})

const serviceSchema = z.object({
  code: z.string().min(1),
  displayName: z.string(),
})

const datasetSchema = z
  .object({
    regions: z.record(regionSchema),
    services: z.record(serviceSchema),
    availability: z.array(z.tuple([z.string(), z.string()])),
    failedRegions: z.array(z.string()),
    metadata: z.object({
      collectedAt: z.string(),
      durationSeconds: z.number().nonnegative(),
      awsProfile: z.string().optional(),
      awsRegion: z.string(),
      maxWorkers: z.number().int().positive(),
      maxRetries: z.number().int().positive(),
    }),
  })
  .superRefine((dataset, context) => {
    for (const [regionCode, serviceCode] of dataset.availability) {
      if (!Object.hasOwn(dataset.regions, regionCode) || !Object.hasOwn(dataset.services, serviceCode)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          message: `availability edge (${regionCode}, ${serviceCode}) references an unknown region or service`,
        })
        return
      }
    }
  })

const entrySchema = z.object({
  version: z.literal(CACHE_VERSION),
  collectedAt: z.string().datetime(),
  ttlHours: z.number().positive(),
  checksum: z.string().regex(/^[0-9a-f]{64}$/),
  sizeBytes: z.number().int().nonnegative(),
  payload: datasetSchema,
})

type Inspection = { ok: true; entry: CacheEntry } | { ok: false; reason: string }

/**
 * Serialize with object keys sorted at every level, so equal data always hashes the same
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value))
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, child]) => [key, sortKeys(child)]),
    )
  }
  return value
}

/**
 * Integrity marker covering everything that decides whether an entry is trusted
 */
export function computeChecksum(entry: Pick<CacheEntry, 'version' | 'collectedAt' | 'ttlHours' | 'payload'>): string {
  const { version, collectedAt, ttlHours, payload } = entry
  return createHash('sha256').update(canonicalJson({ version, collectedAt, ttlHours, payload })).digest('hex')
}

function payloadSize(payload: Dataset): number {
  return Buffer.byteLength(canonicalJson(payload), 'utf8')
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Parse and verify raw cache file contents without throwing
 */
export function inspectEntry(raw: string): Inspection {
  let document: unknown
  try {
    document = JSON.parse(raw)
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${describeError(error)}` }
  }

  const parsed = entrySchema.safeParse(document)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return { ok: false, reason: `schema mismatch at ${issue.path.join('.') || '<root>'}: ${issue.message}` }
  }

  const entry: CacheEntry = parsed.data
  if (computeChecksum(entry) !== entry.checksum) {
    return { ok: false, reason: 'checksum mismatch' }
  }
  if (payloadSize(entry.payload) !== entry.sizeBytes) {
    return { ok: false, reason: 'size marker mismatch' }
  }

  return { ok: true, entry }
}

export interface DataCacheOptions {
  filePath: string
  ttlHours: number
  logger: Logger
  now?: () => Date
}

/**
 * File-backed cache for the collected dataset
 *
 * The file is written as compact JSON through a temporary file and a rename, so a
 * crash mid-write leaves either the previous entry or a stray temp file, never a
 * half-written cache. The checksum still guards against anything that slips through.
 */
export class DataCache {
  readonly filePath: string
  readonly ttlHours: number
  private readonly logger: Logger
  private readonly now: () => Date

  constructor(options: DataCacheOptions) {
    this.filePath = options.filePath
    this.ttlHours = options.ttlHours
    this.logger = options.logger
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Read the persisted entry. Returns undefined when it is absent or corrupt.
   */
  async load(): Promise<CacheEntry | undefined> {
    let raw: string
    try {
      raw = await fs.readFile(this.filePath, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.debug(`No cache file at ${this.filePath}`)
      } else {
        this.reportCorruption(`unreadable: ${describeError(error)}`)
      }
      return undefined
    }

    const inspection = inspectEntry(raw)
    if (!inspection.ok) {
      this.reportCorruption(inspection.reason)
      return undefined
    }

    return inspection.entry
  }

  /**
   * An entry is valid while its integrity marker matches and its age is within the TTL.
   * The window is the shorter of the TTL it was saved with and the one configured now.
   */
  isValid(entry: CacheEntry): boolean {
    if (computeChecksum(entry) !== entry.checksum) {
      return false
    }
    return this.ageHours(entry) <= Math.min(entry.ttlHours, this.ttlHours)
  }

  async loadValid(): Promise<Dataset | undefined> {
    const entry = await this.load()
    if (!entry) {
      return undefined
    }
    if (!this.isValid(entry)) {
      this.logger.info(`Cache expired (age ${this.ageHours(entry).toFixed(1)}h, TTL ${this.ttlHours}h)`)
      return undefined
    }

    this.logger.debug(`Loaded cache from ${this.filePath}`)
    return entry.payload
  }

  /**
   * Persist a dataset, stamped with the current time
   */
  async save(payload: Dataset): Promise<void> {
    const collectedAt = this.now().toISOString()
    const entry: CacheEntry = {
      version: CACHE_VERSION,
      collectedAt,
      ttlHours: this.ttlHours,
      checksum: computeChecksum({ version: CACHE_VERSION, collectedAt, ttlHours: this.ttlHours, payload }),
      sizeBytes: payloadSize(payload),
      payload,
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true })
    const tmpPath = `${this.filePath}.${randomBytes(4).toString('hex')}.tmp`
    try {
      await fs.writeFile(tmpPath, JSON.stringify(entry), 'utf8')
      await fs.rename(tmpPath, this.filePath)
    } catch (error) {
      await fs.rm(tmpPath, { force: true })
      throw error
    }

    this.logger.debug(`Saved cache to ${this.filePath} (${entry.sizeBytes.toLocaleString()} bytes of payload)`)
  }

  async stats(): Promise<CacheStats> {
    const base = { filePath: this.filePath, ttlHours: this.ttlHours }

    let raw: string
    try {
      raw = await fs.readFile(this.filePath, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) {
        return { ...base, status: 'absent' }
      }
      return { ...base, status: 'corrupt', error: describeError(error) }
    }

    const sizeBytes = Buffer.byteLength(raw, 'utf8')
    const inspection = inspectEntry(raw)
    if (!inspection.ok) {
      return { ...base, status: 'corrupt', sizeBytes, error: inspection.reason }
    }

    const { entry } = inspection
    return {
      ...base,
      status: this.isValid(entry) ? 'valid' : 'expired',
      sizeBytes,
      collectedAt: entry.collectedAt,
      ageHours: this.ageHours(entry),
      regionCount: Object.keys(entry.payload.regions).length,
      serviceCount: Object.keys(entry.payload.services).length,
      edgeCount: entry.payload.availability.length,
      failedRegionCount: entry.payload.failedRegions.length,
    }
  }

  /**
   * Delete the cache file
   *
   * @returns Whether a file was removed
   */
  async clear(): Promise<boolean> {
    try {
      await fs.unlink(this.filePath)
    } catch (error) {
      if (isMissingFile(error)) {
        return false
      }
      throw error
    }

    this.logger.debug(`Removed cache file ${this.filePath}`)
    return true
  }

  private ageHours(entry: CacheEntry): number {
    return (this.now().getTime() - Date.parse(entry.collectedAt)) / MS_PER_HOUR
  }

  private reportCorruption(reason: string): void {
    const error = new CacheCorruptionError(this.filePath, reason)
    this.logger.warn(`${error.message}; treating it as a cache miss`)
  }
}
