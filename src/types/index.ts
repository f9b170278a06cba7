// File: src/types/index.ts
// Central location for shared types

/**
 * Where a region's launch date came from
 */
export type LaunchDateSource = 'RSS' | 'SSM' | 'Unknown'

// AWS region as reported by the global-infrastructure namespace
export interface Region {
  code: string
  displayName: string
  launchDate?: string // YYYY-MM-DD
  launchDateSource: LaunchDateSource
  announcementUrl?: string // Only set when the date came from the announcement feed
  partition: string
  availabilityZoneCount: number
}

// AWS service
export interface Service {
  code: string
  displayName: string
}

/**
 * "This service is offered in this region"
 */
export type AvailabilityEdge = [regionCode: string, serviceCode: string]

// Facts about the collection run that produced a dataset
export interface CollectionMetadata {
  collectedAt: string
  durationSeconds: number
  awsProfile?: string
  awsRegion: string
  maxWorkers: number
  maxRetries: number
}

/**
 * Full result of one collection. Every edge references a region and a service
 * present in the same dataset; edges are unique and sorted by region then service.
 */
export interface Dataset {
  regions: Record<string, Region>
  services: Record<string, Service>
  availability: AvailabilityEdge[]
  failedRegions: string[]
  metadata: CollectionMetadata
}

// Persisted cache file
export interface CacheEntry {
  version: 1
  collectedAt: string
  ttlHours: number
  checksum: string
  sizeBytes: number
  payload: Dataset
}

export type CacheStatus = 'absent' | 'corrupt' | 'valid' | 'expired'

// Cache diagnostics, safe to compute on a missing or broken file
export interface CacheStats {
  status: CacheStatus
  filePath: string
  ttlHours: number
  ageHours?: number
  sizeBytes?: number
  collectedAt?: string
  regionCount?: number
  serviceCount?: number
  edgeCount?: number
  failedRegionCount?: number
  error?: string
}

// Per-region metadata read from Parameter Store
export interface RegionDetails {
  displayName: string
  partition: string
  launchDate?: string
  availabilityZoneCount: number
}

// Region launch announcement parsed from the feed
export interface FeedEntry {
  launchDate: string // YYYY-MM-DD
  formattedDate: string
  title: string
  url: string
}

/**
 * Read-only view of the global-infrastructure metadata.
 * Implemented over SSM in production and by in-memory fakes in tests.
 */
export interface InfrastructureSource {
  listRegionCodes(): Promise<string[]>
  listServiceCodes(): Promise<string[]>
  getRegionDetails(regionCode: string): Promise<RegionDetails>
  listRegionServices(regionCode: string): Promise<string[]>
  getServiceName(serviceCode: string): Promise<string | undefined>
}

export type RunState =
  | 'Init'
  | 'CacheCheck'
  | 'CacheHit'
  | 'CacheMiss'
  | 'Prefetch'
  | 'FanOut'
  | 'Merge'
  | 'PersistAttempt'
  | 'Done'

export interface CollectionResult {
  dataset: Dataset
  fromCache: boolean
  states: RunState[]
}

/**
 * Live progress of a long-running phase, shown as a spinner in the terminal
 */
export interface ProgressReporter {
  start(label: string, total: number): void
  tick(detail?: string): void
  succeed(message: string): void
  fail(message: string): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

// Command options shared across commands
export interface BaseCommandOptions {
  profile?: string
  region?: string
  logLevel?: string
  quiet?: boolean
}

export interface CacheCommandOptions extends BaseCommandOptions {
  outputDir?: string
  cacheFile?: string
  cacheHours?: number
  output?: string
}

export interface ReportCommandOptions extends CacheCommandOptions {
  format?: string[]
  maxWorkers?: number
  maxRetries?: number
  timeout?: number
  cache?: boolean
  refreshCache?: boolean
  launchDates?: boolean
  feedUrl?: string
  allowHttp?: boolean
  regionsFile?: string
  matrixFile?: string
  deadline?: number
  includeService?: string[]
  excludeService?: string[]
  includeRegion?: string[]
  excludeRegion?: string[]
  minServices?: number
}
