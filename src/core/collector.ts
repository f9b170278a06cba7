// File: src/core/collector.ts
// Collection orchestrator: cache check, then a bounded fan-out over regions and services,
// then a deterministic merge into one dataset that is persisted for later runs.

import {
  AvailabilityEdge,
  CollectionMetadata,
  CollectionResult,
  Dataset,
  FeedEntry,
  InfrastructureSource,
  Logger,
  ProgressReporter,
  Region,
  RegionDetails,
  RunState,
  Service,
} from '../types'
import { Settings } from '../config/settings'
import { DataCache } from './cache'
import { RetryPolicy, withTimeout } from './retry'
import { runPool } from './pool'
import { resolveLaunchDates } from './launch-dates'
import { silentProgress } from '../utils/progress'
import { AuthenticationError, CollectionError, TransientIOError, describeError } from './errors'

export type CollectorSettings = Pick<
  Settings,
  | 'cacheEnabled'
  | 'maxWorkers'
  | 'maxRetries'
  | 'callTimeoutSeconds'
  | 'launchDates'
  | 'collectionDeadlineSeconds'
  | 'awsProfile'
  | 'awsRegion'
>

export interface DataCollectorOptions {
  source: InfrastructureSource
  cache: DataCache
  settings: CollectorSettings
  logger: Logger
  // Region launch announcements; only consulted on a fresh collection
  loadFeed?: () => Promise<Record<string, FeedEntry>>
  // Credential check run before the first remote call of a fresh collection
  verifyAccess?: () => Promise<unknown>
  // Ticked once per finished region unit
  progress?: ProgressReporter
  retry?: RetryPolicy
  now?: () => Date
}

/**
 * What one region unit learned. `services` is absent when its service list could not be fetched.
 */
export interface RegionObservation {
  code: string
  details: RegionDetails
  services?: string[]
}

const edgeKey = (regionCode: string, serviceCode: string): string => `${regionCode}\u0000${serviceCode}`

const compareCodes = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

export function fallbackRegionDetails(code: string): RegionDetails {
  return { displayName: code, partition: 'Unknown', availabilityZoneCount: 0 }
}

/**
 * Merge per-region observations into a dataset
 *
 * The result depends only on the set of observations, not their order: regions,
 * services and edges are keyed and sorted by code. Edges naming a service that is not
 * in `serviceNames` are dropped.
 */
export function buildDataset(
  observations: readonly RegionObservation[],
  serviceNames: Record<string, string>,
  feed: Record<string, FeedEntry>,
  metadata: CollectionMetadata,
): Dataset {
  const sorted = [...observations].sort((a, b) => compareCodes(a.code, b.code))

  // Object.fromEntries defines own properties, so codes such as "constructor" or "__proto__" stay plain keys
  const services: Record<string, Service> = Object.fromEntries(
    Object.keys(serviceNames)
      .sort(compareCodes)
      .map((code): [string, Service] => [code, { code, displayName: serviceNames[code] }]),
  )

  const ssmDates = Object.fromEntries(sorted.map((observation) => [observation.code, observation.details.launchDate]))
  const launchDates = resolveLaunchDates(ssmDates, feed)

  const regions = new Map<string, Region>()
  const edges = new Map<string, AvailabilityEdge>()
  const failedRegions: string[] = []

  for (const { code, details, services: offered } of sorted) {
    const launch = Object.hasOwn(launchDates, code) ? launchDates[code] : undefined
    regions.set(code, {
      code,
      displayName: details.displayName,
      launchDate: launch?.launchDate,
      launchDateSource: launch?.source ?? 'Unknown',
      announcementUrl: launch?.announcementUrl,
      partition: details.partition,
      availabilityZoneCount: details.availabilityZoneCount,
    })

    if (offered === undefined) {
      failedRegions.push(code)
      continue
    }
    for (const serviceCode of offered) {
      if (Object.hasOwn(services, serviceCode)) {
        edges.set(edgeKey(code, serviceCode), [code, serviceCode])
      }
    }
  }

  const availability = [...edges.values()].sort(
    ([regionA, serviceA], [regionB, serviceB]) => compareCodes(regionA, regionB) || compareCodes(serviceA, serviceB),
  )

  return { regions: Object.fromEntries(regions), services, availability, failedRegions, metadata }
}

/**
 * Collects the region/service availability dataset
 *
 * A valid cache entry short-circuits the run. Otherwise regions and services are
 * listed up front (any failure there is fatal), then each region and each service is
 * fetched as an independent unit in a pool of `maxWorkers`. A region whose service
 * list cannot be fetched ends up in `failedRegions`; the run only fails when every
 * region did.
 */
export class DataCollector {
  private readonly source: InfrastructureSource
  private readonly cache: DataCache
  private readonly settings: CollectorSettings
  private readonly logger: Logger
  private readonly loadFeed?: () => Promise<Record<string, FeedEntry>>
  private readonly verifyAccess?: () => Promise<unknown>
  private readonly progress: ProgressReporter
  private readonly retry: RetryPolicy
  private readonly now: () => Date

  constructor(options: DataCollectorOptions) {
    this.source = options.source
    this.cache = options.cache
    this.settings = options.settings
    this.logger = options.logger
    this.loadFeed = options.loadFeed
    this.verifyAccess = options.verifyAccess
    this.progress = options.progress ?? silentProgress
    this.retry =
      options.retry ?? new RetryPolicy({ maxAttempts: options.settings.maxRetries }, { logger: options.logger })
    this.now = options.now ?? (() => new Date())
  }

  async collect(): Promise<CollectionResult> {
    const states: RunState[] = []
    const enter = (state: RunState): void => {
      states.push(state)
      this.logger.debug(`Collector: ${state}`)
    }

    enter('Init')
    enter('CacheCheck')
    if (this.settings.cacheEnabled) {
      const cached = await this.cache.loadValid()
      if (cached) {
        enter('CacheHit')
        this.logger.info(`Using cached data collected at ${cached.metadata.collectedAt}`)
        enter('Done')
        return { dataset: cached, fromCache: true, states }
      }
    }
    enter('CacheMiss')

    const deadline = this.settings.collectionDeadlineSeconds
    const dataset =
      deadline === undefined
        ? await this.collectFresh(enter)
        : await withTimeout(
            () => this.collectFresh(enter),
            deadline * 1000,
            () => new CollectionError(`Collection did not finish within ${deadline}s`),
          )

    enter('PersistAttempt')
    if (this.settings.cacheEnabled) {
      try {
        await this.cache.save(dataset)
        this.logger.info(`Cached data for ${this.cache.ttlHours}h at ${this.cache.filePath}`)
      } catch (error) {
        this.logger.warn(`Could not write cache file ${this.cache.filePath}: ${describeError(error)}`)
      }
    }

    enter('Done')
    return { dataset, fromCache: false, states }
  }

  private async collectFresh(enter: (state: RunState) => void): Promise<Dataset> {
    const startedAt = this.now()

    // Fail fast on bad credentials before any Parameter Store call
    if (this.verifyAccess) {
      await this.verifyAccess()
    }

    enter('Prefetch')
    let regionCodes: string[]
    let serviceCodes: string[]
    try {
      ;[regionCodes, serviceCodes] = await Promise.all([
        this.call('list regions', () => this.source.listRegionCodes()),
        this.call('list services', () => this.source.listServiceCodes()),
      ])
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error
      }
      throw new CollectionError(`Could not list regions and services: ${describeError(error)}`, error)
    }
    regionCodes = [...new Set(regionCodes)]
    serviceCodes = [...new Set(serviceCodes)]
    this.logger.info(`Found ${regionCodes.length} regions and ${serviceCodes.length} services`)

    // An empty listing is never cached: it would hide the failure for a whole TTL
    if (regionCodes.length === 0) {
      throw new CollectionError('No regions were listed; nothing could be collected')
    }

    enter('FanOut')
    // The feed downloads while the region units run
    const feed = this.startFeed()

    this.progress.start('Collecting regions', regionCodes.length)
    const regionOutcomes = await runPool(regionCodes, this.settings.maxWorkers, async (code) => {
      try {
        return await this.observeRegion(code)
      } finally {
        this.progress.tick(code)
      }
    })
    // Counted as buildDataset will: a region without a service list is a failure
    const failures = regionOutcomes.filter((outcome) => !outcome.ok || outcome.value.services === undefined).length
    if (failures === regionCodes.length) {
      this.progress.fail('No region could be collected')
    } else {
      this.progress.succeed(`Collected ${regionCodes.length - failures} of ${regionCodes.length} regions`)
    }
    // A unit that threw still keeps its region, with fallback details and no service list
    const observations: RegionObservation[] = []
    regionOutcomes.forEach((outcome, index) => {
      if (outcome.ok) {
        observations.push(outcome.value)
        return
      }
      if (outcome.error instanceof AuthenticationError) {
        throw outcome.error
      }
      this.logger.warn(`Region ${regionCodes[index]} failed: ${describeError(outcome.error)}`)
      observations.push({ code: regionCodes[index], details: fallbackRegionDetails(regionCodes[index]) })
    })

    const nameOutcomes = await runPool(serviceCodes, this.settings.maxWorkers, (code) =>
      this.call(`name of ${code}`, () => this.source.getServiceName(code)),
    )
    const serviceNames = Object.fromEntries(
      nameOutcomes.map((outcome, index) => {
        const code = serviceCodes[index]
        if (!outcome.ok) {
          if (outcome.error instanceof AuthenticationError) {
            throw outcome.error
          }
          this.logger.debug(`Using code as the name of ${code}: ${describeError(outcome.error)}`)
        }
        // A missing longName parameter leaves the code as the name
        return [code, (outcome.ok && outcome.value) || code]
      }),
    )

    enter('Merge')
    const metadata: CollectionMetadata = {
      collectedAt: startedAt.toISOString(),
      durationSeconds: Math.round((this.now().getTime() - startedAt.getTime()) / 10) / 100,
      awsProfile: this.settings.awsProfile,
      awsRegion: this.settings.awsRegion,
      maxWorkers: this.settings.maxWorkers,
      maxRetries: this.settings.maxRetries,
    }
    const dataset = buildDataset(observations, serviceNames, await feed, metadata)

    // Partial results are kept; none at all is fatal
    if (dataset.failedRegions.length === regionCodes.length) {
      throw new CollectionError(`Service availability could not be fetched for any of ${regionCodes.length} regions`)
    }
    for (const code of dataset.failedRegions) {
      this.logger.warn(`Partial collection: no service data for region ${code}`)
    }

    return dataset
  }

  private async observeRegion(code: string): Promise<RegionObservation> {
    // Missing details only degrade the region; a missing service list marks it failed
    let details: RegionDetails
    try {
      details = await this.call(`details of ${code}`, () => this.source.getRegionDetails(code))
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error
      }
      this.logger.warn(`Using fallback details for region ${code}: ${describeError(error)}`)
      details = fallbackRegionDetails(code)
    }

    try {
      const services = await this.call(`services of ${code}`, () => this.source.listRegionServices(code))
      this.logger.debug(`${code}: ${services.length} services`)
      return { code, details, services }
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error
      }
      this.logger.debug(`${code}: service list unavailable (${describeError(error)})`)
      return { code, details }
    }
  }

  private startFeed(): Promise<Record<string, FeedEntry>> {
    if (!this.settings.launchDates || !this.loadFeed) {
      return Promise.resolve({})
    }
    return this.loadFeed().catch((error: unknown) => {
      this.logger.warn(`Announcement feed unavailable: ${describeError(error)}`)
      return {}
    })
  }

  private call<T>(label: string, operation: () => Promise<T>): Promise<T> {
    const seconds = this.settings.callTimeoutSeconds
    const onTimeout = () => new TransientIOError('timeout', `${label} timed out after ${seconds}s`)
    return this.retry.execute(label, () => withTimeout(operation, seconds * 1000, onTimeout))
  }
}
