import { promises as fs } from 'fs'
import * as os from 'os'
import * as path from 'path'
import { Dataset, InfrastructureSource, LogLevel, Logger, ProgressReporter, RegionDetails } from '../src/types'

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}

export interface LogLine {
  level: LogLevel
  message: string
}

export function recordingLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = []
  const record = (level: LogLevel) => (message: string) => {
    lines.push({ level, message })
  }
  return {
    lines,
    logger: { debug: record('debug'), info: record('info'), warn: record('warn'), error: record('error') },
  }
}

export interface ProgressEvent {
  event: keyof ProgressReporter
  text: string
  total?: number
}

export function recordingProgress(): { progress: ProgressReporter; events: ProgressEvent[] } {
  const events: ProgressEvent[] = []
  return {
    events,
    progress: {
      start: (label, total) => {
        events.push({ event: 'start', text: label, total })
      },
      tick: (detail) => {
        events.push({ event: 'tick', text: detail ?? '' })
      },
      succeed: (message) => {
        events.push({ event: 'succeed', text: message })
      },
      fail: (message) => {
        events.push({ event: 'fail', text: message })
      },
    },
  }
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'region-report-test-'))
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

export function sampleDataset(): Dataset {
  return {
    regions: {
      r1: {
        code: 'r1',
        displayName: 'Region One',
        launchDate: '2006-08-25',
        launchDateSource: 'RSS',
        announcementUrl: 'https://example.com/r1',
        partition: 'aws',
        availabilityZoneCount: 3,
      },
      r2: {
        code: 'r2',
        displayName: 'Region Two',
        launchDateSource: 'Unknown',
        partition: 'aws',
        availabilityZoneCount: 2,
      },
    },
    services: {
      svcA: { code: 'svcA', displayName: 'Service A' },
      svcB: { code: 'svcB', displayName: 'Service B' },
    },
    availability: [
      ['r1', 'svcA'],
      ['r2', 'svcA'],
      ['r2', 'svcB'],
    ],
    failedRegions: [],
    metadata: {
      collectedAt: '2026-01-01T00:00:00.000Z',
      durationSeconds: 1.5,
      awsRegion: 'us-east-1',
      maxWorkers: 10,
      maxRetries: 3,
    },
  }
}

export interface FakeRegion {
  details?: Partial<RegionDetails>
  services: string[]
}

/**
 * In-memory infrastructure metadata with per-call failure injection.
 * Call keys: `regions`, `services`, `details:<region>`, `services:<region>`, `name:<service>`.
 */
export class FakeInfrastructureSource implements InfrastructureSource {
  readonly calls = new Map<string, number>()
  inFlight = 0
  maxInFlight = 0
  delayMs = 0
  // Each call waits up to this much longer, at random, so completion order varies between runs
  jitterMs = 0
  private readonly failures = new Map<string, (call: number) => Error | undefined>()

  constructor(
    public regions: Record<string, FakeRegion>,
    public serviceNames: Record<string, string>,
  ) {}

  /**
   * Make calls with this key throw. `times` limits how many calls fail; the rest succeed.
   */
  fail(key: string, makeError: () => Error, times = Infinity): this {
    this.failures.set(key, (call) => (call <= times ? makeError() : undefined))
    return this
  }

  callCount(key: string): number {
    return this.calls.get(key) ?? 0
  }

  totalCalls(): number {
    return [...this.calls.values()].reduce((sum, count) => sum + count, 0)
  }

  listRegionCodes(): Promise<string[]> {
    return this.track('regions', () => Object.keys(this.regions))
  }

  listServiceCodes(): Promise<string[]> {
    return this.track('services', () => Object.keys(this.serviceNames))
  }

  getRegionDetails(regionCode: string): Promise<RegionDetails> {
    return this.track(`details:${regionCode}`, () => ({
      displayName: `Region ${regionCode}`,
      partition: 'aws',
      availabilityZoneCount: 3,
      ...this.regions[regionCode]?.details,
    }))
  }

  listRegionServices(regionCode: string): Promise<string[]> {
    return this.track(`services:${regionCode}`, () => [...(this.regions[regionCode]?.services ?? [])])
  }

  getServiceName(serviceCode: string): Promise<string | undefined> {
    return this.track(`name:${serviceCode}`, () => this.serviceNames[serviceCode])
  }

  private async track<T>(key: string, produce: () => T): Promise<T> {
    const call = (this.calls.get(key) ?? 0) + 1
    this.calls.set(key, call)
    this.inFlight++
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    try {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs + Math.random() * this.jitterMs))
      const error = this.failures.get(key)?.(call)
      if (error) {
        throw error
      }
      return produce()
    } finally {
      this.inFlight--
    }
  }
}
