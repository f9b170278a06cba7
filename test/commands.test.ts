import { describe, expect, it } from 'vitest'
import { Command } from 'commander'
import { cacheStatsRows } from '../src/commands/cache'
import { registerCommands } from '../src/commands'

describe('cacheStatsRows', () => {
  it('lists every known property of a valid cache', () => {
    const rows = cacheStatsRows({
      status: 'valid',
      filePath: '/tmp/cache.json',
      ttlHours: 24,
      ageHours: 1.23456,
      sizeBytes: 2048,
      collectedAt: '2026-01-01T00:00:00.000Z',
      regionCount: 2,
      serviceCount: 2,
      edgeCount: 3,
      failedRegionCount: 0,
    })

    expect(rows).toEqual([
      { Property: 'Status', Value: 'valid' },
      { Property: 'File', Value: '/tmp/cache.json' },
      { Property: 'TTL (hours)', Value: 24 },
      { Property: 'Collected at', Value: '2026-01-01T00:00:00.000Z' },
      { Property: 'Age (hours)', Value: 1.23 },
      { Property: 'Size (bytes)', Value: 2048 },
      { Property: 'Regions', Value: 2 },
      { Property: 'Services', Value: 2 },
      { Property: 'Availability entries', Value: 3 },
      { Property: 'Failed regions', Value: 0 },
    ])
  })

  it('skips what an absent cache cannot report', () => {
    expect(cacheStatsRows({ status: 'absent', filePath: '/tmp/cache.json', ttlHours: 24 })).toEqual([
      { Property: 'Status', Value: 'absent' },
      { Property: 'File', Value: '/tmp/cache.json' },
      { Property: 'TTL (hours)', Value: 24 },
    ])
  })
})

describe('registerCommands', () => {
  it('registers the report as the default command', () => {
    const program = new Command()
    registerCommands(program)

    expect(program.commands.map((command) => command.name())).toEqual([
      'report',
      'cache-stats',
      'clear-cache',
      'formats',
    ])
  })

  it('accepts repeated filter patterns on the report command', () => {
    const program = new Command()
    registerCommands(program)
    const report = program.commands.find((command) => command.name() === 'report')

    expect(report?.options.map((option) => option.long)).toEqual(
      expect.arrayContaining([
        '--format',
        '--include-service',
        '--exclude-region',
        '--no-cache',
        '--deadline',
        '--regions-file',
        '--matrix-file',
      ]),
    )
  })
})
