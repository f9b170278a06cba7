// File: src/outputs/json.ts
// Structured JSON report with summary statistics

import { promises as fs } from 'fs'
import * as path from 'path'
import { Dataset } from '../types'
import { APP_NAME, APP_VERSION } from '../config/constants'
import { groupEdgesByRegion, summarize } from '../core/stats'
import { OutputContext, OutputGenerator, reportStem } from './registry'

/**
 * Document written by the json format
 */
export function buildJsonReport(dataset: Dataset, generatedAt: Date) {
  const summary = summarize(dataset)
  const byRegion = groupEdgesByRegion(dataset)

  const regions = Object.fromEntries(
    Object.keys(dataset.regions)
      .sort()
      .map((code) => {
        const region = dataset.regions[code]
        const services = byRegion[code] ?? []
        return [
          code,
          {
            name: region.displayName,
            launchDate: region.launchDate ?? null,
            launchDateSource: region.launchDateSource,
            announcementUrl: region.announcementUrl ?? null,
            partition: region.partition,
            availabilityZones: region.availabilityZoneCount,
            serviceCount: services.length,
            services: services.map((serviceCode) => ({
              code: serviceCode,
              name: dataset.services[serviceCode]?.displayName ?? serviceCode,
            })),
          },
        ]
      }),
  )

  const services = Object.fromEntries(
    summary.coverage.map((service) => [
      service.code,
      {
        name: service.displayName,
        regionCount: service.regionCount,
        coveragePercent: service.coveragePercent,
        regions: service.regions,
      },
    ]),
  )

  return {
    generatedAt: generatedAt.toISOString(),
    generator: { name: APP_NAME, version: APP_VERSION },
    summary: {
      totalRegions: summary.totalRegions,
      totalServices: summary.totalServices,
      totalServiceInstances: summary.totalEdges,
      averageServicesPerRegion: summary.averageServicesPerRegion,
      mostAvailableService: summary.mostAvailableService?.code ?? null,
      leastAvailableService: summary.leastAvailableService?.code ?? null,
      failedRegionCount: summary.failedRegionCount,
    },
    regions,
    services,
    failedRegions: dataset.failedRegions,
    metadata: dataset.metadata,
  }
}

export const jsonOutput: OutputGenerator = {
  name: 'json',
  description: 'Structured report with regions, services, coverage and run metadata (JSON)',
  extension: '.json',
  async generate(dataset: Dataset, context: OutputContext): Promise<string[]> {
    const directory = path.join(context.outputDir, 'json')
    await fs.mkdir(directory, { recursive: true })

    const filePath = path.join(directory, `${reportStem(context)}.json`)
    const body = JSON.stringify(buildJsonReport(dataset, context.generatedAt), null, 2)
    await fs.writeFile(filePath, `${body}\n`, 'utf8')

    context.logger.info(`Created ${filePath} (${Buffer.byteLength(body, 'utf8').toLocaleString()} bytes)`)
    return [filePath]
  },
}
