// File: src/outputs/xml.ts
// XML report built with fast-xml-parser's XMLBuilder

import { promises as fs } from 'fs'
import * as path from 'path'
import { XMLBuilder } from 'fast-xml-parser'
import { Dataset } from '../types'
import { APP_VERSION } from '../config/constants'
import { groupEdgesByRegion, summarize } from '../core/stats'
import { OutputContext, OutputGenerator, reportStem } from './registry'

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n'

export function buildXmlReport(dataset: Dataset, generatedAt: Date): string {
  const summary = summarize(dataset)
  const byRegion = groupEdgesByRegion(dataset)

  const document = {
    awsRegionReport: {
      '@_generatedAt': generatedAt.toISOString(),
      '@_version': APP_VERSION,
      summary: {
        totalRegions: summary.totalRegions,
        totalServices: summary.totalServices,
        totalServiceInstances: summary.totalEdges,
        averageServicesPerRegion: summary.averageServicesPerRegion,
      },
      regions: {
        region: Object.keys(dataset.regions)
          .sort()
          .map((code) => {
            const region = dataset.regions[code]
            return {
              '@_code': code,
              name: region.displayName,
              launchDate: region.launchDate ?? 'Unknown',
              launchDateSource: region.launchDateSource,
              partition: region.partition,
              availabilityZones: region.availabilityZoneCount,
              services: {
                '@_count': byRegion[code]?.length ?? 0,
                service: (byRegion[code] ?? []).map((serviceCode) => ({
                  '@_code': serviceCode,
                  '#text': dataset.services[serviceCode]?.displayName ?? serviceCode,
                })),
              },
            }
          }),
      },
      services: {
        service: summary.coverage.map((service) => ({
          '@_code': service.code,
          '@_regionCount': service.regionCount,
          '@_coveragePercent': service.coveragePercent,
          '#text': service.displayName,
        })),
      },
      failedRegions: {
        region: dataset.failedRegions,
      },
    },
  }

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    textNodeName: '#text',
    format: true,
    indentBy: '  ',
    suppressEmptyNode: true,
  })

  return XML_DECLARATION + builder.build(document)
}

export const xmlOutput: OutputGenerator = {
  name: 'xml',
  description: 'Regions with their services and per-service coverage (XML)',
  extension: '.xml',
  async generate(dataset: Dataset, context: OutputContext): Promise<string[]> {
    const directory = path.join(context.outputDir, 'xml')
    await fs.mkdir(directory, { recursive: true })

    const filePath = path.join(directory, `${reportStem(context)}.xml`)
    await fs.writeFile(filePath, buildXmlReport(dataset, context.generatedAt), 'utf8')

    context.logger.info(`Created ${filePath}`)
    return [filePath]
  },
}
