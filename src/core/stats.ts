// File: src/core/stats.ts
// Summary statistics over a dataset, shared by the output generators

import { AvailabilityEdge, Dataset } from '../types'

export interface ServiceCoverage {
  code: string
  displayName: string
  regionCount: number
  coveragePercent: number
  regions: string[]
}

export interface DatasetSummary {
  totalRegions: number
  totalServices: number
  totalEdges: number
  averageServicesPerRegion: number
  failedRegionCount: number
  mostAvailableService?: ServiceCoverage
  leastAvailableService?: ServiceCoverage
  coverage: ServiceCoverage[]
}

const roundToTenth = (value: number): number => Math.round(value * 10) / 10

/**
 * Services offered in each region, sorted by code. Every region gets an entry.
 */
export function groupEdgesByRegion(dataset: Dataset): Record<string, string[]> {
  return groupEdges(Object.keys(dataset.regions), knownEdges(dataset))
}

/**
 * Regions offering each service, sorted by code. Every service gets an entry.
 */
export function groupEdgesByService(dataset: Dataset): Record<string, string[]> {
  return groupEdges(
    Object.keys(dataset.services),
    knownEdges(dataset).map(([region, service]): [string, string] => [service, region]),
  )
}

// Edges whose region and service are both listed in the dataset
function knownEdges(dataset: Dataset): AvailabilityEdge[] {
  return dataset.availability.filter(
    ([region, service]) => Object.hasOwn(dataset.regions, region) && Object.hasOwn(dataset.services, service),
  )
}

function groupEdges(keys: string[], pairs: Array<[string, string]>): Record<string, string[]> {
  const grouped = new Map<string, string[]>(keys.map((key) => [key, []]))
  for (const [key, value] of pairs) {
    grouped.get(key)?.push(value)
  }
  for (const values of grouped.values()) {
    values.sort()
  }
  return Object.fromEntries(grouped)
}

export function summarize(dataset: Dataset): DatasetSummary {
  const totalRegions = Object.keys(dataset.regions).length
  const byService = groupEdgesByService(dataset)

  const coverage = Object.keys(dataset.services)
    .sort()
    .map((code) => {
      const regions = Object.hasOwn(byService, code) ? byService[code] : []
      return {
        code,
        displayName: dataset.services[code].displayName,
        regionCount: regions.length,
        coveragePercent: totalRegions === 0 ? 0 : roundToTenth((regions.length / totalRegions) * 100),
        regions,
      }
    })

  // coverage is sorted by code, so the first strict improvement keeps the lowest code on ties
  let mostAvailableService: ServiceCoverage | undefined
  let leastAvailableService: ServiceCoverage | undefined
  for (const service of coverage) {
    if (!mostAvailableService || service.regionCount > mostAvailableService.regionCount) {
      mostAvailableService = service
    }
    if (!leastAvailableService || service.regionCount < leastAvailableService.regionCount) {
      leastAvailableService = service
    }
  }

  return {
    totalRegions,
    totalServices: coverage.length,
    totalEdges: dataset.availability.length,
    averageServicesPerRegion: totalRegions === 0 ? 0 : roundToTenth(dataset.availability.length / totalRegions),
    failedRegionCount: dataset.failedRegions.length,
    mostAvailableService,
    leastAvailableService,
    coverage,
  }
}
