// File: src/core/filters.ts
// Case-insensitive glob filters applied to a collected dataset before reporting.
// The cached dataset itself is never filtered.

import { minimatch } from 'minimatch'
import { Dataset, Logger } from '../types'

export interface DatasetFilters {
  includeServices?: string[]
  excludeServices?: string[]
  includeRegions?: string[]
  excludeRegions?: string[]
  minServices?: number
}

const matchesAny = (patterns: string[], candidates: string[]): boolean =>
  patterns.some((pattern) => candidates.some((candidate) => minimatch(candidate, pattern, { nocase: true, dot: true })))

/**
 * Whether any filter would change a dataset
 */
export function hasFilters(filters: DatasetFilters): boolean {
  return Boolean(
    filters.includeServices?.length ||
      filters.excludeServices?.length ||
      filters.includeRegions?.length ||
      filters.excludeRegions?.length ||
      (filters.minServices ?? 0) > 0,
  )
}

/**
 * Narrow a dataset by service and region patterns
 *
 * Service patterns match a service's code or name; region patterns match a region's
 * code or display name. Include lists keep only matches, exclude lists then remove
 * matches. When service filters are given, regions left without any service are
 * dropped. Regions with fewer than `minServices` remaining services are dropped last.
 * Edges only survive when both ends survive.
 */
export function applyFilters(dataset: Dataset, filters: DatasetFilters, logger?: Logger): Dataset {
  if (!hasFilters(filters)) {
    return dataset
  }

  const includeServices = filters.includeServices ?? []
  const excludeServices = filters.excludeServices ?? []
  const includeRegions = filters.includeRegions ?? []
  const excludeRegions = filters.excludeRegions ?? []
  const serviceFiltered = includeServices.length > 0 || excludeServices.length > 0

  const services = Object.fromEntries(
    Object.entries(dataset.services).filter(([code, service]) => {
      const names = [code, service.displayName]
      if (includeServices.length > 0 && !matchesAny(includeServices, names)) {
        return false
      }
      return !matchesAny(excludeServices, names)
    }),
  )

  let regionCodes = Object.values(dataset.regions)
    .filter((region) => {
      const names = [region.code, region.displayName]
      if (includeRegions.length > 0 && !matchesAny(includeRegions, names)) {
        return false
      }
      return !matchesAny(excludeRegions, names)
    })
    .map((region) => region.code)

  const edgesFor = (regions: Set<string>) =>
    dataset.availability.filter(
      ([regionCode, serviceCode]) => regions.has(regionCode) && Object.hasOwn(services, serviceCode),
    )

  const serviceCounts = new Map<string, number>()
  for (const [regionCode] of edgesFor(new Set(regionCodes))) {
    serviceCounts.set(regionCode, (serviceCounts.get(regionCode) ?? 0) + 1)
  }

  if (serviceFiltered) {
    regionCodes = regionCodes.filter((code) => (serviceCounts.get(code) ?? 0) > 0)
  }
  const minServices = filters.minServices ?? 0
  if (minServices > 0) {
    regionCodes = regionCodes.filter((code) => (serviceCounts.get(code) ?? 0) >= minServices)
  }

  const keptRegions = new Set(regionCodes)
  const filtered: Dataset = {
    ...dataset,
    regions: Object.fromEntries(Object.entries(dataset.regions).filter(([code]) => keptRegions.has(code))),
    services,
    availability: edgesFor(keptRegions),
    failedRegions: dataset.failedRegions.filter((code) => keptRegions.has(code)),
  }

  logger?.info(
    `Filters kept ${keptRegions.size} of ${Object.keys(dataset.regions).length} regions and ` +
      `${Object.keys(services).length} of ${Object.keys(dataset.services).length} services`,
  )

  return filtered
}
