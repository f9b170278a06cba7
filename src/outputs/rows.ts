// File: src/outputs/rows.ts
// Tabular views of a dataset shared by the CSV, Excel and terminal formats

import { Dataset } from '../types'
import { groupEdgesByRegion, summarize } from '../core/stats'

export type RegionServiceRow = {
  regionCode: string
  regionName: string
  serviceCode: string
  serviceName: string
}

export type RegionSummaryRow = {
  regionCode: string
  regionName: string
  launchDate: string
  launchDateSource: string
  announcementUrl: string
  partition: string
  availabilityZones: number
  serviceCount: number
}

export type ServiceSummaryRow = {
  serviceCode: string
  serviceName: string
  regionCount: number
  coveragePercent: number
}

export type MatrixRow = Record<string, string | number>

export interface Column<K extends string> {
  key: K
  title: string
  width?: number
}

export const REGION_SERVICE_COLUMNS: Column<keyof RegionServiceRow>[] = [
  { key: 'regionCode', title: 'Region Code', width: 18 },
  { key: 'regionName', title: 'Region Name', width: 32 },
  { key: 'serviceCode', title: 'Service Code', width: 28 },
  { key: 'serviceName', title: 'Service Name', width: 48 },
]

export const REGION_SUMMARY_COLUMNS: Column<keyof RegionSummaryRow>[] = [
  { key: 'regionCode', title: 'Region Code', width: 18 },
  { key: 'regionName', title: 'Region Name', width: 32 },
  { key: 'launchDate', title: 'Launch Date', width: 14 },
  { key: 'launchDateSource', title: 'Launch Date Source', width: 18 },
  { key: 'announcementUrl', title: 'Announcement URL', width: 48 },
  { key: 'partition', title: 'Partition', width: 12 },
  { key: 'availabilityZones', title: 'Availability Zones', width: 18 },
  { key: 'serviceCount', title: 'Service Count', width: 14 },
]

export const SERVICE_SUMMARY_COLUMNS: Column<keyof ServiceSummaryRow>[] = [
  { key: 'serviceCode', title: 'Service Code', width: 28 },
  { key: 'serviceName', title: 'Service Name', width: 48 },
  { key: 'regionCount', title: 'Region Count', width: 14 },
  { key: 'coveragePercent', title: 'Coverage %', width: 12 },
]

const sortedRegionCodes = (dataset: Dataset): string[] => Object.keys(dataset.regions).sort()

/**
 * One row per availability edge, in edge order
 */
export function regionServiceRows(dataset: Dataset): RegionServiceRow[] {
  return dataset.availability.map(([regionCode, serviceCode]) => ({
    regionCode,
    regionName: dataset.regions[regionCode]?.displayName ?? regionCode,
    serviceCode,
    serviceName: dataset.services[serviceCode]?.displayName ?? serviceCode,
  }))
}

/**
 * Service by region grid of 1/0 flags
 */
export function matrixColumns(dataset: Dataset): Column<string>[] {
  return [
    { key: 'service', title: 'Service', width: 28 },
    ...sortedRegionCodes(dataset).map((code) => ({ key: code, title: code, width: 14 })),
  ]
}

export function matrixRows(dataset: Dataset): MatrixRow[] {
  const regionCodes = sortedRegionCodes(dataset)
  const offered = new Set(dataset.availability.map(([regionCode, serviceCode]) => `${regionCode}\u0000${serviceCode}`))

  return Object.keys(dataset.services)
    .sort()
    .map((serviceCode) => {
      const row: MatrixRow = { service: serviceCode }
      for (const regionCode of regionCodes) {
        row[regionCode] = offered.has(`${regionCode}\u0000${serviceCode}`) ? 1 : 0
      }
      return row
    })
}

export function regionSummaryRows(dataset: Dataset): RegionSummaryRow[] {
  const byRegion = groupEdgesByRegion(dataset)
  return sortedRegionCodes(dataset).map((code) => {
    const region = dataset.regions[code]
    return {
      regionCode: code,
      regionName: region.displayName,
      launchDate: region.launchDate ?? 'Unknown',
      launchDateSource: region.launchDateSource,
      announcementUrl: region.announcementUrl ?? '',
      partition: region.partition,
      availabilityZones: region.availabilityZoneCount,
      serviceCount: byRegion[code]?.length ?? 0,
    }
  })
}

export function serviceSummaryRows(dataset: Dataset): ServiceSummaryRow[] {
  return summarize(dataset).coverage.map((service) => ({
    serviceCode: service.code,
    serviceName: service.displayName,
    regionCount: service.regionCount,
    coveragePercent: service.coveragePercent,
  }))
}
