// File: src/outputs/csv.ts
// CSV report formats written with csv-writer

import { promises as fs } from 'fs'
import * as path from 'path'
import { createObjectCsvWriter } from 'csv-writer'
import { Dataset } from '../types'
import { OutputContext, OutputGenerator } from './registry'
import {
  Column,
  REGION_SERVICE_COLUMNS,
  REGION_SUMMARY_COLUMNS,
  SERVICE_SUMMARY_COLUMNS,
  matrixColumns,
  matrixRows,
  regionServiceRows,
  regionSummaryRows,
  serviceSummaryRows,
} from './rows'

const CSV_DIRECTORY = 'csv'

async function writeCsv(
  context: OutputContext,
  fileName: string,
  columns: Column<string>[],
  records: Record<string, string | number>[],
): Promise<string> {
  const directory = path.join(context.outputDir, CSV_DIRECTORY)
  await fs.mkdir(directory, { recursive: true })

  const filePath = path.join(directory, fileName)
  const writer = createObjectCsvWriter({
    path: filePath,
    header: columns.map((column) => ({ id: column.key, title: column.title })),
  })
  await writer.writeRecords(records)

  context.logger.info(`Created ${filePath} (${records.length} rows)`)
  return filePath
}

/**
 * Region/service listing plus the service by region matrix
 */
export const csvOutput: OutputGenerator = {
  name: 'csv',
  description: 'Region/service listing and service availability matrix (CSV)',
  extension: '.csv',
  async generate(dataset: Dataset, context: OutputContext): Promise<string[]> {
    return [
      await writeCsv(context, context.regionsFile, REGION_SERVICE_COLUMNS, regionServiceRows(dataset)),
      await writeCsv(context, context.matrixFile, matrixColumns(dataset), matrixRows(dataset)),
    ]
  },
}

export const regionSummaryOutput: OutputGenerator = {
  name: 'region-summary',
  description: 'One row per region with launch date, partition, zones and service count (CSV)',
  extension: '.csv',
  async generate(dataset: Dataset, context: OutputContext): Promise<string[]> {
    return [await writeCsv(context, 'region_summary.csv', REGION_SUMMARY_COLUMNS, regionSummaryRows(dataset))]
  },
}

export const serviceSummaryOutput: OutputGenerator = {
  name: 'service-summary',
  description: 'One row per service with region count and coverage (CSV)',
  extension: '.csv',
  async generate(dataset: Dataset, context: OutputContext): Promise<string[]> {
    return [await writeCsv(context, 'service_summary.csv', SERVICE_SUMMARY_COLUMNS, serviceSummaryRows(dataset))]
  },
}
