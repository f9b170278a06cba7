// File: src/outputs/excel.ts
// Excel workbook with one sheet per report view, written with exceljs

import { promises as fs } from 'fs'
import * as path from 'path'
import { Workbook, Worksheet } from 'exceljs'
import { Dataset } from '../types'
import { summarize } from '../core/stats'
import { OutputContext, OutputGenerator, reportStem } from './registry'
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

function addTableSheet(
  workbook: Workbook,
  name: string,
  columns: Column<string>[],
  rows: Record<string, string | number>[],
): Worksheet {
  const sheet = workbook.addWorksheet(name, { views: [{ state: 'frozen', ySplit: 1 }] })
  sheet.columns = columns.map((column) => ({ header: column.title, key: column.key, width: column.width }))
  sheet.addRows(rows)
  sheet.getRow(1).font = { bold: true }
  return sheet
}

function addStatisticsSheet(workbook: Workbook, dataset: Dataset, generatedAt: Date): Worksheet {
  const summary = summarize(dataset)
  const sheet = workbook.addWorksheet('Statistics')
  sheet.columns = [
    { header: 'Metric', key: 'metric', width: 32 },
    { header: 'Value', key: 'value', width: 48 },
  ]

  const describeService = (service: typeof summary.mostAvailableService): string =>
    service ? `${service.displayName} (${service.regionCount} regions)` : 'N/A'

  sheet.addRows([
    { metric: 'Generated At', value: generatedAt.toISOString() },
    { metric: 'Total Regions', value: summary.totalRegions },
    { metric: 'Total Services', value: summary.totalServices },
    { metric: 'Total Service Instances', value: summary.totalEdges },
    { metric: 'Average Services per Region', value: summary.averageServicesPerRegion },
    { metric: 'Most Available Service', value: describeService(summary.mostAvailableService) },
    { metric: 'Least Available Service', value: describeService(summary.leastAvailableService) },
    { metric: 'Failed Regions', value: dataset.failedRegions.join(', ') || 'None' },
    { metric: 'Collected At', value: dataset.metadata.collectedAt },
    { metric: 'Collection Duration (seconds)', value: dataset.metadata.durationSeconds },
  ])
  sheet.getRow(1).font = { bold: true }
  return sheet
}

export const excelOutput: OutputGenerator = {
  name: 'excel',
  description: 'Workbook with listing, matrix, region summary, service summary and statistics sheets (XLSX)',
  extension: '.xlsx',
  async generate(dataset: Dataset, context: OutputContext): Promise<string[]> {
    const workbook = new Workbook()
    workbook.created = context.generatedAt

    addTableSheet(workbook, 'Regional Services', REGION_SERVICE_COLUMNS, regionServiceRows(dataset))
    addTableSheet(workbook, 'Service Matrix', matrixColumns(dataset), matrixRows(dataset))
    addTableSheet(workbook, 'Region Summary', REGION_SUMMARY_COLUMNS, regionSummaryRows(dataset))
    addTableSheet(workbook, 'Service Summary', SERVICE_SUMMARY_COLUMNS, serviceSummaryRows(dataset))
    addStatisticsSheet(workbook, dataset, context.generatedAt)

    const directory = path.join(context.outputDir, 'excel')
    await fs.mkdir(directory, { recursive: true })
    const filePath = path.join(directory, `${reportStem(context)}.xlsx`)
    await workbook.xlsx.writeFile(filePath)

    context.logger.info(`Created ${filePath} (${workbook.worksheets.length} sheets)`)
    return [filePath]
  },
}
