// File: src/outputs/table.ts
// Region summary printed to the terminal, no file written

import { Dataset } from '../types'
import { formatOutput } from '../utils/formatter'
import { OutputContext, OutputGenerator } from './registry'
import { REGION_SUMMARY_COLUMNS, regionSummaryRows } from './rows'

const TABLE_COLUMNS = REGION_SUMMARY_COLUMNS.filter((column) => column.key !== 'announcementUrl')

export const tableOutput: OutputGenerator = {
  name: 'table',
  description: 'Region summary printed to the terminal',
  async generate(dataset: Dataset, _context: OutputContext): Promise<string[]> {
    const rows = regionSummaryRows(dataset).map((row) =>
      Object.fromEntries(TABLE_COLUMNS.map((column) => [column.title, row[column.key]])),
    )
    formatOutput(rows, 'table', 'Region Summary')
    return []
  },
}
