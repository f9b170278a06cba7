// File: src/utils/formatter.ts
// Terminal rendering of command results as a table or JSON

import { Table } from 'console-table-printer'

export type PrintableRow = Record<string, unknown>

/**
 * Flatten values for a table cell: nested objects and arrays become JSON,
 * absent values become an empty cell
 */
function processObjectValues(row: PrintableRow): Record<string, unknown> {
  const result: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(row)) {
    if (value === undefined || value === null) {
      result[key] = ''
    } else if (Array.isArray(value)) {
      result[key] = value.join(', ')
    } else if (typeof value === 'object' && !(value instanceof Date)) {
      result[key] = JSON.stringify(value)
    } else {
      result[key] = value
    }
  }

  return result
}

/**
 * Format and display output based on the specified format
 */
export function formatOutput(data: PrintableRow | PrintableRow[] | undefined, format = 'table', title?: string): void {
  if (!data || (Array.isArray(data) && data.length === 0)) {
    console.log('No data returned')
    return
  }

  switch (format.toLowerCase()) {
    case 'json':
      console.log(JSON.stringify(data, null, 2))
      break

    case 'table': {
      const table = new Table({ title })
      const rows = Array.isArray(data) ? data : [data]
      rows.forEach((row) => table.addRow(processObjectValues(row)))
      table.printTable()
      break
    }

    default:
      console.log('Unsupported output format. Using JSON:')
      console.log(JSON.stringify(data, null, 2))
  }
}
