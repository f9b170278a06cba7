// File: src/outputs/index.ts
// Built-in report formats

import { OutputRegistry } from './registry'
import { csvOutput, regionSummaryOutput, serviceSummaryOutput } from './csv'
import { jsonOutput } from './json'
import { excelOutput } from './excel'
import { xmlOutput } from './xml'
import { tableOutput } from './table'

export * from './registry'

/**
 * Registry holding every built-in format, in the order `formats` lists them
 */
export function createDefaultRegistry(): OutputRegistry {
  return new OutputRegistry()
    .register(csvOutput)
    .register(regionSummaryOutput)
    .register(serviceSummaryOutput)
    .register(jsonOutput)
    .register(excelOutput)
    .register(xmlOutput)
    .register(tableOutput)
}
