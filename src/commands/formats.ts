// File: src/commands/formats.ts
// Lists the report formats accepted by --format

import { Command } from 'commander'
import { createDefaultRegistry } from '../outputs'
import { formatOutput } from '../utils/formatter'

export function registerFormatCommands(program: Command): void {
  program
    .command('formats')
    .description('List available report formats')
    .action(() => {
      const rows = createDefaultRegistry()
        .list()
        .map((generator) => ({
          Format: generator.name,
          Description: generator.description,
          Extension: generator.extension ?? '(terminal)',
        }))
      formatOutput(rows, 'table')
    })
}
