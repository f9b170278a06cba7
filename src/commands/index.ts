// File: src/commands/index.ts
// Export all commands
// This file serves as a central registry for all CLI commands in the application

import { Command } from 'commander'
import { registerReportCommands } from './report'
import { registerCacheCommands } from './cache'
import { registerFormatCommands } from './formats'

/**
 * Register all commands with the CLI program
 *
 * Each command module exposes a register function; adding a command means
 * importing it here and calling it below.
 *
 * @param program - The Commander program object to register commands with
 */
export function registerCommands(program: Command): void {
  // Default command: collect and write reports
  registerReportCommands(program)

  // cache-stats and clear-cache
  registerCacheCommands(program)

  // Available --format values
  registerFormatCommands(program)
}
