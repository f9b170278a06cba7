// File: src/commands/options.ts
// Options shared by every command that touches AWS or the cache

import { Command, Option } from 'commander'
import { LOG_LEVELS } from '../utils/logger'
import { parsePositiveNumber } from '../config/settings'
import { DEFAULT_CACHE_HOURS, DEFAULT_OUTPUT_DIR, DEFAULT_REGION } from '../config/constants'

export function addCommonOptions(command: Command): Command {
  return command
    .option('--profile <profile>', 'AWS profile to use (defaults to AWS_PROFILE or the default credential chain)')
    .option('--region <region>', `AWS region for API calls (defaults to AWS_REGION, then ${DEFAULT_REGION})`)
    .option('--output-dir <dir>', `Directory for reports and the cache (default: ${DEFAULT_OUTPUT_DIR})`)
    .option('--cache-file <file>', 'Cache file path (default: <output-dir>/cache/aws_data_cache.json)')
    .option('--cache-hours <hours>', `Cache validity in hours (default: ${DEFAULT_CACHE_HOURS})`, parsePositiveNumber)
    .addOption(new Option('--log-level <level>', 'Lowest log level printed').choices(LOG_LEVELS).default('info'))
    .option('-q, --quiet', 'Only print warnings, errors and results')
}
