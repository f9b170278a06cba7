// File: src/outputs/registry.ts
// Output format registry: maps format names to generators and runs the selected ones

import * as path from 'path'
import { Dataset, Logger } from '../types'
import { FatalConfigurationError, describeError } from '../core/errors'

export interface OutputContext {
  outputDir: string
  logger: Logger
  generatedAt: Date
  // CSV file names; the other file formats reuse the stem of `regionsFile`
  regionsFile: string
  matrixFile: string
}

export function reportStem(context: OutputContext): string {
  return path.parse(context.regionsFile).name
}

/**
 * A report format. `generate` writes its files under `context.outputDir`
 * and resolves with their paths (empty for terminal-only formats).
 */
export interface OutputGenerator {
  readonly name: string
  readonly description: string
  readonly extension?: string
  generate(dataset: Dataset, context: OutputContext): Promise<string[]>
}

export class OutputRegistry {
  private readonly generators = new Map<string, OutputGenerator>()

  register(generator: OutputGenerator): this {
    if (this.generators.has(generator.name)) {
      throw new Error(`Output format "${generator.name}" is already registered`)
    }
    this.generators.set(generator.name, generator)
    return this
  }

  get(name: string): OutputGenerator | undefined {
    return this.generators.get(name)
  }

  list(): OutputGenerator[] {
    return [...this.generators.values()]
  }

  /**
   * Look up every requested format, in request order and without duplicates
   *
   * @throws FatalConfigurationError naming every unknown format
   */
  resolve(names: readonly string[]): OutputGenerator[] {
    const requested = [...new Set(names.map((name) => name.trim().toLowerCase()))]
    const unknown = requested.filter((name) => !this.generators.has(name))
    if (unknown.length > 0) {
      throw new FatalConfigurationError(
        `Unknown output format${unknown.length === 1 ? '' : 's'}: ${unknown.join(', ')} ` +
          `(available: ${[...this.generators.keys()].join(', ')})`,
        { unknown },
      )
    }
    return requested.flatMap((name) => this.generators.get(name) ?? [])
  }
}

export interface GenerationResult {
  files: string[]
  failed: string[]
}

/**
 * Run generators one after another. A failing format is logged and skipped.
 */
export async function generateOutputs(
  dataset: Dataset,
  generators: readonly OutputGenerator[],
  context: OutputContext,
): Promise<GenerationResult> {
  const result: GenerationResult = { files: [], failed: [] }

  for (const generator of generators) {
    try {
      const files = await generator.generate(dataset, context)
      result.files.push(...files)
      context.logger.debug(`${generator.name}: wrote ${files.length} file(s)`)
    } catch (error) {
      result.failed.push(generator.name)
      context.logger.error(`Failed to generate ${generator.name} output: ${describeError(error)}`)
    }
  }

  return result
}
