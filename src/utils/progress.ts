// File: src/utils/progress.ts
// Terminal spinner showing how far the region fan-out has got

import ora from 'ora'
import { ProgressReporter } from '../types'

type Spinner = ReturnType<typeof ora>

// Used in quiet mode and by tests
export const silentProgress: ProgressReporter = {
  start: () => undefined,
  tick: () => undefined,
  succeed: () => undefined,
  fail: () => undefined,
}

/**
 * Spinner with a done/total counter. Written to stderr, so piped report output stays clean.
 */
export class SpinnerProgress implements ProgressReporter {
  private spinner?: Spinner
  private label = ''
  private total = 0
  private done = 0

  start(label: string, total: number): void {
    this.spinner?.stop()
    this.label = label
    this.total = total
    this.done = 0
    this.spinner = ora(this.text()).start()
  }

  tick(detail?: string): void {
    this.done++
    if (this.spinner) {
      this.spinner.text = this.text(detail)
    }
  }

  succeed(message: string): void {
    this.spinner?.succeed(message)
    this.spinner = undefined
  }

  fail(message: string): void {
    this.spinner?.fail(message)
    this.spinner = undefined
  }

  private text(detail?: string): string {
    const counter = `${this.label} ${this.done}/${this.total}`
    return detail ? `${counter} (${detail})` : counter
  }
}

export function createProgressReporter(quiet: boolean): ProgressReporter {
  return quiet ? silentProgress : new SpinnerProgress()
}
