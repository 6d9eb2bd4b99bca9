/**
 * Report Writer
 *
 * Writes benchmark rows to bench_results.csv and the aggregated summary to
 * summary.json inside one output directory. Both files accumulate across
 * sessions: rows are appended, summary keys are merged.
 *
 * @module output/ReportWriter
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { RECORD_COLUMNS } from '../benchmark/types.js'
import type { BenchmarkRecord, BenchmarkSummary } from '../benchmark/types.js'
import { errorMessage } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('output')

export const RESULTS_FILE = 'bench_results.csv'
export const SUMMARY_FILE = 'summary.json'

export interface ReportWriterConfig {
  /** Directory receiving both files */
  outDir: string
  /** JSON spacing for summary.json (default: 2) */
  jsonSpacing?: number
}

/**
 * Formats one CSV cell. null becomes an empty cell; text containing a
 * delimiter, quote or newline is quoted.
 */
export function formatCsvCell(value: string | number | null): string {
  if (value === null) {
    return ''
  }
  const text = String(value)
  if (/[",\n\r]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`
  }
  return text
}

export function formatCsvRow(record: BenchmarkRecord): string {
  return RECORD_COLUMNS.map((column) => formatCsvCell(record[column])).join(',')
}

export const CSV_HEADER = RECORD_COLUMNS.join(',')

export class ReportWriter {
  private outDir: string
  private jsonSpacing: number

  constructor(config: ReportWriterConfig) {
    if (!config.outDir) {
      throw new Error('outDir is required for ReportWriter')
    }
    this.outDir = path.resolve(config.outDir)
    this.jsonSpacing = config.jsonSpacing ?? 2
  }

  get resultsPath(): string {
    return path.join(this.outDir, RESULTS_FILE)
  }

  get summaryPath(): string {
    return path.join(this.outDir, SUMMARY_FILE)
  }

  /**
   * Appends rows, writing the header only when the file is new
   * @returns the CSV path, or undefined when there was nothing to write
   */
  async writeResultsCsv(records: readonly BenchmarkRecord[]): Promise<string | undefined> {
    if (records.length === 0) {
      logger('No records to write')
      return undefined
    }

    await this.ensureOutDir()
    const exists = await fileExists(this.resultsPath)

    const lines = records.map(formatCsvRow)
    if (!exists) {
      lines.unshift(CSV_HEADER)
    }

    await fs.promises.appendFile(this.resultsPath, `${lines.join('\n')}\n`, 'utf8')
    logger('Appended %d rows to %s', records.length, this.resultsPath)
    return this.resultsPath
  }

  /**
   * Merges `summary` into summary.json; keys from this session replace older ones
   * @returns the JSON path, or undefined when there was nothing to write
   */
  async writeSummaryJson(summary: BenchmarkSummary): Promise<string | undefined> {
    if (Object.keys(summary).length === 0) {
      logger('Empty summary, nothing to write')
      return undefined
    }

    await this.ensureOutDir()
    const existing = await this.readSummary()
    const merged = { ...existing, ...summary }

    // Write to a temp file, then rename over the target
    const tempPath = `${this.summaryPath}.tmp`
    try {
      await fs.promises.writeFile(tempPath, `${JSON.stringify(merged, null, this.jsonSpacing)}\n`, 'utf8')
      await fs.promises.rename(tempPath, this.summaryPath)
    } catch (error) {
      throw new Error(`Failed to write summary: ${errorMessage(error)}`)
    }

    logger('Wrote %d summary entries to %s', Object.keys(merged).length, this.summaryPath)
    return this.summaryPath
  }

  /**
   * Reads the current summary.json; a missing file counts as empty
   * @throws Error when the file exists but is not a JSON object
   */
  async readSummary(): Promise<BenchmarkSummary> {
    let content: string
    try {
      content = await fs.promises.readFile(this.summaryPath, 'utf8')
    } catch (error) {
      if (isNotFound(error)) {
        return {}
      }
      throw error
    }

    const parsed: unknown = JSON.parse(content)
    if (!isSummary(parsed)) {
      throw new Error(`${this.summaryPath}: Expected object, got ${describeJson(parsed)}`)
    }
    return parsed
  }

  private async ensureOutDir(): Promise<void> {
    await fs.promises.mkdir(this.outDir, { recursive: true })
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath)
    return true
  } catch {
    return false
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

// Entries are written by this module only; the top-level shape is all we check
function isSummary(value: unknown): value is BenchmarkSummary {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function describeJson(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}
