/**
 * CLI entry logic, separated from the process so tests can drive it
 *
 * @module cli/run
 */

import { summarizeRecords } from '../benchmark/aggregate.js'
import { BenchmarkRunner } from '../benchmark/BenchmarkRunner.js'
import type { BenchmarkRunnerOptions } from '../benchmark/BenchmarkRunner.js'
import { resolveBenchmarkConfig } from '../config/benchmark-config.js'
import { ConfigurationError, errorMessage } from '../errors/index.js'
import { ReportWriter } from '../output/ReportWriter.js'
import { LoggerFactory, coreLogger, createLogger, errorLogger } from '../utils/logger.js'
import { getRuntimeEnvironmentSummary } from '../utils/runtime-environment.js'
import { USAGE, parseCliArgs } from './args.js'

const logger = createLogger('cli')

export interface CliIO {
  stdout: (line: string) => void
  stderr: (line: string) => void
  env: NodeJS.ProcessEnv
}

const processIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  env: process.env
}

export interface RunCliOptions {
  io?: Partial<CliIO>
  runner?: BenchmarkRunnerOptions
}

/**
 * Runs a benchmark session
 * @returns process exit code: 0 on success, 1 on invalid configuration or any failed configuration
 */
export async function runCli(argv: readonly string[], options: RunCliOptions = {}): Promise<number> {
  const io: CliIO = { ...processIO, ...options.io }
  const debugError = errorLogger()

  let help: boolean
  let config: ReturnType<typeof resolveBenchmarkConfig>
  try {
    const parsed = parseCliArgs(argv)
    help = parsed.help
    config = resolveBenchmarkConfig(parsed.config, io.env)
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.stderr(`Invalid configuration: ${error.message}`)
      io.stderr('Run with --help for usage.')
      return 1
    }
    throw error
  }

  if (help) {
    io.stdout(USAGE)
    return 0
  }

  if (config.verbose) {
    LoggerFactory.enableAll()
  }

  const debug = coreLogger()
  const environment = getRuntimeEnvironmentSummary()
  debug('Benchmark session started')
  debug('Node version: %s', environment.node.version)
  debug('Platform: %s %s (%s)', environment.os.platform, environment.os.release, environment.os.arch)
  if (environment.gitCommit) {
    debug('Git commit: %s', environment.gitCommit)
  }
  logger('Configuration: %O', config)

  const runner = new BenchmarkRunner(config, options.runner)
  const outcome = runner.run()

  if (outcome.records.length > 0) {
    const writer = new ReportWriter({ outDir: config.outDir })
    try {
      const csvPath = await writer.writeResultsCsv(outcome.records)
      const jsonPath = await writer.writeSummaryJson(summarizeRecords(outcome.records))
      io.stdout(`Results saved to ${csvPath ?? writer.resultsPath} and ${jsonPath ?? writer.summaryPath}`)
    } catch (error) {
      debugError('Failed to write reports: %O', error)
      io.stderr(`Failed to write reports: ${errorMessage(error)}`)
      return 1
    }
  }

  for (const failure of outcome.failures) {
    io.stderr(`FAILED [${failure.kind}] ${failure.message}`)
  }

  io.stdout(
    `Completed ${outcome.records.length} runs across ${runner.listCases().length} configurations, ${outcome.failures.length} failed`
  )

  if (outcome.failed) {
    io.stderr('Benchmark failed due to correctness check failures or run errors')
    return 1
  }

  return 0
}
