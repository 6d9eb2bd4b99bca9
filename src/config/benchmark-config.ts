/**
 * Benchmark configuration
 *
 * Resolution order: defaults, then SORT_BENCH_* environment variables, then
 * explicit options.
 *
 * @module config/benchmark-config
 */

import { parseAlgorithm, parsePivotStrategy } from '../algorithms/pivot.js'
import { DATASET_KINDS, parseDatasetKind } from '../datasets/generator.js'
import type { BenchmarkConfig, ResolvedBenchmarkConfig } from '../benchmark/types.js'
import { ConfigurationError, ErrorMessages, errorMessage } from '../errors/index.js'

/**
 * Default benchmark configuration values
 */
export const DEFAULT_BENCHMARK_CONFIG: ResolvedBenchmarkConfig = {
  algorithms: ['merge', 'quick'],
  pivots: ['random'],
  datasets: [...DATASET_KINDS],
  sizes: [1000, 5000, 10000, 50000],
  runs: 5,
  seed: 42,
  instrument: false,
  outDir: 'results',
  verbose: false
}

export interface ValidationResult {
  valid: boolean
  errors: string[]
}

/**
 * Splits a comma separated list, dropping empty entries
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
}

/**
 * Parses a base-10 integer, rejecting trailing garbage
 * @throws ConfigurationError
 */
export function parseInteger(path: string, value: string): number {
  const trimmed = value.trim()
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigurationError(ErrorMessages.INVALID_INTEGER(path, value))
  }
  return Number.parseInt(trimmed, 10)
}

/**
 * Validate benchmark configuration
 */
export function validateBenchmarkConfig(config: BenchmarkConfig): ValidationResult {
  const errors: string[] = []

  const lists = [
    ['algorithms', config.algorithms],
    ['pivots', config.pivots],
    ['datasets', config.datasets],
    ['sizes', config.sizes]
  ] as const

  for (const [field, list] of lists) {
    if (list !== undefined && list.length === 0) {
      errors.push(ErrorMessages.EMPTY_LIST(field))
    }
  }

  for (const size of config.sizes ?? []) {
    if (!Number.isInteger(size) || size < 0) {
      errors.push(ErrorMessages.INVALID_SIZE('sizes', size))
    }
  }

  if (config.runs !== undefined && (!Number.isInteger(config.runs) || config.runs < 1)) {
    errors.push(ErrorMessages.MIN_VALUE('runs', 1, config.runs))
  }

  if (config.seed !== undefined && !Number.isInteger(config.seed)) {
    errors.push(ErrorMessages.INVALID_INTEGER('seed', String(config.seed)))
  }

  return {
    valid: errors.length === 0,
    errors
  }
}

/**
 * Create configuration from environment variables
 *
 * Values that fail to parse are collected and thrown together.
 * @throws ConfigurationError
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): BenchmarkConfig {
  const config: BenchmarkConfig = {}
  const errors: string[] = []

  const read = (name: string, apply: (value: string) => void): void => {
    const value = env[name]
    if (value === undefined || value === '') {
      return
    }
    try {
      apply(value)
    } catch (error) {
      errors.push(`${name}: ${errorMessage(error)}`)
    }
  }

  read('SORT_BENCH_ALGORITHMS', (value) => {
    config.algorithms = splitList(value).map(parseAlgorithm)
  })
  read('SORT_BENCH_PIVOTS', (value) => {
    config.pivots = splitList(value).map(parsePivotStrategy)
  })
  read('SORT_BENCH_DATASETS', (value) => {
    config.datasets = splitList(value).map(parseDatasetKind)
  })
  read('SORT_BENCH_SIZES', (value) => {
    config.sizes = splitList(value).map((entry) => parseInteger('sizes', entry))
  })
  read('SORT_BENCH_RUNS', (value) => {
    config.runs = parseInteger('runs', value)
  })
  read('SORT_BENCH_SEED', (value) => {
    config.seed = parseInteger('seed', value)
  })
  read('SORT_BENCH_INSTRUMENT', (value) => {
    config.instrument = value === 'true' || value === '1'
  })
  read('SORT_BENCH_OUTDIR', (value) => {
    config.outDir = value
  })

  if (errors.length > 0) {
    throw new ConfigurationError(errors)
  }

  return config
}

/**
 * Merge configuration with defaults and environment, then validate
 * @throws ConfigurationError listing every problem found
 */
export function resolveBenchmarkConfig(
  options: BenchmarkConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedBenchmarkConfig {
  const fromEnv = configFromEnv(env)

  const merged: Required<BenchmarkConfig> = {
    algorithms: options.algorithms ?? fromEnv.algorithms ?? [...DEFAULT_BENCHMARK_CONFIG.algorithms],
    pivots: options.pivots ?? fromEnv.pivots ?? [...DEFAULT_BENCHMARK_CONFIG.pivots],
    datasets: options.datasets ?? fromEnv.datasets ?? [...DEFAULT_BENCHMARK_CONFIG.datasets],
    sizes: options.sizes ?? fromEnv.sizes ?? [...DEFAULT_BENCHMARK_CONFIG.sizes],
    runs: options.runs ?? fromEnv.runs ?? DEFAULT_BENCHMARK_CONFIG.runs,
    seed: options.seed ?? fromEnv.seed ?? DEFAULT_BENCHMARK_CONFIG.seed,
    instrument: options.instrument ?? fromEnv.instrument ?? DEFAULT_BENCHMARK_CONFIG.instrument,
    outDir: options.outDir ?? fromEnv.outDir ?? DEFAULT_BENCHMARK_CONFIG.outDir,
    verbose: options.verbose ?? DEFAULT_BENCHMARK_CONFIG.verbose
  }

  const validation = validateBenchmarkConfig(merged)
  if (!validation.valid) {
    throw new ConfigurationError(validation.errors)
  }

  return Object.freeze(merged)
}
