/**
 * sort-bench
 *
 * Merge sort and quick sort with pluggable pivot strategies and operation
 * counting, plus the harness used to benchmark them.
 */

// Sorting algorithms
export * from './algorithms/index.js'

// Dataset generation
export * from './datasets/index.js'

// Benchmark harness
export * from './benchmark/index.js'

// Configuration
export {
  DEFAULT_BENCHMARK_CONFIG,
  configFromEnv,
  resolveBenchmarkConfig,
  validateBenchmarkConfig,
  type ValidationResult
} from './config/benchmark-config.js'

// Report output
export * from './output/index.js'

// Errors
export { ConfigurationError, CorrectnessError, ErrorMessages } from './errors/index.js'

// Randomness
export { createRandom, mulberry32, type RandomSource } from './utils/random.js'

// CLI
export { runCli, type CliIO, type RunCliOptions } from './cli/run.js'
export { parseCliArgs, type CliArguments } from './cli/args.js'
