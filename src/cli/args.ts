/**
 * Command line parsing for sort-bench
 *
 * @module cli/args
 */

import { parseArgs } from 'node:util'
import { parseAlgorithm, parsePivotStrategy } from '../algorithms/pivot.js'
import type { BenchmarkConfig } from '../benchmark/types.js'
import { parseInteger, splitList } from '../config/benchmark-config.js'
import { parseDatasetKind } from '../datasets/generator.js'
import { ConfigurationError, errorMessage } from '../errors/index.js'

export interface CliArguments {
  help: boolean
  /** Only the settings given on the command line */
  config: BenchmarkConfig
}

export const USAGE = `Usage: sort-bench [options]

Benchmark divide-and-conquer sorting algorithms.

Options:
  --algorithms LIST   Comma separated: merge, quick (default: merge,quick)
  --pivot LIST        Quick sort pivots: first, last, median_of_three, random (default: random)
  --datasets LIST     sorted, reverse, random, nearly_sorted, duplicates_heavy (default: all)
  --sizes LIST        Dataset sizes (default: 1000,5000,10000,50000)
  --runs N            Runs per configuration (default: 5)
  --seed N            Base random seed (default: 42)
  --outdir DIR        Output directory for results (default: results)
  --instrument        Count comparisons and swaps
  --verbose           Enable debug logging for every sort-bench namespace
  -h, --help          Show this message

Environment variables SORT_BENCH_ALGORITHMS, SORT_BENCH_PIVOTS, SORT_BENCH_DATASETS,
SORT_BENCH_SIZES, SORT_BENCH_RUNS, SORT_BENCH_SEED, SORT_BENCH_INSTRUMENT and
SORT_BENCH_OUTDIR supply defaults for the matching options.
`

/**
 * Parses argv (without the node and script entries)
 * @throws ConfigurationError on unknown options or invalid values
 */
export function parseCliArgs(argv: readonly string[]): CliArguments {
  let parsed: ReturnType<typeof parseCommandLine>
  try {
    parsed = parseCommandLine(argv)
  } catch (error) {
    throw new ConfigurationError(errorMessage(error))
  }

  const { values } = parsed
  const config: BenchmarkConfig = {}

  if (values.algorithms !== undefined) {
    config.algorithms = splitList(values.algorithms).map(parseAlgorithm)
  }
  if (values.pivot !== undefined) {
    config.pivots = splitList(values.pivot).map(parsePivotStrategy)
  }
  if (values.datasets !== undefined) {
    config.datasets = splitList(values.datasets).map(parseDatasetKind)
  }
  if (values.sizes !== undefined) {
    config.sizes = splitList(values.sizes).map((entry) => parseInteger('sizes', entry))
  }
  if (values.runs !== undefined) {
    config.runs = parseInteger('runs', values.runs)
  }
  if (values.seed !== undefined) {
    config.seed = parseInteger('seed', values.seed)
  }
  if (values.outdir !== undefined) {
    config.outDir = values.outdir
  }
  if (values.instrument) {
    config.instrument = true
  }
  if (values.verbose) {
    config.verbose = true
  }

  return { help: values.help ?? false, config }
}

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: false,
    options: {
      algorithms: { type: 'string' },
      pivot: { type: 'string' },
      datasets: { type: 'string' },
      sizes: { type: 'string' },
      runs: { type: 'string' },
      seed: { type: 'string' },
      outdir: { type: 'string' },
      instrument: { type: 'boolean' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    }
  })
}
