export type {
  Algorithm,
  InstrumentationEvent,
  InstrumentationSink,
  MergeSortOptions,
  PivotStrategy,
  QuickSortOptions,
  SortOptions
} from './types.js'
export { ALGORITHMS, PIVOT_STRATEGIES } from './types.js'
export { CountingSink, NOOP_SINK, type OperationCounts } from './instrumentation.js'
export { mergeSort } from './merge-sort.js'
export { quickSort, medianOfThree } from './quick-sort.js'
export { sort } from './sort.js'
export { isAlgorithm, isPivotStrategy, parseAlgorithm, parsePivotStrategy } from './pivot.js'
