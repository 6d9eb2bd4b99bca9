import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Include benchmark files
    include: ['tests/benchmarks/**/*.bench.ts'],
    benchmark: {
      include: ['tests/benchmarks/**/*.bench.ts']
    }
  }
})
