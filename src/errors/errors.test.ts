import { describe, it, expect } from 'vitest'
import { ConfigurationError, CorrectnessError, ErrorMessages, errorMessage } from './index.js'

describe('ConfigurationError', () => {
  it('keeps a single message', () => {
    const error = new ConfigurationError('runs: Expected value >= 1, got 0')
    expect(error.name).toBe('ConfigurationError')
    expect(error.message).toBe('runs: Expected value >= 1, got 0')
    expect(error.errors).toEqual(['runs: Expected value >= 1, got 0'])
  })

  it('joins several messages', () => {
    const error = new ConfigurationError(['a: bad', 'b: worse'])
    expect(error.message).toBe('a: bad; b: worse')
    expect(error).toBeInstanceOf(Error)
  })
})

describe('CorrectnessError', () => {
  it('describes the first mismatch', () => {
    const error = new CorrectnessError('merge on sorted size=3 run=1', 2, 5, undefined)
    expect(error.message).toBe('merge on sorted size=3 run=1: Expected 5 at index 2, got nothing')
    expect(error.index).toBe(2)
  })
})

describe('errorMessage', () => {
  it('handles errors and other thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage('plain')).toBe('plain')
  })
})

describe('ErrorMessages', () => {
  it('formats sizes', () => {
    expect(ErrorMessages.INVALID_SIZE('size', -2)).toBe('size: Expected non-negative integer, got -2')
  })
})
