import { describe, it, expect, vi } from 'vitest'
import os from 'node:os'

vi.mock('node:child_process', () => ({
  execFileSync: vi.fn(() => 'abc123\n')
}))

import { execFileSync } from 'node:child_process'
import { getRuntimeEnvironmentSummary, normalizeNodeVersion } from './runtime-environment.js'

describe('normalizeNodeVersion', () => {
  it('drops the leading v', () => {
    expect(normalizeNodeVersion('v20.11.1')).toBe('20.11.1')
    expect(normalizeNodeVersion('20.11.1')).toBe('20.11.1')
  })
})

describe('getRuntimeEnvironmentSummary', () => {
  it('reports node and os details with the git commit', () => {
    const summary = getRuntimeEnvironmentSummary({ cwd: '/repo' })

    expect(summary).toEqual({
      node: { version: process.version.slice(1) },
      os: { platform: os.platform(), release: os.release(), arch: os.arch() },
      gitCommit: 'abc123'
    })
    expect(execFileSync).toHaveBeenCalledWith(
      'git',
      ['rev-parse', 'HEAD'],
      expect.objectContaining({ cwd: '/repo' })
    )
  })

  it('omits the commit when git fails', () => {
    vi.mocked(execFileSync).mockImplementationOnce(() => {
      throw new Error('not a git repository')
    })
    expect(getRuntimeEnvironmentSummary()).not.toHaveProperty('gitCommit')
  })

  it('skips the git lookup when asked', () => {
    vi.mocked(execFileSync).mockClear()
    getRuntimeEnvironmentSummary({ includeGitCommit: false })
    expect(execFileSync).not.toHaveBeenCalled()
  })
})
