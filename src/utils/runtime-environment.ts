import os from 'node:os'
import { execFileSync } from 'node:child_process'

export interface RuntimeEnvironmentSummary {
  node: { version: string }
  os: { platform: string; release: string; arch: string }
  gitCommit?: string
}

export interface RuntimeEnvironmentOptions {
  /** Look up the current git commit (default: true) */
  includeGitCommit?: boolean
  /** Working directory for the git lookup (default: process.cwd()) */
  cwd?: string
}

/**
 * Collects host runtime metadata logged at the start of a benchmark session
 */
export function getRuntimeEnvironmentSummary(
  options: RuntimeEnvironmentOptions = {}
): RuntimeEnvironmentSummary {
  const environment: RuntimeEnvironmentSummary = {
    node: { version: normalizeNodeVersion(process.version) },
    os: {
      platform: os.platform(),
      release: os.release(),
      arch: os.arch()
    }
  }

  if (options.includeGitCommit !== false) {
    const commit = readGitCommit(options.cwd ?? process.cwd())
    if (commit) {
      environment.gitCommit = commit
    }
  }

  return environment
}

export function normalizeNodeVersion(version: string): string {
  return version.startsWith('v') ? version.slice(1) : version
}

/**
 * HEAD commit of the repository containing `cwd`, or undefined outside a
 * repository or without git installed
 */
function readGitCommit(cwd: string): string | undefined {
  try {
    const output = execFileSync('git', ['rev-parse', 'HEAD'], {
      cwd,
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'ignore'],
      timeout: 2000
    })
    const commit = output.trim()
    return commit.length > 0 ? commit : undefined
  } catch {
    return undefined
  }
}
