/**
 * Git subprocess runner
 *
 * All version-control access goes through `GitRunner` so the publisher can be
 * exercised against an in-process fake.
 */

import { execFile } from 'node:child_process'
import { promisify } from 'node:util'

const execFileAsync = promisify(execFile)

const DEFAULT_TIMEOUT_MS = 60_000

export class GitCommandError extends Error {
  constructor(
    readonly args: readonly string[],
    readonly stderr: string,
    readonly exitCode: number | null,
  ) {
    super(`git ${args.join(' ')} failed${exitCode === null ? '' : ` (exit ${exitCode})`}: ${stderr.trim() || 'no output'}`)
    this.name = 'GitCommandError'
  }
}

export interface GitRunner {
  /** Run `git <args>` in `cwd`; resolves with trimmed stdout, rejects with GitCommandError */
  run(cwd: string, args: readonly string[]): Promise<string>
}

function readField(err: unknown, field: 'stderr' | 'code'): unknown {
  return err instanceof Error && field in err ? Reflect.get(err, field) : undefined
}

export function createGitRunner(options: { timeoutMs?: number } = {}): GitRunner {
  const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  return {
    async run(cwd, args) {
      try {
        const { stdout } = await execFileAsync('git', [...args], {
          cwd,
          timeout,
          env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
        })
        return stdout.trim()
      } catch (err) {
        const stderr = readField(err, 'stderr')
        const code = readField(err, 'code')
        throw new GitCommandError(
          args,
          typeof stderr === 'string' && stderr ? stderr : err instanceof Error ? err.message : String(err),
          typeof code === 'number' ? code : null,
        )
      }
    },
  }
}
