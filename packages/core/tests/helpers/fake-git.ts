/**
 * In-process stand-in for a git working copy and its remote.
 *
 * The working tree is a real directory (the publisher writes calendar.ics
 * with fs); history, index and the remote live in memory. Covers exactly
 * the commands the publisher issues. A new instance is a fresh clone of an
 * empty remote: no commits yet, HEAD on an unborn branch.
 */

import fs from 'node:fs'
import path from 'node:path'
import { GitCommandError, type GitRunner } from '../../src/publish/git.js'

export interface FakeCommit {
  hash: string
  message: string
  content: string | null
}

export class FakeGit implements GitRunner {
  isRepo = true
  remoteUrl: string | null = 'git@example.test:cabins/site.git'
  userName: string | null = 'Test Operator'
  userEmail: string | null = 'ops@example.test'
  /** False simulates an unreachable remote */
  online = true
  /** True makes the next `pull --rebase` stop on a conflict */
  failRebase = false

  readonly calls: string[][] = []
  local: FakeCommit[] = []
  remote: FakeCommit[] = []

  private index: string | null = null
  private rebaseInProgress = false
  private seq = 0

  constructor(
    readonly root: string,
    readonly branch = 'main',
    readonly remoteName = 'origin',
  ) {}

  // -------------------------------------------------------------------
  // Inspection helpers
  // -------------------------------------------------------------------

  remoteContent(): string | null {
    return this.remote.at(-1)?.content ?? null
  }

  remoteMessages(): string[] {
    return this.remote.map((c) => c.message)
  }

  localMessages(): string[] {
    return this.local.map((c) => c.message)
  }

  pendingCount(): number {
    const pushed = new Set(this.remote.map((c) => c.hash))
    return this.local.filter((c) => !pushed.has(c.hash)).length
  }

  /** Another clone pushed a commit the local copy has not seen */
  pushFromElsewhere(content: string, message: string): void {
    this.remote.push({ hash: this.nextHash(), message, content })
  }

  commandsRun(): string[] {
    return this.calls.map((args) => args.join(' '))
  }

  // -------------------------------------------------------------------
  // GitRunner
  // -------------------------------------------------------------------

  async run(_cwd: string, args: readonly string[]): Promise<string> {
    this.calls.push([...args])
    const cmd = args.join(' ')
    const remoteBranch = `${this.remoteName} ${this.branch}`

    if (cmd === 'rev-parse --is-inside-work-tree') {
      return this.isRepo ? 'true' : this.fail(args, 'fatal: not a git repository')
    }
    if (!this.isRepo) return this.fail(args, 'fatal: not a git repository')

    if (cmd === `remote get-url ${this.remoteName}`) {
      return this.remoteUrl ?? this.fail(args, `error: No such remote '${this.remoteName}'`)
    }
    if (cmd === 'config user.name') return this.userName ?? this.fail(args, '')
    if (cmd === 'config user.email') return this.userEmail ?? this.fail(args, '')
    if (cmd === 'symbolic-ref --short HEAD') return this.branch
    if (cmd === 'rev-parse --abbrev-ref HEAD') {
      // Like git, cannot name HEAD before the first commit
      return this.local.length > 0 ? this.branch : this.fail(args, "fatal: ambiguous argument 'HEAD'", 128)
    }

    if (cmd === 'status --porcelain -- calendar.ics') {
      const head = this.headContent()
      const disk = this.diskContent()
      if (disk === head && this.index === head) return ''
      return this.index !== head && disk === this.index ? 'M  calendar.ics' : ' M calendar.ics'
    }
    if (cmd === 'add -- calendar.ics') {
      this.index = this.diskContent()
      return ''
    }
    if (cmd === 'diff --cached --name-only -- calendar.ics') {
      return this.index !== this.headContent() ? 'calendar.ics' : ''
    }
    if (args[0] === 'commit' && args[1] === '-m' && args.length === 3) {
      if (this.index === this.headContent()) return this.fail(args, 'nothing to commit, working tree clean')
      this.local.push({ hash: this.nextHash(), message: args[2], content: this.index })
      return ''
    }
    if (cmd === 'rev-parse HEAD') {
      return this.local.at(-1)?.hash ?? this.fail(args, "fatal: ambiguous argument 'HEAD'")
    }
    if (cmd === `rev-list --count ${this.remoteName}/${this.branch}..HEAD`) {
      // No remote-tracking branch until something has been pushed
      if (this.remote.length === 0 || this.local.length === 0) {
        return this.fail(args, `fatal: bad revision '${this.remoteName}/${this.branch}..HEAD'`, 128)
      }
      return String(this.pendingCount())
    }
    if (cmd === 'rev-list --count HEAD') {
      return this.local.length > 0 ? String(this.local.length) : this.fail(args, "fatal: ambiguous argument 'HEAD'", 128)
    }

    if (cmd === `push ${remoteBranch}`) {
      if (!this.online) return this.fail(args, `fatal: unable to access '${this.remoteUrl}': Could not resolve host`)
      const known = new Set(this.local.map((c) => c.hash))
      if (this.remote.some((c) => !known.has(c.hash))) {
        return this.fail(args, ' ! [rejected]        main -> main (fetch first)')
      }
      this.remote = [...this.local]
      return ''
    }
    if (cmd === `pull --rebase ${remoteBranch}`) {
      if (!this.online) return this.fail(args, `fatal: unable to access '${this.remoteUrl}': Could not resolve host`)
      if (this.failRebase) {
        this.rebaseInProgress = true
        return this.fail(args, 'CONFLICT (content): Merge conflict in calendar.ics')
      }
      const upstream = new Set(this.remote.map((c) => c.hash))
      const mine = this.local.filter((c) => !upstream.has(c.hash))
      this.local = [...this.remote, ...mine.map((c) => ({ ...c, hash: this.nextHash() }))]
      this.index = this.headContent()
      this.writeDisk(this.index)
      return ''
    }
    if (cmd === 'rebase --abort') {
      if (!this.rebaseInProgress) return this.fail(args, 'fatal: No rebase in progress?')
      this.rebaseInProgress = false
      return ''
    }

    return this.fail(args, `fake git: unsupported command "${cmd}"`)
  }

  // -------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------

  private fail(args: readonly string[], stderr: string, exitCode = 1): never {
    throw new GitCommandError(args, stderr, exitCode)
  }

  private nextHash(): string {
    this.seq += 1
    return `c${String(this.seq).padStart(7, '0')}`
  }

  private headContent(): string | null {
    return this.local.at(-1)?.content ?? null
  }

  private diskPath(): string {
    return path.join(this.root, 'calendar.ics')
  }

  private diskContent(): string | null {
    return fs.existsSync(this.diskPath()) ? fs.readFileSync(this.diskPath(), 'utf-8') : null
  }

  private writeDisk(content: string | null): void {
    if (content === null) fs.rmSync(this.diskPath(), { force: true })
    else fs.writeFileSync(this.diskPath(), content, 'utf-8')
  }
}
