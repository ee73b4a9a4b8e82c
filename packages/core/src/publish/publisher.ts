/**
 * Calendar Publisher
 *
 * Promotes a rendered artifact into a git working copy and pushes it:
 * stage → detect change → commit → push → (rebase + push once more).
 * Unpushed commits from earlier failures ride along with the next push.
 */

import fs from 'node:fs/promises'
import path from 'node:path'
import type { DateTime } from 'luxon'
import { sameArtifact } from '../calendar/renderer.js'
import { BookingError, errorMessage, isBookingError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { GitRunner } from './git.js'
import type { PublicationOutcome, PublishRequest, Publisher } from './types.js'

const log = createLogger('publisher')

export const ARTIFACT_FILE = 'calendar.ics'

export interface CalendarPublisherOptions {
  /** Root of the working copy; unset means publication is not configured */
  root?: string
  remote: string
  git: GitRunner
  /** Optional directory that receives a plain copy of the artifact */
  staticMirror?: string
}

function isoTimestamp(at: DateTime): string {
  return at.toUTC().toISO({ suppressMilliseconds: true }) ?? at.toUTC().toString()
}

export function commitMessage(request: PublishRequest): string {
  return `calendar: ${request.operation} ${request.guestName} @ ${isoTimestamp(request.at)}`
}

/** Write next to the target and rename over it, so readers never see a partial file */
async function writeAtomic(target: string, content: string): Promise<void> {
  const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`)
  try {
    await fs.writeFile(tmp, content, 'utf-8')
    await fs.rename(tmp, target)
  } catch (err) {
    await fs.rm(tmp, { force: true })
    throw err
  }
}

async function readIfExists(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
    throw err
  }
}

export class CalendarPublisher implements Publisher {
  private readonly root: string | undefined
  private readonly remote: string
  private readonly git: GitRunner
  private readonly staticMirror: string | undefined

  constructor(options: CalendarPublisherOptions) {
    this.root = options.root
    this.remote = options.remote
    this.git = options.git
    this.staticMirror = options.staticMirror
  }

  get artifactPath(): string | null {
    return this.root ? path.join(this.root, ARTIFACT_FILE) : null
  }

  /**
   * Check that the working copy is usable. Throws `PublishUnconfigured`
   * naming the first missing piece.
   */
  async verify(): Promise<void> {
    const root = this.root
    if (!root) {
      throw new BookingError('PublishUnconfigured', 'No publication working copy configured (set PUBLISH_ROOT)')
    }

    const stat = await fs.stat(root).catch(() => null)
    if (!stat?.isDirectory()) {
      throw new BookingError('PublishUnconfigured', `Publication root ${root} does not exist`, { root })
    }

    const inside = await this.tryGit(['rev-parse', '--is-inside-work-tree'])
    if (inside !== 'true') {
      throw new BookingError('PublishUnconfigured', `${root} is not a git working copy (run git init)`, { root })
    }

    const url = await this.tryGit(['remote', 'get-url', this.remote])
    if (!url) {
      throw new BookingError(
        'PublishUnconfigured',
        `Remote "${this.remote}" is not configured in ${root} (run git remote add ${this.remote} <url>)`,
        { root, remote: this.remote },
      )
    }

    for (const key of ['user.name', 'user.email']) {
      const value = await this.tryGit(['config', key])
      if (!value) {
        throw new BookingError('PublishUnconfigured', `git ${key} is not set in ${root} (run git config ${key} ...)`, {
          root,
          key,
        })
      }
    }
  }

  async publish(artifact: string, request: PublishRequest): Promise<PublicationOutcome> {
    const unconfigured = await this.checkConfigured()
    if (unconfigured) return unconfigured

    const warnings: string[] = []
    const branch = await this.currentBranch()

    // Stage
    let staged: boolean
    try {
      staged = await this.stage(artifact)
    } catch (err) {
      const cause = errorMessage(err)
      log.warn({ err: cause }, 'Artifact staging failed, publication queued')
      return { state: 'failed', stage: 'stage', cause, queued: true, pending: await this.pendingCount(branch), warnings }
    }
    await this.mirror(warnings)

    // Detect change
    if (!staged) {
      const pending = await this.pendingCount(branch)
      if (pending === 0) return { state: 'no_change', pushed: 0, warnings }
      log.info({ pending }, 'Artifact unchanged, pushing pending commits')
      const pushFailure = await this.pushWithReconcile(branch)
      if (pushFailure) {
        return { state: 'failed', stage: 'push', cause: pushFailure, queued: true, pending, warnings }
      }
      return { state: 'no_change', pushed: pending, warnings }
    }

    // Commit
    let commit: string
    try {
      await this.gitIn(['commit', '-m', commitMessage(request)])
      commit = await this.gitIn(['rev-parse', 'HEAD'])
    } catch (err) {
      const cause = errorMessage(err)
      log.error({ err: cause }, 'Commit failed')
      return { state: 'failed', stage: 'commit', cause, queued: true, pending: await this.pendingCount(branch), warnings }
    }

    // Push
    const pending = await this.pendingCount(branch)
    const pushFailure = await this.pushWithReconcile(branch)
    if (pushFailure) {
      return { state: 'failed', stage: 'push', cause: pushFailure, queued: true, pending, warnings }
    }
    log.info({ commit, pushed: pending, operation: request.operation }, 'Calendar published')
    return { state: 'published', commit, pushed: pending, warnings }
  }

  /** Push local commits that earlier publications could not deliver */
  async sync(): Promise<PublicationOutcome> {
    const unconfigured = await this.checkConfigured()
    if (unconfigured) return unconfigured

    const branch = await this.currentBranch()
    const pending = await this.pendingCount(branch)
    if (pending === 0) return { state: 'no_change', pushed: 0, warnings: [] }

    const pushFailure = await this.pushWithReconcile(branch)
    if (pushFailure) {
      return { state: 'failed', stage: 'push', cause: pushFailure, queued: true, pending, warnings: [] }
    }
    log.info({ pushed: pending }, 'Pending commits pushed')
    return { state: 'published', pushed: pending, warnings: [] }
  }

  // -------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------

  private async checkConfigured(): Promise<PublicationOutcome | null> {
    try {
      await this.verify()
      return null
    } catch (err) {
      if (isBookingError(err, 'PublishUnconfigured')) {
        return { state: 'unconfigured', reason: err.message, warnings: [] }
      }
      throw err
    }
  }

  private requireRoot(): string {
    if (!this.root) {
      throw new BookingError('PublishUnconfigured', 'No publication working copy configured (set PUBLISH_ROOT)')
    }
    return this.root
  }

  private gitIn(args: readonly string[]): Promise<string> {
    return this.git.run(this.requireRoot(), args)
  }

  /** Run a query whose failure only means "not set" */
  private async tryGit(args: readonly string[]): Promise<string | null> {
    try {
      return await this.gitIn(args)
    } catch (err) {
      log.debug({ args, err: errorMessage(err) }, 'git query failed')
      return null
    }
  }

  /** Branch HEAD points at; also answers before the first commit */
  private async currentBranch(): Promise<string> {
    const branch = await this.tryGit(['symbolic-ref', '--short', 'HEAD'])
    return branch ?? this.gitIn(['rev-parse', '--abbrev-ref', 'HEAD'])
  }

  /**
   * Write and `git add` the artifact unless the tracked copy already holds the
   * same events. Returns whether anything is staged for commit.
   */
  private async stage(artifact: string): Promise<boolean> {
    const target = path.join(this.requireRoot(), ARTIFACT_FILE)
    const current = await readIfExists(target)
    const status = await this.gitIn(['status', '--porcelain', '--', ARTIFACT_FILE])

    if (current !== null && status === '' && sameArtifact(current, artifact)) {
      return false
    }

    await writeAtomic(target, artifact)
    await this.gitIn(['add', '--', ARTIFACT_FILE])
    const stagedFiles = await this.gitIn(['diff', '--cached', '--name-only', '--', ARTIFACT_FILE])
    return stagedFiles !== ''
  }

  /** Count of local commits not yet on the remote branch */
  private async pendingCount(branch: string): Promise<number> {
    const range = `${this.remote}/${branch}..HEAD`
    const counted = (await this.tryGit(['rev-list', '--count', range])) ?? (await this.tryGit(['rev-list', '--count', 'HEAD']))
    const n = Number(counted ?? '0')
    return Number.isFinite(n) ? n : 0
  }

  /** Push; on failure rebase onto the remote and push once more. Returns the failure cause, if any. */
  private async pushWithReconcile(branch: string): Promise<string | null> {
    try {
      await this.gitIn(['push', this.remote, branch])
      return null
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'Push failed, rebasing onto remote')
    }

    try {
      await this.gitIn(['pull', '--rebase', this.remote, branch])
    } catch (err) {
      const cause = errorMessage(err)
      await this.abortRebase()
      log.warn({ err: cause }, 'Rebase failed, commits stay local')
      return cause
    }

    try {
      await this.gitIn(['push', this.remote, branch])
      return null
    } catch (err) {
      const cause = errorMessage(err)
      log.warn({ err: cause }, 'Push failed after rebase, commits stay local')
      return cause
    }
  }

  private async abortRebase(): Promise<void> {
    try {
      await this.gitIn(['rebase', '--abort'])
    } catch (err) {
      // Expected when the pull failed before a rebase started
      log.debug({ err: errorMessage(err) }, 'No rebase to abort')
    }
  }

  private async mirror(warnings: string[]): Promise<void> {
    if (!this.staticMirror) return
    const source = path.join(this.requireRoot(), ARTIFACT_FILE)
    try {
      await fs.mkdir(this.staticMirror, { recursive: true })
      const content = await fs.readFile(source, 'utf-8')
      await writeAtomic(path.join(this.staticMirror, ARTIFACT_FILE), content)
    } catch (err) {
      const message = `Static mirror not updated: ${errorMessage(err)}`
      log.warn({ dir: this.staticMirror }, message)
      warnings.push(message)
    }
  }
}
