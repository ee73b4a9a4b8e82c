import type { DateTime } from 'luxon'

/** The operation that produced an artifact, recorded in the commit message */
export type PublishOperation = 'create' | 'modify' | 'delete' | 'import' | 'sync'

export interface PublishRequest {
  operation: PublishOperation
  guestName: string
  at: DateTime
}

/** Where a failed publication stopped */
export type PublishStage = 'stage' | 'commit' | 'push'

export type PublicationOutcome =
  | {
      state: 'published'
      /** Hash of the new commit; absent when only pending commits were pushed */
      commit?: string
      /** Local commits delivered to the remote by this call */
      pushed: number
      warnings: string[]
    }
  | { state: 'no_change'; pushed: number; warnings: string[] }
  | {
      state: 'failed'
      stage: PublishStage
      cause: string
      /** True when the next publication will carry this change */
      queued: boolean
      /** Local commits not yet on the remote */
      pending: number
      warnings: string[]
    }
  | { state: 'unconfigured'; reason: string; warnings: string[] }

export type PublicationState = PublicationOutcome['state']

/**
 * Minimal contract the coordinator needs from a publisher.
 */
export interface Publisher {
  verify(): Promise<void>
  publish(artifact: string, request: PublishRequest): Promise<PublicationOutcome>
  sync(): Promise<PublicationOutcome>
}
