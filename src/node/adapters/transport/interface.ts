/**
 * Remote Transport Interface
 *
 * The network side of a push: what a remote advertises, and sending an update.
 * Kept behind an interface so the push negotiation can run against an
 * in-process fake.
 */

import type { CommitRef } from '@shared/types'

export type RemoteRef = {
  /** Full ref name, e.g. refs/heads/main. */
  refname: string
  oid: CommitRef
}

export type PushProgress = {
  stage: string
  /** Percent complete, 0-100. */
  progress: number
}

export type TransportPushOptions = {
  remote: string
  /** `<src>:<dst>` refspec. */
  refspec: string
  /**
   * Refuse the update unless the remote ref is still at `expect`.
   * An empty `expect` means the ref must not exist yet.
   */
  forceWithLease?: { ref: string; expect: string }
  force?: boolean
}

export interface RemoteTransport {
  readonly name: string

  /**
   * Refs the remote advertises, limited to `refnames`. Refs the remote lacks are omitted.
   */
  listRemoteRefs(remote: string, refnames: string[]): Promise<RemoteRef[]>

  push(options: TransportPushOptions): Promise<void>
}
