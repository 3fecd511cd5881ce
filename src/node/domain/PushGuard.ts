/**
 * Push Guard
 *
 * Lost-update check run before a ref update is sent: the caller states which
 * remote tip it last saw, and the push only goes ahead when the remote still
 * advertises that tip (or the ref does not exist there yet).
 */

import type { CommitRef } from '@shared/types'
import { isZeroOid } from '../shared/constants'
import { NegotiationRejectedError } from '../shared/errors'

export type RefUpdate = {
  /** Tip the remote currently advertises for the ref; zero when the ref is new. */
  src: CommitRef
  /** Tip the push will set. */
  dst: CommitRef
  refname: string
}

export class PushGuard {
  private constructor() {}

  /**
   * @throws NegotiationRejectedError when `expected` is set and no update starts from it
   */
  static check(expected: CommitRef | null | undefined, updates: RefUpdate[]): void {
    if (expected === null || expected === undefined) return

    if (updates.some((update) => update.src === expected)) return
    if (updates.length > 0 && updates.every((update) => isZeroOid(update.src))) return

    throw new NegotiationRejectedError(
      expected,
      updates.map((update) => update.src),
      updates.map((update) => update.refname)
    )
  }
}
