/**
 * PushService - guarded ref updates.
 *
 * Looks up what the remote currently advertises for the branch, lets the
 * PushGuard decide whether the caller's expectation still holds, then pushes
 * with a lease on the same expectation so the remote re-checks it.
 */

import { log } from '@shared/logger'
import type { CommitRef } from '@shared/types'
import type { ObjectStore } from '../adapters/store'
import type { RemoteTransport } from '../adapters/transport'
import { PushGuard } from '../domain'
import type { RefUpdate } from '../domain'
import { isZeroOid, ZERO_OID } from '../shared/constants'

export type PushRequest = {
  remote: string
  /** Local branch name, pushed to the same name on the remote. */
  branch: string
  /**
   * Remote tip the caller last saw. Zero oid means "the branch must not exist yet";
   * omit to push without a lost-update check.
   */
  expected?: CommitRef | null
  /** Overwrite the remote unconditionally; ignored when `expected` is set. */
  force?: boolean
}

export type PushResult = {
  refname: string
  /** Remote tip before the push; zero oid when the branch was created. */
  from: CommitRef
  to: CommitRef
}

/**
 * @throws NegotiationRejectedError when the remote moved away from `expected`
 */
export async function push(
  store: ObjectStore,
  transport: RemoteTransport,
  request: PushRequest
): Promise<PushResult> {
  const refname = `refs/heads/${request.branch}`
  const local = await store.resolveRef(refname)

  const advertised = await transport.listRemoteRefs(request.remote, [refname])
  const updates: RefUpdate[] = advertised
    .filter((ref) => ref.refname === refname)
    .map((ref) => ({ src: ref.oid, dst: local, refname }))
  if (updates.length === 0) {
    updates.push({ src: ZERO_OID, dst: local, refname })
  }

  PushGuard.check(request.expected, updates)

  const expected = request.expected
  const hasExpectation = expected !== undefined && expected !== null
  await transport.push({
    remote: request.remote,
    refspec: `${refname}:${refname}`,
    ...(hasExpectation
      ? { forceWithLease: { ref: refname, expect: isZeroOid(expected) ? '' : expected } }
      : {}),
    ...(request.force && !hasExpectation ? { force: true } : {})
  })

  const from = updates[0].src
  log.info(`[PushService] ${request.remote} ${refname}: ${from.slice(0, 8)} -> ${local.slice(0, 8)}`)
  return { refname, from, to: local }
}
