/**
 * Divergence Walker
 *
 * Computes where two tips stand relative to each other: their merge base and the
 * commits unique to each side. Also resolves the current branch's upstream
 * from git config so callers can ask "how far am I from my remote?".
 */

import { log } from '@shared/logger'
import type { CommitRef, DivergenceSet } from '@shared/types'
import type { ObjectStore } from '../adapters/store/interface'
import { NotFoundError, UnrelatedHistoryError } from '../shared/errors'

export type UpstreamDivergence = {
  branch: string
  /** Full ref name of the upstream, e.g. refs/remotes/origin/main. */
  upstream: string
  local: CommitRef
  remote: CommitRef
  divergence: DivergenceSet
}

export class DivergenceWalker {
  private constructor() {}

  /**
   * Commits reachable from `local` but not `remote` (ahead) and the reverse (behind).
   *
   * @throws NotFoundError when either tip is missing
   * @throws UnrelatedHistoryError when the tips share no ancestor
   */
  static async aheadBehind(
    store: ObjectStore,
    local: CommitRef,
    remote: CommitRef
  ): Promise<DivergenceSet> {
    await store.readCommit(local)
    if (local === remote) {
      return { mergeBase: local, ahead: [], behind: [] }
    }

    const mergeBase = await store.mergeBase(local, remote)
    if (mergeBase === null) {
      throw new UnrelatedHistoryError(local, remote)
    }

    // Hiding the other tip covers every best common ancestor, not just the one picked
    const ahead = await collect(store.walk(local, [remote]))
    const behind = await collect(store.walk(remote, [local]))

    log.debug(
      `[DivergenceWalker] ${local.slice(0, 8)}..${remote.slice(0, 8)}: base ${mergeBase.slice(0, 8)}, ahead ${ahead.length}, behind ${behind.length}`
    )
    return { mergeBase, ahead, behind }
  }

  /**
   * Full ref name of the current branch's upstream, or null when none is configured.
   * A remote of "." names a local branch.
   */
  static async upstreamRef(store: ObjectStore, branch: string): Promise<string | null> {
    const remote = await store.getConfig(`branch.${branch}.remote`)
    const merge = await store.getConfig(`branch.${branch}.merge`)
    if (!remote || !merge) return null

    if (remote === '.') return merge
    const short = merge.replace(/^refs\/heads\//, '')
    return `refs/remotes/${remote}/${short}`
  }

  /**
   * Divergence of the current branch against its upstream.
   *
   * Returns null when HEAD is detached or unborn, when no upstream is configured,
   * or when the upstream ref does not exist locally.
   */
  static async resolveUpstreamDivergence(
    store: ObjectStore
  ): Promise<UpstreamDivergence | null> {
    const branch = await store.currentBranch()
    if (!branch) return null

    const upstream = await DivergenceWalker.upstreamRef(store, branch)
    if (!upstream) return null

    const local = await resolveOrNull(store, `refs/heads/${branch}`)
    if (!local) return null

    const remote = await resolveOrNull(store, upstream)
    if (!remote) {
      log.warn(`[DivergenceWalker] Upstream ${upstream} of ${branch} does not exist`)
      return null
    }

    const divergence = await DivergenceWalker.aheadBehind(store, local, remote)
    return { branch, upstream, local, remote, divergence }
  }
}

async function collect(commits: AsyncIterable<CommitRef>): Promise<CommitRef[]> {
  const out: CommitRef[] = []
  for await (const oid of commits) out.push(oid)
  return out
}

async function resolveOrNull(store: ObjectStore, ref: string): Promise<CommitRef | null> {
  try {
    return await store.resolveRef(ref)
  } catch (error) {
    if (error instanceof NotFoundError) return null
    throw error
  }
}
