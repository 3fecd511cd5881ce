/**
 * HistoryService - lists the commits reachable from HEAD, newest first.
 *
 * The walk is lazy: only the commits that make it into the listing are read.
 */

import { log } from '@shared/logger'
import type { CommitMeta, CommitRef, HistoryEntry } from '@shared/types'
import type { ObjectStore } from '../adapters/store'
import { NotFoundError } from '../shared/errors'

export const DEFAULT_LIMIT = 20

export type ListCommitsOptions = {
  /** Maximum number of commits to list. */
  limit?: number
}

/**
 * Up to `limit` commits from HEAD. A branch with no commits yet lists nothing.
 */
export async function listCommits(
  store: ObjectStore,
  options: ListCommitsOptions = {}
): Promise<HistoryEntry[]> {
  const limit = options.limit ?? DEFAULT_LIMIT
  const entries: HistoryEntry[] = []

  let head: CommitRef
  try {
    head = await store.resolveRef('HEAD')
  } catch (error) {
    if (error instanceof NotFoundError) {
      log.debug('[HistoryService] HEAD has no commits yet')
      return entries
    }
    throw error
  }
  if (limit <= 0) return entries

  for await (const oid of store.walk(head, [])) {
    entries.push(toEntry(await store.readCommit(oid)))
    if (entries.length >= limit) break
  }

  log.debug(`[HistoryService] Listed ${entries.length} commits from ${head.slice(0, 8)}`)
  return entries
}

function toEntry(commit: CommitMeta): HistoryEntry {
  const { name, email } = commit.author
  return {
    oid: commit.oid,
    message: commit.message.trim(),
    author: email ? `${name} <${email}>` : name,
    timestampMs: commit.committer.timestampMs,
    signed: Boolean(commit.signature)
  }
}
