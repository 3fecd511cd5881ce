/**
 * Revision Walk
 *
 * Graph algorithms over commit parent edges, independent of any backend:
 * - Reachability walks ("tip ^base"), newest first
 * - Merge base selection (best common ancestors)
 *
 * Both stores build their `walk` and `mergeBase` capabilities on these.
 * Walks paint commits from a single newest-first queue and stop once only
 * hidden (or stale) commits are left, so shared history below the point
 * where two lines meet is never read.
 */

import type { CommitMeta, CommitRef } from '@shared/types'
import { BinaryHeap } from '../shared/heap'

export type CommitLoader = (oid: CommitRef) => Promise<CommitMeta>

/** Extra hidden commits processed after the last wanted one, to absorb clock skew. */
const SLOP = 5

const PARENT1 = 1
const PARENT2 = 2
const STALE = 4
const RESULT = 8

type WalkState = { meta: CommitMeta; hidden: boolean; queued: boolean }

type PaintState = { meta: CommitMeta; flags: number; queued: boolean }

/**
 * Wraps a loader so each commit is read at most once.
 */
export function memoizeLoader(load: CommitLoader): CommitLoader {
  const cache = new Map<CommitRef, Promise<CommitMeta>>()
  return (oid) => {
    let pending = cache.get(oid)
    if (!pending) {
      pending = load(oid)
      cache.set(oid, pending)
    }
    return pending
  }
}

/**
 * Newest committer time first; equal times fall back to oid order so output is stable.
 */
export function compareNewestFirst(a: CommitMeta, b: CommitMeta): number {
  const byTime = b.committer.timestampMs - a.committer.timestampMs
  if (byTime !== 0) return byTime
  return a.oid < b.oid ? -1 : a.oid > b.oid ? 1 : 0
}

/**
 * Commits reachable from `tip` but not from any of `prunedFrom`, newest first.
 *
 * A pruned walk settles the whole result before yielding and never yields a
 * commit before its children in the result. An unpruned walk streams: commits
 * are read only as the caller pulls them, in committer-time order.
 */
export async function* walkRevisions(
  load: CommitLoader,
  tip: CommitRef,
  prunedFrom: CommitRef[]
): AsyncGenerator<CommitRef> {
  if (prunedFrom.length === 0) {
    yield* streamRevisions(load, tip)
    return
  }
  yield* topologicalOrder(await limitRevisions(load, tip, prunedFrom))
}

async function* streamRevisions(load: CommitLoader, tip: CommitRef): AsyncGenerator<CommitRef> {
  const seen = new Set<CommitRef>([tip])
  const queue = new BinaryHeap<CommitMeta>(compareNewestFirst)
  queue.push(await load(tip))

  let next = queue.pop()
  while (next) {
    yield next.oid
    for (const parent of next.parents) {
      if (seen.has(parent)) continue
      seen.add(parent)
      queue.push(await load(parent))
    }
    next = queue.pop()
  }
}

/**
 * Marks commits wanted (from `tip`) or hidden (from `prunedFrom`), passing the
 * hidden mark down to parents, until nothing wanted is left in the queue.
 */
async function limitRevisions(
  load: CommitLoader,
  tip: CommitRef,
  prunedFrom: CommitRef[]
): Promise<Map<CommitRef, CommitMeta>> {
  const states = new Map<CommitRef, WalkState>()
  const queue = new BinaryHeap<WalkState>((a, b) => compareNewestFirst(a.meta, b.meta))
  let wantedQueued = 0

  const enqueue = async (oid: CommitRef, hidden: boolean) => {
    const state: WalkState = { meta: await load(oid), hidden, queued: true }
    states.set(oid, state)
    queue.push(state)
    if (!hidden) wantedQueued++
  }

  const hide = (oid: CommitRef) => {
    const stack = [oid]
    let current = stack.pop()
    while (current !== undefined) {
      const state = states.get(current)
      if (state && !state.hidden) {
        state.hidden = true
        // Queued commits hide their parents when they are processed
        if (state.queued) wantedQueued--
        else stack.push(...state.meta.parents)
      }
      current = stack.pop()
    }
  }

  for (const oid of prunedFrom) {
    if (states.has(oid)) hide(oid)
    else await enqueue(oid, true)
  }
  if (!states.has(tip)) await enqueue(tip, false)

  let slop = SLOP
  while (queue.size > 0) {
    if (wantedQueued === 0) {
      if (slop-- <= 0) break
    } else {
      slop = SLOP
    }

    const state = queue.pop()
    if (!state) break
    state.queued = false
    if (!state.hidden) wantedQueued--

    for (const parent of state.meta.parents) {
      if (states.has(parent)) {
        if (state.hidden) hide(parent)
      } else {
        await enqueue(parent, state.hidden)
      }
    }
  }

  const wanted = new Map<CommitRef, CommitMeta>()
  for (const [oid, state] of states) {
    if (!state.hidden) wanted.set(oid, state.meta)
  }
  return wanted
}

function* topologicalOrder(commits: Map<CommitRef, CommitMeta>): Generator<CommitRef> {
  const pendingChildren = new Map<CommitRef, number>()
  for (const commit of commits.values()) {
    for (const parent of commit.parents) {
      if (commits.has(parent)) {
        pendingChildren.set(parent, (pendingChildren.get(parent) ?? 0) + 1)
      }
    }
  }

  const ready = new BinaryHeap<CommitMeta>(compareNewestFirst)
  for (const commit of commits.values()) {
    if (!pendingChildren.has(commit.oid)) ready.push(commit)
  }

  const emitted = new Set<CommitRef>()
  let next = ready.pop()
  while (next) {
    emitted.add(next.oid)
    yield next.oid

    for (const parent of next.parents) {
      const meta = commits.get(parent)
      if (!meta || emitted.has(parent)) continue
      const remaining = (pendingChildren.get(parent) ?? 1) - 1
      pendingChildren.set(parent, remaining)
      if (remaining === 0) ready.push(meta)
    }

    next = ready.pop()
  }
}

/**
 * All best common ancestors of `a` and `b`: common ancestors with no descendant
 * that is itself a common ancestor. Empty for unrelated histories.
 */
export async function findMergeBases(
  load: CommitLoader,
  a: CommitRef,
  b: CommitRef
): Promise<CommitMeta[]> {
  const states = new Map<CommitRef, PaintState>()
  const queue = new BinaryHeap<PaintState>((x, y) => compareNewestFirst(x.meta, y.meta))

  const paint = async (oid: CommitRef, flags: number) => {
    const existing = states.get(oid)
    if (!existing) {
      const state: PaintState = { meta: await load(oid), flags, queued: true }
      states.set(oid, state)
      queue.push(state)
      return
    }
    if ((existing.flags & flags) === flags) return
    existing.flags |= flags
    if (!existing.queued) {
      existing.queued = true
      queue.push(existing)
    }
  }

  if (a === b) {
    await paint(a, PARENT1 | PARENT2)
  } else {
    await paint(a, PARENT1)
    await paint(b, PARENT2)
  }

  const found: PaintState[] = []
  while (queue.some((state) => (state.flags & STALE) === 0)) {
    const state = queue.pop()
    if (!state) break
    state.queued = false

    let flags = state.flags & (PARENT1 | PARENT2 | STALE)
    if (flags === (PARENT1 | PARENT2)) {
      if ((state.flags & RESULT) === 0) {
        state.flags |= RESULT
        found.push(state)
      }
      flags |= STALE
    }
    for (const parent of state.meta.parents) {
      await paint(parent, flags)
    }
  }

  const candidates = found
    .filter((state) => (state.flags & STALE) === 0)
    .map((state) => state.meta)
  return (await removeRedundant(load, candidates)).sort(compareNewestFirst)
}

/**
 * Drops candidates that are ancestors of another candidate. Only history newer
 * than the oldest candidate is searched.
 */
async function removeRedundant(
  load: CommitLoader,
  candidates: CommitMeta[]
): Promise<CommitMeta[]> {
  if (candidates.length < 2) return candidates

  const oldest = Math.min(...candidates.map((commit) => commit.committer.timestampMs))
  const ids = new Set(candidates.map((commit) => commit.oid))
  const redundant = new Set<CommitRef>()

  for (const candidate of candidates) {
    const seen = new Set<CommitRef>()
    const stack = [...candidate.parents]
    let oid = stack.pop()
    while (oid !== undefined) {
      if (!seen.has(oid)) {
        seen.add(oid)
        if (ids.has(oid)) redundant.add(oid)
        const meta = await load(oid)
        if (meta.committer.timestampMs >= oldest) stack.push(...meta.parents)
      }
      oid = stack.pop()
    }
  }

  return candidates.filter((commit) => !redundant.has(commit.oid))
}

/**
 * Picks one merge base out of several candidates: the newest, then the lowest oid.
 */
export function pickMergeBase(candidates: CommitMeta[]): CommitRef | null {
  const [best] = [...candidates].sort(compareNewestFirst)
  return best?.oid ?? null
}
