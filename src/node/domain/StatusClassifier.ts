/**
 * Status Classifier
 *
 * Three-way comparison of the HEAD tree, the index and the working copy.
 *
 * Two diffs run independently:
 * - HEAD → index gives the staged entries (location 'index')
 * - index → worktree gives the unstaged entries (location 'worktree')
 *
 * Rename detection runs on each diff after add/delete pairing, so a renamed
 * path is reported once instead of as a deletion plus an addition.
 */

import { log } from '@shared/logger'
import type {
  ClassifyOptions,
  CommitRef,
  FileDelta,
  Snapshot,
  SnapshotEntry,
  StatusChange,
  StatusEntry,
  StatusLocation,
  TreeHandle
} from '@shared/types'
import type { ObjectStore } from '../adapters/store/interface'
import { DEFAULT_RENAME_THRESHOLD, MODE_GITLINK } from '../shared/constants'
import { MalformedStateError, NotFoundError } from '../shared/errors'
import { comparePaths } from './TreeDiff'

type ResolvedOptions = Required<ClassifyOptions>

const EMPTY_TREE: TreeHandle = { kind: 'tree', commit: null, entries: [] }

const utf8 = new TextDecoder('utf-8', { fatal: true })

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/

export class StatusClassifier {
  private constructor() {}

  static resolveOptions(options: ClassifyOptions = {}): ResolvedOptions {
    return {
      includeIgnored: options.includeIgnored ?? false,
      includeUntracked: options.includeUntracked ?? true,
      recurseUntrackedDirs: options.recurseUntrackedDirs ?? true,
      detectRenames: options.detectRenames ?? true,
      renameThreshold: options.renameThreshold ?? DEFAULT_RENAME_THRESHOLD,
      excludeSubmodules: options.excludeSubmodules ?? true
    }
  }

  /**
   * Classifies every uncommitted change: staged entries first, then unstaged,
   * each group sorted by path.
   *
   * @throws MalformedStateError when any path is not valid UTF-8
   */
  static async classify(store: ObjectStore, options: ClassifyOptions = {}): Promise<StatusEntry[]> {
    const opts = StatusClassifier.resolveOptions(options)

    const head = await readHeadTree(store)
    const index = await store.readIndex()
    const worktree = await store.readWorktree({
      includeIgnored: opts.includeIgnored,
      includeUntracked: opts.includeUntracked
    })

    for (const snapshot of [head, index, worktree]) {
      StatusClassifier.assertDecodable(snapshot)
    }

    const headSide = prepare(head, opts)
    const indexSide = prepare(index, opts)
    const worktreeSide = prepare(worktree, opts)

    const tracked = worktreeSide.entries.filter((entry) => !entry.ignored)
    const ignored = worktreeSide.entries.filter((entry) => entry.ignored)

    const treeDiffOptions = {
      detectRenames: opts.detectRenames,
      renameThreshold: opts.renameThreshold
    }
    const staged = await store.diffTrees(headSide, indexSide, treeDiffOptions)
    const unstaged = await store.diffTrees(
      indexSide,
      { kind: 'worktree', entries: tracked },
      treeDiffOptions
    )

    const stagedEntries = staged.map((delta) => toEntry(delta, 'index'))
    let unstagedEntries = [
      ...unstaged.map((delta) => toEntry(delta, 'worktree')),
      ...ignored.map(
        (entry): StatusEntry => ({ path: entry.path, location: 'worktree', change: 'unknown' })
      )
    ]

    if (!opts.recurseUntrackedDirs) {
      unstagedEntries = collapseUntrackedDirs(unstagedEntries, indexSide)
    }

    const byPath = (a: StatusEntry, b: StatusEntry) => comparePaths(a.path, b.path)
    const entries = [...stagedEntries.sort(byPath), ...unstagedEntries.sort(byPath)]

    log.debug(
      `[StatusClassifier] ${stagedEntries.length} staged, ${unstagedEntries.length} unstaged`
    )
    return entries
  }

  /**
   * Rejects snapshots holding a path that is not valid text.
   */
  static assertDecodable(snapshot: Snapshot): void {
    for (const entry of snapshot.entries) {
      if (!isDecodablePath(entry)) {
        throw new MalformedStateError(
          `Path in ${snapshot.kind} is not valid UTF-8: ${JSON.stringify(entry.path)}`,
          snapshot.kind
        )
      }
    }
  }
}

export function isDecodablePath(entry: SnapshotEntry): boolean {
  if (entry.path.includes('\uFFFD')) return false
  if (LONE_SURROGATE.test(entry.path)) return false
  if (entry.pathBytes) {
    try {
      utf8.decode(entry.pathBytes)
    } catch {
      return false
    }
  }
  return true
}

async function readHeadTree(store: ObjectStore): Promise<TreeHandle> {
  let head: CommitRef
  try {
    head = await store.resolveRef('HEAD')
  } catch (error) {
    // Unborn branch: the staged side compares against nothing
    if (error instanceof NotFoundError) return EMPTY_TREE
    throw error
  }
  return store.readTree(head)
}

function prepare(snapshot: Snapshot, opts: ResolvedOptions): Snapshot {
  if (!opts.excludeSubmodules) return snapshot
  return {
    kind: snapshot.kind,
    entries: snapshot.entries.filter((entry) => entry.mode !== MODE_GITLINK)
  }
}

function toEntry(delta: FileDelta, location: StatusLocation): StatusEntry {
  const change = changeKind(delta)
  if (change === 'renamed' && delta.oldPath !== undefined) {
    return {
      path: delta.path,
      location,
      change,
      oldPath: delta.oldPath,
      similarity: delta.similarity ?? 100
    }
  }
  return { path: delta.path, location, change }
}

function changeKind(delta: FileDelta): StatusChange {
  switch (delta.status) {
    case 'added':
    case 'copied':
      return 'new'
    case 'deleted':
      return 'deleted'
    case 'modified':
      return 'modified'
    case 'renamed':
      return 'renamed'
    case 'typechange':
      return 'typechange'
  }
}

/**
 * Replaces untracked files under a directory that holds no tracked file with one
 * "dir/" entry for the outermost such directory.
 */
function collapseUntrackedDirs(entries: StatusEntry[], index: Snapshot): StatusEntry[] {
  const trackedDirs = new Set<string>()
  for (const entry of index.entries) {
    const parts = entry.path.split('/')
    for (let i = 1; i < parts.length; i++) {
      trackedDirs.add(parts.slice(0, i).join('/'))
    }
  }

  const collapsed = new Map<string, StatusEntry>()
  const out: StatusEntry[] = []
  for (const entry of entries) {
    if (entry.change !== 'new' && entry.change !== 'unknown') {
      out.push(entry)
      continue
    }

    const parts = entry.path.split('/')
    let dir: string | null = null
    for (let i = 1; i < parts.length; i++) {
      const candidate = parts.slice(0, i).join('/')
      if (!trackedDirs.has(candidate)) {
        dir = candidate
        break
      }
    }

    if (dir === null) {
      out.push(entry)
      continue
    }

    const key = `${entry.change}:${dir}`
    if (!collapsed.has(key)) {
      const folded: StatusEntry = { path: `${dir}/`, location: entry.location, change: entry.change }
      collapsed.set(key, folded)
      out.push(folded)
    }
  }
  return out
}
