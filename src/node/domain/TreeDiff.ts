/**
 * Tree Diff
 *
 * Path-by-path comparison of two snapshots (tree, index or worktree) with
 * similarity-based rename and copy detection. Pure apart from blob reads,
 * which only happen when inexact pairing is needed.
 */

import type { FileDelta, Snapshot, SnapshotEntry, TreeDiffOptions } from '@shared/types'
import {
  DEFAULT_RENAME_THRESHOLD,
  MODE_GITLINK,
  MODE_SYMLINK,
  MODE_TREE
} from '../shared/constants'

export type BlobReader = (oid: string) => Promise<Uint8Array>

/** Hash of the empty blob; empty files never take part in rename pairing. */
const EMPTY_BLOB_OIDS = new Set([
  'e69de29bb2d1d6434b8b29ae775ad8c2e48c5391',
  '473a0f4c3be8a93681a267e3b1e9a7dcda1185436fe141f7749120a303721813'
])

/** Above this many add×delete candidates, only exact renames are detected. */
const INEXACT_RENAME_LIMIT = 1000 * 1000

export type ObjectKind = 'file' | 'symlink' | 'gitlink' | 'tree'

export function objectKind(mode: number): ObjectKind {
  switch (mode) {
    case MODE_SYMLINK:
      return 'symlink'
    case MODE_GITLINK:
      return 'gitlink'
    case MODE_TREE:
      return 'tree'
    default:
      return 'file'
  }
}

export function comparePaths(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'))
}

/**
 * Keeps paths equal to, or below, one of the pathspecs. No pathspec keeps everything.
 */
export function matchesPathspec(path: string, pathspec: string[] | undefined): boolean {
  if (!pathspec || pathspec.length === 0) return true
  return pathspec.some((raw) => {
    const spec = raw.replace(/^\.\//, '').replace(/\/+$/, '')
    return spec === '' || spec === '.' || path === spec || path.startsWith(`${spec}/`)
  })
}

/**
 * Percentage of the larger blob covered by lines the two blobs share.
 */
export function similarityScore(a: Uint8Array, b: Uint8Array): number {
  const larger = Math.max(a.length, b.length)
  if (larger === 0) return 0

  const available = new Map<string, number>()
  for (const line of splitLines(a)) {
    available.set(line, (available.get(line) ?? 0) + 1)
  }

  let matched = 0
  for (const line of splitLines(b)) {
    const count = available.get(line) ?? 0
    if (count > 0) {
      available.set(line, count - 1)
      matched += line.length
    }
  }

  return Math.floor((matched * 100) / larger)
}

function splitLines(bytes: Uint8Array): string[] {
  // latin1 keeps one character per byte, so line lengths are byte counts
  const text = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1')
  const lines = text.split(/(?<=\n)/)
  return lines[lines.length - 1] === '' ? lines.slice(0, -1) : lines
}

/**
 * Compares two snapshots and returns one delta per changed path, sorted by path.
 */
export async function diffSnapshots(
  base: Snapshot,
  target: Snapshot,
  options: TreeDiffOptions,
  readBlob: BlobReader
): Promise<FileDelta[]> {
  const oldEntries = indexByPath(base.entries, options.pathspec)
  const newEntries = indexByPath(target.entries, options.pathspec)

  const deltas: FileDelta[] = []
  for (const [path, oldEntry] of oldEntries) {
    const newEntry = newEntries.get(path)
    if (!newEntry) {
      deltas.push(deletion(oldEntry))
    } else if (objectKind(oldEntry.mode) !== objectKind(newEntry.mode)) {
      deltas.push(change('typechange', oldEntry, newEntry))
    } else if (oldEntry.oid !== newEntry.oid || oldEntry.mode !== newEntry.mode) {
      deltas.push(change('modified', oldEntry, newEntry))
    }
  }
  for (const [path, newEntry] of newEntries) {
    if (!oldEntries.has(path)) deltas.push(addition(newEntry))
  }

  const threshold = options.renameThreshold ?? DEFAULT_RENAME_THRESHOLD
  const detectRenames = options.detectRenames ?? false
  const detectCopies = options.detectCopies ?? false
  const paired = detectRenames || detectCopies
    ? await pairSimilar(deltas, { detectRenames, detectCopies, threshold }, readBlob)
    : deltas

  return paired.sort((a, b) => comparePaths(a.path, b.path))
}

function indexByPath(
  entries: SnapshotEntry[],
  pathspec: string[] | undefined
): Map<string, SnapshotEntry> {
  const byPath = new Map<string, SnapshotEntry>()
  for (const entry of entries) {
    if (matchesPathspec(entry.path, pathspec)) byPath.set(entry.path, entry)
  }
  return byPath
}

function addition(entry: SnapshotEntry): FileDelta {
  return {
    path: entry.path,
    status: 'added',
    oldOid: '',
    newOid: entry.oid,
    oldMode: 0,
    newMode: entry.mode
  }
}

function deletion(entry: SnapshotEntry): FileDelta {
  return {
    path: entry.path,
    status: 'deleted',
    oldOid: entry.oid,
    newOid: '',
    oldMode: entry.mode,
    newMode: 0
  }
}

function change(
  status: 'modified' | 'typechange',
  oldEntry: SnapshotEntry,
  newEntry: SnapshotEntry
): FileDelta {
  return {
    path: newEntry.path,
    status,
    oldOid: oldEntry.oid,
    newOid: newEntry.oid,
    oldMode: oldEntry.mode,
    newMode: newEntry.mode
  }
}

type PairingOptions = {
  detectRenames: boolean
  detectCopies: boolean
  threshold: number
}

type Candidate = { source: FileDelta; target: FileDelta; score: number }

/**
 * Replaces add/delete pairs with renames (exact content first, then by
 * similarity), then marks remaining additions that resemble a modified file as copies.
 */
async function pairSimilar(
  deltas: FileDelta[],
  options: PairingOptions,
  readBlob: BlobReader
): Promise<FileDelta[]> {
  const pairable = (delta: FileDelta, oid: string) =>
    objectKind(delta.status === 'deleted' ? delta.oldMode : delta.newMode) !== 'gitlink' &&
    !EMPTY_BLOB_OIDS.has(oid)

  const byPath = (a: FileDelta, b: FileDelta) => comparePaths(a.path, b.path)
  let added = deltas.filter((d) => d.status === 'added' && pairable(d, d.newOid)).sort(byPath)
  let deleted = deltas.filter((d) => d.status === 'deleted' && pairable(d, d.oldOid)).sort(byPath)

  const replaced = new Set<FileDelta>()
  const produced: FileDelta[] = []
  const blobs = new Map<string, Promise<Uint8Array>>()
  const blob = (oid: string) => {
    let pending = blobs.get(oid)
    if (!pending) {
      pending = readBlob(oid)
      blobs.set(oid, pending)
    }
    return pending
  }

  const accept = (source: FileDelta, target: FileDelta, score: number, copy: boolean) => {
    if (!copy) replaced.add(source)
    replaced.add(target)
    produced.push({
      path: target.path,
      oldPath: source.path,
      status: copy ? 'copied' : 'renamed',
      oldOid: source.oldOid,
      newOid: target.newOid,
      oldMode: source.oldMode,
      newMode: target.newMode,
      similarity: score
    })
  }

  if (options.detectRenames) {
    for (const target of added) {
      const source = deleted.find((d) => !replaced.has(d) && d.oldOid === target.newOid)
      if (source) accept(source, target, 100, false)
    }

    added = added.filter((d) => !replaced.has(d))
    deleted = deleted.filter((d) => !replaced.has(d))

    if (added.length * deleted.length <= INEXACT_RENAME_LIMIT) {
      const candidates = await scoreCandidates(deleted, added, options.threshold, blob)
      for (const { source, target, score } of candidates) {
        if (!replaced.has(source) && !replaced.has(target)) accept(source, target, score, false)
      }
      added = added.filter((d) => !replaced.has(d))
    }
  }

  if (options.detectCopies && added.length > 0) {
    const sources = deltas.filter((d) => d.status === 'modified' && pairable(d, d.oldOid))
    const exact = new Set<FileDelta>()
    for (const target of added) {
      const source = sources.find((d) => d.oldOid === target.newOid)
      if (source) {
        accept(source, target, 100, true)
        exact.add(target)
      }
    }
    const remaining = added.filter((d) => !exact.has(d))
    const candidates = await scoreCandidates(sources, remaining, options.threshold, blob)
    for (const { source, target, score } of candidates) {
      if (!replaced.has(target)) accept(source, target, score, true)
    }
  }

  return [...deltas.filter((d) => !replaced.has(d)), ...produced]
}

async function scoreCandidates(
  sources: FileDelta[],
  targets: FileDelta[],
  threshold: number,
  blob: (oid: string) => Promise<Uint8Array>
): Promise<Candidate[]> {
  const candidates: Candidate[] = []
  for (const target of targets) {
    const targetBytes = await blob(target.newOid)
    for (const source of sources) {
      const score = similarityScore(await blob(source.oldOid), targetBytes)
      if (score >= threshold) candidates.push({ source, target, score })
    }
  }

  return candidates.sort(
    (a, b) =>
      b.score - a.score ||
      comparePaths(a.target.path, b.target.path) ||
      comparePaths(a.source.path, b.source.path)
  )
}
