/**
 * In-Memory Object Store
 *
 * ObjectStore backed by plain maps. Commits, refs, config, the index and the
 * working copy are set up directly, which lets analyses run on hand-built
 * graphs (criss-cross merges, unrelated roots, odd paths) without a repository
 * on disk. Blob ids are real git blob hashes of the content.
 */

import type {
  CommitMeta,
  CommitRef,
  FileDelta,
  Reference,
  Snapshot,
  SnapshotEntry,
  TreeDiffOptions,
  TreeHandle,
  WorktreeReadOptions
} from '@shared/types'
import crypto from 'crypto'
import os from 'os'
import path from 'path'
import {
  findMergeBases,
  memoizeLoader,
  pickMergeBase,
  walkRevisions
} from '../../domain/RevisionWalk'
import { comparePaths, diffSnapshots } from '../../domain/TreeDiff'
import { MODE_FILE } from '../../shared/constants'
import { NotFoundError } from '../../shared/errors'
import type { ObjectStore } from './interface'

export type FileSpec =
  | string
  | {
      content?: string | Uint8Array
      /** Overrides the computed blob id (gitlinks, odd fixtures). */
      oid?: string
      mode?: number
      /** Only meaningful for untracked worktree files. */
      ignored?: boolean
      pathBytes?: Uint8Array
    }

export type FileMap = Record<string, FileSpec>

export type CommitInput = {
  oid: CommitRef
  parents?: CommitRef[]
  message?: string
  /** Committer (and author) time. Defaults to one second after the newest parent. */
  timestampMs?: number
  signature?: string
  files?: FileMap
}

const encoder = new TextEncoder()

export function hashBlob(content: Uint8Array): string {
  return crypto
    .createHash('sha1')
    .update(`blob ${content.length}\0`)
    .update(content)
    .digest('hex')
}

export class MemoryObjectStore implements ObjectStore {
  readonly name = 'memory'
  readonly gitdir: string

  private commits = new Map<CommitRef, CommitMeta>()
  private trees = new Map<CommitRef, SnapshotEntry[]>()
  private refs = new Map<string, Reference['target']>()
  private config = new Map<string, string>()
  private blobs = new Map<string, Uint8Array>()
  private index: SnapshotEntry[] = []
  private worktree: SnapshotEntry[] = []

  /** Number of readCommit calls, per oid. */
  readonly commitReads = new Map<CommitRef, number>()

  constructor(options: { gitdir?: string } = {}) {
    this.gitdir =
      options.gitdir ?? path.join(os.tmpdir(), 'gitscope-memory', crypto.randomUUID(), '.git')
  }

  // ============================================================================
  // Setup
  // ============================================================================

  addCommit(input: CommitInput): CommitRef {
    const parents = input.parents ?? []
    const newestParent = Math.max(
      0,
      ...parents.map((oid) => this.commits.get(oid)?.committer.timestampMs ?? 0)
    )
    const timestampMs = input.timestampMs ?? newestParent + 1000
    const signature = { name: 'Test User', email: 'test@example.com', timestampMs }

    this.commits.set(input.oid, {
      oid: input.oid,
      parents,
      author: signature,
      committer: signature,
      message: input.message ?? `${input.oid}\n`,
      ...(input.signature !== undefined ? { signature: input.signature } : {})
    })
    this.trees.set(input.oid, this.entriesFrom(input.files ?? {}))
    return input.oid
  }

  setRef(name: string, oid: CommitRef): void {
    this.refs.set(name, { kind: 'direct', oid })
  }

  setSymbolicRef(name: string, target: string): void {
    this.refs.set(name, { kind: 'symbolic', name: target })
  }

  setConfig(key: string, value: string): void {
    this.config.set(key, value)
  }

  setIndex(files: FileMap): void {
    this.index = this.entriesFrom(files)
  }

  setWorktree(files: FileMap): void {
    this.worktree = this.entriesFrom(files)
  }

  /**
   * Stores a blob and returns its id.
   */
  writeBlob(content: string | Uint8Array): string {
    const bytes = typeof content === 'string' ? encoder.encode(content) : content
    const oid = hashBlob(bytes)
    this.blobs.set(oid, bytes)
    return oid
  }

  private entriesFrom(files: FileMap): SnapshotEntry[] {
    return Object.entries(files)
      .map(([filepath, spec]): SnapshotEntry => {
        const file = typeof spec === 'string' ? { content: spec } : spec
        const oid = file.oid ?? this.writeBlob(file.content ?? '')
        return {
          path: filepath,
          oid,
          mode: file.mode ?? MODE_FILE,
          ...(file.pathBytes ? { pathBytes: file.pathBytes } : {}),
          ...(file.ignored ? { ignored: true } : {})
        }
      })
      .sort((a, b) => comparePaths(a.path, b.path))
  }

  // ============================================================================
  // References
  // ============================================================================

  async resolveRef(name: string): Promise<CommitRef> {
    if (this.commits.has(name)) return name

    const candidates = [name, `refs/heads/${name}`, `refs/remotes/${name}`, `refs/tags/${name}`]
    for (const candidate of candidates) {
      const target = this.refs.get(candidate)
      if (!target) continue
      return target.kind === 'direct' ? target.oid : this.resolveRef(target.name)
    }

    throw new NotFoundError(`Ref not found: ${name}`, 'ref')
  }

  async readReference(name: string): Promise<Reference> {
    const target = this.refs.get(name)
    if (!target) throw new NotFoundError(`Ref not found: ${name}`, 'ref')
    return { name, target }
  }

  async currentBranch(): Promise<string | null> {
    const head = this.refs.get('HEAD')
    if (!head || head.kind !== 'symbolic') return null
    return head.name.replace(/^refs\/heads\//, '')
  }

  async getConfig(key: string): Promise<string | undefined> {
    return this.config.get(key)
  }

  // ============================================================================
  // Objects
  // ============================================================================

  async readCommit(oid: CommitRef): Promise<CommitMeta> {
    const commit = this.commits.get(oid)
    if (!commit) throw new NotFoundError(`Commit not found: ${oid}`, 'commit')
    this.commitReads.set(oid, (this.commitReads.get(oid) ?? 0) + 1)
    return commit
  }

  async readTree(oid: CommitRef): Promise<TreeHandle> {
    const entries = this.trees.get(oid)
    if (!entries) throw new NotFoundError(`Tree not found for commit ${oid}`, 'tree')
    return { kind: 'tree', commit: oid, entries: [...entries] }
  }

  async readIndex(): Promise<Snapshot> {
    return { kind: 'index', entries: [...this.index] }
  }

  async readWorktree(options: WorktreeReadOptions = {}): Promise<Snapshot> {
    const includeUntracked = options.includeUntracked ?? true
    const includeIgnored = options.includeIgnored ?? false
    const tracked = new Set(this.index.map((entry) => entry.path))

    const entries = this.worktree.flatMap((entry): SnapshotEntry[] => {
      if (tracked.has(entry.path)) {
        const { ignored: _ignored, ...rest } = entry
        return [rest]
      }
      if (entry.ignored) return includeIgnored ? [entry] : []
      return includeUntracked ? [entry] : []
    })
    return { kind: 'worktree', entries }
  }

  async readBlob(oid: string): Promise<Uint8Array> {
    const blob = this.blobs.get(oid)
    if (!blob) throw new NotFoundError(`Blob not found: ${oid}`, 'blob')
    return blob
  }

  async diffTrees(
    base: Snapshot,
    target: Snapshot,
    options: TreeDiffOptions = {}
  ): Promise<FileDelta[]> {
    return diffSnapshots(base, target, options, (oid) => this.readBlob(oid))
  }

  // ============================================================================
  // History
  // ============================================================================

  walk(tip: CommitRef, prunedFrom: CommitRef[]): AsyncIterable<CommitRef> {
    return walkRevisions(memoizeLoader((oid) => this.readCommit(oid)), tip, prunedFrom)
  }

  async mergeBase(a: CommitRef, b: CommitRef): Promise<CommitRef | null> {
    const load = memoizeLoader((oid) => this.readCommit(oid))
    return pickMergeBase(await findMergeBases(load, a, b))
  }
}
