/**
 * Isomorphic-Git Object Store
 *
 * ObjectStore over a repository on disk, read with isomorphic-git so no git
 * binary is needed. Trees, the index and the working copy are flattened with
 * `git.walk`; history walks and merge-base tie-breaking use the shared
 * revision-walk code.
 *
 * isomorphic-git NotFoundError is translated to our NotFoundError here;
 * any other backend failure becomes a GitError.
 */

import { log } from '@shared/logger'
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
import fs from 'fs'
import git from 'isomorphic-git'
import path from 'path'
import { memoizeLoader, pickMergeBase, walkRevisions } from '../../domain/RevisionWalk'
import { comparePaths, diffSnapshots } from '../../domain/TreeDiff'
import { MODE_GITLINK, MODE_SYMLINK } from '../../shared/constants'
import { AppError, GitError, NotFoundError } from '../../shared/errors'
import type { ObjectStore } from './interface'

const OID_PATTERN = /^[0-9a-f]{40}([0-9a-f]{24})?$/

type WorktreeFile = { filepath: string; mode: number }

export class IsomorphicGitStore implements ObjectStore {
  readonly name = 'isomorphic-git'
  readonly gitdir: string

  /** Shared isomorphic-git object cache (parsed packfiles and index). */
  private readonly cache = {}

  /** Working copy files by blob id, for content not yet in the object database. */
  private readonly worktreeFiles = new Map<string, WorktreeFile>()

  constructor(
    readonly dir: string,
    gitdir?: string
  ) {
    this.gitdir = gitdir ?? path.join(dir, '.git')
  }

  // ============================================================================
  // References
  // ============================================================================

  async resolveRef(name: string): Promise<CommitRef> {
    return this.call('resolveRef', 'ref', name, () =>
      git.resolveRef({ fs, dir: this.dir, gitdir: this.gitdir, ref: name })
    )
  }

  async readReference(name: string): Promise<Reference> {
    // depth 2 stops after one symbolic hop: "HEAD" yields "refs/heads/main"
    const value = await this.call('readReference', 'ref', name, () =>
      git.resolveRef({ fs, dir: this.dir, gitdir: this.gitdir, ref: name, depth: 2 })
    )
    if (OID_PATTERN.test(value)) {
      return { name, target: { kind: 'direct', oid: value } }
    }
    return { name, target: { kind: 'symbolic', name: value.replace(/^ref: /, '') } }
  }

  async currentBranch(): Promise<string | null> {
    const branch = await this.call('currentBranch', 'ref', 'HEAD', () =>
      git.currentBranch({ fs, dir: this.dir, gitdir: this.gitdir, fullname: false })
    )
    return typeof branch === 'string' ? branch : null
  }

  async getConfig(key: string): Promise<string | undefined> {
    const value: unknown = await this.call('getConfig', 'file', key, () =>
      git.getConfig({ fs, dir: this.dir, gitdir: this.gitdir, path: key })
    )
    return typeof value === 'string' ? value : undefined
  }

  // ============================================================================
  // Objects
  // ============================================================================

  async readCommit(oid: CommitRef): Promise<CommitMeta> {
    const { commit } = await this.call('readCommit', 'commit', oid, () =>
      git.readCommit({ fs, dir: this.dir, gitdir: this.gitdir, oid, cache: this.cache })
    )

    return {
      oid,
      parents: commit.parent,
      author: {
        name: commit.author.name,
        email: commit.author.email,
        timestampMs: commit.author.timestamp * 1000
      },
      committer: {
        name: commit.committer.name,
        email: commit.committer.email,
        timestampMs: commit.committer.timestamp * 1000
      },
      message: commit.message,
      ...(commit.gpgsig ? { signature: commit.gpgsig } : {})
    }
  }

  async readTree(oid: CommitRef): Promise<TreeHandle> {
    // TREE() falls back to the empty tree for unknown refs, so check the commit first
    await this.readCommit(oid)

    const entries: SnapshotEntry[] = []
    await this.call('readTree', 'tree', oid, () =>
      git.walk({
        fs,
        dir: this.dir,
        gitdir: this.gitdir,
        cache: this.cache,
        trees: [git.TREE({ ref: oid })],
        map: async (filepath, [entry]) => {
          if (filepath === '.' || !entry) return undefined
          if ((await entry.type()) === 'tree') return undefined
          entries.push({ path: filepath, oid: await entry.oid(), mode: await entry.mode() })
          return undefined
        }
      })
    )

    entries.sort((a, b) => comparePaths(a.path, b.path))
    return { kind: 'tree', commit: oid, entries }
  }

  async readIndex(): Promise<Snapshot> {
    const entries: SnapshotEntry[] = []
    await this.call('readIndex', 'file', 'index', () =>
      git.walk({
        fs,
        dir: this.dir,
        gitdir: this.gitdir,
        cache: this.cache,
        trees: [git.STAGE()],
        map: async (filepath, [entry]) => {
          if (filepath === '.' || !entry) return undefined
          if ((await entry.type()) === 'tree') return undefined
          entries.push({ path: filepath, oid: await entry.oid(), mode: await entry.mode() })
          return undefined
        }
      })
    )
    return { kind: 'index', entries: entries.sort((a, b) => comparePaths(a.path, b.path)) }
  }

  async readWorktree(options: WorktreeReadOptions = {}): Promise<Snapshot> {
    const includeUntracked = options.includeUntracked ?? true
    const includeIgnored = options.includeIgnored ?? false
    const entries: SnapshotEntry[] = []

    const isIgnored = (filepath: string) =>
      git.isIgnored({ fs, dir: this.dir, gitdir: this.gitdir, filepath })

    await this.call('readWorktree', 'file', this.dir, () =>
      git.walk({
        fs,
        dir: this.dir,
        gitdir: this.gitdir,
        cache: this.cache,
        trees: [git.STAGE(), git.WORKDIR()],
        map: async (filepath, [stage, workdir]) => {
          if (filepath === '.') return undefined
          if (path.posix.basename(filepath) === '.git') return null
          if (!workdir) return undefined

          const stageType = stage ? await stage.type() : undefined
          const stageMode = stage ? await stage.mode() : undefined

          // Submodule checkout: report the recorded commit, never look inside
          if (stage && stageMode === MODE_GITLINK) {
            entries.push({ path: filepath, oid: await stage.oid(), mode: MODE_GITLINK })
            return null
          }

          const tracked = stage !== null && stageType !== 'tree'
          const workdirType = await workdir.type()

          if (workdirType === 'tree') {
            if (stageType === 'tree') return undefined
            // Untracked directory: ignored files inside may still be wanted
            if (await isIgnored(filepath)) return includeIgnored ? undefined : null
            return includeUntracked || includeIgnored ? undefined : null
          }

          let ignored = false
          if (!tracked) {
            ignored = await isIgnored(filepath)
            if (ignored ? !includeIgnored : !includeUntracked) return undefined
          }

          const oid = await workdir.oid()
          const mode = await workdir.mode()
          this.worktreeFiles.set(oid, { filepath, mode })
          entries.push({ path: filepath, oid, mode, ...(ignored ? { ignored: true } : {}) })
          return undefined
        }
      })
    )

    return { kind: 'worktree', entries: entries.sort((a, b) => comparePaths(a.path, b.path)) }
  }

  async readBlob(oid: string): Promise<Uint8Array> {
    try {
      const { blob } = await git.readBlob({
        fs,
        dir: this.dir,
        gitdir: this.gitdir,
        oid,
        cache: this.cache
      })
      return blob
    } catch (error) {
      const file = this.worktreeFiles.get(oid)
      if (!file || !isBackendNotFound(error)) throw translate('readBlob', 'blob', oid, error)

      const fullPath = path.join(this.dir, file.filepath)
      if (file.mode === MODE_SYMLINK) {
        return new TextEncoder().encode(await fs.promises.readlink(fullPath))
      }
      return new Uint8Array(await fs.promises.readFile(fullPath))
    }
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
    const oids: unknown[] = await this.call('mergeBase', 'commit', `${a} ${b}`, () =>
      git.findMergeBase({ fs, dir: this.dir, gitdir: this.gitdir, oids: [a, b], cache: this.cache })
    )
    const candidates = oids.filter((oid): oid is string => typeof oid === 'string')
    if (candidates.length <= 1) return candidates[0] ?? null

    // findMergeBase may return several best ancestors; pick one deterministically
    const load = memoizeLoader((oid) => this.readCommit(oid))
    const metas = await Promise.all(candidates.map((oid) => load(oid)))
    log.debug(`[IsomorphicGitStore] ${candidates.length} merge base candidates for ${a}..${b}`)
    return pickMergeBase(metas)
  }

  private async call<T>(
    operation: string,
    resource: NotFoundError['resourceType'],
    subject: string,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      throw translate(operation, resource, subject, error)
    }
  }
}

function isBackendNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'NotFoundError'
}

function translate(
  operation: string,
  resource: NotFoundError['resourceType'],
  subject: string,
  error: unknown
): AppError {
  if (error instanceof AppError) return error
  if (isBackendNotFound(error)) {
    return new NotFoundError(`${operation}: ${resource} not found: ${subject}`, resource, error)
  }
  const message = error instanceof Error ? error.message : String(error)
  return new GitError(`${operation} failed: ${message}`, operation, error)
}
