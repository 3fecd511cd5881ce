/**
 * Object Store Interface
 *
 * The single capability surface the analysis core reads a repository through.
 * Implementations are bound to one repository; every method is read-only.
 *
 * Implementations must throw NotFoundError for missing refs and objects, and
 * must not be mutated by anything else while an analysis call is running.
 */

import type {
  CommitMeta,
  CommitRef,
  FileDelta,
  Reference,
  Snapshot,
  TreeDiffOptions,
  TreeHandle,
  WorktreeReadOptions
} from '@shared/types'

export interface ObjectStore {
  /**
   * Backend name for logging
   */
  readonly name: string

  /**
   * Absolute path of the git directory (control files live here)
   */
  readonly gitdir: string

  // ============================================================================
  // References
  // ============================================================================

  /**
   * Resolve a ref (HEAD, branch, full ref name, or full oid) to a commit hash
   */
  resolveRef(name: string): Promise<CommitRef>

  /**
   * Read a reference without peeling it
   */
  readReference(name: string): Promise<Reference>

  /**
   * Branch HEAD points at (without refs/heads/), or null when detached
   */
  currentBranch(): Promise<string | null>

  /**
   * Read a git config value, or undefined when unset
   */
  getConfig(path: string): Promise<string | undefined>

  // ============================================================================
  // Objects
  // ============================================================================

  readCommit(oid: CommitRef): Promise<CommitMeta>

  /**
   * Flatten the tree of a commit into a snapshot
   */
  readTree(oid: CommitRef): Promise<TreeHandle>

  readIndex(): Promise<Snapshot>

  readWorktree(options?: WorktreeReadOptions): Promise<Snapshot>

  readBlob(oid: string): Promise<Uint8Array>

  /**
   * Compare two snapshots path by path, with optional rename and copy detection
   */
  diffTrees(base: Snapshot, target: Snapshot, options?: TreeDiffOptions): Promise<FileDelta[]>

  // ============================================================================
  // History
  // ============================================================================

  /**
   * Commits reachable from `tip` but from none of `prunedFrom`, newest first
   */
  walk(tip: CommitRef, prunedFrom: CommitRef[]): AsyncIterable<CommitRef>

  /**
   * Best common ancestor of two commits, or null for unrelated histories
   */
  mergeBase(a: CommitRef, b: CommitRef): Promise<CommitRef | null>
}
