/**
 * Git Object Types
 *
 * Value types for the objects the analysis core reads. Commits are identified
 * by their content hash only; metadata is re-read from the store on demand.
 */

/** Lowercase hex content hash of a commit (40 chars for SHA-1, 64 for SHA-256). */
export type CommitRef = string

export type Signature = {
  name: string
  email: string
  timestampMs: number
}

export type CommitMeta = {
  oid: CommitRef
  /** Parent hashes in commit order; first parent first. */
  parents: CommitRef[]
  author: Signature
  committer: Signature
  message: string
  /** Detached gpgsig blob, when the commit is signed. */
  signature?: string
}

export type Reference = {
  name: string
  target: { kind: 'direct'; oid: CommitRef } | { kind: 'symbolic'; name: string }
}

// ============================================================================
// Snapshots
// ============================================================================

export type SnapshotKind = 'tree' | 'index' | 'worktree'

export type SnapshotEntry = {
  /** Repository-relative path using forward slashes. */
  path: string
  /** Blob hash (or commit hash for gitlinks). */
  oid: string
  /** Git file mode, e.g. 0o100644, 0o100755, 0o120000, 0o160000. */
  mode: number
  /** Raw path bytes, when the backend had to decode them itself. */
  pathBytes?: Uint8Array
  /** Set on untracked worktree entries matched by an ignore rule. */
  ignored?: boolean
}

/**
 * Flat listing of the blobs in a tree, the index, or the working copy.
 * Entries are sorted by path.
 */
export type Snapshot = {
  kind: SnapshotKind
  entries: SnapshotEntry[]
}

export type TreeHandle = Snapshot & {
  kind: 'tree'
  /** Commit the tree was read from; null for the empty tree of an unborn branch. */
  commit: CommitRef | null
}

export type WorktreeReadOptions = {
  includeIgnored?: boolean
  includeUntracked?: boolean
}
