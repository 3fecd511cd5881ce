/**
 * Working Copy Status Types
 */

/** Which comparison produced the entry: HEAD→index (staged) or index→worktree (unstaged). */
export type StatusLocation = 'index' | 'worktree'

export type StatusChange = 'new' | 'modified' | 'renamed' | 'deleted' | 'typechange' | 'unknown'

export type StatusEntry = {
  path: string
  location: StatusLocation
  change: StatusChange
  /** Source path of a rename. */
  oldPath?: string
  /** Rename similarity in percent. */
  similarity?: number
}

export type ClassifyOptions = {
  /** Report ignored untracked files as `unknown` worktree entries. Default false. */
  includeIgnored?: boolean
  /** Report untracked files as `new` worktree entries. Default true. */
  includeUntracked?: boolean
  /** Expand untracked directories into their files. Default true. */
  recurseUntrackedDirs?: boolean
  /** Pair deletions with additions by content. Default true. */
  detectRenames?: boolean
  /** Minimum similarity (percent) for a rename. Default 50. */
  renameThreshold?: number
  /** Skip gitlink entries. Default true. */
  excludeSubmodules?: boolean
}
