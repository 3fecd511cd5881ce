/**
 * Diff Types
 */

import type { CommitRef } from './git'

export type DiffSide = { kind: 'tree'; oid: CommitRef } | { kind: 'index' } | { kind: 'worktree' }

export type WhitespaceMode = 'none' | 'ignore-all' | 'ignore-change' | 'ignore-eol'

export type DeltaStatus = 'added' | 'deleted' | 'modified' | 'renamed' | 'copied' | 'typechange'

export type FileDelta = {
  path: string
  oldPath?: string
  status: DeltaStatus
  /** Empty string when the old side has no blob. */
  oldOid: string
  /** Empty string when the new side has no blob. */
  newOid: string
  oldMode: number
  newMode: number
  similarity?: number
}

export type TreeDiffOptions = {
  /** Literal paths or directory prefixes to keep. */
  pathspec?: string[]
  detectRenames?: boolean
  detectCopies?: boolean
  renameThreshold?: number
}

export type DiffOptions = TreeDiffOptions & {
  whitespace?: WhitespaceMode
  contextLines?: number
  /** Include untracked files when the target is the worktree. */
  includeUntracked?: boolean
}

export type FileStat = {
  path: string
  oldPath?: string
  status: DeltaStatus
  insertions: number
  deletions: number
  binary: boolean
}

export type DiffStats = {
  insertions: number
  deletions: number
  filesChanged: number
  files: FileStat[]
}

/** ' ' context, '+' addition, '-' deletion, 'F' file header, 'H' hunk header. */
export type PatchOrigin = ' ' | '+' | '-' | 'F' | 'H'

export type PatchLine = {
  origin: PatchOrigin
  content: string
  path: string
}
