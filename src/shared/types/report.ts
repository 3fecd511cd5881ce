/**
 * Report Types
 *
 * The merged, point-in-time picture handed to the renderer.
 */

import type { CommitRef } from './git'
import type { InProgressOperation } from './sequencer'
import type { StatusEntry } from './status'

export type DivergenceSet = {
  mergeBase: CommitRef
  /** Commits only on the local side, newest first. */
  ahead: CommitRef[]
  /** Commits only on the remote side, newest first. */
  behind: CommitRef[]
}

export type HeadState =
  | { kind: 'branch'; branch: string; oid: CommitRef; subject: string }
  | { kind: 'detached'; oid: CommitRef; subject: string }
  | { kind: 'unborn'; branch: string }

export type ReportCommit = {
  oid: CommitRef
  subject: string
  signed: boolean
}

/** One commit as the history listing shows it. */
export type HistoryEntry = {
  oid: CommitRef
  /** Full message with surrounding whitespace trimmed. */
  message: string
  /** "name <email>", or the name alone when there is no email. */
  author: string
  /** Committer time. */
  timestampMs: number
  signed: boolean
}

export type RepositoryReport = {
  head: HeadState
  /** Upstream ref the divergence was computed against, e.g. refs/remotes/origin/main. */
  upstream: string | null
  divergence: DivergenceSet | null
  /** Subjects of the commits in `divergence`, keyed by the same order. */
  aheadCommits: ReportCommit[]
  behindCommits: ReportCommit[]
  changes: StatusEntry[]
  operation: InProgressOperation | null
}
