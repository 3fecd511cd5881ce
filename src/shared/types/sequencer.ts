/**
 * Sequencer Types
 *
 * Typed form of the rebase todo list and of the other in-flight operations
 * git records in its control directory.
 */

import type { CommitRef } from './git'

export type SequencerOpKind = 'pick' | 'reword' | 'edit' | 'squash' | 'fixup' | 'exec'

export type SequencerOp = {
  /** Commit to apply; the zero oid for `exec` steps. */
  target: CommitRef
  kind: SequencerOpKind
  /** Commit subject, or the shell command for `exec` steps. */
  message: string
}

export type RebaseProgress = {
  kind: 'rebase'
  /** Branch being rebased, without refs/heads/; null when the rebase started detached. */
  headName: string | null
  onto: CommitRef
  originalHead: CommitRef
  step: number
  totalSteps: number
  /** Steps still to apply, in file order. */
  remaining: SequencerOp[]
}

export type ApplyProgress = {
  kind: 'rebase-apply'
  headName: string | null
  onto: CommitRef
  originalHead: CommitRef
  step: number
  totalSteps: number
}

export type InProgressOperation =
  | RebaseProgress
  | ApplyProgress
  | { kind: 'merge'; head: CommitRef }
  | { kind: 'cherry-pick'; head: CommitRef }
  | { kind: 'revert'; head: CommitRef }
  | { kind: 'bisect' }
