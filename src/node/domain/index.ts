/**
 * Domain Layer - the analysis core.
 *
 * Graph walks, snapshot comparison, todo parsing and the push guard. Nothing
 * here writes to a repository; reads go through the ObjectStore interface
 * so every analysis can run against the in-memory store in tests.
 */

export { DiffEmitter, isBinary, whitespaceComparator } from './DiffEmitter'
export type { DiffResult } from './DiffEmitter'
export { DivergenceWalker } from './DivergenceWalker'
export type { UpstreamDivergence } from './DivergenceWalker'
export { PushGuard } from './PushGuard'
export type { RefUpdate } from './PushGuard'
export {
  compareNewestFirst,
  findMergeBases,
  memoizeLoader,
  pickMergeBase,
  walkRevisions
} from './RevisionWalk'
export type { CommitLoader } from './RevisionWalk'
export { SequencerReader } from './SequencerReader'
export { StatusClassifier, isDecodablePath } from './StatusClassifier'
export {
  comparePaths,
  diffSnapshots,
  matchesPathspec,
  objectKind,
  similarityScore
} from './TreeDiff'
export type { BlobReader, ObjectKind } from './TreeDiff'
