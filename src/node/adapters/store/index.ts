/**
 * Object Store Module
 *
 * Read-only access to commits, trees, the index and the working copy.
 *
 * Usage:
 * ```typescript
 * import { openStore } from './adapters/store'
 *
 * const store = await openStore(repoPath)
 * const head = await store.resolveRef('HEAD')
 * ```
 */

export { openStore, resetStores } from './factory'
export type { ObjectStore } from './interface'
export { IsomorphicGitStore } from './IsomorphicGitStore'
export { MemoryObjectStore, hashBlob } from './MemoryObjectStore'
export type { CommitInput, FileMap, FileSpec } from './MemoryObjectStore'
