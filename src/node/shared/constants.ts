/**
 * Node-specific constants for the analysis core.
 */

/** Object id git uses for "no object": a ref that does not exist yet. */
export const ZERO_OID = '0000000000000000000000000000000000000000'

/** Rebase todo list, relative to the git dir. */
export const SEQUENCER_TODO_PATH = 'rebase-merge/git-rebase-todo'

/** Minimum similarity (percent) for rename and copy detection. */
export const DEFAULT_RENAME_THRESHOLD = 50

/** Lines of context around each hunk. */
export const DEFAULT_CONTEXT_LINES = 3

/** Bytes inspected for a NUL when deciding whether a blob is binary. */
export const BINARY_SNIFF_BYTES = 8000

export const MODE_TREE = 0o040000
export const MODE_FILE = 0o100644
export const MODE_EXECUTABLE = 0o100755
export const MODE_SYMLINK = 0o120000
export const MODE_GITLINK = 0o160000

/**
 * Returns true for an all-zero object id of any hash length.
 */
export function isZeroOid(oid: string): boolean {
  return /^0+$/.test(oid)
}
