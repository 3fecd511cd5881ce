/**
 * Diff Emitter
 *
 * Compares two sides (a commit's tree, the index, or the working copy) and
 * exposes the result three ways:
 * - `deltas`: the changed paths, known up front
 * - `stats()`: insertion/deletion counts per file, without building patch text
 * - `patch`: a lazy, forward-only stream of unified-diff lines
 *
 * Blob contents are read only when stats or the patch stream reach a file.
 */

import type {
  DiffOptions,
  DiffSide,
  DiffStats,
  FileDelta,
  FileStat,
  PatchLine,
  Snapshot,
  WhitespaceMode
} from '@shared/types'
import { diffLines, structuredPatch } from 'diff'
import type { LinesOptions, PatchOptions } from 'diff'
import type { ObjectStore } from '../adapters/store/interface'
import {
  BINARY_SNIFF_BYTES,
  DEFAULT_CONTEXT_LINES,
  DEFAULT_RENAME_THRESHOLD,
  MODE_GITLINK
} from '../shared/constants'

export type DiffResult = {
  deltas: FileDelta[]
  stats(): Promise<DiffStats>
  /** Single pass; call `diff` again to start over. */
  patch: AsyncGenerator<PatchLine>
}

type FileContents = {
  binary: boolean
  oldText: string
  newText: string
}

const decoder = new TextDecoder('utf-8')

export class DiffEmitter {
  private constructor() {}

  static async diff(
    store: ObjectStore,
    base: DiffSide,
    target: DiffSide,
    options: DiffOptions = {}
  ): Promise<DiffResult> {
    const includeUntracked = options.includeUntracked ?? true
    const baseSnapshot = await readSide(store, base, includeUntracked)
    const targetSnapshot = await readSide(store, target, includeUntracked)

    const deltas = await store.diffTrees(baseSnapshot, targetSnapshot, {
      pathspec: options.pathspec,
      detectRenames: options.detectRenames ?? true,
      detectCopies: options.detectCopies ?? true,
      renameThreshold: options.renameThreshold ?? DEFAULT_RENAME_THRESHOLD
    })

    const comparator = whitespaceComparator(options.whitespace ?? 'ignore-all')
    const context = options.contextLines ?? DEFAULT_CONTEXT_LINES
    const load = (delta: FileDelta) => loadContents(store, delta)

    return {
      deltas,
      stats: () => computeStats(deltas, load, comparator),
      patch: emitPatch(deltas, load, comparator, context)
    }
  }
}

async function readSide(
  store: ObjectStore,
  side: DiffSide,
  includeUntracked: boolean
): Promise<Snapshot> {
  switch (side.kind) {
    case 'tree':
      return store.readTree(side.oid)
    case 'index':
      return store.readIndex()
    case 'worktree': {
      const worktree = await store.readWorktree({ includeUntracked, includeIgnored: false })
      return { kind: 'worktree', entries: worktree.entries.filter((entry) => !entry.ignored) }
    }
  }
}

type Comparator = ((left: string, right: string) => boolean) | undefined

type ComparatorOption = { comparator?: (left: string, right: string) => boolean }

/**
 * Line equality for a whitespace mode; undefined keeps exact comparison.
 */
export function whitespaceComparator(mode: WhitespaceMode): Comparator {
  let normalize: (line: string) => string
  switch (mode) {
    case 'none':
      return undefined
    case 'ignore-all':
      normalize = (line) => line.replace(/\s+/g, '')
      break
    case 'ignore-change':
      normalize = (line) => line.replace(/\s+$/, '').replace(/[ \t]+/g, ' ')
      break
    case 'ignore-eol':
      normalize = (line) => line.replace(/\s+$/, '')
      break
  }
  return (left, right) => normalize(left) === normalize(right)
}

export function isBinary(bytes: Uint8Array): boolean {
  const end = Math.min(bytes.length, BINARY_SNIFF_BYTES)
  for (let i = 0; i < end; i++) {
    if (bytes[i] === 0) return true
  }
  return false
}

async function readContent(store: ObjectStore, oid: string, mode: number): Promise<Uint8Array> {
  if (oid === '') return new Uint8Array()
  if (mode === MODE_GITLINK) return new TextEncoder().encode(`Subproject commit ${oid}\n`)
  return store.readBlob(oid)
}

async function loadContents(store: ObjectStore, delta: FileDelta): Promise<FileContents> {
  const oldBytes = await readContent(store, delta.oldOid, delta.oldMode)
  const newBytes = await readContent(store, delta.newOid, delta.newMode)
  if (isBinary(oldBytes) || isBinary(newBytes)) {
    return { binary: true, oldText: '', newText: '' }
  }
  return { binary: false, oldText: decoder.decode(oldBytes), newText: decoder.decode(newBytes) }
}

async function computeStats(
  deltas: FileDelta[],
  load: (delta: FileDelta) => Promise<FileContents>,
  comparator: Comparator
): Promise<DiffStats> {
  const files: FileStat[] = []
  for (const delta of deltas) {
    const contents = await load(delta)
    let insertions = 0
    let deletions = 0

    if (!contents.binary && delta.oldOid !== delta.newOid) {
      const lineOptions: LinesOptions & ComparatorOption = comparator ? { comparator } : {}
      for (const change of diffLines(contents.oldText, contents.newText, lineOptions)) {
        if (change.added) insertions += change.count ?? 0
        else if (change.removed) deletions += change.count ?? 0
      }
    }

    files.push({
      path: delta.path,
      ...(delta.oldPath !== undefined ? { oldPath: delta.oldPath } : {}),
      status: delta.status,
      insertions,
      deletions,
      binary: contents.binary
    })
  }

  return {
    insertions: files.reduce((sum, file) => sum + file.insertions, 0),
    deletions: files.reduce((sum, file) => sum + file.deletions, 0),
    filesChanged: files.length,
    files
  }
}

async function* emitPatch(
  deltas: FileDelta[],
  load: (delta: FileDelta) => Promise<FileContents>,
  comparator: Comparator,
  context: number
): AsyncGenerator<PatchLine> {
  for (const delta of deltas) {
    const path = delta.path
    for (const content of fileHeader(delta)) {
      yield { origin: 'F', content, path }
    }

    if (delta.oldOid === delta.newOid) continue

    const contents = await load(delta)
    if (contents.binary) {
      const content = `Binary files ${oldLabel(delta)} and ${newLabel(delta)} differ`
      yield { origin: 'F', content, path }
      continue
    }

    const patchOptions: PatchOptions & ComparatorOption = comparator
      ? { context, comparator }
      : { context }
    const patch = structuredPatch(
      oldLabel(delta),
      newLabel(delta),
      contents.oldText,
      contents.newText,
      undefined,
      undefined,
      patchOptions
    )
    if (patch.hunks.length === 0) continue

    yield { origin: 'F', content: `--- ${oldLabel(delta)}`, path }
    yield { origin: 'F', content: `+++ ${newLabel(delta)}`, path }

    for (const hunk of patch.hunks) {
      yield {
        origin: 'H',
        content: `@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`,
        path
      }
      for (const line of hunk.lines) {
        const origin = line[0]
        if (origin === ' ' || origin === '+' || origin === '-') {
          yield { origin, content: line.slice(1), path }
        }
      }
    }
  }
}

function oldLabel(delta: FileDelta): string {
  return delta.status === 'added' ? '/dev/null' : `a/${delta.oldPath ?? delta.path}`
}

function newLabel(delta: FileDelta): string {
  return delta.status === 'deleted' ? '/dev/null' : `b/${delta.path}`
}

function fileHeader(delta: FileDelta): string[] {
  const lines = [`diff --git a/${delta.oldPath ?? delta.path} b/${delta.path}`]
  const mode = (value: number) => value.toString(8)

  switch (delta.status) {
    case 'added':
      lines.push(`new file mode ${mode(delta.newMode)}`)
      break
    case 'deleted':
      lines.push(`deleted file mode ${mode(delta.oldMode)}`)
      break
    case 'renamed':
    case 'copied': {
      const verb = delta.status === 'renamed' ? 'rename' : 'copy'
      lines.push(`similarity index ${delta.similarity ?? 100}%`)
      lines.push(`${verb} from ${delta.oldPath ?? delta.path}`)
      lines.push(`${verb} to ${delta.path}`)
      break
    }
    case 'modified':
    case 'typechange':
      break
  }

  if (delta.status !== 'added' && delta.status !== 'deleted' && delta.oldMode !== delta.newMode) {
    lines.push(`old mode ${mode(delta.oldMode)}`, `new mode ${mode(delta.newMode)}`)
  }
  return lines
}
