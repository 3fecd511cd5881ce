import type { PatchLine } from '@shared/types'
import { describe, expect, it } from 'vitest'
import type { FileMap } from '../../adapters/store/MemoryObjectStore'
import { MemoryObjectStore } from '../../adapters/store/MemoryObjectStore'
import { MODE_EXECUTABLE } from '../../shared/constants'
import { DiffEmitter, isBinary, whitespaceComparator } from '../DiffEmitter'

const BASE = { kind: 'tree', oid: 'c1' } as const
const TARGET = { kind: 'tree', oid: 'c2' } as const

function createStore(before: FileMap, after: FileMap): MemoryObjectStore {
  const store = new MemoryObjectStore()
  store.addCommit({ oid: 'c1', files: before })
  store.addCommit({ oid: 'c2', parents: ['c1'], files: after })
  return store
}

async function collect(patch: AsyncIterable<PatchLine>): Promise<string[]> {
  const lines: string[] = []
  for await (const line of patch) {
    lines.push(`${line.origin}${line.content}`)
  }
  return lines
}

describe('DiffEmitter.diff', () => {
  it('emits a unified patch for a modified file', async () => {
    const store = createStore({ f: 'a\nb\nc\n' }, { f: 'a\nB\nc\n' })

    const result = await DiffEmitter.diff(store, BASE, TARGET)

    expect(result.deltas.map((delta) => [delta.path, delta.status])).toEqual([['f', 'modified']])
    expect(await collect(result.patch)).toEqual([
      'Fdiff --git a/f b/f',
      'F--- a/f',
      'F+++ b/f',
      'H@@ -1,3 +1,3 @@',
      ' a',
      '-b',
      '+B',
      ' c'
    ])
  })

  it('counts insertions and deletions without the patch stream', async () => {
    const store = createStore(
      { f: 'a\nb\nc\n', gone: 'x\ny\n' },
      { f: 'a\nB\nc\nd\n', added: 'one\n' }
    )

    const stats = await (await DiffEmitter.diff(store, BASE, TARGET)).stats()

    expect(stats).toEqual({
      insertions: 3,
      deletions: 3,
      filesChanged: 3,
      files: [
        { path: 'added', status: 'added', insertions: 1, deletions: 0, binary: false },
        { path: 'f', status: 'modified', insertions: 2, deletions: 1, binary: false },
        { path: 'gone', status: 'deleted', insertions: 0, deletions: 2, binary: false }
      ]
    })
  })

  it('gives the same deltas and patch on repeated calls', async () => {
    const store = createStore({ f: 'a\nb\n' }, { f: 'a\nc\n', g: 'new\n' })

    const first = await DiffEmitter.diff(store, BASE, TARGET)
    const second = await DiffEmitter.diff(store, BASE, TARGET)

    expect(second.deltas).toEqual(first.deltas)
    expect(await collect(second.patch)).toEqual(await collect(first.patch))
  })

  it('yields nothing on a second pass over the same patch', async () => {
    const store = createStore({ f: 'a\n' }, { f: 'b\n' })
    const result = await DiffEmitter.diff(store, BASE, TARGET)

    expect((await collect(result.patch)).length).toBeGreaterThan(0)
    expect(await collect(result.patch)).toEqual([])
  })

  it('marks binary files instead of diffing them', async () => {
    const store = createStore(
      { img: { content: new Uint8Array([0x89, 0x50, 0x00, 0x01]) } },
      { img: { content: new Uint8Array([0x89, 0x50, 0x00, 0x02]) } }
    )

    const result = await DiffEmitter.diff(store, BASE, TARGET)

    expect(await collect(result.patch)).toEqual([
      'Fdiff --git a/img b/img',
      'FBinary files a/img and b/img differ'
    ])
    const stats = await result.stats()
    expect(stats.files[0]).toMatchObject({ binary: true, insertions: 0, deletions: 0 })
  })

  it('ignores whitespace-only edits by default', async () => {
    const store = createStore({ f: 'a\nb\n' }, { f: 'a\n  b\n' })

    const result = await DiffEmitter.diff(store, BASE, TARGET)

    expect(await collect(result.patch)).toEqual(['Fdiff --git a/f b/f'])
    expect((await result.stats()).insertions).toBe(0)
  })

  it('shows whitespace edits when whitespace is compared exactly', async () => {
    const store = createStore({ f: 'a\nb\n' }, { f: 'a\n  b\n' })

    const result = await DiffEmitter.diff(store, BASE, TARGET, { whitespace: 'none' })

    expect(await collect(result.patch)).toEqual([
      'Fdiff --git a/f b/f',
      'F--- a/f',
      'F+++ b/f',
      'H@@ -1,2 +1,2 @@',
      ' a',
      '-b',
      '+  b'
    ])
  })

  it('emits only headers for a pure rename', async () => {
    const content = 'one\ntwo\nthree\n'
    const store = createStore({ 'old.txt': content }, { 'new.txt': content })

    const result = await DiffEmitter.diff(store, BASE, TARGET)

    expect(await collect(result.patch)).toEqual([
      'Fdiff --git a/old.txt b/new.txt',
      'Fsimilarity index 100%',
      'Frename from old.txt',
      'Frename to new.txt'
    ])
  })

  it('reports a mode change on unchanged content', async () => {
    const store = createStore(
      { 'run.sh': 'echo hi\n' },
      { 'run.sh': { content: 'echo hi\n', mode: MODE_EXECUTABLE } }
    )

    const result = await DiffEmitter.diff(store, BASE, TARGET)

    expect(await collect(result.patch)).toEqual([
      'Fdiff --git a/run.sh b/run.sh',
      'Fold mode 100644',
      'Fnew mode 100755'
    ])
  })

  it('limits the diff to a pathspec', async () => {
    const store = createStore(
      { 'src/a.ts': 'a\n', 'docs/a.md': 'a\n' },
      { 'src/a.ts': 'b\n', 'docs/a.md': 'b\n' }
    )

    const result = await DiffEmitter.diff(store, BASE, TARGET, { pathspec: ['docs'] })

    expect(result.deltas.map((delta) => delta.path)).toEqual(['docs/a.md'])
  })

  it('compares a tree against the index', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'c1', files: { f: 'a\n' } })
    store.setIndex({ f: 'a\n', staged: 'new\n' })

    const result = await DiffEmitter.diff(store, BASE, { kind: 'index' })

    expect(result.deltas.map((delta) => [delta.path, delta.status])).toEqual([
      ['staged', 'added']
    ])
  })
})

describe('whitespaceComparator', () => {
  it('returns no comparator for exact comparison', () => {
    expect(whitespaceComparator('none')).toBeUndefined()
  })

  it('normalizes according to the mode', () => {
    const ignoreAll = whitespaceComparator('ignore-all')
    const ignoreChange = whitespaceComparator('ignore-change')
    const ignoreEol = whitespaceComparator('ignore-eol')

    expect(ignoreAll?.('a b\n', 'ab\n')).toBe(true)
    expect(ignoreChange?.('a  b\n', 'a b\n')).toBe(true)
    expect(ignoreChange?.('a b\n', 'ab\n')).toBe(false)
    expect(ignoreEol?.('a b  \n', 'a b\n')).toBe(true)
    expect(ignoreEol?.('a  b\n', 'a b\n')).toBe(false)
  })
})

describe('isBinary', () => {
  it('detects a NUL byte', () => {
    expect(isBinary(new Uint8Array([0x41, 0x00]))).toBe(true)
    expect(isBinary(new TextEncoder().encode('plain text\n'))).toBe(false)
  })
})
