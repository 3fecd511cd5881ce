import type { Snapshot, SnapshotEntry } from '@shared/types'
import { describe, expect, it } from 'vitest'
import { MemoryObjectStore } from '../../adapters/store/MemoryObjectStore'
import { MODE_EXECUTABLE, MODE_FILE, MODE_SYMLINK } from '../../shared/constants'
import { diffSnapshots, matchesPathspec, similarityScore } from '../TreeDiff'

const encode = (value: string) => new TextEncoder().encode(value)

function setup() {
  const store = new MemoryObjectStore()
  const entry = (path: string, content: string, mode = MODE_FILE): SnapshotEntry => ({
    path,
    oid: store.writeBlob(content),
    mode
  })
  const tree = (...entries: SnapshotEntry[]): Snapshot => ({ kind: 'tree', entries })
  const readBlob = (oid: string) => store.readBlob(oid)
  return { entry, tree, readBlob }
}

describe('similarityScore', () => {
  it('scores shared lines against the larger blob', () => {
    const a = encode('one\ntwo\nthree\nfour\n')
    const b = encode('one\ntwo\nthree\nFOUR\n')

    expect(similarityScore(a, b)).toBe(73)
  })

  it('scores identical content 100 and disjoint content 0', () => {
    expect(similarityScore(encode('same\n'), encode('same\n'))).toBe(100)
    expect(similarityScore(encode('left\n'), encode('right\n'))).toBe(0)
  })

  it('scores two empty blobs 0', () => {
    expect(similarityScore(new Uint8Array(), new Uint8Array())).toBe(0)
  })
})

describe('matchesPathspec', () => {
  it('matches a literal path or a directory prefix', () => {
    expect(matchesPathspec('src/a.ts', ['src'])).toBe(true)
    expect(matchesPathspec('src/b/c.ts', ['./src/'])).toBe(true)
    expect(matchesPathspec('srcx/d.ts', ['src'])).toBe(false)
    expect(matchesPathspec('README.md', ['README.md'])).toBe(true)
    expect(matchesPathspec('anything', undefined)).toBe(true)
  })
})

describe('diffSnapshots', () => {
  it('classifies additions, deletions and modifications in path order', async () => {
    const { entry, tree, readBlob } = setup()
    const base = tree(entry('a.txt', 'one'), entry('b.txt', 'two'), entry('c.txt', 'three'))
    const target = tree(entry('a.txt', 'one'), entry('b.txt', 'TWO'), entry('d.txt', 'four'))

    const deltas = await diffSnapshots(base, target, { detectRenames: true }, readBlob)

    expect(deltas.map((d) => [d.path, d.status])).toEqual([
      ['b.txt', 'modified'],
      ['c.txt', 'deleted'],
      ['d.txt', 'added']
    ])
  })

  it('pairs a similar deletion and addition into a rename', async () => {
    const { entry, tree, readBlob } = setup()
    const base = tree(entry('old.txt', 'line1\nline2\nline3\nline4\n'))
    const target = tree(entry('new.txt', 'line1\nline2\nline3\nchanged\n'))

    const deltas = await diffSnapshots(base, target, { detectRenames: true }, readBlob)

    expect(deltas).toHaveLength(1)
    expect(deltas[0]).toMatchObject({
      path: 'new.txt',
      oldPath: 'old.txt',
      status: 'renamed',
      similarity: 69
    })
  })

  it('leaves pairs below the threshold apart', async () => {
    const { entry, tree, readBlob } = setup()
    const base = tree(entry('old.txt', 'line1\nline2\nline3\nline4\n'))
    const target = tree(entry('new.txt', 'line1\nline2\nline3\nchanged\n'))

    const deltas = await diffSnapshots(
      base,
      target,
      { detectRenames: true, renameThreshold: 80 },
      readBlob
    )

    expect(deltas.map((d) => [d.path, d.status])).toEqual([
      ['new.txt', 'added'],
      ['old.txt', 'deleted']
    ])
  })

  it('never pairs empty files', async () => {
    const { entry, tree, readBlob } = setup()
    const deltas = await diffSnapshots(
      tree(entry('empty.txt', '')),
      tree(entry('moved.txt', '')),
      { detectRenames: true },
      readBlob
    )

    expect(deltas.map((d) => d.status)).toEqual(['deleted', 'added'])
  })

  it('reports a file replaced by a symlink as a typechange', async () => {
    const { entry, tree, readBlob } = setup()
    const deltas = await diffSnapshots(
      tree(entry('link', 'target')),
      tree(entry('link', 'target', MODE_SYMLINK)),
      {},
      readBlob
    )

    expect(deltas.map((d) => [d.path, d.status])).toEqual([['link', 'typechange']])
  })

  it('reports an executable bit change as a modification', async () => {
    const { entry, tree, readBlob } = setup()
    const deltas = await diffSnapshots(
      tree(entry('run.sh', 'echo hi\n')),
      tree(entry('run.sh', 'echo hi\n', MODE_EXECUTABLE)),
      {},
      readBlob
    )

    expect(deltas[0]).toMatchObject({
      status: 'modified',
      oldMode: MODE_FILE,
      newMode: MODE_EXECUTABLE
    })
  })

  it('limits the comparison to the pathspec', async () => {
    const { entry, tree, readBlob } = setup()
    const base = tree()
    const target = tree(
      entry('README.md', 'readme'),
      entry('src/a.ts', 'a'),
      entry('src/b/c.ts', 'c'),
      entry('srcx/d.ts', 'd')
    )

    const deltas = await diffSnapshots(base, target, { pathspec: ['src'] }, readBlob)

    expect(deltas.map((d) => d.path)).toEqual(['src/a.ts', 'src/b/c.ts'])
  })

  it('detects a copy of a modified file', async () => {
    const { entry, tree, readBlob } = setup()
    const base = tree(entry('orig.txt', 'alpha\nbeta\ngamma\n'))
    const target = tree(
      entry('copy.txt', 'alpha\nbeta\ngamma\n'),
      entry('orig.txt', 'alpha\nbeta\ngamma\ndelta\n')
    )

    const deltas = await diffSnapshots(
      base,
      target,
      { detectRenames: true, detectCopies: true },
      readBlob
    )

    expect(deltas.map((d) => [d.path, d.status, d.oldPath, d.similarity])).toEqual([
      ['copy.txt', 'copied', 'orig.txt', 100],
      ['orig.txt', 'modified', undefined, undefined]
    ])
  })
})
