import { describe, expect, it } from 'vitest'
import { MemoryObjectStore } from '../../adapters/store/MemoryObjectStore'
import { NotFoundError } from '../../shared/errors'
import { findMergeBases, pickMergeBase, walkRevisions } from '../RevisionWalk'

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = []
  for await (const oid of iterable) out.push(oid)
  return out
}

function loaderFor(store: MemoryObjectStore) {
  return (oid: string) => store.readCommit(oid)
}

function totalReads(store: MemoryObjectStore): number {
  return [...store.commitReads.values()].reduce((sum, count) => sum + count, 0)
}

/**
 * Linear history h0 - h1 - ... - h<length-1>.
 */
function createLinearStore(length: number): MemoryObjectStore {
  const store = new MemoryObjectStore()
  store.addCommit({ oid: 'h0' })
  for (let i = 1; i < length; i++) {
    store.addCommit({ oid: `h${i}`, parents: [`h${i - 1}`] })
  }
  return store
}

describe('walkRevisions', () => {
  it('emits a linear history newest first', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'a' })
    store.addCommit({ oid: 'b', parents: ['a'] })
    store.addCommit({ oid: 'c', parents: ['b'] })

    expect(await collect(walkRevisions(loaderFor(store), 'c', []))).toEqual(['c', 'b', 'a'])
  })

  it('excludes everything reachable from the pruned commits', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'a' })
    store.addCommit({ oid: 'b', parents: ['a'] })
    store.addCommit({ oid: 'c', parents: ['b'] })

    expect(await collect(walkRevisions(loaderFor(store), 'c', ['a']))).toEqual(['c', 'b'])
    expect(await collect(walkRevisions(loaderFor(store), 'c', ['c']))).toEqual([])
  })

  it('breaks committer time ties by oid across merge parents', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'a' })
    store.addCommit({ oid: 'c', parents: ['a'] })
    store.addCommit({ oid: 'b', parents: ['a'] })
    store.addCommit({ oid: 'm', parents: ['c', 'b'] })

    expect(await collect(walkRevisions(loaderFor(store), 'm', []))).toEqual(['m', 'b', 'c', 'a'])
  })

  it('never emits a parent before its child, even with skewed clocks', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'a', timestampMs: 5000 })
    store.addCommit({ oid: 'b', parents: ['a'], timestampMs: 1000 })

    expect(await collect(walkRevisions(loaderFor(store), 'b', []))).toEqual(['b', 'a'])
  })

  it('reads each commit of a diamond once', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'a' })
    store.addCommit({ oid: 'b', parents: ['a'] })
    store.addCommit({ oid: 'c', parents: ['a'] })
    store.addCommit({ oid: 'd', parents: ['b', 'c'] })

    const walked = await collect(store.walk('d', []))

    expect(walked).toEqual(['d', 'b', 'c', 'a'])
    expect([...store.commitReads.values()]).toEqual([1, 1, 1, 1])
  })

  it('hides commits already walked when an older-clocked hidden commit reaches them', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'a', timestampMs: 1000 })
    store.addCommit({ oid: 'b', parents: ['a'], timestampMs: 2000 })
    store.addCommit({ oid: 'h', parents: ['b'], timestampMs: 500 })
    store.addCommit({ oid: 'c', parents: ['b'], timestampMs: 3000 })
    store.addCommit({ oid: 't', parents: ['c'], timestampMs: 4000 })

    expect(await collect(walkRevisions(loaderFor(store), 't', ['h']))).toEqual(['t', 'c'])
  })

  it('stops reading once only hidden history is left', async () => {
    const store = createLinearStore(2000)
    store.addCommit({ oid: 'x', parents: ['h1999'] })
    store.addCommit({ oid: 'y', parents: ['h1999'] })

    expect(await collect(store.walk('x', ['y']))).toEqual(['x'])
    expect(totalReads(store)).toBeLessThan(20)
  })

  it('reads an unpruned history only as far as the caller pulls it', async () => {
    const store = createLinearStore(1000)
    const walked: string[] = []

    for await (const oid of store.walk('h999', [])) {
      walked.push(oid)
      if (walked.length === 3) break
    }

    expect(walked).toEqual(['h999', 'h998', 'h997'])
    expect(totalReads(store)).toBe(3)
  })

  it('propagates a missing parent as NotFoundError', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'b', parents: ['gone'] })

    await expect(collect(walkRevisions(loaderFor(store), 'b', []))).rejects.toBeInstanceOf(
      NotFoundError
    )
  })
})

describe('findMergeBases', () => {
  it('returns both best ancestors of a criss-cross merge', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'a' })
    store.addCommit({ oid: 'b', parents: ['a'] })
    store.addCommit({ oid: 'c', parents: ['a'] })
    store.addCommit({ oid: 'd', parents: ['b', 'c'] })
    store.addCommit({ oid: 'e', parents: ['c', 'b'] })

    const bases = await findMergeBases(loaderFor(store), 'd', 'e')

    expect(bases.map((commit) => commit.oid)).toEqual(['b', 'c'])
    expect(pickMergeBase(bases)).toBe('b')
    expect(await store.mergeBase('d', 'e')).toBe('b')
  })

  it('prefers the newest candidate over the lowest oid', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'a' })
    store.addCommit({ oid: 'b', parents: ['a'], timestampMs: 2000 })
    store.addCommit({ oid: 'c', parents: ['a'], timestampMs: 9000 })
    store.addCommit({ oid: 'd', parents: ['b', 'c'] })
    store.addCommit({ oid: 'e', parents: ['c', 'b'] })

    expect(await store.mergeBase('d', 'e')).toBe('c')
  })

  it('returns the older tip when one tip descends from the other', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'a' })
    store.addCommit({ oid: 'b', parents: ['a'] })

    expect(await store.mergeBase('a', 'b')).toBe('a')
  })

  it('stops painting below the first common commit', async () => {
    const store = createLinearStore(2000)
    store.addCommit({ oid: 'x', parents: ['h1999'] })
    store.addCommit({ oid: 'y', parents: ['h1999'] })

    expect(await store.mergeBase('x', 'y')).toBe('h1999')
    expect(totalReads(store)).toBe(4)
  })

  it('keeps only the best base when a parent is newer than its child', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'a', timestampMs: 1000 })
    store.addCommit({ oid: 'b', parents: ['a'], timestampMs: 500 })
    store.addCommit({ oid: 'l', parents: ['b'], timestampMs: 3000 })
    store.addCommit({ oid: 'r', parents: ['a', 'b'], timestampMs: 3000 })

    const bases = await findMergeBases(loaderFor(store), 'l', 'r')

    expect(bases.map((commit) => commit.oid)).toEqual(['b'])
  })

  it('finds nothing for unrelated roots', async () => {
    const store = new MemoryObjectStore()
    store.addCommit({ oid: 'x' })
    store.addCommit({ oid: 'y' })

    expect(await findMergeBases(loaderFor(store), 'x', 'y')).toEqual([])
    expect(await store.mergeBase('x', 'y')).toBeNull()
  })
})
