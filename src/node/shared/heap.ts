/**
 * Binary heap ordered by a comparator: `cmp(a, b) < 0` means `a` comes out first.
 */
export type Comparator<T> = (a: T, b: T) => number

export class BinaryHeap<T> {
  private items: T[] = []

  constructor(private readonly cmp: Comparator<T>) {}

  get size(): number {
    return this.items.length
  }

  push(value: T): void {
    this.items.push(value)
    this.siftUp(this.items.length - 1)
  }

  /** True when any queued item matches, in no particular order. */
  some(predicate: (value: T) => boolean): boolean {
    return this.items.some(predicate)
  }

  pop(): T | undefined {
    const top = this.items[0]
    const last = this.items.pop()
    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last
      this.siftDown(0)
    }
    return top
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1
      if (this.cmp(this.items[i], this.items[parent]) >= 0) break
      this.swap(i, parent)
      i = parent
    }
  }

  private siftDown(i: number): void {
    const n = this.items.length
    for (;;) {
      const left = i * 2 + 1
      const right = left + 1
      let best = i
      if (left < n && this.cmp(this.items[left], this.items[best]) < 0) best = left
      if (right < n && this.cmp(this.items[right], this.items[best]) < 0) best = right
      if (best === i) return
      this.swap(i, best)
      i = best
    }
  }

  private swap(i: number, j: number): void {
    const tmp = this.items[i]
    this.items[i] = this.items[j]
    this.items[j] = tmp
  }
}
