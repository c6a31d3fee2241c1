export type HeapEntry<T> = {
  readonly value: T
  /** Epoch milliseconds the entry is due at */
  readonly at: number
  readonly seq: number
}

/**
 * Binary min-heap ordered by due time. Entries due at the same instant come
 * out in insertion order.
 */
export class ScheduleHeap<T> {
  private readonly items: HeapEntry<T>[] = []
  private seq = 0

  get size(): number {
    return this.items.length
  }

  push(value: T, at: number): void {
    this.items.push({ value, at, seq: this.seq++ })
    this.siftUp(this.items.length - 1)
  }

  peek(): HeapEntry<T> | undefined {
    return this.items[0]
  }

  pop(): HeapEntry<T> | undefined {
    const top = this.items[0]
    const last = this.items.pop()
    if (top === undefined || last === undefined) return undefined
    if (this.items.length > 0) {
      this.items[0] = last
      this.siftDown(0)
    }
    return top
  }

  /** Entries in due order, without touching the heap */
  toSortedArray(): HeapEntry<T>[] {
    return [...this.items].sort((a, b) => this.compare(a, b))
  }

  private compare(a: HeapEntry<T>, b: HeapEntry<T>): number {
    return a.at - b.at || a.seq - b.seq
  }

  private siftUp(index: number): void {
    let child = index
    while (child > 0) {
      const parent = (child - 1) >> 1
      if (this.compare(this.items[child], this.items[parent]) >= 0) break
      this.swap(child, parent)
      child = parent
    }
  }

  private siftDown(index: number): void {
    const length = this.items.length
    let parent = index
    for (;;) {
      const left = parent * 2 + 1
      const right = left + 1
      let smallest = parent
      if (left < length && this.compare(this.items[left], this.items[smallest]) < 0) smallest = left
      if (right < length && this.compare(this.items[right], this.items[smallest]) < 0) smallest = right
      if (smallest === parent) return
      this.swap(parent, smallest)
      parent = smallest
    }
  }

  private swap(i: number, j: number): void {
    const tmp = this.items[i]
    this.items[i] = this.items[j]
    this.items[j] = tmp
  }
}
