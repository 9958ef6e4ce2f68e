interface HeapNode<T> {
  priority: number
  seq: number
  value: T
}

/**
 * Binary min-heap keyed by a numeric priority. Equal priorities pop in
 * insertion order, which keeps best-first search deterministic.
 */
export class PriorityQueue<T> {
  private heap: HeapNode<T>[] = []
  private seq = 0

  push(value: T, priority: number): void {
    this.heap.push({ priority, seq: this.seq++, value })
    this.siftUp(this.heap.length - 1)
  }

  pop(): T | undefined {
    const top = this.heap[0]
    if (top === undefined) return undefined
    const last = this.heap.pop()
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last
      this.siftDown(0)
    }
    return top.value
  }

  get size(): number {
    return this.heap.length
  }

  get isEmpty(): boolean {
    return this.heap.length === 0
  }

  private less(a: HeapNode<T>, b: HeapNode<T>): boolean {
    if (a.priority !== b.priority) return a.priority < b.priority
    return a.seq < b.seq
  }

  private siftUp(index: number): void {
    let i = index
    while (i > 0) {
      const parent = (i - 1) >> 1
      if (!this.less(this.heap[i], this.heap[parent])) break
      this.swap(i, parent)
      i = parent
    }
  }

  private siftDown(index: number): void {
    let i = index
    const n = this.heap.length
    for (;;) {
      const left = 2 * i + 1
      const right = left + 1
      let smallest = i
      if (left < n && this.less(this.heap[left], this.heap[smallest])) smallest = left
      if (right < n && this.less(this.heap[right], this.heap[smallest])) smallest = right
      if (smallest === i) return
      this.swap(i, smallest)
      i = smallest
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a]
    this.heap[a] = this.heap[b]
    this.heap[b] = tmp
  }
}
