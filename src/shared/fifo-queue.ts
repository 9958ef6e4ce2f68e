export class FifoQueue<T> {
  private items: T[] = []
  private head = 0

  enqueue(item: T): void {
    this.items.push(item)
  }

  // One push per item: spreading a large batch into push() overflows the stack
  enqueueAll(items: Iterable<T>): void {
    for (const item of items) this.items.push(item)
  }

  dequeue(): T | undefined {
    if (this.head >= this.items.length) return undefined
    const item = this.items[this.head]
    this.head++
    // Compact once the consumed prefix dominates
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head)
      this.head = 0
    }
    return item
  }

  get size(): number {
    return this.items.length - this.head
  }

  get isEmpty(): boolean {
    return this.size === 0
  }

  toArray(): T[] {
    return this.items.slice(this.head)
  }
}
