/**
 * Disjoint-set forest over dense indices 0..size-1 with path halving and
 * union by size.
 */
export class UnionFind {
  private readonly parent: number[]
  private readonly sizes: number[]

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i)
    this.sizes = new Array<number>(size).fill(1)
  }

  find(x: number): number {
    let node = x
    while (this.parent[node] !== node) {
      this.parent[node] = this.parent[this.parent[node]]
      node = this.parent[node]
    }
    return node
  }

  union(a: number, b: number): boolean {
    let rootA = this.find(a)
    let rootB = this.find(b)
    if (rootA === rootB) return false
    if (this.sizes[rootA] < this.sizes[rootB]) {
      const tmp = rootA
      rootA = rootB
      rootB = tmp
    }
    this.parent[rootB] = rootA
    this.sizes[rootA] += this.sizes[rootB]
    return true
  }

  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b)
  }

  /** Components keyed by root, members in ascending index order. */
  groups(): Map<number, number[]> {
    const out = new Map<number, number[]>()
    for (let i = 0; i < this.parent.length; i++) {
      const root = this.find(i)
      const list = out.get(root) ?? []
      list.push(i)
      out.set(root, list)
    }
    return out
  }
}
