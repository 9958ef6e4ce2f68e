import { describe, expect, it } from 'vitest'
import { UnionFind } from './union-find'

describe('UnionFind', () => {
  it('merges sets transitively', () => {
    const sets = new UnionFind(5)
    expect(sets.union(0, 1)).toBe(true)
    expect(sets.union(2, 3)).toBe(true)
    expect(sets.connected(0, 2)).toBe(false)

    expect(sets.union(1, 3)).toBe(true)
    expect(sets.connected(0, 2)).toBe(true)
    expect(sets.union(0, 3)).toBe(false)
  })

  it('groups members in ascending order', () => {
    const sets = new UnionFind(6)
    sets.union(4, 1)
    sets.union(5, 2)
    sets.union(1, 0)

    const groups = [...sets.groups().values()].sort((a, b) => a[0] - b[0])
    expect(groups).toEqual([[0, 1, 4], [2, 5], [3]])
  })
})
