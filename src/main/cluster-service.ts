import { v5 as uuidv5 } from 'uuid'
import { ID_NAMESPACE } from '../shared/constants'
import { ClusterKind, DuplicateCluster, FileRecord } from '../shared/types'
import { UnionFind } from '../shared/union-find'
import { logger } from './logger'
import { bandKeys, hammingDistance } from './perceptual-hash'

const log = logger.child('clusters')

export interface ClusterOptions {
  // Max Hamming distance for two perceptual digests to count as near duplicates
  similarityThreshold: number
}

export interface ClusterResult {
  // Ordered by first member path
  clusters: DuplicateCluster[]
  byRecordId: Map<string, DuplicateCluster>
}

const byPath = (a: FileRecord, b: FileRecord): number => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)

/**
 * Oldest first, then shortest path, then path order. Negative means `a`
 * is the better representative.
 */
export function compareRepresentative(a: FileRecord, b: FileRecord): number {
  if (a.mtimeMs !== b.mtimeMs) return a.mtimeMs - b.mtimeMs
  if (a.path.length !== b.path.length) return a.path.length - b.path.length
  return byPath(a, b)
}

export function pickRepresentative(members: FileRecord[]): FileRecord {
  let best = members[0]
  for (const member of members.slice(1)) {
    if (compareRepresentative(member, best) < 0) best = member
  }
  return best
}

export function clusterId(kind: ClusterKind, members: FileRecord[]): string {
  const paths = members.map((m) => m.path).sort()
  return uuidv5(`${kind}\n${paths.join('\n')}`, ID_NAMESPACE)
}

function makeCluster(kind: ClusterKind, members: FileRecord[]): DuplicateCluster {
  const sorted = [...members].sort(byPath)
  return {
    id: clusterId(kind, sorted),
    kind,
    members: sorted,
    representativeId: pickRepresentative(sorted).id
  }
}

export class ClusterService {
  constructor(private readonly options: ClusterOptions) {}

  build(records: FileRecord[]): ClusterResult {
    const exact = this.buildExactClusters(records)
    const taken = new Set<string>()
    for (const cluster of exact) {
      for (const member of cluster.members) taken.add(member.id)
    }

    const near = this.buildNearClusters(records.filter((r) => !taken.has(r.id)))
    const clusters = [...exact, ...near].sort((a, b) => byPath(a.members[0], b.members[0]))

    const byRecordId = new Map<string, DuplicateCluster>()
    for (const cluster of clusters) {
      for (const member of cluster.members) byRecordId.set(member.id, cluster)
    }

    log.info('Clusters built', { exact: exact.length, near: near.length })
    return { clusters, byRecordId }
  }

  /**
   * Hash-bucket grouping on the exact digest. Records carrying an error
   * marker share the sentinel digest and are never grouped.
   */
  buildExactClusters(records: FileRecord[]): DuplicateCluster[] {
    const hashMap = new Map<string, FileRecord[]>()
    for (const record of records) {
      if (record.error) continue
      const list = hashMap.get(record.digest) ?? []
      list.push(record)
      hashMap.set(record.digest, list)
    }

    const clusters: DuplicateCluster[] = []
    for (const list of hashMap.values()) {
      if (list.length > 1) clusters.push(makeCluster('EXACT', list))
    }
    return clusters
  }

  /**
   * Union-find over perceptual digests. Candidate pairs come from band
   * buckets: with threshold T the digest is cut into T + 1 bands, so any
   * pair within T bits matches exactly on at least one band.
   */
  buildNearClusters(records: FileRecord[]): DuplicateCluster[] {
    const candidates = records
      .filter((r): r is FileRecord & { perceptualDigest: string } => !r.error && r.perceptualDigest !== undefined)
      .sort(byPath)
    if (candidates.length < 2) return []

    const threshold = this.options.similarityThreshold
    const buckets = new Map<string, number[]>()
    candidates.forEach((record, index) => {
      for (const key of bandKeys(record.perceptualDigest, threshold + 1)) {
        const list = buckets.get(key) ?? []
        list.push(index)
        buckets.set(key, list)
      }
    })

    const sets = new UnionFind(candidates.length)
    const compared = new Set<string>()
    let comparisons = 0
    for (const indices of buckets.values()) {
      for (let i = 0; i < indices.length; i++) {
        for (let j = i + 1; j < indices.length; j++) {
          const a = indices[i]
          const b = indices[j]
          if (sets.connected(a, b)) continue
          const pairKey = `${a}:${b}`
          if (compared.has(pairKey)) continue
          compared.add(pairKey)
          comparisons++
          const distance = hammingDistance(candidates[a].perceptualDigest, candidates[b].perceptualDigest)
          if (distance <= threshold) sets.union(a, b)
        }
      }
    }

    log.debug('Near-duplicate comparisons', { candidates: candidates.length, comparisons })

    const clusters: DuplicateCluster[] = []
    for (const indices of sets.groups().values()) {
      if (indices.length > 1) {
        clusters.push(makeCluster('NEAR', indices.map((i) => candidates[i])))
      }
    }
    return clusters
  }
}
