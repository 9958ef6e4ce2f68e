import { Action, ClusterKind, DuplicateCluster, FileRecord, Score } from '../shared/types'
import type { SearchConfig } from './config'

export const ACTIONS: readonly Action[] = ['KEEP', 'ARCHIVE', 'DELETE']

export interface MemberProfile {
  record: FileRecord
  // max(0, score.total)
  risk: number
  representative: boolean
  // DELETE is ever legal for this member
  deletable: boolean
}

/**
 * Step costs for assigning an action to one cluster member. Scores feed in
 * only through `risk`; the breakdown is never consulted.
 */
export class CostModel {
  constructor(private readonly config: SearchConfig) {}

  isDeletable(kind: ClusterKind, representative: boolean, risk: number): boolean {
    if (kind === 'EXACT' && !representative) return true
    return risk > this.config.deletionConfidenceThreshold
  }

  profile(cluster: DuplicateCluster, scores: ReadonlyMap<string, Score>): MemberProfile[] {
    return cluster.members.map((record) => {
      const risk = Math.max(0, scores.get(record.id)?.total ?? 0)
      const representative = record.id === cluster.representativeId
      return { record, risk, representative, deletable: this.isDeletable(cluster.kind, representative, risk) }
    })
  }

  keepCost(member: MemberProfile, hasKeep: boolean): number {
    return member.representative && !hasKeep ? 0 : this.config.redundancyPenalty
  }

  archiveCost(member: MemberProfile): number {
    return this.config.archivalCost - this.config.archiveBenefitRate * member.risk
  }

  deleteCost(member: MemberProfile): number {
    return this.config.deletionCost - this.config.deleteBenefitRate * member.risk
  }

  stepCost(member: MemberProfile, action: Action, hasKeep: boolean): number {
    switch (action) {
      case 'KEEP':
        return this.keepCost(member, hasKeep)
      case 'ARCHIVE':
        return this.archiveCost(member)
      case 'DELETE':
        return this.deleteCost(member)
    }
  }

  /**
   * Cheapest cost for this member on its own, ignoring which copy is kept
   * first. Never above the cost of any legal step for it.
   */
  minStepCost(member: MemberProfile): number {
    const keep = member.representative ? 0 : this.config.redundancyPenalty
    let best = Math.min(keep, this.archiveCost(member))
    if (member.deletable) best = Math.min(best, this.deleteCost(member))
    return best
  }
}
