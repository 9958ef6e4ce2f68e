import { PriorityQueue } from '../shared/priority-queue'
import { Action, DuplicateCluster, Score } from '../shared/types'
import type { SearchConfig } from './config'
import { ACTIONS, CostModel, MemberProfile } from './cost-model'
import { SearchBudgetError, SearchInvariantError } from './errors'
import { logger } from './logger'

const log = logger.child('search')

export interface SearchState {
  // members[0..depth) are assigned
  depth: number
  actions: Action[]
  g: number
  hasKeep: boolean
}

export interface SearchOutcome {
  clusterId: string
  // record id -> action
  assignment: Map<string, Action>
  // aligned with the cluster's member order
  actions: Action[]
  cost: number
  expanded: number
}

/**
 * Two partial assignments with the same depth and the same "a copy is kept"
 * flag face an identical remaining subproblem, so they share one key.
 */
function stateKey(depth: number, hasKeep: boolean): string {
  return `${depth}:${hasKeep ? 'K' : '-'}`
}

/**
 * Best-first (A*) search over per-member action assignments for one
 * duplicate cluster. Members are assigned in the cluster's path order.
 */
export class DecisionSearchEngine {
  readonly costModel: CostModel

  constructor(private readonly config: SearchConfig) {
    this.costModel = new CostModel(config)
  }

  search(cluster: DuplicateCluster, scores: ReadonlyMap<string, Score>): SearchOutcome {
    return this.solve(cluster.id, this.costModel.profile(cluster, scores))
  }

  solve(clusterId: string, members: MemberProfile[]): SearchOutcome {
    const n = members.length
    if (n === 0) {
      throw new SearchInvariantError(clusterId, 'Cluster has no members')
    }

    // remaining[i]: admissible estimate for members i..n-1
    const remaining = new Array<number>(n + 1).fill(0)
    for (let i = n - 1; i >= 0; i--) {
      remaining[i] = remaining[i + 1] + this.costModel.minStepCost(members[i])
    }

    const frontier = new PriorityQueue<SearchState>()
    const bestG = new Map<string, number>()
    const closed = new Set<string>()

    const root: SearchState = { depth: 0, actions: [], g: 0, hasKeep: false }
    bestG.set(stateKey(0, false), 0)
    frontier.push(root, remaining[0])

    let expanded = 0
    while (!frontier.isEmpty) {
      const state = frontier.pop()
      if (!state) break

      const key = stateKey(state.depth, state.hasKeep)
      if (closed.has(key)) continue
      const recorded = bestG.get(key)
      if (recorded !== undefined && state.g > recorded) continue
      closed.add(key)

      if (state.depth === n && state.hasKeep) {
        return this.finish(clusterId, members, state, expanded)
      }

      expanded++
      if (expanded > this.config.maxExpansions) {
        throw new SearchBudgetError(clusterId, this.config.maxExpansions)
      }

      for (const next of this.successors(members, state)) {
        const nextKey = stateKey(next.depth, next.hasKeep)
        const previous = bestG.get(nextKey)
        if (previous !== undefined && previous <= next.g) continue
        bestG.set(nextKey, next.g)
        frontier.push(next, next.g + remaining[next.depth])
      }
    }

    throw new SearchInvariantError(clusterId, `No legal terminal assignment for cluster ${clusterId}`)
  }

  /**
   * Legal extensions of `state` by one member. DELETE is offered only to
   * deletable members, and never for the last member while nothing is kept.
   * Complete assignments without a KEEP are dropped.
   */
  successors(members: MemberProfile[], state: SearchState): SearchState[] {
    if (state.depth >= members.length) return []
    const member = members[state.depth]
    const isLast = state.depth === members.length - 1
    const out: SearchState[] = []

    for (const action of ACTIONS) {
      if (action === 'DELETE' && (!member.deletable || (isLast && !state.hasKeep))) continue
      const hasKeep = state.hasKeep || action === 'KEEP'
      if (isLast && !hasKeep) continue
      out.push({
        depth: state.depth + 1,
        actions: [...state.actions, action],
        g: state.g + this.costModel.stepCost(member, action, state.hasKeep),
        hasKeep
      })
    }
    return out
  }

  private finish(clusterId: string, members: MemberProfile[], state: SearchState, expanded: number): SearchOutcome {
    const assignment = new Map<string, Action>()
    members.forEach((member, i) => assignment.set(member.record.id, state.actions[i]))
    log.debug('Cluster solved', { clusterId, cost: state.g, expanded })
    return { clusterId, assignment, actions: state.actions, cost: state.g, expanded }
  }
}
