import {
  Action,
  ClusterFailure,
  ClusterSummary,
  DuplicateCluster,
  FileEntry,
  FileRecord,
  Plan,
  PlanEntry,
  PlanWarning,
  Score
} from '../shared/types'
import { ClusterService } from './cluster-service'
import type { EngineConfig } from './config'
import { DecisionSearchEngine, SearchOutcome } from './decision-search-engine'
import { isSearchFailure } from './errors'
import { FingerprintService } from './fingerprint-service'
import { logger } from './logger'
import type { ImageDecoder } from './perceptual-hash'
import { ageInDays, compareRecommendation, ruleLabelFor } from './rule-engine'
import { ScoringService } from './scoring-service'

const log = logger.child('engine')

export interface EngineDependencies {
  decoder?: ImageDecoder
  // Wall clock for the time budget
  clock?: () => number
}

export interface EvaluateOptions {
  // Reference time for ages; defaults to the clock
  now?: number
  // Walker problems to carry into the plan
  warnings?: PlanWarning[]
  onProgress?: (phase: 'fingerprint', done: number, total: number) => void
}

type Decision = Pick<PlanEntry, 'action' | 'clusterId' | 'clusterKind' | 'representative' | 'reason'>

const round = (value: number, places: number): number => {
  const factor = 10 ** places
  return Math.round(value * factor) / factor
}

const comparePaths = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

function clusterReason(action: Action, record: FileRecord, cluster: DuplicateCluster): string {
  const representative = record.id === cluster.representativeId
  const label = cluster.kind === 'EXACT' ? 'exact' : 'near'
  switch (action) {
    case 'KEEP':
      return representative ? `representative of ${label} cluster` : `extra ${label} copy kept`
    case 'ARCHIVE':
      return `${label} duplicate archived`
    case 'DELETE':
      return representative ? `high-risk ${label} copy` : `redundant ${label} copy`
  }
}

/**
 * Fingerprint -> cluster -> score -> decide. Produces a Plan and touches no
 * file beyond reading it.
 */
export class DecisionEngine {
  private readonly fingerprints: FingerprintService
  private readonly clusterService: ClusterService
  private readonly scoring: ScoringService
  private readonly searchEngine: DecisionSearchEngine
  private readonly clock: () => number

  constructor(
    readonly config: EngineConfig,
    deps: EngineDependencies = {}
  ) {
    this.fingerprints = new FingerprintService({
      concurrency: config.concurrency,
      decoder: deps.decoder,
      hashTimeoutMs: config.hashTimeoutMs
    })
    this.clusterService = new ClusterService({ similarityThreshold: config.similarityThreshold })
    this.scoring = new ScoringService(config)
    this.searchEngine = new DecisionSearchEngine(config.search)
    this.clock = deps.clock ?? Date.now
  }

  async evaluate(input: FileEntry[], options: EvaluateOptions = {}): Promise<Plan> {
    const startedAt = this.clock()
    const now = options.now ?? startedAt
    const budget = this.config.timeBudgetMs
    const isExpired = (): boolean => budget !== null && this.clock() - startedAt >= budget

    const seen = new Set<string>()
    const sorted = [...input]
      .sort((a, b) => comparePaths(a.path, b.path))
      .filter((entry) => {
        if (seen.has(entry.path)) return false
        seen.add(entry.path)
        return true
      })

    const cap = this.config.maxFiles
    const considered = cap !== null ? sorted.slice(0, cap) : sorted
    let truncated = considered.length < sorted.length
    if (truncated) {
      log.warn('File cap reached, plan will be partial', { cap, total: sorted.length })
    }

    const batch = await this.fingerprints.fingerprintAll(considered, {
      isExpired,
      onProgress: (done, total) => options.onProgress?.('fingerprint', done, total)
    })
    truncated = truncated || batch.truncated

    const { clusters, byRecordId } = this.clusterService.build(batch.records)
    const scores = this.scoring.scoreAll(batch.records, byRecordId, now)

    const entries: PlanEntry[] = []
    const summaries: ClusterSummary[] = []
    const failures: ClusterFailure[] = []
    const handled = new Set<string>()
    let statesExpanded = 0

    const records = [...batch.records].sort((a, b) => comparePaths(a.path, b.path))
    for (const record of records) {
      if (handled.has(record.id)) continue
      if (isExpired()) {
        log.warn('Time budget exhausted, stopping before remaining files', {
          remaining: records.length - handled.size
        })
        truncated = true
        break
      }

      const cluster = byRecordId.get(record.id)
      if (!cluster) {
        handled.add(record.id)
        entries.push(this.decideSingleton(record, this.scoreOf(scores, record), now))
        continue
      }

      for (const member of cluster.members) handled.add(member.id)
      const outcome = this.runSearch(cluster, scores, failures)
      statesExpanded += outcome?.expanded ?? 0
      summaries.push({
        id: cluster.id,
        kind: cluster.kind,
        size: cluster.members.length,
        representative: this.representativePath(cluster),
        cost: outcome ? round(outcome.cost, 4) : null,
        expanded: outcome?.expanded ?? 0
      })

      for (const member of cluster.members) {
        const action = outcome?.assignment.get(member.id) ?? 'KEEP'
        entries.push(
          this.planEntry(member, this.scoreOf(scores, member), now, {
            action,
            clusterId: cluster.id,
            clusterKind: cluster.kind,
            representative: member.id === cluster.representativeId,
            reason: outcome ? clusterReason(action, member, cluster) : 'search failed, kept'
          })
        )
      }
    }

    entries.sort((a, b) => comparePaths(a.path, b.path))

    const plan: Plan = {
      evaluatedAt: new Date(now).toISOString(),
      entries,
      clusters: summaries,
      warnings: [...(options.warnings ?? []), ...batch.warnings],
      failures,
      truncated,
      stats: {
        filesConsidered: considered.length,
        filesPlanned: entries.length,
        exactClusters: clusters.filter((c) => c.kind === 'EXACT').length,
        nearClusters: clusters.filter((c) => c.kind === 'NEAR').length,
        statesExpanded,
        disagreements: entries.filter((e) => e.agreement === 'disagree').length
      }
    }

    log.info('Plan ready', { ...plan.stats, truncated, failures: failures.length })
    return plan
  }

  private runSearch(
    cluster: DuplicateCluster,
    scores: ReadonlyMap<string, Score>,
    failures: ClusterFailure[]
  ): SearchOutcome | null {
    try {
      return this.searchEngine.search(cluster, scores)
    } catch (err: unknown) {
      if (!isSearchFailure(err)) throw err
      log.error('Cluster search failed, members default to keep', {
        clusterId: cluster.id,
        error: err
      })
      failures.push({ clusterId: cluster.id, code: err.code, message: err.message })
      return null
    }
  }

  /**
   * No search for files outside clusters: keep, or archive when the score
   * clears the archive threshold. Unverified files are always kept.
   */
  private decideSingleton(record: FileRecord, score: Score, now: number): PlanEntry {
    if (record.error) {
      return this.planEntry(record, score, now, {
        action: 'KEEP',
        representative: false,
        reason: `not verified (${record.error.code})`
      })
    }
    if (score.total > this.config.archiveThreshold) {
      return this.planEntry(record, score, now, {
        action: 'ARCHIVE',
        representative: false,
        reason: 'stale file above archive threshold'
      })
    }
    return this.planEntry(record, score, now, { action: 'KEEP', representative: false, reason: 'default keep' })
  }

  /**
   * Unverified files carry the `keep` rule label: nothing is recommended for
   * a file whose content was never read.
   */
  private planEntry(record: FileRecord, score: Score, now: number, decision: Decision): PlanEntry {
    const ruleLabel = record.error ? 'keep' : ruleLabelFor(score.total, this.config.ruleLabels)
    return {
      path: record.path,
      sizeBytes: record.sizeBytes,
      ageDays: round(ageInDays(record, now), 2),
      score,
      ...decision,
      ruleLabel,
      agreement: compareRecommendation(ruleLabel, decision.action)
    }
  }

  private scoreOf(scores: ReadonlyMap<string, Score>, record: FileRecord): Score {
    const score = scores.get(record.id)
    if (score) return score
    // Every fingerprinted record is scored
    return { total: 0, breakdown: { age: 0, duplication: 0, location: 0 }, reasons: [] }
  }

  private representativePath(cluster: DuplicateCluster): string {
    const rep = cluster.members.find((m) => m.id === cluster.representativeId)
    return rep ? rep.path : cluster.members[0].path
  }
}
