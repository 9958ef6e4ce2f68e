import { DuplicateCluster, FileRecord, Score } from '../shared/types'
import type { ScoringConfig } from './config'
import { logger } from './logger'
import { ScoringRule, buildRules, evaluateRule, reduceContributions } from './rule-engine'

const log = logger.child('scoring')

export class ScoringService {
  private readonly rules: ScoringRule[]

  constructor(config: ScoringConfig, rules?: ScoringRule[]) {
    this.rules = rules ?? buildRules(config)
  }

  score(record: FileRecord, cluster: DuplicateCluster | undefined, now: number): Score {
    const ctx = { record, cluster, now }
    return reduceContributions(this.rules.map((rule) => evaluateRule(rule, ctx)))
  }

  scoreAll(
    records: FileRecord[],
    clusterOf: ReadonlyMap<string, DuplicateCluster>,
    now: number
  ): Map<string, Score> {
    const scores = new Map<string, Score>()
    for (const record of records) {
      scores.set(record.id, this.score(record, clusterOf.get(record.id), now))
    }
    log.info(`Scored ${scores.size} files`, { rules: this.rules.length })
    return scores
  }
}
