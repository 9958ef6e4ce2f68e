import path from 'path'
import { DAY_MS } from '../shared/constants'
import { Action, Agreement, DuplicateCluster, FileRecord, RuleLabel, Score, ScoreBreakdown } from '../shared/types'
import type { RuleLabelConfig, ScoringConfig } from './config'

export interface SizeTier {
  name: string
  minBytes: number
  weight: number
}

export interface SmallTier {
  name: string
  // Applies strictly below this size
  maxBytes: number
  weight: number
}

export type ScoringRule =
  | { kind: 'age'; weight: number; staleThresholdDays: number }
  | { kind: 'duplication'; exactWeight: number; nearWeight: number }
  | { kind: 'path'; name: string; pattern: RegExp; weight: number }
  // Tiers ordered largest first; only the first matching tier applies
  | { kind: 'size'; tiers: SizeTier[]; small: SmallTier }
  | { kind: 'extension'; name: string; extensions: Set<string>; weight: number }

export interface RuleContext {
  record: FileRecord
  cluster?: DuplicateCluster
  now: number
}

export interface Contribution {
  bucket: keyof ScoreBreakdown
  weight: number
  reason?: string
}

export function ageInDays(record: FileRecord, now: number): number {
  return Math.max(0, (now - record.mtimeMs) / DAY_MS)
}

export function buildRules(config: ScoringConfig): ScoringRule[] {
  const { weights } = config
  const rules: ScoringRule[] = [
    { kind: 'age', weight: weights.age, staleThresholdDays: config.staleThresholdDays },
    { kind: 'duplication', exactWeight: weights.exactDuplicate, nearWeight: weights.nearDuplicate },
    {
      kind: 'size',
      tiers: [
        { name: 'large', minBytes: weights.largeFileBytes, weight: weights.largeFile },
        { name: 'med_large', minBytes: weights.mediumFileBytes, weight: weights.mediumFile }
      ].sort((a, b) => b.minBytes - a.minBytes),
      small: { name: 'tiny_file', maxBytes: weights.tinyFileBytes, weight: weights.tinyFile }
    }
  ]

  for (const rule of config.pathRules) {
    rules.push({ kind: 'path', name: rule.name, pattern: new RegExp(rule.pattern, 'i'), weight: rule.weight })
  }
  for (const rule of config.extensionRules) {
    rules.push({
      kind: 'extension',
      name: rule.name,
      extensions: new Set(rule.extensions.map((ext) => ext.toLowerCase())),
      weight: rule.weight
    })
  }
  return rules
}

export function evaluateRule(rule: ScoringRule, ctx: RuleContext): Contribution {
  switch (rule.kind) {
    case 'age': {
      const days = ageInDays(ctx.record, ctx.now)
      if (days >= rule.staleThresholdDays) {
        return { bucket: 'age', weight: rule.weight, reason: `old>${rule.staleThresholdDays}d` }
      }
      const ratio = days / rule.staleThresholdDays
      return { bucket: 'age', weight: rule.weight * ratio * ratio }
    }
    case 'duplication': {
      const cluster = ctx.cluster
      if (!cluster || cluster.representativeId === ctx.record.id) {
        return { bucket: 'duplication', weight: 0 }
      }
      return cluster.kind === 'EXACT'
        ? { bucket: 'duplication', weight: rule.exactWeight, reason: 'exact_dup' }
        : { bucket: 'duplication', weight: rule.nearWeight, reason: 'near_dup' }
    }
    case 'path':
      return rule.pattern.test(ctx.record.path)
        ? { bucket: 'location', weight: rule.weight, reason: rule.name }
        : { bucket: 'location', weight: 0 }
    case 'size': {
      const size = ctx.record.sizeBytes
      const tier = rule.tiers.find((t) => size >= t.minBytes)
      if (tier) return { bucket: 'location', weight: tier.weight, reason: tier.name }
      if (size < rule.small.maxBytes) {
        return { bucket: 'location', weight: rule.small.weight, reason: rule.small.name }
      }
      return { bucket: 'location', weight: 0 }
    }
    case 'extension': {
      const ext = path.extname(ctx.record.path).toLowerCase()
      return rule.extensions.has(ext)
        ? { bucket: 'location', weight: rule.weight, reason: rule.name }
        : { bucket: 'location', weight: 0 }
    }
    default: {
      const unhandled: never = rule
      throw new Error(`Unknown rule ${JSON.stringify(unhandled)}`)
    }
  }
}

const round = (value: number): number => Math.round(value * 10_000) / 10_000

/**
 * Weighted-sum reducer. Buckets and the total are rounded to 4 decimals.
 */
export function reduceContributions(contributions: Contribution[]): Score {
  const breakdown: ScoreBreakdown = { age: 0, duplication: 0, location: 0 }
  const reasons: string[] = []
  for (const c of contributions) {
    breakdown[c.bucket] += c.weight
    if (c.reason) reasons.push(c.reason)
  }
  breakdown.age = round(breakdown.age)
  breakdown.duplication = round(breakdown.duplication)
  breakdown.location = round(breakdown.location)
  return {
    total: round(breakdown.age + breakdown.duplication + breakdown.location),
    breakdown,
    reasons
  }
}

export function ruleLabelFor(total: number, cutoffs: RuleLabelConfig): RuleLabel {
  if (total >= cutoffs.deleteCandidate) return 'delete_candidate'
  if (total >= cutoffs.archiveCandidate) return 'archive_candidate'
  return 'keep'
}

const LABEL_OF_ACTION: Record<Action, RuleLabel> = {
  KEEP: 'keep',
  ARCHIVE: 'archive_candidate',
  DELETE: 'delete_candidate'
}

export function compareRecommendation(label: RuleLabel, action: Action): Agreement {
  if (LABEL_OF_ACTION[action] !== label) return 'disagree'
  return label === 'keep' ? 'agree_keep' : 'agree_action'
}
