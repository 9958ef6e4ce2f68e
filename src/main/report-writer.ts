import fs from 'fs/promises'
import path from 'path'
import { COMPARISON_PREFIX, REPORT_PREFIX } from '../shared/constants'
import { Action, Plan } from '../shared/types'
import { logger } from './logger'

const log = logger.child('report')

export const CSV_HEADER = [
  'path',
  'size_bytes',
  'age_days',
  'action',
  'score',
  'age_weight',
  'duplication_weight',
  'location_weight',
  'cluster_id',
  'cluster_kind',
  'reason'
] as const

export const COMPARISON_HEADER = ['path', 'rule_label', 'search_action', 'agreement'] as const

export interface PlanSummary {
  counts: Record<Action, number>
  // bytes freed if every ARCHIVE and DELETE were applied
  reclaimableBytes: number
  clusters: number
  warnings: number
  failures: number
  // entries whose rule label and searched action differ
  disagreements: number
  truncated: boolean
}

export interface ReportPaths {
  plan: string
  comparison: string
}

export function escapeCsv(value: string | number): string {
  const text = String(value)
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`
  }
  return text
}

export function planToCsv(plan: Plan): string {
  const lines = [CSV_HEADER.join(',')]
  for (const entry of plan.entries) {
    const row: Array<string | number> = [
      entry.path,
      entry.sizeBytes,
      entry.ageDays.toFixed(1),
      entry.action,
      entry.score.total,
      entry.score.breakdown.age,
      entry.score.breakdown.duplication,
      entry.score.breakdown.location,
      entry.clusterId ?? '',
      entry.clusterKind ?? '',
      entry.reason
    ]
    lines.push(row.map(escapeCsv).join(','))
  }
  return `${lines.join('\n')}\n`
}

export function planToComparisonCsv(plan: Plan): string {
  const lines = [COMPARISON_HEADER.join(',')]
  for (const entry of plan.entries) {
    lines.push([entry.path, entry.ruleLabel, entry.action, entry.agreement].map(escapeCsv).join(','))
  }
  return `${lines.join('\n')}\n`
}

export function summarizePlan(plan: Plan): PlanSummary {
  const counts: Record<Action, number> = { KEEP: 0, ARCHIVE: 0, DELETE: 0 }
  let reclaimableBytes = 0
  let disagreements = 0
  for (const entry of plan.entries) {
    counts[entry.action]++
    if (entry.action !== 'KEEP') reclaimableBytes += entry.sizeBytes
    if (entry.agreement === 'disagree') disagreements++
  }
  return {
    counts,
    reclaimableBytes,
    clusters: plan.clusters.length,
    warnings: plan.warnings.length,
    failures: plan.failures.length,
    disagreements,
    truncated: plan.truncated
  }
}

export function humanSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB']
  let value = bytes
  for (const unit of units) {
    if (Math.abs(value) < 1024) return `${value.toFixed(1)}${unit}`
    value /= 1024
  }
  return `${value.toFixed(1)}PB`
}

export function formatSummary(summary: PlanSummary): string {
  const lines = [
    `Keep: ${summary.counts.KEEP}  Archive: ${summary.counts.ARCHIVE}  Delete: ${summary.counts.DELETE}`,
    `Reclaimable: ${humanSize(summary.reclaimableBytes)} across ${summary.clusters} duplicate clusters`
  ]
  if (summary.disagreements > 0) lines.push(`Rule and search disagree on ${summary.disagreements} files`)
  if (summary.warnings > 0) lines.push(`Warnings: ${summary.warnings}`)
  if (summary.failures > 0) lines.push(`Clusters defaulted to keep after search failure: ${summary.failures}`)
  if (summary.truncated) lines.push('Plan is partial: file cap or time budget reached')
  return lines.join('\n')
}

function timestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0')
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

export function reportFileName(date: Date, prefix = REPORT_PREFIX): string {
  return `${prefix}_${timestamp(date)}.csv`
}

/**
 * Writes the plan CSV and the rule/search comparison CSV into `outputDir`.
 * Only the two report files are created; scanned files are never touched.
 */
export async function writePlanReport(plan: Plan, outputDir: string, date = new Date()): Promise<ReportPaths> {
  await fs.mkdir(outputDir, { recursive: true })
  const paths: ReportPaths = {
    plan: path.join(outputDir, reportFileName(date)),
    comparison: path.join(outputDir, reportFileName(date, COMPARISON_PREFIX))
  }
  await fs.writeFile(paths.plan, planToCsv(plan), 'utf-8')
  await fs.writeFile(paths.comparison, planToComparisonCsv(plan), 'utf-8')
  log.info('Report written', { ...paths, rows: plan.entries.length })
  return paths
}
