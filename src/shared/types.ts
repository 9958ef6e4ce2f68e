export type Action = 'KEEP' | 'ARCHIVE' | 'DELETE'

export type ClusterKind = 'EXACT' | 'NEAR'

export type ScanErrorCode = 'UNREADABLE' | 'EMPTY'

// Recommendation from score cut-offs alone, before any search
export type RuleLabel = 'delete_candidate' | 'archive_candidate' | 'keep'

export type Agreement = 'agree_action' | 'agree_keep' | 'disagree'

// Directory walker output: what the engine receives as input
export interface FileEntry {
  path: string
  sizeBytes: number
  mtimeMs: number
}

export interface ScanErrorMarker {
  code: ScanErrorCode
  message: string
}

export interface FileRecord {
  readonly id: string
  readonly path: string
  readonly name: string
  readonly sizeBytes: number
  readonly mtimeMs: number
  // sha256 hex, or the sentinel when the file could not be digested
  readonly digest: string
  // 64-bit dHash as 16 hex chars, images only
  readonly perceptualDigest?: string
  readonly error?: ScanErrorMarker
}

export interface DuplicateCluster {
  id: string
  kind: ClusterKind
  // ascending path order
  members: FileRecord[]
  representativeId: string
}

export interface ScoreBreakdown {
  age: number
  duplication: number
  location: number
}

export interface Score {
  total: number
  breakdown: ScoreBreakdown
  reasons: string[]
}

export interface PlanEntry {
  path: string
  sizeBytes: number
  ageDays: number
  action: Action
  score: Score
  clusterId?: string
  clusterKind?: ClusterKind
  representative: boolean
  reason: string
  ruleLabel: RuleLabel
  // ruleLabel compared with the decided action
  agreement: Agreement
}

export interface ClusterSummary {
  id: string
  kind: ClusterKind
  size: number
  representative: string
  cost: number | null
  expanded: number
}

export type PlanWarningKind = 'SCAN_ERROR' | 'PERCEPTUAL_HASH_FAILED' | 'WALK_ERROR'

export interface PlanWarning {
  kind: PlanWarningKind
  path: string
  message: string
}

export interface ClusterFailure {
  clusterId: string
  code: string
  message: string
}

export interface PlanStats {
  filesConsidered: number
  filesPlanned: number
  exactClusters: number
  nearClusters: number
  statesExpanded: number
  disagreements: number
}

export interface Plan {
  evaluatedAt: string
  entries: PlanEntry[]
  clusters: ClusterSummary[]
  warnings: PlanWarning[]
  failures: ClusterFailure[]
  truncated: boolean
  stats: PlanStats
}
