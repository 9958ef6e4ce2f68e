export * from './shared/types'
export { parseConfig, defaultConfig, mergeConfig, EngineConfigSchema } from './main/config'
export type { EngineConfig, EngineConfigInput, SearchConfig, ScoringConfig, RuleLabelConfig } from './main/config'
export { DecisionEngine } from './main/decision-engine'
export type { EngineDependencies, EvaluateOptions } from './main/decision-engine'
export { walkDirectories } from './main/directory-walker'
export { FingerprintService, hashDeadlineMs } from './main/fingerprint-service'
export { ClusterService } from './main/cluster-service'
export { ScoringService } from './main/scoring-service'
export { compareRecommendation, ruleLabelFor } from './main/rule-engine'
export { DecisionSearchEngine } from './main/decision-search-engine'
export type { SearchOutcome } from './main/decision-search-engine'
export { CostModel } from './main/cost-model'
export type { ImageDecoder } from './main/perceptual-hash'
export { planToComparisonCsv, planToCsv, summarizePlan, writePlanReport } from './main/report-writer'
export type { PlanSummary, ReportPaths } from './main/report-writer'
export { SettingsStore } from './main/settings-store'
export * from './main/errors'
