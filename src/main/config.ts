import { z } from 'zod'
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_SIMILARITY_THRESHOLD,
  DEFAULT_STALE_DAYS,
  HASH_TIMEOUT_BASE_MS,
  KIB,
  MIB,
  PERCEPTUAL_BITS
} from '../shared/constants'
import { ConfigError } from './errors'

const isRegExpSource = (source: string): boolean => {
  try {
    new RegExp(source, 'i')
    return true
  } catch {
    return false
  }
}

export const PathRuleSchema = z.object({
  name: z.string().min(1),
  // Matched case-insensitively against the full path
  pattern: z.string().min(1).refine(isRegExpSource, 'pattern is not a valid regular expression'),
  weight: z.number()
})

export const ExtensionRuleSchema = z.object({
  name: z.string().min(1),
  extensions: z.array(z.string().regex(/^\.[^./\\]+$/, 'extensions look like ".ext"')).min(1),
  weight: z.number()
})

export type PathRuleConfig = z.infer<typeof PathRuleSchema>
export type ExtensionRuleConfig = z.infer<typeof ExtensionRuleSchema>

const SEP = '[\\\\/]'

export const DEFAULT_PATH_RULES: PathRuleConfig[] = [
  { name: 'temp_location', pattern: `(^|${SEP})(te?mp|cache|\\.cache)(${SEP}|$)`, weight: 2 },
  { name: 'installer_location', pattern: `(^|${SEP})installers?(${SEP}|$)`, weight: 2 },
  { name: 'downloads_location', pattern: `(^|${SEP})downloads(${SEP}|$)`, weight: 1 }
]

export const DEFAULT_EXTENSION_RULES: ExtensionRuleConfig[] = [
  { name: 'installer_type', extensions: ['.exe', '.msi', '.dmg', '.pkg', '.iso'], weight: 1 },
  { name: 'protect_type', extensions: ['.py', '.ps1', '.bat', '.docx', '.xlsx', '.pptx'], weight: -4 },
  { name: 'common_dl', extensions: ['.pdf', '.jpg', '.jpeg', '.png', '.zip', '.7z', '.mp4'], weight: 1 }
]

export const WeightsSchema = z.object({
  age: z.number().nonnegative().default(4),
  exactDuplicate: z.number().nonnegative().default(5),
  nearDuplicate: z.number().nonnegative().default(2),
  largeFile: z.number().default(2),
  mediumFile: z.number().default(1),
  largeFileBytes: z.number().int().positive().default(200 * MIB),
  mediumFileBytes: z.number().int().positive().default(50 * MIB),
  // Applies below tinyFileBytes
  tinyFile: z.number().default(-1),
  tinyFileBytes: z.number().int().positive().default(32 * KIB)
})

export const SearchSchema = z.object({
  archivalCost: z.number().default(2),
  deletionCost: z.number().default(3),
  // Must stay >= 0: the heuristic assumes KEEP never costs less than zero
  redundancyPenalty: z.number().nonnegative().default(1),
  archiveBenefitRate: z.number().nonnegative().default(0.25),
  deleteBenefitRate: z.number().nonnegative().default(0.5),
  deletionConfidenceThreshold: z.number().default(6),
  maxExpansions: z.number().int().positive().default(100_000)
})

// Cut-offs on the score total for the rule-only recommendation
export const RuleLabelSchema = z
  .object({
    deleteCandidate: z.number().default(5),
    archiveCandidate: z.number().default(2)
  })
  .refine((t) => t.deleteCandidate >= t.archiveCandidate, {
    message: 'deleteCandidate must not be below archiveCandidate'
  })

export const EngineConfigSchema = z.object({
  staleThresholdDays: z.number().positive().default(DEFAULT_STALE_DAYS),
  maxFiles: z.number().int().positive().nullable().default(null),
  timeBudgetMs: z.number().int().positive().nullable().default(null),
  similarityThreshold: z
    .number()
    .int()
    .min(0)
    .max(PERCEPTUAL_BITS - 1)
    .default(DEFAULT_SIMILARITY_THRESHOLD),
  archiveThreshold: z.number().default(3),
  concurrency: z.number().int().min(1).max(64).default(DEFAULT_CONCURRENCY),
  hashTimeoutMs: z.number().int().positive().default(HASH_TIMEOUT_BASE_MS),
  excludePaths: z.array(z.string()).default([]),
  weights: WeightsSchema.default({}),
  pathRules: z.array(PathRuleSchema).default(DEFAULT_PATH_RULES),
  extensionRules: z.array(ExtensionRuleSchema).default(DEFAULT_EXTENSION_RULES),
  search: SearchSchema.default({}),
  ruleLabels: RuleLabelSchema.default({})
})

export type EngineConfig = z.infer<typeof EngineConfigSchema>
export type EngineConfigInput = z.input<typeof EngineConfigSchema>
export type WeightsConfig = EngineConfig['weights']
export type SearchConfig = EngineConfig['search']
export type RuleLabelConfig = EngineConfig['ruleLabels']

export type ScoringConfig = Pick<
  EngineConfig,
  'staleThresholdDays' | 'weights' | 'pathRules' | 'extensionRules'
>

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${where}: ${issue.message}`
  })
}

/**
 * Validates raw options and fills every default. Throws ConfigError.
 */
export function parseConfig(input: unknown, source = 'options'): EngineConfig {
  const result = EngineConfigSchema.safeParse(input ?? {})
  if (!result.success) {
    throw ConfigError.fromIssues(source, formatIssues(result.error))
  }
  return result.data
}

export function defaultConfig(): EngineConfig {
  return parseConfig({})
}

/**
 * Layers CLI overrides on top of a loaded config and re-validates.
 */
export function mergeConfig(base: EngineConfig, overrides: EngineConfigInput): EngineConfig {
  return parseConfig(
    {
      ...base,
      ...overrides,
      weights: { ...base.weights, ...overrides.weights },
      search: { ...base.search, ...overrides.search },
      ruleLabels: { ...base.ruleLabels, ...overrides.ruleLabels }
    },
    'overrides'
  )
}
