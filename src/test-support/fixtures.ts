import path from 'path'
import { DAY_MS } from '../shared/constants'
import { FileRecord, Score } from '../shared/types'
import { EngineConfig, EngineConfigInput, parseConfig } from '../main/config'
import { recordId } from '../main/fingerprint-service'

export const NOW = Date.parse('2026-01-15T12:00:00.000Z')

export function daysAgo(days: number, now = NOW): number {
  return now - days * DAY_MS
}

export function makeRecord(filePath: string, overrides: Partial<FileRecord> = {}): FileRecord {
  return {
    id: recordId(filePath),
    path: filePath,
    name: path.basename(filePath),
    sizeBytes: 100_000,
    mtimeMs: daysAgo(10),
    digest: 'a'.repeat(64),
    ...overrides
  }
}

export function makeScore(total: number): Score {
  return { total, breakdown: { age: total, duplication: 0, location: 0 }, reasons: [] }
}

// Path rules off: temp directories would otherwise match temp_location
export function testConfig(overrides: EngineConfigInput = {}): EngineConfig {
  return parseConfig({ pathRules: [], ...overrides })
}

/** Deterministic pseudo-random sequence in [0, 1). */
export function lcg(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0
    return state / 0x1_0000_0000
  }
}
