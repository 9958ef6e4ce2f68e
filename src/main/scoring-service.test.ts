import { describe, expect, it } from 'vitest'
import { MIB } from '../shared/constants'
import { DuplicateCluster, FileRecord } from '../shared/types'
import { NOW, daysAgo, makeRecord } from '../test-support/fixtures'
import { defaultConfig, parseConfig } from './config'
import { buildRules, compareRecommendation, evaluateRule, ruleLabelFor } from './rule-engine'
import { ScoringService } from './scoring-service'

const scoring = new ScoringService(defaultConfig())

function clusterOf(kind: DuplicateCluster['kind'], members: FileRecord[], representative: FileRecord): DuplicateCluster {
  return { id: 'cluster-1', kind, members, representativeId: representative.id }
}

describe('ScoringService', () => {
  it('gives a stale singleton the full age weight', () => {
    const record = makeRecord('/home/user/notes/report.txt', { mtimeMs: daysAgo(400) })
    expect(scoring.score(record, undefined, NOW)).toEqual({
      total: 4,
      breakdown: { age: 4, duplication: 0, location: 0 },
      reasons: ['old>180d']
    })
  })

  it('ramps the age contribution quadratically below the threshold', () => {
    const at = (days: number): number =>
      scoring.score(makeRecord('/home/user/a.txt', { mtimeMs: daysAgo(days) }), undefined, NOW).breakdown.age

    expect(at(10)).toBe(0.0123)
    expect(at(90)).toBe(1)
    expect(at(180)).toBe(4)

    const curve = [0, 30, 90, 179, 180, 400].map(at)
    expect(curve).toEqual([...curve].sort((a, b) => a - b))
  })

  it('treats future modification times as age zero', () => {
    const record = makeRecord('/home/user/a.txt', { mtimeMs: NOW + 60_000 })
    expect(scoring.score(record, undefined, NOW).breakdown.age).toBe(0)
  })

  it('charges duplication only to non-representatives', () => {
    const a = makeRecord('/home/user/a.txt')
    const b = makeRecord('/home/user/b.txt')
    const exact = clusterOf('EXACT', [a, b], a)
    const near = clusterOf('NEAR', [a, b], a)

    expect(scoring.score(a, exact, NOW).breakdown.duplication).toBe(0)
    expect(scoring.score(b, exact, NOW)).toEqual({
      total: 5.0123,
      breakdown: { age: 0.0123, duplication: 5, location: 0 },
      reasons: ['exact_dup']
    })
    expect(scoring.score(b, near, NOW).breakdown.duplication).toBe(2)
    expect(scoring.score(b, near, NOW).reasons).toEqual(['near_dup'])
  })

  it('adds location, size and extension rules', () => {
    const installer = makeRecord('/Users/me/Downloads/setup.exe', { sizeBytes: 300 * MIB })
    expect(scoring.score(installer, undefined, NOW)).toEqual({
      total: 4.0123,
      breakdown: { age: 0.0123, duplication: 0, location: 4 },
      reasons: ['large', 'downloads_location', 'installer_type']
    })

    const temp = makeRecord('/home/user/tmp/build.log', { sizeBytes: 60 * MIB })
    expect(scoring.score(temp, undefined, NOW).reasons).toEqual(['med_large', 'temp_location'])
    expect(scoring.score(temp, undefined, NOW).breakdown.location).toBe(3)
  })

  it('does not match location rules on partial segment names', () => {
    const record = makeRecord('/home/user/template/tmpfile.txt')
    expect(scoring.score(record, undefined, NOW).breakdown.location).toBe(0)
  })

  it('lowers the score of tiny files', () => {
    const record = makeRecord('/home/user/notes/todo.txt', { sizeBytes: 2048 })
    expect(scoring.score(record, undefined, NOW)).toEqual({
      total: -0.9877,
      breakdown: { age: 0.0123, duplication: 0, location: -1 },
      reasons: ['tiny_file']
    })
  })

  it('raises the score of common download types', () => {
    const record = makeRecord('/home/user/scan.pdf')
    expect(scoring.score(record, undefined, NOW)).toEqual({
      total: 1.0123,
      breakdown: { age: 0.0123, duplication: 0, location: 1 },
      reasons: ['common_dl']
    })

    const tiny = makeRecord('/home/user/scan.PNG', { sizeBytes: 512 })
    expect(scoring.score(tiny, undefined, NOW).breakdown.location).toBe(0)
    expect(scoring.score(tiny, undefined, NOW).reasons).toEqual(['tiny_file', 'common_dl'])
  })

  it('lowers the score of protected file types', () => {
    const record = makeRecord('/home/user/work/plan.DOCX')
    expect(scoring.score(record, undefined, NOW)).toEqual({
      total: -3.9877,
      breakdown: { age: 0.0123, duplication: 0, location: -4 },
      reasons: ['protect_type']
    })
  })

  it('follows a custom stale threshold', () => {
    const custom = new ScoringService(parseConfig({ staleThresholdDays: 30 }))
    const record = makeRecord('/home/user/a.txt', { mtimeMs: daysAgo(40) })
    expect(custom.score(record, undefined, NOW).breakdown.age).toBe(4)
    expect(custom.score(record, undefined, NOW).reasons).toEqual(['old>30d'])
  })

  it('is deterministic for identical inputs', () => {
    const a = makeRecord('/home/user/Downloads/a.iso', { mtimeMs: daysAgo(77), sizeBytes: 80 * MIB })
    const b = makeRecord('/home/user/Downloads/b.iso', { mtimeMs: daysAgo(77), sizeBytes: 80 * MIB })
    const cluster = clusterOf('EXACT', [a, b], a)
    const first = scoring.scoreAll([a, b], new Map([[a.id, cluster], [b.id, cluster]]), NOW)
    const second = scoring.scoreAll([a, b], new Map([[a.id, cluster], [b.id, cluster]]), NOW)
    expect(first).toEqual(second)
    expect(first.get(b.id)?.reasons).toEqual(['exact_dup', 'med_large', 'downloads_location', 'installer_type'])
  })
})

describe('rule engine', () => {
  it('picks only the largest matching size tier', () => {
    const rules = buildRules(defaultConfig())
    const size = rules.find((rule) => rule.kind === 'size')
    if (!size) throw new Error('size rule missing')

    const record = makeRecord('/a.bin', { sizeBytes: 250 * MIB })
    expect(evaluateRule(size, { record, now: NOW })).toEqual({ bucket: 'location', weight: 2, reason: 'large' })
  })

  it('builds one rule per configured path and extension rule', () => {
    const rules = buildRules(defaultConfig())
    expect(rules.map((rule) => rule.kind)).toEqual([
      'age',
      'duplication',
      'size',
      'path',
      'path',
      'path',
      'extension',
      'extension',
      'extension'
    ])
  })

  it('applies the tiny tier strictly below its cut-off', () => {
    const size = buildRules(defaultConfig()).find((rule) => rule.kind === 'size')
    if (!size) throw new Error('size rule missing')

    const at = (sizeBytes: number) => evaluateRule(size, { record: makeRecord('/a.bin', { sizeBytes }), now: NOW })
    expect(at(32 * 1024 - 1)).toEqual({ bucket: 'location', weight: -1, reason: 'tiny_file' })
    expect(at(32 * 1024)).toEqual({ bucket: 'location', weight: 0 })
  })
})

describe('rule-only recommendation', () => {
  const cutoffs = defaultConfig().ruleLabels

  it('labels totals by the delete and archive cut-offs', () => {
    expect(ruleLabelFor(9, cutoffs)).toBe('delete_candidate')
    expect(ruleLabelFor(5, cutoffs)).toBe('delete_candidate')
    expect(ruleLabelFor(4.9999, cutoffs)).toBe('archive_candidate')
    expect(ruleLabelFor(2, cutoffs)).toBe('archive_candidate')
    expect(ruleLabelFor(1.9999, cutoffs)).toBe('keep')
    expect(ruleLabelFor(-3.9877, cutoffs)).toBe('keep')
  })

  it('follows custom cut-offs', () => {
    expect(ruleLabelFor(3, { deleteCandidate: 3, archiveCandidate: 1 })).toBe('delete_candidate')
  })

  it('compares the label with the searched action', () => {
    expect(compareRecommendation('keep', 'KEEP')).toBe('agree_keep')
    expect(compareRecommendation('archive_candidate', 'ARCHIVE')).toBe('agree_action')
    expect(compareRecommendation('delete_candidate', 'DELETE')).toBe('agree_action')
    expect(compareRecommendation('archive_candidate', 'DELETE')).toBe('disagree')
    expect(compareRecommendation('delete_candidate', 'KEEP')).toBe('disagree')
    expect(compareRecommendation('keep', 'ARCHIVE')).toBe('disagree')
  })
})
