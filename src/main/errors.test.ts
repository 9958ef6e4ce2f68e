import { describe, expect, it } from 'vitest'
import {
  ConfigError,
  ScanError,
  SearchBudgetError,
  SearchInvariantError,
  ensureError,
  errorCode,
  isConfigError,
  isSearchFailure,
  isSweepwiseError
} from './errors'

describe('errors', () => {
  it('describes the cause chain', () => {
    const error = new ConfigError('Cannot read settings', [], { cause: new Error('EACCES') })
    expect(error.name).toBe('ConfigError')
    expect(error.toDetailedString()).toBe('ConfigError [CONFIG_ERROR]: Cannot read settings\n  Caused by: EACCES')
  })

  it('carries context on each error type', () => {
    const scan = new ScanError('Not a directory: /x', '/x')
    expect(scan.path).toBe('/x')
    expect(scan.code).toBe('SCAN_ERROR')

    const budget = new SearchBudgetError('c-1', 50)
    expect(budget.message).toBe('Search for cluster c-1 exceeded 50 expansions')
    expect(budget.clusterId).toBe('c-1')
    expect(budget.toDetailedString()).toBe(
      'SearchBudgetError [SEARCH_BUDGET_ERROR]: Search for cluster c-1 exceeded 50 expansions'
    )
  })

  it('classifies errors', () => {
    const invariant = new SearchInvariantError('c-2', 'empty')
    expect(isSearchFailure(invariant)).toBe(true)
    expect(isSearchFailure(new SearchBudgetError('c-3', 1))).toBe(true)
    expect(isSearchFailure(new ConfigError('x'))).toBe(false)
    expect(isConfigError(ConfigError.fromIssues('options', ['a: b']))).toBe(true)
    expect(isSweepwiseError(invariant)).toBe(true)
    expect(isSweepwiseError(new Error('plain'))).toBe(false)
  })

  it('normalises unknown throwables', () => {
    const original = new Error('x')
    expect(ensureError(original)).toBe(original)
    expect(ensureError('text').message).toBe('text')
    expect(ensureError(404).message).toBe('404')
  })

  it('reads string codes from system errors', () => {
    expect(errorCode({ code: 'ENOENT' })).toBe('ENOENT')
    expect(errorCode({ code: 5 })).toBeUndefined()
    expect(errorCode(null)).toBeUndefined()
  })
})
