// tests/sql-autocomplete/pipeline/ranker.test.ts

import { describe, it, expect } from 'vitest'
import {
  rankCandidates,
  deduplicateCandidates,
  limitSuggestions,
  computeMatchType,
  isMatch,
  applyKeywordCasing,
} from '../../../src/lib/sql/autocomplete/ranker'
import type { Candidate, CandidateSource, CandidateType, RawCandidate } from '../../../src/lib/sql/autocomplete/types'

// ============================================================================
// TEST HELPERS
// ============================================================================

const FUZZY_SOURCES: CandidateSource[] = ['scope', 'schema']

function raw(name: string, type: CandidateType, source: CandidateSource, detail?: string): RawCandidate {
  const candidate: RawCandidate = { type, name, text: name, source, fuzzy: FUZZY_SOURCES.includes(source) }
  if (detail !== undefined) candidate.detail = detail
  return candidate
}

function texts(candidates: Candidate[]): string[] {
  return candidates.map((c) => c.text)
}

// ============================================================================
// TESTS
// ============================================================================

describe('computeMatchType', () => {
  it('classifies prefix, contains and no match', () => {
    expect(computeMatchType('identifier', 'id')).toBe('prefix')
    expect(computeMatchType('user_id', 'id')).toBe('contains')
    expect(computeMatchType('name', 'id')).toBeNull()
  })

  it('ignores case', () => {
    expect(computeMatchType('Users', 'us')).toBe('prefix')
    expect(computeMatchType('users', 'US')).toBe('prefix')
  })

  it('treats an exact match as a prefix match', () => {
    expect(computeMatchType('id', 'id')).toBe('prefix')
  })

  it('matches everything with nothing typed', () => {
    expect(computeMatchType('anything', '')).toBe('none')
  })
})

describe('isMatch', () => {
  it('accepts substring matches only for fuzzy candidates', () => {
    expect(isMatch(raw('user_id', 'column', 'scope'), 'id')).toBe(true)
    expect(isMatch(raw('VALID', 'keyword', 'keyword'), 'ali')).toBe(false)
  })

  it('rejects substring matches when they are turned off', () => {
    expect(isMatch(raw('user_id', 'column', 'scope'), 'id', false)).toBe(false)
    expect(isMatch(raw('identifier', 'column', 'scope'), 'id', false)).toBe(true)
  })
})

describe('rankCandidates', () => {
  it('ranks prefix matches alphabetically before substring matches', () => {
    const ranked = rankCandidates(
      [
        raw('user_id', 'column', 'scope'),
        raw('name', 'column', 'scope'),
        raw('identifier', 'column', 'scope'),
        raw('id', 'column', 'scope'),
      ],
      'id'
    )
    expect(texts(ranked)).toEqual(['id', 'identifier', 'user_id'])
    expect(ranked.map((c) => c.matchType)).toEqual(['prefix', 'prefix', 'contains'])
    expect(ranked.map((c) => c.priority)).toEqual([20400, 20400, 10400])
  })

  it('orders sources within a tier', () => {
    const ranked = rankCandidates(
      [raw('ORDER', 'keyword', 'keyword'), raw('orders', 'table', 'schema'), raw('order_id', 'column', 'scope')],
      'or'
    )
    expect(texts(ranked)).toEqual(['order_id', 'orders', 'ORDER'])
  })

  it('never lets a substring match outrank a prefix match', () => {
    const ranked = rankCandidates([raw('color', 'column', 'scope'), raw('ORDER', 'keyword', 'keyword')], 'or')
    expect(texts(ranked)).toEqual(['ORDER', 'color'])
  })

  it('keeps everything when nothing is typed', () => {
    const ranked = rankCandidates(
      [raw('SELECT', 'keyword', 'keyword'), raw('b', 'column', 'scope'), raw('a', 'column', 'scope'), raw('t', 'table', 'schema')],
      ''
    )
    expect(texts(ranked)).toEqual(['a', 'b', 't', 'SELECT'])
    expect(ranked.every((c) => c.matchType === 'none')).toBe(true)
  })

  it('compares names by code unit after lower-casing', () => {
    const ranked = rankCandidates([raw('b', 'column', 'scope'), raw('B_x', 'column', 'scope'), raw('a', 'column', 'scope')], '')
    expect(texts(ranked)).toEqual(['a', 'b', 'B_x'])
  })

  it('applies keyword casing to keywords and built-in functions only', () => {
    const candidates = [
      raw('SELECT', 'keyword', 'keyword'),
      raw('SUM', 'function', 'function'),
      raw('sum_udf', 'function', 'schema'),
      raw('Summary', 'column', 'scope'),
    ]
    expect(texts(rankCandidates(candidates, 's', { keywordCasing: 'auto' }))).toEqual([
      'Summary',
      'sum_udf',
      'sum',
      'select',
    ])
    expect(texts(rankCandidates(candidates, 'S', { keywordCasing: 'auto' }))).toEqual([
      'Summary',
      'sum_udf',
      'SUM',
      'SELECT',
    ])
    expect(texts(rankCandidates(candidates, 'S', { keywordCasing: 'lower' }))).toEqual([
      'Summary',
      'sum_udf',
      'sum',
      'select',
    ])
  })

  it('deduplicates by kind and text keeping the first', () => {
    const ranked = rankCandidates([raw('id', 'column', 'scope', 'a'), raw('id', 'column', 'scope', 'b')], '')
    expect(ranked).toEqual([{ text: 'id', kind: 'column', priority: 400, matchType: 'none', detail: 'a' }])
  })

  it('keeps the same text under different kinds', () => {
    const ranked = rankCandidates([raw('REPLACE', 'keyword', 'keyword'), raw('REPLACE', 'function', 'function')], 'rep')
    expect(ranked.map((c) => c.kind)).toEqual(['function', 'keyword'])
  })

  it('is deterministic', () => {
    const candidates = [raw('b', 'column', 'scope'), raw('a', 'table', 'schema'), raw('ABS', 'function', 'function')]
    expect(rankCandidates(candidates, '')).toEqual(rankCandidates(candidates, ''))
  })
})

describe('applyKeywordCasing', () => {
  it('follows the last typed character in auto mode', () => {
    expect(applyKeywordCasing('SELECT', 'auto', 'seL')).toBe('SELECT')
    expect(applyKeywordCasing('SELECT', 'auto', 'SEl')).toBe('select')
    expect(applyKeywordCasing('select', 'auto', '')).toBe('SELECT')
  })
})

describe('deduplicateCandidates', () => {
  it('removes later duplicates', () => {
    const a: Candidate = { text: 'x', kind: 'column', priority: 1, matchType: 'none' }
    const b: Candidate = { text: 'x', kind: 'column', priority: 0, matchType: 'none' }
    expect(deduplicateCandidates([a, b])).toEqual([a])
  })
})

describe('limitSuggestions', () => {
  it('keeps the first N', () => {
    const items: Candidate[] = ['a', 'b', 'c'].map((text): Candidate => ({ text, kind: 'column', priority: 0, matchType: 'none' }))
    expect(texts(limitSuggestions(items, 2))).toEqual(['a', 'b'])
  })
})
