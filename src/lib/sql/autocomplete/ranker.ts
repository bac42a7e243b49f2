/**
 * Ranker Module
 *
 * Ranking strategy:
 * - When the user is typing, match quality is the primary criterion
 * - Match tiers: prefix > contains (never cross tiers)
 * - Within a tier, candidates from the statement's own tables come first,
 *   then schema objects, functions, keywords
 * - Remaining ties are alphabetical by name, lower-cased, compared by code unit
 * - With nothing typed there is no filtering and only the source order applies
 */

import type {
  Candidate,
  CandidateSource,
  CandidateType,
  KeywordCasing,
  MatchType,
  RawCandidate,
} from './types'

// Tier values are spaced wider than any source bonus
const MATCH_TIER: Record<MatchType, number> = {
  prefix: 20000,
  contains: 10000,
  none: 0,
}

const SOURCE_PRIORITY: Record<CandidateSource, number> = {
  scope: 400, // columns and aliases of the statement's tables
  schema: 300, // tables, views, indexes, pragmas, user functions
  function: 200, // built-in functions
  keyword: 100, // keywords, special commands
}

export interface RankingOptions {
  keywordCasing?: KeywordCasing
  substringMatching?: boolean
}

/**
 * How `name` matches the partial word, or null for no match.
 * An empty partial word matches everything with type `none`.
 */
export function computeMatchType(name: string, partial: string): MatchType | null {
  if (partial === '') return 'none'
  const lowerName = name.toLowerCase()
  const lowerPartial = partial.toLowerCase()
  if (lowerName.startsWith(lowerPartial)) return 'prefix'
  if (lowerName.includes(lowerPartial)) return 'contains'
  return null
}

/**
 * Whether a candidate survives filtering. Substring matches only count for
 * candidates that allow them.
 */
export function isMatch(candidate: RawCandidate, partial: string, substringMatching = true): boolean {
  const matchType = computeMatchType(candidate.name, partial)
  if (matchType === null) return false
  if (matchType === 'contains') return substringMatching && candidate.fuzzy
  return true
}

export function scoreCandidate(candidate: RawCandidate, matchType: MatchType): number {
  return MATCH_TIER[matchType] + SOURCE_PRIORITY[candidate.source]
}

function usesKeywordCasing(type: CandidateType, source: CandidateSource): boolean {
  return type === 'keyword' || (type === 'function' && source === 'function')
}

/**
 * Apply keyword casing. `auto` follows the last typed character: lower-case
 * when it is a lower-case letter, upper-case otherwise.
 */
export function applyKeywordCasing(text: string, casing: KeywordCasing, partial: string): string {
  if (casing === 'upper') return text.toUpperCase()
  if (casing === 'lower') return text.toLowerCase()
  const last = partial.slice(-1)
  const typedLower = last !== last.toUpperCase()
  return typedLower ? text.toLowerCase() : text.toUpperCase()
}

/**
 * Sort order: priority, then name, then text.
 */
function compareRanked(a: RankedEntry, b: RankedEntry): number {
  if (a.candidate.priority !== b.candidate.priority) {
    return b.candidate.priority - a.candidate.priority
  }
  if (a.sortKey !== b.sortKey) return a.sortKey < b.sortKey ? -1 : 1
  if (a.candidate.text !== b.candidate.text) return a.candidate.text < b.candidate.text ? -1 : 1
  return 0
}

interface RankedEntry {
  candidate: Candidate
  sortKey: string
}

/**
 * Filter, score, sort and deduplicate raw candidates.
 */
export function rankCandidates(
  candidates: RawCandidate[],
  partial: string,
  options: RankingOptions = {}
): Candidate[] {
  const casing = options.keywordCasing ?? 'upper'
  const substringMatching = options.substringMatching ?? true

  const ranked: RankedEntry[] = []
  for (const raw of candidates) {
    if (!isMatch(raw, partial, substringMatching)) continue
    const matchType = computeMatchType(raw.name, partial) ?? 'none'

    const candidate: Candidate = {
      text: usesKeywordCasing(raw.type, raw.source)
        ? applyKeywordCasing(raw.text, casing, partial)
        : raw.text,
      kind: raw.type,
      priority: scoreCandidate(raw, matchType),
      matchType,
    }
    if (raw.detail !== undefined) candidate.detail = raw.detail
    ranked.push({ candidate, sortKey: raw.name.toLowerCase() })
  }

  ranked.sort(compareRanked)
  return deduplicateCandidates(ranked.map((entry) => entry.candidate))
}

/**
 * Keep the first candidate for each (text, kind).
 */
export function deduplicateCandidates(candidates: Candidate[]): Candidate[] {
  const seen = new Set<string>()
  const result: Candidate[] = []
  for (const candidate of candidates) {
    const key = `${candidate.kind}\u0000${candidate.text}`
    if (seen.has(key)) continue
    seen.add(key)
    result.push(candidate)
  }
  return result
}

/**
 * Limit the number of suggestions returned.
 */
export function limitSuggestions(candidates: Candidate[], maxResults: number): Candidate[] {
  return candidates.slice(0, maxResults)
}
