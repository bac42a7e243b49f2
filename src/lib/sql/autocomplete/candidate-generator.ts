/**
 * Candidate Generator Module
 *
 * Turns each suggestion of a context into raw candidates, reading schema
 * facts from the metadata provider. No filtering or ordering happens here.
 */

import { refQualifier } from './scope-analyzer'
import {
  ALL_KEYWORDS,
  BUILTIN_FUNCTIONS,
  STATEMENT_KEYWORDS,
  isBuiltinFunction,
  isReservedWord,
} from '../completions'
import type {
  CompletionContext,
  MatchOptions,
  MetadataProvider,
  RawCandidate,
  SchemaObjectType,
  SpecialCommandVocabulary,
  Suggestion,
  TableRef,
} from './types'

const PLAIN_IDENTIFIER = /^[_a-zA-Z][_a-zA-Z0-9$]*$/

/**
 * Quote a schema name that would not survive as a bare identifier.
 */
export function escapeName(name: string): string {
  if (PLAIN_IDENTIFIER.test(name) && !isReservedWord(name)) {
    return name
  }
  return `"${name.replace(/"/g, '""')}"`
}

/**
 * Suggestion kinds that read from the schema snapshot.
 */
export function requiresSchema(suggestion: Suggestion): boolean {
  return suggestion.kind === 'table' || suggestion.kind === 'column' || suggestion.kind === 'pragma'
}

export function generateCandidates(
  context: CompletionContext,
  provider: MetadataProvider | null,
  options: MatchOptions = {}
): RawCandidate[] {
  const candidates: RawCandidate[] = []
  for (const suggestion of context.suggestions) {
    candidates.push(...generateForSuggestion(suggestion, provider, options))
  }
  return candidates
}

function generateForSuggestion(
  suggestion: Suggestion,
  provider: MetadataProvider | null,
  options: MatchOptions
): RawCandidate[] {
  switch (suggestion.kind) {
    case 'keyword':
      return keywordCandidates(suggestion.set === 'statement' ? STATEMENT_KEYWORDS : ALL_KEYWORDS)
    case 'table':
      return provider ? tableCandidates(provider, suggestion.schema, suggestion.objects) : []
    case 'column':
      return provider ? columnCandidates(provider, suggestion.scope) : []
    case 'alias':
      return aliasCandidates(suggestion.refs)
    case 'function':
      return functionCandidates(provider)
    case 'pragma':
      return provider ? pragmaCandidates(provider, suggestion.schema) : []
    case 'special':
      return suggestion.command === null ? specialCandidates(options.specialCommands) : []
    case 'unknown':
      return suggestion.reason === 'literal' ? [] : keywordCandidates(ALL_KEYWORDS)
  }
}

// ============================================================================
// PER-KIND GENERATORS
// ============================================================================

function keywordCandidates(keywords: readonly string[]): RawCandidate[] {
  return keywords.map((keyword) => ({
    type: 'keyword',
    name: keyword,
    text: keyword,
    source: 'keyword',
    fuzzy: false,
  }))
}

// Snapshots are read from this database's sqlite_master only
const SNAPSHOT_DATABASE = 'main'

function isKnownDatabase(provider: MetadataProvider, schema: string): boolean {
  const key = schema.toLowerCase()
  return provider.databases().some((name) => name.toLowerCase() === key)
}

function tableCandidates(
  provider: MetadataProvider,
  schema: string | null,
  objects: SchemaObjectType[]
): RawCandidate[] {
  if (schema !== null && schema.toLowerCase() !== SNAPSHOT_DATABASE) {
    return []
  }

  const sources: Record<SchemaObjectType, () => ReadonlySet<string>> = {
    table: () => provider.tables(),
    view: () => provider.views(),
    index: () => provider.indexes(),
  }

  const candidates: RawCandidate[] = []
  for (const objectType of objects) {
    for (const name of sources[objectType]()) {
      candidates.push({
        type: 'table',
        name,
        text: escapeName(name),
        source: 'schema',
        fuzzy: true,
        detail: objectType,
      })
    }
  }
  return candidates
}

function columnCandidates(provider: MetadataProvider, scope: TableRef[]): RawCandidate[] {
  const candidates: RawCandidate[] = []
  // Each reference is evaluated on its own, so two aliases of one table both contribute
  for (const ref of scope) {
    for (const column of provider.columns(ref.name)) {
      candidates.push({
        type: 'column',
        name: column,
        text: escapeName(column),
        source: 'scope',
        fuzzy: true,
        detail: refQualifier(ref),
      })
    }
  }
  return candidates
}

function aliasCandidates(refs: TableRef[]): RawCandidate[] {
  const candidates: RawCandidate[] = []
  for (const ref of refs) {
    if (ref.alias === null) continue
    candidates.push({
      type: 'alias',
      name: ref.alias,
      text: escapeName(ref.alias),
      source: 'scope',
      fuzzy: true,
      detail: ref.name,
    })
  }
  return candidates
}

function functionCandidates(provider: MetadataProvider | null): RawCandidate[] {
  const candidates: RawCandidate[] = BUILTIN_FUNCTIONS.map((name) => ({
    type: 'function',
    name,
    text: name,
    source: 'function',
    fuzzy: false,
  }))

  // Functions registered on the connection (extensions, user functions)
  for (const name of provider?.functions() ?? []) {
    if (isBuiltinFunction(name)) continue
    candidates.push({
      type: 'function',
      name,
      text: name,
      source: 'schema',
      fuzzy: true,
      detail: 'user',
    })
  }
  return candidates
}

function pragmaCandidates(provider: MetadataProvider, schema: string | null): RawCandidate[] {
  if (schema !== null && !isKnownDatabase(provider, schema)) {
    return []
  }
  return [...provider.pragmas()].map((name) => ({
    type: 'pragma',
    name,
    text: name,
    source: 'schema',
    fuzzy: true,
  }))
}

function specialCandidates(vocabulary: SpecialCommandVocabulary | undefined): RawCandidate[] {
  if (!vocabulary) return []
  return [...vocabulary].map(([command, spec]) => ({
    type: 'special',
    name: command,
    text: command,
    source: 'keyword',
    fuzzy: false,
    detail: spec.description,
  }))
}
