/**
 * Autocomplete Pipeline Types
 *
 * This file defines all interfaces for the modular autocomplete pipeline:
 * SQL + Cursor → Tokenizer → StatementSplitter → SectionDetector (+ ScopeAnalyzer) → CandidateGenerator → Ranker
 */

import type { MetadataProvider, SchemaSnapshot } from '../../schema-store'

// ============================================================================
// 1. TOKENIZER TYPES
// ============================================================================

export type TokenType =
  | 'keyword'
  | 'identifier'
  | 'quoted_identifier'
  | 'string'
  | 'number'
  | 'punctuation'
  | 'comment'
  | 'whitespace'

export interface Token {
  type: TokenType
  /** Original text, quotes included */
  value: string
  start: number
  end: number
  /** Upper-cased form, set on keyword tokens only */
  keyword?: string
  /** Set on strings, quoted identifiers and block comments that run to the end of the buffer */
  unterminated?: boolean
}

// ============================================================================
// 2. STATEMENT SPLITTER TYPES
// ============================================================================

export interface Statement {
  /** Tokens of the statement, terminator excluded */
  tokens: Token[]
  start: number
  /** Exclusive; includes the terminating `;` when there is one */
  end: number
  text: string
  terminated: boolean
}

export type StatementType =
  | 'SELECT'
  | 'INSERT'
  | 'UPDATE'
  | 'DELETE'
  | 'WITH'
  | 'CREATE'
  | 'ALTER'
  | 'DROP'
  | 'PRAGMA'
  | 'ATTACH'
  | 'DETACH'
  | 'SPECIAL'
  | 'OTHER'
  | 'UNKNOWN'

// ============================================================================
// 3. SCOPE TYPES
// ============================================================================

export interface TableRef {
  /** Unquoted table name, original casing */
  name: string
  schema: string | null
  /** Unquoted alias, original casing */
  alias: string | null
  source: 'from' | 'join' | 'update' | 'into' | 'qualifier'
}

/** Alias (lower-cased) → table reference */
export type AliasMap = Map<string, TableRef>

// ============================================================================
// 4. SECTION DETECTOR TYPES
// ============================================================================

export type SchemaObjectType = 'table' | 'view' | 'index'

export type SpecialArgKind = 'none' | 'table' | 'view' | 'index' | 'text'

export interface SpecialCommandSpec {
  name: string
  expectedArgKind: SpecialArgKind
  description: string
}

/** Sigil-prefixed command text (`.tables`, `\dt`) → command spec */
export type SpecialCommandVocabulary = ReadonlyMap<string, SpecialCommandSpec>

export type Suggestion =
  | { kind: 'keyword'; set: 'statement' | 'all' }
  | { kind: 'table'; schema: string | null; objects: SchemaObjectType[] }
  | { kind: 'column'; scope: TableRef[] }
  | { kind: 'alias'; refs: TableRef[] }
  | { kind: 'function' }
  | { kind: 'pragma'; schema: string | null }
  | { kind: 'special'; command: string | null }
  | { kind: 'unknown'; reason: 'literal' | 'no-rule' }

export type ContextKind = Suggestion['kind']

export interface PartialWord {
  /** Unquoted text typed so far */
  text: string
  /** Replacement range in the buffer */
  start: number
  end: number
}

export interface CompletionContext {
  /** Kind of the first suggestion */
  kind: ContextKind
  suggestions: Suggestion[]
  word: PartialWord
  /** Text before `.` for `alias.col` style words */
  qualifier: string | null
  statementType: StatementType
}

export interface ClassifyOptions {
  specialCommands?: SpecialCommandVocabulary
}

// ============================================================================
// 5. CANDIDATE TYPES
// ============================================================================

export type CandidateType = 'keyword' | 'table' | 'column' | 'alias' | 'function' | 'pragma' | 'special'

/** Where a candidate comes from, used as the in-tier tiebreaker */
export type CandidateSource = 'scope' | 'schema' | 'function' | 'keyword'

export interface RawCandidate {
  type: CandidateType
  /** Unquoted name, matched against the partial word */
  name: string
  /** Text inserted on acceptance */
  text: string
  source: CandidateSource
  /** Whether a substring-only match is accepted */
  fuzzy: boolean
  detail?: string
}

export type MatchType = 'prefix' | 'contains' | 'none'

export interface Candidate {
  text: string
  kind: CandidateType
  priority: number
  matchType: MatchType
  detail?: string
}

export type KeywordCasing = 'upper' | 'lower' | 'auto'

export interface MatchOptions {
  keywordCasing?: KeywordCasing
  /** Allow substring matches for schema-derived candidates */
  substringMatching?: boolean
  specialCommands?: SpecialCommandVocabulary
}

// ============================================================================
// 6. PIPELINE I/O TYPES
// ============================================================================

export interface AutocompleteInput {
  sql: string
  cursorPosition: number
  schema: SchemaSnapshot | null
}

export interface AutocompleteOutput {
  suggestions: Candidate[]
  context: CompletionContext
  statement: Statement
  timing?: {
    tokenize: number
    split: number
    classify: number
    match: number
    total: number
  }
}

export type { MetadataProvider, SchemaSnapshot }
