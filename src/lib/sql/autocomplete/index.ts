/**
 * SQL Autocomplete Pipeline
 *
 * A modular autocomplete system for SQLite with:
 * - Error-tolerant tokenizing (handles incomplete SQL)
 * - Statement splitting with offsets
 * - Anchor-based context classification
 * - Alias resolution for `alias.column`
 * - Candidate generation and ranking
 *
 * @example
 * ```ts
 * import { autocomplete } from './autocomplete'
 *
 * const result = autocomplete(
 *   'SELECT  FROM users',
 *   7, // cursor after "SELECT "
 *   snapshot
 * )
 *
 * console.log(result.suggestions) // [{ text: 'id', kind: 'column', ... }, ...]
 * console.log(result.context.kind) // 'column'
 * ```
 */

// Pipeline
export { runAutocompletePipeline, createPipeline, autocomplete, match } from './pipeline'
export type { PipelineOptions } from './pipeline'

// Errors
export { CompletionError, isCompletionError } from './errors'
export type { CompletionErrorKind } from './errors'

// Types
export type {
  // Token types
  Token,
  TokenType,
  // Statement types
  Statement,
  StatementType,
  // Scope types
  TableRef,
  AliasMap,
  // Context types
  Suggestion,
  ContextKind,
  CompletionContext,
  PartialWord,
  SchemaObjectType,
  SpecialArgKind,
  SpecialCommandSpec,
  SpecialCommandVocabulary,
  ClassifyOptions,
  // Candidate types
  CandidateType,
  CandidateSource,
  RawCandidate,
  Candidate,
  MatchType,
  MatchOptions,
  KeywordCasing,
  // Input/Output types
  AutocompleteInput,
  AutocompleteOutput,
} from './types'

// Module functions (for unit testing and advanced usage)
export {
  tokenize,
  significantTokens,
  unquoteIdentifier,
  findTokenAtCursor,
  isInsideStringOrComment,
} from './tokenizer'
export { splitStatements, statementAt, detectStatementType } from './statement-splitter'
export { classify } from './section-detector'
export { resolveAliases, extractTableRefs, resolveQualifier } from './scope-analyzer'
export { generateCandidates, escapeName, requiresSchema } from './candidate-generator'
export {
  rankCandidates,
  deduplicateCandidates,
  limitSuggestions,
  computeMatchType,
  isMatch,
} from './ranker'
