/**
 * Autocomplete Pipeline Orchestrator
 *
 * Coordinates all modules to produce autocomplete suggestions:
 * SQL + Cursor → Tokenize → Split → Classify (+ aliases) → GenerateCandidates → Rank
 */

import type {
  AutocompleteInput,
  AutocompleteOutput,
  Candidate,
  CompletionContext,
  MatchOptions,
  MetadataProvider,
  SchemaSnapshot,
} from './types'
import { tokenize } from './tokenizer'
import { splitStatements, statementAt } from './statement-splitter'
import { classify } from './section-detector'
import { generateCandidates, requiresSchema } from './candidate-generator'
import { rankCandidates } from './ranker'
import { CompletionError } from './errors'
import { createMetadataProvider } from '../../schema-store'

export interface PipelineOptions extends MatchOptions {
  /** Enable timing measurements */
  measureTiming?: boolean
}

const DEFAULT_OPTIONS: PipelineOptions = {
  keywordCasing: 'upper',
  substringMatching: true,
  measureTiming: false,
}

/**
 * Candidates for a classified context.
 *
 * Throws `NoSchema` when the context needs schema facts and there is no
 * provider; an empty provider is fine.
 */
export function match(
  context: CompletionContext,
  partialWord: string,
  provider: MetadataProvider | null,
  options: MatchOptions = {}
): Candidate[] {
  if (provider === null && context.suggestions.some(requiresSchema)) {
    throw new CompletionError('NoSchema', 'Schema metadata is not loaded')
  }
  const candidates = generateCandidates(context, provider, options)
  return rankCandidates(candidates, partialWord, options)
}

/**
 * Run the complete autocomplete pipeline.
 */
export function runAutocompletePipeline(
  input: AutocompleteInput,
  options?: PipelineOptions
): AutocompleteOutput {
  const opts = { ...DEFAULT_OPTIONS, ...options }
  const { sql, cursorPosition } = input

  if (!Number.isInteger(cursorPosition) || cursorPosition < 0 || cursorPosition > sql.length) {
    throw new CompletionError(
      'OutOfRange',
      `Cursor position ${cursorPosition} is outside [0, ${sql.length}]`
    )
  }

  const timing: AutocompleteOutput['timing'] = opts.measureTiming
    ? { tokenize: 0, split: 0, classify: 0, match: 0, total: 0 }
    : undefined
  const now = () => (opts.measureTiming ? performance.now() : 0)
  const totalStart = now()

  // 1. Tokenize
  let start = now()
  const tokens = tokenize(sql)
  if (timing) timing.tokenize = now() - start

  // 2. Pick the statement under the cursor
  start = now()
  const statement = statementAt(splitStatements(tokens, sql), cursorPosition)
  if (timing) timing.split = now() - start

  // 3. Classify
  start = now()
  const context = classify(statement, cursorPosition, { specialCommands: opts.specialCommands })
  if (timing) timing.classify = now() - start

  // 4. Generate and rank
  start = now()
  const provider = input.schema ? createMetadataProvider(input.schema) : null
  const suggestions = match(context, context.word.text, provider, opts)
  if (timing) timing.match = now() - start

  if (timing) timing.total = now() - totalStart

  return { suggestions, context, statement, timing }
}

/**
 * Create a configured pipeline runner.
 */
export function createPipeline(defaultOptions?: PipelineOptions) {
  return (input: AutocompleteInput, overrideOptions?: PipelineOptions) => {
    return runAutocompletePipeline(input, { ...defaultOptions, ...overrideOptions })
  }
}

/**
 * Convenience function for quick autocomplete.
 */
export function autocomplete(
  sql: string,
  cursorPosition: number,
  schema: SchemaSnapshot | null
): AutocompleteOutput {
  return runAutocompletePipeline({ sql, cursorPosition, schema })
}
