/**
 * Section Detector Module
 *
 * Classifies what the user is typing at the cursor. Walks the significant
 * tokens before the cursor backward and matches the nearest ones ("anchors")
 * against a fixed rule table. Rules are tried in order and the first that
 * applies wins; a rule may list several suggestion kinds, all of which are
 * offered. Every input yields a context.
 */

import {
  findTokenAtCursor,
  isInsideStringOrComment,
  isKeyword,
  isNameToken,
  isPunctuation,
  isWordToken,
  significantTokens,
  unquoteIdentifier,
} from './tokenizer'
import { detectStatementType } from './statement-splitter'
import { buildAliasMap, extractTableRefs, resolveQualifier } from './scope-analyzer'
import type {
  ClassifyOptions,
  CompletionContext,
  PartialWord,
  SchemaObjectType,
  SpecialCommandVocabulary,
  Statement,
  StatementType,
  Suggestion,
  Token,
} from './types'

// Clauses an expression can appear in
const COLUMN_CLAUSES = new Set([
  'SELECT', 'WHERE', 'SET', 'ON', 'HAVING', 'USING', 'RETURNING',
  'ORDER BY', 'GROUP BY', 'PARTITION BY',
])

// Keywords directly followed by an expression
const EXPRESSION_KEYWORDS = new Set([
  'SELECT', 'WHERE', 'SET', 'ON', 'HAVING', 'RETURNING',
  'ORDER BY', 'GROUP BY', 'PARTITION BY',
  'AND', 'OR', 'NOT', 'DISTINCT', 'CASE', 'WHEN', 'THEN', 'ELSE',
  'BETWEEN', 'LIKE', 'GLOB', 'IS', 'IN',
])

// Keywords the backward clause scan stops at
const CLAUSE_KEYWORDS = new Set([
  ...COLUMN_CLAUSES,
  'FROM', 'JOIN', 'INTO', 'UPDATE', 'VALUES', 'LIMIT', 'OFFSET',
  'PRAGMA', 'TABLE', 'UNION', 'INTERSECT', 'EXCEPT', 'WINDOW',
])

// Punctuation after which an expression operand is expected
const EXPRESSION_PUNCTUATION = new Set([
  ',', '(', '=', '==', '!=', '<>', '<', '>', '<=', '>=',
  '+', '-', '*', '/', '%', '||', '->', '->>', '&', '|', '<<', '>>', '~',
])

const TABLE_ARG_PRAGMAS = new Set(['table_info', 'table_xinfo', 'index_list', 'foreign_key_list', 'foreign_key_check'])
const INDEX_ARG_PRAGMAS = new Set(['index_info', 'index_xinfo'])

const TABLES_AND_VIEWS: SchemaObjectType[] = ['table', 'view']

interface ClauseInfo {
  /** Clause keyword, with ORDER/GROUP/PARTITION joined to BY */
  keyword: string | null
  index: number
  /** Index of the innermost unclosed `(` after the clause keyword, or -1 */
  openParen: number
}

interface DetectionState {
  statement: Statement
  anchors: Token[]
  clause: ClauseInfo
}

/**
 * Classify the completion context at the cursor.
 */
export function classify(
  statement: Statement,
  cursorPosition: number,
  options: ClassifyOptions = {}
): CompletionContext {
  const statementType = detectStatementType(statement)

  if (options.specialCommands && options.specialCommands.size > 0) {
    const special = classifySpecialCommand(statement, cursorPosition, options.specialCommands)
    if (special) return special
  }

  const tokens = statement.tokens
  const emptyWord: PartialWord = { text: '', start: cursorPosition, end: cursorPosition }

  if (isInsideStringOrComment(tokens, cursorPosition)) {
    return createContext([{ kind: 'unknown', reason: 'literal' }], emptyWord, null, statementType)
  }

  // Partial word at the cursor
  const cursorToken = findTokenAtCursor(tokens, cursorPosition)
  const atWord = cursorToken !== null && isWordToken(cursorToken)
  const word: PartialWord =
    atWord && cursorToken
      ? {
          text: unquoteIdentifier(cursorToken.value.slice(0, cursorPosition - cursorToken.start)),
          start: cursorToken.start,
          end: cursorPosition,
        }
      : emptyWord

  const significant = significantTokens(tokens)
  const before = significant.filter((t) => t.end <= word.start)
  const afterPosition = atWord && cursorToken ? cursorToken.end : cursorPosition
  const next = significant.find((t) => t.start >= afterPosition)

  // `qualifier.` directly before the word
  const dot = before[before.length - 1]
  const owner = before[before.length - 2]
  if (
    isPunctuation(dot, '.') &&
    dot.end === word.start &&
    owner !== undefined &&
    isWordToken(owner) &&
    owner.end === dot.start
  ) {
    const qualifier = unquoteIdentifier(owner.value)
    const anchors = before.slice(0, -2)
    return createContext(
      detectQualified(statement, anchors, qualifier),
      word,
      qualifier,
      statementType
    )
  }

  let suggestions = detectFromAnchors({ statement, anchors: before, clause: findClause(before) })

  // A word followed by `(` may be a function call
  if (isPunctuation(next, '(') && !suggestions.some((s) => s.kind === 'function')) {
    suggestions = [...suggestions, { kind: 'function' }]
  }

  return createContext(suggestions, word, null, statementType)
}

function createContext(
  suggestions: Suggestion[],
  word: PartialWord,
  qualifier: string | null,
  statementType: StatementType
): CompletionContext {
  return {
    kind: suggestions[0].kind,
    suggestions,
    word,
    qualifier,
    statementType,
  }
}

// ============================================================================
// SPECIAL COMMANDS
// ============================================================================

function classifySpecialCommand(
  statement: Statement,
  cursorPosition: number,
  vocabulary: SpecialCommandVocabulary
): CompletionContext | null {
  const before = statement.text.slice(0, cursorPosition - statement.start)
  const typed = before.trimStart()
  const sigils = new Set(
    [...vocabulary.keys()].map((command) => command[0]).filter((ch) => !/[\w\s]/.test(ch))
  )
  if (typed.length === 0 || !sigils.has(typed[0])) return null

  const commandStart = statement.start + (before.length - typed.length)
  const space = typed.search(/\s/)

  // Still typing the command itself
  if (space === -1) {
    return createContext(
      [{ kind: 'special', command: null }],
      { text: typed, start: commandStart, end: cursorPosition },
      null,
      'SPECIAL'
    )
  }

  const command = typed.slice(0, space).replace(/[+-]$/, '')
  const spec = vocabulary.get(command) ?? vocabulary.get(command.toLowerCase())
  const argument = /\S*$/.exec(typed)?.[0] ?? ''
  const word: PartialWord = { text: argument, start: cursorPosition - argument.length, end: cursorPosition }

  switch (spec?.expectedArgKind) {
    case 'table':
      return createContext([{ kind: 'table', schema: null, objects: TABLES_AND_VIEWS }], word, null, 'SPECIAL')
    case 'view':
      return createContext([{ kind: 'table', schema: null, objects: ['view'] }], word, null, 'SPECIAL')
    case 'index':
      return createContext([{ kind: 'table', schema: null, objects: ['index'] }], word, null, 'SPECIAL')
    default:
      return createContext([{ kind: 'special', command }], word, null, 'SPECIAL')
  }
}

// ============================================================================
// QUALIFIED WORDS
// ============================================================================

function detectQualified(statement: Statement, anchors: Token[], qualifier: string): Suggestion[] {
  const target = tableTarget(anchors, findClause(anchors))
  if (target) {
    return [{ kind: 'table', schema: qualifier, objects: target }]
  }

  if (isKeyword(anchors[anchors.length - 1], 'PRAGMA')) {
    return [{ kind: 'pragma', schema: qualifier }]
  }

  const refs = extractTableRefs(statement)
  const ref = resolveQualifier(qualifier, refs, buildAliasMap(refs))
  return [{ kind: 'column', scope: [ref] }]
}

// ============================================================================
// ANCHOR RULES
// ============================================================================

function detectFromAnchors(state: DetectionState): Suggestion[] {
  const { anchors, clause } = state
  const last = anchors[anchors.length - 1]
  const prev = anchors[anchors.length - 2]

  // Statement start
  if (last === undefined) {
    return [{ kind: 'keyword', set: 'statement' }]
  }

  const target = tableTarget(anchors, clause)
  if (target) {
    return [{ kind: 'table', schema: null, objects: target }]
  }

  // Subquery in FROM
  if (isPunctuation(last, '(') && isKeyword(prev, 'FROM', 'JOIN')) {
    return [{ kind: 'keyword', set: 'statement' }]
  }

  // PRAGMA table_info(
  if (clause.keyword === 'PRAGMA' && isPunctuation(last, '(') && isNameToken(prev)) {
    const pragma = unquoteIdentifier(prev.value).toLowerCase()
    if (TABLE_ARG_PRAGMAS.has(pragma)) return [{ kind: 'table', schema: null, objects: ['table'] }]
    if (INDEX_ARG_PRAGMAS.has(pragma)) return [{ kind: 'table', schema: null, objects: ['index'] }]
    return [{ kind: 'unknown', reason: 'no-rule' }]
  }

  // INSERT INTO t (a, |
  const insertColumns = insertColumnScope(state)
  if (insertColumns) {
    return insertColumns
  }

  if (isKeyword(last, 'PRAGMA')) {
    return [{ kind: 'pragma', schema: null }]
  }

  const keyword = anchorKeyword(anchors, anchors.length - 1)
  if (keyword !== null && EXPRESSION_KEYWORDS.has(keyword)) {
    return columnSuggestions(state.statement)
  }

  if (
    last.type === 'punctuation' &&
    EXPRESSION_PUNCTUATION.has(last.value) &&
    clause.keyword !== null &&
    COLUMN_CLAUSES.has(clause.keyword)
  ) {
    return columnSuggestions(state.statement)
  }

  // Completed name or value: the next clause keyword is likely
  if (
    isNameToken(last) ||
    last.type === 'number' ||
    last.type === 'string' ||
    isPunctuation(last, ')')
  ) {
    return [{ kind: 'keyword', set: 'all' }]
  }

  return [{ kind: 'unknown', reason: 'no-rule' }]
}

/**
 * Object types expected right after the anchors, or null if no table is expected.
 */
function tableTarget(anchors: Token[], clause: ClauseInfo): SchemaObjectType[] | null {
  const n = anchors.length
  const last = anchors[n - 1]
  const prev = anchors[n - 2]
  const prev2 = anchors[n - 3]
  if (last === undefined) return null

  if (isKeyword(last, 'FROM', 'JOIN', 'INTO', 'UPDATE')) {
    return TABLES_AND_VIEWS
  }

  if (isKeyword(last, 'TABLE')) {
    const creating =
      isKeyword(prev, 'CREATE', 'VIRTUAL') ||
      (isKeyword(prev, 'TEMP', 'TEMPORARY') && isKeyword(prev2, 'CREATE'))
    return creating ? null : ['table']
  }

  if (isKeyword(last, 'VIEW')) {
    return isKeyword(prev, 'DROP') ? ['view'] : null
  }

  if (isKeyword(last, 'INDEX')) {
    return isKeyword(prev, 'DROP') ? ['index'] : null
  }

  if (isKeyword(last, 'REINDEX', 'ANALYZE')) {
    return ['table', 'index']
  }

  if (isKeyword(last, 'BY') && isKeyword(prev, 'INDEXED')) {
    return ['index']
  }

  // DROP TABLE IF EXISTS
  if (isKeyword(last, 'EXISTS') && isKeyword(prev, 'IF')) {
    return tableTarget(anchors.slice(0, -2), findClause(anchors.slice(0, -2)))
  }

  // CREATE INDEX name ON
  if (
    isKeyword(last, 'ON') &&
    isKeyword(anchors[0], 'CREATE') &&
    anchors.some((t) => isKeyword(t, 'INDEX'))
  ) {
    return ['table']
  }

  if (isPunctuation(last, ',') && (clause.keyword === 'FROM' || clause.keyword === 'JOIN')) {
    return TABLES_AND_VIEWS
  }

  return null
}

function insertColumnScope(state: DetectionState): Suggestion[] | null {
  const { anchors, clause, statement } = state
  const last = anchors[anchors.length - 1]
  if (clause.keyword !== 'INTO' || clause.openParen === -1) return null
  if (!isPunctuation(last, '(', ',')) return null

  const tableToken = anchors[clause.openParen - 1]
  if (!isNameToken(tableToken)) return null

  const name = unquoteIdentifier(tableToken.value)
  const refs = extractTableRefs(statement)
  const ref = refs.find((r) => r.source === 'into' && r.name === name) ?? {
    name,
    schema: null,
    alias: null,
    source: 'into' as const,
  }
  return [{ kind: 'column', scope: [ref] }]
}

function columnSuggestions(statement: Statement): Suggestion[] {
  const refs = extractTableRefs(statement)
  return [
    { kind: 'column', scope: refs },
    { kind: 'function' },
    { kind: 'alias', refs: refs.filter((ref) => ref.alias !== null) },
    { kind: 'table', schema: null, objects: TABLES_AND_VIEWS },
    { kind: 'keyword', set: 'all' },
  ]
}

// ============================================================================
// CLAUSE SCAN
// ============================================================================

/**
 * Keyword at `index`, joining BY with a preceding ORDER, GROUP or PARTITION.
 */
function anchorKeyword(tokens: Token[], index: number): string | null {
  const keyword = tokens[index]?.keyword
  if (keyword === undefined) return null
  if (keyword === 'BY') {
    const before = tokens[index - 1]?.keyword
    if (before === 'ORDER' || before === 'GROUP' || before === 'PARTITION') {
      return `${before} BY`
    }
  }
  return keyword
}

/**
 * Find the clause the cursor is in, skipping balanced parenthesized groups.
 */
function findClause(tokens: Token[]): ClauseInfo {
  let depth = 0
  let openParen = -1

  for (let i = tokens.length - 1; i >= 0; i--) {
    const token = tokens[i]
    if (isPunctuation(token, ')')) {
      depth++
      continue
    }
    if (isPunctuation(token, '(')) {
      if (depth > 0) depth--
      else if (openParen === -1) openParen = i
      continue
    }
    if (depth > 0) continue

    const keyword = anchorKeyword(tokens, i)
    if (keyword !== null && CLAUSE_KEYWORDS.has(keyword)) {
      return { keyword, index: i, openParen }
    }
  }

  return { keyword: null, index: -1, openParen }
}
