/**
 * Statement Splitter Module
 *
 * Groups tokens into statements on `;`. Terminators inside strings, quoted
 * identifiers and comments never reach this stage as punctuation, and the
 * body of a CREATE TRIGGER (BEGIN ... END) is kept in one statement.
 */

import { isKeyword, isPunctuation, isSignificant } from './tokenizer'
import type { Statement, StatementType, Token } from './types'

function createStatement(tokens: Token[], sql: string, start: number, end: number, terminated: boolean): Statement {
  return { tokens, start, end, text: sql.slice(start, end), terminated }
}

/**
 * Split a token stream into statements.
 *
 * A trailing statement after the last terminator always exists (possibly
 * empty), so the result is never empty.
 */
export function splitStatements(tokens: Token[], sql: string): Statement[] {
  const statements: Statement[] = []
  let statementStart = 0
  let currentTokens: Token[] = []

  // Trigger body tracking
  let firstKeyword: string | null = null
  let sawTrigger = false
  let blockDepth = 0

  for (const token of tokens) {
    if (isPunctuation(token, ';') && blockDepth === 0) {
      statements.push(createStatement(currentTokens, sql, statementStart, token.end, true))
      statementStart = token.end
      currentTokens = []
      firstKeyword = null
      sawTrigger = false
      continue
    }

    currentTokens.push(token)
    if (!isSignificant(token)) continue

    if (firstKeyword === null) {
      firstKeyword = token.keyword ?? ''
    }
    if (firstKeyword === 'CREATE' && isKeyword(token, 'TRIGGER')) {
      sawTrigger = true
    }
    if (sawTrigger) {
      if (isKeyword(token, 'BEGIN') || (blockDepth > 0 && isKeyword(token, 'CASE'))) {
        blockDepth++
      } else if (blockDepth > 0 && isKeyword(token, 'END')) {
        blockDepth--
      }
    }
  }

  statements.push(createStatement(currentTokens, sql, statementStart, sql.length, false))
  return statements
}

/**
 * Statement whose [start, end) contains the cursor, or the last statement.
 */
export function statementAt(statements: Statement[], cursorPosition: number): Statement {
  for (const statement of statements) {
    if (cursorPosition >= statement.start && cursorPosition < statement.end) {
      return statement
    }
  }
  return statements[statements.length - 1]
}

const STATEMENT_TYPES: Record<string, StatementType> = {
  SELECT: 'SELECT',
  VALUES: 'SELECT',
  INSERT: 'INSERT',
  REPLACE: 'INSERT',
  UPDATE: 'UPDATE',
  DELETE: 'DELETE',
  WITH: 'WITH',
  CREATE: 'CREATE',
  ALTER: 'ALTER',
  DROP: 'DROP',
  PRAGMA: 'PRAGMA',
  ATTACH: 'ATTACH',
  DETACH: 'DETACH',
}

/**
 * Classify a statement by its leading token.
 */
export function detectStatementType(statement: Statement): StatementType {
  const first = statement.tokens.find(isSignificant)
  if (!first) return 'UNKNOWN'
  if (isPunctuation(first, '.', '\\')) return 'SPECIAL'
  if (first.keyword === undefined) return 'OTHER'
  return STATEMENT_TYPES[first.keyword] ?? 'OTHER'
}
