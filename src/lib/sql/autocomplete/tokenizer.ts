/**
 * SQL Tokenizer Module
 *
 * Hand-written scanner for SQLite text. It never throws: strings, quoted
 * identifiers and block comments left open at the end of the buffer become a
 * single token running to the end, flagged `unterminated`.
 */

import { NAME_KEYWORDS, RESERVED_WORDS } from '../completions'
import type { Token, TokenType } from './types'

// Longest first so `->>` wins over `->`
const MULTI_CHAR_OPERATORS = ['->>', '||', '<=', '>=', '<>', '!=', '==', '<<', '>>', '->']

const QUOTE_CLOSERS: Record<string, string> = {
  '"': '"',
  '`': '`',
  '[': ']',
}

const WORD_START = /[\p{L}_]/u
const WORD_PART = /[\p{L}\p{N}_$]/u
const NUMBER = /^(?:0[xX][0-9a-fA-F]+|(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?)/

/**
 * Split SQL text into typed tokens covering every character of the input.
 */
export function tokenize(sql: string): Token[] {
  const tokens: Token[] = []
  let pos = 0

  const push = (type: TokenType, end: number, unterminated = false) => {
    const token: Token = { type, value: sql.slice(pos, end), start: pos, end }
    if (unterminated) token.unterminated = true
    if (type === 'keyword') token.keyword = token.value.toUpperCase()
    tokens.push(token)
    pos = end
  }

  while (pos < sql.length) {
    const ch = sql[pos]
    const next = sql[pos + 1] ?? ''

    // Whitespace
    if (/\s/.test(ch)) {
      let end = pos + 1
      while (end < sql.length && /\s/.test(sql[end])) end++
      push('whitespace', end)
      continue
    }

    // -- line comment, newline excluded
    if (ch === '-' && next === '-') {
      const newline = sql.indexOf('\n', pos)
      push('comment', newline === -1 ? sql.length : newline)
      continue
    }

    // /* block comment */
    if (ch === '/' && next === '*') {
      const close = sql.indexOf('*/', pos + 2)
      if (close === -1) push('comment', sql.length, true)
      else push('comment', close + 2)
      continue
    }

    // 'string' and X'blob'
    if (ch === "'" || ((ch === 'x' || ch === 'X') && next === "'")) {
      const { end, closed } = scanQuoted(sql, ch === "'" ? pos : pos + 1, "'")
      push('string', end, !closed)
      continue
    }

    // "identifier", `identifier`, [identifier]
    const closer = QUOTE_CLOSERS[ch]
    if (closer) {
      const { end, closed } = scanQuoted(sql, pos, closer)
      push('quoted_identifier', end, !closed)
      continue
    }

    // Numbers, including `.5`
    if (/\d/.test(ch) || (ch === '.' && /\d/.test(next))) {
      const match = NUMBER.exec(sql.slice(pos))
      const length = match ? match[0].length : 1
      push('number', pos + length)
      continue
    }

    // Words
    if (WORD_START.test(ch)) {
      let end = pos + 1
      while (end < sql.length && WORD_PART.test(sql[end])) end++
      const word = sql.slice(pos, end).toUpperCase()
      push(RESERVED_WORDS.has(word) ? 'keyword' : 'identifier', end)
      continue
    }

    const operator = MULTI_CHAR_OPERATORS.find((op) => sql.startsWith(op, pos))
    push('punctuation', pos + (operator ? operator.length : 1))
  }

  return tokens
}

/**
 * Scan a quoted run starting at `start` (the opening quote). A doubled closer
 * is an escaped quote, except for `]` which cannot be escaped.
 */
function scanQuoted(sql: string, start: number, closer: string): { end: number; closed: boolean } {
  let i = start + 1
  while (i < sql.length) {
    if (sql[i] === closer) {
      if (closer !== ']' && sql[i + 1] === closer) {
        i += 2
        continue
      }
      return { end: i + 1, closed: true }
    }
    i++
  }
  return { end: sql.length, closed: false }
}

// ============================================================================
// TOKEN HELPERS
// ============================================================================

export function isSignificant(token: Token): boolean {
  return token.type !== 'whitespace' && token.type !== 'comment'
}

/**
 * Drop whitespace and comments.
 */
export function significantTokens(tokens: Token[]): Token[] {
  return tokens.filter(isSignificant)
}

/**
 * Tokens that can hold a name being typed.
 */
export function isWordToken(token: Token): boolean {
  return (
    token.type === 'identifier' ||
    token.type === 'keyword' ||
    token.type === 'quoted_identifier'
  )
}

/**
 * Identifiers and quoted identifiers; keywords are not names.
 */
export function isNameToken(token: Token | undefined): token is Token & { type: 'identifier' | 'quoted_identifier' } {
  return token !== undefined && (token.type === 'identifier' || token.type === 'quoted_identifier')
}

/**
 * Names, plus the keywords SQLite falls back to reading as a name
 * (`plan`, `key`, `temp`).
 */
export function isNameLike(token: Token | undefined): token is Token {
  if (isNameToken(token)) return true
  return token !== undefined && token.keyword !== undefined && NAME_KEYWORDS.has(token.keyword)
}

export function isKeyword(token: Token | undefined, ...keywords: string[]): boolean {
  if (token === undefined || token.keyword === undefined) return false
  return keywords.length === 0 || keywords.includes(token.keyword)
}

export function isPunctuation(token: Token | undefined, ...values: string[]): boolean {
  return token !== undefined && token.type === 'punctuation' && values.includes(token.value)
}

/**
 * Strip identifier quotes and undo doubled-quote escapes.
 * Unterminated quotes are tolerated.
 */
export function unquoteIdentifier(text: string): string {
  const open = text[0]
  const closer = open === undefined ? undefined : QUOTE_CLOSERS[open]
  if (!closer) return text

  let inner = text.slice(1)
  if (inner.length > 0 && inner.endsWith(closer)) {
    inner = inner.slice(0, -1)
  }
  return closer === ']' ? inner : inner.split(closer + closer).join(closer)
}

/**
 * The token containing the cursor, or ending right at it.
 * A token starting at the cursor is not returned.
 */
export function findTokenAtCursor(tokens: Token[], cursorPosition: number): Token | null {
  let found: Token | null = null
  for (const token of tokens) {
    if (token.start >= cursorPosition) break
    if (cursorPosition <= token.end) found = token
  }
  return found
}

/**
 * True when the cursor sits inside a string literal or comment.
 * The position right after a closed string or block comment is outside;
 * the end of a line comment is still inside it.
 */
export function isInsideStringOrComment(tokens: Token[], cursorPosition: number): boolean {
  const token = findTokenAtCursor(tokens, cursorPosition)
  if (!token || (token.type !== 'string' && token.type !== 'comment')) {
    return false
  }
  if (cursorPosition < token.end) return true
  if (token.unterminated) return true
  return token.type === 'comment' && token.value.startsWith('--')
}
