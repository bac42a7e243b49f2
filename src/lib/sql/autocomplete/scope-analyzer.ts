/**
 * Scope Analyzer Module
 *
 * Finds the tables a statement references (FROM, JOIN, UPDATE, INSERT INTO)
 * and the aliases bound to them, so `t.col` can be resolved to a table.
 * Works on the whole statement, including text after the cursor, and never
 * validates: whatever looks like a table reference is taken as one.
 */

import {
  isKeyword,
  isNameLike,
  isPunctuation,
  significantTokens,
  unquoteIdentifier,
} from './tokenizer'
import type { AliasMap, Statement, TableRef, Token } from './types'

const REF_INTRODUCERS: Record<string, TableRef['source']> = {
  FROM: 'from',
  JOIN: 'join',
  UPDATE: 'update',
  INTO: 'into',
}

/**
 * Extract table references in statement order.
 */
export function extractTableRefs(statement: Statement): TableRef[] {
  const tokens = significantTokens(statement.tokens)
  const refs: TableRef[] = []

  for (let i = 0; i < tokens.length; i++) {
    const keyword = tokens[i].keyword
    const source = keyword === undefined ? undefined : REF_INTRODUCERS[keyword]
    if (!source) continue

    let j = i + 1
    while (j < tokens.length) {
      const parsed = parseTableRef(tokens, j, source)
      if (!parsed) break
      refs.push(parsed.ref)
      j = parsed.next

      // Only FROM takes a comma-separated list
      if (source === 'from' && isPunctuation(tokens[j], ',')) {
        j++
        continue
      }
      break
    }
    i = j - 1
  }

  return refs
}

/**
 * Parse `name`, `schema.name`, then an optional `AS alias` or bare alias.
 */
function parseTableRef(
  tokens: Token[],
  index: number,
  source: TableRef['source']
): { ref: TableRef; next: number } | null {
  const first = tokens[index]
  if (!isNameLike(first)) return null

  let schema: string | null = null
  let name = unquoteIdentifier(first.value)
  let next = index + 1

  const afterDot = tokens[next + 1]
  if (isPunctuation(tokens[next], '.') && isNameLike(afterDot)) {
    schema = name
    name = unquoteIdentifier(afterDot.value)
    next += 2
  }

  let alias: string | null = null
  const aliasToken = tokens[next + 1]
  if (isKeyword(tokens[next], 'AS') && isNameLike(aliasToken)) {
    alias = unquoteIdentifier(aliasToken.value)
    next += 2
  } else if (isNameLike(tokens[next])) {
    alias = unquoteIdentifier(tokens[next].value)
    next += 1
  }

  return { ref: { name, schema, alias, source }, next }
}

/**
 * Map of alias (lower-cased) to table reference. Later declarations win.
 */
export function resolveAliases(statement: Statement): AliasMap {
  return buildAliasMap(extractTableRefs(statement))
}

export function buildAliasMap(refs: TableRef[]): AliasMap {
  const aliases: AliasMap = new Map()
  for (const ref of refs) {
    if (ref.alias !== null) {
      aliases.set(ref.alias.toLowerCase(), ref)
    }
  }
  return aliases
}

/**
 * Resolve the text before `.` to a table reference: an alias first, then a
 * referenced table name, then the qualifier itself taken as a table name.
 */
export function resolveQualifier(qualifier: string, refs: TableRef[], aliases: AliasMap): TableRef {
  const key = qualifier.toLowerCase()
  const aliased = aliases.get(key)
  if (aliased) return aliased

  const byName = refs.find((ref) => ref.name.toLowerCase() === key)
  if (byName) return byName

  return { name: qualifier, schema: null, alias: null, source: 'qualifier' }
}

/**
 * Name the user qualifies columns with: the alias if there is one.
 */
export function refQualifier(ref: TableRef): string {
  return ref.alias ?? ref.name
}
