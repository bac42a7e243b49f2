import keywordData from './data/sqlite-keywords.json'
import functionData from './data/sqlite-functions.json'
import pragmaData from './data/sqlite-pragmas.json'

function sortedUnique(words: string[]): string[] {
  return [...new Set(words)].sort()
}

export const SQL_KEYWORDS = {
  // Words the tokenizer treats as keywords
  reserved: keywordData.reserved,
  // Keywords SQLite still accepts as table or alias names
  names: keywordData.names,
  // Statement-starting keywords
  statements: keywordData.statements,
  // Column type names
  types: keywordData.types,
  // Multi-word keywords offered as a single candidate
  phrases: keywordData.phrases,
}

export const RESERVED_WORDS: ReadonlySet<string> = new Set(SQL_KEYWORDS.reserved)

export const NAME_KEYWORDS: ReadonlySet<string> = new Set(SQL_KEYWORDS.names)

export const STATEMENT_KEYWORDS: readonly string[] = sortedUnique(SQL_KEYWORDS.statements)

export const ALL_KEYWORDS: readonly string[] = sortedUnique([
  ...SQL_KEYWORDS.reserved,
  ...SQL_KEYWORDS.types,
  ...SQL_KEYWORDS.phrases,
])

export const BUILTIN_FUNCTIONS: readonly string[] = sortedUnique([
  ...functionData.scalar,
  ...functionData.aggregate,
  ...functionData.window,
  ...functionData.datetime,
  ...functionData.math,
  ...functionData.json,
])

const BUILTIN_FUNCTION_SET: ReadonlySet<string> = new Set(BUILTIN_FUNCTIONS)

export const BUILTIN_PRAGMAS: readonly string[] = sortedUnique(pragmaData)

export function isReservedWord(word: string): boolean {
  return RESERVED_WORDS.has(word.toUpperCase())
}

export function isBuiltinFunction(name: string): boolean {
  return BUILTIN_FUNCTION_SET.has(name.toUpperCase())
}
