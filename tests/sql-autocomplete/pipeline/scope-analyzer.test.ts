// tests/sql-autocomplete/pipeline/scope-analyzer.test.ts

import { describe, it, expect } from 'vitest'
import {
  extractTableRefs,
  resolveAliases,
  resolveQualifier,
  buildAliasMap,
  refQualifier,
} from '../../../src/lib/sql/autocomplete/scope-analyzer'
import { splitStatements } from '../../../src/lib/sql/autocomplete/statement-splitter'
import { tokenize } from '../../../src/lib/sql/autocomplete/tokenizer'
import type { TableRef } from '../../../src/lib/sql/autocomplete/types'

// ============================================================================
// TEST HELPERS
// ============================================================================

function statement(sql: string) {
  return splitStatements(tokenize(sql), sql)[0]
}

function ref(name: string, alias: string | null, source: TableRef['source'], schema: string | null = null): TableRef {
  return { name, schema, alias, source }
}

interface RefsTestCase {
  name: string
  sql: string
  expected: TableRef[]
}

// ============================================================================
// TEST DATA
// ============================================================================

const refsTests: RefsTestCase[] = [
  {
    name: 'FROM with bare alias and JOIN with AS alias',
    sql: 'SELECT * FROM users u JOIN orders AS o ON u.id = o.user_id',
    expected: [ref('users', 'u', 'from'), ref('orders', 'o', 'join')],
  },
  {
    name: 'comma list with schema-qualified table',
    sql: 'SELECT * FROM a, main.b AS bb',
    expected: [ref('a', null, 'from'), ref('b', 'bb', 'from', 'main')],
  },
  {
    name: 'keyword after the table is not an alias',
    sql: 'SELECT * FROM users WHERE id = 1',
    expected: [ref('users', null, 'from')],
  },
  {
    name: 'quoted table name',
    sql: 'SELECT * FROM "Order Items" oi',
    expected: [ref('Order Items', 'oi', 'from')],
  },
  {
    name: 'UPDATE target',
    sql: 'UPDATE users SET name = 1',
    expected: [ref('users', null, 'update')],
  },
  {
    name: 'INSERT INTO target',
    sql: 'INSERT INTO logs (msg) VALUES (1)',
    expected: [ref('logs', null, 'into')],
  },
  {
    name: 'references after LEFT JOIN',
    sql: 'SELECT * FROM a x LEFT JOIN b y ON x.id = y.id',
    expected: [ref('a', 'x', 'from'), ref('b', 'y', 'join')],
  },
  {
    name: 'tables and aliases named with non-reserved keywords',
    sql: 'SELECT * FROM plan p JOIN key AS k ON p.id = k.plan_id',
    expected: [ref('plan', 'p', 'from'), ref('key', 'k', 'join')],
  },
  {
    name: 'keyword used as a bare alias',
    sql: 'SELECT * FROM invoices row WHERE row.id = 1',
    expected: [ref('invoices', 'row', 'from')],
  },
  {
    name: 'temp schema qualifier',
    sql: 'SELECT * FROM temp.scratch',
    expected: [ref('scratch', null, 'from', 'temp')],
  },
  {
    name: 'reserved keyword after the table is not an alias',
    sql: 'SELECT * FROM plan ORDER BY 1',
    expected: [ref('plan', null, 'from')],
  },
  {
    name: 'FROM with nothing after it',
    sql: 'SELECT * FROM ',
    expected: [],
  },
]

// ============================================================================
// TESTS
// ============================================================================

describe('extractTableRefs', () => {
  for (const tc of refsTests) {
    it(tc.name, () => {
      expect(extractTableRefs(statement(tc.sql))).toEqual(tc.expected)
    })
  }
})

describe('resolveAliases', () => {
  it('keys aliases in lower case', () => {
    const aliases = resolveAliases(statement('SELECT * FROM users U'))
    expect([...aliases.keys()]).toEqual(['u'])
    expect(aliases.get('u')?.name).toBe('users')
  })

  it('lets a later declaration of the same alias win', () => {
    const aliases = resolveAliases(statement('SELECT * FROM users t JOIN orders t ON 1'))
    expect(aliases.get('t')?.name).toBe('orders')
  })

  it('ignores tables without an alias', () => {
    expect(resolveAliases(statement('SELECT * FROM users')).size).toBe(0)
  })
})

describe('resolveQualifier', () => {
  const refs = [ref('users', 'u', 'from'), ref('orders', null, 'join')]
  const aliases = buildAliasMap(refs)

  it('resolves an alias case-insensitively', () => {
    expect(resolveQualifier('U', refs, aliases)).toEqual(refs[0])
  })

  it('resolves a referenced table name', () => {
    expect(resolveQualifier('Orders', refs, aliases)).toEqual(refs[1])
  })

  it('falls back to the qualifier as a table name', () => {
    expect(resolveQualifier('audit', refs, aliases)).toEqual(ref('audit', null, 'qualifier'))
  })
})

describe('refQualifier', () => {
  it('prefers the alias', () => {
    expect(refQualifier(ref('users', 'u', 'from'))).toBe('u')
    expect(refQualifier(ref('users', null, 'from'))).toBe('users')
  })
})
