import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createClient, type Client } from '../server/lib/db'
import { createLogger } from '../server/lib/logger'
import { createDefaultRegistry } from '../server/lib/special-commands'
import {
  QueryService,
  formatValue,
  isDestructive,
  isSchemaAltering,
  type QueryResult,
} from '../server/services/query-service'
import { splitStatements } from '../src/lib/sql/autocomplete/statement-splitter'
import { tokenize } from '../src/lib/sql/autocomplete/tokenizer'

async function collect(results: AsyncIterable<QueryResult>): Promise<QueryResult[]> {
  const collected: QueryResult[] = []
  for await (const result of results) {
    collected.push(result)
  }
  return collected
}

function firstStatement(sql: string) {
  return splitStatements(tokenize(sql), sql)[0]
}

interface DestructiveTestCase {
  sql: string
  expected: boolean
}

const destructiveTests: DestructiveTestCase[] = [
  { sql: 'DROP TABLE t', expected: true },
  { sql: 'DELETE FROM t', expected: true },
  { sql: 'DELETE FROM t WHERE id = 1', expected: false },
  { sql: 'update t set a = 1', expected: true },
  { sql: 'UPDATE t SET a = 1 WHERE id = 2', expected: false },
  { sql: 'SELECT 1; delete from t', expected: true },
  { sql: "SELECT 'DROP TABLE t'", expected: false },
  { sql: 'INSERT INTO t VALUES (1)', expected: false },
]

describe('isDestructive', () => {
  for (const tc of destructiveTests) {
    it(tc.sql, () => {
      expect(isDestructive(tc.sql)).toBe(tc.expected)
    })
  }
})

describe('isSchemaAltering', () => {
  it('flags DDL and attach statements', () => {
    expect(isSchemaAltering(firstStatement('CREATE TABLE t (a)'))).toBe(true)
    expect(isSchemaAltering(firstStatement('alter table t add column b'))).toBe(true)
    expect(isSchemaAltering(firstStatement('DROP VIEW v'))).toBe(true)
    expect(isSchemaAltering(firstStatement("ATTACH ':memory:' AS aux"))).toBe(true)
    expect(isSchemaAltering(firstStatement('DETACH aux'))).toBe(true)
  })

  it('leaves queries and data changes alone', () => {
    expect(isSchemaAltering(firstStatement('SELECT 1'))).toBe(false)
    expect(isSchemaAltering(firstStatement('INSERT INTO t VALUES (1)'))).toBe(false)
  })
})

describe('formatValue', () => {
  it('renders NULL, blobs and scalars', () => {
    expect(formatValue(null)).toBe('NULL')
    expect(formatValue(Buffer.from([0x0a, 0xff]))).toBe("X'0AFF'")
    expect(formatValue(1.5)).toBe('1.5')
    expect(formatValue(BigInt(7))).toBe('7')
    expect(formatValue('text')).toBe('text')
  })
})

describe('QueryService', () => {
  let db: Client

  beforeEach(() => {
    db = createClient({ path: ':memory:' })
  })

  afterEach(() => {
    db.close()
  })

  it('yields one result per statement', async () => {
    const service = new QueryService(db)
    const results = await collect(service.executeSQL('SELECT 1 AS one; SELECT 2 AS two'))
    expect(results).toHaveLength(2)
    expect(results[0]).toMatchObject({
      statement: 'SELECT 1 AS one;',
      columns: ['one'],
      rows: [['1']],
      rowCount: 1,
      status: '1 row in set',
      error: '',
      cancelled: false,
      exit: false,
    })
    expect(results[1].statement).toBe('SELECT 2 AS two')
  })

  it('reports affected rows for writes', async () => {
    const service = new QueryService(db)
    const results = await collect(
      service.executeSQL('CREATE TABLE t (a); INSERT INTO t VALUES (1), (2); SELECT a, NULL AS b FROM t')
    )
    expect(results.map((r) => r.status)).toEqual([
      'Query OK, 0 rows affected',
      'Query OK, 2 rows affected',
      '2 rows in set',
    ])
    expect(results[1].rowCount).toBe(2)
    expect(results[2].rows).toEqual([
      ['1', 'NULL'],
      ['2', 'NULL'],
    ])
  })

  it('skips empty statements and comments', async () => {
    const service = new QueryService(db)
    const results = await collect(service.executeSQL(';; SELECT 1; -- done'))
    expect(results.map((r) => r.statement)).toEqual(['SELECT 1;'])
  })

  it('stops at the first error and reports its line', async () => {
    const service = new QueryService(db)
    const results = await collect(service.executeSQL('SELECT 1;\nSELECT * FROM missing;\nSELECT 3'))
    expect(results).toHaveLength(2)
    expect(results[1].error).toBe('ERROR at Line 2: no such table: missing')
    expect(results[1].rows).toEqual([])
  })

  describe('schema change signal', () => {
    it('fires after each successful schema change', async () => {
      const onSchemaChange = vi.fn()
      const service = new QueryService(db, { onSchemaChange })
      await collect(
        service.executeSQL('CREATE TABLE t (a); INSERT INTO t VALUES (1); CREATE INDEX i ON t (a); SELECT * FROM t')
      )
      expect(onSchemaChange).toHaveBeenCalledTimes(2)
    })

    it('fires before the result is yielded', async () => {
      const onSchemaChange = vi.fn()
      const service = new QueryService(db, { onSchemaChange })
      const callsAtYield: number[] = []
      for await (const result of service.executeSQL('CREATE TABLE t (a); DROP TABLE t')) {
        expect(result.error).toBe('')
        callsAtYield.push(onSchemaChange.mock.calls.length)
      }
      expect(callsAtYield).toEqual([1, 2])
    })

    it('does not fire for a failed statement', async () => {
      const onSchemaChange = vi.fn()
      const service = new QueryService(db, { onSchemaChange })
      const results = await collect(service.executeSQL('CREATE TABLE t (a); CREATE TABLE t (a)'))
      expect(results[1].error).toBe('ERROR at Line 1: table t already exists')
      expect(onSchemaChange).toHaveBeenCalledTimes(1)
    })

    it('logs a failing refresh and keeps the result', async () => {
      const warnings: string[] = []
      const logger = createLogger({ level: 'warn', stderr: (message) => warnings.push(String(message)) })
      const service = new QueryService(db, {
        logger,
        onSchemaChange: () => {
          throw new Error('boom')
        },
      })
      const results = await collect(service.executeSQL('CREATE TABLE t (a)'))
      expect(results[0].error).toBe('')
      expect(warnings).toEqual(['Warning: Schema refresh failed: boom'])
    })
  })

  describe('cancellation', () => {
    const COUNT_TO_TEN = 'WITH RECURSIVE n(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM n WHERE x < 10) SELECT x FROM n'

    it('skips every statement when already aborted', async () => {
      const controller = new AbortController()
      controller.abort()
      const onSchemaChange = vi.fn()
      const service = new QueryService(db, { onSchemaChange })
      const results = await collect(service.executeSQL('CREATE TABLE t (a); SELECT 1', { signal: controller.signal }))
      expect(results).toHaveLength(1)
      expect(results[0]).toMatchObject({ statement: 'CREATE TABLE t (a);', status: 'Cancelled', cancelled: true })
      expect(onSchemaChange).not.toHaveBeenCalled()
    })

    it('stops reading rows once aborted', async () => {
      const controller = new AbortController()
      const service = new QueryService(db, { yieldEvery: 2 })
      const results = service.executeSQL(`${COUNT_TO_TEN}; SELECT 2`, { signal: controller.signal })

      const pending = results.next()
      controller.abort()
      const first = await pending

      expect(first.done).toBe(false)
      if (!first.done) {
        expect(first.value.cancelled).toBe(true)
        expect(first.value.rows).toEqual([])
      }
      expect((await results.next()).done).toBe(true)
    })

    it('leaves the connection usable after a cancel', async () => {
      const controller = new AbortController()
      const service = new QueryService(db, { yieldEvery: 2 })
      const results = service.executeSQL(COUNT_TO_TEN, { signal: controller.signal })
      const pending = results.next()
      controller.abort()
      await pending

      const after = await collect(service.executeSQL(COUNT_TO_TEN))
      expect(after[0].rowCount).toBe(10)
    })
  })

  describe('special commands', () => {
    beforeEach(() => {
      db.exec('CREATE TABLE customers (id INTEGER PRIMARY KEY)')
    })

    it('runs special commands inside a batch', async () => {
      const service = new QueryService(db, { specialCommands: createDefaultRegistry() })
      const results = await collect(service.executeSQL('.tables; SELECT 1 AS x'))
      expect(results[0]).toMatchObject({ columns: ['Tables'], rows: [['customers']], status: '1 row in set' })
      expect(results[1].columns).toEqual(['x'])
    })

    it('reports special command errors and stops', async () => {
      const service = new QueryService(db, { specialCommands: createDefaultRegistry() })
      const results = await collect(service.executeSQL('.nope; SELECT 1'))
      expect(results).toHaveLength(1)
      expect(results[0].error).toBe('Unknown command: .nope. Type "help" for a list.')
    })

    it('stops after exit', async () => {
      const service = new QueryService(db, { specialCommands: createDefaultRegistry() })
      const results = await collect(service.executeSQL('.exit; SELECT 1'))
      expect(results).toHaveLength(1)
      expect(results[0]).toMatchObject({ status: 'Goodbye!', exit: true })
    })

    it('signals a schema refresh on request', async () => {
      const onSchemaChange = vi.fn()
      const service = new QueryService(db, { specialCommands: createDefaultRegistry(), onSchemaChange })
      await collect(service.executeSQL('\\#'))
      expect(onSchemaChange).toHaveBeenCalledTimes(1)
    })

    it('treats special command text as SQL without a registry', async () => {
      const service = new QueryService(db)
      const results = await collect(service.executeSQL('.tables'))
      expect(results[0].error).toMatch(/^ERROR at Line 1: /)
    })
  })
})
