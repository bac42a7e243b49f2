import type { Client } from './db'
import { getErrorMessage } from './errors'
import { createLogger, type Logger } from './logger'
import { createSchemaSnapshot, type SchemaSnapshot, type SchemaStore } from '../../src/lib/schema-store'
import { BUILTIN_PRAGMAS } from '../../src/lib/sql/completions'

interface RelationColumnRow {
  relation: string
  type: string
  column: string
}

interface DatabaseListRow {
  seq: number
  name: string
  file: string
}

// Internal SQLite objects are not offered
const HIDDEN_PREFIXES = "m.name NOT LIKE 'sqlite_%'"

const RELATION_COLUMNS_SQL = `
  SELECT m.name AS relation, m.type AS type, p.name AS "column"
  FROM sqlite_master AS m
  JOIN pragma_table_info(m.name) AS p
  WHERE m.type IN ('table', 'view') AND ${HIDDEN_PREFIXES}
  ORDER BY m.name, p.cid
`

const INDEXES_SQL = `
  SELECT m.name FROM sqlite_master AS m
  WHERE m.type = 'index' AND ${HIDDEN_PREFIXES}
  ORDER BY m.name
`

/**
 * Read tables, views, columns, indexes, pragmas, functions and attached
 * databases from the connection into a new snapshot.
 */
export function buildSchemaSnapshot(db: Client, logger: Logger = createLogger({ level: 'silent' })): SchemaSnapshot {
  const tables = new Map<string, string[]>()
  const views = new Map<string, string[]>()
  for (const row of db.prepare<[], RelationColumnRow>(RELATION_COLUMNS_SQL).all()) {
    const target = row.type === 'view' ? views : tables
    const columns = target.get(row.relation) ?? []
    columns.push(row.column)
    target.set(row.relation, columns)
  }

  const indexes = db.prepare<[], string>(INDEXES_SQL).pluck().all()
  const databases = db.prepare<[], DatabaseListRow>('PRAGMA database_list').all().map((row) => row.name)

  return createSchemaSnapshot({
    tables,
    views,
    indexes,
    pragmas: listPragmas(db, logger),
    functions: listFunctions(db, logger),
    databases,
  })
}

// pragma_pragma_list and pragma_function_list need SQLITE_INTROSPECTION_PRAGMAS
function listPragmas(db: Client, logger: Logger): readonly string[] {
  try {
    return db.prepare<[], string>('SELECT name FROM pragma_pragma_list ORDER BY name').pluck().all()
  } catch (error) {
    logger.debug(`pragma_list unavailable, using built-in pragma names: ${getErrorMessage(error)}`)
    return BUILTIN_PRAGMAS
  }
}

function listFunctions(db: Client, logger: Logger): readonly string[] {
  try {
    return db.prepare<[], string>('SELECT DISTINCT name FROM pragma_function_list ORDER BY name').pluck().all()
  } catch (error) {
    logger.debug(`function_list unavailable, using built-in function names: ${getErrorMessage(error)}`)
    return []
  }
}

/**
 * Rebuild the snapshot and publish it to the store.
 */
export function refreshSchemaCache(store: SchemaStore, db: Client, logger: Logger): SchemaSnapshot {
  const start = Date.now()
  const snapshot = buildSchemaSnapshot(db, logger)
  store.publish(snapshot)
  logger.debug(
    `Schema refreshed in ${Date.now() - start}ms: ${snapshot.tables.size} tables, ` +
      `${snapshot.views.size} views, ${snapshot.indexes.size} indexes`
  )
  return snapshot
}

export function clearSchemaCache(store: SchemaStore): void {
  store.clear()
}
