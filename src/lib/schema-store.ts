/**
 * Schema snapshots read by the completion engine.
 *
 * A snapshot is built once from the live connection and never changed
 * afterwards. The owner replaces it wholesale through `SchemaStore.publish`,
 * so a completion request that grabbed a snapshot keeps a consistent view
 * even if a refresh lands while it runs.
 */

export interface SchemaSnapshot {
  /** Table name → ordered column names */
  readonly tables: ReadonlyMap<string, readonly string[]>
  readonly views: ReadonlySet<string>
  /** View name → ordered column names */
  readonly viewColumns: ReadonlyMap<string, readonly string[]>
  readonly indexes: ReadonlySet<string>
  readonly pragmas: ReadonlySet<string>
  /** Functions registered on the connection, built-ins included when the driver reports them */
  readonly functions: ReadonlySet<string>
  /** Attached database names (`main`, `temp`, ...) */
  readonly databases: readonly string[]
  readonly refreshedAt: number
}

export interface SchemaSnapshotInput {
  tables?: Iterable<readonly [string, readonly string[]]>
  views?: Iterable<readonly [string, readonly string[]]>
  indexes?: Iterable<string>
  pragmas?: Iterable<string>
  functions?: Iterable<string>
  databases?: Iterable<string>
  refreshedAt?: number
}

export function createSchemaSnapshot(input: SchemaSnapshotInput = {}): SchemaSnapshot {
  const views = new Map<string, readonly string[]>()
  for (const [name, columns] of input.views ?? []) {
    views.set(name, Object.freeze([...columns]))
  }

  const tables = new Map<string, readonly string[]>()
  for (const [name, columns] of input.tables ?? []) {
    tables.set(name, Object.freeze([...columns]))
  }

  return Object.freeze({
    tables,
    views: new Set(views.keys()),
    viewColumns: views,
    indexes: new Set(input.indexes ?? []),
    pragmas: new Set(input.pragmas ?? []),
    functions: new Set(input.functions ?? []),
    databases: Object.freeze([...(input.databases ?? ['main'])]),
    refreshedAt: input.refreshedAt ?? Date.now(),
  })
}

// ============================================================================
// METADATA PROVIDER
// ============================================================================

/**
 * Read interface the completion engine consumes.
 */
export interface MetadataProvider {
  tables(): ReadonlySet<string>
  /** Empty for unknown tables */
  columns(table: string): readonly string[]
  views(): ReadonlySet<string>
  indexes(): ReadonlySet<string>
  pragmas(): ReadonlySet<string>
  functions(): ReadonlySet<string>
  databases(): readonly string[]
}

export function createMetadataProvider(snapshot: SchemaSnapshot): MetadataProvider {
  // Lower-cased lookup so `USERS.` finds the columns of `users`
  const columnsByName = new Map<string, readonly string[]>()
  for (const [name, columns] of snapshot.viewColumns) {
    columnsByName.set(name.toLowerCase(), columns)
  }
  for (const [name, columns] of snapshot.tables) {
    columnsByName.set(name.toLowerCase(), columns)
  }
  const tableNames = new Set(snapshot.tables.keys())

  return {
    tables: () => tableNames,
    columns: (table) => columnsByName.get(table.toLowerCase()) ?? [],
    views: () => snapshot.views,
    indexes: () => snapshot.indexes,
    pragmas: () => snapshot.pragmas,
    functions: () => snapshot.functions,
    databases: () => snapshot.databases,
  }
}

// ============================================================================
// STORE
// ============================================================================

export type SnapshotListener = (snapshot: SchemaSnapshot | null) => void

/**
 * Holds the current snapshot for one connection.
 */
export class SchemaStore {
  private snapshot: SchemaSnapshot | null = null
  private listeners = new Set<SnapshotListener>()

  current(): SchemaSnapshot | null {
    return this.snapshot
  }

  isLoaded(): boolean {
    return this.snapshot !== null
  }

  publish(snapshot: SchemaSnapshot): void {
    this.snapshot = snapshot
    this.notify()
  }

  clear(): void {
    this.snapshot = null
    this.notify()
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener(this.snapshot)
    }
  }
}
