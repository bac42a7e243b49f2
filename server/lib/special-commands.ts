import type { Client } from './db'
import { getSqliteVersion } from './db'
import { SpecialCommandError } from './errors'
import type { SpecialArgKind, SpecialCommandSpec, SpecialCommandVocabulary } from '../../src/lib/sql/autocomplete/types'

export interface SpecialCommandOutput {
  columns: string[]
  rows: string[][]
  status: string
  /** Set by `.exit` */
  exit?: boolean
}

export interface SpecialCommandContext {
  db: Client
  databasePath: string
  refreshSchema: () => void
  registry: SpecialCommandRegistry
}

export type SpecialCommandHandler = (
  ctx: SpecialCommandContext,
  arg: string,
  verbose: boolean
) => SpecialCommandOutput

export interface SpecialCommand {
  command: string
  shortcut: string | null
  description: string
  argKind: SpecialArgKind
  aliases: string[]
  caseSensitive: boolean
  hidden?: boolean
  handler: SpecialCommandHandler
}

export interface ParsedSpecialCommand {
  command: string
  arg: string
  verbose: boolean
}

const SIGILS = ['.', '\\']

/**
 * Split `\dt+ users;` into command `\dt`, argument `users` and verbose.
 */
export function parseSpecialCommand(text: string): ParsedSpecialCommand {
  const trimmed = text.trim().replace(/;+$/, '').trim()
  const space = trimmed.search(/\s/)
  const head = space === -1 ? trimmed : trimmed.slice(0, space)
  const arg = space === -1 ? '' : trimmed.slice(space).trim()

  const verbose = head.length > 1 && head.endsWith('+')
  const command = head.length > 1 ? head.replace(/[+-]$/, '') : head
  return { command, arg, verbose }
}

function rowsOf(db: Client, sql: string, ...params: string[]): string[][] {
  return db
    .prepare<string[], unknown[]>(sql)
    .raw(true)
    .all(...params)
    .map((row) => row.map((value) => (value === null ? 'NULL' : String(value))))
}

function rowsStatus(count: number): string {
  return `${count} row${count === 1 ? '' : 's'} in set`
}

function table(columns: string[], rows: string[][]): SpecialCommandOutput {
  return { columns, rows, status: rowsStatus(rows.length) }
}

function likePattern(arg: string): string {
  return arg === '' ? '%' : arg
}

export class SpecialCommandRegistry {
  private commands = new Map<string, SpecialCommand>()
  private entries: SpecialCommand[] = []

  register(command: SpecialCommand): void {
    this.entries.push(command)
    for (const name of [command.command, command.shortcut, ...command.aliases]) {
      if (name === null) continue
      this.commands.set(command.caseSensitive ? name : name.toLowerCase(), command)
    }
  }

  find(name: string): SpecialCommand | undefined {
    const exact = this.commands.get(name)
    if (exact) return exact
    const folded = this.commands.get(name.toLowerCase())
    return folded && !folded.caseSensitive ? folded : undefined
  }

  /**
   * Whether the input line is a special command rather than SQL.
   */
  isSpecial(text: string): boolean {
    const { command } = parseSpecialCommand(text)
    if (command === '') return false
    return this.find(command) !== undefined || SIGILS.includes(command[0])
  }

  execute(ctx: SpecialCommandContext, text: string): SpecialCommandOutput {
    const { command, arg, verbose } = parseSpecialCommand(text)
    const entry = this.find(command)
    if (!entry) {
      throw new SpecialCommandError(`Unknown command: ${command}. Type "help" for a list.`)
    }
    return entry.handler(ctx, arg, verbose)
  }

  list(): SpecialCommand[] {
    return this.entries.filter((entry) => !entry.hidden)
  }

  /**
   * Sigil-prefixed command names and aliases, for completion.
   */
  vocabulary(): SpecialCommandVocabulary {
    const vocabulary = new Map<string, SpecialCommandSpec>()
    for (const entry of this.list()) {
      const spec: SpecialCommandSpec = {
        name: entry.command,
        expectedArgKind: entry.argKind,
        description: entry.description,
      }
      for (const name of [entry.command, entry.shortcut, ...entry.aliases]) {
        if (name !== null && SIGILS.includes(name[0])) vocabulary.set(name, spec)
      }
    }
    return vocabulary
  }
}

// ============================================================================
// BUILT-IN COMMANDS
// ============================================================================

const BUILTIN_COMMANDS: SpecialCommand[] = [
  {
    command: 'help',
    shortcut: '\\?',
    description: 'Show this help.',
    argKind: 'none',
    aliases: ['?'],
    caseSensitive: false,
    handler: (ctx) =>
      table(
        ['Command', 'Shortcut', 'Description'],
        ctx.registry.list().map((entry) => [entry.command, entry.shortcut ?? '', entry.description])
      ),
  },
  {
    command: '.exit',
    shortcut: '\\q',
    description: 'Exit.',
    argKind: 'none',
    aliases: ['exit', 'quit'],
    caseSensitive: false,
    handler: () => ({ columns: [], rows: [], status: 'Goodbye!', exit: true }),
  },
  {
    command: '.tables',
    shortcut: '\\dt',
    description: 'List tables, optionally matching a LIKE pattern.',
    argKind: 'text',
    aliases: [],
    caseSensitive: true,
    handler: (ctx, arg) =>
      table(
        ['Tables'],
        rowsOf(
          ctx.db,
          "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' AND name LIKE ? ORDER BY name",
          likePattern(arg)
        )
      ),
  },
  {
    command: '.views',
    shortcut: '\\dv',
    description: 'List views.',
    argKind: 'text',
    aliases: [],
    caseSensitive: true,
    handler: (ctx, arg) =>
      table(
        ['Views'],
        rowsOf(ctx.db, "SELECT name FROM sqlite_master WHERE type = 'view' AND name LIKE ? ORDER BY name", likePattern(arg))
      ),
  },
  {
    command: '.schema',
    shortcut: null,
    description: 'Show CREATE statements, optionally for one table.',
    argKind: 'table',
    aliases: [],
    caseSensitive: true,
    handler: (ctx, arg) =>
      table(
        ['sql'],
        rowsOf(
          ctx.db,
          "SELECT sql FROM sqlite_master WHERE sql IS NOT NULL AND name NOT LIKE 'sqlite_%' AND (? = '' OR tbl_name = ?) ORDER BY tbl_name, type DESC, name",
          arg,
          arg
        )
      ),
  },
  {
    command: '.indexes',
    shortcut: '\\di',
    description: 'List indexes, optionally for one table.',
    argKind: 'table',
    aliases: [],
    caseSensitive: true,
    handler: (ctx, arg) =>
      table(
        ['Table', 'Index'],
        rowsOf(
          ctx.db,
          "SELECT tbl_name, name FROM sqlite_master WHERE type = 'index' AND (? = '' OR tbl_name = ?) ORDER BY tbl_name, name",
          arg,
          arg
        )
      ),
  },
  {
    command: '.databases',
    shortcut: '\\l',
    description: 'List attached databases.',
    argKind: 'none',
    aliases: [],
    caseSensitive: true,
    handler: (ctx) => table(['seq', 'name', 'file'], rowsOf(ctx.db, 'PRAGMA database_list')),
  },
  {
    command: 'describe',
    shortcut: '\\d',
    description: 'Describe a table or view.',
    argKind: 'table',
    aliases: ['desc'],
    caseSensitive: false,
    handler: (ctx, arg, verbose) => {
      if (arg === '') {
        throw new SpecialCommandError('describe requires a table name')
      }
      const columns = verbose
        ? ['cid', 'name', 'type', 'notnull', 'dflt_value', 'pk', 'hidden']
        : ['cid', 'name', 'type', 'notnull', 'dflt_value', 'pk']
      const hidden = verbose ? '' : ' WHERE hidden = 0'
      // notnull is a keyword
      const projection = columns.map((column) => `"${column}"`).join(', ')
      const rows = rowsOf(ctx.db, `SELECT ${projection} FROM pragma_table_xinfo(?)${hidden}`, arg)
      if (rows.length === 0) {
        throw new SpecialCommandError(`No such table: ${arg}`)
      }
      return table(columns, rows)
    },
  },
  {
    command: '.status',
    shortcut: '\\s',
    description: 'Show connection status.',
    argKind: 'none',
    aliases: [],
    caseSensitive: true,
    handler: (ctx) =>
      table(
        ['Setting', 'Value'],
        [
          ['Database', ctx.databasePath],
          ['SQLite version', getSqliteVersion(ctx.db)],
          ['Read only', String(ctx.db.readonly)],
          ['In transaction', String(ctx.db.inTransaction)],
        ]
      ),
  },
  {
    command: '.refresh',
    shortcut: '\\#',
    description: 'Refresh the completion schema.',
    argKind: 'none',
    aliases: ['rehash'],
    caseSensitive: false,
    handler: (ctx) => {
      ctx.refreshSchema()
      return { columns: [], rows: [], status: 'Auto-completion refreshed.' }
    },
  },
]

export function createDefaultRegistry(): SpecialCommandRegistry {
  const registry = new SpecialCommandRegistry()
  for (const command of BUILTIN_COMMANDS) {
    registry.register(command)
  }
  return registry
}
