/**
 * litequery command line.
 *
 * `litequery [database] [-e sql]` opens the database (in memory when
 * omitted), then runs the given SQL and exits, or starts the interactive
 * loop with completion.
 */

import { Command } from 'commander'
import { loadConfig } from './lib/config'
import { createClient, formatDatabaseName, MEMORY_DATABASE } from './lib/db'
import { ConfigError, getErrorMessage } from './lib/errors'
import { createLogger, isLogLevel, LOG_LEVEL_NAMES, type Logger } from './lib/logger'
import { createStreamOutput, type Output } from './lib/output'
import { refreshSchemaCache } from './lib/schema-cache'
import { createDefaultRegistry } from './lib/special-commands'
import { formatResult, runRepl } from './repl'
import { QueryService } from './services/query-service'
import { SchemaStore } from '../src/lib/schema-store'

export const VERSION = '0.1.0'

export interface CliOptions {
  execute?: string
  config?: string
  logLevel?: string
}

/**
 * Run every statement and print results. Returns false on the first error
 * or cancellation.
 */
export async function executeBatch(service: QueryService, sql: string, output: Output): Promise<boolean> {
  for await (const result of service.executeSQL(sql)) {
    if (result.error) {
      output.printError(`Error: ${result.error}`)
      return false
    }
    if (result.cancelled) {
      return false
    }
    for (const line of formatResult(result)) {
      output.print(line)
    }
  }
  return true
}

/**
 * Open the database and run one session. Resolves to the process exit code.
 */
export async function runCli(
  database: string,
  options: CliOptions,
  logger: Logger = createLogger(),
  output: Output = createStreamOutput()
): Promise<number> {
  const config = loadConfig(options.config)

  const level = options.logLevel ?? config.main.log_level
  if (!isLogLevel(level)) {
    throw new ConfigError(`--log-level must be one of ${LOG_LEVEL_NAMES.join(', ')}`)
  }
  logger.setLevel(level)
  if (config.path) {
    logger.debug(`Loaded config from ${config.path}`)
  }

  const db = createClient({ path: database })
  try {
    const store = new SchemaStore()
    const registry = createDefaultRegistry()
    const schemaLogger = logger.child('[schema]')
    const service = new QueryService(db, {
      logger: logger.child('[query]'),
      specialCommands: registry,
      databasePath: database,
      onSchemaChange: () => {
        refreshSchemaCache(store, db, schemaLogger)
      },
    })

    if (options.execute !== undefined) {
      return (await executeBatch(service, options.execute, output)) ? 0 : 1
    }

    refreshSchemaCache(store, db, schemaLogger)
    await runRepl({
      databaseName: formatDatabaseName({ path: database }),
      config,
      logger,
      output,
      store,
      service,
      registry,
    })
    return 0
  } finally {
    db.close()
  }
}

export function createCLI(): Command {
  const program = new Command()

  program
    .name('litequery')
    .version(VERSION)
    .description('SQLite client with context-aware completion')
    .argument('[database]', 'SQLite database file', MEMORY_DATABASE)
    .option('-e, --execute <sql>', 'Execute SQL and exit')
    .option('--config <path>', 'Config file (default: $XDG_CONFIG_HOME/litequery/config.toml)')
    .option('--log-level <level>', `Log level (${LOG_LEVEL_NAMES.join(', ')})`)
    .action(async (database: string, options: CliOptions) => {
      try {
        process.exitCode = await runCli(database, options)
      } catch (error) {
        console.error(`Error: ${getErrorMessage(error)}`)
        process.exitCode = 1
      }
    })

  return program
}
