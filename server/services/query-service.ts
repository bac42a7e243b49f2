import { setImmediate as yieldToEventLoop } from "timers/promises";
import type { Client } from "../lib/db";
import { QueryCancelledError, getErrorMessage } from "../lib/errors";
import { createLogger, type Logger } from "../lib/logger";
import type { SpecialCommandRegistry } from "../lib/special-commands";
import { isKeyword, isSignificant, tokenize } from "../../src/lib/sql/autocomplete/tokenizer";
import { detectStatementType, splitStatements } from "../../src/lib/sql/autocomplete/statement-splitter";
import type { Statement, StatementType } from "../../src/lib/sql/autocomplete/types";

export interface QueryResult {
  /** Statement text as typed, without surrounding whitespace */
  statement: string;
  columns: string[];
  rows: string[][];
  rowCount: number;
  status: string;
  executionTimeMs: number;
  /** Empty when the statement succeeded */
  error: string;
  cancelled: boolean;
  /** Set when a special command asked to leave the session */
  exit: boolean;
}

export interface QueryServiceOptions {
  logger?: Logger;
  specialCommands?: SpecialCommandRegistry;
  /** Shown by `.status` */
  databasePath?: string;
  /** Called after each successful schema-altering statement */
  onSchemaChange?: () => void;
  /** Rows read between yields to the event loop */
  yieldEvery?: number;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

const SCHEMA_ALTERING: ReadonlySet<StatementType> = new Set(["CREATE", "ALTER", "DROP", "ATTACH", "DETACH"]);

export function isSchemaAltering(statement: Statement): boolean {
  return SCHEMA_ALTERING.has(detectStatementType(statement));
}

function parseStatements(sql: string): Statement[] {
  return splitStatements(tokenize(sql), sql).filter((statement) => statement.tokens.some(isSignificant));
}

/**
 * True when any statement drops an object, or deletes/updates without WHERE.
 */
export function isDestructive(sql: string): boolean {
  return parseStatements(sql).some((statement) => {
    const type = detectStatementType(statement);
    if (type === "DROP") return true;
    if (type === "DELETE" || type === "UPDATE") {
      return !statement.tokens.some((token) => isKeyword(token, "WHERE"));
    }
    return false;
  });
}

export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return "NULL";
  if (Buffer.isBuffer(value)) return `X'${value.toString("hex").toUpperCase()}'`;
  return String(value);
}

function plural(count: number): string {
  return `${count} row${count === 1 ? "" : "s"}`;
}

function lineOf(sql: string, offset: number): number {
  return sql.slice(0, offset).split("\n").length;
}

function emptyResult(statement: string): QueryResult {
  return {
    statement,
    columns: [],
    rows: [],
    rowCount: 0,
    status: "",
    executionTimeMs: 0,
    error: "",
    cancelled: false,
    exit: false,
  };
}

export class QueryService {
  private logger: Logger;
  private yieldEvery: number;

  constructor(
    private db: Client,
    private options: QueryServiceOptions = {}
  ) {
    this.logger = options.logger ?? createLogger({ level: "silent" });
    this.yieldEvery = Math.max(1, options.yieldEvery ?? 500);
  }

  /**
   * Run every statement in `sql` in order, yielding one result per statement.
   * A failing or cancelled statement ends the batch.
   */
  async *executeSQL(sql: string, options: ExecuteOptions = {}): AsyncGenerator<QueryResult> {
    const { signal } = options;

    for (const statement of parseStatements(sql)) {
      const text = statement.text.trim();

      if (signal?.aborted) {
        yield { ...emptyResult(text), status: "Cancelled", cancelled: true };
        return;
      }

      const registry = this.options.specialCommands;
      if (registry && registry.isSpecial(text)) {
        const result = this.executeSpecial(registry, text);
        yield result;
        if (result.error || result.exit) return;
        continue;
      }

      const start = Date.now();
      try {
        const result = await this.executeStatement(statement, text, signal);
        result.executionTimeMs = Date.now() - start;

        if (isSchemaAltering(statement)) {
          this.notifySchemaChange();
        }
        yield result;
      } catch (err) {
        const executionTimeMs = Date.now() - start;
        if (err instanceof QueryCancelledError) {
          this.logger.debug(`Cancelled after ${executionTimeMs}ms: ${text}`);
          yield { ...emptyResult(text), status: "Cancelled", executionTimeMs, cancelled: true };
          return;
        }

        const first = statement.tokens.find(isSignificant);
        const lineNumber = lineOf(sql, first ? first.start : statement.start);
        yield {
          ...emptyResult(text),
          executionTimeMs,
          error: `ERROR at Line ${lineNumber}: ${getErrorMessage(err)}`,
        };
        return;
      }
    }
  }

  private async executeStatement(
    statement: Statement,
    text: string,
    signal: AbortSignal | undefined
  ): Promise<QueryResult> {
    this.logger.debug(`Executing: ${text}`);
    const prepared = this.db.prepare<unknown[], unknown[]>(statement.text);

    if (!prepared.reader) {
      const info = prepared.run();
      return { ...emptyResult(text), rowCount: info.changes, status: `Query OK, ${plural(info.changes)} affected` };
    }

    const columns = prepared.columns().map((column) => column.name);
    const rows: string[][] = [];
    for (const row of prepared.raw(true).iterate()) {
      rows.push(row.map(formatValue));
      if (rows.length % this.yieldEvery === 0) {
        await yieldToEventLoop();
        if (signal?.aborted) throw new QueryCancelledError();
      }
    }

    return { ...emptyResult(text), columns, rows, rowCount: rows.length, status: `${plural(rows.length)} in set` };
  }

  private executeSpecial(registry: SpecialCommandRegistry, text: string): QueryResult {
    const start = Date.now();
    try {
      const output = registry.execute(
        {
          db: this.db,
          databasePath: this.options.databasePath ?? "",
          refreshSchema: () => this.notifySchemaChange(),
          registry,
        },
        text
      );
      return {
        ...emptyResult(text),
        columns: output.columns,
        rows: output.rows,
        rowCount: output.rows.length,
        status: output.status,
        executionTimeMs: Date.now() - start,
        exit: output.exit ?? false,
      };
    } catch (err) {
      return { ...emptyResult(text), executionTimeMs: Date.now() - start, error: getErrorMessage(err) };
    }
  }

  private notifySchemaChange(): void {
    const onSchemaChange = this.options.onSchemaChange;
    if (!onSchemaChange) return;
    try {
      onSchemaChange();
    } catch (err) {
      this.logger.warn(`Schema refresh failed: ${getErrorMessage(err)}`);
    }
  }
}
