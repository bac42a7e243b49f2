import * as readline from "readline";
import type { AppConfig } from "./lib/config";
import { getErrorMessage } from "./lib/errors";
import type { Logger } from "./lib/logger";
import { createStreamOutput, type Output } from "./lib/output";
import type { SpecialCommandRegistry } from "./lib/special-commands";
import { isDestructive, type QueryResult, type QueryService } from "./services/query-service";
import type { SchemaStore } from "../src/lib/schema-store";
import {
  isCompletionError,
  limitSuggestions,
  runAutocompletePipeline,
  unquoteIdentifier,
} from "../src/lib/sql/autocomplete";

const CONTINUATION_PROMPT = "-> ";

export interface ReplOptions {
  databaseName: string;
  config: AppConfig;
  logger: Logger;
  /** Results and SQL errors, defaults to `output` and stderr */
  output?: Output;
  store: SchemaStore;
  service: QueryService;
  registry: SpecialCommandRegistry;
  input?: NodeJS.ReadableStream;
  terminal?: NodeJS.WritableStream;
}

export type Completer = (line: string) => [string[], string];

/**
 * `\d` in the prompt template stands for the database name.
 */
export function renderPrompt(template: string, databaseName: string): string {
  return template.replace(/\\d/g, databaseName);
}

export function formatResult(result: QueryResult, options: { timing?: boolean } = {}): string[] {
  const lines: string[] = [];
  if (result.columns.length > 0) {
    lines.push(result.columns.join("\t"));
    for (const row of result.rows) {
      lines.push(row.join("\t"));
    }
  }
  if (result.status) {
    lines.push(result.status);
  }
  if (options.timing) {
    lines.push(`Time: ${(result.executionTimeMs / 1000).toFixed(3)}s`);
  }
  return lines;
}

/**
 * Readline completer over the completion engine. `pending` holds the lines of
 * an unfinished statement so earlier lines give context.
 */
export function createCompleter(
  store: SchemaStore,
  registry: SpecialCommandRegistry,
  config: AppConfig,
  pending: () => string[] = () => []
): Completer {
  return (line: string) => {
    const sql = [...pending(), line].join("\n");
    try {
      const { suggestions, context } = runAutocompletePipeline(
        { sql, cursorPosition: sql.length, schema: store.current() },
        {
          keywordCasing: config.main.keyword_casing,
          substringMatching: config.completion.substring_matching,
          specialCommands: registry.vocabulary(),
        }
      );
      const typed = sql.slice(context.word.start, context.word.end);
      // Prefix matches on the unquoted name; readline swaps `ord` for `"order items"`
      const partial = context.word.text.toLowerCase();
      const prefixed = suggestions.filter((candidate) =>
        unquoteIdentifier(candidate.text).toLowerCase().startsWith(partial)
      );
      return [limitSuggestions(prefixed, config.completion.max_suggestions).map((candidate) => candidate.text), typed];
    } catch (err) {
      if (isCompletionError(err)) {
        return [[], ""];
      }
      throw err;
    }
  };
}

function askConfirm(rl: readline.Interface, message: string): Promise<boolean> {
  return new Promise((resolve) => {
    rl.question(`${message} (y/N) `, (answer) => {
      resolve(answer.trim().toLowerCase() === "y");
    });
  });
}

/**
 * Interactive loop. Resolves when the session ends.
 */
export async function runRepl(options: ReplOptions): Promise<void> {
  const { config, logger, service, registry } = options;
  const terminal = options.terminal ?? process.stdout;
  const out = options.output ?? createStreamOutput(terminal);
  const prompt = renderPrompt(config.main.prompt, options.databaseName);
  let buffer: string[] = [];
  let running: AbortController | null = null;

  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output: terminal,
    prompt,
    terminal: true,
    completer: createCompleter(options.store, registry, config, () => buffer),
  });

  const execute = async (sql: string): Promise<boolean> => {
    running = new AbortController();
    try {
      for await (const result of service.executeSQL(sql, { signal: running.signal })) {
        if (result.error) {
          out.printError(`Error: ${result.error}`);
          continue;
        }
        for (const line of formatResult(result, { timing: !result.exit })) {
          out.print(line);
        }
        if (result.exit) return true;
      }
      return false;
    } finally {
      running = null;
    }
  };

  const handleLine = async (line: string): Promise<void> => {
    const trimmed = line.trim();

    if (trimmed.length === 0 && buffer.length === 0) {
      rl.prompt();
      return;
    }

    // Special commands run without a terminating `;`
    if (buffer.length === 0 && registry.isSpecial(trimmed)) {
      if (await execute(trimmed)) {
        rl.close();
        return;
      }
      rl.prompt();
      return;
    }

    buffer.push(line);
    const sql = buffer.join("\n").trim();
    if (!sql.endsWith(";")) {
      rl.setPrompt(CONTINUATION_PROMPT);
      rl.prompt();
      return;
    }

    buffer = [];
    rl.setPrompt(prompt);

    if (config.main.destructive_warning && isDestructive(sql)) {
      const confirmed = await askConfirm(rl, "You're about to run a destructive command.\nDo you want to proceed?");
      if (!confirmed) {
        out.print("Wise choice!");
        rl.prompt();
        return;
      }
    }

    if (await execute(sql)) {
      rl.close();
      return;
    }
    rl.prompt();
  };

  let queue = Promise.resolve();
  rl.on("line", (line: string) => {
    queue = queue
      .then(() => handleLine(line))
      .catch((err: unknown) => {
        out.printError(`Error: ${getErrorMessage(err)}`);
        rl.prompt();
      });
  });

  rl.on("SIGINT", () => {
    if (running) {
      logger.debug("Cancelling the running query");
      running.abort();
      return;
    }
    if (buffer.length > 0) {
      buffer = [];
      rl.setPrompt(prompt);
      out.print("");
      rl.prompt();
      return;
    }
    rl.close();
  });

  logger.debug(`Interactive session on ${options.databaseName}`);
  rl.prompt();
  await new Promise<void>((resolve) => {
    rl.on("close", resolve);
  });
  await queue;
}
