import Database from "better-sqlite3";
import { existsSync } from "fs";
import path from "path";

export interface ConnectionDetails {
  /** Database file, or `:memory:` */
  path: string;
  readonly?: boolean;
  /** Busy timeout in milliseconds */
  timeoutMs?: number;
}

export type Client = Database.Database;

export const MEMORY_DATABASE = ":memory:";

export function formatDatabaseName(details: ConnectionDetails): string {
  if (details.path === MEMORY_DATABASE) return MEMORY_DATABASE;
  return path.basename(details.path);
}

export function createClient(details: ConnectionDetails): Client {
  if (details.path !== MEMORY_DATABASE) {
    const dir = path.dirname(path.resolve(details.path));
    if (!existsSync(dir)) {
      throw new Error(`Path does not exist: ${dir}`);
    }
  }

  return new Database(details.path, {
    readonly: details.readonly ?? false,
    timeout: details.timeoutMs ?? 5000,
  });
}

export function getSqliteVersion(db: Client): string {
  const version: unknown = db.prepare("SELECT sqlite_version()").pluck().get();
  return typeof version === "string" ? version : "unknown";
}
