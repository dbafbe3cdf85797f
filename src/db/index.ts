import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { resolve } from "node:path";
import { mkdirSync, existsSync } from "node:fs";
import * as schema from "./schema.js";
import { PATHS } from "../shared/constants.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const DEFAULT_DB_PATH = process.env["DATABASE_PATH"] ?? PATHS.DATABASE;
const BUSY_TIMEOUT_MS = 5_000;
const IN_MEMORY = ":memory:";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database.Database;
}

/**
 * Opens a new connection with the service's pragmas applied.
 * `:memory:` skips the directory check and WAL, which SQLite ignores there.
 */
export function createDatabase(dbPath: string = DEFAULT_DB_PATH): DatabaseHandle {
  const inMemory = dbPath === IN_MEMORY;

  if (!inMemory) {
    const dir = resolve(dbPath, "..");
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const sqlite = new Database(inMemory ? dbPath : resolve(dbPath));

  if (!inMemory) {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  sqlite.pragma("foreign_keys = ON");
  sqlite.pragma("synchronous = NORMAL");

  return { db: drizzle(sqlite, { schema }), sqlite };
}

// ---------------------------------------------------------------------------
// Singleton
// ---------------------------------------------------------------------------

let _handle: DatabaseHandle | undefined;

function getHandle(dbPath?: string): DatabaseHandle {
  if (!_handle) {
    _handle = createDatabase(dbPath);
  }
  return _handle;
}

/**
 * Returns the process-wide Drizzle instance, opening it on first call.
 * The path is only honoured by that first call.
 */
export function getDb(dbPath?: string): AppDatabase {
  return getHandle(dbPath).db;
}

/**
 * Returns the raw better-sqlite3 instance.
 * Useful for migrations and raw SQL operations.
 */
export function getSqlite(dbPath?: string): Database.Database {
  return getHandle(dbPath).sqlite;
}

/**
 * Cheap liveness probe used by the health endpoint.
 */
export function pingDatabase(sqlite: Database.Database): boolean {
  try {
    sqlite.prepare("SELECT 1").get();
    return true;
  } catch {
    return false;
  }
}

/**
 * Closes the database connection and resets the singleton.
 * Safe to call multiple times.
 */
export function closeDb(): void {
  if (_handle) {
    _handle.sqlite.close();
    _handle = undefined;
  }
}

export { schema };
