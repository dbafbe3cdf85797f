/**
 * Migration runner for the coupon store.
 *
 * Creates the coupons table and its indexes if they do not already
 * exist. Uses raw SQL via better-sqlite3 so the migration is idempotent
 * and can run without drizzle-kit tooling at runtime.
 *
 * Usage:
 *   tsx src/db/migrate.ts                 # standalone
 *   import { migrate } from './migrate'   # programmatic
 */
import type Database from "better-sqlite3";
import { getSqlite, closeDb } from "./index.js";
import { getLogger } from "../shared/logger.js";

const log = getLogger("store", { component: "migrate" });

// ---------------------------------------------------------------------------
// DDL statements
// ---------------------------------------------------------------------------

const DDL_STATEMENTS: string[] = [
  `CREATE TABLE IF NOT EXISTS coupons (
    id                   INTEGER PRIMARY KEY AUTOINCREMENT,
    name                 TEXT NOT NULL,
    description          TEXT NOT NULL,
    discount_percentage  REAL,
    code                 TEXT NOT NULL,
    url                  TEXT NOT NULL,
    source               TEXT NOT NULL,
    expiry               TEXT,
    created_at           TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    validated_at         TEXT,
    is_valid             INTEGER NOT NULL DEFAULT 0,
    is_posted            INTEGER NOT NULL DEFAULT 0,
    fingerprint          TEXT NOT NULL
  )`,
];

const INDEX_STATEMENTS: string[] = [
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_coupons_fingerprint ON coupons(fingerprint)`,
  `CREATE INDEX IF NOT EXISTS idx_coupons_source ON coupons(source)`,
  `CREATE INDEX IF NOT EXISTS idx_coupons_is_valid ON coupons(is_valid)`,
  `CREATE INDEX IF NOT EXISTS idx_coupons_is_posted ON coupons(is_posted)`,
  `CREATE INDEX IF NOT EXISTS idx_coupons_expiry ON coupons(expiry)`,
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run all migrations (idempotent) against `sqlite`, or against the
 * process-wide connection when none is given.
 */
export function migrate(sqlite: Database.Database = getSqlite()): void {
  sqlite.exec("BEGIN TRANSACTION");
  try {
    for (const ddl of DDL_STATEMENTS) {
      sqlite.exec(ddl);
    }
    for (const idx of INDEX_STATEMENTS) {
      sqlite.exec(idx);
    }
    sqlite.exec("COMMIT");
    log.debug(
      { tables: DDL_STATEMENTS.length, indexes: INDEX_STATEMENTS.length },
      "Migrations applied",
    );
  } catch (err) {
    sqlite.exec("ROLLBACK");
    log.error({ err }, "Migration failed, rolled back");
    throw err;
  }
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

const isDirectRun =
  process.argv[1]?.endsWith("migrate.ts") ||
  process.argv[1]?.endsWith("migrate.js");

if (isDirectRun) {
  try {
    migrate();
    closeDb();
    log.info("Done");
    process.exit(0);
  } catch {
    process.exit(1);
  }
}
