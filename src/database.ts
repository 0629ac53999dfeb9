// ============================================================================
// Switchyard — Database Layer (better-sqlite3 — native, WAL mode)
// ============================================================================

import Database from "better-sqlite3";
import type { Database as DatabaseType } from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { runMigrations } from "./migrations.js";
import { log } from "./logger.js";
import { StoreUnavailableError } from "./errors.js";

const MEMORY_PATH = ":memory:";
const CORRUPTION_CODES = new Set(["SQLITE_CORRUPT", "SQLITE_NOTADB"]);

function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return "";
}

/**
 * Open the SQLite file, moving a corrupt WAL/SHM pair aside once before
 * giving up. busy_timeout is set first so a second process waits instead of
 * failing with SQLITE_BUSY. A busy database is never treated as corrupt.
 */
function openWithRecovery(dbPath: string): DatabaseType {
  try {
    const db = new Database(dbPath);
    db.pragma("busy_timeout = 5000");
    db.pragma("journal_mode = WAL");
    return db;
  } catch (err: unknown) {
    if (!CORRUPTION_CODES.has(errorCode(err))) throw err;
  }

  const ts = new Date().toISOString().replace(/[:.]/g, "-");
  for (const p of [`${dbPath}-wal`, `${dbPath}-shm`]) {
    if (fs.existsSync(p)) fs.renameSync(p, `${p}.corrupt.${ts}.bak`);
  }

  const db = new Database(dbPath);
  db.pragma("busy_timeout = 5000");
  db.pragma("journal_mode = WAL");
  log.warn("Recovered from corrupt WAL/SHM — some recent changes may be lost.", { dbPath });
  return db;
}

/**
 * Open (or create) the coordinator database and bring its schema current.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(dbPath: string): DatabaseType {
  let db: DatabaseType;
  if (dbPath === MEMORY_PATH) {
    db = new Database(MEMORY_PATH);
  } else {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    db = openWithRecovery(dbPath);
    db.pragma("synchronous = NORMAL");
  }
  db.pragma("foreign_keys = ON");

  runMigrations(db);
  return db;
}

// ─── Availability Guard ──────────────────────────────────────────────

// Base codes; extended codes such as SQLITE_BUSY_SNAPSHOT match by prefix.
const UNAVAILABLE_CODES = ["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_IOERR", "SQLITE_FULL", "SQLITE_CANTOPEN", "SQLITE_READONLY"];

export function isUnavailableError(err: unknown): boolean {
  const code = errorCode(err);
  return UNAVAILABLE_CODES.some((c) => code === c || code.startsWith(`${c}_`));
}

/**
 * Run a store operation, converting a closed database and lock or I/O
 * failures into StoreUnavailableError. Other errors pass through.
 */
export function withStore<T>(db: DatabaseType, op: () => T): T {
  if (!db.open) throw new StoreUnavailableError("database is closed");
  try {
    return op();
  } catch (err) {
    if (isUnavailableError(err)) {
      throw new StoreUnavailableError(err instanceof Error ? err.message : String(err), { code: errorCode(err) });
    }
    throw err;
  }
}

// ─── Shutdown ────────────────────────────────────────────────────────

export function closeDatabase(db: DatabaseType): void {
  if (!db.open) return;
  if (!db.memory) {
    try {
      db.pragma("wal_checkpoint(TRUNCATE)");
    } catch (err) {
      log.warn("WAL checkpoint failed on close", { message: err instanceof Error ? err.message : String(err) });
    }
  }
  db.close();
}
