// ============================================================================
// Test Helper — In-Memory Database Setup
// ============================================================================

import Database from "better-sqlite3";
import { runMigrations } from "../../src/migrations.js";
import { createRepositories, type Repositories } from "../../src/repositories/index.js";
import type { Clock } from "../../src/types.js";

/**
 * Create a fresh in-memory SQLite database with the full schema applied.
 * Uses runMigrations() so tests always run against the current schema.
 */
export function createTestDb(clock: Clock = Date.now): {
  db: Database.Database;
  repos: Repositories;
  cleanup: () => void;
} {
  const db = new Database(":memory:");
  db.pragma("foreign_keys = ON");
  runMigrations(db);

  return {
    db,
    repos: createRepositories(db, clock),
    cleanup: () => {
      if (db.open) db.close();
    },
  };
}

/** A controllable clock for code that takes a Clock. */
export function manualClock(start: number = 1_000_000): Clock & { advance(ms: number): void; set(ms: number): void } {
  let now = start;
  const clock = () => now;
  return Object.assign(clock, {
    advance(ms: number) { now += ms; },
    set(ms: number) { now = ms; },
  });
}
