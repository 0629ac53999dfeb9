// ============================================================================
// Switchyard — Schema Migration System
// ============================================================================

import type { Database as DatabaseType } from "better-sqlite3";
import { log } from "./logger.js";

interface Migration {
  version: number;
  description: string;
  up: (db: DatabaseType) => void;
}

// ─── Migration Definitions ───────────────────────────────────────────

const migrations: Migration[] = [
  // ─── V1: Baseline Schema ───────────────────────────────────────────
  {
    version: 1,
    description: "Baseline schema — agents, tasks",
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS agents (
          id TEXT PRIMARY KEY,
          capabilities TEXT NOT NULL DEFAULT '[]',
          status TEXT NOT NULL CHECK (status IN ('connected', 'disconnected')),
          connected_at INTEGER NOT NULL,
          last_heartbeat INTEGER NOT NULL,
          disconnected_at INTEGER,
          disconnect_reason TEXT
        );
        CREATE INDEX IF NOT EXISTS idx_agents_status_heartbeat ON agents(status, last_heartbeat);

        -- seq gives a strict creation order; created_at alone can tie.
        CREATE TABLE IF NOT EXISTS tasks (
          seq INTEGER PRIMARY KEY AUTOINCREMENT,
          id TEXT NOT NULL UNIQUE,
          type TEXT NOT NULL,
          payload TEXT NOT NULL,
          capability TEXT,
          status TEXT NOT NULL DEFAULT 'pending'
            CHECK (status IN ('pending', 'assigned', 'completed', 'failed', 'expired')),
          assigned_agent TEXT,
          retry_count INTEGER NOT NULL DEFAULT 0,
          created_at INTEGER NOT NULL,
          assigned_at INTEGER,
          completed_at INTEGER,
          result TEXT,
          error TEXT
        );
        CREATE INDEX IF NOT EXISTS idx_tasks_status_seq ON tasks(status, seq);
        CREATE INDEX IF NOT EXISTS idx_tasks_assigned ON tasks(assigned_agent) WHERE status = 'assigned';
      `);
    },
  },

  // ─── V2: Task Event Audit Trail ────────────────────────────────────
  {
    version: 2,
    description: "Task events — one row per successful guarded transition",
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS task_events (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          task_id TEXT NOT NULL,
          at INTEGER NOT NULL,
          from_status TEXT,
          to_status TEXT NOT NULL,
          agent_id TEXT,
          detail TEXT
        );
        CREATE INDEX IF NOT EXISTS idx_task_events_task ON task_events(task_id, id);
      `);
    },
  },
];

// ─── Migration Runner ────────────────────────────────────────────────

export function runMigrations(db: DatabaseType): void {
  db.exec(`CREATE TABLE IF NOT EXISTS schema_meta (key TEXT PRIMARY KEY, value TEXT NOT NULL)`);

  const currentVersion = getCurrentSchemaVersion(db);
  const pendingMigrations = migrations.filter(m => m.version > currentVersion);

  if (pendingMigrations.length === 0) {
    return;
  }

  const target = pendingMigrations[pendingMigrations.length - 1].version;
  log.info(`Running ${pendingMigrations.length} migration(s) from v${currentVersion} → v${target}`);

  for (const migration of pendingMigrations) {
    log.debug(`  v${migration.version}: ${migration.description}`);

    const runMigration = db.transaction(() => {
      migration.up(db);
      db.prepare(
        "INSERT OR REPLACE INTO schema_meta (key, value) VALUES ('version', ?)"
      ).run(String(migration.version));
    });

    runMigration();
  }

  log.info(`Migrations complete. Schema at v${target}`);
}

export function getCurrentSchemaVersion(db: DatabaseType): number {
  try {
    const row = db.prepare("SELECT value FROM schema_meta WHERE key = 'version'").get() as { value: string } | undefined;
    return row ? parseInt(row.value, 10) : 0;
  } catch {
    return 0;
  }
}
