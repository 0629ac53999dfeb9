// ============================================================================
// Switchyard — Agents Repository
// ============================================================================
//
// Each liveness change is one guarded statement, so the sweep can run
// alongside activate/touch/deactivate without losing or doubling a change.
//
// ============================================================================

import type { Database as DatabaseType } from "better-sqlite3";
import { withStore } from "../database.js";
import type { Agent, AgentRow } from "../types.js";

function parseCapabilities(raw: string): string[] {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((c): c is string => typeof c === "string") : [];
}

export function toAgent(row: AgentRow): Agent {
    return {
        id: row.id,
        capabilities: parseCapabilities(row.capabilities),
        status: row.status,
        connectedAt: row.connected_at,
        lastHeartbeat: row.last_heartbeat,
        disconnectedAt: row.disconnected_at,
        disconnectReason: row.disconnect_reason,
    };
}

export class AgentsRepo {
    constructor(private db: DatabaseType) { }

    private run<T>(op: () => T): T {
        return withStore(this.db, op);
    }

    /**
     * Insert a new agent or reactivate a disconnected one.
     * Returns false (and changes nothing) when the id is already connected.
     */
    activate(id: string, capabilities: string[], nowMs: number): boolean {
        return this.run(() => this.db.prepare(`
            INSERT INTO agents (id, capabilities, status, connected_at, last_heartbeat)
            VALUES (?, ?, 'connected', ?, ?)
            ON CONFLICT(id) DO UPDATE SET
                capabilities = excluded.capabilities,
                status = 'connected',
                connected_at = excluded.connected_at,
                last_heartbeat = excluded.last_heartbeat,
                disconnected_at = NULL,
                disconnect_reason = NULL
            WHERE agents.status = 'disconnected'
        `).run(id, JSON.stringify(capabilities), nowMs, nowMs).changes === 1);
    }

    /** Refresh a connected agent's heartbeat. Returns false when no connected row matched. */
    touch(id: string, nowMs: number): boolean {
        return this.run(() => this.db.prepare(
            "UPDATE agents SET last_heartbeat = MAX(last_heartbeat, ?) WHERE id = ? AND status = 'connected'"
        ).run(nowMs, id).changes === 1);
    }

    /** Mark one connected agent disconnected. Returns false if it was not connected. */
    deactivate(id: string, nowMs: number, reason: string): boolean {
        return this.run(() => this.db.prepare(
            "UPDATE agents SET status = 'disconnected', disconnected_at = ?, disconnect_reason = ? WHERE id = ? AND status = 'connected'"
        ).run(nowMs, reason, id).changes === 1);
    }

    /** Disconnect every connected agent whose last heartbeat is older than cutoffMs; returns their ids. */
    deactivateStale(cutoffMs: number, nowMs: number, reason: string): string[] {
        const rows = this.run(() => this.db.prepare(`
            UPDATE agents SET status = 'disconnected', disconnected_at = ?, disconnect_reason = ?
            WHERE status = 'connected' AND last_heartbeat < ?
            RETURNING id
        `).all(nowMs, reason, cutoffMs) as Array<{ id: string }>);
        return rows.map((r) => r.id);
    }

    getById(id: string): AgentRow | null {
        return this.run(() => (this.db.prepare(
            "SELECT * FROM agents WHERE id = ?"
        ).get(id) as AgentRow | undefined) ?? null);
    }

    getAll(): AgentRow[] {
        return this.run(() => this.db.prepare(
            "SELECT * FROM agents ORDER BY last_heartbeat DESC, id"
        ).all() as AgentRow[]);
    }

    /** Connected agent ids, most recent heartbeat first; filtered by capability when given. */
    findConnected(capability: string | null): string[] {
        const rows = this.run(() => {
            if (capability) {
                return this.db.prepare(`
                    SELECT id FROM agents
                    WHERE status = 'connected'
                      AND EXISTS (SELECT 1 FROM json_each(capabilities) WHERE value = ?)
                    ORDER BY last_heartbeat DESC, id
                `).all(capability) as Array<{ id: string }>;
            }
            return this.db.prepare(
                "SELECT id FROM agents WHERE status = 'connected' ORDER BY last_heartbeat DESC, id"
            ).all() as Array<{ id: string }>;
        });
        return rows.map((r) => r.id);
    }

    /** Delete agents disconnected before cutoffMs. */
    pruneDisconnected(cutoffMs: number): number {
        return this.run(() => this.db.prepare(
            "DELETE FROM agents WHERE status = 'disconnected' AND disconnected_at < ?"
        ).run(cutoffMs).changes);
    }

    countByStatus(): { connected: number; disconnected: number } {
        const rows = this.run(() => this.db.prepare(
            "SELECT status, COUNT(*) as count FROM agents GROUP BY status"
        ).all() as Array<{ status: "connected" | "disconnected"; count: number }>);
        const counts = { connected: 0, disconnected: 0 };
        for (const row of rows) counts[row.status] = row.count;
        return counts;
    }
}
