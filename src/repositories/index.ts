// ============================================================================
// Switchyard — Repository Barrel Export
// ============================================================================

export { TasksRepo, isTransitionAllowed } from "./tasks.repo.js";
export type { TaskStore } from "./tasks.repo.js";
export { AgentsRepo, toAgent } from "./agents.repo.js";

import type { Database as DatabaseType } from "better-sqlite3";
import { TasksRepo } from "./tasks.repo.js";
import { AgentsRepo } from "./agents.repo.js";
import type { Clock } from "../types.js";

export interface Repositories {
    tasks: TasksRepo;
    agents: AgentsRepo;
}

/**
 * Create all repository instances from a single database connection.
 */
export function createRepositories(db: DatabaseType, clock: Clock = Date.now): Repositories {
    return {
        tasks: new TasksRepo(db, clock),
        agents: new AgentsRepo(db),
    };
}
