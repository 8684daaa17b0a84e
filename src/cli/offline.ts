import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { LumenConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { SqliteAutomationStore } from "../storage/automation-store.js";
import { LumenDB } from "../storage/db.js";
import { SqliteEventStore } from "../storage/event-store.js";

/** Stores opened straight from the state directory, for commands that run without the service. */
export interface OfflineContext {
  readonly config: LumenConfig;
  readonly logger: Logger;
  readonly db: LumenDB;
  readonly events: SqliteEventStore;
  readonly automations: SqliteAutomationStore;
  close(): void;
}

export function openOffline(configPath?: string): OfflineContext {
  const config = loadConfig(configPath);
  // Plain JSON at warn level keeps command output readable
  const logger = createLogger({ level: "warn", json: true });
  const db = new LumenDB(ensureDir(getStateDir()));
  const events = new SqliteEventStore(db, { timezone: config.location.timezone, logger });
  const automations = new SqliteAutomationStore(db, logger);
  return { config, logger, db, events, automations, close: () => db.close() };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
