import type Database from "better-sqlite3";
import { decodeAction, decodeTrigger, encodeAction, encodeTrigger } from "../automation/codec.js";
import type { Automation, AutomationPatch, NewAutomation } from "../automation/types.js";
import type { Logger } from "../logging/logger.js";
import type { LumenDB } from "./db.js";
import type { AutomationStore } from "./types.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS automations (
  id             INTEGER PRIMARY KEY AUTOINCREMENT,
  name           TEXT NOT NULL,
  description    TEXT,
  trigger_type   TEXT NOT NULL CHECK(trigger_type IN ('time','sunrise','sunset','manual')),
  trigger_config TEXT,
  target_type    TEXT NOT NULL CHECK(target_type IN ('light','room')),
  target_ids     TEXT NOT NULL,
  action_config  TEXT NOT NULL,
  is_enabled     INTEGER NOT NULL DEFAULT 1,
  trigger_count  INTEGER NOT NULL DEFAULT 0,
  last_triggered INTEGER,
  created_at     INTEGER NOT NULL,
  updated_at     INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_automations_enabled ON automations(is_enabled);
`;

interface AutomationRow {
  id: number;
  name: string;
  description: string | null;
  trigger_type: string;
  trigger_config: string | null;
  target_type: string;
  target_ids: string;
  action_config: string;
  is_enabled: number;
  trigger_count: number;
  last_triggered: number | null;
  created_at: number;
  updated_at: number;
}

export class SqliteAutomationStore implements AutomationStore {
  private readonly db: Database.Database;

  constructor(
    lumenDb: LumenDB,
    private readonly logger?: Logger,
  ) {
    this.db = lumenDb.raw();
    this.db.exec(SCHEMA_SQL);
  }

  list(): Automation[] {
    const rows = this.db.prepare("SELECT * FROM automations ORDER BY id ASC").all() as AutomationRow[];
    return this.decodeRows(rows);
  }

  loadEnabled(): Automation[] {
    const rows = this.db
      .prepare("SELECT * FROM automations WHERE is_enabled = 1 ORDER BY id ASC")
      .all() as AutomationRow[];
    return this.decodeRows(rows);
  }

  get(id: number): Automation | null {
    const row = this.db.prepare("SELECT * FROM automations WHERE id = ?").get(id) as
      | AutomationRow
      | undefined;
    return row ? this.toAutomation(row) : null;
  }

  create(automation: NewAutomation): Automation {
    const now = Date.now();
    const trigger = encodeTrigger(automation.trigger);
    const result = this.db
      .prepare(
        `INSERT INTO automations (name, description, trigger_type, trigger_config, target_type, target_ids,
           action_config, is_enabled, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        automation.name,
        automation.description ?? null,
        trigger.type,
        trigger.config ? JSON.stringify(trigger.config) : null,
        automation.target.type,
        automation.target.ids.join(","),
        JSON.stringify(encodeAction(automation.action)),
        automation.isEnabled === false ? 0 : 1,
        now,
        now,
      );

    const id = Number(result.lastInsertRowid);
    const created = this.get(id);
    if (!created) throw new Error(`Automation ${id} could not be read back`);
    this.logger?.info({ id, name: automation.name }, "Automation created");
    return created;
  }

  update(id: number, patch: AutomationPatch): Automation | null {
    const current = this.get(id);
    if (!current) return null;

    const next: NewAutomation = {
      name: patch.name ?? current.name,
      description: patch.description === undefined ? current.description : patch.description,
      trigger: patch.trigger ?? current.trigger,
      target: patch.target ?? current.target,
      action: patch.action ?? current.action,
      isEnabled: patch.isEnabled ?? current.isEnabled,
    };
    const trigger = encodeTrigger(next.trigger);

    this.db
      .prepare(
        `UPDATE automations
         SET name = ?, description = ?, trigger_type = ?, trigger_config = ?, target_type = ?,
             target_ids = ?, action_config = ?, is_enabled = ?, updated_at = ?
         WHERE id = ?`,
      )
      .run(
        next.name,
        next.description ?? null,
        trigger.type,
        trigger.config ? JSON.stringify(trigger.config) : null,
        next.target.type,
        next.target.ids.join(","),
        JSON.stringify(encodeAction(next.action)),
        next.isEnabled ? 1 : 0,
        Date.now(),
        id,
      );
    return this.get(id);
  }

  delete(id: number): boolean {
    return this.db.prepare("DELETE FROM automations WHERE id = ?").run(id).changes > 0;
  }

  setEnabled(id: number, enabled: boolean): Automation | null {
    const { changes } = this.db
      .prepare("UPDATE automations SET is_enabled = ?, updated_at = ? WHERE id = ?")
      .run(enabled ? 1 : 0, Date.now(), id);
    return changes > 0 ? this.get(id) : null;
  }

  recordTrigger(id: number, at = Date.now()): void {
    this.db
      .prepare("UPDATE automations SET trigger_count = trigger_count + 1, last_triggered = ? WHERE id = ?")
      .run(at, id);
  }

  private decodeRows(rows: AutomationRow[]): Automation[] {
    const automations: Automation[] = [];
    for (const row of rows) {
      const automation = this.toAutomation(row);
      if (automation) automations.push(automation);
    }
    return automations;
  }

  private toAutomation(row: AutomationRow): Automation | null {
    if (row.target_type !== "light" && row.target_type !== "room") {
      this.logger?.warn({ id: row.id, targetType: row.target_type }, "Skipping automation with unknown target type");
      return null;
    }

    try {
      return {
        id: row.id,
        name: row.name,
        description: row.description,
        trigger: decodeTrigger(row.trigger_type, row.trigger_config),
        target: {
          type: row.target_type,
          ids: row.target_ids
            .split(",")
            .map((s) => s.trim())
            .filter((s) => s.length > 0),
        },
        action: decodeAction(row.action_config),
        isEnabled: row.is_enabled === 1,
        triggerCount: row.trigger_count,
        lastTriggered: row.last_triggered,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
      };
    } catch (err) {
      this.logger?.warn(
        { id: row.id, err: err instanceof Error ? err.message : String(err) },
        "Skipping automation with unreadable trigger or action",
      );
      return null;
    }
  }
}
