import Database from "better-sqlite3";
import { join } from "node:path";

export const DB_FILENAME = "lumen.db";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS light_events (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  light_id    TEXT NOT NULL,
  light_name  TEXT NOT NULL,
  timestamp   INTEGER NOT NULL,
  event_type  TEXT NOT NULL CHECK(event_type IN ('on','off','brightness','hue','color_temp')),
  old_value   TEXT,
  new_value   TEXT,
  weekday     INTEGER NOT NULL,
  hour        INTEGER NOT NULL,
  minute      INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_events_light ON light_events(light_id);
CREATE INDEX IF NOT EXISTS idx_events_timestamp ON light_events(timestamp);

CREATE TABLE IF NOT EXISTS detected_patterns (
  id               INTEGER PRIMARY KEY AUTOINCREMENT,
  pattern_type     TEXT NOT NULL CHECK(pattern_type IN ('time_based','sequence','correlation')),
  description      TEXT NOT NULL DEFAULT '',
  light_ids        TEXT NOT NULL,
  weekdays         TEXT NOT NULL DEFAULT '',
  time_start       TEXT,
  time_end         TEXT,
  action           TEXT NOT NULL,
  confidence       REAL NOT NULL DEFAULT 0,
  occurrence_count INTEGER NOT NULL DEFAULT 0,
  last_seen        INTEGER,
  created_at       INTEGER NOT NULL,
  is_active        INTEGER NOT NULL DEFAULT 1
);
CREATE INDEX IF NOT EXISTS idx_patterns_active ON detected_patterns(is_active);
`;

export class LumenDB {
  private db: Database.Database;
  readonly path: string;

  constructor(stateDir: string) {
    this.path = join(stateDir, DB_FILENAME);
    this.db = new Database(this.path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
    this.migrate();
  }

  /**
   * Forward-only migrations for existing databases.
   * Each migration is idempotent (checks before altering).
   */
  private migrate(): void {
    const columns = this.db
      .prepare("PRAGMA table_info(detected_patterns)")
      .all() as Array<{ name: string }>;
    if (!columns.some((c) => c.name === "pattern_key")) {
      this.db.exec("ALTER TABLE detected_patterns ADD COLUMN pattern_key TEXT");
    }
    this.db.exec(
      "CREATE UNIQUE INDEX IF NOT EXISTS idx_patterns_key ON detected_patterns(pattern_key)",
    );
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
