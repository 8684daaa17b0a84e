import type Database from "better-sqlite3";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import { LIGHT_EVENT_TYPES, isLightEventType } from "../patterns/types.js";
import type {
  LightEvent,
  MinedPattern,
  NewLightEvent,
  Pattern,
  PatternAction,
  PatternType,
} from "../patterns/types.js";
import { localParts } from "../utils/local-time.js";
import type { LumenDB } from "./db.js";
import type {
  EventQuery,
  EventStore,
  PatternFeedback,
  PatternQuery,
  StoreStatistics,
} from "./types.js";

const DAY_MS = 86_400_000;
const DEFAULT_EVENT_LIMIT = 1000;

interface EventRow {
  id: number;
  light_id: string;
  light_name: string;
  timestamp: number;
  event_type: string;
  old_value: string | null;
  new_value: string | null;
  weekday: number;
  hour: number;
  minute: number;
}

interface PatternRow {
  id: number;
  pattern_key: string | null;
  pattern_type: string;
  description: string;
  light_ids: string;
  weekdays: string;
  time_start: string | null;
  time_end: string | null;
  action: string;
  confidence: number;
  occurrence_count: number;
  last_seen: number | null;
  created_at: number;
  is_active: number;
}

const eventTypeSchema = z.enum(LIGHT_EVENT_TYPES);
const eventRefSchema = z.object({ lightId: z.string(), eventType: eventTypeSchema });

const patternActionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("time_based"), lightId: z.string(), eventType: eventTypeSchema }),
  z.object({
    kind: z.literal("sequence"),
    trigger: eventRefSchema,
    response: eventRefSchema,
    delaySeconds: z.number(),
  }),
  z.object({
    kind: z.literal("correlation"),
    eventType: eventTypeSchema,
    lights: z.tuple([z.string(), z.string()]),
  }),
]);

const patternTypeSchema = z.enum(["time_based", "sequence", "correlation"]);

function actionSignature(action: PatternAction): string {
  switch (action.kind) {
    case "time_based":
      return `${action.lightId}:${action.eventType}`;
    case "sequence":
      return `${action.trigger.lightId}:${action.trigger.eventType}>${action.response.lightId}:${action.response.eventType}`;
    case "correlation":
      return `${action.eventType}:${action.lights.join("+")}`;
  }
}

/**
 * Identity of a pattern across mining runs. The mean sequence delay is left
 * out so a drifting delay refreshes the pattern instead of forking it.
 */
export function patternKey(pattern: MinedPattern): string {
  return [
    pattern.type,
    pattern.lightIds.join(","),
    pattern.weekdays.join(","),
    pattern.timeStart ?? "",
    actionSignature(pattern.action),
  ].join("|");
}

function splitList(value: string): string[] {
  return value === "" ? [] : value.split(",");
}

export interface EventStoreOptions {
  /** Zone used to derive weekday/hour/minute of appended events. */
  readonly timezone?: string;
  readonly logger?: Logger;
}

export class SqliteEventStore implements EventStore {
  private readonly db: Database.Database;
  private readonly databasePath: string;

  constructor(
    lumenDb: LumenDB,
    private readonly options: EventStoreOptions = {},
  ) {
    this.db = lumenDb.raw();
    this.databasePath = lumenDb.path;
  }

  // ── Events ──

  appendEvent(event: NewLightEvent): LightEvent {
    const { weekday, hour, minute } = localParts(event.timestamp, this.options.timezone);
    const result = this.db
      .prepare(
        `INSERT INTO light_events (light_id, light_name, timestamp, event_type, old_value, new_value, weekday, hour, minute)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        event.lightId,
        event.lightName,
        event.timestamp,
        event.eventType,
        event.oldValue,
        event.newValue,
        weekday,
        hour,
        minute,
      );
    return { ...event, id: Number(result.lastInsertRowid), weekday, hour, minute };
  }

  queryEvents(query: EventQuery = {}): LightEvent[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (query.lightId) {
      conditions.push("light_id = ?");
      params.push(query.lightId);
    }
    if (query.eventType) {
      conditions.push("event_type = ?");
      params.push(query.eventType);
    }
    if (query.start !== undefined) {
      conditions.push("timestamp >= ?");
      params.push(query.start);
    }
    if (query.end !== undefined) {
      conditions.push("timestamp <= ?");
      params.push(query.end);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    params.push(query.limit ?? DEFAULT_EVENT_LIMIT);

    const rows = this.db
      .prepare(`SELECT * FROM light_events ${where} ORDER BY timestamp DESC, id DESC LIMIT ?`)
      .all(...params) as EventRow[];

    const events: LightEvent[] = [];
    for (const row of rows) {
      const event = this.toEvent(row);
      if (event) events.push(event);
    }
    return events;
  }

  cleanupOldEvents(retentionDays: number, now = Date.now()): number {
    const cutoff = now - retentionDays * DAY_MS;
    const { changes } = this.db.prepare("DELETE FROM light_events WHERE timestamp < ?").run(cutoff);
    if (changes > 0) {
      this.options.logger?.info({ deleted: changes, retentionDays }, "Cleaned up old events");
    }
    return changes;
  }

  // ── Patterns ──

  savePattern(pattern: MinedPattern): Pattern {
    const key = patternKey(pattern);
    const save = this.db.transaction((): number => {
      const existing = this.db
        .prepare("SELECT id FROM detected_patterns WHERE pattern_key = ?")
        .get(key) as { id: number } | undefined;

      if (existing) {
        this.db
          .prepare(
            `UPDATE detected_patterns
             SET description = ?, occurrence_count = ?, last_seen = ?, time_end = ?, action = ?
             WHERE id = ?`,
          )
          .run(
            pattern.description,
            pattern.occurrenceCount,
            pattern.lastSeen,
            pattern.timeEnd,
            JSON.stringify(pattern.action),
            existing.id,
          );
        return existing.id;
      }

      const result = this.db
        .prepare(
          `INSERT INTO detected_patterns (pattern_key, pattern_type, description, light_ids, weekdays,
             time_start, time_end, action, confidence, occurrence_count, last_seen, created_at, is_active)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1)`,
        )
        .run(
          key,
          pattern.type,
          pattern.description,
          pattern.lightIds.join(","),
          pattern.weekdays.join(","),
          pattern.timeStart,
          pattern.timeEnd,
          JSON.stringify(pattern.action),
          pattern.confidence,
          pattern.occurrenceCount,
          pattern.lastSeen,
          Date.now(),
        );
      return Number(result.lastInsertRowid);
    });

    const id = save();
    const saved = this.getPattern(id);
    if (!saved) throw new Error(`Pattern ${id} vanished after save`);
    return saved;
  }

  loadActivePatterns(): Pattern[] {
    return this.listPatterns({ activeOnly: true });
  }

  listPatterns(query: PatternQuery = {}): Pattern[] {
    const conditions: string[] = [];
    const params: number[] = [];

    if (query.activeOnly) conditions.push("is_active = 1");
    if (query.minConfidence !== undefined) {
      conditions.push("confidence >= ?");
      params.push(query.minConfidence);
    }
    if (query.minOccurrences !== undefined) {
      conditions.push("occurrence_count >= ?");
      params.push(query.minOccurrences);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const rows = this.db
      .prepare(`SELECT * FROM detected_patterns ${where} ORDER BY confidence DESC, id ASC`)
      .all(...params) as PatternRow[];

    const patterns: Pattern[] = [];
    for (const row of rows) {
      const pattern = this.toPattern(row);
      if (pattern) patterns.push(pattern);
    }
    return patterns;
  }

  getPattern(id: number): Pattern | null {
    const row = this.db.prepare("SELECT * FROM detected_patterns WHERE id = ?").get(id) as
      | PatternRow
      | undefined;
    return row ? this.toPattern(row) : null;
  }

  updateConfidence(id: number, adjust: (current: Pattern) => PatternFeedback): Pattern | null {
    const apply = this.db.transaction((): Pattern | null => {
      const current = this.getPattern(id);
      if (!current) return null;
      const next = adjust(current);
      this.db
        .prepare("UPDATE detected_patterns SET confidence = ?, is_active = ? WHERE id = ?")
        .run(next.confidence, next.isActive ? 1 : 0, id);
      return { ...current, confidence: next.confidence, isActive: next.isActive };
    });
    return apply();
  }

  getStatistics(): StoreStatistics {
    const events = this.db
      .prepare("SELECT COUNT(*) AS total, MIN(timestamp) AS oldest, MAX(timestamp) AS newest FROM light_events")
      .get() as { total: number; oldest: number | null; newest: number | null };
    const patterns = this.db
      .prepare(
        "SELECT COUNT(*) AS total, COALESCE(SUM(CASE WHEN is_active = 1 THEN 1 ELSE 0 END), 0) AS active FROM detected_patterns",
      )
      .get() as { total: number; active: number };

    return {
      totalEvents: events.total,
      totalPatterns: patterns.total,
      activePatterns: patterns.active,
      oldestEvent: events.oldest,
      newestEvent: events.newest,
      databasePath: this.databasePath,
    };
  }

  // ── Row mappers ──

  private toEvent(row: EventRow): LightEvent | null {
    if (!isLightEventType(row.event_type)) {
      this.options.logger?.warn({ id: row.id, eventType: row.event_type }, "Skipping event with unknown type");
      return null;
    }
    return {
      id: row.id,
      lightId: row.light_id,
      lightName: row.light_name,
      timestamp: row.timestamp,
      eventType: row.event_type,
      oldValue: row.old_value,
      newValue: row.new_value,
      weekday: row.weekday,
      hour: row.hour,
      minute: row.minute,
    };
  }

  private toPattern(row: PatternRow): Pattern | null {
    let action: PatternAction;
    let type: PatternType;
    try {
      action = patternActionSchema.parse(JSON.parse(row.action));
      type = patternTypeSchema.parse(row.pattern_type);
    } catch (err) {
      this.options.logger?.warn(
        { id: row.id, err: err instanceof Error ? err.message : String(err) },
        "Skipping pattern with unreadable action",
      );
      return null;
    }

    return {
      id: row.id,
      key: row.pattern_key ?? "",
      type,
      description: row.description,
      lightIds: splitList(row.light_ids),
      weekdays: splitList(row.weekdays).map(Number),
      timeStart: row.time_start,
      timeEnd: row.time_end,
      action,
      confidence: row.confidence,
      occurrenceCount: row.occurrence_count,
      lastSeen: row.last_seen ?? row.created_at,
      isActive: row.is_active === 1,
      createdAt: row.created_at,
    };
  }
}
