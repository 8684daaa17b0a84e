import type { Automation, AutomationPatch, NewAutomation } from "../automation/types.js";
import type {
  LightEvent,
  LightEventType,
  MinedPattern,
  NewLightEvent,
  Pattern,
} from "../patterns/types.js";

export interface EventQuery {
  readonly lightId?: string;
  readonly eventType?: LightEventType;
  /** Inclusive epoch-ms bounds */
  readonly start?: number;
  readonly end?: number;
  readonly limit?: number;
}

export interface PatternQuery {
  readonly activeOnly?: boolean;
  readonly minConfidence?: number;
  readonly minOccurrences?: number;
}

export interface PatternFeedback {
  readonly confidence: number;
  readonly isActive: boolean;
}

export interface StoreStatistics {
  readonly totalEvents: number;
  readonly totalPatterns: number;
  readonly activePatterns: number;
  readonly oldestEvent: number | null;
  readonly newestEvent: number | null;
  readonly databasePath: string;
}

export interface EventStore {
  appendEvent(event: NewLightEvent): LightEvent;
  /** Newest first. */
  queryEvents(query?: EventQuery): LightEvent[];
  /** Insert, or refresh the stored pattern with the same key. */
  savePattern(pattern: MinedPattern): Pattern;
  loadActivePatterns(): Pattern[];
  listPatterns(query?: PatternQuery): Pattern[];
  getPattern(id: number): Pattern | null;
  /**
   * Read-modify-write of one pattern's confidence and active flag inside a
   * single transaction. Returns the updated pattern, or null when unknown.
   */
  updateConfidence(id: number, adjust: (current: Pattern) => PatternFeedback): Pattern | null;
  /** Returns the number of events removed. */
  cleanupOldEvents(retentionDays: number, now?: number): number;
  getStatistics(): StoreStatistics;
}

export interface AutomationStore {
  list(): Automation[];
  get(id: number): Automation | null;
  loadEnabled(): Automation[];
  create(automation: NewAutomation): Automation;
  update(id: number, patch: AutomationPatch): Automation | null;
  delete(id: number): boolean;
  setEnabled(id: number, enabled: boolean): Automation | null;
  recordTrigger(id: number, at?: number): void;
}
