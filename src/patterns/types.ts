export const LIGHT_EVENT_TYPES = ["on", "off", "brightness", "hue", "color_temp"] as const;
export type LightEventType = (typeof LIGHT_EVENT_TYPES)[number];

export interface LightEvent {
  readonly id: number;
  readonly lightId: string;
  readonly lightName: string;
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly eventType: LightEventType;
  readonly oldValue: string | null;
  readonly newValue: string | null;
  /** 0 = Monday … 6 = Sunday, local time */
  readonly weekday: number;
  readonly hour: number;
  readonly minute: number;
}

export type NewLightEvent = Omit<LightEvent, "id" | "weekday" | "hour" | "minute">;

export type PatternType = "time_based" | "sequence" | "correlation";

export interface EventRef {
  readonly lightId: string;
  readonly eventType: LightEventType;
}

export type PatternAction =
  | { readonly kind: "time_based"; readonly lightId: string; readonly eventType: LightEventType }
  | {
      readonly kind: "sequence";
      readonly trigger: EventRef;
      readonly response: EventRef;
      readonly delaySeconds: number;
    }
  | {
      readonly kind: "correlation";
      readonly eventType: LightEventType;
      readonly lights: readonly [string, string];
    };

/** A pattern as produced by the miner, before it is persisted. */
export interface MinedPattern {
  readonly type: PatternType;
  readonly description: string;
  readonly lightIds: readonly string[];
  /** Empty means every day. */
  readonly weekdays: readonly number[];
  readonly timeStart: string | null;
  readonly timeEnd: string | null;
  readonly action: PatternAction;
  readonly confidence: number;
  readonly occurrenceCount: number;
  readonly lastSeen: number;
}

export interface Pattern extends MinedPattern {
  readonly id: number;
  readonly key: string;
  readonly isActive: boolean;
  readonly createdAt: number;
}

export interface MiningOptions {
  readonly minOccurrences: number;
  readonly timeWindowMinutes: number;
  readonly confidenceThreshold: number;
  /** Zone used to bucket events into calendar days. */
  readonly timezone?: string;
}

export function isLightEventType(value: string): value is LightEventType {
  return (LIGHT_EVENT_TYPES as readonly string[]).includes(value);
}
