import type { Logger } from "../logging/logger.js";
import { dateKey, localParts } from "../utils/local-time.js";
import { describeCorrelation, describeSequence, describeTimeBased } from "./describe.js";
import type { LightEvent, LightEventType, MinedPattern, MiningOptions } from "./types.js";

/** Same-type changes on two lights this close together count as correlated. */
const CORRELATION_WINDOW_SECONDS = 5;
/** How many following events a correlation scan looks at. */
const CORRELATION_LOOKAHEAD = 4;

interface TimeGroup {
  readonly lightId: string;
  readonly weekday: number;
  readonly hour: number;
  readonly eventType: LightEventType;
  count: number;
  lastSeen: number;
}

interface SequenceGroup {
  readonly first: LightEvent;
  readonly second: LightEvent;
  readonly delays: number[];
  lastSeen: number;
}

interface CorrelationGroup {
  readonly lights: readonly [string, string];
  readonly eventType: LightEventType;
  count: number;
  lastSeen: number;
}

/**
 * Mines recurring behavior from a window of light events. Pure: reads
 * nothing but its input, so it can run on any slice of history.
 */
export class PatternMiner {
  constructor(
    private readonly options: MiningOptions,
    private readonly logger?: Logger,
  ) {}

  analyze(events: readonly LightEvent[], overrides?: Partial<MiningOptions>): MinedPattern[] {
    const opts = { ...this.options, ...overrides };
    if (events.length === 0) {
      this.logger?.debug("No events to analyze");
      return [];
    }

    const sorted = [...events].sort((a, b) => a.timestamp - b.timestamp);
    const names = new Map<string, string>();
    for (const e of sorted) names.set(e.lightId, e.lightName);

    const candidates = [
      ...this.detectTimePatterns(sorted, names, opts),
      ...this.detectSequencePatterns(sorted, names, opts),
      ...this.detectCorrelationPatterns(sorted, names, opts),
    ];
    const patterns = candidates.filter((p) => p.confidence >= opts.confidenceThreshold);

    this.logger?.info(
      { events: events.length, candidates: candidates.length, patterns: patterns.length },
      "Pattern analysis complete",
    );
    return patterns;
  }

  detectTimePatterns(
    sorted: readonly LightEvent[],
    names: ReadonlyMap<string, string>,
    opts: MiningOptions,
  ): MinedPattern[] {
    const groups = new Map<string, TimeGroup>();
    const days = new Set<string>();

    for (const e of sorted) {
      days.add(dateKey(localParts(e.timestamp, opts.timezone)));
      const key = [e.lightId, e.weekday, e.hour, e.eventType].join("\u0000");
      const group = groups.get(key);
      if (group) {
        group.count++;
        group.lastSeen = Math.max(group.lastSeen, e.timestamp);
      } else {
        groups.set(key, {
          lightId: e.lightId,
          weekday: e.weekday,
          hour: e.hour,
          eventType: e.eventType,
          count: 1,
          lastSeen: e.timestamp,
        });
      }
    }

    // How many times this weekday could have come round in the window
    const expected = Math.max(days.size / 7, 1);
    const patterns: MinedPattern[] = [];

    for (const g of groups.values()) {
      if (g.count < opts.minOccurrences) continue;
      const hh = String(g.hour).padStart(2, "0");
      patterns.push({
        type: "time_based",
        description: describeTimeBased(names.get(g.lightId) ?? g.lightId, g.eventType, g.weekday, g.hour),
        lightIds: [g.lightId],
        weekdays: [g.weekday],
        timeStart: `${hh}:00`,
        timeEnd: `${hh}:59`,
        action: { kind: "time_based", lightId: g.lightId, eventType: g.eventType },
        confidence: Math.min(1, g.count / expected),
        occurrenceCount: g.count,
        lastSeen: g.lastSeen,
      });
    }
    return patterns;
  }

  detectSequencePatterns(
    sorted: readonly LightEvent[],
    names: ReadonlyMap<string, string>,
    opts: MiningOptions,
  ): MinedPattern[] {
    const windowSeconds = opts.timeWindowMinutes * 60;
    const groups = new Map<string, SequenceGroup>();

    for (let i = 0; i < sorted.length - 1; i++) {
      const current = sorted[i];
      const next = sorted[i + 1];
      const delta = (next.timestamp - current.timestamp) / 1000;
      if (delta <= 0 || delta > windowSeconds) continue;
      if (current.lightId === next.lightId) continue;

      const key = [current.lightId, current.eventType, next.lightId, next.eventType].join("\u0000");
      const group = groups.get(key);
      if (group) {
        group.delays.push(delta);
        group.lastSeen = next.timestamp;
      } else {
        groups.set(key, { first: current, second: next, delays: [delta], lastSeen: next.timestamp });
      }
    }

    const patterns: MinedPattern[] = [];
    for (const g of groups.values()) {
      const count = g.delays.length;
      if (count < opts.minOccurrences) continue;
      const mean = g.delays.reduce((sum, d) => sum + d, 0) / count;
      const delaySeconds = Math.trunc(mean);
      const { first, second } = g;

      patterns.push({
        type: "sequence",
        description: describeSequence(
          names.get(first.lightId) ?? first.lightId,
          first.eventType,
          names.get(second.lightId) ?? second.lightId,
          second.eventType,
          delaySeconds,
        ),
        lightIds: [first.lightId, second.lightId],
        weekdays: [],
        timeStart: null,
        timeEnd: null,
        action: {
          kind: "sequence",
          trigger: { lightId: first.lightId, eventType: first.eventType },
          response: { lightId: second.lightId, eventType: second.eventType },
          delaySeconds,
        },
        confidence: Math.min(1, count / (opts.minOccurrences * 2)),
        occurrenceCount: count,
        lastSeen: g.lastSeen,
      });
    }
    return patterns;
  }

  detectCorrelationPatterns(
    sorted: readonly LightEvent[],
    names: ReadonlyMap<string, string>,
    opts: MiningOptions,
  ): MinedPattern[] {
    const groups = new Map<string, CorrelationGroup>();

    for (let i = 0; i < sorted.length - 1; i++) {
      const current = sorted[i];
      const end = Math.min(i + 1 + CORRELATION_LOOKAHEAD, sorted.length);

      for (let j = i + 1; j < end; j++) {
        const next = sorted[j];
        if ((next.timestamp - current.timestamp) / 1000 > CORRELATION_WINDOW_SECONDS) break;
        if (current.lightId === next.lightId || current.eventType !== next.eventType) continue;

        const lights: [string, string] =
          current.lightId < next.lightId
            ? [current.lightId, next.lightId]
            : [next.lightId, current.lightId];
        const key = [lights[0], lights[1], current.eventType].join("\u0000");
        const group = groups.get(key);
        if (group) {
          group.count++;
          group.lastSeen = next.timestamp;
        } else {
          groups.set(key, { lights, eventType: current.eventType, count: 1, lastSeen: next.timestamp });
        }
      }
    }

    const patterns: MinedPattern[] = [];
    for (const g of groups.values()) {
      if (g.count < opts.minOccurrences) continue;
      const [a, b] = g.lights;
      patterns.push({
        type: "correlation",
        description: describeCorrelation(names.get(a) ?? a, names.get(b) ?? b, g.eventType),
        lightIds: [a, b],
        weekdays: [],
        timeStart: null,
        timeEnd: null,
        action: { kind: "correlation", eventType: g.eventType, lights: [a, b] },
        confidence: Math.min(1, g.count / (opts.minOccurrences * 3)),
        occurrenceCount: g.count,
        lastSeen: g.lastSeen,
      });
    }
    return patterns;
  }
}
