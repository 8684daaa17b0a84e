import type { LightEventType, MinedPattern, PatternType } from "./types.js";

const WEEKDAY_NAMES = [
  "Mondays", "Tuesdays", "Wednesdays", "Thursdays", "Fridays", "Saturdays", "Sundays",
];

const SINGULAR_VERB: Record<LightEventType, string> = {
  on: "turns on",
  off: "turns off",
  brightness: "changes brightness",
  hue: "changes color",
  color_temp: "changes color temperature",
};

const PLURAL_VERB: Record<LightEventType, string> = {
  on: "turn on",
  off: "turn off",
  brightness: "change brightness",
  hue: "change color",
  color_temp: "change color temperature",
};

const TYPE_HEADINGS: Record<PatternType, string> = {
  time_based: "Time-based",
  sequence: "Sequences",
  correlation: "Correlations",
};

const SUMMARY_LIMIT = 5;

export function describeTimeBased(
  lightName: string,
  eventType: LightEventType,
  weekday: number,
  hour: number,
): string {
  const time = `${String(hour).padStart(2, "0")}:00`;
  return `${lightName} ${SINGULAR_VERB[eventType]} at ${time} on ${WEEKDAY_NAMES[weekday] ?? `day ${weekday}`}`;
}

export function describeSequence(
  triggerName: string,
  triggerType: LightEventType,
  responseName: string,
  responseType: LightEventType,
  delaySeconds: number,
): string {
  return `When ${triggerName} ${SINGULAR_VERB[triggerType]}, ${responseName} ${SINGULAR_VERB[responseType]} within ${delaySeconds}s`;
}

export function describeCorrelation(
  firstName: string,
  secondName: string,
  eventType: LightEventType,
): string {
  return `${firstName} and ${secondName} often ${PLURAL_VERB[eventType]} together`;
}

export function formatConfidence(confidence: number): number {
  return Math.round(confidence * 100) / 100;
}

/** Human-readable digest, grouped by type, strongest patterns first. */
export function summarizePatterns(patterns: readonly MinedPattern[]): string {
  if (patterns.length === 0) {
    return "No patterns detected yet. Collect more data.";
  }

  const byType = new Map<PatternType, MinedPattern[]>();
  for (const p of patterns) {
    const group = byType.get(p.type) ?? [];
    group.push(p);
    byType.set(p.type, group);
  }

  const lines = ["Detected patterns:"];
  for (const [type, group] of byType) {
    lines.push("", `${TYPE_HEADINGS[type]}:`);
    const top = [...group].sort((a, b) => b.confidence - a.confidence).slice(0, SUMMARY_LIMIT);
    for (const p of top) {
      lines.push(
        `  - ${p.description} (confidence ${Math.round(p.confidence * 100)}%, seen ${p.occurrenceCount} times)`,
      );
    }
  }
  return lines.join("\n");
}
