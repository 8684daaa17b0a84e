import type { SessionStatus } from "../adaptive/controller.js";
import { encodeAction, encodeTrigger } from "../automation/codec.js";
import type { Automation, ExecutionResult } from "../automation/types.js";
import type { LightState } from "../devices/types.js";
import { brightnessPercent } from "../devices/types.js";
import { formatConfidence } from "../patterns/describe.js";
import type { Prediction, ReactiveAction, Recommendation } from "../patterns/predictor.js";
import type { LightEvent, Pattern } from "../patterns/types.js";

export const iso = (ms: number | null): string | null => (ms === null ? null : new Date(ms).toISOString());

export function eventJson(e: LightEvent) {
  return {
    id: e.id,
    light_id: e.lightId,
    light_name: e.lightName,
    timestamp: iso(e.timestamp),
    event_type: e.eventType,
    old_value: e.oldValue,
    new_value: e.newValue,
    weekday: e.weekday,
    hour: e.hour,
    minute: e.minute,
  };
}

export function patternJson(p: Pattern) {
  return {
    id: p.id,
    type: p.type,
    description: p.description,
    light_ids: p.lightIds,
    weekdays: p.weekdays,
    time_start: p.timeStart,
    time_end: p.timeEnd,
    action: p.action,
    confidence: formatConfidence(p.confidence),
    occurrences: p.occurrenceCount,
    last_seen: iso(p.lastSeen),
    is_active: p.isActive,
  };
}

export function predictionJson(p: Prediction) {
  return {
    pattern_id: p.patternId,
    pattern_type: p.patternType,
    description: p.description,
    action: p.action,
    confidence: formatConfidence(p.confidence),
    trigger_time: iso(p.triggerTime),
  };
}

export function recommendationJson(r: Recommendation) {
  return { type: r.type, message: r.message, confidence: formatConfidence(r.confidence), action: r.action };
}

export function reactiveJson(a: ReactiveAction) {
  return {
    pattern_id: a.patternId,
    light_id: a.lightId,
    action: a.eventType,
    delay_seconds: a.delaySeconds,
    confidence: formatConfidence(a.confidence),
  };
}

export function automationJson(a: Automation) {
  const trigger = encodeTrigger(a.trigger);
  return {
    id: a.id,
    name: a.name,
    description: a.description,
    trigger_type: trigger.type,
    trigger_config: trigger.config ?? {},
    target_type: a.target.type,
    target_ids: a.target.ids,
    action_config: encodeAction(a.action),
    is_enabled: a.isEnabled,
    trigger_count: a.triggerCount,
    last_triggered: iso(a.lastTriggered),
    created_at: iso(a.createdAt),
    updated_at: iso(a.updatedAt),
  };
}

export function executionJson(name: string | null, r: ExecutionResult) {
  return {
    success: r.success,
    ...(r.reason ? { reason: r.reason } : {}),
    automation: name,
    targets_updated: r.succeeded,
    total_targets: r.total,
    scheduled_steps: r.scheduledSteps,
  };
}

export function lightJson(l: LightState) {
  return {
    id: l.lightId,
    name: l.name,
    is_on: l.isOn,
    brightness: l.brightness,
    brightness_percent: brightnessPercent(l.brightness),
    hue: l.hue,
    saturation: l.saturation,
    color_temp: l.colorTemp,
    reachable: l.reachable,
  };
}

export function sessionJson(s: SessionStatus) {
  return {
    session_id: s.sessionId,
    sensor_id: s.sensorId,
    light_ids: s.lightIds,
    target_lux: s.targetLux,
    min_brightness: s.minBrightness,
    max_brightness: s.maxBrightness,
    step: s.step,
    status: s.status,
    current_lux: s.currentLux === null ? null : Math.round(s.currentLux * 10) / 10,
    current_brightness: s.currentBrightness,
    iterations: s.iterations,
    last_error: s.lastError,
    started_at: iso(s.startedAt),
  };
}

export function eventSummaryJson(events: readonly LightEvent[], days: number) {
  const byLight: Record<string, Record<string, number>> = {};
  const byHour: Record<number, number> = {};
  for (let h = 0; h < 24; h++) byHour[h] = 0;

  for (const e of events) {
    const counts = byLight[e.lightName] ?? { on: 0, off: 0, brightness: 0, total: 0 };
    counts[e.eventType] = (counts[e.eventType] ?? 0) + 1;
    counts["total"] = (counts["total"] ?? 0) + 1;
    byLight[e.lightName] = counts;
    byHour[e.hour] = (byHour[e.hour] ?? 0) + 1;
  }

  return { days_analyzed: days, total_events: events.length, by_light: byLight, by_hour: byHour };
}
