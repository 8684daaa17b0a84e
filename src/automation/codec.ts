import { z } from "zod";
import type { LightCommand } from "../devices/types.js";
import { ALL_WEEKDAYS } from "../utils/local-time.js";
import type { AutomationAction, AutomationTrigger } from "./types.js";

/*
 * Stored and HTTP payloads keep the snake_case keys of the device API
 * (`offset_minutes`, `color_temp`, `{ sequence: [{ delay_seconds, action }] }`).
 * They are decoded here, once, into the camelCase unions the scheduler uses.
 */

const weekdaysSchema = z
  .array(z.number().int().min(0).max(6))
  .optional()
  .transform((days) =>
    days && days.length > 0 ? [...new Set(days)].sort((a, b) => a - b) : [...ALL_WEEKDAYS],
  );

const triggerObjectSchema = z.discriminatedUnion("type", [
  // Time is checked when scheduling so one bad row cannot block the rest
  z.object({ type: z.literal("time"), time: z.string().default("00:00"), weekdays: weekdaysSchema }),
  z.object({
    type: z.literal("sunrise"),
    offset_minutes: z.number().int().default(0),
    weekdays: weekdaysSchema,
  }),
  z.object({
    type: z.literal("sunset"),
    offset_minutes: z.number().int().default(0),
    weekdays: weekdaysSchema,
  }),
  z.object({ type: z.literal("manual") }),
]);

export const triggerWireSchema = triggerObjectSchema.transform((t): AutomationTrigger => {
  switch (t.type) {
    case "time":
      return { type: "time", time: t.time, weekdays: t.weekdays };
    case "sunrise":
    case "sunset":
      return { type: t.type, offsetMinutes: t.offset_minutes, weekdays: t.weekdays };
    case "manual":
      return { type: "manual" };
  }
});

export const commandWireSchema = z
  .object({
    on: z.boolean().optional(),
    brightness: z.number().optional(),
    hue: z.number().optional(),
    saturation: z.number().optional(),
    color_temp: z.number().optional(),
    transition_time: z.number().optional(),
    alert: z.enum(["none", "select", "lselect"]).optional(),
    effect: z.enum(["none", "colorloop"]).optional(),
    xy: z.tuple([z.number(), z.number()]).optional(),
    scene: z.string().min(1).optional(),
  })
  .transform((w): LightCommand => {
    const command: {
      -readonly [K in keyof LightCommand]: LightCommand[K];
    } = {};
    if (w.on !== undefined) command.on = w.on;
    if (w.brightness !== undefined) command.brightness = w.brightness;
    if (w.hue !== undefined) command.hue = w.hue;
    if (w.saturation !== undefined) command.saturation = w.saturation;
    if (w.color_temp !== undefined) command.colorTemp = w.color_temp;
    if (w.transition_time !== undefined) command.transitionTime = w.transition_time;
    if (w.alert !== undefined) command.alert = w.alert;
    if (w.effect !== undefined) command.effect = w.effect;
    if (w.xy !== undefined) command.xy = w.xy;
    if (w.scene !== undefined) command.scene = w.scene;
    return command;
  });

const sequenceWireSchema = z.object({
  sequence: z.array(
    z.object({
      delay_seconds: z.number().min(0).default(0),
      action: commandWireSchema,
    }),
  ),
});

function hasSequence(raw: unknown): boolean {
  return typeof raw === "object" && raw !== null && "sequence" in raw;
}

export const actionWireSchema = z.unknown().transform((raw, ctx): AutomationAction => {
  if (hasSequence(raw)) {
    const parsed = sequenceWireSchema.safeParse(raw);
    if (parsed.success) {
      return {
        kind: "sequence",
        steps: parsed.data.sequence.map((s) => ({ delaySeconds: s.delay_seconds, command: s.action })),
      };
    }
    for (const issue of parsed.error.issues) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
    }
    return z.NEVER;
  }

  const parsed = commandWireSchema.safeParse(raw);
  if (parsed.success) return { kind: "command", command: parsed.data };
  for (const issue of parsed.error.issues) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
  }
  return z.NEVER;
});

const configObjectSchema = z.record(z.unknown());

/** Rebuild a trigger from its stored `type` column and JSON config. */
export function decodeTrigger(type: string, configJson: string | null): AutomationTrigger {
  const config = configJson ? configObjectSchema.parse(JSON.parse(configJson)) : {};
  return triggerWireSchema.parse({ ...config, type });
}

export function decodeAction(actionJson: string): AutomationAction {
  return actionWireSchema.parse(JSON.parse(actionJson));
}

/** Stored `type` column plus the snake_case config object (null for manual). */
export function encodeTrigger(
  trigger: AutomationTrigger,
): { type: string; config: Record<string, unknown> | null } {
  switch (trigger.type) {
    case "time":
      return { type: trigger.type, config: { time: trigger.time, weekdays: [...trigger.weekdays] } };
    case "sunrise":
    case "sunset":
      return {
        type: trigger.type,
        config: { offset_minutes: trigger.offsetMinutes, weekdays: [...trigger.weekdays] },
      };
    case "manual":
      return { type: trigger.type, config: null };
  }
}

export function encodeCommand(command: LightCommand): Record<string, unknown> {
  const wire: Record<string, unknown> = {};
  if (command.on !== undefined) wire["on"] = command.on;
  if (command.brightness !== undefined) wire["brightness"] = command.brightness;
  if (command.hue !== undefined) wire["hue"] = command.hue;
  if (command.saturation !== undefined) wire["saturation"] = command.saturation;
  if (command.colorTemp !== undefined) wire["color_temp"] = command.colorTemp;
  if (command.transitionTime !== undefined) wire["transition_time"] = command.transitionTime;
  if (command.alert !== undefined) wire["alert"] = command.alert;
  if (command.effect !== undefined) wire["effect"] = command.effect;
  if (command.xy !== undefined) wire["xy"] = [...command.xy];
  if (command.scene !== undefined) wire["scene"] = command.scene;
  return wire;
}

export function encodeAction(action: AutomationAction): Record<string, unknown> {
  if (action.kind === "command") return encodeCommand(action.command);
  return {
    sequence: action.steps.map((s) => ({ delay_seconds: s.delaySeconds, action: encodeCommand(s.command) })),
  };
}

