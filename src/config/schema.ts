import { z } from "zod";
import type { LumenConfig } from "./types.js";
import { fixedOffsetZone, isValidTimeZone } from "../utils/local-time.js";

const clockTimeSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM");

const serverSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().positive().default(19877),
  hostname: z.string().default("127.0.0.1"),
});

const bridgeSchema = z.object({
  host: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
  pollIntervalMs: z.number().int().positive().default(10_000),
  timeoutMs: z.number().int().positive().default(5_000),
});

const storageSchema = z.object({
  retentionDays: z.number().int().positive().default(90),
});

const analyzerSchema = z.object({
  minOccurrences: z.number().int().min(1).default(3),
  timeWindowMinutes: z.number().int().positive().default(15),
  confidenceThreshold: z.number().min(0).max(1).default(0.7),
  analysisWindowDays: z.number().int().positive().default(30),
  dailyRunTime: clockTimeSchema.default("03:00"),
});

const predictionSchema = z.object({
  minConfidence: z.number().min(0).max(1).default(0.7),
  lookaheadMinutes: z.number().int().min(0).default(5),
  recommendationThreshold: z.number().min(0).max(1).default(0.8),
});

const automationSchema = z.object({
  reactive: z.boolean().default(false),
  dryRun: z.boolean().default(true),
  sunRefreshTime: clockTimeSchema.default("00:05"),
});

// Without an IANA zone, every component runs on the Etc zone of the fixed offset
const locationSchema = z
  .object({
    latitude: z.number().min(-90).max(90).default(59.3293),
    longitude: z.number().min(-180).max(180).default(18.0686),
    timezone: z.string().min(1).refine(isValidTimeZone, "unknown IANA timezone").optional(),
    utcOffsetMinutes: z.number().int().min(-720).max(840).default(60),
  })
  .transform((loc, ctx) => {
    if (loc.timezone !== undefined) return { ...loc, timezone: loc.timezone };
    if (loc.utcOffsetMinutes % 60 !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["utcOffsetMinutes"],
        message: "must be whole hours unless location.timezone is set",
      });
      return z.NEVER;
    }
    return { ...loc, timezone: fixedOffsetZone(loc.utcOffsetMinutes) };
  });

const adaptiveSchema = z.object({
  pollIntervalMs: z.number().int().positive().default(3_000),
  errorBackoffMs: z.number().int().positive().default(5_000),
  replaceGraceMs: z.number().int().min(0).default(250),
  toleranceLux: z.number().positive().default(5),
  defaults: z.object({
    minBrightness: z.number().int().min(0).max(254).default(1),
    maxBrightness: z.number().int().min(1).max(254).default(254),
    step: z.number().int().positive().default(25),
  }).default({}),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const lumenConfigSchema = z.object({
  server: serverSchema.default({}),
  bridge: bridgeSchema.default({}),
  storage: storageSchema.default({}),
  analyzer: analyzerSchema.default({}),
  prediction: predictionSchema.default({}),
  automation: automationSchema.default({}),
  location: locationSchema.default({}),
  adaptive: adaptiveSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): LumenConfig {
  return lumenConfigSchema.parse(raw);
}
