import { serve } from "@hono/node-server";
import { type Context, Hono } from "hono";
import { z } from "zod";
import {
  actionWireSchema,
  commandWireSchema,
  encodeTrigger,
  triggerWireSchema,
} from "../automation/codec.js";
import type { Automation, AutomationPatch, AutomationTrigger } from "../automation/types.js";
import type { DeviceGateway } from "../devices/types.js";
import type { LumenService } from "../engine/service.js";
import type { Logger } from "../logging/logger.js";
import { summarizePatterns } from "../patterns/describe.js";
import { LIGHT_EVENT_TYPES } from "../patterns/types.js";
import type { AutomationStore, EventStore } from "../storage/types.js";
import {
  automationJson,
  eventJson,
  eventSummaryJson,
  executionJson,
  lightJson,
  patternJson,
  predictionJson,
  reactiveJson,
  recommendationJson,
  sessionJson,
} from "./serialize.js";

const DAY_MS = 86_400_000;

const triggerTypeSchema = z.enum(["time", "sunrise", "sunset", "manual"]);
const targetIdsSchema = z.array(z.union([z.string().min(1), z.number().int()]).transform(String)).min(1);

const createAutomationSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullable().optional(),
  trigger_type: triggerTypeSchema,
  trigger_config: z.record(z.unknown()).nullable().optional(),
  target_type: z.enum(["light", "room"]),
  target_ids: targetIdsSchema,
  action_config: actionWireSchema,
  is_enabled: z.boolean().optional(),
});

const updateAutomationSchema = createAutomationSchema.partial();

const feedbackSchema = z.object({ was_correct: z.boolean() });
const analyzeSchema = z.object({ days: z.number().int().positive().optional() });

const adaptiveSchema = z.object({
  sensor_id: z.union([z.string().min(1), z.number().int()]).transform(String),
  light_ids: targetIdsSchema,
  target_lux: z.number().positive(),
  min_brightness: z.number().int().min(0).max(254).optional(),
  max_brightness: z.number().int().min(1).max(254).optional(),
  step: z.number().int().positive().optional(),
});

const eventsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(10_000).default(100),
  days: z.coerce.number().int().positive().default(7),
  light_id: z.string().min(1).optional(),
  event_type: z.enum(LIGHT_EVENT_TYPES).optional(),
});

const dateQuerySchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/)
  .optional();

function parseId(raw: string): number | null {
  const id = Number(raw);
  return Number.isInteger(id) && id > 0 ? id : null;
}

function issues(error: z.ZodError) {
  return error.flatten();
}

export interface ApiServerDeps {
  readonly service: LumenService;
  readonly events: EventStore;
  readonly automations: AutomationStore;
  readonly gateway: DeviceGateway;
  readonly logger: Logger;
  readonly now?: () => Date;
}

/** JSON API over the running service. Bound to localhost by default; no auth. */
export class ApiServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: ApiServerDeps) {
    this.logger = deps.logger.child({ component: "api" });
    this.now = deps.now ?? (() => new Date());
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    const { service, events, automations, gateway } = this.deps;

    this.app.onError((err, c) => {
      this.logger.error({ err, path: c.req.path }, "Request failed");
      return c.json({ error: err.message }, 500);
    });

    this.app.notFound((c) => c.json({ error: "Not found" }, 404));

    const health = (c: Context) =>
      c.json({ status: "ok", uptime: Date.now() - this.startedAt, timestamp: this.now().toISOString() });
    this.app.get("/health", health);
    this.app.get("/api/health", health);

    this.app.get("/api/status", (c) => {
      const status = service.status();
      return c.json({
        status: status.running ? "running" : "stopped",
        ...status,
        timestamp: this.now().toISOString(),
      });
    });

    // ── Lights ──

    this.app.get("/api/lights", async (c) => {
      const states = await gateway.readStates();
      const lights = [...states.values()].map(lightJson);
      return c.json({ count: lights.length, lights });
    });

    this.app.put("/api/lights/:id/state", async (c) => {
      const parsed = commandWireSchema.safeParse(await c.req.json().catch(() => null));
      if (!parsed.success) return c.json({ error: "Invalid request", details: issues(parsed.error) }, 400);
      const success = await gateway.setState("light", c.req.param("id"), parsed.data);
      return c.json({ success });
    });

    this.app.put("/api/groups/:id/state", async (c) => {
      const parsed = commandWireSchema.safeParse(await c.req.json().catch(() => null));
      if (!parsed.success) return c.json({ error: "Invalid request", details: issues(parsed.error) }, 400);
      const success = await gateway.setState("room", c.req.param("id"), parsed.data);
      return c.json({ success });
    });

    // ── Events ──

    this.app.get("/api/events", (c) => {
      const parsed = eventsQuerySchema.safeParse(c.req.query());
      if (!parsed.success) return c.json({ error: "Invalid query", details: issues(parsed.error) }, 400);
      const q = parsed.data;
      const list = events.queryEvents({
        lightId: q.light_id,
        eventType: q.event_type,
        start: this.now().getTime() - q.days * DAY_MS,
        limit: q.limit,
      });
      return c.json({ count: list.length, events: list.map(eventJson) });
    });

    this.app.get("/api/events/summary", (c) => {
      const days = Number(c.req.query("days") ?? 30);
      if (!Number.isInteger(days) || days <= 0) return c.json({ error: "days must be a positive integer" }, 400);
      const list = events.queryEvents({ start: this.now().getTime() - days * DAY_MS, limit: 10_000 });
      return c.json(eventSummaryJson(list, days));
    });

    // ── Patterns ──

    this.app.get("/api/patterns", (c) => {
      const patterns = service.listPatterns(c.req.query("all") === "true");
      return c.json({ count: patterns.length, patterns: patterns.map(patternJson) });
    });

    this.app.post("/api/analyze", async (c) => {
      const raw: unknown = await c.req.json().catch(() => ({}));
      const parsed = analyzeSchema.safeParse(raw ?? {});
      if (!parsed.success) return c.json({ error: "Invalid request", details: issues(parsed.error) }, 400);
      const patterns = service.minePatterns(parsed.data.days);
      return c.json({
        success: true,
        patterns_found: patterns.length,
        summary: summarizePatterns(patterns),
        patterns: patterns.map(patternJson),
      });
    });

    this.app.post("/api/patterns/:id/feedback", async (c) => {
      const id = parseId(c.req.param("id"));
      if (id === null) return c.json({ error: "Invalid pattern id" }, 400);
      const parsed = feedbackSchema.safeParse(await c.req.json().catch(() => null));
      if (!parsed.success) return c.json({ error: "Invalid request", details: issues(parsed.error) }, 400);
      const pattern = service.submitFeedback(id, parsed.data.was_correct);
      if (!pattern) return c.json({ error: "Pattern not found" }, 404);
      return c.json({ success: true, pattern: patternJson(pattern) });
    });

    this.app.get("/api/predictions", (c) => {
      const predictions = service.getPredictions(this.now());
      return c.json({ count: predictions.length, predictions: predictions.map(predictionJson) });
    });

    this.app.get("/api/recommendations", (c) => {
      const recommendations = service.getRecommendations(this.now());
      return c.json({ count: recommendations.length, recommendations: recommendations.map(recommendationJson) });
    });

    this.app.get("/api/sequences", (c) => {
      const lightId = c.req.query("light_id");
      const type = z.enum(LIGHT_EVENT_TYPES).safeParse(c.req.query("event_type"));
      if (!lightId || !type.success) return c.json({ error: "light_id and event_type are required" }, 400);
      const actions = service.shouldTriggerSequence(lightId, type.data);
      return c.json({ count: actions.length, actions: actions.map(reactiveJson) });
    });

    // ── Automations ──

    this.app.get("/api/automations", (c) => {
      const list = automations.list();
      const next = new Map(service.listScheduled().map((s) => [s.automationId, s.nextRun]));
      return c.json({
        count: list.length,
        automations: list.map((a) => ({ ...automationJson(a), next_run: next.get(a.id)?.toISOString() ?? null })),
      });
    });

    this.app.post("/api/automations/reload", async (c) => {
      const scheduled = await service.reloadAutomations();
      return c.json({ success: true, scheduled });
    });

    this.app.post("/api/automations", async (c) => {
      const parsed = createAutomationSchema.safeParse(await c.req.json().catch(() => null));
      if (!parsed.success) return c.json({ error: "Invalid request", details: issues(parsed.error) }, 400);
      const body = parsed.data;

      const trigger = triggerWireSchema.safeParse({ ...body.trigger_config, type: body.trigger_type });
      if (!trigger.success) return c.json({ error: "Invalid trigger", details: issues(trigger.error) }, 400);

      const created = automations.create({
        name: body.name,
        description: body.description ?? null,
        trigger: trigger.data,
        target: { type: body.target_type, ids: body.target_ids },
        action: body.action_config,
        isEnabled: body.is_enabled,
      });
      await service.scheduler.schedule(created);
      return c.json(automationJson(created), 201);
    });

    this.app.get("/api/automations/:id", (c) => {
      const automation = this.findAutomation(c.req.param("id"));
      if (!automation) return c.json({ error: "Automation not found" }, 404);
      return c.json(automationJson(automation));
    });

    this.app.put("/api/automations/:id", async (c) => {
      const current = this.findAutomation(c.req.param("id"));
      if (!current) return c.json({ error: "Automation not found" }, 404);

      const parsed = updateAutomationSchema.safeParse(await c.req.json().catch(() => null));
      if (!parsed.success) return c.json({ error: "Invalid request", details: issues(parsed.error) }, 400);
      const body = parsed.data;

      let trigger: AutomationTrigger | undefined;
      if (body.trigger_type !== undefined || body.trigger_config !== undefined) {
        const type = body.trigger_type ?? current.trigger.type;
        const base = type === current.trigger.type ? encodeTrigger(current.trigger).config : null;
        const result = triggerWireSchema.safeParse({ ...base, ...body.trigger_config, type });
        if (!result.success) return c.json({ error: "Invalid trigger", details: issues(result.error) }, 400);
        trigger = result.data;
      }

      const patch: AutomationPatch = {
        ...(body.name !== undefined ? { name: body.name } : {}),
        ...(body.description !== undefined ? { description: body.description } : {}),
        ...(trigger ? { trigger } : {}),
        ...(body.target_type !== undefined || body.target_ids !== undefined
          ? {
              target: {
                type: body.target_type ?? current.target.type,
                ids: body.target_ids ?? current.target.ids,
              },
            }
          : {}),
        ...(body.action_config !== undefined ? { action: body.action_config } : {}),
        ...(body.is_enabled !== undefined ? { isEnabled: body.is_enabled } : {}),
      };

      const updated = automations.update(current.id, patch);
      if (!updated) return c.json({ error: "Automation not found" }, 404);
      await service.scheduler.schedule(updated);
      return c.json(automationJson(updated));
    });

    this.app.delete("/api/automations/:id", async (c) => {
      const automation = this.findAutomation(c.req.param("id"));
      if (!automation || !automations.delete(automation.id)) {
        return c.json({ error: "Automation not found" }, 404);
      }
      await service.scheduler.unschedule(automation.id);
      return c.json({ success: true });
    });

    this.app.post("/api/automations/:id/toggle", async (c) => {
      const automation = this.findAutomation(c.req.param("id"));
      if (!automation) return c.json({ error: "Automation not found" }, 404);
      const toggled = automations.setEnabled(automation.id, !automation.isEnabled);
      if (!toggled) return c.json({ error: "Automation not found" }, 404);
      await service.scheduler.schedule(toggled);
      return c.json(automationJson(toggled));
    });

    this.app.post("/api/automations/:id/run", async (c) => {
      const automation = this.findAutomation(c.req.param("id"));
      if (!automation) return c.json({ error: "Automation not found" }, 404);
      const result = await service.executeAutomation(automation.id);
      return c.json(executionJson(automation.name, result), result.reason === "disabled" ? 409 : 200);
    });

    // ── Sun ──

    this.app.get("/api/sun", (c) => {
      const date = dateQuerySchema.safeParse(c.req.query("date"));
      if (!date.success) return c.json({ error: "date must be YYYY-MM-DD" }, 400);
      // Noon UTC keeps the calendar day stable for any zone within ±12h
      const times = date.data ? service.sunTimes(new Date(`${date.data}T12:00:00Z`)) : service.sunTimes();
      return c.json(times);
    });

    // ── Adaptive ──

    this.app.get("/api/adaptive", (c) => {
      const sessions = service.adaptiveStatus();
      return c.json({ count: sessions.length, sessions: sessions.map(sessionJson) });
    });

    this.app.post("/api/adaptive", async (c) => {
      const parsed = adaptiveSchema.safeParse(await c.req.json().catch(() => null));
      if (!parsed.success) return c.json({ error: "Invalid request", details: issues(parsed.error) }, 400);
      const body = parsed.data;
      try {
        const session = await service.startAdaptive({
          sensorId: body.sensor_id,
          lightIds: body.light_ids,
          targetLux: body.target_lux,
          minBrightness: body.min_brightness,
          maxBrightness: body.max_brightness,
          step: body.step,
        });
        return c.json(sessionJson(session), 201);
      } catch (err) {
        return c.json({ success: false, reason: err instanceof Error ? err.message : String(err) }, 400);
      }
    });

    this.app.delete("/api/adaptive", (c) => c.json({ success: true, stopped: service.stopAdaptive() }));

    this.app.delete("/api/adaptive/:id", (c) => {
      const stopped = service.stopAdaptive(c.req.param("id"));
      if (stopped === 0) return c.json({ error: "Session not found" }, 404);
      return c.json({ success: true, stopped });
    });
  }

  private findAutomation(rawId: string): Automation | null {
    const id = parseId(rawId);
    return id === null ? null : this.deps.automations.get(id);
  }

  async start(port: number, hostname: string): Promise<void> {
    this.server = serve({ fetch: this.app.fetch, port, hostname });
    this.logger.info({ port, hostname }, "API server started");
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
      this.logger.info("API server stopped");
    }
  }
}
