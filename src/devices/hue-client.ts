import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import { retry, type RetryOptions } from "../utils/retry.js";
import type { DeviceGateway, LightCommand, LightState, TargetType } from "./types.js";

export interface HueBridgeOptions {
  readonly host: string;
  readonly username: string;
  readonly timeoutMs?: number;
  /** Applied to reads only; writes are sent once. */
  readonly retry?: RetryOptions;
  readonly fetch?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 5_000;

/** A non-2xx answer from the bridge. */
export class BridgeHttpError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = "BridgeHttpError";
  }
}

/** Transport failures, 5xx and 429 are worth another attempt; other 4xx are not. */
export function isRetryableBridgeError(err: unknown): boolean {
  if (!(err instanceof BridgeHttpError)) return true;
  return err.status >= 500 || err.status === 429;
}

const lightSchema = z.object({
  name: z.string().optional(),
  state: z
    .object({
      on: z.boolean().default(false),
      bri: z.number().default(0),
      hue: z.number().optional(),
      sat: z.number().optional(),
      ct: z.number().optional(),
      reachable: z.boolean().default(true),
    })
    .default({}),
});

const bridgeErrorSchema = z.object({
  error: z.object({ type: z.number().optional(), address: z.string().optional(), description: z.string() }),
});

const lightsResponseSchema = z.union([z.record(lightSchema), z.array(bridgeErrorSchema)]);
const sensorResponseSchema = z.union([
  z.object({ state: z.object({ lightlevel: z.number().nullable().optional() }) }),
  z.array(bridgeErrorSchema),
]);
const writeResponseSchema = z.array(z.record(z.unknown()));

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Bridge payload for a command: abbreviated keys, values clamped to the
 * ranges the bridge accepts. `scene` is sent for rooms only.
 */
export function toHueBody(targetType: TargetType, command: LightCommand): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  if (command.on !== undefined) body["on"] = command.on;
  if (command.brightness !== undefined) body["bri"] = clamp(Math.round(command.brightness), 0, 254);
  if (command.hue !== undefined) body["hue"] = clamp(Math.round(command.hue), 0, 65535);
  if (command.saturation !== undefined) body["sat"] = clamp(Math.round(command.saturation), 0, 254);
  if (command.colorTemp !== undefined) body["ct"] = clamp(Math.round(command.colorTemp), 153, 500);
  if (command.transitionTime !== undefined) {
    body["transitiontime"] = clamp(Math.round(command.transitionTime), 0, 65535);
  }
  if (command.alert !== undefined) body["alert"] = command.alert;
  if (command.effect !== undefined) body["effect"] = command.effect;
  if (command.xy !== undefined) body["xy"] = [clamp(command.xy[0], 0, 1), clamp(command.xy[1], 0, 1)];
  if (command.scene !== undefined && targetType === "room") body["scene"] = command.scene;
  return body;
}

/** Hue bridge over its local REST API (v1). */
export class HueBridgeClient implements DeviceGateway {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(
    private readonly options: HueBridgeOptions,
    logger: Logger,
  ) {
    this.baseUrl = `http://${options.host}/api/${encodeURIComponent(options.username)}`;
    this.fetchFn = options.fetch ?? fetch;
    this.logger = logger.child({ component: "hue" });
  }

  async readStates(): Promise<Map<string, LightState>> {
    const parsed = lightsResponseSchema.parse(await this.read("/lights"));
    if (Array.isArray(parsed)) {
      throw new Error(`Bridge refused light listing: ${parsed.map((e) => e.error.description).join("; ")}`);
    }

    const states = new Map<string, LightState>();
    for (const [lightId, light] of Object.entries(parsed)) {
      states.set(lightId, {
        lightId,
        name: light.name ?? `Light ${lightId}`,
        isOn: light.state.on,
        brightness: light.state.bri,
        hue: light.state.hue ?? null,
        saturation: light.state.sat ?? null,
        colorTemp: light.state.ct ?? null,
        reachable: light.state.reachable,
      });
    }
    return states;
  }

  async readLightLevel(sensorId: string): Promise<number> {
    const parsed = sensorResponseSchema.parse(await this.read(`/sensors/${encodeURIComponent(sensorId)}`));
    if (Array.isArray(parsed)) {
      throw new Error(`Bridge refused sensor ${sensorId}: ${parsed.map((e) => e.error.description).join("; ")}`);
    }
    const level = parsed.state.lightlevel;
    if (level === undefined || level === null) {
      throw new Error(`Sensor ${sensorId} reports no light level`);
    }
    return level;
  }

  async setState(targetType: TargetType, targetId: string, command: LightCommand): Promise<boolean> {
    const body = toHueBody(targetType, command);
    if (Object.keys(body).length === 0) {
      this.logger.warn({ targetType, targetId }, "Empty command, nothing sent");
      return false;
    }

    const path =
      targetType === "light"
        ? `/lights/${encodeURIComponent(targetId)}/state`
        : `/groups/${encodeURIComponent(targetId)}/action`;

    try {
      const result = writeResponseSchema.parse(await this.request("PUT", path, body));
      const errors = result.filter((entry) => "error" in entry);
      if (errors.length > 0) {
        this.logger.warn({ targetType, targetId, errors }, "Bridge rejected command");
        return false;
      }
      this.logger.debug({ targetType, targetId, body }, "Command sent");
      return true;
    } catch (err) {
      this.logger.error({ err, targetType, targetId }, "Failed to send command");
      return false;
    }
  }

  private read(path: string): Promise<unknown> {
    return retry(() => this.request("GET", path), {
      maxAttempts: 3,
      baseDelayMs: 250,
      shouldRetry: isRetryableBridgeError,
      ...this.options.retry,
      onRetry: (err, attempt, delayMs) => {
        this.logger.debug(
          { path, attempt, delayMs: Math.round(delayMs), err: err instanceof Error ? err.message : String(err) },
          "Retrying bridge read",
        );
      },
    });
  }

  private async request(method: "GET" | "PUT", path: string, body?: unknown): Promise<unknown> {
    const response = await this.fetchFn(`${this.baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new BridgeHttpError(
        `Bridge ${method} ${path} failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }
    const json: unknown = await response.json();
    return json;
  }
}
