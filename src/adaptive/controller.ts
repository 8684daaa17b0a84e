import { randomUUID } from "node:crypto";
import type { AdaptiveConfig } from "../config/types.js";
import type { DeviceGateway } from "../devices/types.js";
import type { Logger } from "../logging/logger.js";
import { computeAdjustment, toLux } from "./lux.js";

export type SessionState = "starting" | "adjusting" | "target_reached" | "error" | "stopped";

export interface AdaptiveParams {
  readonly sensorId: string;
  readonly lightIds: readonly string[];
  readonly targetLux: number;
  readonly minBrightness?: number;
  readonly maxBrightness?: number;
  readonly step?: number;
}

export interface SessionStatus {
  readonly sessionId: string;
  readonly sensorId: string;
  readonly lightIds: readonly string[];
  readonly targetLux: number;
  readonly minBrightness: number;
  readonly maxBrightness: number;
  readonly step: number;
  readonly status: SessionState;
  readonly currentLux: number | null;
  readonly currentBrightness: number | null;
  readonly iterations: number;
  readonly lastError: string | null;
  readonly startedAt: number;
  readonly updatedAt: number;
}

interface Session {
  readonly id: string;
  readonly params: Required<AdaptiveParams>;
  readonly abort: AbortController;
  timer: ReturnType<typeof setTimeout> | null;
  status: SessionState;
  currentLux: number | null;
  currentBrightness: number | null;
  iterations: number;
  lastError: string | null;
  readonly startedAt: number;
  updatedAt: number;
}

export type AdaptiveOptions = Pick<
  AdaptiveConfig,
  "pollIntervalMs" | "errorBackoffMs" | "replaceGraceMs" | "toleranceLux" | "defaults"
>;

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Closed-loop brightness control, one loop per light sensor.
 *
 * Sessions live in a table keyed by session id; a second index maps each
 * sensor to the session that currently drives it, so at most one loop
 * steers a given sensor's lights. Starts for one sensor run one after the
 * other, so concurrent replacements cannot both survive.
 */
export class AdaptiveController {
  private readonly sessions = new Map<string, Session>();
  private readonly bySensor = new Map<string, string>();
  /** Tail of the pending starts per sensor; a replacement waits for the one before it. */
  private readonly startChains = new Map<string, Promise<unknown>>();
  private readonly logger: Logger;

  constructor(
    private readonly gateway: DeviceGateway,
    private readonly options: AdaptiveOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "adaptive" });
  }

  async start(params: AdaptiveParams): Promise<SessionStatus> {
    const resolved: Required<AdaptiveParams> = {
      sensorId: params.sensorId,
      lightIds: [...params.lightIds],
      targetLux: params.targetLux,
      minBrightness: params.minBrightness ?? this.options.defaults.minBrightness,
      maxBrightness: params.maxBrightness ?? this.options.defaults.maxBrightness,
      step: params.step ?? this.options.defaults.step,
    };
    if (resolved.lightIds.length === 0) throw new Error("At least one light is required");
    if (resolved.minBrightness > resolved.maxBrightness) {
      throw new Error("minBrightness must not exceed maxBrightness");
    }
    if (resolved.step <= 0) throw new Error("step must be positive");

    return this.serializeSensor(resolved.sensorId, () => this.startNow(resolved));
  }

  private async startNow(resolved: Required<AdaptiveParams>): Promise<SessionStatus> {
    const previous = this.bySensor.get(resolved.sensorId);
    if (previous) {
      this.cancel(previous);
      // Let an in-flight iteration of the old loop settle before taking over
      await wait(this.options.replaceGraceMs);
      this.logger.info({ sensorId: resolved.sensorId, replaced: previous }, "Replacing adaptive session");
    }

    const now = Date.now();
    const session: Session = {
      id: randomUUID(),
      params: resolved,
      abort: new AbortController(),
      timer: null,
      status: "starting",
      currentLux: null,
      currentBrightness: null,
      iterations: 0,
      lastError: null,
      startedAt: now,
      updatedAt: now,
    };
    this.sessions.set(session.id, session);
    this.bySensor.set(resolved.sensorId, session.id);
    session.abort.signal.addEventListener(
      "abort",
      () => {
        if (session.timer) clearTimeout(session.timer);
        session.timer = null;
      },
      { once: true },
    );

    this.scheduleNext(session, 0);
    this.logger.info(
      { sessionId: session.id, sensorId: resolved.sensorId, lights: resolved.lightIds, targetLux: resolved.targetLux },
      "Adaptive session started",
    );
    return this.snapshot(session);
  }

  /** Stop one session, or every session when no id is given. Returns how many stopped. */
  stop(sessionId?: string): number {
    const ids = sessionId ? [sessionId] : [...this.sessions.keys()];
    let stopped = 0;
    for (const id of ids) {
      if (this.cancel(id)) stopped++;
    }
    return stopped;
  }

  status(): SessionStatus[] {
    return [...this.sessions.values()].map((s) => this.snapshot(s));
  }

  get(sessionId: string): SessionStatus | null {
    const session = this.sessions.get(sessionId);
    return session ? this.snapshot(session) : null;
  }

  /**
   * Run one control iteration. Errors are recorded on the session, never
   * thrown, so the loop keeps going.
   */
  async step(sessionId: string): Promise<SessionStatus | null> {
    const session = this.sessions.get(sessionId);
    if (!session || session.abort.signal.aborted) return null;

    try {
      await this.iterate(session);
      session.lastError = null;
    } catch (err) {
      session.status = "error";
      session.lastError = err instanceof Error ? err.message : String(err);
      this.logger.warn({ sessionId, err: session.lastError }, "Adaptive iteration failed");
    }
    session.iterations++;
    session.updatedAt = Date.now();
    return this.snapshot(session);
  }

  private async iterate(session: Session): Promise<void> {
    const { params } = session;
    const reading = await this.gateway.readLightLevel(params.sensorId);
    const currentLux = toLux(reading);
    const currentBrightness = await this.currentBrightness(session);
    if (session.abort.signal.aborted) return;

    session.currentLux = currentLux;
    session.currentBrightness = currentBrightness;

    const adjustment = computeAdjustment({
      targetLux: params.targetLux,
      currentLux,
      currentBrightness,
      minBrightness: params.minBrightness,
      maxBrightness: params.maxBrightness,
      step: params.step,
      toleranceLux: this.options.toleranceLux,
    });

    if (adjustment.kind === "target_reached") {
      session.status = "target_reached";
      return;
    }

    session.status = "adjusting";
    if (!adjustment.changed) return;

    let acknowledged = 0;
    for (const lightId of params.lightIds) {
      if (await this.gateway.setState("light", lightId, { brightness: adjustment.brightness })) {
        acknowledged++;
      }
    }
    if (acknowledged === 0) {
      throw new Error("No light accepted the brightness change");
    }
    session.currentBrightness = adjustment.brightness;
    this.logger.debug(
      { sessionId: session.id, lux: Math.round(currentLux), brightness: adjustment.brightness },
      "Adjusted brightness",
    );
  }

  private async currentBrightness(session: Session): Promise<number> {
    const states = await this.gateway.readStates();
    const levels: number[] = [];
    for (const id of session.params.lightIds) {
      const state = states.get(id);
      if (state) levels.push(state.isOn ? state.brightness : 0);
    }
    if (levels.length === 0) {
      if (session.currentBrightness !== null) return session.currentBrightness;
      throw new Error("None of the session lights were found");
    }
    return Math.round(levels.reduce((sum, b) => sum + b, 0) / levels.length);
  }

  private scheduleNext(session: Session, delayMs: number): void {
    if (session.abort.signal.aborted) return;
    session.timer = setTimeout(() => {
      session.timer = null;
      this.step(session.id)
        .then(() => {
          const delay = session.status === "error" ? this.options.errorBackoffMs : this.options.pollIntervalMs;
          this.scheduleNext(session, delay);
        })
        .catch((err) => {
          this.logger.error({ err, sessionId: session.id }, "Adaptive loop crashed");
        });
    }, delayMs);
    session.timer.unref();
  }

  private serializeSensor<T>(sensorId: string, fn: () => Promise<T>): Promise<T> {
    const tail = this.startChains.get(sensorId) ?? Promise.resolve();
    const run = tail.then(fn);
    // Failures reach the caller through `run`; the chain keeps going
    const next: Promise<void> = run
      .catch((err) => {
        this.logger.debug({ err, sensorId }, "Adaptive start failed");
      })
      .then(() => {
        if (this.startChains.get(sensorId) === next) this.startChains.delete(sensorId);
      });
    this.startChains.set(sensorId, next);
    return run;
  }

  private cancel(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.abort.abort();
    session.status = "stopped";
    this.sessions.delete(sessionId);
    if (this.bySensor.get(session.params.sensorId) === sessionId) {
      this.bySensor.delete(session.params.sensorId);
    }
    this.logger.info({ sessionId, sensorId: session.params.sensorId }, "Adaptive session stopped");
    return true;
  }

  private snapshot(session: Session): SessionStatus {
    const { params } = session;
    return {
      sessionId: session.id,
      sensorId: params.sensorId,
      lightIds: params.lightIds,
      targetLux: params.targetLux,
      minBrightness: params.minBrightness,
      maxBrightness: params.maxBrightness,
      step: params.step,
      status: session.status,
      currentLux: session.currentLux,
      currentBrightness: session.currentBrightness,
      iterations: session.iterations,
      lastError: session.lastError,
      startedAt: session.startedAt,
      updatedAt: session.updatedAt,
    };
  }
}
