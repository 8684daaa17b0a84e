import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";
import type { DeviceGateway, LightCommand, LightState, TargetType } from "../../src/devices/types.js";
import type { Logger } from "../../src/logging/logger.js";
import type { LightEvent, LightEventType } from "../../src/patterns/types.js";
import type { JobCallback, JobScheduler, RecurringSpec } from "../../src/scheduler/types.js";
import { localParts } from "../../src/utils/local-time.js";

export function makeLogger(): Logger {
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

export function makeTempDir(prefix = "lumen-test-"): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

let nextEventId = 1;

/** A stored light event at `iso`, with calendar fields taken in UTC. */
export function makeEvent(
  lightId: string,
  eventType: LightEventType,
  iso: string,
  lightName = `Light ${lightId}`,
): LightEvent {
  const timestamp = Date.parse(iso);
  const { weekday, hour, minute } = localParts(timestamp, "UTC");
  return {
    id: nextEventId++,
    lightId,
    lightName,
    timestamp,
    eventType,
    oldValue: null,
    newValue: null,
    weekday,
    hour,
    minute,
  };
}

export function makeLight(lightId: string, overrides: Partial<LightState> = {}): LightState {
  return {
    lightId,
    name: `Light ${lightId}`,
    isOn: false,
    brightness: 0,
    hue: null,
    saturation: null,
    colorTemp: null,
    reachable: true,
    ...overrides,
  };
}

export interface SetStateCall {
  readonly targetType: TargetType;
  readonly targetId: string;
  readonly command: LightCommand;
}

/** In-memory bridge: lights and sensor readings are plain maps the test edits. */
export class FakeGateway implements DeviceGateway {
  readonly lights = new Map<string, LightState>();
  readonly lightLevels = new Map<string, number>();
  readonly calls: SetStateCall[] = [];
  readStateCalls = 0;
  levelCalls = 0;
  failReads: Error | null = null;
  /** Per-target override of the acknowledgement; throw to simulate a transport error. */
  respond: (call: SetStateCall) => boolean = () => true;

  setLight(state: LightState): void {
    this.lights.set(state.lightId, state);
  }

  async readStates(): Promise<Map<string, LightState>> {
    this.readStateCalls++;
    if (this.failReads) throw this.failReads;
    return new Map(this.lights);
  }

  async readLightLevel(sensorId: string): Promise<number> {
    this.levelCalls++;
    const level = this.lightLevels.get(sensorId);
    if (level === undefined) throw new Error(`Sensor ${sensorId} reports no light level`);
    return level;
  }

  async setState(targetType: TargetType, targetId: string, command: LightCommand): Promise<boolean> {
    const call = { targetType, targetId, command };
    this.calls.push(call);
    return this.respond(call);
  }
}

export interface FakeRecurringJob {
  readonly spec: RecurringSpec;
  readonly callback: JobCallback;
}

export interface FakeOnceJob {
  readonly when: Date;
  readonly callback: JobCallback;
}

/** Records jobs instead of running them; tests fire them with `run`. */
export class FakeJobScheduler implements JobScheduler {
  readonly recurring = new Map<string, FakeRecurringJob>();
  readonly once = new Map<string, FakeOnceJob>();
  private seq = 0;

  scheduleRecurring(spec: RecurringSpec, callback: JobCallback, jobId?: string): string {
    const id = jobId ?? `job-${++this.seq}`;
    this.once.delete(id);
    this.recurring.set(id, { spec, callback });
    return id;
  }

  scheduleOnce(when: Date, callback: JobCallback, jobId?: string): string {
    const id = jobId ?? `job-${++this.seq}`;
    this.recurring.delete(id);
    this.once.set(id, { when, callback });
    return id;
  }

  cancel(jobId: string): boolean {
    return this.recurring.delete(jobId) || this.once.delete(jobId);
  }

  nextRun(jobId: string): Date | null {
    return this.once.get(jobId)?.when ?? null;
  }

  has(jobId: string): boolean {
    return this.recurring.has(jobId) || this.once.has(jobId);
  }

  jobIds(): string[] {
    return [...this.recurring.keys(), ...this.once.keys()];
  }

  stop(): void {
    this.recurring.clear();
    this.once.clear();
  }

  async run(jobId: string): Promise<void> {
    const job = this.recurring.get(jobId) ?? this.once.get(jobId);
    if (!job) throw new Error(`No job ${jobId}`);
    if (this.once.has(jobId)) this.once.delete(jobId);
    await job.callback();
  }
}

export async function flushPromises(rounds = 50): Promise<void> {
  for (let i = 0; i < rounds; i++) await Promise.resolve();
}
