import type { DeviceGateway, LightState } from "../devices/types.js";
import { brightnessPercent } from "../devices/types.js";
import type { LumenBus } from "../engine/bus.js";
import type { Logger } from "../logging/logger.js";
import type { LightEvent, NewLightEvent } from "../patterns/types.js";
import type { EventStore } from "../storage/types.js";

const BRIGHTNESS_DELTA = 5;
const HUE_DELTA = 1000;
const COLOR_TEMP_DELTA = 10;

/**
 * Events implied by a light moving from `prev` to `next`. Color and level
 * changes only count while the light is on.
 */
export function diffLightStates(prev: LightState, next: LightState, timestamp: number): NewLightEvent[] {
  const events: NewLightEvent[] = [];
  const base = { lightId: next.lightId, lightName: next.name, timestamp };

  if (prev.isOn !== next.isOn) {
    events.push({
      ...base,
      eventType: next.isOn ? "on" : "off",
      oldValue: String(prev.isOn),
      newValue: String(next.isOn),
    });
  }

  if (!next.isOn) return events;

  if (Math.abs(prev.brightness - next.brightness) > BRIGHTNESS_DELTA) {
    events.push({
      ...base,
      eventType: "brightness",
      oldValue: String(brightnessPercent(prev.brightness)),
      newValue: String(brightnessPercent(next.brightness)),
    });
  }
  if (prev.hue !== null && next.hue !== null && Math.abs(prev.hue - next.hue) > HUE_DELTA) {
    events.push({ ...base, eventType: "hue", oldValue: String(prev.hue), newValue: String(next.hue) });
  }
  if (
    prev.colorTemp !== null &&
    next.colorTemp !== null &&
    Math.abs(prev.colorTemp - next.colorTemp) > COLOR_TEMP_DELTA
  ) {
    events.push({
      ...base,
      eventType: "color_temp",
      oldValue: String(prev.colorTemp),
      newValue: String(next.colorTemp),
    });
  }
  return events;
}

export interface StateMonitorDeps {
  readonly gateway: DeviceGateway;
  readonly store: EventStore;
  readonly logger: Logger;
  readonly bus?: LumenBus;
  readonly now?: () => number;
}

/** Polls the gateway and records every state change as a light event. */
export class StateMonitor {
  private readonly previous = new Map<string, LightState>();
  private readonly logger: Logger;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private polling = false;
  private recorded = 0;
  private lastPollAt: number | null = null;

  constructor(private readonly deps: StateMonitorDeps) {
    this.logger = deps.logger.child({ component: "monitor" });
    this.now = deps.now ?? Date.now;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.poll().catch((err) => {
        this.logger.error({ err }, "State poll failed");
      });
    }, intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs }, "State monitor started");
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info("State monitor stopped");
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get eventsRecorded(): number {
    return this.recorded;
  }

  get lastPoll(): number | null {
    return this.lastPollAt;
  }

  get knownLights(): number {
    return this.previous.size;
  }

  /** One read-diff-record pass. The first sighting of a light only primes its state. */
  async poll(): Promise<LightEvent[]> {
    // Skip overlapping polls when the bridge is slower than the interval
    if (this.polling) return [];
    this.polling = true;
    try {
      let states: Map<string, LightState>;
      try {
        states = await this.deps.gateway.readStates();
      } catch (err) {
        this.logger.warn({ err: err instanceof Error ? err.message : String(err) }, "Could not read light states");
        return [];
      }

      const timestamp = this.now();
      this.lastPollAt = timestamp;
      const recorded: LightEvent[] = [];

      for (const [lightId, next] of states) {
        const prev = this.previous.get(lightId);
        this.previous.set(lightId, next);
        if (!prev) continue;

        for (const change of diffLightStates(prev, next, timestamp)) {
          const event = this.deps.store.appendEvent(change);
          recorded.push(event);
          this.logger.info(
            { light: event.lightName, type: event.eventType, from: event.oldValue, to: event.newValue },
            "Light changed",
          );
          this.deps.bus?.emit({ type: "light_event", event });
        }
      }

      this.recorded += recorded.length;
      return recorded;
    } finally {
      this.polling = false;
    }
  }
}
