import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { parseConfig } from "../../src/config/schema.js";
import { LumenService } from "../../src/engine/service.js";
import { SqliteAutomationStore } from "../../src/storage/automation-store.js";
import { LumenDB } from "../../src/storage/db.js";
import { SqliteEventStore } from "../../src/storage/event-store.js";
import { FakeGateway, FakeJobScheduler, makeLight, makeLogger, makeTempDir } from "../helpers/fixtures.js";

const MONDAYS = ["2024-03-04", "2024-03-11", "2024-03-18"];

describe("Integration: habit pipeline", () => {
  let temp: ReturnType<typeof makeTempDir>;
  let db: LumenDB;
  let events: SqliteEventStore;
  let gateway: FakeGateway;
  let service: LumenService;
  let clock: Date;

  const setHall = (isOn: boolean) => gateway.setLight(makeLight("1", { name: "Hall", isOn, brightness: 200 }));

  async function pollAt(iso: string): Promise<void> {
    clock = new Date(iso);
    await service.monitor.poll();
  }

  beforeEach(async () => {
    temp = makeTempDir("lumen-integration-");
    db = new LumenDB(temp.dir);
    events = new SqliteEventStore(db, { timezone: "UTC" });
    gateway = new FakeGateway();
    setHall(false);
    clock = new Date("2024-03-04T06:00:00Z");

    service = new LumenService({
      config: parseConfig({ location: { timezone: "UTC" } }),
      events,
      automations: new SqliteAutomationStore(db),
      gateway,
      jobs: new FakeJobScheduler(),
      logger: makeLogger(),
      now: () => clock,
    });
    await service.start();
  });

  afterEach(async () => {
    await service.stop();
    db.close();
    temp.cleanup();
  });

  async function recordMondayMornings(): Promise<void> {
    for (const day of MONDAYS) {
      setHall(true);
      await pollAt(`${day}T07:10:00Z`);
      setHall(false);
      await pollAt(`${day}T07:40:00Z`);
    }
  }

  it("records polled changes as events", async () => {
    await recordMondayMornings();

    const stored = events.queryEvents({ lightId: "1" });
    expect(stored).toHaveLength(6);
    expect(stored.filter((e) => e.eventType === "on").map((e) => [e.weekday, e.hour, e.minute])).toEqual([
      [0, 7, 10],
      [0, 7, 10],
      [0, 7, 10],
    ]);
    expect(service.status().monitor.eventsRecorded).toBe(6);
  });

  it("mines the habit and predicts it the next Monday", async () => {
    await recordMondayMornings();

    clock = new Date("2024-03-20T12:00:00Z");
    const patterns = service.minePatterns();
    expect(patterns.map((p) => p.description).sort()).toEqual([
      "Hall turns off at 07:00 on Mondays",
      "Hall turns on at 07:00 on Mondays",
    ]);

    const predictions = service.getPredictions(new Date("2024-03-25T06:57:00Z"));
    expect(predictions.map((p) => p.description).sort()).toEqual([
      "Hall turns off at 07:00 on Mondays",
      "Hall turns on at 07:00 on Mondays",
    ]);
    expect(service.getRecommendations(new Date("2024-03-25T06:57:00Z")).map((r) => r.message).sort()).toEqual([
      "Based on your habits: Hall turns off at 07:00 on Mondays",
      "Based on your habits: Hall turns on at 07:00 on Mondays",
    ]);

    expect(service.getPredictions(new Date("2024-03-25T06:50:00Z"))).toEqual([]);
    expect(service.getPredictions(new Date("2024-03-26T06:57:00Z"))).toEqual([]);
  });

  it("keeps feedback across a second mining run", async () => {
    await recordMondayMornings();
    clock = new Date("2024-03-20T12:00:00Z");
    const [first] = service.minePatterns();

    service.submitFeedback(first.id, false);
    service.submitFeedback(first.id, false);
    service.submitFeedback(first.id, false);
    service.submitFeedback(first.id, false);

    // 1.0 less four steps is below the prediction threshold
    const remined = service.minePatterns();
    const again = remined.find((p) => p.id === first.id);
    expect(again?.confidence).toBeCloseTo(0.6);
    expect(events.listPatterns()).toHaveLength(2);
    expect(
      service.getPredictions(new Date("2024-03-25T06:57:00Z")).map((p) => p.patternId),
    ).not.toContain(first.id);
  });
});
