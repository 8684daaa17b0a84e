import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { AdaptiveController } from "../../src/adaptive/controller.js";
import { FakeGateway, flushPromises, makeLight, makeLogger } from "../helpers/fixtures.js";

const OPTIONS = {
  pollIntervalMs: 1_000,
  errorBackoffMs: 5_000,
  replaceGraceMs: 0,
  toleranceLux: 5,
  defaults: { minBrightness: 1, maxBrightness: 254, step: 25 },
};

async function tick(ms: number): Promise<void> {
  await vi.advanceTimersByTimeAsync(ms);
  await flushPromises();
}

describe("AdaptiveController", () => {
  let gateway: FakeGateway;
  let controller: AdaptiveController;

  beforeEach(() => {
    vi.useFakeTimers();
    gateway = new FakeGateway();
    gateway.setLight(makeLight("1", { isOn: true, brightness: 100 }));
    gateway.setLight(makeLight("2", { isOn: true, brightness: 100 }));
    // 10 lux
    gateway.lightLevels.set("s1", 10001);
    controller = new AdaptiveController(gateway, OPTIONS, makeLogger());
  });

  afterEach(() => {
    controller.stop();
    vi.useRealTimers();
  });

  it("validates its parameters", async () => {
    await expect(controller.start({ sensorId: "s1", lightIds: [], targetLux: 100 })).rejects.toThrow(
      "At least one light is required",
    );
    await expect(
      controller.start({ sensorId: "s1", lightIds: ["1"], targetLux: 100, minBrightness: 200, maxBrightness: 100 }),
    ).rejects.toThrow("minBrightness must not exceed maxBrightness");
    await expect(controller.start({ sensorId: "s1", lightIds: ["1"], targetLux: 100, step: 0 })).rejects.toThrow(
      "step must be positive",
    );
    expect(controller.status()).toEqual([]);
  });

  it("starts with the configured defaults", async () => {
    const session = await controller.start({ sensorId: "s1", lightIds: ["1", "2"], targetLux: 100 });
    expect(session).toMatchObject({
      sensorId: "s1",
      lightIds: ["1", "2"],
      targetLux: 100,
      minBrightness: 1,
      maxBrightness: 254,
      step: 25,
      status: "starting",
      iterations: 0,
    });
  });

  it("steps brightness toward the target", async () => {
    const session = await controller.start({ sensorId: "s1", lightIds: ["1", "2"], targetLux: 100 });

    const after = await controller.step(session.sessionId);

    expect(after).toMatchObject({ status: "adjusting", currentBrightness: 125, iterations: 1, lastError: null });
    expect(after?.currentLux).toBeCloseTo(10);
    expect(gateway.calls).toEqual([
      { targetType: "light", targetId: "1", command: { brightness: 125 } },
      { targetType: "light", targetId: "2", command: { brightness: 125 } },
    ]);
  });

  it("counts lights that are off as zero brightness", async () => {
    gateway.setLight(makeLight("2", { isOn: false, brightness: 200 }));
    const session = await controller.start({ sensorId: "s1", lightIds: ["1", "2"], targetLux: 100 });

    await controller.step(session.sessionId);

    // mean of 100 and 0, plus one step
    expect(gateway.calls[0]?.command).toEqual({ brightness: 75 });
  });

  it("holds still once the target is reached", async () => {
    gateway.lightLevels.set("s1", 20001);
    const session = await controller.start({ sensorId: "s1", lightIds: ["1"], targetLux: 100 });

    expect((await controller.step(session.sessionId))?.status).toBe("target_reached");
    expect(gateway.calls).toEqual([]);
  });

  it("records errors on the session instead of throwing", async () => {
    const session = await controller.start({ sensorId: "missing", lightIds: ["1"], targetLux: 100 });

    const after = await controller.step(session.sessionId);

    expect(after).toMatchObject({
      status: "error",
      lastError: "Sensor missing reports no light level",
      iterations: 1,
    });
  });

  it("fails an iteration when no light accepts the change", async () => {
    gateway.respond = () => false;
    const session = await controller.start({ sensorId: "s1", lightIds: ["1"], targetLux: 100 });

    expect((await controller.step(session.sessionId))?.lastError).toBe("No light accepted the brightness change");
  });

  it("fails an iteration when none of its lights exist", async () => {
    const session = await controller.start({ sensorId: "s1", lightIds: ["9"], targetLux: 100 });
    expect((await controller.step(session.sessionId))?.lastError).toBe("None of the session lights were found");
  });

  it("polls on the interval and backs off after an error", async () => {
    gateway.lightLevels.delete("s1");
    await controller.start({ sensorId: "s1", lightIds: ["1"], targetLux: 100 });

    await tick(0);
    expect(gateway.levelCalls).toBe(1);

    await tick(4_999);
    expect(gateway.levelCalls).toBe(1);
    gateway.lightLevels.set("s1", 10001);
    await tick(1);
    expect(gateway.levelCalls).toBe(2);

    await tick(1_000);
    expect(gateway.levelCalls).toBe(3);
  });

  it("replaces the session already driving a sensor", async () => {
    const first = await controller.start({ sensorId: "s1", lightIds: ["1"], targetLux: 100 });
    const starting = controller.start({ sensorId: "s1", lightIds: ["2"], targetLux: 50 });
    await tick(0);
    const second = await starting;

    expect(second.sessionId).not.toBe(first.sessionId);
    expect(controller.get(first.sessionId)).toBeNull();
    expect(controller.status().map((s) => s.sessionId)).toEqual([second.sessionId]);
  });

  it("keeps only the last of several concurrent replacements", async () => {
    const slow = new AdaptiveController(gateway, { ...OPTIONS, replaceGraceMs: 250 }, makeLogger());
    try {
      const first = await slow.start({ sensorId: "s1", lightIds: ["1"], targetLux: 50 });
      const a = slow.start({ sensorId: "s1", lightIds: ["1"], targetLux: 100 });
      const b = slow.start({ sensorId: "s1", lightIds: ["1"], targetLux: 300 });
      await tick(250);
      await tick(250);
      const [second, third] = await Promise.all([a, b]);

      expect(slow.get(first.sessionId)).toBeNull();
      expect(slow.get(second.sessionId)).toBeNull();
      expect(slow.status().map((s) => [s.sessionId, s.targetLux])).toEqual([[third.sessionId, 300]]);
    } finally {
      slow.stop();
    }
  });

  it("sends nothing on repeated iterations at the target", async () => {
    // 100 lux
    gateway.lightLevels.set("s1", 20001);
    const session = await controller.start({ sensorId: "s1", lightIds: ["1", "2"], targetLux: 100 });

    await tick(0);
    for (let i = 0; i < 4; i++) await tick(1_000);

    expect(gateway.levelCalls).toBe(5);
    expect(gateway.calls).toEqual([]);
    expect(controller.get(session.sessionId)).toMatchObject({ status: "target_reached", iterations: 5 });
  });

  it("sends nothing while pinned at the brightness bound", async () => {
    gateway.setLight(makeLight("1", { isOn: true, brightness: 254 }));
    await controller.start({ sensorId: "s1", lightIds: ["1"], targetLux: 100 });

    await tick(0);
    for (let i = 0; i < 3; i++) await tick(1_000);

    expect(gateway.levelCalls).toBe(4);
    expect(gateway.calls).toEqual([]);
  });

  it("stops idempotently and halts the loop", async () => {
    const session = await controller.start({ sensorId: "s1", lightIds: ["1"], targetLux: 100 });
    await tick(0);
    const calls = gateway.levelCalls;

    expect(controller.stop(session.sessionId)).toBe(1);
    expect(controller.stop(session.sessionId)).toBe(0);
    expect(await controller.step(session.sessionId)).toBeNull();

    await tick(10_000);
    expect(gateway.levelCalls).toBe(calls);
  });

  it("stops every session when no id is given", async () => {
    await controller.start({ sensorId: "s1", lightIds: ["1"], targetLux: 100 });
    await controller.start({ sensorId: "s2", lightIds: ["2"], targetLux: 100 });
    expect(controller.stop()).toBe(2);
    expect(controller.status()).toEqual([]);
  });
});
