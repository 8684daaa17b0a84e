import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { Writable } from "node:stream";
import { AutomationsListCommand } from "../../src/cli/commands/automations.js";
import { ConfigShowCommand, ConfigValidateCommand } from "../../src/cli/commands/config-cmd.js";
import { PatternsAnalyzeCommand, PatternsListCommand } from "../../src/cli/commands/patterns.js";
import { SunCommand } from "../../src/cli/commands/sun.js";
import { createCli } from "../../src/cli/program.js";
import { SqliteAutomationStore } from "../../src/storage/automation-store.js";
import { LumenDB } from "../../src/storage/db.js";
import { SqliteEventStore } from "../../src/storage/event-store.js";
import { makeTempDir } from "../helpers/fixtures.js";

// Helper to capture stdout
function captureStdout(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += chunk.toString();
      cb();
    },
  });
  return { stream, output: () => buf };
}

const HOUR_MS = 3_600_000;
const WEEK_MS = 7 * 24 * HOUR_MS;

describe("CLI: config commands", () => {
  let temp: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    temp = makeTempDir("lumen-cli-test-");
  });

  afterEach(() => {
    temp.cleanup();
  });

  it("validates a correct config file", async () => {
    const configPath = join(temp.dir, "valid.json");
    writeFileSync(configPath, JSON.stringify({ location: { timezone: "Europe/Stockholm" }, server: { port: 8080 } }));

    const cmd = new ConfigValidateCommand();
    cmd.configFile = configPath;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBeUndefined();
    expect(output()).toBe(`Config is valid: ${configPath}\n`);
  });

  it("rejects an invalid config file", async () => {
    const configPath = join(temp.dir, "invalid.json");
    writeFileSync(configPath, JSON.stringify({ server: { port: "not-a-number" } }));

    const cmd = new ConfigValidateCommand();
    cmd.configFile = configPath;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBe(1);
    expect(output()).toContain(`Config is INVALID: ${configPath}\n`);
  });

  it("reports a missing config file", async () => {
    const configPath = join(temp.dir, "nonexistent.json");
    const cmd = new ConfigValidateCommand();
    cmd.configFile = configPath;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBe(1);
    expect(output()).toBe(`Config file not found: ${configPath}\n`);
  });

  it("shows the config with the bridge username redacted", async () => {
    const configPath = join(temp.dir, "lumen.config.json");
    writeFileSync(configPath, JSON.stringify({ bridge: { host: "hue.local", username: "test-user" } }));

    const cmd = new ConfigShowCommand();
    cmd.configFile = configPath;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    await cmd.execute();

    expect(JSON.parse(output())).toMatchObject({
      bridge: { host: "hue.local", username: "***REDACTED***" },
      server: { port: 19877 },
    });
  });
});

describe("CLI: sun", () => {
  let temp: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    temp = makeTempDir("lumen-cli-test-");
  });

  afterEach(() => {
    temp.cleanup();
  });

  it("prints sunrise and sunset for a date", async () => {
    const configPath = join(temp.dir, "lumen.config.json");
    writeFileSync(configPath, JSON.stringify({ location: { timezone: "Europe/Stockholm" } }));

    const cmd = new SunCommand();
    cmd.config = configPath;
    cmd.date = "2024-06-21";
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    await cmd.execute();

    expect(output()).toBe("2024-06-21  sunrise 03:30  sunset 22:08\n");
  });
});

describe("CLI: stored data", () => {
  let temp: ReturnType<typeof makeTempDir>;
  let configPath: string;

  beforeEach(() => {
    temp = makeTempDir("lumen-cli-state-");
    configPath = join(temp.dir, "lumen.config.json");
    writeFileSync(configPath, JSON.stringify({ location: { timezone: "UTC" } }));
    vi.stubEnv("LUMEN_STATE_DIR", temp.dir);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    temp.cleanup();
  });

  it("reports an empty pattern store", async () => {
    const cmd = new PatternsListCommand();
    cmd.config = configPath;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    cmd.all = true;
    await cmd.execute();

    expect(output()).toBe("No patterns stored.\n");
  });

  it("hides patterns that feedback pushed below the confidence threshold", async () => {
    const db = new LumenDB(temp.dir);
    const events = new SqliteEventStore(db, { timezone: "UTC" });
    const saved = events.savePattern({
      type: "time_based",
      description: "Hall turns on at 07:00 on Mondays",
      lightIds: ["1"],
      weekdays: [0],
      timeStart: "07:00",
      timeEnd: "07:59",
      action: { kind: "time_based", lightId: "1", eventType: "on" },
      confidence: 0.9,
      occurrenceCount: 3,
      lastSeen: Date.parse("2024-03-18T07:10:00Z"),
    });
    events.updateConfidence(saved.id, () => ({ confidence: 0.6, isActive: true }));
    db.close();

    const hidden = new PatternsListCommand();
    hidden.config = configPath;
    const first = captureStdout();
    hidden.context = { ...hidden.context, stdout: first.stream };
    await hidden.execute();
    expect(first.output()).toBe("No confident patterns; --all lists every stored one.\n");

    const all = new PatternsListCommand();
    all.config = configPath;
    all.all = true;
    const second = captureStdout();
    all.context = { ...all.context, stdout: second.stream };
    await all.execute();
    expect(second.output()).toBe("Patterns (1):\n  #1 time_based  0.6  Hall turns on at 07:00 on Mondays\n");
  });

  it("mines recent events and lists the result", async () => {
    const db = new LumenDB(temp.dir);
    const events = new SqliteEventStore(db, { timezone: "UTC" });
    const base = Math.floor((Date.now() - WEEK_MS) / HOUR_MS) * HOUR_MS;
    for (const weeksBack of [0, 1, 2]) {
      events.appendEvent({
        lightId: "1",
        lightName: "Hall",
        timestamp: base - weeksBack * WEEK_MS,
        eventType: "on",
        oldValue: "false",
        newValue: "true",
      });
    }
    db.close();

    const analyze = new PatternsAnalyzeCommand();
    analyze.config = configPath;
    analyze.days = 30;
    const mined = captureStdout();
    analyze.context = { ...analyze.context, stdout: mined.stream };
    await analyze.execute();

    expect(mined.output().split("\n")[0]).toBe("Analyzed 3 events from the last 30 days");

    const list = new PatternsListCommand();
    list.config = configPath;
    const listed = captureStdout();
    list.context = { ...list.context, stdout: listed.stream };
    await list.execute();

    const lines = listed.output().split("\n");
    expect(lines[0]).toBe("Patterns (1):");
    expect(lines[1]).toMatch(/^ {2}#1 time_based {2}1 {2}Hall turns on at \d{2}:00 on \w+days$/);
  });

  it("lists stored automations", async () => {
    const db = new LumenDB(temp.dir);
    new SqliteAutomationStore(db).create({
      name: "Evening",
      description: null,
      trigger: { type: "sunset", offsetMinutes: -15, weekdays: [5, 6] },
      target: { type: "room", ids: ["2"] },
      action: { kind: "command", command: { on: true } },
    });
    db.close();

    const cmd = new AutomationsListCommand();
    cmd.config = configPath;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    await cmd.execute();

    expect(output()).toBe(
      "Automations (1):\n" +
        "  #1 Evening  [enabled]\n" +
        "    trigger: sunset -15m Sat,Sun\n" +
        "    target:  room 2\n" +
        "    runs:    0\n",
    );
  });
});

describe("CLI: program", () => {
  it("routes a command line to its command", () => {
    const command = createCli().process(["sun", "--date", "2024-06-21"]);
    expect(command).toBeInstanceOf(SunCommand);
  });
});
