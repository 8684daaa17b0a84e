import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { applyBridgeEnv, loadConfig, substituteEnv } from "../../src/config/loader.js";
import { getConfigPath } from "../../src/config/paths.js";
import { parseConfig } from "../../src/config/schema.js";
import { makeTempDir } from "../helpers/fixtures.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_TOKEN"] = "test-user";
    process.env["TEST_PORT"] = "9999";
  });

  afterEach(() => {
    delete process.env["TEST_TOKEN"];
    delete process.env["TEST_PORT"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("token: ${env:TEST_TOKEN}")).toBe(
      "token: test-user",
    );
  });

  it("substitutes multiple env vars", () => {
    expect(
      substituteEnv("${env:TEST_TOKEN}:${env:TEST_PORT}"),
    ).toBe("test-user:9999");
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow(
      "Missing environment variable: MISSING_VAR",
    );
  });

  it("leaves text without env vars unchanged", () => {
    expect(substituteEnv("no substitution here")).toBe(
      "no substitution here",
    );
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({});
    expect(config.server).toEqual({ enabled: true, port: 19877, hostname: "127.0.0.1" });
    expect(config.bridge.pollIntervalMs).toBe(10_000);
    expect(config.analyzer.minOccurrences).toBe(3);
    expect(config.analyzer.dailyRunTime).toBe("03:00");
    expect(config.prediction.lookaheadMinutes).toBe(5);
    expect(config.automation).toEqual({ reactive: false, dryRun: true, sunRefreshTime: "00:05" });
    expect(config.location.utcOffsetMinutes).toBe(60);
    expect(config.location.timezone).toBe("Etc/GMT-1");
    expect(config.adaptive.defaults).toEqual({ minBrightness: 1, maxBrightness: 254, step: 25 });
  });

  it("keeps explicit values", () => {
    const config = parseConfig({
      bridge: { host: "192.168.1.2", username: "test-user" },
      location: { latitude: 48.85, longitude: 2.35, timezone: "Europe/Paris" },
      automation: { dryRun: false },
    });
    expect(config.bridge.host).toBe("192.168.1.2");
    expect(config.location.timezone).toBe("Europe/Paris");
    expect(config.automation.dryRun).toBe(false);
    expect(config.automation.reactive).toBe(false);
  });

  it("turns a fixed offset into its Etc zone", () => {
    expect(parseConfig({ location: { utcOffsetMinutes: -300 } }).location.timezone).toBe("Etc/GMT+5");
    expect(parseConfig({ location: { utcOffsetMinutes: 0 } }).location.timezone).toBe("UTC");
    expect(
      parseConfig({ location: { timezone: "Asia/Kolkata", utcOffsetMinutes: 330 } }).location.timezone,
    ).toBe("Asia/Kolkata");
  });

  it("needs an IANA zone for offsets that are not whole hours", () => {
    expect(() => parseConfig({ location: { utcOffsetMinutes: 330 } })).toThrow(
      "must be whole hours unless location.timezone is set",
    );
  });

  it("rejects an unknown timezone", () => {
    expect(() => parseConfig({ location: { timezone: "Mars/Olympus" } })).toThrow();
  });

  it("rejects a malformed clock time", () => {
    expect(() => parseConfig({ analyzer: { dailyRunTime: "3am" } })).toThrow();
    expect(() => parseConfig({ automation: { sunRefreshTime: "24:00" } })).toThrow();
  });

  it("rejects a confidence outside 0..1", () => {
    expect(() => parseConfig({ prediction: { minConfidence: 1.5 } })).toThrow();
  });
});

describe("loadConfig", () => {
  let temp: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    temp = makeTempDir();
    process.env["TEST_BRIDGE_USER"] = "test-user";
  });

  afterEach(() => {
    delete process.env["TEST_BRIDGE_USER"];
    temp.cleanup();
  });

  it("returns defaults when the file is missing", () => {
    const config = loadConfig(join(temp.dir, "missing.json"));
    expect(config.server.port).toBe(19877);
  });

  it("reads the file and substitutes env references", () => {
    const path = join(temp.dir, "lumen.config.json");
    writeFileSync(
      path,
      JSON.stringify({ bridge: { host: "hue.local", username: "${env:TEST_BRIDGE_USER}" }, server: { port: 8080 } }),
    );
    const config = loadConfig(path);
    expect(config.bridge.username).toBe("test-user");
    expect(config.server.port).toBe(8080);
  });

  it("throws on invalid JSON", () => {
    const path = join(temp.dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow();
  });
});

describe("applyBridgeEnv", () => {
  it("fills missing bridge settings from the environment", () => {
    const env = { LUMEN_BRIDGE_HOST: "hue.local", LUMEN_BRIDGE_USERNAME: "test-user" };
    expect(applyBridgeEnv({ server: { port: 8080 } }, env)).toEqual({
      server: { port: 8080 },
      bridge: { host: "hue.local", username: "test-user" },
    });
  });

  it("falls back to HUE_BRIDGE_IP for the host", () => {
    expect(applyBridgeEnv({}, { HUE_BRIDGE_IP: "192.168.1.2", LUMEN_BRIDGE_HOST: "" })).toEqual({
      bridge: { host: "192.168.1.2" },
    });
  });

  it("keeps values the file sets", () => {
    const raw = { bridge: { host: "from-file", pollIntervalMs: 500 } };
    expect(applyBridgeEnv(raw, { LUMEN_BRIDGE_HOST: "from-env" })).toEqual({
      bridge: { host: "from-file", pollIntervalMs: 500 },
    });
  });

  it("leaves malformed input for the schema to reject", () => {
    expect(applyBridgeEnv([1], { LUMEN_BRIDGE_HOST: "hue.local" })).toEqual([1]);
    expect(applyBridgeEnv({ bridge: "hue.local" }, { LUMEN_BRIDGE_HOST: "hue.local" })).toEqual({ bridge: "hue.local" });
  });
});

describe("config file resolution", () => {
  let temp: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    temp = makeTempDir();
    vi.stubEnv("LUMEN_STATE_DIR", join(temp.dir, "state"));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    temp.cleanup();
  });

  it("prefers LUMEN_CONFIG_PATH, resolved against the working directory", () => {
    vi.stubEnv("LUMEN_CONFIG_PATH", "conf/custom.json");
    expect(getConfigPath(temp.dir)).toBe(join(temp.dir, "conf", "custom.json"));
  });

  it("uses a config file in the working directory when there is one", () => {
    writeFileSync(join(temp.dir, "lumen.config.json"), "{}");
    expect(getConfigPath(temp.dir)).toBe(join(temp.dir, "lumen.config.json"));
  });

  it("otherwise looks in the state dir", () => {
    expect(getConfigPath(temp.dir)).toBe(join(temp.dir, "state", "lumen.config.json"));
  });

  it("applies bridge env defaults when no file exists", () => {
    vi.stubEnv("LUMEN_BRIDGE_HOST", "hue.local");
    vi.stubEnv("LUMEN_BRIDGE_USERNAME", "test-user");
    const config = loadConfig(join(temp.dir, "missing.json"));
    expect(config.bridge.host).toBe("hue.local");
    expect(config.bridge.username).toBe("test-user");
  });
});
