import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { LumenConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

/** Environment fallbacks for bridge settings the file leaves out, first set wins. */
const BRIDGE_ENV: Readonly<Record<"host" | "username", readonly string[]>> = {
  host: ["LUMEN_BRIDGE_HOST", "HUE_BRIDGE_IP"],
  username: ["LUMEN_BRIDGE_USERNAME"],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

/**
 * Fills `bridge.host` and `bridge.username` from the environment when the
 * parsed file has none. Anything that is not an object is returned as is
 * for the schema to reject.
 */
export function applyBridgeEnv(raw: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (!isRecord(raw)) return raw;
  const section = raw["bridge"] ?? {};
  if (!isRecord(section)) return raw;

  const bridge: Record<string, unknown> = { ...section };
  for (const [field, names] of Object.entries(BRIDGE_ENV)) {
    if (bridge[field] !== undefined) continue;
    const value = names.map((name) => env[name]).find((v) => v !== undefined && v !== "");
    if (value !== undefined) bridge[field] = value;
  }
  return { ...raw, bridge };
}

export function loadConfig(path?: string): LumenConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return parseConfig(applyBridgeEnv({}));
    }
    throw err;
  }

  const raw: unknown = JSON.parse(substituteEnv(content));
  return parseConfig(applyBridgeEnv(raw));
}
