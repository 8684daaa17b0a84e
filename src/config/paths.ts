import { existsSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";

export const CONFIG_FILE_NAME = "lumen.config.json";

export function getStateDir(): string {
  return process.env["LUMEN_STATE_DIR"] ?? join(homedir(), ".lumen");
}

/**
 * `LUMEN_CONFIG_PATH`, else `lumen.config.json` in the working directory,
 * else the one in the state dir. The last may not exist.
 */
export function getConfigPath(cwd = process.cwd()): string {
  const fromEnv = process.env["LUMEN_CONFIG_PATH"];
  if (fromEnv) return resolve(cwd, fromEnv);
  const local = resolve(cwd, CONFIG_FILE_NAME);
  if (existsSync(local)) return local;
  return join(getStateDir(), CONFIG_FILE_NAME);
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
