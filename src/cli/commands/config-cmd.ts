import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { applyBridgeEnv, loadConfig, substituteEnv } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import { errorMessage } from "../offline.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (bridge username redacted)",
    examples: [["Show config", "lumen config show"]],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number | void> {
    let config;
    try {
      config = loadConfig(this.configFile);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }

    const redacted = {
      ...config,
      bridge: {
        ...config.bridge,
        ...(config.bridge.username ? { username: "***REDACTED***" } : {}),
      },
    };
    this.context.stdout.write(JSON.stringify(redacted, null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "lumen config validate"],
      ["Validate specific file", "lumen config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number | void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        return 1;
      }
      throw err;
    }

    try {
      const raw: unknown = JSON.parse(substituteEnv(content));
      parseConfig(applyBridgeEnv(raw));
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${configPath}\n  ${errorMessage(err)}\n`);
      return 1;
    }
  }
}
