import { Cli } from "clipanion";
import { createRequire } from "node:module";
import { z } from "zod";
import { AutomationsListCommand } from "./commands/automations.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { PatternsAnalyzeCommand, PatternsListCommand } from "./commands/patterns.js";
import { RunCommand } from "./commands/run.js";
import { StatusCommand } from "./commands/status.js";
import { SunCommand } from "./commands/sun.js";

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require("../../package.json"));

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Lumen",
    binaryName: "lumen",
    binaryVersion: pkg.version,
  });

  cli.register(RunCommand);
  cli.register(StatusCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Pattern commands
  cli.register(PatternsAnalyzeCommand);
  cli.register(PatternsListCommand);

  cli.register(AutomationsListCommand);
  cli.register(SunCommand);

  return cli;
}
