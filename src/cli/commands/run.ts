import { Command, Option } from "clipanion";
import { startLumen } from "../../engine/lifecycle.js";
import { errorMessage } from "../offline.js";

export class RunCommand extends Command {
  static override paths = [["run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start monitoring, mining and the automation schedule",
    examples: [
      ["Start with default config", "lumen run"],
      ["Start with custom config", "lumen run --config ./lumen.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number | void> {
    try {
      await startLumen(this.config);
    } catch (err) {
      this.context.stderr.write(`Failed to start: ${errorMessage(err)}\n`);
      return 1;
    }
    // Runs until a signal triggers the shutdown handler
    await new Promise<never>(() => {});
  }
}
