import { Command, Option } from "clipanion";
import { getConfigPath, getStateDir } from "../../config/paths.js";
import { SunCalculator } from "../../sun/calculator.js";
import { errorMessage, openOffline } from "../offline.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show configuration, stored history and today's sun times",
    examples: [["Show status", "lumen status"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<number | void> {
    const configPath = this.config ?? getConfigPath();

    let ctx;
    try {
      ctx = openOffline(this.config);
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${configPath})\n  Error: ${errorMessage(err)}\n`);
      return 1;
    }

    try {
      const { config } = ctx;
      const stats = ctx.events.getStatistics();
      const sun = new SunCalculator(config.location).getSunTimes();
      const out = this.context.stdout;

      out.write(`Lumen Status\n`);
      out.write(`------------\n`);
      out.write(`Config path: ${configPath}\n`);
      out.write(`State dir:   ${getStateDir()}\n`);
      out.write(`Bridge:      ${config.bridge.host ?? "(not configured)"}\n`);
      out.write(`API:         ${config.server.enabled ? `${config.server.hostname}:${config.server.port}` : "disabled"}\n`);
      out.write(`Events:      ${stats.totalEvents}\n`);
      out.write(`Patterns:    ${stats.activePatterns} active / ${stats.totalPatterns} total\n`);
      out.write(`Automations: ${ctx.automations.list().length}\n`);
      out.write(`Sun (${sun.date}): rise ${sun.sunrise}, set ${sun.sunset}\n`);
    } finally {
      ctx.close();
    }
  }
}
