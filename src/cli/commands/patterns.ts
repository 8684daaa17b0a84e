import { Command, Option } from "clipanion";
import * as t from "typanion";
import { listSurfacedPatterns, mineAndSave } from "../../engine/service.js";
import { formatConfidence, summarizePatterns } from "../../patterns/describe.js";
import { PatternMiner } from "../../patterns/miner.js";
import { openOffline } from "../offline.js";

export class PatternsAnalyzeCommand extends Command {
  static override paths = [["patterns", "analyze"]];

  static override usage = Command.Usage({
    description: "Mine stored events for habits and save what is found",
    examples: [
      ["Analyze the configured window", "lumen patterns analyze"],
      ["Analyze the last two weeks", "lumen patterns analyze --days 14"],
    ],
  });

  days = Option.String("--days,-d", {
    description: "Days of history to analyze",
    required: false,
    validator: t.cascade(t.isNumber(), [t.isInteger(), t.isAtLeast(1)]),
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    const ctx = openOffline(this.config);
    try {
      const { analyzer, location } = ctx.config;
      const miner = new PatternMiner(
        {
          minOccurrences: analyzer.minOccurrences,
          timeWindowMinutes: analyzer.timeWindowMinutes,
          confidenceThreshold: analyzer.confidenceThreshold,
          timezone: location.timezone,
        },
        ctx.logger,
      );
      const daysBack = this.days ?? analyzer.analysisWindowDays;
      const { analyzed, saved } = mineAndSave(ctx.events, miner, daysBack, Date.now());

      this.context.stdout.write(`Analyzed ${analyzed} events from the last ${daysBack} days\n`);
      this.context.stdout.write(summarizePatterns(saved) + "\n");
    } finally {
      ctx.close();
    }
  }
}

export class PatternsListCommand extends Command {
  static override paths = [["patterns", "list"]];

  static override usage = Command.Usage({
    description: "List stored patterns, strongest first",
    examples: [
      ["List active patterns", "lumen patterns list"],
      ["Include deactivated ones", "lumen patterns list --all"],
    ],
  });

  all = Option.Boolean("--all", false, { description: "Include inactive and low-confidence patterns" });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    const ctx = openOffline(this.config);
    try {
      const patterns = listSurfacedPatterns(ctx.events, ctx.config.analyzer, this.all);
      if (patterns.length === 0) {
        this.context.stdout.write(
          this.all ? "No patterns stored.\n" : "No confident patterns; --all lists every stored one.\n",
        );
        return;
      }

      this.context.stdout.write(`Patterns (${patterns.length}):\n`);
      for (const p of patterns) {
        const flag = p.isActive ? "" : "  [inactive]";
        this.context.stdout.write(
          `  #${p.id} ${p.type}  ${formatConfidence(p.confidence)}  ${p.description}${flag}\n`,
        );
      }
    } finally {
      ctx.close();
    }
  }
}
