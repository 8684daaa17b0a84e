import { Command, Option } from "clipanion";
import * as t from "typanion";
import { loadConfig } from "../../config/loader.js";
import { SunCalculator } from "../../sun/calculator.js";
import { errorMessage } from "../offline.js";

export class SunCommand extends Command {
  static override paths = [["sun"]];

  static override usage = Command.Usage({
    description: "Print sunrise and sunset for the configured location",
    examples: [
      ["Today", "lumen sun"],
      ["A given date", "lumen sun --date 2024-06-21"],
    ],
  });

  date = Option.String("--date", {
    description: "Calendar date, YYYY-MM-DD",
    required: false,
    validator: t.cascade(t.isString(), [t.matchesRegExp(/^\d{4}-\d{2}-\d{2}$/)]),
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<number | void> {
    let config;
    try {
      config = loadConfig(this.config);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }

    const sun = new SunCalculator(config.location);
    const times = this.date ? sun.getSunTimes(new Date(`${this.date}T12:00:00Z`)) : sun.getSunTimes();
    this.context.stdout.write(`${times.date}  sunrise ${times.sunrise}  sunset ${times.sunset}\n`);
  }
}
