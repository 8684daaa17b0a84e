import { Command, Option } from "clipanion";
import type { AutomationTrigger } from "../../automation/types.js";
import { openOffline } from "../offline.js";

const DAY_NAMES = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"];

function describeTrigger(trigger: AutomationTrigger): string {
  if (trigger.type === "manual") return "manual";
  const days = trigger.weekdays.length === 7 ? "daily" : trigger.weekdays.map((d) => DAY_NAMES[d]).join(",");
  if (trigger.type === "time") return `${trigger.time} ${days}`;
  const offset = trigger.offsetMinutes === 0 ? "" : ` ${trigger.offsetMinutes > 0 ? "+" : ""}${trigger.offsetMinutes}m`;
  return `${trigger.type}${offset} ${days}`;
}

export class AutomationsListCommand extends Command {
  static override paths = [["automations", "list"]];

  static override usage = Command.Usage({
    description: "List stored automations",
    examples: [["List automations", "lumen automations list"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    const ctx = openOffline(this.config);
    try {
      const list = ctx.automations.list();
      if (list.length === 0) {
        this.context.stdout.write("No automations configured.\n");
        return;
      }

      this.context.stdout.write(`Automations (${list.length}):\n`);
      for (const a of list) {
        const status = a.isEnabled ? "enabled" : "disabled";
        this.context.stdout.write(
          `  #${a.id} ${a.name}  [${status}]\n` +
            `    trigger: ${describeTrigger(a.trigger)}\n` +
            `    target:  ${a.target.type} ${a.target.ids.join(",")}\n` +
            `    runs:    ${a.triggerCount}\n`,
        );
      }
    } finally {
      ctx.close();
    }
  }
}
