import type { DeviceGateway, LightCommand } from "../devices/types.js";
import type { LumenBus } from "../engine/bus.js";
import type { Logger } from "../logging/logger.js";
import type { JobScheduler, RecurringSpec } from "../scheduler/types.js";
import type { AutomationStore } from "../storage/types.js";
import type { SunCalculator, SunTimes } from "../sun/calculator.js";
import { addMinutes, formatClockTime, parseClockTime } from "../utils/local-time.js";
import type { Automation, AutomationTarget, ExecutionResult } from "./types.js";

export const SUN_REFRESH_JOB_ID = "automation:sun-refresh";

export function automationJobId(automationId: number): string {
  return `automation:${automationId}`;
}

export interface AutomationSchedulerDeps {
  readonly store: AutomationStore;
  readonly gateway: DeviceGateway;
  readonly jobs: JobScheduler;
  readonly sun: SunCalculator;
  readonly logger: Logger;
  readonly bus?: LumenBus;
  /** Local "HH:MM" at which solar triggers are recomputed. */
  readonly sunRefreshTime?: string;
  readonly now?: () => Date;
}

export interface ScheduledAutomation {
  readonly automationId: number;
  readonly jobId: string;
  readonly nextRun: Date | null;
}

interface DispatchOutcome {
  readonly succeeded: number;
  readonly total: number;
}

const DEFAULT_REFRESH = { hour: 0, minute: 5 };

function skipped(reason: string): ExecutionResult {
  return { success: false, reason, succeeded: 0, total: 0, scheduledSteps: 0 };
}

/**
 * Turns stored automations into jobs on a {@link JobScheduler} and runs
 * them against the device gateway.
 *
 * Registry changes (start, stop, reload, schedule, unschedule) go through
 * one promise chain, so a reload never interleaves with another.
 */
export class AutomationScheduler {
  private readonly registry = new Map<number, string>();
  private readonly logger: Logger;
  private readonly now: () => Date;
  private chain: Promise<unknown> = Promise.resolve();

  constructor(private readonly deps: AutomationSchedulerDeps) {
    this.logger = deps.logger.child({ component: "automation" });
    this.now = deps.now ?? (() => new Date());
  }

  start(): Promise<number> {
    return this.serialize(() => {
      const refresh = parseClockTime(this.deps.sunRefreshTime ?? "") ?? DEFAULT_REFRESH;
      this.deps.jobs.scheduleRecurring(
        { ...refresh, weekdays: [] },
        () =>
          this.reload().then((count) => {
            this.logger.info({ count }, "Refreshed automation schedule");
          }),
        SUN_REFRESH_JOB_ID,
      );
      const count = this.reloadNow();
      this.logger.info({ count, refresh: formatClockTime(refresh) }, "Automation scheduler started");
      return count;
    });
  }

  stop(): Promise<void> {
    return this.serialize(() => {
      this.clearJobs();
      this.deps.jobs.cancel(SUN_REFRESH_JOB_ID);
      this.logger.info("Automation scheduler stopped");
    });
  }

  /** Drop every automation job and schedule the enabled ones afresh. */
  reload(): Promise<number> {
    return this.serialize(() => this.reloadNow());
  }

  schedule(automation: Automation): Promise<boolean> {
    return this.serialize(() => this.scheduleNow(automation));
  }

  unschedule(automationId: number): Promise<boolean> {
    return this.serialize(() => this.unscheduleNow(automationId));
  }

  listScheduled(): ScheduledAutomation[] {
    return [...this.registry].map(([automationId, jobId]) => ({
      automationId,
      jobId,
      nextRun: this.deps.jobs.nextRun(jobId),
    }));
  }

  getNextSunTimes(): SunTimes {
    return this.deps.sun.getSunTimes(this.now());
  }

  async execute(automationId: number): Promise<ExecutionResult> {
    const automation = this.deps.store.get(automationId);
    if (!automation) {
      this.logger.warn({ automationId }, "Automation not found");
      return skipped("not_found");
    }
    if (!automation.isEnabled) {
      this.logger.warn({ automationId }, "Automation is disabled");
      return skipped("disabled");
    }

    this.logger.info({ automationId, name: automation.name }, "Executing automation");

    let outcome: DispatchOutcome = { succeeded: 0, total: 0 };
    let scheduledSteps = 0;

    if (automation.action.kind === "command") {
      outcome = await this.dispatch(automation.target, automation.action.command);
    } else {
      const startedAt = this.now().getTime();
      for (const [index, step] of automation.action.steps.entries()) {
        if (step.delaySeconds > 0) {
          this.deps.jobs.scheduleOnce(
            new Date(startedAt + step.delaySeconds * 1000),
            async () => {
              const r = await this.dispatch(automation.target, step.command);
              this.logger.debug({ automationId, step: index, ...r }, "Sequence step ran");
            },
            // Fixed per step: a new run of the sequence replaces the pending steps of the last one
            `${automationJobId(automationId)}:step:${index}`,
          );
          scheduledSteps++;
        } else {
          const r = await this.dispatch(automation.target, step.command);
          outcome = { succeeded: outcome.succeeded + r.succeeded, total: outcome.total + r.total };
        }
      }
      this.logger.info({ automationId, steps: automation.action.steps.length, scheduledSteps }, "Sequence started");
    }

    try {
      this.deps.store.recordTrigger(automationId, this.now().getTime());
    } catch (err) {
      this.logger.error({ err, automationId }, "Failed to record automation trigger");
    }

    const success = outcome.succeeded === outcome.total;
    const result: ExecutionResult = {
      success,
      ...(success ? {} : { reason: "partial_failure" }),
      succeeded: outcome.succeeded,
      total: outcome.total,
      scheduledSteps,
    };
    this.deps.bus?.emit({ type: "automation_executed", automationId, result });
    return result;
  }

  private serialize<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.chain.then(fn);
    // Callers see the failure through `run`; the chain itself keeps going
    this.chain = run.catch((err) => {
      this.logger.debug({ err }, "Registry operation failed");
    });
    return run;
  }

  private reloadNow(): number {
    this.clearJobs();
    for (const automation of this.deps.store.loadEnabled()) {
      this.scheduleNow(automation);
    }
    this.logger.info({ scheduled: this.registry.size }, "Automations loaded");
    return this.registry.size;
  }

  private clearJobs(): void {
    for (const jobId of this.registry.values()) {
      this.deps.jobs.cancel(jobId);
    }
    this.registry.clear();
  }

  private unscheduleNow(automationId: number): boolean {
    const jobId = this.registry.get(automationId);
    if (!jobId) return false;
    this.deps.jobs.cancel(jobId);
    this.registry.delete(automationId);
    return true;
  }

  private scheduleNow(automation: Automation): boolean {
    this.unscheduleNow(automation.id);
    if (!automation.isEnabled) return false;

    const spec = this.recurringSpec(automation);
    if (!spec) return false;

    const jobId = this.deps.jobs.scheduleRecurring(
      spec,
      async () => {
        await this.execute(automation.id);
      },
      automationJobId(automation.id),
    );
    this.registry.set(automation.id, jobId);
    this.logger.debug(
      { automationId: automation.id, trigger: automation.trigger.type, at: formatClockTime(spec) },
      "Scheduled automation",
    );
    return true;
  }

  private recurringSpec(automation: Automation): RecurringSpec | null {
    const { trigger } = automation;
    switch (trigger.type) {
      case "time": {
        const time = parseClockTime(trigger.time);
        if (!time) {
          this.logger.error({ automationId: automation.id, time: trigger.time }, "Invalid time format");
          return null;
        }
        return { ...time, weekdays: trigger.weekdays };
      }
      case "sunrise":
      case "sunset": {
        const today = this.now();
        const base = trigger.type === "sunrise" ? this.deps.sun.getSunrise(today) : this.deps.sun.getSunset(today);
        return { ...addMinutes(base, trigger.offsetMinutes), weekdays: trigger.weekdays };
      }
      case "manual":
        return null;
    }
  }

  private async dispatch(target: AutomationTarget, command: LightCommand): Promise<DispatchOutcome> {
    let succeeded = 0;
    for (const targetId of target.ids) {
      try {
        if (await this.deps.gateway.setState(target.type, targetId, command)) {
          succeeded++;
        } else {
          this.logger.warn({ targetType: target.type, targetId }, "Device rejected command");
        }
      } catch (err) {
        this.logger.error({ err, targetType: target.type, targetId }, "Failed to execute action");
      }
    }
    return { succeeded, total: target.ids.length };
  }
}
