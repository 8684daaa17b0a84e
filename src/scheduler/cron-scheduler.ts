import { Cron } from "croner";
import type { Logger } from "../logging/logger.js";
import type { JobCallback, JobScheduler, RecurringSpec } from "./types.js";

/** Weekday 0 = Monday maps to cron's 1; Sunday (6) to 0. */
export function toCronPattern(spec: RecurringSpec): string {
  const days =
    spec.weekdays.length === 0 || spec.weekdays.length === 7
      ? "*"
      : [...new Set(spec.weekdays.map((d) => (d + 1) % 7))].sort((a, b) => a - b).join(",");
  return `${spec.minute} ${spec.hour} * * ${days}`;
}

export interface CronSchedulerOptions {
  /** IANA zone for recurring jobs; process-local time when absent. */
  readonly timezone?: string;
}

export class CronScheduler implements JobScheduler {
  private readonly jobs = new Map<string, Cron>();
  private seq = 0;

  constructor(
    private readonly logger: Logger,
    private readonly options: CronSchedulerOptions = {},
  ) {}

  scheduleRecurring(spec: RecurringSpec, callback: JobCallback, jobId?: string): string {
    const id = jobId ?? this.nextId();
    const pattern = toCronPattern(spec);
    this.replace(
      id,
      new Cron(pattern, { name: id, timezone: this.options.timezone }, () => this.run(id, callback)),
    );
    this.logger.debug({ job: id, pattern }, "Scheduled recurring job");
    return id;
  }

  scheduleOnce(when: Date, callback: JobCallback, jobId?: string): string {
    const id = jobId ?? this.nextId();
    const cron = new Cron(when, { name: id, maxRuns: 1 }, () => {
      this.jobs.delete(id);
      this.run(id, callback);
    });
    if (cron.nextRun() === null) {
      cron.stop();
      this.logger.warn({ job: id, when: when.toISOString() }, "One-shot job is in the past, skipping");
      return id;
    }
    this.replace(id, cron);
    this.logger.debug({ job: id, when: when.toISOString() }, "Scheduled one-shot job");
    return id;
  }

  cancel(jobId: string): boolean {
    const cron = this.jobs.get(jobId);
    if (!cron) return false;
    cron.stop();
    this.jobs.delete(jobId);
    return true;
  }

  nextRun(jobId: string): Date | null {
    return this.jobs.get(jobId)?.nextRun() ?? null;
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  jobIds(): string[] {
    return [...this.jobs.keys()];
  }

  stop(): void {
    for (const cron of this.jobs.values()) cron.stop();
    this.jobs.clear();
  }

  private replace(id: string, cron: Cron): void {
    this.jobs.get(id)?.stop();
    this.jobs.set(id, cron);
  }

  private run(id: string, callback: JobCallback): void {
    Promise.resolve()
      .then(callback)
      .catch((err) => {
        this.logger.error({ err, job: id }, "Scheduled job failed");
      });
  }

  private nextId(): string {
    this.seq += 1;
    return `job-${this.seq}`;
  }
}
