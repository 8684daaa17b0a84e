export interface RecurringSpec {
  readonly hour: number;
  readonly minute: number;
  /** 0 = Monday … 6 = Sunday */
  readonly weekdays: readonly number[];
}

export type JobCallback = () => void | Promise<void>;

/**
 * Clock-driven job runner. Scheduling under an id that is already taken
 * replaces the existing job.
 */
export interface JobScheduler {
  scheduleRecurring(spec: RecurringSpec, callback: JobCallback, jobId?: string): string;
  scheduleOnce(when: Date, callback: JobCallback, jobId?: string): string;
  cancel(jobId: string): boolean;
  nextRun(jobId: string): Date | null;
  has(jobId: string): boolean;
  jobIds(): string[];
  stop(): void;
}
