import { AdaptiveController, type AdaptiveParams, type SessionStatus } from "../adaptive/controller.js";
import { AutomationScheduler, type ScheduledAutomation } from "../automation/scheduler.js";
import type { ExecutionResult } from "../automation/types.js";
import type { AnalyzerConfig, LumenConfig } from "../config/types.js";
import type { DeviceGateway, LightCommand } from "../devices/types.js";
import type { Logger } from "../logging/logger.js";
import { StateMonitor } from "../monitor/state-monitor.js";
import { PatternMiner } from "../patterns/miner.js";
import {
  Predictor,
  type Prediction,
  type ReactiveAction,
  type Recommendation,
} from "../patterns/predictor.js";
import type { LightEvent, LightEventType, Pattern } from "../patterns/types.js";
import type { JobScheduler } from "../scheduler/types.js";
import type { AutomationStore, EventStore, StoreStatistics } from "../storage/types.js";
import { SunCalculator, type SunTimes } from "../sun/calculator.js";
import { parseClockTime } from "../utils/local-time.js";
import { LumenBus } from "./bus.js";

export const DAILY_ANALYSIS_JOB_ID = "lumen:daily-analysis";
export const WEEKLY_CLEANUP_JOB_ID = "lumen:weekly-cleanup";

const DAY_MS = 86_400_000;
const MINING_EVENT_LIMIT = 10_000;
const SUNDAY = 6;
const CLEANUP_TIME = { hour: 4, minute: 0 };

export interface LumenServiceDeps {
  readonly config: LumenConfig;
  readonly events: EventStore;
  readonly automations: AutomationStore;
  readonly gateway: DeviceGateway;
  readonly jobs: JobScheduler;
  readonly logger: Logger;
  readonly bus?: LumenBus;
  readonly now?: () => Date;
}

export interface ServiceStatus {
  readonly running: boolean;
  readonly monitor: {
    readonly running: boolean;
    readonly lights: number;
    readonly eventsRecorded: number;
    readonly lastPoll: number | null;
  };
  readonly statistics: StoreStatistics;
  readonly automations: { readonly total: number; readonly scheduled: number };
  readonly adaptiveSessions: number;
  readonly reactive: boolean;
  readonly dryRun: boolean;
  readonly sun: SunTimes;
}

/** What a mined sequence response means as a device command. */
export function reactiveCommand(eventType: LightEventType): LightCommand | null {
  switch (eventType) {
    case "on":
      return { on: true };
    case "off":
      return { on: false };
    default:
      return null;
  }
}

/** Mine the last `daysBack` days of events and upsert what was found. */
export function mineAndSave(
  store: EventStore,
  miner: PatternMiner,
  daysBack: number,
  end: number,
): { analyzed: number; saved: Pattern[] } {
  const events = store.queryEvents({ start: end - daysBack * DAY_MS, end, limit: MINING_EVENT_LIMIT });
  const saved = miner.analyze(events).map((p) => store.savePattern(p));
  return { analyzed: events.length, saved };
}

/**
 * Active patterns that still clear the mining thresholds. Feedback can drop
 * a pattern below them while it stays active; `includeAll` lists every
 * stored pattern.
 */
export function listSurfacedPatterns(
  store: EventStore,
  analyzer: Pick<AnalyzerConfig, "confidenceThreshold" | "minOccurrences">,
  includeAll = false,
): Pattern[] {
  if (includeAll) return store.listPatterns();
  return store.listPatterns({
    activeOnly: true,
    minConfidence: analyzer.confidenceThreshold,
    minOccurrences: analyzer.minOccurrences,
  });
}

/**
 * Wires the components together and owns the periodic drivers: state
 * polling, nightly mining, weekly retention cleanup and the automation
 * schedule.
 */
export class LumenService {
  readonly bus: LumenBus;
  readonly monitor: StateMonitor;
  readonly miner: PatternMiner;
  readonly predictor: Predictor;
  readonly sun: SunCalculator;
  readonly scheduler: AutomationScheduler;
  readonly adaptive: AdaptiveController;

  private readonly logger: Logger;
  private readonly now: () => Date;
  private running = false;

  private readonly onLightEvent = ({ event }: { event: LightEvent }): void => {
    this.react(event);
  };

  constructor(private readonly deps: LumenServiceDeps) {
    const { config, logger } = deps;
    const timezone = config.location.timezone;

    this.logger = logger;
    this.now = deps.now ?? (() => new Date());
    this.bus = deps.bus ?? new LumenBus();

    this.sun = new SunCalculator(config.location);
    this.miner = new PatternMiner(
      {
        minOccurrences: config.analyzer.minOccurrences,
        timeWindowMinutes: config.analyzer.timeWindowMinutes,
        confidenceThreshold: config.analyzer.confidenceThreshold,
        timezone,
      },
      logger.child({ component: "miner" }),
    );
    this.predictor = new Predictor(
      deps.events,
      {
        minConfidence: config.prediction.minConfidence,
        lookaheadMinutes: config.prediction.lookaheadMinutes,
        recommendationThreshold: config.prediction.recommendationThreshold,
        timezone,
      },
      logger.child({ component: "predictor" }),
      this.bus,
    );
    this.monitor = new StateMonitor({
      gateway: deps.gateway,
      store: deps.events,
      logger,
      bus: this.bus,
      now: () => this.now().getTime(),
    });
    this.scheduler = new AutomationScheduler({
      store: deps.automations,
      gateway: deps.gateway,
      jobs: deps.jobs,
      sun: this.sun,
      logger,
      bus: this.bus,
      sunRefreshTime: config.automation.sunRefreshTime,
      now: this.now,
    });
    this.adaptive = new AdaptiveController(deps.gateway, config.adaptive, logger);
  }

  async start(): Promise<void> {
    if (this.running) return;
    const { config } = this.deps;

    // Prime the monitor so the first interval already diffs
    await this.monitor.poll();
    this.monitor.start(config.bridge.pollIntervalMs);

    const analysisAt = parseClockTime(config.analyzer.dailyRunTime) ?? { hour: 3, minute: 0 };
    this.deps.jobs.scheduleRecurring(
      { ...analysisAt, weekdays: [] },
      () => {
        this.minePatterns();
      },
      DAILY_ANALYSIS_JOB_ID,
    );
    this.deps.jobs.scheduleRecurring(
      { ...CLEANUP_TIME, weekdays: [SUNDAY] },
      () => {
        this.cleanup();
      },
      WEEKLY_CLEANUP_JOB_ID,
    );

    await this.scheduler.start();

    if (config.automation.reactive) {
      this.bus.on("light_event", this.onLightEvent);
    }

    this.running = true;
    this.logger.info(
      { reactive: config.automation.reactive, dryRun: config.automation.dryRun },
      "Lumen service started",
    );
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.bus.off("light_event", this.onLightEvent);
    this.monitor.stop();
    this.adaptive.stop();
    await this.scheduler.stop();
    this.deps.jobs.cancel(DAILY_ANALYSIS_JOB_ID);
    this.deps.jobs.cancel(WEEKLY_CLEANUP_JOB_ID);
    this.logger.info("Lumen service stopped");
  }

  // ── Patterns ──

  minePatterns(daysBack = this.deps.config.analyzer.analysisWindowDays): Pattern[] {
    const { analyzed, saved } = mineAndSave(this.deps.events, this.miner, daysBack, this.now().getTime());
    this.bus.emit({ type: "patterns_mined", analyzed, saved: saved.length });
    this.logger.info({ daysBack, events: analyzed, patterns: saved.length }, "Pattern mining finished");
    return saved;
  }

  listPatterns(includeAll = false): Pattern[] {
    return listSurfacedPatterns(this.deps.events, this.deps.config.analyzer, includeAll);
  }

  getPredictions(now: Date = this.now()): Prediction[] {
    return this.predictor.getPredictions(now);
  }

  getRecommendations(now: Date = this.now()): Recommendation[] {
    return this.predictor.getRecommendations(now);
  }

  shouldTriggerSequence(lightId: string, eventType: LightEventType): ReactiveAction[] {
    return this.predictor.shouldTriggerSequence(lightId, eventType);
  }

  submitFeedback(patternId: number, wasCorrect: boolean): Pattern | null {
    return this.predictor.updatePatternFromFeedback(patternId, wasCorrect);
  }

  // ── Automations ──

  reloadAutomations(): Promise<number> {
    return this.scheduler.reload();
  }

  executeAutomation(automationId: number): Promise<ExecutionResult> {
    return this.scheduler.execute(automationId);
  }

  listScheduled(): ScheduledAutomation[] {
    return this.scheduler.listScheduled();
  }

  sunTimes(date?: Date): SunTimes {
    return date ? this.sun.getSunTimes(date) : this.scheduler.getNextSunTimes();
  }

  // ── Adaptive ──

  startAdaptive(params: AdaptiveParams): Promise<SessionStatus> {
    return this.adaptive.start(params);
  }

  stopAdaptive(sessionId?: string): number {
    return this.adaptive.stop(sessionId);
  }

  adaptiveStatus(): SessionStatus[] {
    return this.adaptive.status();
  }

  // ── Housekeeping ──

  cleanup(): number {
    return this.deps.events.cleanupOldEvents(
      this.deps.config.storage.retentionDays,
      this.now().getTime(),
    );
  }

  status(): ServiceStatus {
    const { config } = this.deps;
    return {
      running: this.running,
      monitor: {
        running: this.monitor.running,
        lights: this.monitor.knownLights,
        eventsRecorded: this.monitor.eventsRecorded,
        lastPoll: this.monitor.lastPoll,
      },
      statistics: this.deps.events.getStatistics(),
      automations: {
        total: this.deps.automations.list().length,
        scheduled: this.scheduler.listScheduled().length,
      },
      adaptiveSessions: this.adaptive.status().length,
      reactive: config.automation.reactive,
      dryRun: config.automation.dryRun,
      sun: this.scheduler.getNextSunTimes(),
    };
  }

  private react(event: LightEvent): void {
    for (const action of this.predictor.shouldTriggerSequence(event.lightId, event.eventType)) {
      const command = reactiveCommand(action.eventType);
      if (!command) {
        this.logger.debug({ patternId: action.patternId, type: action.eventType }, "No command for response type");
        continue;
      }

      if (this.deps.config.automation.dryRun) {
        this.logger.info(
          { patternId: action.patternId, lightId: action.lightId, command, delaySeconds: action.delaySeconds },
          "Would trigger sequence response (dry run)",
        );
        continue;
      }

      const send = async (): Promise<void> => {
        const ok = await this.deps.gateway.setState("light", action.lightId, command);
        this.logger.info({ patternId: action.patternId, lightId: action.lightId, ok }, "Sequence response sent");
      };

      if (action.delaySeconds <= 0) {
        send().catch((err) => {
          this.logger.error({ err, patternId: action.patternId }, "Sequence response failed");
        });
      } else {
        this.deps.jobs.scheduleOnce(
          new Date(this.now().getTime() + action.delaySeconds * 1000),
          send,
          `reactive:${action.patternId}`,
        );
      }
    }
  }
}
