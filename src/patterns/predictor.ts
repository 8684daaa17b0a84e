import type { LumenBus } from "../engine/bus.js";
import type { Logger } from "../logging/logger.js";
import type { EventStore } from "../storage/types.js";
import { localParts, parseClockTime } from "../utils/local-time.js";
import type { LightEventType, Pattern, PatternAction, PatternType } from "./types.js";

export const POSITIVE_FEEDBACK_STEP = 0.05;
export const NEGATIVE_FEEDBACK_STEP = 0.1;
/** Patterns whose confidence falls below this stop being used. */
export const DEACTIVATION_THRESHOLD = 0.3;

export interface PredictorOptions {
  readonly minConfidence: number;
  readonly lookaheadMinutes: number;
  readonly recommendationThreshold?: number;
  readonly timezone?: string;
}

export interface Prediction {
  readonly patternId: number;
  readonly patternType: PatternType;
  readonly description: string;
  readonly action: PatternAction;
  readonly confidence: number;
  readonly triggerTime: number;
}

export interface ReactiveAction {
  readonly patternId: number;
  readonly lightId: string;
  readonly eventType: LightEventType;
  readonly delaySeconds: number;
  readonly confidence: number;
}

export interface Recommendation {
  readonly type: "suggestion";
  readonly message: string;
  readonly confidence: number;
  readonly action: PatternAction;
}

export class Predictor {
  private readonly recommendationThreshold: number;

  constructor(
    private readonly store: EventStore,
    private readonly options: PredictorOptions,
    private readonly logger: Logger,
    private readonly bus?: LumenBus,
  ) {
    this.recommendationThreshold = options.recommendationThreshold ?? 0.8;
  }

  getPredictions(now: Date = new Date()): Prediction[] {
    const predictions: Prediction[] = [];
    for (const pattern of this.confidentPatterns()) {
      if (this.matches(pattern, now)) {
        predictions.push({
          patternId: pattern.id,
          patternType: pattern.type,
          description: pattern.description,
          action: pattern.action,
          confidence: pattern.confidence,
          triggerTime: now.getTime(),
        });
      }
    }
    return predictions;
  }

  /** Responses mined for `lightId` doing `eventType`, paired with their usual delay. */
  shouldTriggerSequence(lightId: string, eventType: LightEventType): ReactiveAction[] {
    const actions: ReactiveAction[] = [];
    for (const pattern of this.confidentPatterns()) {
      const { action } = pattern;
      if (action.kind !== "sequence") continue;
      if (action.trigger.lightId !== lightId || action.trigger.eventType !== eventType) continue;
      actions.push({
        patternId: pattern.id,
        lightId: action.response.lightId,
        eventType: action.response.eventType,
        delaySeconds: action.delaySeconds,
        confidence: pattern.confidence,
      });
    }
    return actions;
  }

  /** Predictions confident enough to show a person. Never executed. */
  getRecommendations(now: Date = new Date()): Recommendation[] {
    return this.getPredictions(now)
      .filter((p) => p.confidence >= this.recommendationThreshold)
      .map((p): Recommendation => ({
        type: "suggestion",
        message: `Based on your habits: ${p.description}`,
        confidence: p.confidence,
        action: p.action,
      }));
  }

  updatePatternFromFeedback(patternId: number, wasCorrect: boolean): Pattern | null {
    let wasActive = false;
    const updated = this.store.updateConfidence(patternId, (current) => {
      wasActive = current.isActive;
      const confidence = wasCorrect
        ? Math.min(1, current.confidence + POSITIVE_FEEDBACK_STEP)
        : Math.max(0, current.confidence - NEGATIVE_FEEDBACK_STEP);
      return { confidence, isActive: current.isActive && confidence >= DEACTIVATION_THRESHOLD };
    });

    if (!updated) {
      this.logger.warn({ patternId }, "Feedback for unknown pattern");
      return null;
    }

    this.logger.debug({ patternId, wasCorrect, confidence: updated.confidence }, "Pattern feedback applied");
    if (wasActive && !updated.isActive) {
      this.logger.info({ patternId, description: updated.description }, "Deactivated low-confidence pattern");
      this.bus?.emit({ type: "pattern_deactivated", patternId, confidence: updated.confidence });
    }
    return updated;
  }

  private confidentPatterns(): Pattern[] {
    return this.store
      .loadActivePatterns()
      .filter((p) => p.confidence >= this.options.minConfidence);
  }

  private matches(pattern: Pattern, now: Date): boolean {
    const local = localParts(now.getTime(), this.options.timezone);
    if (pattern.weekdays.length > 0 && !pattern.weekdays.includes(local.weekday)) {
      return false;
    }

    if (pattern.timeStart) {
      const start = parseClockTime(pattern.timeStart);
      // Unreadable start time: no time constraint
      if (start) {
        const nowSeconds =
          local.hour * 3600 + local.minute * 60 + local.second + (now.getTime() % 1000) / 1000;
        const minutesUntil = (start.hour * 3600 + start.minute * 60 - nowSeconds) / 60;
        if (minutesUntil < 0 || minutesUntil > this.options.lookaheadMinutes) return false;
      }
    }
    return true;
  }
}
