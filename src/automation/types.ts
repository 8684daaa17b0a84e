import type { LightCommand, TargetType } from "../devices/types.js";

export type AutomationTrigger =
  | { readonly type: "time"; readonly time: string; readonly weekdays: readonly number[] }
  | { readonly type: "sunrise"; readonly offsetMinutes: number; readonly weekdays: readonly number[] }
  | { readonly type: "sunset"; readonly offsetMinutes: number; readonly weekdays: readonly number[] }
  | { readonly type: "manual" };

export type TriggerType = AutomationTrigger["type"];

export interface AutomationTarget {
  readonly type: TargetType;
  readonly ids: readonly string[];
}

export interface SequenceStep {
  readonly delaySeconds: number;
  readonly command: LightCommand;
}

export type AutomationAction =
  | { readonly kind: "command"; readonly command: LightCommand }
  | { readonly kind: "sequence"; readonly steps: readonly SequenceStep[] };

export interface Automation {
  readonly id: number;
  readonly name: string;
  readonly description: string | null;
  readonly trigger: AutomationTrigger;
  readonly target: AutomationTarget;
  readonly action: AutomationAction;
  readonly isEnabled: boolean;
  readonly triggerCount: number;
  readonly lastTriggered: number | null;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface NewAutomation {
  readonly name: string;
  readonly description?: string | null;
  readonly trigger: AutomationTrigger;
  readonly target: AutomationTarget;
  readonly action: AutomationAction;
  readonly isEnabled?: boolean;
}

export type AutomationPatch = Partial<NewAutomation>;

export interface ExecutionResult {
  readonly success: boolean;
  readonly reason?: string;
  /** Targets that acknowledged the inline command(s). */
  readonly succeeded: number;
  readonly total: number;
  /** Sequence steps handed to the job scheduler for later. */
  readonly scheduledSteps: number;
}
