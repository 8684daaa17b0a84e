import { EventEmitter } from "node:events";
import type { ExecutionResult } from "../automation/types.js";
import type { LightEvent } from "../patterns/types.js";

export type LumenEvent =
  | { readonly type: "light_event"; readonly event: LightEvent }
  | { readonly type: "patterns_mined"; readonly analyzed: number; readonly saved: number }
  | { readonly type: "pattern_deactivated"; readonly patternId: number; readonly confidence: number }
  | {
      readonly type: "automation_executed";
      readonly automationId: number;
      readonly result: ExecutionResult;
    };

type EventType = LumenEvent["type"];
type EventOfType<T extends EventType> = Extract<LumenEvent, { type: T }>;
type Handler<T extends EventType> = (event: EventOfType<T>) => void;

/**
 * Typed, synchronous, in-process event bus. Handlers run inside `emit`, so
 * a slow handler delays the emitter.
 */
export class LumenBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  emit<T extends EventType>(event: EventOfType<T>): void {
    this.emitter.emit(event.type, event);
  }

  on<T extends EventType>(type: T, handler: Handler<T>): void {
    this.emitter.on(type, handler as (...args: unknown[]) => void);
  }

  off<T extends EventType>(type: T, handler: Handler<T>): void {
    this.emitter.off(type, handler as (...args: unknown[]) => void);
  }

  dispose(): void {
    this.emitter.removeAllListeners();
  }
}
