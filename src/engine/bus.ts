import { EventEmitter } from "node:events";
import type { EngineEvent } from "./types.js";

export type EngineEventType = EngineEvent["type"];
export type EngineEventOf<T extends EngineEventType> = Extract<EngineEvent, { type: T }>;

/**
 * Synchronous fan-out of pipeline outcomes: decisions, forecasts, recorded
 * adaptations and council verdicts. Listeners run before `emit` returns.
 */
export class EngineBus {
  private readonly emitter = new EventEmitter();

  emit(event: EngineEvent): void {
    this.emitter.emit(event.type, event);
  }

  /** Returns the matching unsubscribe function. */
  on<T extends EngineEventType>(type: T, listener: (event: EngineEventOf<T>) => void): () => void {
    this.emitter.on(type, listener);
    return () => {
      this.emitter.off(type, listener);
    };
  }

  dispose(): void {
    this.emitter.removeAllListeners();
  }
}
