/**
 * Orchestration event bus — typed EventEmitter for run progress.
 *
 * The CLI uses it for progress lines and the MCP server for logging;
 * the orchestrator never waits on a listener, and a throwing listener is
 * logged, never propagated into the run.
 */

import { EventEmitter } from "node:events";
import type { IterationRecord, OrchestrationState } from "./types.js";
import { createLogger } from "../logger.js";

const log = createLogger("events");

export interface StateChangedEvent {
  runId: string;
  round: number;
  /** null for the first transition of a run */
  from: OrchestrationState | null;
  to: OrchestrationState;
}

export interface RoundCompletedEvent {
  runId: string;
  record: IterationRecord;
  /** Verdict of the convergence check for this round */
  stop: boolean;
}

export class OrchestrationEventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(0);
  }

  private safeEmit(name: string, event: StateChangedEvent | RoundCompletedEvent): void {
    for (const listener of this.rawListeners(name)) {
      try {
        listener.call(this, event);
      } catch (err) {
        log.warn(`${name} listener threw:`, err instanceof Error ? err.message : String(err));
      }
    }
  }

  emitState(event: StateChangedEvent): void {
    this.safeEmit("state:changed", event);
  }

  onState(listener: (event: StateChangedEvent) => void): this {
    return this.on("state:changed", listener);
  }

  offState(listener: (event: StateChangedEvent) => void): this {
    return this.off("state:changed", listener);
  }

  /** Emit once a round's record is final. */
  emitRound(event: RoundCompletedEvent): void {
    this.safeEmit("round:completed", event);
  }

  onRound(listener: (event: RoundCompletedEvent) => void): this {
    return this.on("round:completed", listener);
  }

  offRound(listener: (event: RoundCompletedEvent) => void): this {
    return this.off("round:completed", listener);
  }
}
