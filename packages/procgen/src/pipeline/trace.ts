/**
 * Per-run trace of pass boundaries and the random choices passes make.
 */

import type { DecisionEvent, PassTrace, TraceEvent } from "./types";

export function isDecisionEvent(event: TraceEvent): event is DecisionEvent {
  return event.eventType === "decision";
}

export class TraceRecorder {
  private readonly events: TraceEvent[] = [];
  private readonly startTime = performance.now();

  constructor(readonly enabled: boolean) {}

  private elapsed(): number {
    return performance.now() - this.startTime;
  }

  private record(event: TraceEvent): void {
    if (this.enabled) this.events.push(event);
  }

  passStarted(passId: string): void {
    this.record({ eventType: "start", passId, timestamp: this.elapsed() });
  }

  passEnded(passId: string, durationMs: number): void {
    this.record({
      eventType: "end",
      passId,
      timestamp: this.elapsed(),
      durationMs,
    });
  }

  /**
   * Handle that tags everything a pass records with its id.
   */
  forPass(passId: string): PassTrace {
    return {
      decision: (question, options, chosen, reason) => {
        this.record({
          eventType: "decision",
          passId,
          timestamp: this.elapsed(),
          question,
          options,
          chosen,
          reason,
        });
      },
      warning: (message) => {
        this.record({
          eventType: "warning",
          passId,
          timestamp: this.elapsed(),
          message,
        });
      },
    };
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  getDecisions(passId?: string): readonly DecisionEvent[] {
    return this.events
      .filter(isDecisionEvent)
      .filter((event) => passId === undefined || event.passId === passId);
  }
}
