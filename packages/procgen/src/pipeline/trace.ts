/**
 * Trace collectors for pass timing and generation decisions.
 */

import type { GenerationDecision, TraceCollector, TraceEvent } from "./types";

/**
 * Keeps events in memory, in emission order
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private elapsed(): number {
    return performance.now() - this.startTime;
  }

  start(passId: string): void {
    if (!this.enabled) return;
    this.events.push({ timestamp: this.elapsed(), passId, eventType: "start" });
  }

  end(passId: string, durationMs: number): void {
    if (!this.enabled) return;
    this.events.push({
      timestamp: this.elapsed(),
      passId,
      eventType: "end",
      durationMs,
    });
  }

  decision(passId: string, decision: GenerationDecision): void {
    if (!this.enabled) return;
    this.events.push({
      timestamp: this.elapsed(),
      passId,
      eventType: "decision",
      decision,
    });
  }

  warning(passId: string, message: string): void {
    if (!this.enabled) return;
    this.events.push({
      timestamp: this.elapsed(),
      passId,
      eventType: "warning",
      message,
    });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Drops everything; the default when tracing is off
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_passId: string): void {}
  end(_passId: string, _durationMs: number): void {}
  decision(_passId: string, _decision: GenerationDecision): void {}
  warning(_passId: string, _message: string): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  clear(): void {}
}

export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : new NoOpTraceCollector();
}
