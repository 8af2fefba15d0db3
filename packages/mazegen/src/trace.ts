/**
 * Trace collector for generation debugging.
 */

export type TraceEventType = "start" | "end" | "decision" | "warning";

export interface TraceEvent {
  /** Milliseconds since the collector was created. */
  readonly timestamp: number;
  readonly stepId: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

export interface DecisionData {
  readonly question: string;
  readonly options: readonly unknown[];
  readonly chosen: unknown;
  readonly reason: string;
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(stepId: string): void;
  end(stepId: string, durationMs: number): void;
  decision(
    stepId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(stepId: string, message: string): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}

/**
 * Records events in memory when enabled.
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private emit(stepId: string, eventType: TraceEventType, data?: unknown): void {
    if (!this.enabled) return;

    this.events.push({
      timestamp: performance.now() - this.startTime,
      stepId,
      eventType,
      data,
    });
  }

  start(stepId: string): void {
    this.emit(stepId, "start");
  }

  end(stepId: string, durationMs: number): void {
    this.emit(stepId, "end", { durationMs });
  }

  decision(
    stepId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void {
    const data: DecisionData = { question, options, chosen, reason };
    this.emit(stepId, "decision", data);
  }

  warning(stepId: string, message: string): void {
    this.emit(stepId, "warning", { message });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Discards everything.
 */
export class NoopTraceCollector implements TraceCollector {
  readonly enabled = false;
  start(): void {}
  end(): void {}
  decision(): void {}
  warning(): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  clear(): void {}
}

/**
 * Time `fn` as a traced step.
 */
export function traced<T>(trace: TraceCollector, stepId: string, fn: () => T): T {
  trace.start(stepId);
  const startedAt = performance.now();
  const result = fn();
  trace.end(stepId, performance.now() - startedAt);
  return result;
}
