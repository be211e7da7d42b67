/**
 * Trace collector implementations.
 */

import type {
  DecisionEvent,
  TraceCollector,
  TraceEvent,
  TraceEventType,
} from "./types";

export interface TraceCollectorOptions {
  /** Also print warnings through console.warn */
  readonly echoWarnings?: boolean;
}

/**
 * Default trace collector. Records nothing unless enabled.
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly echoWarnings: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = false, options: TraceCollectorOptions = {}) {
    this.enabled = enabled;
    this.echoWarnings = options.echoWarnings ?? false;
    this.startTime = performance.now();
  }

  private emit(scope: string, eventType: TraceEventType, data?: unknown): void {
    if (!this.enabled) return;

    this.events.push({
      timestamp: performance.now() - this.startTime,
      scope,
      eventType,
      data,
    });
  }

  start(scope: string): void {
    this.emit(scope, "start");
  }

  end(scope: string, durationMs: number): void {
    this.emit(scope, "end", { durationMs });
  }

  decision(
    scope: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void {
    this.emit(scope, "decision", { question, options, chosen, reason });
  }

  warning(scope: string, message: string): void {
    if (this.enabled && this.echoWarnings) {
      console.warn(`[maze] ${scope}: ${message}`);
    }
    this.emit(scope, "warning", { message });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  getDecisions(): readonly DecisionEvent[] {
    return this.events.filter(isDecisionEvent);
  }

  clear(): void {
    this.events.length = 0;
  }
}

function isDecisionEvent(event: TraceEvent): event is DecisionEvent {
  return event.eventType === "decision";
}

/**
 * No-op trace collector for production
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_scope: string): void {}
  end(_scope: string, _durationMs: number): void {}
  decision(
    _scope: string,
    _question: string,
    _options: readonly unknown[],
    _chosen: unknown,
    _reason: string,
  ): void {}
  warning(_scope: string, _message: string): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  clear(): void {}
}

export const NO_OP_TRACE: TraceCollector = new NoOpTraceCollector();

export function createTraceCollector(
  enabled: boolean,
  options?: TraceCollectorOptions,
): TraceCollector {
  return enabled
    ? new DefaultTraceCollector(true, options)
    : NO_OP_TRACE;
}
