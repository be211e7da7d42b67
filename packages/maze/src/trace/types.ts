/**
 * Trace types for opt-in observability of generation and search.
 */

export type TraceEventType = "start" | "end" | "decision" | "warning";

/**
 * Base trace event
 */
export interface TraceEvent {
  /** Milliseconds since the collector was created */
  readonly timestamp: number;
  /** Emitting component, e.g. "generator.dfs" or "search.astar" */
  readonly scope: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

/**
 * Decision event for "explain why" debugging
 */
export interface DecisionEvent extends TraceEvent {
  readonly eventType: "decision";
  readonly data: {
    readonly question: string;
    readonly options: readonly unknown[];
    readonly chosen: unknown;
    readonly reason: string;
  };
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(scope: string): void;
  end(scope: string, durationMs: number): void;
  decision(
    scope: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(scope: string, message: string): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}

/**
 * Options accepted by every traced component.
 */
export interface TraceOptions {
  /** Collector receiving the component's events; defaults to a no-op */
  readonly trace?: TraceCollector;
}
