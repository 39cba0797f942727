import type { EngineErrorKind } from '@/stability/errors';

/** Opaque identifier of a record in the graph store. Compared by exact equality. */
export type EntityId = string | number;

export const AGGREGATION_STRATEGIES = ['UNION', 'INTERSECT', 'SEQUENTIAL'] as const;

export type AggregationStrategy = (typeof AGGREGATION_STRATEGIES)[number];

export type ToolParams = Readonly<Record<string, unknown>>;

/** One atomic call to the search service. The planner outputs these; the executor runs them. */
export interface SubQuery {
  readonly id: string;
  readonly toolName: string;
  readonly params: ToolParams;
  /** Lower runs earlier. Sub-queries sharing a priority run in parallel. */
  readonly priority: number;
  readonly rationale: string;
  /**
   * SEQUENTIAL only: name of the param that receives the current candidate ids
   * before this sub-query runs.
   */
  readonly candidateParam?: string;
}

export interface ExecutionPlan {
  readonly subQueries: readonly SubQuery[];
  readonly strategy: AggregationStrategy;
}

export interface OutcomeError {
  kind: EngineErrorKind;
  message: string;
}

export interface ToolOutcome {
  readonly subQueryId: string;
  readonly toolName: string;
  readonly priority: number;
  readonly success: boolean;
  /** Deduplicated, first-seen order. */
  readonly entityIds: readonly EntityId[];
  /** Size of the list the tool returned, before dedup. */
  readonly rawCount: number;
  readonly error?: OutcomeError;
}

export type InvocationState = 'pending' | 'success' | 'failed' | 'timed_out';

/** Read-only view of one invocation's lifecycle. */
export interface InvocationSnapshot {
  id: string;
  state: InvocationState;
  startedAt: number;
  settledAt?: number;
}

export interface AggregationErrorEntry {
  subQueryId: string;
  toolName: string;
  kind: EngineErrorKind;
  message: string;
}

export interface AggregatedResult {
  readonly strategy: AggregationStrategy;
  readonly entityIds: readonly EntityId[];
  readonly perSubQueryCounts: Readonly<Record<string, number>>;
  readonly errors: readonly AggregationErrorEntry[];
  readonly invocations: readonly InvocationSnapshot[];
  /** INTERSECT emptied before the last group; later groups were never issued. */
  readonly stoppedEarly: boolean;
  readonly deadlineExpired: boolean;
  readonly abandonedSubQueryIds: readonly string[];
}

export type ParseStrategy = 1 | 2 | 3;

export interface Profile {
  readonly entityId: EntityId;
  readonly fields: Readonly<Record<string, unknown>>;
  readonly parseStrategyUsed: ParseStrategy;
}

/** Response of the external search tool invocation. */
export interface SearchResponse {
  success: boolean;
  entityIds: EntityId[];
  error?: string;
}

/** Response of the external full-record fetch. */
export interface FetchResponse {
  success: boolean;
  rawText: string;
  error?: string;
}
