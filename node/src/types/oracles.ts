import type { ExecutionPlan, Profile } from './orchestration';

/** Structured search criteria extracted from a question (skills, companies, locations, ...). */
export type QueryFilters = Record<string, unknown>;

/** Turns a question into filters, and filters into an executable plan. */
export interface SemanticPlanner {
  decompose(queryText: string): Promise<QueryFilters>;
  generate(filters: QueryFilters, queryText: string): Promise<ExecutionPlan>;
}

/** Turns fetched profiles into the prose answer. */
export interface NarrativeSynthesizer {
  synthesize(profiles: readonly Profile[], queryText: string, totalMatches: number): Promise<string>;
}
