// src/services/orchestrator.ts — question → plan → executor → profiles → prose.
// The planner and synthesizer are oracles behind interfaces; everything between them is deterministic.
import type { AggregatedResult, ExecutionPlan, Profile } from '@/types/orchestration';
import type { NarrativeSynthesizer, QueryFilters, SemanticPlanner } from '@/types/oracles';
import { EngineMetrics } from './engine-metrics';
import { logger } from './logger';
import type { ExecuteOptions, PlanExecutor } from './plan-executor';
import type { ProfileFetcher, ProfileFetchResult } from './profile-fetcher';

export type AnswerConfidence = 'high' | 'low';

export type ProfileStats = Omit<ProfileFetchResult, 'profiles'>;

export interface QueryAnswer {
  responseText: string;
  totalMatches: number;
  profiles: Profile[];
  filters: QueryFilters;
  plan: ExecutionPlan;
  aggregated: AggregatedResult;
  profileStats: ProfileStats;
  confidence: AnswerConfidence;
}

export interface QueryOrchestratorDeps {
  planner: SemanticPlanner;
  synthesizer: NarrativeSynthesizer;
  executor: Pick<PlanExecutor, 'execute'>;
  profiles: Pick<ProfileFetcher, 'fetchProfiles'>;
  metrics?: EngineMetrics;
}

export interface QueryOrchestratorOptions {
  /** How many of the matched ids are resolved into profiles. */
  profileLimit?: number;
  execute?: ExecuteOptions;
  now?: () => number;
}

export function noMatchesMessage(queryText: string): string {
  return `No candidates matched "${queryText}". Try fewer or broader criteria.`;
}

export class QueryOrchestrator {
  private readonly metrics: EngineMetrics;
  private readonly profileLimit: number;
  private readonly executeOptions: ExecuteOptions;
  private readonly now: () => number;

  constructor(
    private readonly deps: QueryOrchestratorDeps,
    options: QueryOrchestratorOptions = {},
  ) {
    this.metrics = deps.metrics ?? new EngineMetrics();
    this.profileLimit = options.profileLimit ?? 10;
    this.executeOptions = options.execute ?? {};
    this.now = options.now ?? Date.now;
  }

  async answer(queryText: string): Promise<QueryAnswer> {
    const startedAt = this.now();
    const filters = await this.deps.planner.decompose(queryText);
    const plan = await this.deps.planner.generate(filters, queryText);
    const aggregated = await this.deps.executor.execute(plan, this.executeOptions);
    const totalMatches = aggregated.entityIds.length;

    let fetched: ProfileFetchResult = { profiles: [], requested: 0, fetched: 0, fetchFailed: 0, parseFailed: 0 };
    let responseText: string;
    if (totalMatches === 0) {
      logger.info('flow:no_matches', { strategy: plan.strategy, errors: aggregated.errors.length });
      responseText = noMatchesMessage(queryText);
    } else {
      fetched = await this.deps.profiles.fetchProfiles(aggregated.entityIds, this.profileLimit);
      responseText =
        fetched.profiles.length > 0
          ? await this.deps.synthesizer.synthesize(fetched.profiles, queryText, totalMatches)
          : `Found ${totalMatches} matching candidates, but none of their profiles could be loaded.`;
    }

    const { profiles, ...profileStats } = fetched;
    this.metrics.recordQuery({
      subQueryCount: plan.subQueries.length,
      totalMatches,
      profilesReturned: profiles.length,
      parseFailed: profileStats.parseFailed,
      stoppedEarly: aggregated.stoppedEarly,
      deadlineExpired: aggregated.deadlineExpired,
      durationMs: this.now() - startedAt,
    });

    return {
      responseText,
      totalMatches,
      profiles,
      filters,
      plan,
      aggregated,
      profileStats,
      confidence: profiles.length > 0 ? 'high' : 'low',
    };
  }
}
