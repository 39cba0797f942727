/**
 * Resolves the top-N aggregated entity ids into Profiles.
 * All fetches run as one priority group (fully parallel) through the executor;
 * failed fetches and unparseable records are skipped and counted.
 */
import type { ToolInvocationFacade } from '@/mcp/capability-client';
import { ParseError } from '@/stability/errors';
import type { EntityId, Profile } from '@/types/orchestration';
import { EngineMetrics } from './engine-metrics';
import { logger } from './logger';
import type { PlanExecutor } from './plan-executor';
import { parseProfile } from './safe-parse-json';

export type RecordFetch = Pick<ToolInvocationFacade, 'fetchRawRecord'>;

export interface ProfileFetchResult {
  /** In the order of the requested ids. */
  profiles: Profile[];
  requested: number;
  fetched: number;
  fetchFailed: number;
  parseFailed: number;
}

export interface ProfileFetcherOptions {
  timeoutMs?: number;
  metrics?: EngineMetrics;
}

export class ProfileFetcher {
  private readonly metrics: EngineMetrics;
  private readonly timeoutMs: number | undefined;

  constructor(
    private readonly records: RecordFetch,
    private readonly executor: Pick<PlanExecutor, 'runGroup'>,
    options: ProfileFetcherOptions = {},
  ) {
    this.metrics = options.metrics ?? new EngineMetrics();
    this.timeoutMs = options.timeoutMs;
  }

  async fetchProfiles(entityIds: readonly EntityId[], limit: number): Promise<ProfileFetchResult> {
    const selected = entityIds.slice(0, Math.max(0, Math.floor(limit)));
    const result: ProfileFetchResult = {
      profiles: [],
      requested: selected.length,
      fetched: 0,
      fetchFailed: 0,
      parseFailed: 0,
    };
    if (selected.length === 0) return result;

    const run = await this.executor.runGroup(
      selected.map((id) => ({ id: `profile:${String(id)}`, run: () => this.records.fetchRawRecord(id) })),
      { timeoutMs: this.timeoutMs },
    );

    run.invocations.forEach((invocation, i) => {
      const id = selected[i];
      const outcome = invocation.outcome;
      if (outcome?.state !== 'success') {
        result.fetchFailed++;
        if (outcome) this.metrics.recordError(outcome.error.kind);
        logger.warn('profiles:fetch_failed', {
          entityId: id,
          error: outcome ? outcome.error.message : 'abandoned',
        });
        return;
      }
      result.fetched++;
      const profile = parseProfile(outcome.value, id);
      if (!profile) {
        result.parseFailed++;
        const failure = new ParseError(`record ${String(id)} could not be parsed`, id);
        this.metrics.recordError(failure.kind);
        logger.warn('profiles:parse_failed', { entityId: id, raw: outcome.value.slice(0, 200) });
        return;
      }
      result.profiles.push(profile);
    });

    logger.info('profiles:done', {
      requested: result.requested,
      fetched: result.fetched,
      fetchFailed: result.fetchFailed,
      parseFailed: result.parseFailed,
    });
    return result;
  }
}
