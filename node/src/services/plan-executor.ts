/**
 * Executes an ExecutionPlan in priority groups.
 * Groups run in ascending priority; every sub-query of a group runs concurrently and the
 * next group starts only after all of them settled. Tool failures and timeouts become
 * failed outcomes; only a plan that breaks the contract is thrown.
 */
import type { ToolInvocationFacade } from '@/mcp/capability-client';
import { EngineError, errorMessage, ToolInvocationError } from '@/stability/errors';
import type {
  AggregatedResult,
  EntityId,
  ExecutionPlan,
  SubQuery,
  ToolOutcome,
  ToolParams,
} from '@/types/orchestration';
import { EngineMetrics } from './engine-metrics';
import { Invocation } from './invocation';
import { logger } from './logger';
import { validatePlan } from './plan-validator';
import { aggregate, intersectionOf, unionOf } from './result-aggregator';

export type EntitySearch = Pick<ToolInvocationFacade, 'searchEntityIds'>;

export interface GroupTask<T> {
  id: string;
  run: () => Promise<T>;
}

export interface RunGroupOptions {
  /** Per-invocation timeout. */
  timeoutMs?: number;
  /** Epoch ms after which pending invocations are abandoned. */
  deadlineAt?: number;
}

export interface GroupRun<T> {
  /** Same order as the tasks. */
  invocations: Invocation<T>[];
  deadlineExpired: boolean;
  abandonedIds: string[];
}

export interface ExecuteOptions {
  invocationTimeoutMs?: number;
  /** Whole-plan deadline, from the start of execute(). */
  deadlineMs?: number;
  /** Deadline for each priority group, from the start of that group. */
  groupDeadlineMs?: number;
}

export interface PlanExecutorOptions extends ExecuteOptions {
  metrics?: EngineMetrics;
  now?: () => number;
}

/** Partition by priority, ascending; declared order is kept within a group. */
export function groupByPriority(subQueries: readonly SubQuery[]): SubQuery[][] {
  const groups = new Map<number, SubQuery[]>();
  for (const sq of subQueries) {
    const group = groups.get(sq.priority);
    if (group) group.push(sq);
    else groups.set(sq.priority, [sq]);
  }
  return [...groups.entries()].sort(([a], [b]) => a - b).map(([, group]) => group);
}

function dedupe(ids: readonly EntityId[]): EntityId[] {
  return [...new Set(ids)];
}

function toOutcome(sq: SubQuery, invocation: Invocation<EntityId[]>): ToolOutcome | undefined {
  const result = invocation.outcome;
  if (!result) return undefined;
  const base = { subQueryId: sq.id, toolName: sq.toolName, priority: sq.priority };
  if (result.state === 'success') {
    return Object.freeze({ ...base, success: true, entityIds: dedupe(result.value), rawCount: result.value.length });
  }
  return Object.freeze({ ...base, success: false, entityIds: [], rawCount: 0, error: result.error });
}

/** Longest delay setTimeout honors; larger values fire immediately. */
export const MAX_TIMER_MS = 2_147_483_647;

function timerDelay(ms: number): number {
  return Math.min(ms, MAX_TIMER_MS);
}

/** Resolves true when `work` finished first, false when `ms` elapsed. */
async function finishesWithin(work: Promise<unknown>, ms: number): Promise<boolean> {
  if (ms <= 0) return false;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timerDelay(ms));
  });
  try {
    return await Promise.race([work.then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}

function earliest(...deadlines: Array<number | undefined>): number | undefined {
  const set = deadlines.filter((d): d is number => d !== undefined);
  return set.length > 0 ? Math.min(...set) : undefined;
}

export class PlanExecutor {
  private readonly metrics: EngineMetrics;
  private readonly now: () => number;
  private readonly defaults: ExecuteOptions;

  constructor(
    private readonly search: EntitySearch,
    options: PlanExecutorOptions = {},
  ) {
    this.metrics = options.metrics ?? new EngineMetrics();
    this.now = options.now ?? Date.now;
    this.defaults = {
      invocationTimeoutMs: options.invocationTimeoutMs,
      deadlineMs: options.deadlineMs,
      groupDeadlineMs: options.groupDeadlineMs,
    };
  }

  /**
   * Fan out one invocation per task and wait until all settled, or until the deadline,
   * at which point the still-pending ones are abandoned.
   */
  async runGroup<T>(tasks: readonly GroupTask<T>[], options: RunGroupOptions = {}): Promise<GroupRun<T>> {
    const invocations = tasks.map((task) => new Invocation<T>(task.id, this.now()));
    const settled = Promise.all(tasks.map((task, i) => this.runOne(task, invocations[i], options.timeoutMs)));

    let deadlineExpired = false;
    if (options.deadlineAt === undefined) {
      await settled;
    } else {
      deadlineExpired = !(await finishesWithin(settled, options.deadlineAt - this.now()));
    }

    const abandonedIds = deadlineExpired
      ? invocations.filter((inv) => inv.abandon()).map((inv) => inv.id)
      : [];
    return { invocations, deadlineExpired, abandonedIds };
  }

  private async runOne<T>(task: GroupTask<T>, invocation: Invocation<T>, timeoutMs: number | undefined): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      const work = task.run();
      const value =
        timeoutMs === undefined
          ? await work
          : await Promise.race([
              work,
              new Promise<never>((_, reject) => {
                timer = setTimeout(
                  () =>
                    reject(
                      new ToolInvocationError(`timed out after ${timeoutMs}ms`, 'TIMEOUT', true, { timeout: true }),
                    ),
                  timerDelay(timeoutMs),
                );
              }),
            ]);
      invocation.settle({ state: 'success', value }, this.now());
    } catch (err) {
      const kind = err instanceof EngineError ? err.kind : 'ToolInvocationError';
      const error = { kind, message: errorMessage(err) };
      invocation.settle(kind === 'Timeout' ? { state: 'timed_out', error } : { state: 'failed', error }, this.now());
    } finally {
      clearTimeout(timer);
    }
  }

  /** SEQUENTIAL: hand the current candidates to sub-queries that asked for them. */
  private paramsFor(sq: SubQuery, candidates: EntityId[] | undefined): ToolParams {
    if (sq.candidateParam === undefined || candidates === undefined) return sq.params;
    return { ...sq.params, [sq.candidateParam]: candidates };
  }

  async execute(input: ExecutionPlan, options: ExecuteOptions = {}): Promise<AggregatedResult> {
    const plan = validatePlan(input);
    const opts = { ...this.defaults, ...options };
    const startedAt = this.now();
    const planDeadline = opts.deadlineMs !== undefined ? startedAt + opts.deadlineMs : undefined;
    const groups = groupByPriority(plan.subQueries);

    const outcomeGroups: ToolOutcome[][] = [];
    const invocations: Invocation<EntityId[]>[] = [];
    const abandonedSubQueryIds: string[] = [];
    let candidates: EntityId[] | undefined;
    let stoppedEarly = false;
    let deadlineExpired = false;

    for (let g = 0; g < groups.length; g++) {
      const group = groups[g];
      const groupStart = this.now();
      if (planDeadline !== undefined && groupStart >= planDeadline) {
        deadlineExpired = true;
        break;
      }

      const run = await this.runGroup(
        group.map((sq) => ({
          id: sq.id,
          run: () => this.search.searchEntityIds(sq.toolName, this.paramsFor(sq, candidates)),
        })),
        {
          timeoutMs: opts.invocationTimeoutMs,
          deadlineAt: earliest(
            planDeadline,
            opts.groupDeadlineMs !== undefined ? groupStart + opts.groupDeadlineMs : undefined,
          ),
        },
      );
      invocations.push(...run.invocations);

      const outcomes: ToolOutcome[] = [];
      group.forEach((sq, i) => {
        const outcome = toOutcome(sq, run.invocations[i]);
        if (!outcome) return;
        outcomes.push(outcome);
        if (outcome.error) this.metrics.recordError(outcome.error.kind);
      });
      outcomeGroups.push(outcomes);

      logger.info('executor:group_done', {
        priority: group[0].priority,
        size: group.length,
        succeeded: outcomes.filter((o) => o.success).length,
        failed: outcomes.filter((o) => !o.success).length,
        abandoned: run.abandonedIds.length,
        ms: this.now() - groupStart,
      });

      if (run.deadlineExpired) {
        deadlineExpired = true;
        abandonedSubQueryIds.push(...run.abandonedIds);
        logger.warn('executor:deadline_expired', { priority: group[0].priority, abandoned: run.abandonedIds });
        break;
      }

      if (plan.strategy === 'SEQUENTIAL' && outcomes.some((o) => o.success)) {
        candidates = unionOf(outcomes);
      }

      if (plan.strategy === 'INTERSECT' && g < groups.length - 1) {
        const running = intersectionOf(outcomeGroups.flat());
        if (running !== undefined && running.length === 0) {
          stoppedEarly = true;
          logger.info('executor:early_exit', { afterPriority: group[0].priority, skippedGroups: groups.length - g - 1 });
          break;
        }
      }
    }

    const aggregated = aggregate(outcomeGroups, plan.strategy);
    logger.info('flow:executor_done', {
      strategy: plan.strategy,
      groups: outcomeGroups.length,
      totalGroups: groups.length,
      entityCount: aggregated.entityIds.length,
      errors: aggregated.errors.length,
      stoppedEarly,
      deadlineExpired,
      ms: this.now() - startedAt,
    });

    return {
      ...aggregated,
      invocations: invocations.map((inv) => inv.snapshot()),
      stoppedEarly,
      deadlineExpired,
      abandonedSubQueryIds,
    };
  }
}
