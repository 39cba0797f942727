/**
 * Combines tool outcomes into one ordered, deduplicated entity id list.
 *
 * UNION       first-seen order over groups (ascending priority) then declared order.
 * INTERSECT   ids present in every successful outcome, in first-seen order. Empty is a valid result.
 * SEQUENTIAL  each group's union replaces the candidate set; a group without a successful
 *             outcome leaves it unchanged.
 * Failed outcomes never contribute ids; they are listed under `errors`.
 */
import type {
  AggregatedResult,
  AggregationErrorEntry,
  AggregationStrategy,
  EntityId,
  ToolOutcome,
} from '@/types/orchestration';

export function unionOf(outcomes: readonly ToolOutcome[]): EntityId[] {
  const seen = new Set<EntityId>();
  const ids: EntityId[] = [];
  for (const outcome of outcomes) {
    if (!outcome.success) continue;
    for (const id of outcome.entityIds) {
      if (seen.has(id)) continue;
      seen.add(id);
      ids.push(id);
    }
  }
  return ids;
}

/** Intersection over successful outcomes; undefined when none succeeded. */
export function intersectionOf(outcomes: readonly ToolOutcome[]): EntityId[] | undefined {
  const successes = outcomes.filter((o) => o.success);
  if (successes.length === 0) return undefined;
  const sets = successes.map((o) => new Set(o.entityIds));
  return unionOf(successes).filter((id) => sets.every((s) => s.has(id)));
}

export function sequentialOf(groups: readonly (readonly ToolOutcome[])[]): EntityId[] {
  let candidates: EntityId[] = [];
  for (const group of groups) {
    if (!group.some((o) => o.success)) continue;
    candidates = unionOf(group);
  }
  return candidates;
}

function combine(groups: readonly (readonly ToolOutcome[])[], strategy: AggregationStrategy): EntityId[] {
  switch (strategy) {
    case 'UNION':
      return unionOf(groups.flat());
    case 'INTERSECT':
      return intersectionOf(groups.flat()) ?? [];
    case 'SEQUENTIAL':
      return sequentialOf(groups);
  }
}

export function aggregate(
  groups: readonly (readonly ToolOutcome[])[],
  strategy: AggregationStrategy,
): AggregatedResult {
  const all = groups.flat();

  const entityIds = combine(groups, strategy);

  const perSubQueryCounts: Record<string, number> = {};
  const errors: AggregationErrorEntry[] = [];
  for (const outcome of all) {
    perSubQueryCounts[outcome.subQueryId] = outcome.rawCount;
    if (!outcome.success) {
      errors.push({
        subQueryId: outcome.subQueryId,
        toolName: outcome.toolName,
        kind: outcome.error?.kind ?? 'ToolInvocationError',
        message: outcome.error?.message ?? 'unknown error',
      });
    }
  }

  return {
    strategy,
    entityIds,
    perSubQueryCounts,
    errors,
    invocations: [],
    stoppedEarly: false,
    deadlineExpired: false,
    abandonedSubQueryIds: [],
  };
}
