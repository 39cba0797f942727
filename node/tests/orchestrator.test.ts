import { describe, it, expect, vi } from 'vitest';
import { EngineMetrics, type QueryMetrics } from '@/services/engine-metrics';
import type { LlmClient, LlmRequest } from '@/services/llm-client';
import { LlmSemanticPlanner } from '@/services/llm-planner';
import { LlmNarrativeSynthesizer, formatProfileSummary } from '@/services/llm-synthesizer';
import { QueryOrchestrator, noMatchesMessage } from '@/services/orchestrator';
import { PlanExecutor } from '@/services/plan-executor';
import { ProfileFetcher } from '@/services/profile-fetcher';
import { PlannerContractViolation } from '@/stability/errors';
import type { EntityId, ToolParams } from '@/types/orchestration';

const FILTERS = '{"skills": ["Go"], "companies": ["Acme"]}';

function planJson(companyIds: string): string {
  return JSON.stringify({
    strategy: 'INTERSECT',
    subQueries: [
      { id: 'sq1', toolName: 'find_people_by_skill', params: { skill: 'Go' }, priority: 1, rationale: 'skill' },
      { id: 'sq2', toolName: 'find_people_by_company', params: { company_name: companyIds }, priority: 1, rationale: 'company' },
    ],
  });
}

/** LLM fake: answers the filter prompt, the planner prompt and the synthesis prompt. */
function fakeLlm(plan: string) {
  const requests: LlmRequest[] = [];
  const complete = vi.fn(async (request: LlmRequest): Promise<string> => {
    requests.push(request);
    if (request.system.startsWith('You extract')) return FILTERS;
    if (request.system.startsWith('You are a search planner')) return plan;
    return '  Two candidates match.  ';
  });
  const llm: LlmClient = { complete };
  return { llm, complete, requests };
}

const SEARCH: Record<string, Record<string, EntityId[]>> = {
  find_people_by_skill: { Go: [1, 2, 3] },
  find_people_by_company: { Acme: [2, 3, 4], Globex: [9] },
};

function setup(plan: string) {
  const metrics = new EngineMetrics();
  const { llm, complete, requests } = fakeLlm(plan);
  const searchEntityIds = vi.fn(async (toolName: string, params: ToolParams): Promise<EntityId[]> => {
    const key = Object.values(params)[0];
    return typeof key === 'string' ? (SEARCH[toolName]?.[key] ?? []) : [];
  });
  const fetchRawRecord = vi.fn(async (id: EntityId) => `{'person_id': ${String(id)}, 'name': 'Person ${String(id)}'}`);
  const executor = new PlanExecutor({ searchEntityIds }, { metrics });
  const orchestrator = new QueryOrchestrator(
    {
      planner: new LlmSemanticPlanner(llm),
      synthesizer: new LlmNarrativeSynthesizer(llm),
      executor,
      profiles: new ProfileFetcher({ fetchRawRecord }, executor, { metrics }),
      metrics,
    },
    { profileLimit: 5, now: () => 1000 },
  );
  return { orchestrator, metrics, complete, requests, searchEntityIds, fetchRawRecord };
}

describe('QueryOrchestrator.answer', () => {
  it('plans, executes, fetches profiles and synthesizes', async () => {
    const { orchestrator, metrics, requests } = setup(planJson('Acme'));
    const reported: QueryMetrics[] = [];
    metrics.setCallback((m) => reported.push(m));

    const answer = await orchestrator.answer('Go developers at Acme');

    expect(answer.responseText).toBe('Two candidates match.');
    expect(answer.totalMatches).toBe(2);
    expect(answer.filters).toEqual({ skills: ['Go'], companies: ['Acme'] });
    expect(answer.plan.strategy).toBe('INTERSECT');
    expect(answer.aggregated.entityIds).toEqual([2, 3]);
    expect(answer.profiles.map((p) => p.entityId)).toEqual([2, 3]);
    expect(answer.profileStats).toEqual({ requested: 2, fetched: 2, fetchFailed: 0, parseFailed: 0 });
    expect(answer.confidence).toBe('high');

    expect(requests).toHaveLength(3);
    expect(requests[2].user).toContain('Total matches found: 2');
    expect(requests[2].user).toContain('Candidate 2 (id 3)\nperson_id: 3\nname: Person 3');

    expect(reported).toEqual([
      {
        subQueryCount: 2,
        totalMatches: 2,
        profilesReturned: 2,
        parseFailed: 0,
        stoppedEarly: false,
        deadlineExpired: false,
        durationMs: 0,
      },
    ]);
  });

  it('answers a zero-match query without fetching or synthesizing', async () => {
    const { orchestrator, complete, fetchRawRecord } = setup(planJson('Globex'));

    const answer = await orchestrator.answer('Go developers at Globex');

    expect(answer.totalMatches).toBe(0);
    expect(answer.responseText).toBe(noMatchesMessage('Go developers at Globex'));
    expect(answer.confidence).toBe('low');
    expect(answer.profiles).toEqual([]);
    expect(complete).toHaveBeenCalledTimes(2);
    expect(fetchRawRecord).not.toHaveBeenCalled();
  });

  it('rejects a malformed plan before any search', async () => {
    const { orchestrator, searchEntityIds } = setup('{"strategy": "UNION", "subQueries": []}');

    await expect(orchestrator.answer('anyone')).rejects.toBeInstanceOf(PlannerContractViolation);
    expect(searchEntityIds).not.toHaveBeenCalled();
  });

  it('rejects planner output that is not JSON', async () => {
    const { orchestrator, searchEntityIds } = setup('I would search by skill first.');

    await expect(orchestrator.answer('anyone')).rejects.toBeInstanceOf(PlannerContractViolation);
    expect(searchEntityIds).not.toHaveBeenCalled();
  });
});

describe('formatProfileSummary', () => {
  it('lists readable fields and leaves out empty and placeholder values', () => {
    const summary = formatProfileSummary(
      {
        entityId: 'p1',
        fields: { name: 'Ana', skills: ['Go', 'SQL'], updated_at: '<non-literal>', manager: null, score: NaN, bio: ' ' },
        parseStrategyUsed: 2,
      },
      0,
    );
    expect(summary).toBe('Candidate 1 (id p1)\nname: Ana\nskills: Go, SQL');
  });
});
