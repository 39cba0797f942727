import { describe, it, expect } from 'vitest';
import { validatePlan } from '@/services/plan-validator';
import { PlannerContractViolation } from '@/stability/errors';

function violation(input: unknown): PlannerContractViolation {
  try {
    validatePlan(input);
  } catch (err) {
    if (err instanceof PlannerContractViolation) return err;
    throw err;
  }
  throw new Error('plan was accepted');
}

describe('validatePlan', () => {
  it('normalizes and freezes a valid plan', () => {
    const plan = validatePlan({
      strategy: 'SEQUENTIAL',
      subQueries: [
        { id: 1, toolName: ' find_people_by_skill ', params: { skill: 'Go' }, priority: 1 },
        { id: 'b', toolName: 'find_people_by_company', priority: 2, rationale: 'narrow', candidateParam: 'person_ids' },
      ],
    });

    expect(plan).toEqual({
      strategy: 'SEQUENTIAL',
      subQueries: [
        { id: '1', toolName: 'find_people_by_skill', params: { skill: 'Go' }, priority: 1, rationale: '' },
        {
          id: 'b',
          toolName: 'find_people_by_company',
          params: {},
          priority: 2,
          rationale: 'narrow',
          candidateParam: 'person_ids',
        },
      ],
    });
    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.subQueries)).toBe(true);
    expect(Object.isFrozen(plan.subQueries[0])).toBe(true);
    expect(Object.isFrozen(plan.subQueries[0].params)).toBe(true);
  });

  it('rejects an empty plan', () => {
    expect(violation({ strategy: 'UNION', subQueries: [] }).issues).toEqual([
      { path: 'subQueries', message: 'plan has no sub-queries' },
    ]);
  });

  it('rejects duplicate sub-query ids', () => {
    const err = violation({
      strategy: 'UNION',
      subQueries: [
        { id: 'a', toolName: 'find_people_by_skill', priority: 1 },
        { id: 'a', toolName: 'find_people_by_company', priority: 1 },
      ],
    });
    expect(err.issues).toEqual([{ path: 'subQueries.1.id', message: 'duplicate sub-query id "a"' }]);
    expect(err.kind).toBe('PlannerContractViolation');
  });

  it('rejects a blank tool name and a non-integer priority', () => {
    const err = violation({
      strategy: 'UNION',
      subQueries: [{ id: 'a', toolName: '  ', priority: 0.5 }],
    });
    expect(err.issues).toEqual([
      { path: 'subQueries.0.toolName', message: 'toolName cannot be empty' },
      { path: 'subQueries.0.priority', message: 'priority must be an integer' },
    ]);
  });

  it('rejects unknown strategies and non-object params', () => {
    const err = violation({
      strategy: 'MERGE',
      subQueries: [{ id: 'a', toolName: 'find_people_by_skill', params: 'skill=Go', priority: 1 }],
    });
    expect(err.issues.map((i) => i.path)).toEqual(['subQueries.0.params', 'strategy']);
  });

  it('rejects input that is not an object', () => {
    expect(violation(null).issues.map((i) => i.path)).toEqual(['root']);
  });
});
