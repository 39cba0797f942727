/**
 * Plan boundary: planner output is loosely typed JSON. Anything that does not
 * match the plan contract is rejected here, before a single tool call is issued.
 */
import { z } from 'zod';
import { PlannerContractViolation } from '@/stability/errors';
import { AGGREGATION_STRATEGIES, type ExecutionPlan, type SubQuery } from '@/types/orchestration';

const subQuerySchema = z.object({
  id: z.union([z.string().trim().min(1), z.number().int().transform(String)]),
  toolName: z.string({ required_error: 'toolName is required' }).trim().min(1, 'toolName cannot be empty'),
  params: z.record(z.unknown()).default({}),
  priority: z.number({ invalid_type_error: 'priority must be an integer' }).int('priority must be an integer'),
  rationale: z.string().default(''),
  candidateParam: z.string().trim().min(1).optional(),
});

export const executionPlanSchema = z
  .object({
    subQueries: z.array(subQuerySchema).min(1, 'plan has no sub-queries'),
    strategy: z.enum(AGGREGATION_STRATEGIES),
  })
  .superRefine((plan, ctx) => {
    const seen = new Set<string>();
    plan.subQueries.forEach((sq, i) => {
      if (seen.has(sq.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['subQueries', i, 'id'],
          message: `duplicate sub-query id "${sq.id}"`,
        });
      }
      seen.add(sq.id);
    });
  });

/** Validate and freeze a plan. Throws PlannerContractViolation. */
export function validatePlan(input: unknown): ExecutionPlan {
  const result = executionPlanSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map((e) => ({
      path: e.path.join('.') || 'root',
      message: e.message,
    }));
    throw new PlannerContractViolation(
      `Execution plan rejected: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      issues,
    );
  }

  const subQueries: SubQuery[] = result.data.subQueries.map((sq) =>
    Object.freeze({
      id: sq.id,
      toolName: sq.toolName,
      params: Object.freeze({ ...sq.params }),
      priority: sq.priority,
      rationale: sq.rationale,
      ...(sq.candidateParam !== undefined && { candidateParam: sq.candidateParam }),
    }),
  );
  return Object.freeze({ subQueries: Object.freeze(subQueries), strategy: result.data.strategy });
}
