/**
 * LLM-backed planner: question → filters → ExecutionPlan.
 * The model controls WHICH tools run and in what priority; it never retrieves data.
 * Its plan is validated at the plan boundary like any other planner output.
 */
import { z } from 'zod';
import type { ExecutionPlan } from '@/types/orchestration';
import type { QueryFilters, SemanticPlanner } from '@/types/oracles';
import type { LlmClient } from './llm-client';
import { logger } from './logger';
import { validatePlan } from './plan-validator';
import { parseLiteral } from './safe-parse-json';

/** Tools offered to the planner, with the argument keys each takes. */
export const PLANNER_TOOLS: Record<string, string> = {
  find_person_by_name: '{ "name": string }',
  find_people_by_skill: '{ "skill": string }',
  find_people_by_company: '{ "company_name": string }',
  find_people_by_location: '{ "location": string }',
  find_people_by_institution: '{ "institution_name": string }',
  find_people_by_experience_level: '{ "min_years": number, "max_years"?: number }',
  find_people_with_multiple_skills: '{ "skills": string[] }',
  find_colleagues_at_company: '{ "person_name": string, "company_name": string }',
  search_job_descriptions_by_keywords: '{ "keywords": string[] }',
  find_domain_experts: '{ "domain": string }',
  natural_language_search: '{ "question": string }',
};

const filtersSchema = z.record(z.unknown());

function parseJsonObject(raw: string, context: string): unknown {
  const parsed = parseLiteral(raw);
  if (!parsed) {
    logger.warn('planner:parse_error', { context, raw: raw.slice(0, 300) });
    return {};
  }
  return parsed.value;
}

export class LlmSemanticPlanner implements SemanticPlanner {
  constructor(private readonly llm: LlmClient) {}

  async decompose(queryText: string): Promise<QueryFilters> {
    const raw = await this.llm.complete({
      json: true,
      system: `You extract people-search criteria from a question.
Return ONLY a JSON object. Use these keys when they apply and omit the rest:
"names", "skills", "companies", "locations", "institutions", "job_titles", "keywords" (string arrays),
"min_years_experience", "max_years_experience" (numbers).
Do not invent criteria the question does not state.`,
      user: `Question: ${queryText}`,
    });
    const result = filtersSchema.safeParse(parseJsonObject(raw, 'decompose'));
    const filters = result.success ? result.data : {};
    logger.info('planner:filters', { keys: Object.keys(filters) });
    return filters;
  }

  async generate(filters: QueryFilters, queryText: string): Promise<ExecutionPlan> {
    const catalog = Object.entries(PLANNER_TOOLS)
      .map(([name, args]) => `- ${name}: ${args}`)
      .join('\n');
    const raw = await this.llm.complete({
      json: true,
      system: `You are a search planner acting as a CONTROLLER, not a retriever.
Decide WHICH search tools to call, with WHICH params, and at WHICH priority.

ALLOWED TOOLS:
${catalog}

OUTPUT SCHEMA (STRICT):
{"strategy":"UNION"|"INTERSECT"|"SEQUENTIAL","subQueries":[{"id":"sq1","toolName":"<tool>","params":{...},"priority":1,"rationale":"<why>","candidateParam"?:"<param name>"}]}

RULES:
1. One sub-query per criterion. Sub-queries with the same priority run in parallel; lower priority runs first.
2. INTERSECT when every criterion must hold ("Kotlin developers in Berlin"); UNION for alternatives ("Go or Rust").
3. SEQUENTIAL only when a later search must be narrowed to earlier results; set "candidateParam" on the later sub-query to the param that takes the id list.
4. Use only allowed tools. Do not include text outside the JSON.`,
      user: `Question: ${queryText}\nExtracted filters: ${JSON.stringify(filters)}`,
    });
    const plan = validatePlan(parseJsonObject(raw, 'generate'));
    logger.info('planner:plan', {
      strategy: plan.strategy,
      subQueries: plan.subQueries.map((sq) => ({ id: sq.id, tool: sq.toolName, priority: sq.priority })),
    });
    return plan;
  }
}
