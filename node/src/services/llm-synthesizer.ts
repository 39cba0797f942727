/**
 * LLM-backed narrative synthesis: profiles → recruiter-style plain-text answer.
 */
import type { Profile } from '@/types/orchestration';
import type { NarrativeSynthesizer } from '@/types/oracles';
import type { LlmClient } from './llm-client';
import { NON_LITERAL_PLACEHOLDER } from './safe-parse-json';

const MAX_LIST_ITEMS = 8;

function describe(value: unknown): string | undefined {
  if (value === null || value === undefined || value === NON_LITERAL_PLACEHOLDER) return undefined;
  if (typeof value === 'number' && Number.isNaN(value)) return undefined;
  if (Array.isArray(value)) {
    const items = value.map(describe).filter((v): v is string => v !== undefined);
    return items.length > 0 ? items.slice(0, MAX_LIST_ITEMS).join(', ') : undefined;
  }
  if (typeof value === 'object') return JSON.stringify(value);
  const text = String(value).trim();
  return text.length > 0 ? text : undefined;
}

/** One block per profile, `key: value` lines, placeholders and empty fields left out. */
export function formatProfileSummary(profile: Profile, index: number): string {
  const lines = [`Candidate ${index + 1} (id ${String(profile.entityId)})`];
  for (const [key, value] of Object.entries(profile.fields)) {
    const text = describe(value);
    if (text !== undefined) lines.push(`${key}: ${text}`);
  }
  return lines.join('\n');
}

export class LlmNarrativeSynthesizer implements NarrativeSynthesizer {
  constructor(private readonly llm: LlmClient) {}

  async synthesize(profiles: readonly Profile[], queryText: string, totalMatches: number): Promise<string> {
    const summaries = profiles.map(formatProfileSummary).join('\n\n');
    const text = await this.llm.complete({
      maxTokens: 2048,
      system: `You are a professional recruiter presenting candidate profiles to a hiring manager.
Start with a brief summary of the search results, then present EVERY candidate given, in order:

#### N. [Candidate Name]
Current Role: [Title] at [Company]
Location: [Location]
Key Skills: [comma-separated]
Relevant Experience:
  - [highlight]
Contact Information:
  - LinkedIn: [URL]
  - Email: [if available]
Why a Good Match: [brief explanation]

Plain text only: no bold, no italics. Do not invent data that is not in the profiles.`,
      user: `Original search query: "${queryText}"
Total matches found: ${totalMatches}
Top profiles shown: ${profiles.length}

Candidate profiles:
${summaries}`,
    });
    return text.trim();
  }
}
