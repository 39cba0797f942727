/**
 * Standard tool response contract. Every search and fetch call returns this envelope.
 * The facade uses ok / error.retryable for retry; no raw backend errors leak past it.
 */
import { z } from 'zod';
import type { EntityId } from '@/types/orchestration';

export interface ToolError {
  code: string;
  message: string;
  retryable: boolean;
}

/** Data payload: entity ids from a search tool, or the raw text of a full-record fetch. */
export type ToolData = { entityIds: EntityId[] } | { rawText: string };

export interface ToolEnvelope {
  ok: boolean;
  data?: ToolData;
  error?: ToolError;
}

const entityIdSchema = z.union([z.string(), z.number()]);

/** Validates envelopes read back from an external cache store. */
export const toolEnvelopeSchema: z.ZodType<ToolEnvelope> = z.object({
  ok: z.boolean(),
  data: z
    .union([z.object({ entityIds: z.array(entityIdSchema) }), z.object({ rawText: z.string() })])
    .optional(),
  error: z
    .object({ code: z.string(), message: z.string(), retryable: z.boolean() })
    .optional(),
});

export function envelopeOk(data: ToolData): ToolEnvelope {
  return { ok: true, data };
}

export function envelopeErr(
  code: string,
  message: string,
  retryable: boolean,
): ToolEnvelope {
  return {
    ok: false,
    error: { code, message, retryable },
  };
}

/** Normalize a thrown value into a retryable vs non-retryable error. */
export function toRetryable(err: unknown): boolean {
  if (err instanceof Error) {
    const n = err.name?.toLowerCase() ?? '';
    const m = err.message?.toLowerCase() ?? '';
    if (n === 'typeerror' || n === 'aggregateerror') return true;
    if (m.includes('timeout') || m.includes('econnrefused') || m.includes('network')) return true;
    if (m.includes('econnreset') || m.includes('etimedout')) return true;
  }
  return false;
}
