/**
 * Tool invocation facade: the single entry point for search and fetch calls.
 * Every call goes through the tiered cache; a retryable failure is retried with backoff
 * before it is returned. Only ok envelopes are cached.
 */
import type { TieredCacheManager } from '@/services/cache';
import { ToolInvocationError, errorMessage } from '@/stability/errors';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import type { EntityId, ToolParams } from '@/types/orchestration';
import { envelopeErr, envelopeOk, toRetryable, type ToolEnvelope } from './envelope';
import type { SearchBackend } from './search-backend';

export const FETCH_TOOL_NAME = 'get_person_complete_profile';

export interface FacadeOptions {
  /** Extra attempts after a retryable failure. */
  maxRetries?: number;
  retryInitialDelayMs?: number;
}

function isOk(envelope: ToolEnvelope): boolean {
  return envelope.ok;
}

export class ToolInvocationFacade {
  private readonly maxRetries: number;
  private readonly retryInitialDelayMs: number;

  constructor(
    private readonly backend: SearchBackend,
    private readonly cache: TieredCacheManager<ToolEnvelope>,
    options: FacadeOptions = {},
  ) {
    this.maxRetries = options.maxRetries ?? 1;
    this.retryInitialDelayMs = options.retryInitialDelayMs ?? 100;
  }

  /** call(name, params) → envelope with `{ entityIds }`. Never throws for backend failures. */
  async call(toolName: string, params: ToolParams): Promise<ToolEnvelope> {
    try {
      return await this.cache.getOrFetch(
        toolName,
        params,
        () =>
          this.withRetry(toolName, async () => {
            const res = await this.backend.invoke(toolName, params);
            return res.success
              ? envelopeOk({ entityIds: res.entityIds })
              : envelopeErr('TOOL_FAILED', res.error ?? `${toolName} failed`, false);
          }),
        { shouldCache: isOk },
      );
    } catch (err) {
      return envelopeErr('MALFORMED_PARAMS', errorMessage(err), false);
    }
  }

  /** Full-record fetch by id → envelope with `{ rawText }`. */
  async fetchRecord(entityId: EntityId): Promise<ToolEnvelope> {
    try {
      return await this.cache.getOrFetch(
        FETCH_TOOL_NAME,
        { person_id: entityId },
        () =>
          this.withRetry(FETCH_TOOL_NAME, async () => {
            const res = await this.backend.fetch(entityId);
            return res.success
              ? envelopeOk({ rawText: res.rawText })
              : envelopeErr('FETCH_FAILED', res.error ?? `fetch ${String(entityId)} failed`, false);
          }),
        { shouldCache: isOk },
      );
    } catch (err) {
      return envelopeErr('MALFORMED_PARAMS', errorMessage(err), false);
    }
  }

  /** Search and return entity ids, or throw ToolInvocationError. */
  async searchEntityIds(toolName: string, params: ToolParams): Promise<EntityId[]> {
    const envelope = await this.call(toolName, params);
    if (envelope.ok && envelope.data && 'entityIds' in envelope.data) return envelope.data.entityIds;
    throw toInvocationError(envelope, `${toolName} returned no entity ids`);
  }

  /** Fetch a record's raw text, or throw ToolInvocationError. */
  async fetchRawRecord(entityId: EntityId): Promise<string> {
    const envelope = await this.fetchRecord(entityId);
    if (envelope.ok && envelope.data && 'rawText' in envelope.data) return envelope.data.rawText;
    throw toInvocationError(envelope, `fetch ${String(entityId)} returned no record`);
  }

  /** Call once; on a retryable failure, retry with backoff up to maxRetries. */
  private async withRetry(label: string, attempt: () => Promise<ToolEnvelope>): Promise<ToolEnvelope> {
    const once = async (): Promise<ToolEnvelope> => {
      try {
        return await attempt();
      } catch (err) {
        return envelopeErr('TOOL_INVOCATION_FAILED', errorMessage(err), toRetryable(err));
      }
    };
    try {
      return await retryWithBackoff(
        async () => {
          const envelope = await once();
          if (!envelope.ok && envelope.error?.retryable) {
            throw new ToolInvocationError(envelope.error.message, envelope.error.code, true);
          }
          return envelope;
        },
        {
          maxRetries: this.maxRetries,
          initialDelay: this.retryInitialDelayMs,
          shouldRetry: (err) => err instanceof ToolInvocationError && err.retryable,
          label,
        },
      );
    } catch (err) {
      if (err instanceof ToolInvocationError) return envelopeErr(err.code, err.message, err.retryable);
      return envelopeErr('TOOL_INVOCATION_FAILED', errorMessage(err), false);
    }
  }
}

function toInvocationError(envelope: ToolEnvelope, fallback: string): ToolInvocationError {
  const err = envelope.error;
  return new ToolInvocationError(err?.message ?? fallback, err?.code ?? 'UNKNOWN', err?.retryable ?? false);
}
