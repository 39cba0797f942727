/**
 * External graph search service. `invoke` runs a search tool and returns matching entity ids;
 * `fetch` returns the raw text of one full record.
 * McpSearchBackend reaches both through an MCP client (`callTool`), text content only.
 */
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { isEntityId, parseLiteral } from '@/services/safe-parse-json';
import { logger } from '@/services/logger';
import type { EntityId, FetchResponse, SearchResponse, ToolParams } from '@/types/orchestration';

export interface SearchBackend {
  invoke(toolName: string, params: ToolParams): Promise<SearchResponse>;
  fetch(entityId: EntityId): Promise<FetchResponse>;
}

/** The slice of the MCP client this backend needs. */
export interface ToolCaller {
  callTool(params: { name: string; arguments?: Record<string, unknown> }): Promise<unknown>;
}

const callToolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
  isError: z.boolean().optional(),
});

export interface McpSearchBackendOptions {
  /** Record field holding the entity id in search results. */
  idField?: string;
  fetchToolName?: string;
  /** Argument name the fetch tool takes the id under. */
  fetchIdParam?: string;
}

/** Thrown when the tool returned something other than text content. */
export class McpResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'McpResponseError';
  }
}

function getTextFromToolResult(raw: unknown): { text: string; isError: boolean } {
  const result = callToolResultSchema.safeParse(raw);
  if (!result.success) throw new McpResponseError('MCP tool returned an invalid result');
  const first = result.data.content[0];
  if (!first || first.type !== 'text' || first.text === undefined) {
    throw new McpResponseError('MCP tool did not return text content');
  }
  return { text: first.text, isError: result.data.isError === true };
}

/** Entity ids from a search payload: a list of ids, or a list of records carrying `idField`. */
export function extractEntityIds(value: unknown, idField: string): EntityId[] | null {
  if (!Array.isArray(value)) return null;
  const ids: EntityId[] = [];
  for (const item of value) {
    if (isEntityId(item)) {
      ids.push(item);
    } else if (typeof item === 'object' && item !== null && idField in item) {
      const id: unknown = Reflect.get(item, idField);
      if (isEntityId(id)) ids.push(id);
    }
  }
  return ids;
}

export class McpSearchBackend implements SearchBackend {
  private readonly idField: string;
  private readonly fetchToolName: string;
  private readonly fetchIdParam: string;

  constructor(
    private readonly caller: ToolCaller,
    options: McpSearchBackendOptions = {},
  ) {
    this.idField = options.idField ?? 'person_id';
    this.fetchToolName = options.fetchToolName ?? 'get_person_complete_profile';
    this.fetchIdParam = options.fetchIdParam ?? 'person_id';
  }

  async invoke(toolName: string, params: ToolParams): Promise<SearchResponse> {
    const { text, isError } = getTextFromToolResult(
      await this.caller.callTool({ name: toolName, arguments: { ...params } }),
    );
    if (isError) return { success: false, entityIds: [], error: text };

    const parsed = parseLiteral(text);
    const ids = parsed ? extractEntityIds(parsed.value, this.idField) : null;
    if (ids === null) {
      logger.warn('mcp:unparseable_search_result', { toolName, raw: text.slice(0, 300) });
      return { success: false, entityIds: [], error: `Unparseable ${toolName} result` };
    }
    return { success: true, entityIds: ids };
  }

  async fetch(entityId: EntityId): Promise<FetchResponse> {
    const { text, isError } = getTextFromToolResult(
      await this.caller.callTool({ name: this.fetchToolName, arguments: { [this.fetchIdParam]: entityId } }),
    );
    if (isError) return { success: false, rawText: '', error: text };
    return { success: true, rawText: text };
  }
}

/** Connect an MCP client to a streamable HTTP server. */
export async function connectMcpClient(url: string): Promise<Client> {
  const transport = new StreamableHTTPClientTransport(new URL(url));
  const client = new Client({ name: 'people-search-engine', version: '1.0.0' });
  await client.connect(transport);
  logger.info('mcp:connected', { url });
  return client;
}
