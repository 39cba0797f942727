// node/src/services/llm-client.ts — low-level chat client behind the planner and synthesizer oracles

import OpenAI from 'openai';

export interface LlmRequest {
  system: string;
  user: string;
  /** Ask the model for a JSON object. */
  json?: boolean;
  maxTokens?: number;
  temperature?: number;
}

export interface LlmClient {
  complete(request: LlmRequest): Promise<string>;
}

export class OpenAiLlmClient implements LlmClient {
  private readonly client: OpenAI;

  constructor(
    apiKey: string | undefined,
    private readonly model: string = 'gpt-4o',
  ) {
    if (!apiKey) {
      throw new Error(
        'Missing OPENAI_API_KEY. Set it in .env or pass it when starting the engine.',
      );
    }
    this.client = new OpenAI({ apiKey });
  }

  async complete(request: LlmRequest): Promise<string> {
    const res = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.user },
      ],
      temperature: request.temperature ?? (request.json ? 0 : 0.5),
      max_tokens: request.maxTokens ?? 1024,
      ...(request.json && { response_format: { type: 'json_object' as const } }),
    });
    return res.choices[0]?.message?.content ?? '';
  }
}
