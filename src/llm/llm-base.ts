import OpenAI, { APIError } from 'openai';
import type { ChatCompletionChunk, ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { AgentError, errorMessage } from '../core/errors';
import { logger } from '../observability/logger';
import type { ReasoningClient, StreamChatOptions, StreamChunk, Turn } from './types';

type LLMClientOptions = {
  apiKey?: string;
  baseUrl?: string;
};

// Providers disagree on where the reasoning side channel lives in a delta.
const REASONING_KEYS = ['reasoning_content', 'reasoning_text', 'reasoning'] as const;

function toMessage(turn: Turn): ChatCompletionMessageParam {
  switch (turn.role) {
    case 'system':
      return { role: 'system', content: turn.content };
    case 'user':
      return { role: 'user', content: turn.content };
    case 'assistant':
      return { role: 'assistant', content: turn.content };
  }
}

function readReasoning(delta: object): string | undefined {
  for (const key of REASONING_KEYS) {
    const value: unknown = Reflect.get(delta, key);
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}

export function classifyRequestError(err: unknown): AgentError {
  const message = errorMessage(err);
  const status = err instanceof APIError ? err.status : undefined;
  if (status === 400 || /thinking|parameter/i.test(message)) {
    return new AgentError('unsupported_parameter', message, { retryable: true, cause: err });
  }
  return new AgentError('transport', message, { retryable: true, cause: err });
}

export async function* toStreamChunks(stream: AsyncIterable<ChatCompletionChunk>): AsyncGenerator<StreamChunk> {
  for await (const chunk of stream) {
    const delta = chunk.choices?.[0]?.delta;
    if (!delta) continue;
    const content = typeof delta.content === 'string' && delta.content.length > 0 ? delta.content : undefined;
    const reasoning = readReasoning(delta);
    if (content === undefined && reasoning === undefined) continue;
    yield { content, reasoning };
  }
}

export class LLMClient implements ReasoningClient {
  private client: OpenAI;

  constructor(opts: LLMClientOptions) {
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseUrl,
      // retries are owned by the stream processor
      maxRetries: 0
    });
  }

  async streamChat(history: readonly Turn[], opts: StreamChatOptions): Promise<AsyncIterable<StreamChunk>> {
    const params = {
      model: opts.model,
      messages: history.map(toMessage),
      stream: true as const
    };
    const body =
      opts.reasoningBudget !== undefined
        ? { ...params, thinking: { type: 'enabled', budget_tokens: opts.reasoningBudget } }
        : params;

    logger.info('llm request', {
      model: opts.model,
      turns: history.length,
      reasoning_budget: opts.reasoningBudget ?? null
    });

    try {
      const stream = await this.client.chat.completions.create(body, { signal: opts.signal });
      return toStreamChunks(stream);
    } catch (err) {
      throw classifyRequestError(err);
    }
  }
}
