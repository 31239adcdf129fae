import { AgentError, errorMessage, isUnsupportedParameterError } from '../core/errors';
import { DirectiveScanner } from '../directives/parser';
import { END_MARKER } from '../directives/types';
import { logger } from '../observability/logger';
import type { Renderer } from '../ui/renderer';
import { LineRenderer } from './line-renderer';
import type { ReasoningClient, StreamChunk, Turn } from './types';

export type StreamProcessorOptions = {
  model: string;
  /** Extended-thinking budget in tokens; undefined or 0 never sends the hint. */
  reasoningBudget?: number;
  maxAttempts?: number;
  timeoutMs?: number;
};

const THINKING_TAIL_LINES = 5;

/**
 * Answer and reasoning buffers for one attempt. `reasoningActive` reflects only
 * the latest non-empty fragment, so arbitrary interleaving is fine.
 */
export class StreamAccumulator {
  answer = '';
  reasoning = '';
  reasoningActive = false;

  push(chunk: StreamChunk) {
    if (chunk.reasoning) {
      this.reasoning += chunk.reasoning;
      this.reasoningActive = true;
    } else if (chunk.content) {
      this.reasoningActive = false;
    }
    if (chunk.content) this.answer += chunk.content;
  }

  isComplete(): boolean {
    return this.answer.includes(END_MARKER) && !this.reasoningActive;
  }

  thinkingTail(): string[] {
    return this.reasoning
      .split('\n')
      .filter((l) => l.trim().length > 0)
      .slice(-THINKING_TAIL_LINES);
  }
}

export class StreamProcessor {
  private client: ReasoningClient;
  private renderer: Renderer;
  private model: string;
  private reasoningBudget: number | undefined;
  private maxAttempts: number;
  private timeoutMs: number;

  constructor(client: ReasoningClient, renderer: Renderer, opts: StreamProcessorOptions) {
    this.client = client;
    this.renderer = renderer;
    this.model = opts.model;
    this.reasoningBudget = opts.reasoningBudget ? opts.reasoningBudget : undefined;
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
    this.timeoutMs = opts.timeoutMs ?? 60_000;
  }

  /** False once the endpoint has rejected the reasoning-budget hint. */
  get reasoningBudgetEnabled(): boolean {
    return this.reasoningBudget !== undefined;
  }

  /**
   * Streams one completion for `history` and returns the assembled answer,
   * `[end]` included. Throws `AgentError('exhausted')` after `maxAttempts`
   * failed attempts; a failed attempt's partial text is never returned.
   */
  async complete(history: readonly Turn[]): Promise<string> {
    let lastError: unknown;
    try {
      for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
        this.renderer.status(
          attempt === 0 ? { phase: 'waiting' } : { phase: 'retrying', attempt: attempt + 1, maxAttempts: this.maxAttempts }
        );
        try {
          return await this.attempt(history);
        } catch (err) {
          lastError = err;
          logger.warn('llm attempt failed', {
            attempt: attempt + 1,
            max_attempts: this.maxAttempts,
            error: errorMessage(err)
          });
        }
      }
    } finally {
      this.renderer.clearStatus();
    }
    throw new AgentError('exhausted', `API Error after ${this.maxAttempts} attempts: ${errorMessage(lastError)}`, {
      cause: lastError
    });
  }

  private async attempt(history: readonly Turn[]): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const acc = new StreamAccumulator();
    const lines = new LineRenderer();
    const scanner = new DirectiveScanner();

    try {
      const stream = await this.open(history, controller.signal);
      for await (const chunk of stream) {
        if (controller.signal.aborted) break;
        acc.push(chunk);

        for (const line of lines.push(acc.answer)) this.renderer.line(line);
        for (const d of scanner.feed(acc.answer)) logger.debug('directive streamed', d);

        this.renderer.status(
          acc.reasoningActive ? { phase: 'thinking', tail: acc.thinkingTail() } : { phase: 'generating' }
        );
        if (acc.isComplete()) break;
      }
      if (controller.signal.aborted) {
        throw new AgentError('timeout', `no complete answer within ${this.timeoutMs}ms`, { retryable: true });
      }
    } catch (err) {
      if (controller.signal.aborted && !(err instanceof AgentError)) {
        throw new AgentError('timeout', `no complete answer within ${this.timeoutMs}ms`, { retryable: true, cause: err });
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }

    for (const line of lines.flush(acc.answer)) this.renderer.line(line);
    logger.info('llm answer', { chars: acc.answer.length, reasoning_chars: acc.reasoning.length });
    return acc.answer;
  }

  private async open(history: readonly Turn[], signal: AbortSignal): Promise<AsyncIterable<StreamChunk>> {
    const budget = this.reasoningBudget;
    try {
      return await this.client.streamChat(history, { model: this.model, reasoningBudget: budget, signal });
    } catch (err) {
      if (budget === undefined || !isUnsupportedParameterError(err)) throw err;
      // disabled for the rest of the process, then the same attempt goes again once
      this.reasoningBudget = undefined;
      logger.warn('reasoning budget rejected, disabling', { error: errorMessage(err) });
      return this.client.streamChat(history, { model: this.model, signal });
    }
  }
}
