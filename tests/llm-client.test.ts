import test from 'node:test';
import assert from 'node:assert/strict';
import type { ChatCompletionChunk } from 'openai/resources/chat/completions';
import { classifyRequestError, toStreamChunks } from '../src/llm/llm-base';
import type { StreamChunk } from '../src/llm/types';

function chunk(delta: ChatCompletionChunk.Choice.Delta): ChatCompletionChunk {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion.chunk',
    created: 0,
    model: 'test-model',
    choices: [{ index: 0, delta, finish_reason: null }]
  };
}

async function* source(items: ChatCompletionChunk[]): AsyncGenerator<ChatCompletionChunk> {
  for (const item of items) yield item;
}

async function collect(items: ChatCompletionChunk[]): Promise<StreamChunk[]> {
  const out: StreamChunk[] = [];
  for await (const c of toStreamChunks(source(items))) out.push(c);
  return out;
}

test('stream chunks carry answer text and every known reasoning field', async () => {
  const withContent = { content: 'Hello' };
  const withReasoningContent = { content: null, reasoning_content: 'step 1' };
  const withReasoningText = { content: null, reasoning_text: 'step 2' };
  const withReasoning = { content: null, reasoning: 'step 3' };
  const empty = { content: '' };

  const out = await collect([
    chunk(withContent),
    chunk(withReasoningContent),
    chunk(withReasoningText),
    chunk(withReasoning),
    chunk(empty)
  ]);
  assert.deepEqual(out, [
    { content: 'Hello', reasoning: undefined },
    { content: undefined, reasoning: 'step 1' },
    { content: undefined, reasoning: 'step 2' },
    { content: undefined, reasoning: 'step 3' }
  ]);
});

test('chunks without choices are skipped', async () => {
  const noChoices: ChatCompletionChunk = { ...chunk({}), choices: [] };
  assert.deepEqual(await collect([noChoices, chunk({ content: 'x' })]), [{ content: 'x', reasoning: undefined }]);
});

test('request errors mentioning an unknown parameter are classified as unsupported', () => {
  const err = classifyRequestError(new Error('Unrecognized request argument supplied: thinking'));
  assert.equal(err.kind, 'unsupported_parameter');
  assert.equal(err.retryable, true);

  assert.equal(classifyRequestError(new Error('Invalid parameter: budget_tokens')).kind, 'unsupported_parameter');
});

test('other request errors are retryable transport failures', () => {
  const cause = new Error('connect ECONNREFUSED 127.0.0.1:443');
  const err = classifyRequestError(cause);
  assert.equal(err.kind, 'transport');
  assert.equal(err.retryable, true);
  assert.equal(err.message, 'connect ECONNREFUSED 127.0.0.1:443');
  assert.equal(err.cause, cause);
});
