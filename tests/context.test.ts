import test from 'node:test';
import assert from 'node:assert/strict';
import { ConversationContext } from '../src/core/context';
import { initialRequest } from '../src/prompts/system-prompt';

test('context starts with the system turn and appends in order', () => {
  const ctx = new ConversationContext('sys');
  ctx.append('user', 'hello');
  ctx.append('assistant', 'hi [end]');
  assert.deepEqual(ctx.history, [
    { role: 'system', content: 'sys' },
    { role: 'user', content: 'hello' },
    { role: 'assistant', content: 'hi [end]' }
  ]);
  assert.equal(ctx.turnId, 1);
  assert.deepEqual(ctx.last(), { role: 'assistant', content: 'hi [end]' });
});

test('initial request names the target and the instruction', () => {
  assert.equal(initialRequest('/tmp/a.out', 'find main'), 'Target: /tmp/a.out\nRequest: find main');
});
