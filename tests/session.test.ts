import test from 'node:test';
import assert from 'node:assert/strict';
import { isAgentError } from '../src/core/errors';
import { State } from '../src/core/fsm';
import { Session, isExitToken } from '../src/core/session';
import { StreamProcessor } from '../src/llm/stream-processor';
import { ScriptExecutor } from '../src/sandbox/script-executor';
import { ActionDispatcher } from '../src/tools/executor';
import {
  FakeChannel,
  FakeReasoningClient,
  RecordingRenderer,
  ScriptedInput,
  answer,
  failing,
  type StreamPlan
} from './helpers/fakes';

function harness(plans: StreamPlan[], replies: Record<string, string | Error>, inputs: string[]) {
  const client = new FakeReasoningClient(plans);
  const renderer = new RecordingRenderer();
  const channel = new FakeChannel(replies);
  const input = new ScriptedInput(inputs);
  const processor = new StreamProcessor(client, renderer, { model: 'test-model', maxAttempts: 3, timeoutMs: 1000 });
  const dispatcher = new ActionDispatcher({ channel, scripts: new ScriptExecutor({ timeoutMs: 1000 }), renderer });
  const session = new Session({ processor, dispatcher, input, renderer, systemPrompt: 'sys' });
  return { client, renderer, channel, input, session };
}

test('command results go back to the model without asking the user', async () => {
  const h = harness(
    [answer('Listing functions. [[afl]] [end]'), answer('Only main. [end]')],
    { afl: '0x1000 main' },
    ['exit']
  );

  const outcome = await h.session.run('/tmp/a.out', 'find main');

  assert.deepEqual(outcome, { reason: 'user_exit', turns: 5 });
  assert.deepEqual(h.channel.sent, ['afl']);
  assert.equal(h.session.ctx.history[1].content, 'Target: /tmp/a.out\nRequest: find main');
  assert.deepEqual(h.session.ctx.history[3], {
    role: 'user',
    content: 'Execution Results:\nR2 Command: [[afl]]\nOutput:\n0x1000 main'
  });
  assert.equal(h.client.histories[1].length, 4);
  assert.equal(h.input.prompts, 1);
  assert.deepEqual(h.renderer.notices, ['Agent paused. Waiting for input...', 'Exiting r2-pilot.']);
  assert.equal(h.session.state, State.ENDED);
});

test('script output is reported with the script source', async () => {
  const h = harness([answer('<js>\nprint("hi")\n</js>\n[end]'), answer('Done. [end]')], {}, ['exit']);

  await h.session.run('/tmp/a.out', 'say hi');

  assert.equal(h.session.ctx.history[3].content, 'Execution Results:\nScript Execution: print("hi")\nOutput:\nhi\n');
});

test('an answer without directives hands the turn to the user', async () => {
  const h = harness([answer('Which function? [[ask]] [end]'), answer('Looking at main. [end]')], {}, [
    'main please'
  ]);

  const outcome = await h.session.run('/tmp/a.out', 'look around');

  assert.equal(h.input.prompts, 2);
  assert.deepEqual(h.client.histories[1][3], { role: 'user', content: 'main please' });
  assert.deepEqual(h.renderer.notices, ['Agent paused. Waiting for input...', 'Exiting r2-pilot.']);
  assert.equal(outcome.turns, 5);
});

test('an exit token ends the session without appending a turn', async () => {
  const h = harness([answer('Hello. [end]')], {}, ['  Quit ']);

  const outcome = await h.session.run('/tmp/a.out', 'hi');

  assert.equal(outcome.turns, 3);
  assert.equal(h.client.calls.length, 1);
  assert.equal(h.session.ctx.last().role, 'assistant');
});

test('ask after directives runs them first, then waits for the user', async () => {
  const h = harness([answer('[[iI]] Should I go deeper? [[ask]] [end]')], { iI: 'arch x86' }, ['exit']);

  const outcome = await h.session.run('/tmp/a.out', 'info');

  assert.deepEqual(h.channel.sent, ['iI']);
  assert.equal(h.input.prompts, 1);
  assert.equal(outcome.turns, 4);
  assert.equal(h.session.ctx.last().content, 'Execution Results:\nR2 Command: [[iI]]\nOutput:\narch x86');
  assert.deepEqual(h.renderer.notices, ['Exiting r2-pilot.']);
});

test('a failing command is reported as text and the loop continues', async () => {
  const h = harness([answer('[[pdf @ nope]] [end]'), answer('That failed. [end]')], {
    'pdf @ nope': new Error('invalid address')
  }, ['exit']);

  await h.session.run('/tmp/a.out', 'disassemble');

  assert.equal(
    h.session.ctx.history[3].content,
    "Execution Results:\nR2 Command: [[pdf @ nope]]\nOutput:\nR2 Error executing 'pdf @ nope': invalid address"
  );
});

test('a stray opener in the answer does not hide later directives', async () => {
  const h = harness([answer('Scripts go in a <js> block. First [[afl]] [end]'), answer('Done. [end]')], {
    afl: '0x1000 main'
  }, ['exit']);

  await h.session.run('/tmp/a.out', 'list');

  assert.deepEqual(h.channel.sent, ['afl']);
});

test('exhausted retries propagate and leave the session ended', async () => {
  const boom = new Error('connection refused');
  const h = harness([failing(boom), failing(boom), failing(boom)], {}, []);

  await assert.rejects(h.session.run('/tmp/a.out', 'hi'), (err: unknown) => isAgentError(err, 'exhausted'));
  assert.equal(h.session.state, State.ENDED);
  assert.equal(h.input.prompts, 0);
  assert.equal(h.session.ctx.length, 2);
});

test('exit tokens are matched case-insensitively after trimming', () => {
  assert.equal(isExitToken('exit'), true);
  assert.equal(isExitToken(' Q '), true);
  assert.equal(isExitToken('quit now'), false);
  assert.equal(isExitToken(''), false);
});
