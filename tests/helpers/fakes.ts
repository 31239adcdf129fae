import type { CommandChannel } from '../../src/channel/types';
import type { HumanInput } from '../../src/core/session';
import type { Directive } from '../../src/directives/types';
import type { RenderedLine } from '../../src/llm/line-renderer';
import type { ReasoningClient, StreamChatOptions, StreamChunk, Turn } from '../../src/llm/types';
import { SilentRenderer, type NoticeLevel, type StatusView } from '../../src/ui/renderer';

export type StreamPlan = (opts: StreamChatOptions) => AsyncIterable<StreamChunk>;

export async function* chunks(list: StreamChunk[], pulled?: { count: number }): AsyncGenerator<StreamChunk> {
  for (const c of list) {
    if (pulled) pulled.count += 1;
    yield c;
  }
}

export function answer(text: string): StreamPlan {
  return () => chunks([{ content: text }]);
}

/** Yields one fragment, then never finishes unless the request is aborted. */
export async function* hanging(signal?: AbortSignal): AsyncGenerator<StreamChunk> {
  yield { content: 'partial ' };
  await new Promise<void>((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('Request was aborted.')), { once: true });
  });
}

export function failing(err: Error): StreamPlan {
  return () => {
    throw err;
  };
}

export class FakeReasoningClient implements ReasoningClient {
  calls: StreamChatOptions[] = [];
  histories: Turn[][] = [];
  private plans: StreamPlan[];

  constructor(plans: StreamPlan[]) {
    this.plans = [...plans];
  }

  async streamChat(history: readonly Turn[], opts: StreamChatOptions): Promise<AsyncIterable<StreamChunk>> {
    this.calls.push(opts);
    this.histories.push(history.map((t) => ({ ...t })));
    const plan = this.plans.shift();
    if (!plan) throw new Error('no scripted response left');
    return plan(opts);
  }
}

export class FakeChannel implements CommandChannel {
  sent: string[] = [];
  closed = false;
  private replies: Map<string, string | Error>;

  constructor(replies: Record<string, string | Error> = {}) {
    this.replies = new Map(Object.entries(replies));
  }

  async send(command: string): Promise<string> {
    this.sent.push(command);
    const reply = this.replies.get(command);
    if (reply instanceof Error) throw reply;
    return reply ?? '';
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class ScriptedInput implements HumanInput {
  prompts = 0;
  private replies: string[];

  constructor(replies: string[]) {
    this.replies = [...replies];
  }

  async ask(_label: string): Promise<string> {
    this.prompts += 1;
    return this.replies.shift() ?? 'exit';
  }
}

export class RecordingRenderer extends SilentRenderer {
  statuses: StatusView[] = [];
  lines: RenderedLine[] = [];
  directives: Directive[] = [];
  notices: string[] = [];

  override status(view: StatusView) {
    this.statuses.push(view);
  }

  override line(line: RenderedLine) {
    this.lines.push(line);
  }

  override directive(directive: Directive) {
    this.directives.push(directive);
  }

  override notice(_level: NoticeLevel, text: string) {
    this.notices.push(text);
  }
}
