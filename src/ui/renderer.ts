import type { Directive } from '../directives/types';
import type { RenderedLine } from '../llm/line-renderer';

export type StatusView =
  | { phase: 'waiting' }
  | { phase: 'retrying'; attempt: number; maxAttempts: number }
  | { phase: 'thinking'; tail: string[] }
  | { phase: 'generating' };

export type NoticeLevel = 'info' | 'warning' | 'danger' | 'success';

/**
 * Everything the loop shows the user. Implementations only observe; nothing
 * they do may feed back into control flow.
 */
export interface Renderer {
  status(view: StatusView): void;
  clearStatus(): void;
  line(line: RenderedLine): void;
  notice(level: NoticeLevel, text: string): void;
  rule(title: string): void;
  directive(directive: Directive): void;
  scriptOutput(output: string): void;
}

export class SilentRenderer implements Renderer {
  status(_view: StatusView) {}
  clearStatus() {}
  line(_line: RenderedLine) {}
  notice(_level: NoticeLevel, _text: string) {}
  rule(_title: string) {}
  directive(_directive: Directive) {}
  scriptOutput(_output: string) {}
}
