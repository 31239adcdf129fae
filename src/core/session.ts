import { parseDirectives } from '../directives/parser';
import type { StreamProcessor } from '../llm/stream-processor';
import { logger } from '../observability/logger';
import { SYSTEM_PROMPT, initialRequest } from '../prompts/system-prompt';
import type { ActionDispatcher } from '../tools/executor';
import type { Renderer } from '../ui/renderer';
import { ConversationContext } from './context';
import { FSM, State } from './fsm';

export interface HumanInput {
  /** Blocks until the user submits a line. */
  ask(label: string): Promise<string>;
}

export type SessionOutcome = {
  reason: 'user_exit';
  turns: number;
};

type SessionDeps = {
  processor: StreamProcessor;
  dispatcher: ActionDispatcher;
  input: HumanInput;
  renderer: Renderer;
  systemPrompt?: string;
};

const EXIT_TOKENS = new Set(['exit', 'quit', 'q']);

export function isExitToken(input: string): boolean {
  return EXIT_TOKENS.has(input.trim().toLowerCase());
}

export class Session {
  readonly ctx: ConversationContext;
  private fsm = new FSM();
  private processor: StreamProcessor;
  private dispatcher: ActionDispatcher;
  private input: HumanInput;
  private renderer: Renderer;

  constructor(deps: SessionDeps) {
    this.processor = deps.processor;
    this.dispatcher = deps.dispatcher;
    this.input = deps.input;
    this.renderer = deps.renderer;
    this.ctx = new ConversationContext(deps.systemPrompt ?? SYSTEM_PROMPT);
  }

  get state(): State {
    return this.fsm.state;
  }

  /**
   * Drives turns until the user types an exit token. A fatal transport failure
   * propagates to the caller with the session already marked ENDED.
   */
  async run(target: string, instruction: string): Promise<SessionOutcome> {
    this.ctx.append('user', initialRequest(target, instruction));
    this.renderer.rule('r2-pilot session started');
    logger.info('session start', { target });

    try {
      while (true) {
        this.fsm.state = State.AWAITING_MODEL;
        const answer = await this.processor.complete(this.ctx.history);
        this.ctx.append('assistant', answer);

        const { directives, ask } = parseDirectives(answer, 0, 'final');
        logger.info('turn parsed', { turn: this.ctx.turnId, directives: directives.length, ask });

        if (directives.length > 0) {
          this.fsm.state = State.DISPATCHING;
          const results = await this.dispatcher.dispatch(directives);
          this.ctx.append('user', `Execution Results:\n${this.dispatcher.report(results)}`);
          if (!ask) continue;
        } else if (!ask) {
          // nothing actionable came back; hand the turn to the human
          this.renderer.notice('warning', 'Agent paused. Waiting for input...');
        }

        const reply = await this.awaitUser();
        if (reply === null) {
          this.renderer.notice('info', 'Exiting r2-pilot.');
          logger.info('session end', { reason: 'user_exit', turns: this.ctx.length });
          return { reason: 'user_exit', turns: this.ctx.length };
        }
        this.ctx.append('user', reply);
      }
    } finally {
      this.fsm.state = State.ENDED;
    }
  }

  private async awaitUser(): Promise<string | null> {
    this.fsm.state = State.AWAITING_USER;
    const reply = await this.input.ask('User Input');
    return isExitToken(reply) ? null : reply;
  }
}
