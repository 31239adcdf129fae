import type { CommandChannel } from '../channel/types';
import { errorMessage } from '../core/errors';
import type { Directive } from '../directives/types';
import { logger } from '../observability/logger';
import type { ScriptExecutor } from '../sandbox/script-executor';
import type { Renderer } from '../ui/renderer';
import { createBuiltins } from './builtins';
import { ToolRegistry } from './registry';

export type ExecutionResult = {
  directive: Directive;
  output: string;
  succeeded: boolean;
};

type ActionDispatcherOpts = {
  channel: CommandChannel;
  scripts: ScriptExecutor;
  renderer: Renderer;
  maxResultChars?: number;
};

export const DEFAULT_MAX_RESULT_CHARS = 30_000;
export const TRUNCATION_MARKER = '\n... [Output Truncated] ...';

export function formatResult(result: ExecutionResult): string {
  const { directive, output } = result;
  const label = directive.kind === 'command' ? `R2 Command: [[${directive.text}]]` : `Script Execution: ${directive.text}`;
  return `${label}\nOutput:\n${output}`;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Joins the per-directive blocks; past `maxChars` the text is cut and marked. */
export function buildReport(results: readonly ExecutionResult[], maxChars = DEFAULT_MAX_RESULT_CHARS): string {
  const text = results.map(formatResult).join('\n');
  if (text.length <= maxChars) return text;
  let cut = maxChars;
  // never keep half of a surrogate pair
  if (isHighSurrogate(text.charCodeAt(cut - 1))) cut -= 1;
  return text.slice(0, cut) + TRUNCATION_MARKER;
}

export class ActionDispatcher {
  registry: ToolRegistry;
  private renderer: Renderer;
  private maxResultChars: number;

  constructor(opts: ActionDispatcherOpts) {
    this.renderer = opts.renderer;
    this.maxResultChars = opts.maxResultChars ?? DEFAULT_MAX_RESULT_CHARS;
    const builtins = createBuiltins(opts.channel, opts.scripts);
    this.registry = new ToolRegistry();
    this.registry.register('command', builtins.command);
    this.registry.register('script', builtins.script);
  }

  /**
   * Runs directives one after another in source order. A later directive may
   * depend on analysis state an earlier one changed, so nothing runs in parallel.
   * Failures come back as result text, never as exceptions.
   */
  async dispatch(directives: readonly Directive[]): Promise<ExecutionResult[]> {
    const results: ExecutionResult[] = [];
    for (const directive of directives) {
      this.renderer.directive(directive);
      const result = await this.execute(directive);
      if (directive.kind === 'script') this.renderer.scriptOutput(result.output);
      logger.info('directive done', {
        kind: directive.kind,
        ok: result.succeeded,
        output_chars: result.output.length
      });
      results.push(result);
    }
    return results;
  }

  report(results: readonly ExecutionResult[]): string {
    return buildReport(results, this.maxResultChars);
  }

  private async execute(directive: Directive): Promise<ExecutionResult> {
    const handler = this.registry.get(directive.kind);
    if (!handler) {
      return { directive, output: `No handler for ${directive.kind} directives`, succeeded: false };
    }
    try {
      const { ok, output } = await handler(directive.text);
      return { directive, output, succeeded: ok };
    } catch (err) {
      logger.error('directive handler threw', { kind: directive.kind, error: errorMessage(err) });
      return { directive, output: `${directive.kind} directive failed: ${errorMessage(err)}`, succeeded: false };
    }
  }
}
