import type { CommandChannel } from '../channel/types';
import { errorMessage } from '../core/errors';
import type { ScriptExecutor } from '../sandbox/script-executor';
import type { DirectiveOutcome } from './registry';

export const NO_COMMAND_OUTPUT = '(No Output)';

export function createBuiltins(channel: CommandChannel, scripts: ScriptExecutor) {
  return {
    async command(text: string): Promise<DirectiveOutcome> {
      const cmd = text.trim();
      try {
        const output = await channel.send(cmd);
        return { ok: true, output: output ? output : NO_COMMAND_OUTPUT };
      } catch (err) {
        return { ok: false, output: `R2 Error executing '${cmd}': ${errorMessage(err)}` };
      }
    },
    async script(text: string): Promise<DirectiveOutcome> {
      return scripts.run(text, { channel });
    }
  };
}
