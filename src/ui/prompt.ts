import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import chalk from 'chalk';
import { AsyncQueue } from '../core/async_queue';
import type { HumanInput } from '../core/session';

/**
 * Line prompt on the terminal. One readline interface serves the whole session;
 * lines that arrive between prompts are queued, not dropped. Once input closes
 * (Ctrl-D, end of a pipe) every remaining prompt answers `exit`.
 */
export class TerminalInput implements HumanInput {
  private rl: Interface;
  private lines = new AsyncQueue<string>();
  private closed = false;

  constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
    this.rl = createInterface({ input, output });
    this.rl.pause();
    this.rl.on('line', (line) => {
      this.lines.push(line);
      // input is read only while a prompt is open
      this.rl.pause();
    });
    this.rl.once('close', () => {
      this.closed = true;
      this.lines.fail(new Error('input closed'));
    });
  }

  async ask(label: string): Promise<string> {
    if (!this.closed) {
      this.rl.setPrompt(chalk.bold.green(`${label}: `));
      this.rl.prompt();
    }
    try {
      return await this.lines.next();
    } catch (err) {
      if (this.closed) return 'exit';
      throw err;
    }
  }

  close() {
    this.rl.close();
  }
}
