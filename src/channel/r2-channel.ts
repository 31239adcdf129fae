import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import { AsyncQueue } from '../core/async_queue';
import { AgentError } from '../core/errors';
import { logger } from '../observability/logger';
import type { CommandChannel } from './types';

/** The three things the channel needs from a running radare2. */
export type R2Pipe = {
  input: Writable;
  output: Readable;
  onExit(listener: (reason: string) => void): void;
};

export type R2OpenOptions = {
  r2Path?: string;
};

// r2 -0 terminates the load banner and every command's output with a NUL byte
const FRAME_END = '\0';

function pipeFromChild(child: ChildProcessWithoutNullStreams): R2Pipe {
  child.stderr.setEncoding('utf8');
  child.stderr.on('data', (data: string) => {
    const text = data.trim();
    if (text) logger.debug('r2 stderr', text);
  });
  // a dead r2 surfaces through the exit listener; EPIPE here must not crash the process
  child.stdin.on('error', (err) => logger.warn('r2 stdin error', { error: err.message }));
  return {
    input: child.stdin,
    output: child.stdout,
    onExit(listener) {
      child.once('error', (err) => listener(`failed to run r2: ${err.message}`));
      child.once('exit', (code, signal) => listener(`r2 exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`));
    }
  };
}

export class R2Channel implements CommandChannel {
  private pipe: R2Pipe;
  private frames = new AsyncQueue<string>();
  private partial = '';
  private closed = false;

  constructor(pipe: R2Pipe) {
    this.pipe = pipe;
    pipe.output.setEncoding('utf8');
    pipe.output.on('data', (data: string) => this.onData(data));
    pipe.onExit((reason) => {
      logger.warn('r2 channel ended', { reason });
      this.frames.fail(new AgentError('channel', reason));
    });
  }

  /** Spawns `r2 -q0 <file>` and waits until the binary is loaded. */
  static async open(file: string, opts: R2OpenOptions = {}): Promise<R2Channel> {
    const r2Path = opts.r2Path ?? 'r2';
    logger.info('r2 open', { r2Path, file });
    const child = spawn(r2Path, ['-q0', file], { stdio: ['pipe', 'pipe', 'pipe'] });
    const channel = new R2Channel(pipeFromChild(child));
    await channel.ready();
    return channel;
  }

  async ready(): Promise<void> {
    await this.frames.next();
  }

  send(command: string): Promise<string> {
    if (this.closed || this.frames.isFailed()) {
      return Promise.reject(new AgentError('channel', 'r2 channel is closed'));
    }
    // one command line in, one frame out
    const line = command.replace(/\r?\n/g, ';');
    const reply = this.frames.next();
    this.pipe.input.write(`${line}\n`);
    return reply;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.frames.isFailed()) return;
    this.pipe.input.end('q!\n');
  }

  private onData(data: string) {
    this.partial += data;
    let idx = this.partial.indexOf(FRAME_END);
    while (idx !== -1) {
      this.frames.push(this.partial.slice(0, idx));
      this.partial = this.partial.slice(idx + FRAME_END.length);
      idx = this.partial.indexOf(FRAME_END);
    }
  }
}
