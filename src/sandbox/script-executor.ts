import vm from 'node:vm';
import { format } from 'node:util';
import type { CommandChannel } from '../channel/types';
import { describeError } from '../core/errors';

export type ScriptCapabilities = {
  channel: CommandChannel;
};

export type ScriptRunResult = {
  output: string;
  ok: boolean;
};

type ScriptExecutorOptions = {
  /** Bound on the synchronous part of a script; awaited work is not interrupted. */
  timeoutMs?: number;
};

export const NO_SCRIPT_OUTPUT = '(Script executed successfully, no output)';

function lines(text: string): string[] {
  return String(text)
    .split(/\r?\n/)
    .filter((l) => l.length > 0);
}

function grep(text: string, pattern: string | RegExp): string[] {
  const re = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
  return lines(text).filter((l) => {
    re.lastIndex = 0;
    return re.test(l);
  });
}

function hex(n: number): string {
  return `0x${Number(n).toString(16)}`;
}

/**
 * Runs model-written JavaScript in a fresh vm context.
 *
 * The context sees only what is listed here: `r2.cmd` / `r2.cmdj` bound to the
 * command channel, `print` and a `console` that write to the capture buffer,
 * the `utils` helpers, and the context's own language intrinsics. No `process`,
 * no `require`, no module loading, no string code generation. This is a
 * capability boundary, not a security sandbox.
 *
 * A run lasts until the script's own promise settles and every channel call it
 * started has answered. Rejections the script leaves unhandled during that
 * window fail the run instead of reaching the host process.
 */
export class ScriptExecutor {
  private timeoutMs: number;

  constructor(opts: ScriptExecutorOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  async run(code: string, caps: ScriptCapabilities): Promise<ScriptRunResult> {
    const captured: string[] = [];
    const faults: unknown[] = [];
    const calls: Array<Promise<void>> = [];
    const write = (...values: unknown[]) => {
      captured.push(`${format(...values)}\n`);
    };

    const context = vm.createContext(
      {},
      { name: 'script directive', codeGeneration: { strings: false, wasm: false } }
    );
    // channel replies are handed out as the context's own promises, so anything
    // the script chains off them is recognizable below
    const ScriptPromise: PromiseConstructor = vm.runInContext('Promise', context);

    const call = <T>(command: string, decode: (text: string) => T): Promise<T> =>
      new ScriptPromise<T>((resolve, reject) => {
        const settled = caps.channel.send(String(command)).then((text) => {
          try {
            resolve(decode(text));
          } catch (err) {
            reject(err);
          }
        }, reject);
        calls.push(settled);
      });

    Object.assign(context, {
      r2: {
        cmd: (command: string) => call(command, (text) => text),
        cmdj: (command: string) => call(command, (text): unknown => JSON.parse(text))
      },
      print: write,
      console: { log: write, info: write, warn: write, error: write },
      utils: { lines, grep, hex }
    });

    // listeners already installed see only rejections that are not the script's
    const displaced = process.listeners('unhandledRejection');
    const onUnhandled = (reason: unknown, promise: Promise<unknown>) => {
      if (promise instanceof ScriptPromise) {
        faults.push(reason);
        return;
      }
      if (displaced.length === 0) throw reason;
      for (const listener of displaced) listener(reason, promise);
    };
    process.removeAllListeners('unhandledRejection');
    process.on('unhandledRejection', onUnhandled);

    try {
      try {
        // wrapped so scripts can use top-level await; lineOffset keeps line numbers aligned
        const script = new vm.Script(`(async () => {\n${code}\n})()`, { filename: 'directive.js', lineOffset: -1 });
        const pending: unknown = script.runInContext(context, { timeout: this.timeoutMs });
        await pending;
      } catch (err) {
        faults.unshift(err);
      }
      await Promise.all(calls);
      // unhandled rejections are reported once the current tick drains
      await new Promise<void>((resolve) => setImmediate(resolve));
    } finally {
      process.off('unhandledRejection', onUnhandled);
      for (const listener of displaced) process.on('unhandledRejection', listener);
    }

    if (faults.length > 0) {
      const { message, stack } = describeError(faults[0]);
      return { ok: false, output: `Script Execution Error:\n${stack ?? message}` };
    }
    const output = captured.join('');
    return { ok: true, output: output.length > 0 ? output : NO_SCRIPT_OUTPUT };
  }
}
