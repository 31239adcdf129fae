import chalk from 'chalk';
import ora from 'ora';
import type { Directive } from '../directives/types';
import type { RenderedLine } from '../llm/line-renderer';
import type { NoticeLevel, Renderer, StatusView } from './renderer';

type Spinner = ReturnType<typeof ora>;

const theme = {
  info: chalk.dim.cyan,
  warning: chalk.magenta,
  danger: chalk.bold.red,
  success: chalk.green,
  cmd: chalk.bold.yellow,
  script: chalk.bold.blue,
  thinking: chalk.italic.blue
};

function formatInline(text: string): string {
  return text.replace(/\*\*([^*]+)\*\*/g, (_m, inner: string) => chalk.bold(inner)).replace(/`([^`]+)`/g, (_m, inner: string) => chalk.yellow(inner));
}

/** Light markdown for a single prose line: headings, bullets, bold, inline code. */
export function formatProse(line: string): string {
  const heading = /^#{1,6}\s+(.*)$/.exec(line);
  if (heading) return chalk.bold.cyan(heading[1]);
  const bullet = /^(\s*)[-*]\s+(.*)$/.exec(line);
  if (bullet) return `${bullet[1]}• ${formatInline(bullet[2])}`;
  return formatInline(line);
}

export function statusText(view: StatusView): string {
  switch (view.phase) {
    case 'waiting':
      return chalk.italic.blue('Waiting...');
    case 'retrying':
      return chalk.yellow(`Request timeout or failed. Retrying (${view.attempt}/${view.maxAttempts})...`);
    case 'thinking':
      return view.tail.length > 0
        ? `${theme.thinking('Thinking...')}\n${chalk.dim(view.tail.join('\n'))}`
        : theme.thinking('Thinking...');
    case 'generating':
      return chalk.green('Generating Response...');
  }
}

export class TerminalRenderer implements Renderer {
  private spinner: Spinner | null = null;
  private scriptPreviewChars: number;

  constructor(opts: { scriptPreviewChars?: number } = {}) {
    this.scriptPreviewChars = opts.scriptPreviewChars ?? 5000;
  }

  status(view: StatusView) {
    const text = statusText(view);
    if (this.spinner) {
      this.spinner.text = text;
      return;
    }
    this.spinner = ora({ text, spinner: 'dots', discardStdin: false }).start();
  }

  clearStatus() {
    if (!this.spinner) return;
    this.spinner.stop();
    this.spinner = null;
  }

  line(line: RenderedLine) {
    switch (line.kind) {
      case 'fence-open':
        this.print(chalk.dim.cyan('  Script:'));
        return;
      case 'fence-close':
        this.print('');
        return;
      case 'code':
        this.print(`${chalk.dim(String(line.lineNo).padStart(4))} ${chalk.cyan(line.text)}`);
        return;
      case 'prose':
        this.print(formatProse(line.text));
        return;
    }
  }

  notice(level: NoticeLevel, text: string) {
    this.print(theme[level](text));
  }

  rule(title: string) {
    this.print(chalk.bold.cyan(`──── ${title} ────`));
  }

  directive(directive: Directive) {
    if (directive.kind === 'command') {
      this.print(theme.cmd(`➜ R2 Command: ${directive.text}`));
      return;
    }
    this.print(theme.script('➜ Executing Script...'));
    for (const l of directive.text.split('\n')) this.print(chalk.dim(`  ${l}`));
  }

  scriptOutput(output: string) {
    if (output.length < this.scriptPreviewChars) {
      this.print(chalk.dim.blue('── Script Output ──'));
      this.print(output.replace(/\n$/, ''));
      this.print(chalk.dim.blue('───────────────────'));
      return;
    }
    this.print(chalk.dim(`Script output length: ${output.length} chars`));
  }

  // keeps the spinner line below whatever is printed
  private print(text: string) {
    if (!this.spinner) {
      console.log(text);
      return;
    }
    this.spinner.clear();
    console.log(text);
    this.spinner.render();
  }
}
