export type RenderedLine =
  | { kind: 'prose'; text: string }
  | { kind: 'code'; text: string; lineNo: number }
  | { kind: 'fence-open' }
  | { kind: 'fence-close' };

const FENCE_OPEN = '```js';
const FENCE_CLOSE = '```';

/** Presentation-only rewrite: commands shown as inline code, script blocks as fenced code. */
export function formatForDisplay(text: string): string {
  return text
    .replace(/\[\[/g, '`[[')
    .replace(/\]\]/g, ']]`')
    .replace(/<js>\n?/g, `\n${FENCE_OPEN}\n`)
    .replace(/\n?<\/js>/g, `\n${FENCE_CLOSE}\n`);
}

/**
 * Emits each completed line of a growing answer exactly once.
 * Only text up to the last newline is emitted; `flush` releases the remainder
 * when the stream is over.
 */
export class LineRenderer {
  private printedLen = 0;
  private inCode = false;
  private codeLine = 1;

  push(answer: string): RenderedLine[] {
    const available = formatForDisplay(answer).slice(this.printedLen);
    const lastNewline = available.lastIndexOf('\n');
    if (lastNewline === -1) return [];
    this.printedLen += lastNewline + 1;
    return available
      .slice(0, lastNewline)
      .split('\n')
      .map((line) => this.classify(line));
  }

  flush(answer: string): RenderedLine[] {
    const formatted = formatForDisplay(answer);
    const rest = formatted.slice(this.printedLen);
    this.printedLen = formatted.length;
    if (rest.trim().length === 0) return [];
    return [this.classify(rest)];
  }

  reset() {
    this.printedLen = 0;
    this.inCode = false;
    this.codeLine = 1;
  }

  private classify(line: string): RenderedLine {
    const stripped = line.trim();
    if (stripped === FENCE_OPEN) {
      this.inCode = true;
      this.codeLine = 1;
      return { kind: 'fence-open' };
    }
    if (stripped === FENCE_CLOSE && this.inCode) {
      this.inCode = false;
      return { kind: 'fence-close' };
    }
    if (this.inCode) {
      return { kind: 'code', text: line, lineNo: this.codeLine++ };
    }
    return { kind: 'prose', text: line };
  }
}
