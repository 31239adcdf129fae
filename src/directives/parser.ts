import {
  ASK_TOKEN,
  COMMAND_CLOSE,
  COMMAND_OPEN,
  SCRIPT_CLOSE,
  SCRIPT_OPEN,
  type Directive,
  type ParseResult
} from './types';

type ScanState = 'outside' | 'command' | 'script';

export type ParseMode = 'partial' | 'final';

const OPENERS = [COMMAND_OPEN, SCRIPT_OPEN];

// A tail like "[" or "<j" may still become an opener once more text arrives.
function isOpenerPrefix(rest: string): boolean {
  return OPENERS.some((opener) => rest.length < opener.length && opener.startsWith(rest));
}

/**
 * Scans `text` left to right from `from` and returns the complete directives found.
 *
 * Three states: outside any directive, inside `[[ ... ]]`, inside `<js> ... </js>`.
 * Pairs do not nest; the first closer ends the nearest opener.
 *
 * In `partial` mode the text may still grow: an opener without its closer stops
 * the scan, and `consumed` points at that opener so a later call on the grown
 * buffer can resume there. In `final` mode the text is complete, so such an
 * opener is plain text and the scan goes on from the next character.
 */
export function parseDirectives(text: string, from = 0, mode: ParseMode = 'partial'): ParseResult {
  const directives: Directive[] = [];
  let ask = false;
  let state: ScanState = 'outside';
  let i = from;
  let openedAt = from;

  while (i < text.length) {
    if (state === 'outside') {
      if (text.startsWith(COMMAND_OPEN, i)) {
        state = 'command';
        openedAt = i;
        i += COMMAND_OPEN.length;
        continue;
      }
      if (text.startsWith(SCRIPT_OPEN, i)) {
        state = 'script';
        openedAt = i;
        i += SCRIPT_OPEN.length;
        continue;
      }
      if (mode === 'partial' && isOpenerPrefix(text.slice(i))) break;
      i += 1;
      continue;
    }

    const close = state === 'command' ? COMMAND_CLOSE : SCRIPT_CLOSE;
    const end = text.indexOf(close, i);
    if (end === -1) {
      if (mode === 'partial') break;
      state = 'outside';
      i = openedAt + 1;
      continue;
    }

    const body = text.slice(i, end).trim();
    if (state === 'command') {
      if (body === ASK_TOKEN) {
        ask = true;
      } else if (body) {
        directives.push({ kind: 'command', text: body });
      }
    } else if (body) {
      directives.push({ kind: 'script', text: body });
    }

    i = end + close.length;
    state = 'outside';
  }

  return { directives, ask, consumed: state === 'outside' ? i : openedAt };
}

/**
 * Incremental front end over `parseDirectives` for a buffer that only grows.
 * Each directive is returned by exactly one `feed` call.
 */
export class DirectiveScanner {
  private offset = 0;
  private askSeen = false;

  feed(buffer: string): Directive[] {
    if (buffer.length < this.offset) this.reset();
    const res = parseDirectives(buffer, this.offset, 'partial');
    this.offset = res.consumed;
    if (res.ask) this.askSeen = true;
    return res.directives;
  }

  get ask(): boolean {
    return this.askSeen;
  }

  get consumed(): number {
    return this.offset;
  }

  reset() {
    this.offset = 0;
    this.askSeen = false;
  }
}
