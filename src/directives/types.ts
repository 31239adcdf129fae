export type DirectiveKind = 'command' | 'script';

export type Directive = {
  kind: DirectiveKind;
  text: string;
};

export type ParseResult = {
  directives: Directive[];
  /** True when `[[ask]]` appeared in the scanned text. */
  ask: boolean;
  /** Characters of the buffer fully processed; the rest may still grow into a directive. */
  consumed: number;
};

export const COMMAND_OPEN = '[[';
export const COMMAND_CLOSE = ']]';
export const SCRIPT_OPEN = '<js>';
export const SCRIPT_CLOSE = '</js>';
export const ASK_TOKEN = 'ask';
export const END_MARKER = '[end]';
