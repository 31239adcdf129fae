import type { DirectiveKind } from '../directives/types';

export interface DirectiveOutcome {
  ok: boolean;
  output: string;
}

export type DirectiveHandler = (text: string) => Promise<DirectiveOutcome>;

export class ToolRegistry {
  private tools = new Map<DirectiveKind, DirectiveHandler>();

  register(kind: DirectiveKind, handler: DirectiveHandler) {
    this.tools.set(kind, handler);
  }

  get(kind: DirectiveKind): DirectiveHandler | undefined {
    return this.tools.get(kind);
  }
}
