import type { Turn, TurnRole } from '../llm/types';

/**
 * The conversation history. Append-only; the first turn is the system
 * instruction and stays untouched for the life of the session.
 */
export class ConversationContext {
  private turns: Turn[] = [];
  turnId = 0;

  constructor(systemPrompt: string) {
    this.turns.push({ role: 'system', content: systemPrompt });
  }

  get history(): readonly Turn[] {
    return this.turns;
  }

  get length(): number {
    return this.turns.length;
  }

  append(role: Exclude<TurnRole, 'system'>, content: string) {
    this.turns.push({ role, content });
    if (role === 'assistant') this.turnId += 1;
  }

  last(): Turn {
    return this.turns[this.turns.length - 1];
  }
}
