export type ChatRole = 'user' | 'assistant';

export interface ContextTurn {
  role: ChatRole;
  content: string;
}

export interface ContextLimits {
  maxTurns: number;
  maxChars: number;
}

/** The latest user + assistant exchange is never trimmed. */
const PROTECTED_TAIL_TURNS = 2;

/**
 * Bounded, ordered turn history of one chat session.
 * Oldest turns are dropped first until both the turn and character limits hold.
 */
export class ConversationContext {
  private readonly history: ContextTurn[];
  private readonly limits: ContextLimits;

  constructor(
    readonly sessionId: string,
    limits: ContextLimits,
    turns: readonly ContextTurn[] = [],
  ) {
    this.limits = {
      maxTurns: Math.max(PROTECTED_TAIL_TURNS, limits.maxTurns),
      maxChars: Math.max(0, limits.maxChars),
    };
    this.history = turns.map((turn) => ({ role: turn.role, content: turn.content }));
    this.trim();
  }

  get turns(): readonly ContextTurn[] {
    return this.history;
  }

  get size(): number {
    return this.history.length;
  }

  get charCount(): number {
    return this.history.reduce((total, turn) => total + turn.content.length, 0);
  }

  appendExchange(userText: string, assistantText: string): void {
    this.history.push({ role: 'user', content: userText }, { role: 'assistant', content: assistantText });
    this.trim();
  }

  toMessages(): ContextTurn[] {
    return this.history.map((turn) => ({ ...turn }));
  }

  private trim(): void {
    let chars = this.charCount;

    while (
      this.history.length > PROTECTED_TAIL_TURNS &&
      (this.history.length > this.limits.maxTurns || chars > this.limits.maxChars)
    ) {
      const dropped = this.history.shift();
      chars -= dropped ? dropped.content.length : 0;
    }
  }
}
