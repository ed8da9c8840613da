export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  readonly role: ConversationRole;
  readonly content: string;
  readonly timestamp: Date;
}

export const DEFAULT_HISTORY_MAX_TURNS = 10;

export interface ConversationStore {
  history(sessionId: string): ConversationTurn[];
  append(sessionId: string, turn: ConversationTurn): void;
  reset(sessionId: string): void;
  sessionCount(): number;
}

export function createTurn(role: ConversationRole, content: string, timestamp = new Date()): ConversationTurn {
  return Object.freeze({ role, content, timestamp });
}

/**
 * Rolling per-session history. Each session keeps at most `maxTurns` entries;
 * the oldest are dropped first.
 */
export class InMemoryConversationStore implements ConversationStore {
  private readonly sessions = new Map<string, ConversationTurn[]>();
  private readonly maxTurns: number;

  constructor(options: { maxTurns?: number } = {}) {
    this.maxTurns = Math.max(options.maxTurns ?? DEFAULT_HISTORY_MAX_TURNS, 1);
  }

  public history(sessionId: string): ConversationTurn[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  public append(sessionId: string, turn: ConversationTurn): void {
    const turns = this.sessions.get(sessionId) ?? [];
    while (turns.length >= this.maxTurns) {
      turns.shift();
    }
    turns.push(Object.isFrozen(turn) ? turn : createTurn(turn.role, turn.content, turn.timestamp));
    this.sessions.set(sessionId, turns);
  }

  public reset(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  public sessionCount(): number {
    return this.sessions.size;
  }
}
