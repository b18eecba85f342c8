import { createConversationState, type ConversationState } from '../domain/conversationState';

interface StoredConversation {
  state: ConversationState;
  expiresAt: number;
}

/**
 * Per-process registry of live conversations. Entries expire after `ttlMs`
 * of inactivity; turns on the same conversation run one at a time.
 */
export class ConversationStore {
  private readonly map = new Map<string, StoredConversation>();
  private readonly turns = new Map<string, Promise<void>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  private cleanup(now = this.now()): void {
    for (const [key, entry] of this.map.entries()) {
      if (entry.expiresAt <= now) {
        this.map.delete(key);
      }
    }
  }

  get(key: string): ConversationState | undefined {
    const now = this.now();
    this.cleanup(now);
    const entry = this.map.get(key);
    if (!entry) return undefined;

    entry.expiresAt = now + this.ttlMs;
    return entry.state;
  }

  getOrCreate(key: string): ConversationState {
    return this.get(key) ?? this.set(key, createConversationState(key, this.now()));
  }

  set(key: string, state: ConversationState): ConversationState {
    const now = this.now();
    state.updatedAt = now;
    this.map.set(key, { state, expiresAt: now + this.ttlMs });
    return state;
  }

  clear(key: string): boolean {
    return this.map.delete(key);
  }

  size(): number {
    this.cleanup();
    return this.map.size;
  }

  /** Chains `task` behind any turn already running for `key`. */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.turns.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.turns.set(key, settled);

    try {
      return await run;
    } finally {
      if (this.turns.get(key) === settled) this.turns.delete(key);
    }
  }
}
