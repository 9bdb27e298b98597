import type { ConversationContext } from "@/server/conversation/states";

export interface SessionStore {
  load(id: string): Promise<ConversationContext | null>;
  save(context: ConversationContext): Promise<void>;
  /** true when a session was removed */
  delete(id: string): Promise<boolean>;
}

export const SESSION_TTL_MS = 24 * 60 * 60 * 1000;

type Entry = { context: ConversationContext; touchedAt: number };

/**
 * Process-local sessions. Idle sessions expire after `ttlMs`.
 * Contexts are copied in and out so callers never share state with the store.
 */
export class MemorySessionStore implements SessionStore {
  private readonly entries = new Map<string, Entry>();

  constructor(
    private readonly ttlMs: number = SESSION_TTL_MS,
    private readonly now: () => number = Date.now
  ) {}

  async load(id: string): Promise<ConversationContext | null> {
    const entry = this.entries.get(id);
    if (!entry) return null;

    if (this.now() - entry.touchedAt > this.ttlMs) {
      this.entries.delete(id);
      return null;
    }
    return structuredClone(entry.context);
  }

  async save(context: ConversationContext): Promise<void> {
    const now = this.now();
    this.sweep(now);
    this.entries.set(context.id, { context: structuredClone(context), touchedAt: now });
  }

  async delete(id: string): Promise<boolean> {
    return this.entries.delete(id);
  }

  /** Drops every idle session, read or not. */
  private sweep(now: number): void {
    for (const [id, entry] of this.entries) {
      if (now - entry.touchedAt > this.ttlMs) this.entries.delete(id);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
