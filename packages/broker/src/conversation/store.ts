import type { Conversation, ConversationInit } from '../types/index.js';
import { DEFAULT_CONVERSATION_TTL_MS } from '../config/config.js';

export type ConversationStoreOptions = {
  readonly ttlMs?: number;
  readonly now?: () => number;
};

export type Release = () => void;

/**
 * Conversations paused on a tool call, keyed by request id.
 *
 * An entry older than the TTL reads exactly like a missing one. Expired
 * entries are dropped when looked up, and all of them whenever a new
 * conversation is created.
 */
export class ConversationStore {
  private readonly conversations = new Map<string, Conversation>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ConversationStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CONVERSATION_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /** Creates (or replaces) the conversation for `requestId`. */
  create(requestId: string, init: ConversationInit): Conversation {
    this.sweep();
    const conversation: Conversation = {
      ...init,
      requestId,
      pendingToolCalls: [],
      accumulatedText: [],
      createdAt: this.now(),
    };
    this.conversations.set(requestId, conversation);
    return conversation;
  }

  get(requestId: string): Conversation | undefined {
    const conversation = this.conversations.get(requestId);
    if (!conversation) {
      return undefined;
    }
    if (this.isExpired(conversation, this.now())) {
      this.conversations.delete(requestId);
      return undefined;
    }
    return conversation;
  }

  private isExpired(conversation: Conversation, now: number): boolean {
    return now - conversation.createdAt >= this.ttlMs;
  }

  private sweep(): void {
    const now = this.now();
    for (const [requestId, conversation] of this.conversations) {
      if (this.isExpired(conversation, now)) {
        this.conversations.delete(requestId);
      }
    }
  }

  has(requestId: string): boolean {
    return this.get(requestId) !== undefined;
  }

  remove(requestId: string): boolean {
    return this.conversations.delete(requestId);
  }

  get size(): number {
    return this.conversations.size;
  }

  /**
   * Waits for every earlier holder of `requestId` to release, then returns the
   * release function for this holder. Keys never block each other.
   */
  async acquire(requestId: string): Promise<Release> {
    const previous = this.locks.get(requestId) ?? Promise.resolve();

    let release: Release = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(requestId, tail);

    await previous;

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      release();
      if (this.locks.get(requestId) === tail) {
        this.locks.delete(requestId);
      }
    };
  }
}
