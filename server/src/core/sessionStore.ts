import crypto from "node:crypto";
import { ThreadBusyError } from "./errors.js";
import { ConversationTurn, SessionState } from "./types.js";

/**
 * Exclusive write access to one thread for the duration of a turn. Turns are
 * appended only through `commit`, so an abandoned or failed turn leaves the
 * history as it was.
 */
export class SessionLease {
  readonly session: SessionState;

  private readonly store: SessionStore;
  private released = false;

  constructor(store: SessionStore, session: SessionState) {
    this.store = store;
    this.session = session;
  }

  get threadId(): string {
    return this.session.threadId;
  }

  commit(turns: ConversationTurn[]): void {
    if (this.released) {
      throw new Error(`lease for thread ${this.threadId} was already released`);
    }
    this.store.appendTurns(this.session, turns);
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.store.releaseThread(this.threadId);
  }
}

export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly activeThreads = new Set<string>();
  private readonly maxTurns: number;

  constructor(maxTurns: number) {
    this.maxTurns = maxTurns;
  }

  get size(): number {
    return this.sessions.size;
  }

  getOrCreate(threadId?: string): SessionState {
    if (threadId) {
      const existing = this.sessions.get(threadId);
      if (existing) {
        return existing;
      }
    }

    const now = new Date().toISOString();
    const created: SessionState = {
      threadId: threadId ?? this.mintThreadId(),
      history: [],
      createdAt: now,
      updatedAt: now,
      turnCount: 0,
    };

    this.sessions.set(created.threadId, created);
    return created;
  }

  /**
   * Resolves the thread and takes its writer lock. Throws `ThreadBusyError`
   * when another turn holds the lock.
   */
  acquire(threadId?: string): SessionLease {
    if (threadId && this.activeThreads.has(threadId)) {
      throw new ThreadBusyError(threadId);
    }

    const session = this.getOrCreate(threadId);
    this.activeThreads.add(session.threadId);
    return new SessionLease(this, session);
  }

  isActive(threadId: string): boolean {
    return this.activeThreads.has(threadId);
  }

  appendTurns(state: SessionState, turns: ConversationTurn[]): void {
    const maxEntries = this.maxTurns * 2;
    const history = [...state.history, ...turns];

    state.history = history.length > maxEntries ? history.slice(-maxEntries) : history;
    state.turnCount += 1;
    state.updatedAt = new Date().toISOString();
  }

  releaseThread(threadId: string): void {
    this.activeThreads.delete(threadId);
  }

  private mintThreadId(): string {
    let threadId: string;
    do {
      threadId = `thread_${crypto.randomUUID().replace(/-/g, "")}`;
    } while (this.sessions.has(threadId));
    return threadId;
  }
}
