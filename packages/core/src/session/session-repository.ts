import { ConcurrencyConflict } from "../errors.ts";
import type { Session } from "./session.ts";

/**
 * Session storage with optimistic concurrency. `save` succeeds only when the stored
 * version still equals `expectedVersion` (0 when nothing is stored yet).
 */
export interface SessionRepository {
  load(userId: string): Promise<Session | null>;
  save(session: Session, expectedVersion: number): Promise<void>;
  delete(userId: string): Promise<void>;
}

/** Process-local repository used by tests and single-node development runs. */
export class InMemorySessionRepository implements SessionRepository {
  private readonly sessions = new Map<string, { session: Session; expiresAtMs: number }>();

  constructor(
    private readonly options: { ttlMs: number; nowMs?: () => number } = { ttlMs: 86_400_000 },
  ) {}

  async load(userId: string): Promise<Session | null> {
    const entry = this.sessions.get(userId);
    if (!entry) {
      return null;
    }
    if (entry.expiresAtMs <= this.now()) {
      this.sessions.delete(userId);
      return null;
    }
    return entry.session;
  }

  async save(session: Session, expectedVersion: number): Promise<void> {
    const current = await this.load(session.user_id);
    const storedVersion = current?.version ?? 0;
    if (storedVersion !== expectedVersion) {
      throw new ConcurrencyConflict({
        userId: session.user_id,
        expectedVersion,
        actualVersion: current ? current.version : null,
      });
    }
    this.sessions.set(session.user_id, {
      session,
      expiresAtMs: this.now() + this.options.ttlMs,
    });
  }

  async delete(userId: string): Promise<void> {
    this.sessions.delete(userId);
  }

  private now(): number {
    return this.options.nowMs ? this.options.nowMs() : Date.now();
  }
}
