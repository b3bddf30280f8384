export const DEFAULT_ANSWERED_PER_USER = 20;
export const DEFAULT_ANSWERED_MAX_USERS = 10_000;

/**
 * Event ids that were answered without a session save (help, aborted turns). Saved turns
 * are deduplicated through the session's processed ids; these would otherwise be answered
 * again on redelivery. In-process only, least recently answered users evicted first.
 */
export class AnsweredEventCache {
  private readonly entries = new Map<string, string[]>();

  constructor(
    private readonly perUser = DEFAULT_ANSWERED_PER_USER,
    private readonly maxUsers = DEFAULT_ANSWERED_MAX_USERS,
  ) {}

  has(userId: string, eventId: string): boolean {
    return this.entries.get(userId)?.includes(eventId) ?? false;
  }

  remember(userId: string, eventId: string): void {
    const ids = (this.entries.get(userId) ?? []).filter((id) => id !== eventId);
    ids.push(eventId);
    this.entries.delete(userId);
    this.entries.set(userId, ids.slice(-this.perUser));
    while (this.entries.size > this.maxUsers) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
