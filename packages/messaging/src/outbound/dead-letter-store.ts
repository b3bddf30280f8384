import type { DeadLetterEntry, DeadLetterFilter } from "../types.ts";

export const DEFAULT_DEAD_LETTER_LIST_LIMIT = 50;
export const MAX_DEAD_LETTER_LIST_LIMIT = 500;

/** Entries are written once and never updated; only retention removes them. */
export interface DeadLetterStore {
  insert(entry: DeadLetterEntry): Promise<void>;
  get(id: string): Promise<DeadLetterEntry | null>;
  list(filter?: DeadLetterFilter): Promise<DeadLetterEntry[]>;
  deleteOlderThan(cutoffIso: string): Promise<number>;
}

export function resolveListLimit(limit: number | null | undefined): number {
  if (limit === null || limit === undefined || !Number.isFinite(limit)) {
    return DEFAULT_DEAD_LETTER_LIST_LIMIT;
  }
  return Math.min(MAX_DEAD_LETTER_LIST_LIMIT, Math.max(1, Math.trunc(limit)));
}

export function matchesDeadLetterFilter(entry: DeadLetterEntry, filter: DeadLetterFilter): boolean {
  if (filter.recipient && entry.recipient !== filter.recipient) {
    return false;
  }
  if (filter.failure_reason && entry.failure_reason !== filter.failure_reason) {
    return false;
  }
  const deadLetteredAtMs = Date.parse(entry.dead_lettered_at);
  if (filter.since && deadLetteredAtMs < Date.parse(filter.since)) {
    return false;
  }
  if (filter.until && deadLetteredAtMs > Date.parse(filter.until)) {
    return false;
  }
  return true;
}

export class InMemoryDeadLetterStore implements DeadLetterStore {
  private readonly entries = new Map<string, DeadLetterEntry>();

  async insert(entry: DeadLetterEntry): Promise<void> {
    if (this.entries.has(entry.id)) {
      throw new Error(`Dead letter '${entry.id}' already exists.`);
    }
    this.entries.set(entry.id, Object.freeze({ ...entry }));
  }

  async get(id: string): Promise<DeadLetterEntry | null> {
    return this.entries.get(id) ?? null;
  }

  async list(filter: DeadLetterFilter = {}): Promise<DeadLetterEntry[]> {
    return [...this.entries.values()]
      .filter((entry) => matchesDeadLetterFilter(entry, filter))
      .sort((left, right) => Date.parse(right.dead_lettered_at) - Date.parse(left.dead_lettered_at))
      .slice(0, resolveListLimit(filter.limit));
  }

  async deleteOlderThan(cutoffIso: string): Promise<number> {
    const cutoffMs = Date.parse(cutoffIso);
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (Date.parse(entry.dead_lettered_at) < cutoffMs) {
        this.entries.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
