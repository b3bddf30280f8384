import { describe, expect, it } from "vitest";
import { ConcurrencyConflict, SessionRepositoryError } from "../../packages/core/src/errors.ts";
import { KeyedLock } from "../../packages/core/src/session/keyed-lock.ts";
import {
  RedisSessionRepository,
  sessionKey,
  type SessionStoreClient,
} from "../../packages/core/src/session/redis-session-repository.ts";
import { InMemorySessionRepository } from "../../packages/core/src/session/session-repository.ts";
import { advanceSession, createSession } from "../../packages/core/src/session/session.ts";

const NOW = "2026-10-18T09:00:00.000Z";

class FakeSessionStore implements SessionStoreClient {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async del(key: string): Promise<number> {
    return this.values.delete(key) ? 1 : 0;
  }

  async compareAndSet(key: string, expectedVersion: number, value: string, ttlSeconds: number): Promise<number> {
    const current = this.values.get(key);
    const stored = current ? readVersion(current) : 0;
    if (stored !== expectedVersion) {
      return stored;
    }
    this.values.set(key, value);
    this.ttls.set(key, ttlSeconds);
    return -1;
  }
}

function readVersion(raw: string): number {
  const decoded: unknown = JSON.parse(raw);
  if (decoded && typeof decoded === "object" && "version" in decoded && typeof decoded.version === "number") {
    return decoded.version;
  }
  return 0;
}

describe("InMemorySessionRepository", () => {
  it("saves a new session against expected version 0", async () => {
    const repository = new InMemorySessionRepository({ ttlMs: 60_000 });
    const session = advanceSession(createSession("u1", NOW), { state: "GST_MENU" }, { nowIso: NOW });

    await repository.save(session, 0);

    expect(await repository.load("u1")).toEqual(session);
  });

  it("rejects a save whose expected version is stale", async () => {
    const repository = new InMemorySessionRepository({ ttlMs: 60_000 });
    const first = advanceSession(createSession("u1", NOW), {}, { nowIso: NOW });
    await repository.save(first, 0);

    const competing = advanceSession(createSession("u1", NOW), { state: "ITR_MENU" }, { nowIso: NOW });
    const error = await repository.save(competing, 0).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConcurrencyConflict);
    expect(error instanceof ConcurrencyConflict ? error.actualVersion : null).toBe(1);
  });

  it("expires sessions after the ttl", async () => {
    let nowMs = 1_000;
    const repository = new InMemorySessionRepository({ ttlMs: 500, nowMs: () => nowMs });
    await repository.save(advanceSession(createSession("u1", NOW), {}, { nowIso: NOW }), 0);

    nowMs = 1_499;
    expect(await repository.load("u1")).not.toBeNull();
    nowMs = 1_500;
    expect(await repository.load("u1")).toBeNull();
  });
});

describe("RedisSessionRepository", () => {
  it("round-trips sessions through the store with the configured ttl", async () => {
    const store = new FakeSessionStore();
    const repository = new RedisSessionRepository(store, { ttlSeconds: 86_400 });
    const session = advanceSession(
      createSession("919800000001", NOW),
      { state: "GST_MENU", data: { gstin: "27ABCDE1234F1Z5" } },
      { nowIso: NOW, eventId: "wamid.1" },
    );

    await repository.save(session, 0);

    expect(store.ttls.get("wa:session:919800000001")).toBe(86_400);
    expect(await repository.load("919800000001")).toEqual(session);
  });

  it("raises a concurrency conflict carrying the stored version", async () => {
    const store = new FakeSessionStore();
    const repository = new RedisSessionRepository(store, { ttlSeconds: 60 });
    const first = advanceSession(createSession("u1", NOW), {}, { nowIso: NOW });
    const second = advanceSession(first, {}, { nowIso: NOW });
    await repository.save(first, 0);
    await repository.save(second, 1);

    const error = await repository.save(second, 1).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConcurrencyConflict);
    expect(error instanceof ConcurrencyConflict ? error.actualVersion : null).toBe(2);
  });

  it("treats unreadable snapshots as missing", async () => {
    const store = new FakeSessionStore();
    store.values.set(sessionKey("u1"), "{not json");
    const repository = new RedisSessionRepository(store, { ttlSeconds: 60 });

    expect(await repository.load("u1")).toBeNull();
  });

  it("wraps store failures in SessionRepositoryError", async () => {
    const store = new FakeSessionStore();
    store.get = async () => {
      throw new Error("connection reset");
    };
    const repository = new RedisSessionRepository(store, { ttlSeconds: 60 });

    await expect(repository.load("u1")).rejects.toThrow(SessionRepositoryError);
    await expect(repository.load("u1")).rejects.toThrow("Unable to load session.");
  });

  it("deletes by key", async () => {
    const store = new FakeSessionStore();
    store.values.set(sessionKey("u1"), "{}");
    const repository = new RedisSessionRepository(store, { ttlSeconds: 60 });

    await repository.delete("u1");

    expect(store.values.size).toBe(0);
  });
});

describe("KeyedLock", () => {
  it("serializes work for one key and runs other keys independently", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    let releaseFirst: () => void = () => {};
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.runExclusive("u1", async () => {
      await firstGate;
      order.push("u1:first");
    });
    const second = lock.runExclusive("u1", async () => {
      order.push("u1:second");
    });
    const other = lock.runExclusive("u2", async () => {
      order.push("u2");
    });

    await other;
    expect(order).toEqual(["u2"]);

    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(["u2", "u1:first", "u1:second"]);
    expect(lock.activeKeys).toBe(0);
  });

  it("releases the key when a task throws", async () => {
    const lock = new KeyedLock();
    await expect(lock.runExclusive("u1", async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");

    await expect(lock.runExclusive("u1", async () => "next")).resolves.toBe("next");
  });
});
