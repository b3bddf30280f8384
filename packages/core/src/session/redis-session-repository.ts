import type { Redis } from "ioredis";
import { ConcurrencyConflict, SessionRepositoryError } from "../errors.ts";
import { parseStoredSession, type Session } from "./session.ts";
import type { SessionRepository } from "./session-repository.ts";

export const SESSION_KEY_PREFIX = "wa:session:";

/**
 * Compare-and-set in one round trip. Returns -1 on success, otherwise the stored
 * version (0 when the key is missing or unreadable).
 */
const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('GET', KEYS[1])
local stored = 0
if current then
  local ok, decoded = pcall(cjson.decode, current)
  if ok and type(decoded) == 'table' and tonumber(decoded['version']) then
    stored = tonumber(decoded['version'])
  end
end
if stored ~= tonumber(ARGV[1]) then
  return stored
end
redis.call('SET', KEYS[1], ARGV[2], 'EX', tonumber(ARGV[3]))
return -1
`;

/** The subset of an ioredis client the repository talks to. */
export type SessionStoreClient = {
  get(key: string): Promise<string | null>;
  del(key: string): Promise<number>;
  compareAndSet(key: string, expectedVersion: number, value: string, ttlSeconds: number): Promise<number>;
};

export function createSessionStoreClient(redis: Redis): SessionStoreClient {
  return {
    get: (key) => redis.get(key),
    del: (key) => redis.del(key),
    compareAndSet: async (key, expectedVersion, value, ttlSeconds) => {
      const result = await redis.eval(
        COMPARE_AND_SET_SCRIPT,
        1,
        key,
        String(expectedVersion),
        value,
        String(ttlSeconds),
      );
      if (typeof result !== "number") {
        throw new SessionRepositoryError("Unexpected compare-and-set reply from session store.");
      }
      return result;
    },
  };
}

export class RedisSessionRepository implements SessionRepository {
  constructor(
    private readonly client: SessionStoreClient,
    private readonly options: { ttlSeconds: number; maxStackDepth?: number },
  ) {}

  async load(userId: string): Promise<Session | null> {
    let raw: string | null;
    try {
      raw = await this.client.get(sessionKey(userId));
    } catch (error) {
      throw new SessionRepositoryError("Unable to load session.", { cause: error });
    }
    if (raw === null) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      return null;
    }
    return parseStoredSession(decoded, {
      userId,
      maxStackDepth: this.options.maxStackDepth,
    });
  }

  async save(session: Session, expectedVersion: number): Promise<void> {
    let result: number;
    try {
      result = await this.client.compareAndSet(
        sessionKey(session.user_id),
        expectedVersion,
        JSON.stringify(session),
        this.options.ttlSeconds,
      );
    } catch (error) {
      if (error instanceof SessionRepositoryError) {
        throw error;
      }
      throw new SessionRepositoryError("Unable to save session.", { cause: error });
    }

    if (result !== -1) {
      throw new ConcurrencyConflict({
        userId: session.user_id,
        expectedVersion,
        actualVersion: result,
      });
    }
  }

  async delete(userId: string): Promise<void> {
    try {
      await this.client.del(sessionKey(userId));
    } catch (error) {
      throw new SessionRepositoryError("Unable to delete session.", { cause: error });
    }
  }
}

export function sessionKey(userId: string): string {
  return `${SESSION_KEY_PREFIX}${userId}`;
}
