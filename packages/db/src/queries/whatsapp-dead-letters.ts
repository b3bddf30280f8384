import {
  resolveListLimit,
  type DeadLetterStore,
} from "../../../messaging/src/outbound/dead-letter-store.ts";
import {
  isDeadLetterReason,
  parseOutboundPayload,
  type DeadLetterEntry,
  type DeadLetterFilter,
} from "../../../messaging/src/types.ts";
import type { DbClient } from "../client.ts";
import { DB_ERROR_CODES, DbError } from "../errors.ts";

export const DEAD_LETTER_TABLE = "whatsapp_dead_letters";
const DEAD_LETTER_COLUMNS =
  "id,message_id,recipient,payload,failure_reason,last_error,retry_count,enqueued_at,dead_lettered_at";

export type QueryError = { message: string; code?: string };

export type DeadLetterRowFilter = {
  recipient: string | null;
  failure_reason: string | null;
  since: string | null;
  until: string | null;
  limit: number;
};

/** The four statements the store issues, so tests can stand in for PostgREST. */
export type DeadLetterTableClient = {
  insertRow(row: DeadLetterEntry): Promise<{ error: QueryError | null }>;
  selectById(id: string): Promise<{ data: unknown; error: QueryError | null }>;
  selectRows(filter: DeadLetterRowFilter): Promise<{ data: unknown; error: QueryError | null }>;
  deleteBefore(cutoffIso: string): Promise<{ data: unknown; error: QueryError | null }>;
};

export function createDeadLetterTableClient(db: DbClient): DeadLetterTableClient {
  return {
    insertRow: async (row) => {
      const { error } = await db.from(DEAD_LETTER_TABLE).insert(row);
      return { error };
    },
    selectById: async (id) => {
      const { data, error } = await db
        .from(DEAD_LETTER_TABLE)
        .select(DEAD_LETTER_COLUMNS)
        .eq("id", id)
        .maybeSingle();
      return { data, error };
    },
    selectRows: async (filter) => {
      let query = db.from(DEAD_LETTER_TABLE).select(DEAD_LETTER_COLUMNS);
      if (filter.recipient) {
        query = query.eq("recipient", filter.recipient);
      }
      if (filter.failure_reason) {
        query = query.eq("failure_reason", filter.failure_reason);
      }
      if (filter.since) {
        query = query.gte("dead_lettered_at", filter.since);
      }
      if (filter.until) {
        query = query.lte("dead_lettered_at", filter.until);
      }
      const { data, error } = await query
        .order("dead_lettered_at", { ascending: false })
        .limit(filter.limit);
      return { data, error };
    },
    deleteBefore: async (cutoffIso) => {
      const { data, error } = await db
        .from(DEAD_LETTER_TABLE)
        .delete()
        .lt("dead_lettered_at", cutoffIso)
        .select("id");
      return { data, error };
    },
  };
}

/** Dead-letter persistence on the `whatsapp_dead_letters` table. */
export class SupabaseDeadLetterStore implements DeadLetterStore {
  constructor(private readonly table: DeadLetterTableClient) {}

  async insert(entry: DeadLetterEntry): Promise<void> {
    const { error } = await this.table.insertRow(entry);
    if (error) {
      throw queryFailed("Unable to insert dead letter.", error, {
        dead_letter_id: entry.id,
        message_id: entry.message_id,
      });
    }
  }

  async get(id: string): Promise<DeadLetterEntry | null> {
    const { data, error } = await this.table.selectById(id);
    if (error) {
      throw queryFailed("Unable to load dead letter.", error, { dead_letter_id: id });
    }
    if (data === null || data === undefined) {
      return null;
    }
    return toEntry(data);
  }

  async list(filter: DeadLetterFilter = {}): Promise<DeadLetterEntry[]> {
    const { data, error } = await this.table.selectRows({
      recipient: filter.recipient ?? null,
      failure_reason: filter.failure_reason ?? null,
      since: filter.since ?? null,
      until: filter.until ?? null,
      limit: resolveListLimit(filter.limit),
    });
    if (error) {
      throw queryFailed("Unable to list dead letters.", error, {
        failure_reason: filter.failure_reason ?? null,
      });
    }
    if (!Array.isArray(data)) {
      throw unexpected("Dead-letter list returned a non-array payload.");
    }
    return data.map(toEntry);
  }

  async deleteOlderThan(cutoffIso: string): Promise<number> {
    const { data, error } = await this.table.deleteBefore(cutoffIso);
    if (error) {
      throw queryFailed("Unable to purge dead letters.", error, { cutoff: cutoffIso });
    }
    return Array.isArray(data) ? data.length : 0;
  }
}

function toEntry(row: unknown): DeadLetterEntry {
  if (!row || typeof row !== "object" || Array.isArray(row)) {
    throw unexpected("Dead-letter row is not an object.");
  }
  const record: Record<string, unknown> = { ...row };
  const payload = parseOutboundPayload(record.payload);
  const failureReason = record.failure_reason;
  const retryCount = record.retry_count;

  if (
    typeof record.id !== "string" ||
    typeof record.message_id !== "string" ||
    typeof record.recipient !== "string" ||
    typeof record.enqueued_at !== "string" ||
    typeof record.dead_lettered_at !== "string" ||
    typeof retryCount !== "number" ||
    !isDeadLetterReason(failureReason) ||
    !payload
  ) {
    throw unexpected("Dead-letter row is missing required columns.", {
      dead_letter_id: typeof record.id === "string" ? record.id : null,
    });
  }

  return {
    id: record.id,
    message_id: record.message_id,
    recipient: record.recipient,
    payload,
    failure_reason: failureReason,
    last_error: typeof record.last_error === "string" ? record.last_error : null,
    retry_count: retryCount,
    enqueued_at: new Date(record.enqueued_at).toISOString(),
    dead_lettered_at: new Date(record.dead_lettered_at).toISOString(),
  };
}

function queryFailed(message: string, error: QueryError, context: Record<string, unknown>): DbError {
  return new DbError(DB_ERROR_CODES.QUERY_FAILED, message, {
    status: 500,
    cause: error,
    context: { ...context, table: DEAD_LETTER_TABLE, db_error_code: error.code ?? null },
  });
}

function unexpected(message: string, context: Record<string, unknown> = {}): DbError {
  return new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, message, {
    status: 500,
    context: { ...context, table: DEAD_LETTER_TABLE },
  });
}
