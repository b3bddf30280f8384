export { DB_ERROR_CODES, DbError, assertRequiredEnv, sanitizeForError } from "./errors.ts";
export type { DbErrorCode } from "./errors.ts";
export { createServiceRoleDbClient } from "./client.ts";
export type { CreateDbClientParams, DbClient, DbCreateClientImpl } from "./client.ts";
export {
  DEAD_LETTER_TABLE,
  SupabaseDeadLetterStore,
  createDeadLetterTableClient,
} from "./queries/whatsapp-dead-letters.ts";
export type {
  DeadLetterRowFilter,
  DeadLetterTableClient,
  QueryError,
} from "./queries/whatsapp-dead-letters.ts";
