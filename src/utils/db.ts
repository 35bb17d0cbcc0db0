/**
 * Persistent storage entry point: opens the SQLite file, migrates it, and
 * hands back the KnowledgeStore the assistant is built on.
 */

import { openDatabase } from './db-schema.js';
import { createSqliteStore } from './db-sqlite.js';
import type { KnowledgeStore } from './db-backend.js';

export type { KnowledgeStore } from './db-backend.js';
export { MEMORY_DB_PATH } from './db-schema.js';
export {
  PENDING_ANSWER,
  normalizeQuestion,
  type FaqEntry,
  type FaqHit,
  type ImportantMessage,
  type Reminder,
  type ReminderStatus,
} from './db-types.js';

export function openKnowledgeStore(path: string): KnowledgeStore {
  return createSqliteStore(openDatabase(path));
}
