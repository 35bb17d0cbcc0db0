/**
 * SQLite implementation of the KnowledgeStore contract.
 *
 * better-sqlite3 is synchronous; the store keeps the async contract so the
 * features never depend on that detail. Every statement is prepared once
 * per handle.
 */

import type { SqliteDatabase } from './db-schema.js';
import { logger } from '../middleware/logger.js';
import { StorageError } from './errors.js';
import type { KnowledgeStore } from './db-backend.js';
import {
  normalizeQuestion,
  type FaqEntry,
  type FaqHit,
  type ImportantMessage,
  type Reminder,
  type ReminderStatus,
} from './db-types.js';

// ── Row shapes ──────────────────────────────────────────────────────

interface FaqRow {
  id: number;
  group_id: string;
  question: string;
  answer: string;
  frequency: number;
  created_at: number;
  updated_at: number;
}

interface ImportantMessageRow {
  id: number;
  group_id: string;
  message_id: number;
  content: string;
  created_at: number;
}

interface ReminderRow {
  id: number;
  group_id: string;
  message_id: number;
  content: string;
  remind_at: number;
  status: ReminderStatus;
  created_at: number;
}

const DEFAULT_IMPORTANT_LIMIT = 20;

function toFaqEntry(row: FaqRow): FaqEntry {
  return {
    id: row.id,
    groupId: row.group_id,
    question: row.question,
    answer: row.answer,
    frequency: row.frequency,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toImportantMessage(row: ImportantMessageRow): ImportantMessage {
  return {
    id: row.id,
    groupId: row.group_id,
    messageId: row.message_id,
    content: row.content,
    createdAt: row.created_at,
  };
}

function toReminder(row: ReminderRow): Reminder {
  return {
    id: row.id,
    groupId: row.group_id,
    messageId: row.message_id,
    content: row.content,
    remindAt: row.remind_at,
    status: row.status,
    createdAt: row.created_at,
  };
}

/**
 * Run a statement, logging and wrapping driver errors so callers see a
 * single StorageError type.
 */
function guarded<T>(operation: string, context: Record<string, unknown>, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    logger.error({ err, operation, ...context }, 'Storage operation failed');
    throw new StorageError(operation, err, context);
  }
}

/** Build a KnowledgeStore over an open, migrated database handle. */
export function createSqliteStore(db: SqliteDatabase): KnowledgeStore {
  const upsertFaq = db.prepare(
    `INSERT INTO knowledge (group_id, question, normalized_question, answer, frequency, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(group_id, normalized_question) DO UPDATE SET
       question = excluded.question,
       answer = excluded.answer,
       updated_at = excluded.updated_at
     RETURNING id, group_id, question, answer, frequency, created_at, updated_at`,
  );
  const incrementFaq = db.prepare(
    `UPDATE knowledge SET frequency = frequency + 1
     WHERE group_id = ? AND normalized_question = ?
     RETURNING answer, frequency`,
  );
  const selectFaqs = db.prepare(
    `SELECT id, group_id, question, answer, frequency, created_at, updated_at
     FROM knowledge WHERE group_id = ?
     ORDER BY frequency DESC, id ASC`,
  );
  const insertImportant = db.prepare(
    `INSERT INTO important_messages (group_id, message_id, content, created_at) VALUES (?, ?, ?, ?)`,
  );
  const selectImportant = db.prepare(
    `SELECT id, group_id, message_id, content, created_at FROM important_messages
     WHERE group_id = ? ORDER BY created_at DESC, id DESC LIMIT ?`,
  );
  const insertReminderRow = db.prepare(
    `INSERT INTO reminders (group_id, message_id, content, remind_at, status, created_at)
     VALUES (?, ?, ?, ?, 'scheduled', ?)`,
  );
  const selectReminderById = db.prepare(
    `SELECT id, group_id, message_id, content, remind_at, status, created_at FROM reminders WHERE id = ?`,
  );
  const selectScheduled = db.prepare(
    `SELECT id, group_id, message_id, content, remind_at, status, created_at FROM reminders
     WHERE status = 'scheduled' ORDER BY remind_at ASC, id ASC`,
  );
  const selectScheduledForGroup = db.prepare(
    `SELECT id, group_id, message_id, content, remind_at, status, created_at FROM reminders
     WHERE status = 'scheduled' AND group_id = ? ORDER BY remind_at ASC, id ASC`,
  );
  const updateReminderFired = db.prepare(
    `UPDATE reminders SET status = 'fired' WHERE id = ? AND status = 'scheduled'`,
  );
  const updateReminderCancelled = db.prepare(
    `UPDATE reminders SET status = 'cancelled' WHERE id = ? AND group_id = ? AND status = 'scheduled'`,
  );

  return {
    async insertFaq(groupId, question, answer, frequency = 1) {
      const now = Date.now();
      const row = guarded('insertFaq', { groupId }, () =>
        upsertFaq.get(groupId, question, normalizeQuestion(question), answer, frequency, now, now) as FaqRow,
      );
      return toFaqEntry(row);
    },

    async lookupFaq(groupId, question) {
      const normalized = normalizeQuestion(question);
      logger.debug({ groupId, question: normalized }, 'Querying FAQ');
      const hit = guarded('lookupFaq', { groupId }, () =>
        incrementFaq.get(groupId, normalized) as FaqHit | undefined,
      );
      if (hit) {
        logger.debug({ groupId, frequency: hit.frequency }, 'FAQ hit');
      }
      return hit;
    },

    async listFaqs(groupId) {
      const rows = guarded('listFaqs', { groupId }, () => selectFaqs.all(groupId) as FaqRow[]);
      return rows.map(toFaqEntry);
    },

    async insertImportantMessage(groupId, messageId, content) {
      const createdAt = Date.now();
      const result = guarded('insertImportantMessage', { groupId, messageId }, () =>
        insertImportant.run(groupId, messageId, content, createdAt),
      );
      return { id: Number(result.lastInsertRowid), groupId, messageId, content, createdAt };
    },

    async listImportantMessages(groupId, limit = DEFAULT_IMPORTANT_LIMIT) {
      const rows = guarded('listImportantMessages', { groupId }, () =>
        selectImportant.all(groupId, limit) as ImportantMessageRow[],
      );
      return rows.map(toImportantMessage);
    },

    async insertReminder(groupId, messageId, content, remindAt) {
      const createdAt = Date.now();
      const result = guarded('insertReminder', { groupId, messageId }, () =>
        insertReminderRow.run(groupId, messageId, content, remindAt, createdAt),
      );
      logger.info({ groupId, remindAt: new Date(remindAt).toISOString() }, 'Stored reminder');
      return {
        id: Number(result.lastInsertRowid),
        groupId,
        messageId,
        content,
        remindAt,
        status: 'scheduled',
        createdAt,
      };
    },

    async getReminder(id) {
      const row = guarded('getReminder', { id }, () => selectReminderById.get(id) as ReminderRow | undefined);
      return row ? toReminder(row) : undefined;
    },

    async listScheduledReminders(groupId) {
      const rows = guarded('listScheduledReminders', { groupId }, () =>
        (groupId === undefined ? selectScheduled.all() : selectScheduledForGroup.all(groupId)) as ReminderRow[],
      );
      return rows.map(toReminder);
    },

    async markReminderFired(id) {
      const result = guarded('markReminderFired', { id }, () => updateReminderFired.run(id));
      return result.changes > 0;
    },

    async cancelReminder(groupId, id) {
      const result = guarded('cancelReminder', { groupId, id }, () => updateReminderCancelled.run(id, groupId));
      return result.changes > 0;
    },

    async close() {
      db.close();
      logger.info('SQLite database closed');
    },
  };
}
