/**
 * Database initialization, schema, and migrations.
 *
 * This module owns opening the SQLite handle and every CREATE/ALTER
 * statement. Schema changes are ordered migrations tracked in
 * `PRAGMA user_version`; add new steps to the end of MIGRATIONS, never edit
 * one that has shipped.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { logger } from '../middleware/logger.js';
import { normalizeQuestion } from './db-types.js';

export type SqliteDatabase = InstanceType<typeof Database>;

export const MEMORY_DB_PATH = ':memory:';

interface Migration {
  version: number;
  description: string;
  up(db: SqliteDatabase): void;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'knowledge, important_messages and reminders tables',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS knowledge (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          group_id TEXT NOT NULL,
          question TEXT NOT NULL,
          answer TEXT NOT NULL,
          frequency INTEGER NOT NULL DEFAULT 1 CHECK (frequency >= 1),
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS important_messages (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          group_id TEXT NOT NULL,
          message_id INTEGER NOT NULL,
          content TEXT NOT NULL,
          created_at INTEGER NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_important_group_created
          ON important_messages (group_id, created_at DESC);

        CREATE TABLE IF NOT EXISTS reminders (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          group_id TEXT NOT NULL,
          message_id INTEGER NOT NULL,
          content TEXT NOT NULL,
          remind_at INTEGER NOT NULL,
          created_at INTEGER NOT NULL
        );
      `);
    },
  },
  {
    version: 2,
    description: 'unique (group, normalized question) and reminder status',
    up(db) {
      db.exec(`ALTER TABLE knowledge ADD COLUMN normalized_question TEXT NOT NULL DEFAULT ''`);

      const rows = db.prepare('SELECT id, question FROM knowledge').all() as Array<{ id: number; question: string }>;
      const setNormalized = db.prepare('UPDATE knowledge SET normalized_question = ? WHERE id = ?');
      for (const row of rows) {
        setNormalized.run(normalizeQuestion(row.question), row.id);
      }

      db.exec(`
        -- Collapse duplicates: latest row keeps its answer, frequencies add up.
        UPDATE knowledge SET frequency = (
          SELECT SUM(k2.frequency) FROM knowledge k2
          WHERE k2.group_id = knowledge.group_id
            AND k2.normalized_question = knowledge.normalized_question
        )
        WHERE id IN (SELECT MAX(id) FROM knowledge GROUP BY group_id, normalized_question);
        DELETE FROM knowledge
        WHERE id NOT IN (SELECT MAX(id) FROM knowledge GROUP BY group_id, normalized_question);

        CREATE UNIQUE INDEX IF NOT EXISTS idx_knowledge_group_question
          ON knowledge (group_id, normalized_question);

        ALTER TABLE reminders ADD COLUMN status TEXT NOT NULL DEFAULT 'scheduled'
          CHECK (status IN ('scheduled', 'fired', 'cancelled'));

        CREATE INDEX IF NOT EXISTS idx_reminders_status_due
          ON reminders (status, remind_at);
      `);
    },
  },
];

export const SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version;

export function getSchemaVersion(db: SqliteDatabase): number {
  const version = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/** Apply every migration newer than the database's user_version. */
export function migrate(db: SqliteDatabase): number {
  const current = getSchemaVersion(db);
  const pending = MIGRATIONS.filter((m) => m.version > current);

  for (const migration of pending) {
    const apply = db.transaction(() => {
      migration.up(db);
      db.pragma(`user_version = ${migration.version}`);
    });
    apply();
    logger.info({ version: migration.version, description: migration.description }, 'Applied schema migration');
  }

  return getSchemaVersion(db);
}

/**
 * Open (creating if needed) the knowledge database and bring its schema up
 * to date. Pass `:memory:` for a throwaway database.
 */
export function openDatabase(path: string): SqliteDatabase {
  if (path !== MEMORY_DB_PATH) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db: SqliteDatabase = new Database(path, { timeout: 5000 });

  // NOTE: busy_timeout should be set before attempting journal_mode switches.
  db.pragma('busy_timeout = 5000');
  if (path !== MEMORY_DB_PATH) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('synchronous = NORMAL');

  const version = migrate(db);
  logger.info({ path, schemaVersion: version }, 'SQLite database opened');

  return db;
}
