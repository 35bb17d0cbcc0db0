import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';

import { getSchemaVersion, migrate, openDatabase, SCHEMA_VERSION } from '../src/utils/db-schema.js';
import { createSqliteStore } from '../src/utils/db-sqlite.js';
import { MEMORY_DB_PATH, normalizeQuestion, PENDING_ANSWER, type KnowledgeStore } from '../src/utils/db.js';
import { StorageError } from '../src/utils/errors.js';

describe('schema migrations', () => {
  it('brings a fresh database to the latest version', () => {
    const db = openDatabase(MEMORY_DB_PATH);
    expect(getSchemaVersion(db)).toBe(SCHEMA_VERSION);
    expect(SCHEMA_VERSION).toBe(2);
    db.close();
  });

  it('is a no-op when already current', () => {
    const db = openDatabase(MEMORY_DB_PATH);
    expect(migrate(db)).toBe(SCHEMA_VERSION);
    db.close();
  });

  it('collapses duplicate questions from a version 1 database', () => {
    const db = new Database(':memory:');
    db.exec(`
      CREATE TABLE knowledge (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        group_id TEXT NOT NULL,
        question TEXT NOT NULL,
        answer TEXT NOT NULL,
        frequency INTEGER NOT NULL DEFAULT 1 CHECK (frequency >= 1),
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );
      CREATE TABLE important_messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        group_id TEXT NOT NULL,
        message_id INTEGER NOT NULL,
        content TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );
      CREATE TABLE reminders (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        group_id TEXT NOT NULL,
        message_id INTEGER NOT NULL,
        content TEXT NOT NULL,
        remind_at INTEGER NOT NULL,
        created_at INTEGER NOT NULL
      );
      INSERT INTO knowledge (group_id, question, answer, frequency, created_at, updated_at) VALUES
        ('42', 'What is the venue?', 'Pending admin response', 3, 1, 1),
        ('42', 'what is the venue?', 'Building 5', 2, 2, 2),
        ('7', 'What is the venue?', 'Hall B', 1, 3, 3);
      INSERT INTO reminders (group_id, message_id, content, remind_at, created_at) VALUES ('42', 1, 'standup', 1000, 1);
    `);
    db.pragma('user_version = 1');

    expect(migrate(db)).toBe(2);

    const rows = db.prepare('SELECT group_id, answer, frequency FROM knowledge ORDER BY group_id').all();
    expect(rows).toEqual([
      { group_id: '42', answer: 'Building 5', frequency: 5 },
      { group_id: '7', answer: 'Hall B', frequency: 1 },
    ]);

    const reminder = db.prepare('SELECT status FROM reminders').get();
    expect(reminder).toEqual({ status: 'scheduled' });
    db.close();
  });
});

describe('normalizeQuestion', () => {
  it('lowercases, collapses whitespace and drops trailing punctuation', () => {
    expect(normalizeQuestion('  What  Is The\tVenue?  ')).toBe('what is the venue');
    expect(normalizeQuestion('Where is it?!')).toBe('where is it');
    expect(normalizeQuestion('Is 3.5 ok?')).toBe('is 3.5 ok');
  });
});

describe('SQLite knowledge store', () => {
  let store: KnowledgeStore;

  beforeEach(() => {
    store = createSqliteStore(openDatabase(MEMORY_DB_PATH));
  });

  afterEach(async () => {
    await store.close();
  });

  describe('FAQ', () => {
    it('returns undefined for an unknown question', async () => {
      expect(await store.lookupFaq('42', 'what is the venue')).toBeUndefined();
    });

    it('increments frequency on every hit', async () => {
      await store.insertFaq('42', 'what is the venue', 'Building 5');

      expect(await store.lookupFaq('42', 'what is the venue')).toEqual({ answer: 'Building 5', frequency: 2 });
      expect(await store.lookupFaq('42', 'what is the venue')).toEqual({ answer: 'Building 5', frequency: 3 });
    });

    it('matches case-insensitively and ignores outer whitespace', async () => {
      await store.insertFaq('42', 'What is the venue', 'Building 5');
      expect(await store.lookupFaq('42', '  WHAT IS THE VENUE ')).toEqual({ answer: 'Building 5', frequency: 2 });
    });

    it('does not match across groups', async () => {
      await store.insertFaq('42', 'what is the venue', 'Building 5');
      expect(await store.lookupFaq('43', 'what is the venue')).toBeUndefined();
    });

    it('ignores a trailing question mark', async () => {
      await store.insertFaq('42', 'what is the venue', 'Building 5');
      expect(await store.lookupFaq('42', 'What is the venue?')).toEqual({ answer: 'Building 5', frequency: 2 });
    });

    it('does not match a different question', async () => {
      await store.insertFaq('42', 'what is the venue', 'Building 5');
      expect(await store.lookupFaq('42', 'what is the venue address')).toBeUndefined();
    });

    it('upserts over a pending row and keeps its frequency', async () => {
      const pending = await store.insertFaq('42', 'when is lunch?', PENDING_ANSWER, 1);
      await store.lookupFaq('42', 'when is lunch?');

      const answered = await store.insertFaq('42', 'When is lunch?', 'Noon', 1);
      expect(answered.id).toBe(pending.id);
      expect(answered.answer).toBe('Noon');
      expect(answered.question).toBe('When is lunch?');
      expect(answered.frequency).toBe(2);

      const faqs = await store.listFaqs('42');
      expect(faqs).toHaveLength(1);
    });

    it('lists FAQs by frequency, most asked first', async () => {
      await store.insertFaq('42', 'a', 'one');
      await store.insertFaq('42', 'b', 'two');
      await store.lookupFaq('42', 'b');
      await store.insertFaq('43', 'c', 'three');

      const faqs = await store.listFaqs('42');
      expect(faqs.map((f) => [f.question, f.frequency])).toEqual([['b', 2], ['a', 1]]);
    });
  });

  describe('important messages', () => {
    it('appends and lists newest first with a limit', async () => {
      await store.insertImportantMessage('42', 1, 'deadline friday');
      await store.insertImportantMessage('42', 2, 'event saturday');
      await store.insertImportantMessage('42', 3, 'urgent: room change');
      await store.insertImportantMessage('43', 4, 'other group');

      const latest = await store.listImportantMessages('42', 2);
      expect(latest.map((m) => m.messageId)).toEqual([3, 2]);
      expect(latest[0]).toMatchObject({ groupId: '42', content: 'urgent: room change' });
    });
  });

  describe('reminders', () => {
    it('stores reminders as scheduled', async () => {
      const reminder = await store.insertReminder('42', 10, 'standup', 5_000);
      expect(reminder).toMatchObject({ groupId: '42', messageId: 10, content: 'standup', remindAt: 5_000, status: 'scheduled' });
      expect(await store.getReminder(reminder.id)).toEqual(reminder);
    });

    it('lists scheduled reminders by due time, per group or all', async () => {
      const late = await store.insertReminder('42', 1, 'late', 9_000);
      const early = await store.insertReminder('42', 2, 'early', 1_000);
      const other = await store.insertReminder('43', 3, 'other', 5_000);

      expect((await store.listScheduledReminders('42')).map((r) => r.id)).toEqual([early.id, late.id]);
      expect((await store.listScheduledReminders()).map((r) => r.id)).toEqual([early.id, other.id, late.id]);
    });

    it('marks a reminder fired only once', async () => {
      const reminder = await store.insertReminder('42', 1, 'standup', 1_000);
      expect(await store.markReminderFired(reminder.id)).toBe(true);
      expect(await store.markReminderFired(reminder.id)).toBe(false);
      expect((await store.getReminder(reminder.id))?.status).toBe('fired');
      expect(await store.listScheduledReminders()).toEqual([]);
    });

    it('cancels only within the owning group', async () => {
      const reminder = await store.insertReminder('42', 1, 'standup', 1_000);
      expect(await store.cancelReminder('43', reminder.id)).toBe(false);
      expect(await store.cancelReminder('42', reminder.id)).toBe(true);
      expect(await store.cancelReminder('42', reminder.id)).toBe(false);
      expect(await store.markReminderFired(reminder.id)).toBe(false);
    });
  });

  it('wraps driver failures in StorageError', async () => {
    const db = openDatabase(MEMORY_DB_PATH);
    const broken = createSqliteStore(db);
    db.exec('DROP TABLE reminders');

    await expect(broken.insertReminder('42', 1, 'standup', 1_000)).rejects.toBeInstanceOf(StorageError);
    db.close();
  });
});
