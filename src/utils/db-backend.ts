import type {
  FaqEntry,
  FaqHit,
  ImportantMessage,
  Reminder,
} from './db-types.js';

/**
 * Storage contract the assistant's features depend on.
 *
 * Every operation is partitioned by group id. Implementations wrap
 * driver failures in `StorageError`.
 */
export interface KnowledgeStore {
  // FAQ
  /** Upsert on (group, normalized question). An existing row keeps its frequency. */
  insertFaq(groupId: string, question: string, answer: string, frequency?: number): Promise<FaqEntry>;
  /** Case-insensitive exact match; a hit increments frequency atomically. */
  lookupFaq(groupId: string, question: string): Promise<FaqHit | undefined>;
  listFaqs(groupId: string): Promise<FaqEntry[]>;

  // Important messages
  insertImportantMessage(groupId: string, messageId: number, content: string): Promise<ImportantMessage>;
  listImportantMessages(groupId: string, limit?: number): Promise<ImportantMessage[]>;

  // Reminders
  insertReminder(groupId: string, messageId: number, content: string, remindAt: number): Promise<Reminder>;
  getReminder(id: number): Promise<Reminder | undefined>;
  /** Scheduled reminders ordered by due time; all groups when groupId is omitted. */
  listScheduledReminders(groupId?: string): Promise<Reminder[]>;
  markReminderFired(id: number): Promise<boolean>;
  cancelReminder(groupId: string, id: number): Promise<boolean>;

  // Lifecycle
  close(): Promise<void>;
}
