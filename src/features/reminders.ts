/**
 * Reminders — `/setreminder message | YYYY-MM-DD HH:MM`.
 *
 * Lifecycle: requested → validated → scheduled → fired (or cancelled).
 * The row is written before the timer is armed, so a restart can rebuild
 * the queue from storage via restore(). Each reminder is marked fired
 * before it is delivered, so it is delivered at most once.
 */

import { logger } from '../middleware/logger.js';
import type { KnowledgeStore, Reminder } from '../utils/db.js';
import { FormatError, PastTimeError, UsageError } from '../utils/errors.js';
import { createReminderScheduler, type ReminderScheduler } from './reminder-scheduler.js';

export const SET_REMINDER_USAGE = 'Usage: /setreminder message | YYYY-MM-DD HH:MM';
export const REMINDER_FORMAT_HINT = 'Invalid format. Use: /setreminder message | YYYY-MM-DD HH:MM';

const TIME_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})\s+(\d{1,2}):(\d{2})$/;

/**
 * Parse `YYYY-MM-DD HH:MM` as local time. Rejects impossible calendar
 * values (Feb 30, 24:00) rather than letting Date roll them over.
 */
export function parseReminderTime(timeStr: string): Date {
  const match = TIME_PATTERN.exec(timeStr.trim());
  if (!match) throw new FormatError(REMINDER_FORMAT_HINT, { timeStr });

  const [year, month, day, hour, minute] = match.slice(1).map(Number);
  const date = new Date(year, month - 1, day, hour, minute, 0, 0);

  const roundTrips = date.getFullYear() === year
    && date.getMonth() === month - 1
    && date.getDate() === day
    && date.getHours() === hour
    && date.getMinutes() === minute;
  if (!roundTrips) throw new FormatError(REMINDER_FORMAT_HINT, { timeStr });

  return date;
}

export function formatReminderTime(epochMs: number): string {
  const d = new Date(epochMs);
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

/** Split `/setreminder` arguments into content and time string. */
export function parseSetReminderArgs(args: string): { content: string; timeStr: string } {
  const parts = args.split('|').map((part) => part.trim());
  if (parts.length !== 2 || !parts[0]) throw new UsageError(SET_REMINDER_USAGE);
  return { content: parts[0], timeStr: parts[1] };
}

export function formatReminderNotification(content: string): string {
  return `⏰ Reminder: ${content}`;
}

export function formatReminderList(reminders: Reminder[]): string {
  if (reminders.length === 0) return 'No upcoming reminders.';

  const lines = [`⏰ Upcoming reminders (${reminders.length})`, ''];
  for (const r of reminders) {
    lines.push(`#${r.id} — ${formatReminderTime(r.remindAt)} — ${r.content}`);
  }
  lines.push('', 'Cancel one with /cancelreminder <id>');
  return lines.join('\n');
}

export type ReminderDelivery = (reminder: Reminder) => Promise<void>;

export interface ReminderService {
  /** Validate, persist and schedule. Throws FormatError, PastTimeError or StorageError. */
  requestReminder(groupId: string, messageId: number, content: string, timeStr: string): Promise<Reminder>;
  cancelReminder(groupId: string, id: number): Promise<boolean>;
  listReminders(groupId: string): Promise<Reminder[]>;
  /** Re-queue every scheduled row from storage. Returns how many were queued. */
  restore(): Promise<number>;
  pendingCount(): number;
  stop(): void;
}

export function createReminderService(params: {
  store: KnowledgeStore;
  deliver: ReminderDelivery;
  now?: () => number;
}): ReminderService {
  const { store, deliver } = params;
  const now = params.now ?? Date.now;

  async function fire(id: number): Promise<void> {
    const reminder = await store.getReminder(id);
    if (!reminder || reminder.status !== 'scheduled') {
      logger.debug({ reminderId: id, status: reminder?.status }, 'Skipping reminder that is no longer scheduled');
      return;
    }

    const claimed = await store.markReminderFired(id);
    if (!claimed) return;

    await deliver(reminder);
    logger.info({ reminderId: id, groupId: reminder.groupId }, 'Reminder delivered');
  }

  const scheduler: ReminderScheduler = createReminderScheduler({ onDue: fire, now });

  return {
    async requestReminder(groupId, messageId, content, timeStr) {
      const remindAt = parseReminderTime(timeStr).getTime();
      if (remindAt <= now()) {
        throw new PastTimeError(undefined, { groupId, timeStr });
      }

      const reminder = await store.insertReminder(groupId, messageId, content, remindAt);
      scheduler.schedule(reminder.id, reminder.remindAt);
      return reminder;
    },

    async cancelReminder(groupId, id) {
      const cancelled = await store.cancelReminder(groupId, id);
      if (cancelled) {
        scheduler.cancel(id);
        logger.info({ groupId, reminderId: id }, 'Reminder cancelled');
      }
      return cancelled;
    },

    listReminders: (groupId) => store.listScheduledReminders(groupId),

    async restore() {
      const scheduled = await store.listScheduledReminders();
      for (const reminder of scheduled) {
        scheduler.schedule(reminder.id, reminder.remindAt);
      }
      logger.info({ count: scheduled.length }, 'Scheduled reminders restored');
      return scheduled.length;
    },

    pendingCount: () => scheduler.size(),

    stop() {
      scheduler.clear();
    },
  };
}
