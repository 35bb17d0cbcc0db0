/**
 * One-shot delay queue for reminders.
 *
 * Each entry is a timer keyed by reminder id. Entries can be cancelled by
 * id, and all of them are cleared on shutdown; the durable copy lives in
 * the reminders table and is re-queued by ReminderService.restore().
 */

import { logger } from '../middleware/logger.js';

/** setTimeout overflows past 2^31-1 ms (~24.8 days); longer waits are chained. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type DueHandler = (id: number) => Promise<void>;

export interface ReminderScheduler {
  /** Queue (or re-queue) an entry to fire at `dueAt` epoch ms. Past times fire on the next tick. */
  schedule(id: number, dueAt: number): void;
  cancel(id: number): boolean;
  has(id: number): boolean;
  size(): number;
  /** Drop every pending timer (graceful shutdown). */
  clear(): void;
}

export function createReminderScheduler(params: {
  onDue: DueHandler;
  now?: () => number;
}): ReminderScheduler {
  const { onDue } = params;
  const now = params.now ?? Date.now;
  const timers = new Map<number, ReturnType<typeof setTimeout>>();

  function arm(id: number, dueAt: number): void {
    const delay = Math.max(0, dueAt - now());

    if (delay > MAX_TIMER_DELAY_MS) {
      timers.set(id, setTimeout(() => arm(id, dueAt), MAX_TIMER_DELAY_MS));
      return;
    }

    timers.set(id, setTimeout(() => {
      timers.delete(id);
      onDue(id).catch((err: unknown) => {
        logger.error({ err, reminderId: id }, 'Reminder delivery failed');
      });
    }, delay));
  }

  return {
    schedule(id, dueAt) {
      const existing = timers.get(id);
      if (existing) clearTimeout(existing);
      arm(id, dueAt);
      logger.debug({ reminderId: id, dueAt: new Date(dueAt).toISOString() }, 'Reminder scheduled');
    },

    cancel(id) {
      const timer = timers.get(id);
      if (!timer) return false;
      clearTimeout(timer);
      timers.delete(id);
      return true;
    },

    has: (id) => timers.has(id),

    size: () => timers.size,

    clear() {
      for (const timer of timers.values()) {
        clearTimeout(timer);
      }
      timers.clear();
    },
  };
}
