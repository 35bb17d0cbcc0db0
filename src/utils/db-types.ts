/**
 * Shared database domain types.
 *
 * Keep this file backend-agnostic: the store interface and every caller
 * speak these shapes, never raw rows.
 */

/** Answer stored for a question nobody has answered yet. */
export const PENDING_ANSWER = 'Pending admin response';

/**
 * FAQ lookup key: case-insensitive, whitespace-collapsed, trailing
 * sentence punctuation dropped ("What is the venue?" → "what is the venue").
 */
export function normalizeQuestion(question: string): string {
  return question
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/[\s?!.]+$/, '');
}

export interface FaqEntry {
  id: number;
  groupId: string;
  question: string;
  answer: string;
  frequency: number;
  createdAt: number;
  updatedAt: number;
}

export interface FaqHit {
  answer: string;
  frequency: number;
}

export interface ImportantMessage {
  id: number;
  groupId: string;
  messageId: number;
  content: string;
  createdAt: number;
}

export type ReminderStatus = 'scheduled' | 'fired' | 'cancelled';

export interface Reminder {
  id: number;
  groupId: string;
  messageId: number;
  content: string;
  /** Milliseconds since epoch. */
  remindAt: number;
  status: ReminderStatus;
  createdAt: number;
}
