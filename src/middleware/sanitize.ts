/**
 * Input sanitization middleware — cleans user input before processing.
 *
 * 1. Message length limits — reject anything over the Telegram maximum
 * 2. Control character stripping — null bytes, zero-width chars, RTL overrides
 * 3. Command argument truncation
 */

import { logger } from './logger.js';

// ── Constants ───────────────────────────────────────────────────────

/** Maximum message length we'll process (chars). Telegram's own cap. */
export const MAX_MESSAGE_LENGTH = 4096;

/** Maximum length for command arguments (/addfaq, /setreminder) */
export const MAX_COMMAND_ARG_LENGTH = 1024;

// ── Control character stripping ─────────────────────────────────────

/**
 * Strip invisible control characters from user input.
 * Removes: null bytes, C0 controls other than tab/newline, zero-width
 * spaces/joiners and directional overrides.
 */
export function stripControlChars(text: string): string {
  return text
    // Null bytes and C0 controls (keep \t, \n, \r)
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '')
    // Zero-width characters (U+200B-U+200F, U+FEFF)
    .replace(/[\u200B-\u200F\uFEFF]/g, '')
    // Directional overrides (U+202A-U+202E, U+2066-U+2069)
    .replace(/[\u202A-\u202E\u2066-\u2069]/g, '')
    // Paragraph/line separators
    .replace(/[\u2028\u2029]/g, '\n')
    .trim();
}

// ── Message length enforcement ──────────────────────────────────────

/**
 * Check if a message exceeds length limits. Returns null if OK,
 * or a rejection reason if too long.
 */
export function checkMessageLength(text: string): string | null {
  if (text.length > MAX_MESSAGE_LENGTH) {
    logger.warn({ length: text.length, max: MAX_MESSAGE_LENGTH }, 'Message exceeds length limit');
    return `Message too long (${text.length} chars, max ${MAX_MESSAGE_LENGTH}).`;
  }
  return null;
}

// ── Command argument sanitization ───────────────────────────────────

export function sanitizeCommandArg(arg: string): string {
  const cleaned = stripControlChars(arg);
  if (cleaned.length > MAX_COMMAND_ARG_LENGTH) {
    return cleaned.slice(0, MAX_COMMAND_ARG_LENGTH);
  }
  return cleaned;
}

// ── Combined sanitization pipeline ──────────────────────────────────

export interface SanitizeResult {
  text: string;
  rejected: boolean;
  rejectionReason?: string;
}

/**
 * Run the sanitization pipeline on an incoming message.
 * Empty (after stripping) and oversized messages are rejected.
 */
export function sanitizeMessage(text: string): SanitizeResult {
  const cleaned = stripControlChars(text);

  if (!cleaned) {
    return { text: cleaned, rejected: true, rejectionReason: 'Empty message' };
  }

  const lengthError = checkMessageLength(cleaned);
  if (lengthError) {
    return { text: cleaned, rejected: true, rejectionReason: lengthError };
  }

  return { text: cleaned, rejected: false };
}
