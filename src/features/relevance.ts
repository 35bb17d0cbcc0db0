/**
 * Relevance classifier — decides whether a group message is "important"
 * enough to archive and announce.
 *
 * Two layers, checked in order:
 * 1. Keyword patterns (fast, case-insensitive)
 * 2. Entity fallback: any DATE, TIME or EVENT span from the recognizer
 */

import type { EntityLabel, EntityRecognizer } from './nlp.js';

export const IMPORTANT_PATTERNS: RegExp[] = [
  /\b(announcement|event|reminder|urgent|critical|deadline)\b/,
  /\b(date|time|location|schedule)\b/,
];

const IMPORTANT_ENTITY_LABELS: ReadonlySet<EntityLabel> = new Set(['DATE', 'TIME', 'EVENT']);

/** First keyword pattern matching the text, or null. */
export function matchImportantKeyword(text: string): RegExp | null {
  const lower = text.toLowerCase();
  return IMPORTANT_PATTERNS.find((pattern) => pattern.test(lower)) ?? null;
}

export function isImportant(text: string, recognizer: EntityRecognizer): boolean {
  if (matchImportantKeyword(text)) return true;

  return recognizer
    .recognize(text.toLowerCase())
    .some((entity) => IMPORTANT_ENTITY_LABELS.has(entity.label));
}
