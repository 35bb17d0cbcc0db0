import type { SentenceSegmenter } from './nlp.js';

/** Lemmas that mark a sentence as a question even without a "?". */
export const QUESTION_LEMMAS: ReadonlySet<string> = new Set(['what', 'how', 'when', 'where', 'why']);

/**
 * Pull the first question-like sentence out of a message.
 * A sentence qualifies if it contains "?" or a wh-word lemma.
 */
export function extractQuestion(text: string, segmenter: SentenceSegmenter): string | null {
  for (const sentence of segmenter.segment(text)) {
    const isQuestion = sentence.text.includes('?')
      || sentence.tokens.some((token) => QUESTION_LEMMAS.has(token.lemma));
    if (isQuestion) return sentence.text.trim();
  }
  return null;
}
