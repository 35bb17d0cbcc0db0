/**
 * Lightweight NLP collaborators — entity recognition and sentence
 * segmentation behind small interfaces.
 *
 * The classifier and question extractor only depend on the interfaces, so a
 * heavier model can be swapped in without touching them. The default
 * implementations are pattern based: no model download, no network, and
 * deterministic in tests.
 */

// ── Contracts ───────────────────────────────────────────────────────

export type EntityLabel = 'DATE' | 'TIME' | 'EVENT';

export interface Entity {
  label: EntityLabel;
  text: string;
  start: number;
  end: number;
}

export interface EntityRecognizer {
  recognize(text: string): Entity[];
}

export interface Token {
  text: string;
  lemma: string;
}

export interface Sentence {
  text: string;
  tokens: Token[];
}

export interface SentenceSegmenter {
  segment(text: string): Sentence[];
}

// ── Entity patterns ─────────────────────────────────────────────────

const MONTH = '(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|jun(?:e)?|jul(?:y)?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';

const ENTITY_PATTERNS: Array<{ label: EntityLabel; pattern: RegExp }> = [
  // "march 3rd", "3 march", "the 3rd of march"
  { label: 'DATE', pattern: new RegExp(`\\b${MONTH}\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?(?:,?\\s+\\d{4})?\\b`, 'gi') },
  { label: 'DATE', pattern: new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)?\\s+(?:of\\s+)?${MONTH}\\b`, 'gi') },
  // Unambiguous month names on their own ("may" and "march" are usually verbs)
  { label: 'DATE', pattern: /\b(?:january|february|april|june|july|august|september|october|november|december)\b/gi },
  { label: 'DATE', pattern: /\b\d{4}-\d{1,2}-\d{1,2}\b/g },
  { label: 'DATE', pattern: /\b\d{1,2}\/\d{1,2}(?:\/\d{2,4})?\b/g },
  { label: 'DATE', pattern: /\b(?:mon|tues|wednes|thurs|fri|satur|sun)days?\b/gi },
  { label: 'DATE', pattern: /\b(?:today|tomorrow|tonight|yesterday)\b/gi },
  { label: 'DATE', pattern: /\b(?:next|this|last)\s+(?:week|weekend|month|year)\b/gi },
  { label: 'DATE', pattern: /\bin\s+\d+\s+(?:days?|weeks?|months?)\b/gi },

  { label: 'TIME', pattern: /\b\d{1,2}:\d{2}(?:\s*[ap]\.?m\.?)?(?![\w:])/gi },
  { label: 'TIME', pattern: /\b\d{1,2}\s*[ap]\.?m\b\.?/gi },
  { label: 'TIME', pattern: /\b(?:noon|midnight)\b/gi },
  { label: 'TIME', pattern: /\b(?:this|tomorrow)\s+(?:morning|afternoon|evening)\b/gi },

  // Named happenings: "the spring hackathon", "city marathon"
  {
    label: 'EVENT',
    pattern: /\b(?:[a-z0-9'-]+\s+){1,3}(?:festival|conference|summit|meetup|hackathon|expo|championship|marathon|olympics|concert|workshop|webinar)s?\b/gi,
  },
];

/** Regex-driven recognizer for DATE, TIME and EVENT spans. */
export function createPatternEntityRecognizer(): EntityRecognizer {
  return {
    recognize(text: string): Entity[] {
      const entities: Entity[] = [];
      for (const { label, pattern } of ENTITY_PATTERNS) {
        for (const match of text.matchAll(pattern)) {
          const start = match.index ?? 0;
          entities.push({ label, text: match[0], start, end: start + match[0].length });
        }
      }
      return entities.sort((a, b) => a.start - b.start);
    },
  };
}

// ── Segmentation + lemmas ───────────────────────────────────────────

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+|\n+/;

const WORD_PATTERN = /[\p{L}\p{N}]+(?:'[\p{L}]+)*|[^\s\p{L}\p{N}]/gu;
const CLITIC_PATTERN = /^(.+?)(n't|'s|'re|'ll|'d|'ve|'m)$/i;

const IRREGULAR_LEMMAS: Record<string, string> = {
  is: 'be',
  are: 'be',
  was: 'be',
  were: 'be',
  am: 'be',
  been: 'be',
  "'re": 'be',
  "'m": 'be',
  "n't": 'not',
  "'ve": 'have',
  has: 'have',
  had: 'have',
  "'ll": 'will',
  "'d": 'would',
  does: 'do',
  did: 'do',
};

export function lemmatize(word: string): string {
  const lower = word.toLowerCase();
  return IRREGULAR_LEMMAS[lower] ?? lower;
}

/** Split "what's" into "what" + "'s" and "don't" into "do" + "n't". */
function splitClitic(word: string): string[] {
  const match = CLITIC_PATTERN.exec(word);
  return match ? [match[1], match[2]] : [word];
}

export function tokenize(text: string): Token[] {
  const normalized = text.replace(/\u2019/g, "'");
  const words = Array.from(normalized.matchAll(WORD_PATTERN), (m) => m[0]).flatMap(splitClitic);
  return words.map((word) => ({ text: word, lemma: lemmatize(word) }));
}

/** Punctuation/newline sentence splitter with per-token lemmas. */
export function createPatternSegmenter(): SentenceSegmenter {
  return {
    segment(text: string): Sentence[] {
      return text
        .split(SENTENCE_BOUNDARY)
        .map((part) => part.trim())
        .filter(Boolean)
        .map((part) => ({ text: part, tokens: tokenize(part) }));
    },
  };
}
