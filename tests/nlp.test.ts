import { describe, it, expect } from 'vitest';

import {
  createPatternEntityRecognizer,
  createPatternSegmenter,
  lemmatize,
  tokenize,
} from '../src/features/nlp.js';

describe('pattern entity recognizer', () => {
  const recognizer = createPatternEntityRecognizer();

  it('finds month-day dates with their span', () => {
    expect(recognizer.recognize('see you on march 3rd')).toEqual([
      { label: 'DATE', text: 'march 3rd', start: 11, end: 20 },
    ]);
  });

  it('finds named times', () => {
    expect(recognizer.recognize('lunch at noon')).toEqual([
      { label: 'TIME', text: 'noon', start: 9, end: 13 },
    ]);
  });

  it('finds clock times and relative days', () => {
    const labels = recognizer.recognize('meet tomorrow at 7:30pm').map((e) => e.label);
    expect(labels).toContain('DATE');
    expect(labels).toContain('TIME');
  });

  it('finds named events', () => {
    const entities = recognizer.recognize('who is going to the spring hackathon');
    expect(entities.map((e) => e.label)).toEqual(['EVENT']);
    expect(entities[0].text.endsWith('spring hackathon')).toBe(true);
  });

  it('returns nothing for small talk', () => {
    expect(recognizer.recognize('hello everyone, nice to meet you')).toEqual([]);
  });

  it('does not treat "may" the verb as a date', () => {
    expect(recognizer.recognize('you may want to check this')).toEqual([]);
  });
});

describe('tokenize', () => {
  it('splits clitics and lemmatizes them', () => {
    expect(tokenize("What's up?")).toEqual([
      { text: 'What', lemma: 'what' },
      { text: "'s", lemma: "'s" },
      { text: 'up', lemma: 'up' },
      { text: '?', lemma: '?' },
    ]);
  });

  it('handles negation and curly apostrophes', () => {
    expect(tokenize('Don’t go').map((t) => t.lemma)).toEqual(['do', 'not', 'go']);
  });

  it('maps irregular verb forms', () => {
    expect(lemmatize('Were')).toBe('be');
    expect(lemmatize('Venue')).toBe('venue');
  });
});

describe('pattern segmenter', () => {
  const segmenter = createPatternSegmenter();

  it('splits on sentence punctuation and newlines', () => {
    expect(segmenter.segment('Hello all. When is lunch? See you\nbye').map((s) => s.text)).toEqual([
      'Hello all.',
      'When is lunch?',
      'See you',
      'bye',
    ]);
  });

  it('attaches tokens to each sentence', () => {
    const [sentence] = segmenter.segment('Where is it');
    expect(sentence.tokens.map((t) => t.lemma)).toEqual(['where', 'be', 'it']);
  });

  it('returns no sentences for blank text', () => {
    expect(segmenter.segment('  \n ')).toEqual([]);
  });
});
