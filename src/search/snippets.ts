import { normalizeText } from '../ingestion/normalizer';
import { SNIPPET_NOISE } from '../ingestion/patterns';

export const SNIPPET_MIN_CHARS = 40;
export const SNIPPET_MAX_CHARS = 300;

const SENTENCE_END = /(?<=[.?!])\s+/;

/**
 * First sentence of at least SNIPPET_MIN_CHARS that is not page chrome, capped at
 * SNIPPET_MAX_CHARS. Falls back to the start of the cleaned text.
 */
export function firstCleanSentence(text: string): string {
  if (!text) return '';

  const cleaned = normalizeText(text).replace(/\s+/g, ' ').trim();
  for (const part of cleaned.split(SENTENCE_END)) {
    const sentence = part.trim();
    if (sentence.length >= SNIPPET_MIN_CHARS && !SNIPPET_NOISE.test(sentence)) {
      return sentence.slice(0, SNIPPET_MAX_CHARS);
    }
  }
  return cleaned.slice(0, SNIPPET_MAX_CHARS);
}

export function isNoise(snippet: string): boolean {
  return SNIPPET_NOISE.test(snippet);
}
