import type { Config } from '../config';
import { QualityRejectedError } from '../errors';
import type { Article, CleanedDocument } from '../types';
import { sanitizeHtml } from '../utils/sanitize';
import { BOILERPLATE, NAVIGATION_LINE, countBoilerplate, countUrls } from './patterns';

const HTML_TAG = /<\/?[a-z][^>]*>/i;
const LETTER = /\p{L}/gu;
const WORD = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*/gu;

// Lines shorter than this are checked for boilerplate and repetition
const BOILERPLATE_LINE_MAX = 200;
const SHORT_LINE_MAX = 120;

export type NormalizerOptions = Config['normalizer'];

export interface QualitySignals {
  score: number;
  alphaRatio: number;
  wordCount: number;
  avgSentenceLength: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function alphaRatio(text: string): number {
  const nonSpace = text.replace(/\s+/g, '').length;
  if (nonSpace === 0) return 0;
  return (text.match(LETTER)?.length ?? 0) / nonSpace;
}

/**
 * Remove markup and page chrome from article text. Pure.
 * Encoded markup such as `&lt;b&gt;` decodes to literal text, so a second pass
 * over that output may strip it.
 */
export function normalizeText(rawText: string): string {
  if (!rawText) return '';

  const text = HTML_TAG.test(rawText) ? sanitizeHtml(rawText) : rawText;
  const lines = text
    .replace(/\r\n?/g, '\n')
    .replace(/\u00a0/g, ' ')
    .split('\n')
    .map(line => line.replace(/[ \t\f\v]+/g, ' ').trim());

  const seenShortLines = new Set<string>();
  const kept: string[] = [];

  for (const line of lines) {
    if (line.length < 3) continue;
    if (NAVIGATION_LINE.test(line)) continue;
    if (line.length < BOILERPLATE_LINE_MAX && BOILERPLATE.test(line)) continue;
    if (countUrls(line) >= 2) continue;

    if (line.length < SHORT_LINE_MAX) {
      if (alphaRatio(line) < 0.5) continue;
      // Repeated nav/footer phrases: keep only the first occurrence
      const key = line.toLowerCase();
      if (seenShortLines.has(key)) continue;
      seenShortLines.add(key);
    }

    kept.push(line);
  }

  return kept.join('\n').trim();
}

/**
 * Quality score in [0, 1] from the alphabetic ratio, the average sentence length
 * and the word count.
 */
export function scoreText(text: string, minWordCount: number): QualitySignals {
  const words = text.match(WORD)?.length ?? 0;
  const sentences = text
    .split(/(?<=[.!?。])\s+|\n+/)
    .filter(sentence => /[\p{L}\p{N}]/u.test(sentence)).length;
  const avgSentenceLength = sentences > 0 ? words / sentences : 0;
  const ratio = alphaRatio(text);

  const alphaScore = clamp((ratio - 0.5) / 0.35, 0, 1);
  let sentenceScore: number;
  if (avgSentenceLength < 8) {
    sentenceScore = avgSentenceLength / 8;
  } else if (avgSentenceLength <= 40) {
    sentenceScore = 1;
  } else {
    sentenceScore = Math.max(0, 1 - (avgSentenceLength - 40) / 60);
  }
  const wordScore = Math.min(1, words / minWordCount);

  const score = 0.4 * alphaScore + 0.3 * sentenceScore + 0.3 * wordScore;
  return {
    score: Math.round(score * 1000) / 1000,
    alphaRatio: ratio,
    wordCount: words,
    avgSentenceLength,
  };
}

export class Normalizer {
  constructor(private readonly options: NormalizerOptions) {}

  /**
   * Clean an article and decide whether it is worth indexing.
   * @throws QualityRejectedError when the article falls below a threshold
   */
  normalize(article: Pick<Article, 'id' | 'rawText'>): CleanedDocument {
    const { minChars, minQualityScore, minWordCount, maxBoilerplateMatches } = this.options;
    const raw = article.rawText ?? '';

    if (raw.trim().length === 0) {
      throw new QualityRejectedError('empty', 'no text');
    }
    if (raw.length < minChars) {
      throw new QualityRejectedError('too_short', `raw length ${raw.length} < ${minChars}`);
    }

    const text = normalizeText(raw);
    if (text.length === 0) {
      throw new QualityRejectedError('empty', 'nothing left after cleaning');
    }
    if (text.length < minChars) {
      throw new QualityRejectedError('too_short', `cleaned length ${text.length} < ${minChars}`);
    }

    const boilerplate = countBoilerplate(text);
    if (boilerplate > maxBoilerplateMatches) {
      throw new QualityRejectedError('boilerplate', `${boilerplate} boilerplate matches`);
    }

    const { score } = scoreText(text, minWordCount);
    if (score < minQualityScore) {
      throw new QualityRejectedError('low_quality', `score ${score} < ${minQualityScore}`);
    }

    return { articleId: article.id, text, qualityScore: score };
  }
}
