import { LOCAL_EMBEDDING_DIMENSIONS, LOCAL_EMBEDDING_MODEL } from '../config';
import type { EmbeddingBackend } from './backend';

const TOKEN = /[\p{L}\p{N}]+/gu;

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/** 32-bit FNV-1a over UTF-16 code units */
export function fnv1a(value: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN) ?? [];
}

/**
 * Feature-hashing bag of words: unigrams and adjacent bigrams, signed buckets,
 * sublinear term frequency, L2-normalized. Runs on CPU with no model download.
 */
export class LocalHashingBackend implements EmbeddingBackend {
  readonly kind = 'local' as const;

  constructor(
    readonly dimensions: number = LOCAL_EMBEDDING_DIMENSIONS,
    readonly modelName: string = LOCAL_EMBEDDING_MODEL
  ) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new RangeError(`dimensions must be a positive integer, got ${dimensions}`);
    }
  }

  embed(texts: string[]): Promise<number[][]> {
    return Promise.resolve(texts.map(text => this.embedOne(text)));
  }

  embedOne(text: string): number[] {
    const tokens = tokenize(text);
    const counts = new Map<string, number>();
    const add = (feature: string) => counts.set(feature, (counts.get(feature) ?? 0) + 1);

    tokens.forEach((token, i) => {
      add(token);
      if (i > 0) add(`${tokens[i - 1]} ${token}`);
    });

    const vector = new Array<number>(this.dimensions).fill(0);
    for (const [feature, tf] of counts) {
      const hash = fnv1a(feature);
      const sign = hash & 0x80000000 ? -1 : 1;
      vector[hash % this.dimensions] += sign * (1 + Math.log(tf));
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map(v => v / norm);
  }
}
