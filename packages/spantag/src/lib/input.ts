import type { CharSequence } from './types.js';
import { InvalidInputTypeError, describeValue } from './errors.js';

export interface NormalizedText {
  chars: string[];
  /** true when the caller passed a character list rather than a string */
  tokenized: boolean;
}

function isCharList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

/**
 * Split a raw string into code points, or copy a pre-tokenized list.
 * Throws InvalidInputTypeError for anything else.
 */
export function normalizeText(value: unknown, index = 0): NormalizedText {
  if (typeof value === 'string') return { chars: Array.from(value), tokenized: false };
  if (isCharList(value)) return { chars: [...value], tokenized: true };
  throw new InvalidInputTypeError(index, describeValue(value));
}

/**
 * Normalize every text of a batch. Each item is classified on its own, so
 * raw and pre-tokenized texts can be mixed. The whole batch is validated
 * before anything is returned.
 */
export function normalizeBatch(texts: unknown): NormalizedText[] {
  if (!Array.isArray(texts)) throw new InvalidInputTypeError(-1, describeValue(texts));
  return texts.map((text: unknown, i) => normalizeText(text, i));
}

export function charSequences(batch: readonly NormalizedText[]): CharSequence[] {
  return batch.map(item => item.chars);
}
