import type { CharSequence, Chunk, ChunkOptions, Entity, ProbabilityMatrix } from './types.js';
import { extractChunks } from './chunks.js';

/**
 * Confidence of each decoded position: the matrix value in the column of the
 * label chosen for it. A label outside the vocabulary falls back to the row
 * maximum. Values are taken as-is, never renormalized.
 */
export function positionConfidences(
  matrix: ProbabilityMatrix,
  tags: readonly string[],
  labels: readonly string[]
): number[] {
  const columns = new Map<string, number>();
  labels.forEach((label, k) => {
    if (!columns.has(label)) columns.set(label, k);
  });

  return tags.map((tag, t) => {
    const row = matrix[t] ?? [];
    const k = columns.get(tag);
    const v = k === undefined ? undefined : row[k];
    if (v !== undefined) return v;
    return row.length > 0 ? Math.max(...row) : 0;
  });
}

/**
 * Mean confidence over [chunk.start, chunk.end).
 */
export function scoreChunk(chunk: Chunk, confidences: readonly number[]): number {
  const width = chunk.end - chunk.start;
  if (width <= 0) return 0;

  let sum = 0;
  for (let t = chunk.start; t < chunk.end; t++) sum += confidences[t] ?? 0;
  return sum / width;
}

export function entityFromChunk(chunk: Chunk, chars: CharSequence, confidences: readonly number[]): Entity {
  return {
    text: chars.slice(chunk.start, chunk.end).join(''),
    type: chunk.type,
    score: scoreChunk(chunk, confidences),
    beginOffset: chunk.start,
    endOffset: chunk.end
  };
}

/**
 * Chunk a tag sequence and turn each chunk into a scored entity over `chars`.
 *
 * `tags` covers a prefix of `chars` (the decoded length), so entity offsets
 * never reach past the decoded characters.
 */
export function entitiesFromTags(
  chars: CharSequence,
  tags: readonly string[],
  matrix: ProbabilityMatrix,
  labels: readonly string[],
  opts?: ChunkOptions
): Entity[] {
  const confidences = positionConfidences(matrix, tags, labels);
  return extractChunks(tags, opts).map(chunk => entityFromChunk(chunk, chars, confidences));
}
