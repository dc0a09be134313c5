import type {
  LabelDecoder,
  ParsedTag,
  ProbabilityBatch,
  ProbabilityMatrix,
  TagScheme,
  TagSequence,
  ViterbiOptions
} from './types.js';
import { parseTag } from './chunks.js';

interface VCell {
  score: number;
  prev: number | null;
}

function argmax(row: readonly number[]): number {
  let best = -1;
  let bestValue = -Infinity;
  for (let k = 0; k < row.length; k++) {
    const v = row[k] ?? -Infinity;
    if (best < 0 || v > bestValue) {
      best = k;
      bestValue = v;
    }
  }
  return best;
}

function decodedLength(matrix: ProbabilityMatrix, length: number): number {
  return Math.max(0, Math.min(length, matrix.length));
}

/**
 * Per-position argmax over `labels`. Ties go to the lowest column.
 */
export function argmaxDecoder(labels: readonly string[]): LabelDecoder {
  return {
    labels,
    decode(matrix: ProbabilityMatrix, length: number): TagSequence {
      const n = decodedLength(matrix, length);
      const tags: TagSequence = [];
      for (let t = 0; t < n; t++) {
        const k = argmax(matrix[t] ?? []);
        tags.push(labels[k] ?? 'O');
      }
      return tags;
    }
  };
}

/**
 * Whether `curr` may follow `prev` (undefined at the start of a sequence).
 *
 * Inside labels (and end labels under BIOES) need an open chunk of the same
 * type. Under BIOES an open chunk must be continued or ended.
 */
export function allowedTransition(prev: ParsedTag | undefined, curr: ParsedTag, scheme: TagScheme): boolean {
  const continues = curr.role === 'I' || (scheme === 'BIOES' && curr.role === 'E');
  const open = prev !== undefined && (prev.role === 'B' || prev.role === 'I');

  if (continues) return open && prev.type === curr.type;
  if (scheme === 'BIOES' && open) return false;
  return true;
}

function allowedEnd(last: ParsedTag, scheme: TagScheme): boolean {
  return scheme !== 'BIOES' || (last.role !== 'B' && last.role !== 'I');
}

/**
 * Best label path under BIO/BIOES transition constraints.
 *
 * Emissions are summed log-probabilities (or raw scores); every allowed
 * transition scores 0 and forbidden ones are pruned. Falls back to argmax for
 * an item with no admissible path.
 */
export function viterbiDecoder(labels: readonly string[], opts?: ViterbiOptions): LabelDecoder {
  const scheme = opts?.scheme ?? 'BIO';
  const useLogs = (opts?.emissions ?? 'probabilities') === 'probabilities';
  const epsilon = opts?.epsilon ?? 1e-12;

  const parsed = labels.map(l => parseTag(l, opts?.chunk));
  const fallback = argmaxDecoder(labels);

  // transition table, indexed [prev][curr]
  const allowed: boolean[][] = parsed.map(p => parsed.map(c => allowedTransition(p, c, scheme)));
  const allowedStart = parsed.map(c => allowedTransition(undefined, c, scheme));
  const allowedLast = parsed.map(c => allowedEnd(c, scheme));

  function emission(row: readonly number[] | undefined, k: number): number {
    const v = row?.[k];
    if (v === undefined) return -Infinity;
    return useLogs ? Math.log(Math.max(v, epsilon)) : v;
  }

  return {
    labels,
    decode(matrix: ProbabilityMatrix, length: number): TagSequence {
      const n = decodedLength(matrix, length);
      const K = labels.length;
      if (n === 0 || K === 0) return fallback.decode(matrix, n);

      const lattice: VCell[][] = [];

      lattice[0] = parsed.map((_, k) => ({
        score: allowedStart[k] ? emission(matrix[0], k) : -Infinity,
        prev: null
      }));

      for (let t = 1; t < n; t++) {
        const column: VCell[] = [];
        const before = lattice[t - 1] ?? [];

        for (let k = 0; k < K; k++) {
          let bestScore = -Infinity;
          let bestPrev: number | null = null;

          for (let j = 0; j < K; j++) {
            if (!allowed[j]?.[k]) continue;
            const score = before[j]?.score ?? -Infinity;
            if (score > bestScore) {
              bestScore = score;
              bestPrev = j;
            }
          }

          column.push({ score: bestScore + emission(matrix[t], k), prev: bestPrev });
        }

        lattice[t] = column;
      }

      let lastIndex = -1;
      let lastScore = -Infinity;
      const lastCol = lattice[n - 1] ?? [];
      for (let k = 0; k < K; k++) {
        const score = lastCol[k]?.score ?? -Infinity;
        if (allowedLast[k] && score > lastScore) {
          lastScore = score;
          lastIndex = k;
        }
      }

      if (lastIndex < 0) return fallback.decode(matrix, n);

      const path: TagSequence = [];
      let cursor: number | null = lastIndex;
      for (let t = n - 1; t >= 0 && cursor !== null; t--) {
        path.unshift(labels[cursor] ?? 'O');
        cursor = lattice[t]?.[cursor]?.prev ?? null;
      }

      return path;
    }
  };
}

/**
 * Decode every item of a batch with its own length. This is the shape
 * `Preprocessor.labelDecode` takes.
 */
export function decodeLabels(decoder: LabelDecoder, batch: ProbabilityBatch, lengths: readonly number[]): TagSequence[] {
  return lengths.map((length, i) => decoder.decode(batch[i] ?? [], length));
}
