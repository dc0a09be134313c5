import type { Chunk, ChunkOptions, ParsedTag, TagRole } from './types.js';

const OUTSIDE: ParsedTag = { role: 'O', type: '_' };

const ROLES: readonly TagRole[] = ['B', 'I', 'E', 'S', 'O'];

/**
 * Split a label into its role and entity type.
 *
 * Prefix notation (`B-LOC`) reads the role from the first character and the
 * type from everything after the first '-'. Suffix notation (`LOC-B`) reads
 * the role from the last character and the type from everything before the
 * last '-'. Unknown roles and the empty label parse as outside.
 */
export function parseTag(label: string, opts?: ChunkOptions): ParsedTag {
  if (label.length === 0) return OUTSIDE;

  const suffix = opts?.suffix ?? false;
  const marker = suffix ? label.charAt(label.length - 1) : label.charAt(0);
  const role = ROLES.find(r => r === marker);
  if (role === undefined || role === 'O') return OUTSIDE;

  let type: string;
  if (suffix) {
    const rest = label.slice(0, -1);
    const cut = rest.lastIndexOf('-');
    type = cut >= 0 ? rest.slice(0, cut) : rest;
  } else {
    const rest = label.slice(1);
    const cut = rest.indexOf('-');
    type = cut >= 0 ? rest.slice(cut + 1) : rest;
  }

  return { role, type: type.length > 0 ? type : '_' };
}

/**
 * True when the chunk running through the previous position ends there.
 */
export function endOfChunk(prev: ParsedTag, curr: ParsedTag): boolean {
  if (prev.role === 'E' || prev.role === 'S') return true;

  if (prev.role === 'B' || prev.role === 'I') {
    if (curr.role === 'B' || curr.role === 'S' || curr.role === 'O') return true;
  }

  // a type change always closes
  return prev.role !== 'O' && prev.type !== curr.type;
}

/**
 * True when a chunk starts at the current position.
 */
export function startOfChunk(prev: ParsedTag, curr: ParsedTag): boolean {
  if (curr.role === 'B' || curr.role === 'S') return true;

  if (curr.role === 'I' || curr.role === 'E') {
    // continuation with nothing open to continue
    if (prev.role === 'E' || prev.role === 'S' || prev.role === 'O') return true;
  }

  return curr.role !== 'O' && prev.type !== curr.type;
}

/**
 * Collect the typed chunks of a BIO/BIOES tag sequence.
 *
 * Total over any label sequence: malformed transitions become implied
 * boundaries, so a leading `I-PER` opens its own chunk and a type change
 * inside a run splits it. Chunks come back ordered by start, non-overlapping,
 * with an exclusive `end`.
 */
export function extractChunks(tags: readonly string[], opts?: ChunkOptions): Chunk[] {
  const chunks: Chunk[] = [];

  let prev: ParsedTag = { role: 'O', type: '' };
  let begin = 0;

  // one extra step past the end acts as a closing 'O'
  for (let i = 0; i <= tags.length; i++) {
    const label = tags[i];
    const curr = label === undefined ? OUTSIDE : parseTag(label, opts);

    if (endOfChunk(prev, curr)) chunks.push({ type: prev.type, start: begin, end: i });
    if (startOfChunk(prev, curr)) begin = i;

    prev = curr;
  }

  return chunks;
}
