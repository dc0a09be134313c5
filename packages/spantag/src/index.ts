// Curated public API
export type {
  CharSequence, TextInput, ProbabilityMatrix, ProbabilityBatch, TagSequence, TagRole, ParsedTag,
  Chunk, ChunkOptions, Entity, TaggedText, PreparedInput, SequenceModel, Preprocessor,
  LabelDecoder, TagScheme, ViterbiOptions, PredictorLogger, PredictorOptions
} from './lib/types.js';
export { TaggingPredictor } from './lib/predictor.js';
export { extractChunks, parseTag, startOfChunk, endOfChunk } from './lib/chunks.js';
export { entitiesFromTags, entityFromChunk, positionConfidences, scoreChunk } from './lib/scoring.js';
export { argmaxDecoder, viterbiDecoder, decodeLabels, allowedTransition } from './lib/decoders.js';
export { normalizeText, normalizeBatch } from './lib/input.js';
export type { NormalizedText } from './lib/input.js';
export { SpantagError, InvalidInputTypeError, ErrorCodes } from './lib/errors.js';
export type { ErrorCode } from './lib/errors.js';
