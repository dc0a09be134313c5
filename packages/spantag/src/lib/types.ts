/**
 * One input text split into characters. Raw strings are split by code point,
 * pre-tokenized inputs are taken as given.
 */
export type CharSequence = readonly string[];

/**
 * Anything the predictor accepts as a single text: a raw string or a
 * character-level token list.
 */
export type TextInput = string | readonly string[];

/**
 * [sequence_length, num_classes], one row per character position. Rows are
 * usually probability distributions but unnormalized scores are allowed.
 */
export type ProbabilityMatrix = ReadonlyArray<readonly number[]>;

// One matrix per text; rows past a text's length are padding.
export type ProbabilityBatch = ReadonlyArray<ProbabilityMatrix>;

/**
 * Label strings, one per decoded character. Labels are `O` or a role and a
 * type such as `B-LOC`, `I-LOC`, `E-LOC`, `S-LOC`.
 */
export type TagSequence = string[];

export type TagRole = 'B' | 'I' | 'E' | 'S' | 'O';

export interface ParsedTag {
  readonly role: TagRole;
  /** '_' when the label carries no type */
  readonly type: string;
}

export interface Chunk {
  type: string;
  start: number;
  /** exclusive */
  end: number;
}

export interface ChunkOptions {
  /**
   * Labels put the role after the type (`LOC-B`) instead of before it.
   * Defaults to false.
   */
  suffix?: boolean;
}

// Fixed field set.
export interface Entity {
  text: string;
  type: string;
  score: number;
  beginOffset: number;
  endOffset: number;
}

export interface TaggedText {
  characters: string[];
  entities: Entity[];
}

export interface PreparedInput<F> {
  features: F;
  labels?: unknown;
}

/**
 * Forward pass of the sequence model. Returns one matrix per prepared text,
 * in input order.
 */
export interface SequenceModel<F> {
  predict(features: F): ProbabilityBatch;
}

/**
 * Feature preparation and label decoding owned by whoever built the model.
 */
export interface Preprocessor<F> {
  /** Label vocabulary; `labels[i]` names column `i` of every matrix row. */
  readonly labels: readonly string[];
  prepareInput(texts: CharSequence[]): PreparedInput<F>;
  /**
   * Must return `lengths[i]` labels for item `i`, drawn from `labels`.
   */
  labelDecode(batch: ProbabilityBatch, lengths: number[]): TagSequence[];
}

/**
 * Turns a batch of matrices into tag sequences. Preprocessors can delegate
 * `labelDecode` to one of these.
 */
export interface LabelDecoder {
  readonly labels: readonly string[];
  decode(matrix: ProbabilityMatrix, length: number): TagSequence;
}

export type TagScheme = 'BIO' | 'BIOES';

export interface ViterbiOptions {
  /** Transition constraints to enforce. Defaults to 'BIO'. */
  scheme?: TagScheme;
  /**
   * 'probabilities' scores a path by summed log-probabilities, 'scores' sums
   * the raw values. Defaults to 'probabilities'.
   */
  emissions?: 'probabilities' | 'scores';
  /** Floor applied before taking logs. Defaults to 1e-12. */
  epsilon?: number;
  chunk?: ChunkOptions;
}

export interface PredictorLogger {
  warn(message: string): void;
  debug(message: string): void;
}

export interface PredictorOptions {
  /** Defaults to the console. */
  logger?: PredictorLogger;
  /** Warn when pre-tokenized input is passed. Defaults to true. */
  warnOnTokenized?: boolean;
  /** Log length alignment details. Defaults to false. */
  debug?: boolean;
  chunk?: ChunkOptions;
}
