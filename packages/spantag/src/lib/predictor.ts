import type {
  ChunkOptions,
  PredictorLogger,
  PredictorOptions,
  Preprocessor,
  ProbabilityBatch,
  ProbabilityMatrix,
  SequenceModel,
  TaggedText,
  TagSequence,
  TextInput
} from './types.js';
import type { NormalizedText } from './input.js';
import { charSequences, normalizeBatch, normalizeText } from './input.js';
import { entitiesFromTags } from './scoring.js';

/**
 * Tag probabilities, tag sequences and scored entities for raw or
 * character-tokenized text.
 *
 * The model and preprocessor are injected; this class only normalizes input,
 * aligns matrix rows with text lengths and turns decoded tags into entities.
 * Single-text methods run as a batch of one, so `tagBatch([t])[0]` and
 * `tag(t)` always agree.
 */
export class TaggingPredictor<F> {
  private readonly logger: PredictorLogger;
  private readonly warnOnTokenized: boolean;
  private readonly debug: boolean;
  private readonly chunkOpts: ChunkOptions | undefined;

  constructor(
    private readonly model: SequenceModel<F>,
    private readonly preprocessor: Preprocessor<F>,
    opts?: PredictorOptions
  ) {
    this.logger = opts?.logger ?? console;
    this.warnOnTokenized = opts?.warnOnTokenized ?? true;
    this.debug = opts?.debug ?? false;
    this.chunkOpts = opts?.chunk;
  }

  /** [num_chars, num_classes] for one text */
  predictProbabilities(text: TextInput): ProbabilityMatrix {
    return this.forward([normalizeText(text)])[0] ?? [];
  }

  /** One matrix per text, in input order. Padding rows are kept. */
  predictProbabilitiesBatch(texts: readonly TextInput[]): ProbabilityBatch {
    return this.forward(normalizeBatch(texts));
  }

  tag(text: TextInput): TagSequence {
    return this.tagNormalized([normalizeText(text)])[0] ?? [];
  }

  tagBatch(texts: readonly TextInput[]): TagSequence[] {
    return this.tagNormalized(normalizeBatch(texts));
  }

  tagWithEntities(text: TextInput): TaggedText {
    const item = normalizeText(text);
    return this.tagWithEntitiesNormalized([item])[0] ?? { characters: item.chars, entities: [] };
  }

  tagWithEntitiesBatch(texts: readonly TextInput[]): TaggedText[] {
    return this.tagWithEntitiesNormalized(normalizeBatch(texts));
  }

  private forward(batch: NormalizedText[]): ProbabilityBatch {
    if (batch.length === 0) return [];

    if (this.warnOnTokenized && batch.some(item => item.tokenized)) {
      this.logger.warn('Text is passed in a list. Make sure it is tokenized at character level!');
    }

    const { features } = this.preprocessor.prepareInput(charSequences(batch));
    return this.model.predict(features);
  }

  /**
   * Usable length per text: never more rows than the model returned, so
   * characters past a truncated matrix get no tag.
   */
  private alignedLengths(batch: NormalizedText[], probs: ProbabilityBatch): number[] {
    return batch.map((item, i) => {
      const rows = probs[i]?.length ?? 0;
      const length = Math.min(item.chars.length, rows);
      if (this.debug && length < item.chars.length) {
        this.logger.debug(`Text ${i}: ${item.chars.length} characters but ${rows} matrix rows; decoding ${length}`);
      }
      return length;
    });
  }

  private decode(batch: NormalizedText[], probs: ProbabilityBatch): TagSequence[] {
    if (batch.length === 0) return [];

    const lengths = this.alignedLengths(batch, probs);
    const decoded = this.preprocessor.labelDecode(probs, lengths);

    // decoders must return lengths[i] labels; offsets stay inside the text either way
    return lengths.map((length, i) => (decoded[i] ?? []).slice(0, length));
  }

  private tagNormalized(batch: NormalizedText[]): TagSequence[] {
    return this.decode(batch, this.forward(batch));
  }

  private tagWithEntitiesNormalized(batch: NormalizedText[]): TaggedText[] {
    const probs = this.forward(batch);
    const tags = this.decode(batch, probs);

    return batch.map((item, i) => ({
      characters: item.chars,
      entities: entitiesFromTags(item.chars, tags[i] ?? [], probs[i] ?? [], this.preprocessor.labels, this.chunkOpts)
    }));
  }
}
