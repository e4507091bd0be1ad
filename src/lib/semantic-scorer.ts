// pattern: Functional Core
import { pipeline } from '@huggingface/transformers';
import { stripNoiseTokens } from './normalizer';

// Callable pipeline function type
type FeatureExtractionPipeline = (
  text: string,
  options: { pooling: 'mean'; normalize: boolean }
) => Promise<{ data: ArrayLike<number> }>;

/** Scores how plausible an (artist, title) pair reads, in [0, 1]. */
export type SimilarityScorer = {
  similarity(artist: string, title: string): Promise<number>;
};

export const DEFAULT_EMBEDDING_MODEL = 'Xenova/all-MiniLM-L6-v2';

/** Cosine similarity of two vectors; 0 for mismatched or zero-length input. */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Map a cosine in [-1, 1] onto [0, 1]. */
export function rescaleSimilarity(cosine: number): number {
  return Math.min(1, Math.max(0, (cosine + 1) / 2));
}

/**
 * Sentence-embedding similarity between "Artist: <artist>" and "Title: <title>".
 * Uses Transformers.js with a small MiniLM model (~25MB), loaded lazily on
 * first use so that extraction without semantic scoring never pays for it.
 */
export class SemanticScorer implements SimilarityScorer {
  private pipelineInstance: FeatureExtractionPipeline | null = null;
  private loadingPromise: Promise<void> | null = null;

  constructor(private readonly model: string = DEFAULT_EMBEDDING_MODEL) {}

  /**
   * Load the feature-extraction pipeline.
   * Safe to call multiple times - only initializes once.
   */
  async initialize(): Promise<void> {
    if (this.pipelineInstance) {
      return;
    }

    if (this.loadingPromise) {
      return this.loadingPromise;
    }

    this.loadingPromise = this.loadPipeline();
    await this.loadingPromise;
  }

  private async loadPipeline(): Promise<void> {
    this.pipelineInstance = (await pipeline('feature-extraction', this.model, {
      dtype: 'q8',
    })) as unknown as FeatureExtractionPipeline;
  }

  isReady(): boolean {
    return this.pipelineInstance !== null;
  }

  /** Mean-pooled, normalized sentence embedding. */
  async embed(text: string): Promise<number[]> {
    if (!this.pipelineInstance) {
      await this.initialize();
    }
    const extract = this.pipelineInstance;
    if (!extract) {
      throw new Error(`embedding model ${this.model} failed to load`);
    }

    const output = await extract(text, { pooling: 'mean', normalize: true });
    return Array.from(output.data);
  }

  async similarity(artist: string, title: string): Promise<number> {
    const artistVector = await this.embed(`Artist: ${stripNoiseTokens(artist)}`);
    const titleVector = await this.embed(`Title: ${stripNoiseTokens(title)}`);
    return rescaleSimilarity(cosineSimilarity(artistVector, titleVector));
  }
}
