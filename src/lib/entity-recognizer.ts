// pattern: Functional Core
import { pipeline } from '@huggingface/transformers';
import type { PersonRecognizer } from './heuristics';

export type TokenPrediction = {
  readonly entity: string;
  readonly score: number;
  readonly index: number;
  readonly word: string;
};

// Callable pipeline function type
type TokenClassificationPipeline = (text: string) => Promise<TokenPrediction[]>;

export const DEFAULT_NER_MODEL = 'Xenova/bert-base-NER';

// Tokens below this score are not trusted as part of a name
const MIN_TOKEN_SCORE = 0.5;

/**
 * Merge per-token predictions into person names.
 *
 * The model labels word pieces (B-PER, I-PER, "##" continuations); adjacent
 * PER tokens form one name. Returns names in the order they appear.
 */
export function mergePersonTokens(predictions: readonly TokenPrediction[]): string[] {
  const people: string[] = [];
  let current = '';
  let lastIndex = -2;

  const flush = () => {
    if (current) people.push(current);
    current = '';
  };

  for (const prediction of predictions) {
    if (!prediction.entity.endsWith('PER') || prediction.score < MIN_TOKEN_SCORE) {
      flush();
      continue;
    }

    const isPiece = prediction.word.startsWith('##');
    const continues =
      current !== '' &&
      prediction.index === lastIndex + 1 &&
      (isPiece || prediction.entity.startsWith('I-'));

    if (!continues) {
      flush();
      current = isPiece ? prediction.word.slice(2) : prediction.word;
    } else {
      current += isPiece ? prediction.word.slice(2) : ` ${prediction.word}`;
    }
    lastIndex = prediction.index;
  }

  flush();
  return people;
}

/**
 * Person-name recognizer using Transformers.js with a BERT NER model.
 * Loads lazily (~100MB quantized) the first time a title is analyzed.
 */
export class EntityRecognizer implements PersonRecognizer {
  private pipelineInstance: TokenClassificationPipeline | null = null;
  private loadingPromise: Promise<void> | null = null;

  constructor(private readonly model: string = DEFAULT_NER_MODEL) {}

  /**
   * Load the token-classification pipeline.
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
    this.pipelineInstance = (await pipeline('token-classification', this.model, {
      dtype: 'q8',
    })) as unknown as TokenClassificationPipeline;
  }

  isReady(): boolean {
    return this.pipelineInstance !== null;
  }

  async findPeople(text: string): Promise<string[]> {
    if (!this.pipelineInstance) {
      await this.initialize();
    }
    const classify = this.pipelineInstance;
    if (!classify) {
      throw new Error(`entity model ${this.model} failed to load`);
    }

    return mergePersonTokens(await classify(text));
  }
}
