// pattern: Functional Core
import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockExtract } = vi.hoisted(() => ({
  mockExtract: vi.fn(),
}));

vi.mock('@huggingface/transformers', () => ({
  pipeline: vi.fn().mockResolvedValue(mockExtract),
}));

import { SemanticScorer, cosineSimilarity, rescaleSimilarity } from './semantic-scorer';
import { pipeline } from '@huggingface/transformers';

function vectorsFor(byText: Record<string, number[]>) {
  mockExtract.mockImplementation(async (text: string) => ({
    data: Float32Array.from(byText[text] ?? [0, 0]),
  }));
}

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
  });

  it('is 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('returns 0 for empty, zero or mismatched vectors', () => {
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1], [1, 1])).toBe(0);
  });
});

describe('rescaleSimilarity', () => {
  it('maps [-1, 1] onto [0, 1]', () => {
    expect(rescaleSimilarity(-1)).toBe(0);
    expect(rescaleSimilarity(0)).toBe(0.5);
    expect(rescaleSimilarity(1)).toBe(1);
  });

  it('clamps values outside the cosine range', () => {
    expect(rescaleSimilarity(1.2)).toBe(1);
    expect(rescaleSimilarity(-3)).toBe(0);
  });
});

describe('SemanticScorer', () => {
  let scorer: SemanticScorer;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(pipeline).mockResolvedValue(
      mockExtract as unknown as Awaited<ReturnType<typeof pipeline>>
    );
    scorer = new SemanticScorer();
  });

  it('loads the embedding model lazily and once', async () => {
    vectorsFor({});
    expect(scorer.isReady()).toBe(false);

    await scorer.similarity('Jane Doe', 'Midnight Drive');
    await scorer.similarity('Jane Doe', 'Midnight Drive');

    expect(pipeline).toHaveBeenCalledTimes(1);
    expect(pipeline).toHaveBeenCalledWith('feature-extraction', 'Xenova/all-MiniLM-L6-v2', {
      dtype: 'q8',
    });
    expect(scorer.isReady()).toBe(true);
  });

  it('embeds labelled, noise-free prompts with mean pooling', async () => {
    vectorsFor({});

    await scorer.similarity('Jane Doe Official', 'Midnight Drive Lyrics');

    expect(mockExtract).toHaveBeenNthCalledWith(1, 'Artist: Jane Doe', {
      pooling: 'mean',
      normalize: true,
    });
    expect(mockExtract).toHaveBeenNthCalledWith(2, 'Title: Midnight Drive', {
      pooling: 'mean',
      normalize: true,
    });
  });

  it('scores identical embeddings as 1 and orthogonal ones as 0.5', async () => {
    vectorsFor({
      'Artist: Jane Doe': [1, 0],
      'Title: Midnight Drive': [1, 0],
      'Title: Something Else': [0, 1],
    });

    expect(await scorer.similarity('Jane Doe', 'Midnight Drive')).toBeCloseTo(1);
    expect(await scorer.similarity('Jane Doe', 'Something Else')).toBeCloseTo(0.5);
  });

  it('propagates model failures to the caller', async () => {
    mockExtract.mockRejectedValue(new Error('inference failed'));

    await expect(scorer.similarity('Jane Doe', 'Midnight Drive')).rejects.toThrow(
      'inference failed'
    );
  });
});
