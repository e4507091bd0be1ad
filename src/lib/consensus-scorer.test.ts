import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  contextComponent,
  groupCandidates,
  heuristicComponent,
  scoreCandidates,
} from './consensus-scorer';
import { DEFAULT_WEIGHTS } from './heuristics';
import type { Corroborator } from './corroborator';
import type { SimilarityScorer } from './semantic-scorer';
import type { Candidate } from '../types';

function candidate(heuristicId: string, artist: string, title: string, heuristicConfidence: number): Candidate {
  return { artist, title, heuristicConfidence, heuristicId };
}

const AGREEING: Candidate[] = [
  candidate('separator', 'Artist Name', 'Song Title', 0.9),
  candidate('last_word', 'Title', 'Artist Name Song', 0.3),
  candidate('ascii_dominance', 'Artist Name', 'Song Title', 0.65),
  candidate('length_swap', 'Artist Name ', ' Song Title', 0.6),
];

describe('groupCandidates', () => {
  it('groups by trimmed pair in first-seen order', () => {
    const groups = groupCandidates(AGREEING);

    expect(groups.map((g) => [g.artist, g.title, g.candidates.length])).toEqual([
      ['Artist Name', 'Song Title', 3],
      ['Title', 'Artist Name Song', 1],
    ]);
  });

  it('is case-sensitive', () => {
    const groups = groupCandidates([
      candidate('a', 'Jane Doe', 'Midnight Drive', 0.5),
      candidate('b', 'jane doe', 'Midnight Drive', 0.5),
    ]);
    expect(groups).toHaveLength(2);
  });
});

describe('heuristicComponent', () => {
  it('rewards agreement', () => {
    const [agreed, lone] = groupCandidates(AGREEING);
    // 0.5 × (0.9×1.0 + 0.65×0.8 + 0.6×0.8) × 1.3
    expect(heuristicComponent(agreed!, DEFAULT_WEIGHTS)).toBeCloseTo(1.235);
    // 0.5 × 0.3×0.7 × 1.1
    expect(heuristicComponent(lone!, DEFAULT_WEIGHTS)).toBeCloseTo(0.1155);
  });

  it('weighs unknown heuristics at 0.7', () => {
    const [group] = groupCandidates([candidate('custom', 'Jane Doe', 'Midnight Drive', 1)]);
    expect(heuristicComponent(group!, {})).toBeCloseTo(0.5 * 0.7 * 1.1);
  });
});

describe('contextComponent', () => {
  it('adds uploader, tag and category cues', () => {
    expect(
      contextComponent('Jane Doe', 'Midnight Drive', {
        uploader: 'JaneDoeVEVO Jane Doe',
        tags: ['midnight drive'],
        categories: ['Music'],
      })
    ).toBeCloseTo(0.15);
  });

  it('is 0 without metadata', () => {
    expect(contextComponent('Jane Doe', 'Midnight Drive', {})).toBe(0);
  });

  it('matches the uploader case-insensitively', () => {
    expect(contextComponent('jane doe', 'Midnight Drive', { uploader: 'Jane Doe - Topic' })).toBeCloseTo(
      0.075
    );
  });
});

describe('scoreCandidates', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('ranks the agreed pair first and names its first heuristic', async () => {
    const ranked = await scoreCandidates(AGREEING, { weights: DEFAULT_WEIGHTS });

    expect(ranked[0]).toMatchObject({
      artist: 'Artist Name',
      title: 'Song Title',
      method: 'separator',
      semantic: 0,
      corroboration: 0,
    });
    expect(ranked[0]!.total).toBeCloseTo(1.235);
    expect(ranked[1]!.method).toBe('last_word');
  });

  it('breaks ties by first appearance', async () => {
    const ranked = await scoreCandidates(
      [
        candidate('first', 'Artist One', 'Song One', 0.5),
        candidate('second', 'Artist Two', 'Song Two', 0.5),
      ],
      { weights: { first: 1, second: 1 } }
    );

    expect(ranked.map((g) => g.method)).toEqual(['first', 'second']);
  });

  it('lets context overturn a small heuristic lead', async () => {
    const ranked = await scoreCandidates(
      [
        candidate('a', 'Song Title', 'Artist Name', 0.6),
        candidate('b', 'Artist Name', 'Song Title', 0.55),
      ],
      { weights: { a: 1, b: 1 }, metadata: { uploader: 'Artist Name' } }
    );

    expect(ranked[0]!.method).toBe('b');
  });

  it('adds semantic similarity one group at a time', async () => {
    let active = 0;
    let peak = 0;
    const scorer: SimilarityScorer = {
      similarity: async (artist) => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 1));
        active--;
        return artist === 'Artist Name' ? 0.8 : 0.2;
      },
    };

    const ranked = await scoreCandidates(AGREEING, { weights: DEFAULT_WEIGHTS, semanticScorer: scorer });

    expect(peak).toBe(1);
    expect(ranked[0]!.semantic).toBeCloseTo(0.08);
    expect(ranked[1]!.semantic).toBeCloseTo(0.02);
  });

  it('treats semantic failures as 0 and reports them', async () => {
    const onSignalFailure = vi.fn();
    const scorer: SimilarityScorer = {
      similarity: () => Promise.reject(new Error('model unavailable')),
    };

    const ranked = await scoreCandidates(AGREEING.slice(0, 1), {
      weights: DEFAULT_WEIGHTS,
      semanticScorer: scorer,
      onSignalFailure,
    });

    expect(ranked[0]!.semantic).toBe(0);
    expect(onSignalFailure).toHaveBeenCalledWith({
      signal: 'semantic',
      artist: 'Artist Name',
      title: 'Song Title',
      error: 'model unavailable',
    });
  });

  it('corroborates only the three best groups', async () => {
    const corroborate = vi.fn().mockResolvedValue(0.9);
    const corroborator: Corroborator = { corroborate };
    const candidates = [0.1, 0.9, 0.3, 0.7, 0.5].map((confidence, i) =>
      candidate(`h${i}`, `Artist ${i}`, `Song Title ${i}`, confidence)
    );

    const ranked = await scoreCandidates(candidates, { weights: {}, corroborator });

    expect(corroborate.mock.calls.map((call) => call[0])).toEqual(['Artist 1', 'Artist 3', 'Artist 4']);
    expect(ranked.filter((g) => g.corroboration > 0).map((g) => g.method)).toEqual(['h1', 'h3', 'h4']);
    expect(ranked[0]!.corroboration).toBeCloseTo(0.135);
  });

  it('treats corroborator rejections as 0', async () => {
    const onSignalFailure = vi.fn();
    const corroborator: Corroborator = { corroborate: () => Promise.reject(new Error('timeout')) };

    const ranked = await scoreCandidates(AGREEING.slice(0, 1), {
      weights: DEFAULT_WEIGHTS,
      corroborator,
      onSignalFailure,
    });

    expect(ranked[0]!.corroboration).toBe(0);
    expect(onSignalFailure).toHaveBeenCalledWith(expect.objectContaining({ signal: 'corroboration', error: 'timeout' }));
  });

  it('lets corroboration decide between close groups', async () => {
    const corroborator: Corroborator = {
      corroborate: async (artist) => (artist === 'Artist Two' ? 0.9 : 0),
    };

    const ranked = await scoreCandidates(
      [
        candidate('first', 'Artist One', 'Song One', 0.5),
        candidate('second', 'Artist Two', 'Song Two', 0.5),
      ],
      { weights: { first: 1, second: 1 }, corroborator }
    );

    expect(ranked[0]!.method).toBe('second');
  });

  it('returns nothing for no candidates', async () => {
    expect(await scoreCandidates([], { weights: DEFAULT_WEIGHTS })).toEqual([]);
  });
});
