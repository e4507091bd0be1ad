import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { evaluateHeuristics } from './evaluator';
import { NO_OPINION, buildHeuristicInput, createHeuristicSet } from './heuristics';
import type { Heuristic } from './heuristics';

function fixed(id: string, artist: string, title: string, confidence = 0.5): Heuristic {
  return { id, run: () => ({ artist, title, confidence }) };
}

function delayed(id: string, ms: number, artist: string, title: string): Heuristic {
  return {
    id,
    run: () =>
      new Promise((resolve) => setTimeout(() => resolve({ artist, title, confidence: 0.5 }), ms)),
  };
}

describe('evaluateHeuristics', () => {
  const input = buildHeuristicInput('Artist Name - Song Title');

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps declaration order regardless of finishing order', async () => {
    const candidates = await evaluateHeuristics(
      [delayed('slow', 30, 'Slow Artist', 'Slow Song'), delayed('fast', 1, 'Fast Artist', 'Fast Song')],
      input
    );

    expect(candidates.map((c) => c.heuristicId)).toEqual(['slow', 'fast']);
  });

  it('records the heuristic id and self-confidence on each candidate', async () => {
    const candidates = await evaluateHeuristics([fixed('one', 'Jane Doe', 'Midnight Drive', 0.7)], input);

    expect(candidates).toEqual([
      { artist: 'Jane Doe', title: 'Midnight Drive', heuristicConfidence: 0.7, heuristicId: 'one' },
    ]);
  });

  it('drops no-opinion outputs', async () => {
    const silent: Heuristic = { id: 'silent', run: () => NO_OPINION };
    const blankTitle = fixed('blank', 'Jane Doe', '   ');

    const candidates = await evaluateHeuristics(
      [silent, blankTitle, fixed('ok', 'Jane Doe', 'Midnight Drive')],
      input
    );

    expect(candidates.map((c) => c.heuristicId)).toEqual(['ok']);
  });

  it('reports failing heuristics and continues', async () => {
    const throwing: Heuristic = {
      id: 'throws',
      run: () => {
        throw new Error('boom');
      },
    };
    const rejecting: Heuristic = { id: 'rejects', run: () => Promise.reject('nope') };
    const onFailure = vi.fn();

    const candidates = await evaluateHeuristics(
      [throwing, fixed('ok', 'Jane Doe', 'Midnight Drive'), rejecting],
      input,
      { onFailure }
    );

    expect(candidates.map((c) => c.heuristicId)).toEqual(['ok']);
    expect(onFailure).toHaveBeenNthCalledWith(1, { heuristicId: 'throws', error: 'boom' });
    expect(onFailure).toHaveBeenNthCalledWith(2, { heuristicId: 'rejects', error: 'nope' });
    expect(console.warn).toHaveBeenCalledWith('[evaluate] heuristic throws failed: boom');
  });

  it('limits how many heuristics run at once', async () => {
    let running = 0;
    let peak = 0;
    const tracked = (id: string): Heuristic => ({
      id,
      run: async () => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
        return { artist: 'Jane Doe', title: `Song ${id}`, confidence: 0.5 };
      },
    });

    const candidates = await evaluateHeuristics(
      ['a', 'b', 'c', 'd', 'e'].map(tracked),
      input,
      { concurrency: 2 }
    );

    expect(peak).toBe(2);
    expect(candidates.map((c) => c.heuristicId)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('returns nothing for an empty heuristic set', async () => {
    expect(await evaluateHeuristics([], input)).toEqual([]);
  });

  it('gathers the agreeing built-in heuristics for a plain dash title', async () => {
    const candidates = await evaluateHeuristics(createHeuristicSet(), input);

    expect(candidates.map((c) => c.heuristicId)).toEqual([
      'separator',
      'last_word',
      'ascii_dominance',
      'length_swap',
      'capital_split',
    ]);
  });
});
