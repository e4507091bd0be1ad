// pattern: Functional Core
// Runs every heuristic against one title and gathers their candidates.

import { isNoOpinion } from './heuristics';
import type { Heuristic, HeuristicInput } from './heuristics';
import type { Candidate } from '../types';

export type HeuristicFailure = {
  readonly heuristicId: string;
  readonly error: string;
};

export type EvaluateOptions = {
  /** Heuristics run at once; defaults to all of them. */
  readonly concurrency?: number;
  /** Called for each heuristic that threw or rejected. */
  readonly onFailure?: (failure: HeuristicFailure) => void;
};

/**
 * Evaluate heuristics concurrently in batches.
 *
 * Candidates come back in heuristic declaration order whatever order the
 * heuristics finish in. A failing heuristic contributes nothing and never
 * fails the evaluation. No-opinion outputs are dropped.
 */
export async function evaluateHeuristics(
  heuristics: readonly Heuristic[],
  input: HeuristicInput,
  options: EvaluateOptions = {}
): Promise<Candidate[]> {
  const batchSize = Math.max(1, options.concurrency ?? heuristics.length);
  const candidates: Candidate[] = [];

  for (let i = 0; i < heuristics.length; i += batchSize) {
    const batch = heuristics.slice(i, i + batchSize);
    const results = await Promise.allSettled(
      batch.map((heuristic) => Promise.resolve().then(() => heuristic.run(input)))
    );

    results.forEach((result, index) => {
      const heuristic = batch[index];
      if (!heuristic) return;

      if (result.status === 'rejected') {
        const failure: HeuristicFailure = {
          heuristicId: heuristic.id,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        };
        console.warn(`[evaluate] heuristic ${failure.heuristicId} failed: ${failure.error}`);
        options.onFailure?.(failure);
        return;
      }

      if (isNoOpinion(result.value)) return;

      candidates.push({
        artist: result.value.artist,
        title: result.value.title,
        heuristicConfidence: result.value.confidence,
        heuristicId: heuristic.id,
      });
    });
  }

  return candidates;
}
