// pattern: Functional Core
// Reconciles heuristic candidates into ranked (artist, title) groups.

import { DEFAULT_WEIGHT } from './config';
import { hasMusicCategory, matchesTag } from './confidence';
import type { Corroborator } from './corroborator';
import type { SignalName } from './extraction-events';
import type { SimilarityScorer } from './semantic-scorer';
import type { Candidate, TrackMetadata, WeightTable } from '../types';

export const COMPONENT_WEIGHTS = {
  heuristic: 0.5,
  context: 0.25,
  semantic: 0.1,
  corroboration: 0.15,
} as const;

export const DEFAULT_CORROBORATION_LIMIT = 3;
const CORROBORATION_CONCURRENCY = 3;

export type CandidateGroup = {
  readonly artist: string;
  readonly title: string;
  /** In the order the heuristics were declared */
  readonly candidates: readonly Candidate[];
};

export type ScoredGroup = CandidateGroup & {
  readonly heuristic: number;
  readonly context: number;
  readonly semantic: number;
  readonly corroboration: number;
  readonly total: number;
  /** Id of the heuristic that first proposed the pair */
  readonly method: string;
};

export type SignalFailure = {
  readonly signal: SignalName;
  readonly artist: string;
  readonly title: string;
  readonly error: string;
};

export type ConsensusOptions = {
  readonly weights: WeightTable;
  readonly metadata?: TrackMetadata;
  readonly semanticScorer?: SimilarityScorer;
  readonly corroborator?: Corroborator;
  /** How many of the best groups are corroborated */
  readonly corroborationLimit?: number;
  readonly onSignalFailure?: (failure: SignalFailure) => void;
};

/**
 * Group candidates by exact trimmed (artist, title), keeping first-seen order.
 */
export function groupCandidates(candidates: readonly Candidate[]): CandidateGroup[] {
  const groups = new Map<string, { artist: string; title: string; candidates: Candidate[] }>();

  for (const candidate of candidates) {
    const artist = candidate.artist.trim();
    const title = candidate.title.trim();
    const key = `${artist}\u0000${title}`;
    const group = groups.get(key);
    if (group) {
      group.candidates.push(candidate);
    } else {
      groups.set(key, { artist, title, candidates: [candidate] });
    }
  }

  return [...groups.values()];
}

/** 0.5 × Σ(confidence × weight × (1 + 0.1 × count)) over the group. */
export function heuristicComponent(group: CandidateGroup, weights: WeightTable): number {
  const agreement = 1 + 0.1 * group.candidates.length;
  const sum = group.candidates.reduce(
    (total, candidate) =>
      total + candidate.heuristicConfidence * (weights[candidate.heuristicId] ?? DEFAULT_WEIGHT) * agreement,
    0
  );
  return COMPONENT_WEIGHTS.heuristic * sum;
}

/** 0.25 × uploader, tag and category agreement. */
export function contextComponent(artist: string, title: string, metadata: TrackMetadata): number {
  let score = 0;

  const uploader = metadata.uploader?.toLowerCase() ?? '';
  if (uploader && uploader.includes(artist.toLowerCase())) score += 0.3;
  if (matchesTag(metadata, artist, title)) score += 0.2;
  if (hasMusicCategory(metadata)) score += 0.1;

  return COMPONENT_WEIGHTS.context * score;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function semanticComponent(
  group: CandidateGroup,
  options: ConsensusOptions
): Promise<number> {
  if (!options.semanticScorer) return 0;
  try {
    const similarity = await options.semanticScorer.similarity(group.artist, group.title);
    if (!Number.isFinite(similarity)) return 0;
    return COMPONENT_WEIGHTS.semantic * Math.min(1, Math.max(0, similarity));
  } catch (error) {
    const failure: SignalFailure = {
      signal: 'semantic',
      artist: group.artist,
      title: group.title,
      error: errorMessage(error),
    };
    console.warn(`semantic scoring failed for "${group.artist} - ${group.title}": ${failure.error}`);
    options.onSignalFailure?.(failure);
    return 0;
  }
}

async function corroborationComponents(
  groups: readonly CandidateGroup[],
  options: ConsensusOptions
): Promise<number[]> {
  const corroborator = options.corroborator;
  if (!corroborator) return groups.map(() => 0);

  const scores: number[] = [];
  for (let i = 0; i < groups.length; i += CORROBORATION_CONCURRENCY) {
    const batch = groups.slice(i, i + CORROBORATION_CONCURRENCY);
    const results = await Promise.allSettled(
      batch.map((group) => corroborator.corroborate(group.artist, group.title))
    );

    results.forEach((result, index) => {
      if (result.status === 'fulfilled' && Number.isFinite(result.value)) {
        scores.push(COMPONENT_WEIGHTS.corroboration * Math.min(1, Math.max(0, result.value)));
        return;
      }
      const group = batch[index];
      if (result.status === 'rejected' && group) {
        const failure: SignalFailure = {
          signal: 'corroboration',
          artist: group.artist,
          title: group.title,
          error: errorMessage(result.reason),
        };
        console.warn(`corroboration failed for "${group.artist} - ${group.title}": ${failure.error}`);
        options.onSignalFailure?.(failure);
      }
      scores.push(0);
    });
  }
  return scores;
}

/**
 * Score and rank candidate groups, best first.
 *
 * Semantic similarity is computed one group at a time. Only the best
 * `corroborationLimit` groups by the other components are corroborated.
 * Equal totals keep first-seen order, i.e. heuristic declaration order.
 */
export async function scoreCandidates(
  candidates: readonly Candidate[],
  options: ConsensusOptions
): Promise<ScoredGroup[]> {
  const metadata = options.metadata ?? {};
  const groups = groupCandidates(candidates);

  const partial: Array<{ group: CandidateGroup; heuristic: number; context: number; semantic: number }> = [];
  for (const group of groups) {
    partial.push({
      group,
      heuristic: heuristicComponent(group, options.weights),
      context: contextComponent(group.artist, group.title, metadata),
      semantic: await semanticComponent(group, options),
    });
  }

  const prior = (entry: (typeof partial)[number]) => entry.heuristic + entry.context + entry.semantic;
  const limit = Math.max(0, options.corroborationLimit ?? DEFAULT_CORROBORATION_LIMIT);
  const shortlist = [...partial].sort((a, b) => prior(b) - prior(a)).slice(0, limit);
  const corroborationScores = await corroborationComponents(
    shortlist.map((entry) => entry.group),
    options
  );
  const corroborationByGroup = new Map<CandidateGroup, number>();
  shortlist.forEach((entry, index) => {
    corroborationByGroup.set(entry.group, corroborationScores[index] ?? 0);
  });

  const scored: ScoredGroup[] = partial.map((entry) => {
    const corroboration = corroborationByGroup.get(entry.group) ?? 0;
    return {
      ...entry.group,
      heuristic: entry.heuristic,
      context: entry.context,
      semantic: entry.semantic,
      corroboration,
      total: prior(entry) + corroboration,
      method: entry.group.candidates[0]?.heuristicId ?? 'fallback',
    };
  });

  return scored.sort((a, b) => b.total - a.total);
}
