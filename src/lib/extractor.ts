// pattern: Imperative Shell
// Entry point: raw title (+ metadata) → (artist, title, confidence).
//
// Collaborators (models, corroborator, event listeners) are injected at
// construction; nothing here reads process-wide configuration.

import { resolveWeights } from './config';
import type { FeatureFlags } from './config';
import { estimateConfidence } from './confidence';
import { scoreCandidates } from './consensus-scorer';
import type { Corroborator } from './corroborator';
import { EntityRecognizer } from './entity-recognizer';
import { evaluateHeuristics } from './evaluator';
import { ExtractionEvents } from './extraction-events';
import { buildHeuristicInput, createHeuristicSet } from './heuristics';
import type { Heuristic, PersonRecognizer } from './heuristics';
import { classifyTitle } from './non-music-classifier';
import { SemanticScorer } from './semantic-scorer';
import type { SimilarityScorer } from './semantic-scorer';
import { filterValid } from './validity';
import type { ExtractionResult, TrackMetadata, WeightTable } from '../types';

export const METADATA_CONFIDENCE = 0.98;
export const NON_MUSIC_CONFIDENCE = 0.15;
export const TOO_SHORT_CONFIDENCE = 0.1;
export const FALLBACK_CONFIDENCE = 0.1;

export type ExtractorOptions = {
  /** Overrides merged over the default weight of each active heuristic */
  readonly weights?: Readonly<Record<string, number>>;
  /** A flag left unset is on exactly when its collaborator is supplied */
  readonly features?: Partial<FeatureFlags>;
  readonly semanticScorer?: SimilarityScorer;
  readonly entityRecognizer?: PersonRecognizer;
  readonly corroborator?: Corroborator;
  readonly events?: ExtractionEvents;
  /** How many of the best groups are corroborated (default 3) */
  readonly corroborationLimit?: number;
  /** Heuristics evaluated at once (default: all) */
  readonly heuristicConcurrency?: number;
};

function unknownTitle(title: string): string {
  return title || 'Unknown';
}

export class TrackExtractor {
  private readonly heuristics: readonly Heuristic[];
  private readonly weights: WeightTable;
  private readonly semanticScorer: SimilarityScorer | undefined;
  private readonly corroborator: Corroborator | undefined;
  private readonly corroborationLimit: number | undefined;
  private readonly heuristicConcurrency: number | undefined;
  readonly events: ExtractionEvents;

  constructor(options: ExtractorOptions = {}) {
    const semanticScoring = options.features?.semanticScoring ?? options.semanticScorer !== undefined;
    const namedEntities = options.features?.namedEntities ?? options.entityRecognizer !== undefined;

    this.heuristics = createHeuristicSet({
      entityRecognizer: namedEntities ? (options.entityRecognizer ?? new EntityRecognizer()) : undefined,
    });
    this.weights = resolveWeights(
      this.heuristics.map((heuristic) => heuristic.id),
      options.weights
    );
    this.semanticScorer = semanticScoring ? (options.semanticScorer ?? new SemanticScorer()) : undefined;
    this.corroborator = options.corroborator;
    this.corroborationLimit = options.corroborationLimit;
    this.heuristicConcurrency = options.heuristicConcurrency;
    this.events = options.events ?? new ExtractionEvents();
  }

  /** Ids of the active heuristics, in declaration order. */
  heuristicIds(): string[] {
    return this.heuristics.map((heuristic) => heuristic.id);
  }

  getWeights(): WeightTable {
    return this.weights;
  }

  /**
   * Infer (artist, title) from a raw media title.
   * Never rejects: every outcome, including internal failure, is a result value.
   */
  async extract(rawTitle: string, metadata: TrackMetadata = {}): Promise<ExtractionResult> {
    const startedAt = Date.now();
    this.events.emit('attempt', { rawTitle });

    const result = await this.run(rawTitle, metadata);

    this.events.emit('complete', { rawTitle, result, elapsedMs: Date.now() - startedAt });
    return result;
  }

  private async run(rawTitle: string, metadata: TrackMetadata): Promise<ExtractionResult> {
    try {
      const creditedArtist = metadata.artist?.trim();
      const creditedTrack = metadata.track?.trim();
      if (creditedArtist && creditedTrack) {
        return {
          artist: creditedArtist,
          title: creditedTrack,
          confidence: METADATA_CONFIDENCE,
          method: 'metadata',
          error: null,
        };
      }

      const input = buildHeuristicInput(rawTitle, metadata);

      const classification = classifyTitle(input.title, input.structural);
      if (classification === 'too_short') {
        return {
          artist: 'Unknown',
          title: unknownTitle(input.title),
          confidence: TOO_SHORT_CONFIDENCE,
          method: 'too_short',
          error: 'Title too short',
        };
      }
      if (classification === 'non_music') {
        return {
          artist: 'Error',
          title: input.title,
          confidence: NON_MUSIC_CONFIDENCE,
          method: 'non_music',
          error: 'Non-music content detected',
        };
      }

      const candidates = await evaluateHeuristics(this.heuristics, input, {
        concurrency: this.heuristicConcurrency,
        onFailure: (failure) => this.events.emit('heuristicFailure', failure),
      });
      const valid = filterValid(candidates);

      const ranked = await scoreCandidates(valid, {
        weights: this.weights,
        metadata,
        semanticScorer: this.semanticScorer,
        corroborator: this.corroborator,
        corroborationLimit: this.corroborationLimit,
        onSignalFailure: (failure) => this.events.emit('signalFailure', failure),
      });

      const winner = ranked[0];
      if (!winner) {
        return {
          artist: 'Unknown',
          title: unknownTitle(input.title),
          confidence: FALLBACK_CONFIDENCE,
          method: 'fallback',
          error: null,
        };
      }

      return {
        artist: winner.artist,
        title: winner.title,
        confidence: estimateConfidence({
          validCandidateCount: valid.length,
          metadata,
          rawTitle,
          artist: winner.artist,
          title: winner.title,
        }),
        method: winner.method,
        error: null,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`extraction failed for "${rawTitle}":`, message);
      return {
        artist: 'Unknown',
        title: unknownTitle(typeof rawTitle === 'string' ? rawTitle.trim() : ''),
        confidence: 0,
        method: 'error',
        error: message,
      };
    }
  }
}
