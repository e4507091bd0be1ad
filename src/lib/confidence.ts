// pattern: Functional Core
import type { TrackMetadata } from '../types';

export type ConfidenceInput = {
  readonly validCandidateCount: number;
  readonly metadata: TrackMetadata;
  readonly rawTitle: string;
  /** Winning pair */
  readonly artist: string;
  readonly title: string;
};

export const MAX_CONFIDENCE = 0.99;

const MIN_MUSIC_DURATION_S = 30;
const MAX_MUSIC_DURATION_S = 720;
const QUOTE_CHARS = /["“”]/;

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function hasMusicCategory(metadata: TrackMetadata): boolean {
  return (metadata.categories ?? []).some((category) => category.trim().toLowerCase() === 'music');
}

export function matchesTag(metadata: TrackMetadata, ...values: string[]): boolean {
  const wanted = new Set(values.map((value) => value.trim().toLowerCase()).filter(Boolean));
  return (metadata.tags ?? []).some((tag) => wanted.has(tag.trim().toLowerCase()));
}

/**
 * Calibrated confidence for a winning pair.
 *
 * Agreement sets the base (0.25 per valid candidate, at most 0.85); metadata
 * cues adjust it. The result has two decimals and never reaches 1.
 */
export function estimateConfidence(input: ConfidenceInput): number {
  const { metadata } = input;
  let score = Math.min(input.validCandidateCount * 0.25, 0.85);

  if (typeof metadata.duration === 'number' && Number.isFinite(metadata.duration)) {
    const inRange =
      metadata.duration >= MIN_MUSIC_DURATION_S && metadata.duration <= MAX_MUSIC_DURATION_S;
    score += inRange ? 0.15 : -0.05;
  }

  if ((metadata.viewCount ?? 0) > 1000) score += 0.05;
  if (metadata.channel?.verified) score += 0.1;
  if (QUOTE_CHARS.test(input.rawTitle)) score += 0.1;
  if (hasMusicCategory(metadata)) score += 0.1;
  if (matchesTag(metadata, input.artist, input.title)) score += 0.05;

  return roundTo2(Math.min(MAX_CONFIDENCE, Math.max(0, score)));
}
