// Shared domain types for title tagging

/**
 * Descriptive metadata published alongside a media title.
 * Every field is optional: fetchers are best-effort and may return a partial object.
 */
export type TrackMetadata = {
  readonly title?: string;
  readonly description?: string;
  readonly uploader?: string;
  readonly tags?: readonly string[];
  readonly categories?: readonly string[];
  /** Duration in seconds */
  readonly duration?: number;
  readonly viewCount?: number;
  readonly channel?: {
    readonly verified?: boolean;
  };
  /** Explicit credits from a structured provider */
  readonly artist?: string;
  readonly track?: string;
};

/**
 * One heuristic's proposed pair.
 */
export type Candidate = {
  readonly artist: string;
  readonly title: string;
  readonly heuristicConfidence: number;
  readonly heuristicId: string;
};

export type ExtractionResult = {
  readonly artist: string;
  readonly title: string;
  /** 0–0.99, two decimals */
  readonly confidence: number;
  /** Winning heuristic id, or metadata, fallback, too_short, non_music or error */
  readonly method: string;
  readonly error: string | null;
};

/**
 * Heuristic id → weight multiplier
 */
export type WeightTable = Readonly<Record<string, number>>;

/**
 * Generic result type for fallible I/O
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };
