// pattern: Imperative Shell
import { isRecord, optionalString } from './json-fields';
import { getCorroborationCache } from './ttl-cache';
import type { TtlCache } from './ttl-cache';

/** Scores an (artist, title) pair against an external catalogue, in [0, 1]. */
export type Corroborator = {
  corroborate(artist: string, title: string): Promise<number>;
};

export type MusicBrainzRecording = {
  readonly title?: string;
  readonly 'artist-credit'?: ReadonlyArray<{ readonly name?: string }>;
};

export type MusicBrainzCorroboratorOptions = {
  /** MusicBrainz rejects requests without an identifying User-Agent */
  readonly userAgent: string;
  readonly timeoutMs?: number;
  readonly matchScore?: number;
  readonly baseUrl?: string;
  readonly cache?: TtlCache<number>;
};

export const MUSICBRAINZ_BASE_URL = 'https://musicbrainz.org/ws/2';
const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_MATCH_SCORE = 0.9;

/** Escape a phrase for a quoted Lucene term. */
function quoteLucene(text: string): string {
  return `"${text.replace(/[\\"]/g, '\\$&')}"`;
}

/** Pick the recordings out of a search response body. */
export function parseRecordings(data: unknown): MusicBrainzRecording[] {
  const recordings = isRecord(data) ? data.recordings : undefined;
  if (!Array.isArray(recordings)) {
    throw new Error('MusicBrainz response has no recordings list');
  }

  return recordings.filter(isRecord).map((recording) => {
    const credits = recording['artist-credit'];
    return {
      title: optionalString(recording.title),
      'artist-credit': Array.isArray(credits)
        ? credits.filter(isRecord).map((credit) => ({ name: optionalString(credit.name) }))
        : [],
    };
  });
}

function overlaps(a: string, b: string): boolean {
  const left = a.toLowerCase().trim();
  const right = b.toLowerCase().trim();
  if (!left || !right) return false;
  return left.includes(right) || right.includes(left);
}

/**
 * True when the recording's title and one of its credited artists each
 * contain, or are contained in, the queried fields.
 */
export function recordingMatches(
  recording: MusicBrainzRecording,
  artist: string,
  title: string
): boolean {
  if (!recording.title || !overlaps(recording.title, title)) return false;
  const credits = recording['artist-credit'] ?? [];
  return credits.some((credit) => credit.name !== undefined && overlaps(credit.name, artist));
}

/**
 * Corroborates pairs with the MusicBrainz recording search.
 * Failures score 0 and are not cached, so the next lookup retries.
 */
export class MusicBrainzCorroborator implements Corroborator {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly matchScore: number;
  private readonly baseUrl: string;
  private readonly cache: TtlCache<number>;

  constructor(options: MusicBrainzCorroboratorOptions) {
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.matchScore = options.matchScore ?? DEFAULT_MATCH_SCORE;
    this.baseUrl = options.baseUrl ?? MUSICBRAINZ_BASE_URL;
    this.cache = options.cache ?? getCorroborationCache();
  }

  async corroborate(artist: string, title: string): Promise<number> {
    const key = `${artist}\u0000${title}`;
    try {
      return await this.cache.getOrCompute(key, () => this.lookup(artist, title));
    } catch (error) {
      console.warn(
        `musicbrainz lookup failed for "${artist} - ${title}":`,
        error instanceof Error ? error.message : String(error)
      );
      return 0;
    }
  }

  private async lookup(artist: string, title: string): Promise<number> {
    const query = `recording:${quoteLucene(title)} AND artist:${quoteLucene(artist)}`;
    const url = `${this.baseUrl}/recording/?query=${encodeURIComponent(query)}&fmt=json&limit=5`;

    const response = await fetch(url, {
      headers: {
        'User-Agent': this.userAgent,
        Accept: 'application/json',
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`MusicBrainz API error: ${response.status} ${response.statusText}`);
    }

    const recordings = parseRecordings(await response.json());
    const matched = recordings.some((recording) => recordingMatches(recording, artist, title));
    return matched ? this.matchScore : 0;
  }
}
