// pattern: Imperative Shell
import { fetchMetadata } from './metadata-fetcher';
import type { MetadataFetcherOptions } from './metadata-fetcher';
import type { TrackExtractor } from '../lib/extractor';
import type { ExtractionResult, Result, TrackMetadata } from '../types';

export type TagUrlOptions = MetadataFetcherOptions & {
  /** Replaces the yt-dlp/oEmbed fetch, e.g. with a cached or offline source */
  readonly fetchMetadata?: (url: string) => Promise<Result<TrackMetadata>>;
};

/**
 * A stand-in title for a URL whose metadata could not be fetched:
 * the `v` query parameter, else the last path segment.
 */
export function titleFromUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const videoId = parsed.searchParams.get('v');
    if (videoId) return videoId;
    const lastSegment = parsed.pathname.split('/').filter(Boolean).pop();
    return lastSegment ? decodeURIComponent(lastSegment) : parsed.hostname;
  } catch {
    // Not a URL at all
    return url.trim() || 'Unknown';
  }
}

/**
 * Fetch a URL's metadata and extract (artist, title) from it.
 * Unavailable metadata becomes an error result rather than an exception,
 * and a non-music result takes its title from the URL.
 */
export async function tagUrl(
  url: string,
  extractor: TrackExtractor,
  options: TagUrlOptions = {}
): Promise<ExtractionResult> {
  const fetched = options.fetchMetadata
    ? await options.fetchMetadata(url)
    : await fetchMetadata(url, options);

  if (!fetched.ok) {
    console.warn(fetched.error.message);
    return {
      artist: 'Error',
      title: titleFromUrl(url),
      confidence: 0,
      method: 'error',
      error: 'Metadata unavailable',
    };
  }

  const result = await extractor.extract(fetched.value.title ?? '', fetched.value);
  // Non-music uploads are reported under the URL's own id
  return result.method === 'non_music' ? { ...result, title: titleFromUrl(url) } : result;
}
