// pattern: Imperative Shell
// Best-effort media metadata: yt-dlp JSON dump raced against YouTube oEmbed.

import { spawn } from 'node:child_process';
import { isRecord, optionalNumber, optionalString, stringArray } from '../lib/json-fields';
import { getMetadataCache } from '../lib/ttl-cache';
import type { TtlCache } from '../lib/ttl-cache';
import type { Result, TrackMetadata } from '../types';

export const YOUTUBE_OEMBED_ENDPOINT = 'https://www.youtube.com/oembed';
const YTDLP_TIMEOUT_MS = 30_000;
const OEMBED_TIMEOUT_MS = 10_000;

export class MetadataUnavailableError extends Error {
  constructor(
    readonly url: string,
    readonly causes: readonly string[]
  ) {
    super(`metadata unavailable for ${url}: ${causes.join('; ')}`);
    this.name = 'MetadataUnavailableError';
  }
}

export type MetadataFetcherOptions = {
  readonly ytDlpPath?: string;
  readonly ytDlpTimeoutMs?: number;
  readonly oembedEndpoint?: string;
  readonly oembedTimeoutMs?: number;
  readonly cache?: TtlCache<TrackMetadata>;
};

type AttemptOptions = {
  readonly signal: AbortSignal;
};

/**
 * Map a yt-dlp `--dump-single-json` document onto TrackMetadata.
 */
export function parseYtDlpJson(stdout: string): TrackMetadata {
  const data: unknown = JSON.parse(stdout);
  if (!isRecord(data)) {
    throw new Error('yt-dlp output is not a JSON object');
  }

  return {
    title: optionalString(data.title),
    description: optionalString(data.description),
    uploader: optionalString(data.uploader) ?? optionalString(data.channel),
    tags: stringArray(data.tags),
    categories: stringArray(data.categories),
    duration: optionalNumber(data.duration),
    viewCount: optionalNumber(data.view_count),
    channel: { verified: data.channel_is_verified === true },
    artist: optionalString(data.artist),
    track: optionalString(data.track),
  };
}

function requireTitle(source: string, metadata: TrackMetadata): TrackMetadata {
  if (!metadata.title?.trim()) {
    throw new Error(`${source} returned no title`);
  }
  return metadata;
}

/**
 * Run yt-dlp without downloading and parse its JSON dump.
 * Aborting the signal kills the process.
 */
export function runYtDlp(
  url: string,
  ytDlpPath: string,
  { signal }: AttemptOptions
): Promise<TrackMetadata> {
  return new Promise<TrackMetadata>((resolve, reject) => {
    const processHandle = spawn(
      ytDlpPath,
      ['--dump-single-json', '--skip-download', '--no-warnings', url],
      { signal, stdio: ['ignore', 'pipe', 'pipe'] }
    );

    let stdout = '';
    let stderr = '';
    processHandle.stdout.setEncoding('utf8');
    processHandle.stderr.setEncoding('utf8');
    processHandle.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    processHandle.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    processHandle.on('error', reject);
    processHandle.on('close', (code) => {
      if (code !== 0) {
        const detail = stderr.trim();
        reject(new Error(`yt-dlp exited with code ${code}${detail ? `: ${detail}` : ''}`));
        return;
      }
      try {
        resolve(requireTitle('yt-dlp', parseYtDlpJson(stdout)));
      } catch (error) {
        reject(error);
      }
    });
  });
}

/**
 * Title and uploader from the public oEmbed endpoint (no API key needed).
 */
export async function fetchOEmbed(
  url: string,
  endpoint: string,
  { signal }: AttemptOptions
): Promise<TrackMetadata> {
  const oembedUrl = `${endpoint}?url=${encodeURIComponent(url)}&format=json`;
  const response = await fetch(oembedUrl, { signal });

  if (!response.ok) {
    throw new Error(`oEmbed error: ${response.status} ${response.statusText}`);
  }

  const data: unknown = await response.json();
  if (!isRecord(data)) {
    throw new Error('oEmbed response is not a JSON object');
  }

  return requireTitle('oEmbed', {
    title: optionalString(data.title)?.trim(),
    uploader: optionalString(data.author_name),
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function race(url: string, options: MetadataFetcherOptions): Promise<TrackMetadata> {
  const controller = new AbortController();
  const attempt = (timeoutMs: number): AttemptOptions => ({
    signal: AbortSignal.any([controller.signal, AbortSignal.timeout(timeoutMs)]),
  });

  try {
    return await Promise.any([
      runYtDlp(url, options.ytDlpPath ?? 'yt-dlp', attempt(options.ytDlpTimeoutMs ?? YTDLP_TIMEOUT_MS)),
      fetchOEmbed(
        url,
        options.oembedEndpoint ?? YOUTUBE_OEMBED_ENDPOINT,
        attempt(options.oembedTimeoutMs ?? OEMBED_TIMEOUT_MS)
      ),
    ]);
  } catch (error) {
    const causes = error instanceof AggregateError ? error.errors.map(errorMessage) : [errorMessage(error)];
    throw new MetadataUnavailableError(url, causes);
  } finally {
    // Stop whichever attempt is still running
    controller.abort();
  }
}

/**
 * Fetch metadata for a media URL. The first source to produce a title wins.
 * Successful lookups are cached by URL; failures are not.
 */
export async function fetchMetadata(
  url: string,
  options: MetadataFetcherOptions = {}
): Promise<Result<TrackMetadata>> {
  const cache = options.cache ?? getMetadataCache();
  try {
    const metadata = await cache.getOrCompute(url, () => race(url, options));
    return { ok: true, value: metadata };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
