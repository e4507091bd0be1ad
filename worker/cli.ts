// Command-line entry point: tags each argument (or each stdin line) and
// prints one JSON line per input.

import { mkdirSync, existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { createInterface } from 'node:readline';
import { CacheDatabase } from './sqlite-cache-store';
import { parseCliArgs, runTagger } from './tagger';
import { ConfigError, loadConfig } from '../src/lib/config';
import type { TaggerConfig } from '../src/lib/config';
import { MusicBrainzCorroborator } from '../src/lib/corroborator';
import { ExtractionEvents, trackExtractionStats } from '../src/lib/extraction-events';
import { TrackExtractor } from '../src/lib/extractor';
import { getCorroborationCache, getMetadataCache } from '../src/lib/ttl-cache';
import type { TrackMetadata } from '../src/types';

const USAGE = `usage: npm start -- <url-or-title>...
       some-command | npm start

environment:
  TAGGER_WEIGHTS          id=weight pairs, comma-separated
  TAGGER_SEMANTIC         1 to enable semantic scoring
  TAGGER_NER              1 to enable the named-entity heuristic
  MUSICBRAINZ_USER_AGENT  enables MusicBrainz corroboration
  TAGGER_CACHE_TTL_MS     cache time-to-live (default 600000)
  TAGGER_CACHE_DB         SQLite file for a persistent cache
  YTDLP_PATH              yt-dlp executable (default yt-dlp)`;

function loadSettings(): TaggerConfig {
  try {
    return loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

function initCacheDatabase(dbPath: string): CacheDatabase {
  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const database = new CacheDatabase(dbPath);
  const pruned = database.pruneExpired();
  console.error(`cache database at ${dbPath} (pruned ${pruned} expired entries)`);
  return database;
}

async function readStdinLines(): Promise<string[]> {
  const lines: string[] = [];
  const reader = createInterface({ input: process.stdin, crlfDelay: Infinity });
  for await (const line of reader) {
    lines.push(line);
  }
  return lines;
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadSettings();
  const inputs =
    args.inputs.length > 0 ? args.inputs : process.stdin.isTTY ? [] : await readStdinLines();
  if (inputs.length === 0) {
    console.error(USAGE);
    process.exit(1);
  }

  const database = config.cacheDbPath ? initCacheDatabase(config.cacheDbPath) : null;
  const metadataCache = getMetadataCache({
    ttlMs: config.cacheTtlMs,
    store: database?.store<TrackMetadata>('metadata'),
  });
  const corroborationCache = getCorroborationCache({
    ttlMs: config.cacheTtlMs,
    store: database?.store<number>('corroboration'),
  });

  const events = new ExtractionEvents();
  const stats = trackExtractionStats(events);
  const extractor = new TrackExtractor({
    weights: config.weights,
    features: config.features,
    corroborator: config.musicbrainzUserAgent
      ? new MusicBrainzCorroborator({
          userAgent: config.musicbrainzUserAgent,
          cache: corroborationCache,
        })
      : undefined,
    events,
  });

  let stopping = false;
  const shutdown = () => {
    console.error('shutting down...');
    stopping = true;
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  try {
    const result = await runTagger(inputs, {
      extractor,
      write: (line) => process.stdout.write(`${line}\n`),
      tagUrlOptions: { ytDlpPath: config.ytDlpPath, cache: metadataCache },
      shouldStop: () => stopping,
    });

    const methods = Object.entries(stats.byMethod)
      .map(([method, count]) => `${method}=${count}`)
      .join(' ');
    console.error(
      `processed=${result.processed} errors=${result.errors} heuristicFailures=${stats.heuristicFailures} signalFailures=${stats.signalFailures}${methods ? ` ${methods}` : ''}`
    );
    if (result.errors > 0) {
      process.exitCode = 1;
    }
  } finally {
    database?.close();
  }
}

main().catch((err) => {
  console.error('fatal:', err);
  process.exit(1);
});
