// Batch tagging loop behind the CLI.
// Each input is either a media URL (metadata is fetched) or a raw title.

import { tagUrl } from '../src/api/tag-url';
import type { TagUrlOptions } from '../src/api/tag-url';
import type { TrackExtractor } from '../src/lib/extractor';
import type { ExtractionResult } from '../src/types';

export type TaggedLine = ExtractionResult & {
  readonly input: string;
};

export type TaggerRunOptions = {
  readonly extractor: TrackExtractor;
  /** Receives one JSON document per input */
  readonly write: (line: string) => void;
  readonly tagUrlOptions?: TagUrlOptions;
  /** Checked before each input; true stops the run early */
  readonly shouldStop?: () => boolean;
};

export type TaggerRunResult = {
  readonly processed: number;
  readonly errors: number;
  readonly stopped: boolean;
};

export type CliArgs = {
  readonly help: boolean;
  readonly inputs: readonly string[];
};

const URL_PATTERN = /^https?:\/\//i;
const HELP_FLAGS = new Set(['--help', '-h']);

/**
 * Split command-line arguments into flags and inputs.
 * Everything after a bare `--` is an input, even when it looks like a flag.
 */
export function parseCliArgs(args: readonly string[]): CliArgs {
  const separator = args.indexOf('--');
  const flagged = separator === -1 ? args : args.slice(0, separator);
  const trailing = separator === -1 ? [] : args.slice(separator + 1);

  return {
    help: flagged.some((arg) => HELP_FLAGS.has(arg)),
    inputs: [...flagged.filter((arg) => !HELP_FLAGS.has(arg)), ...trailing],
  };
}

export function isUrlInput(input: string): boolean {
  return URL_PATTERN.test(input.trim());
}

export async function tagInput(
  input: string,
  extractor: TrackExtractor,
  tagUrlOptions: TagUrlOptions = {}
): Promise<ExtractionResult> {
  const trimmed = input.trim();
  return isUrlInput(trimmed) ? tagUrl(trimmed, extractor, tagUrlOptions) : extractor.extract(trimmed);
}

/**
 * Tag inputs one after another, writing a JSON line for each.
 * Blank inputs are skipped; results with method "error" count as errors.
 */
export async function runTagger(
  inputs: readonly string[],
  options: TaggerRunOptions
): Promise<TaggerRunResult> {
  let processed = 0;
  let errors = 0;

  for (const input of inputs) {
    if (options.shouldStop?.()) {
      return { processed, errors, stopped: true };
    }
    if (!input.trim()) continue;

    const result = await tagInput(input, options.extractor, options.tagUrlOptions);
    const line: TaggedLine = { input: input.trim(), ...result };
    options.write(JSON.stringify(line));

    processed++;
    if (result.method === 'error') errors++;
  }

  return { processed, errors, stopped: false };
}
