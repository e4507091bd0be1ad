// pattern: Functional Core
// Independent (title, metadata) → (artist, title) extractors.
//
// Each heuristic is a small strategy object with a fixed self-declared
// confidence. An empty pair means "no opinion". Heuristics never see each
// other's output; the consensus scorer reconciles them.

import type { TrackMetadata, WeightTable } from '../types';
import {
  collapseWhitespace,
  normalizeTitle,
  stripNoiseTokens,
  structuralForm,
  tidy,
} from './normalizer';

export type HeuristicInput = {
  /** Title exactly as published */
  readonly raw: string;
  /** Title with brackets, quotes and noise words still in place */
  readonly structural: string;
  /** Fully normalized title */
  readonly title: string;
  readonly metadata: TrackMetadata;
};

export type HeuristicOutput = {
  readonly artist: string;
  readonly title: string;
  readonly confidence: number;
};

export type Heuristic = {
  readonly id: string;
  run(input: HeuristicInput): HeuristicOutput | Promise<HeuristicOutput>;
};

/** Finds person names in free text, e.g. with an entity-recognition model. */
export type PersonRecognizer = {
  findPeople(text: string): Promise<string[]>;
};

export const HeuristicId = {
  SEPARATOR: 'separator' as const,
  MULTI_DASH: 'multi_dash' as const,
  FEATURED: 'featured' as const,
  BRACKETS: 'brackets' as const,
  COMPACT_TITLE: 'compact_title' as const,
  DESCRIPTION: 'description' as const,
  COMMA_SWAP: 'comma_swap' as const,
  COVER_BY: 'cover_by' as const,
  BY_SPLIT: 'by_split' as const,
  LAST_WORD: 'last_word' as const,
  ASCII_DOMINANCE: 'ascii_dominance' as const,
  LENGTH_SWAP: 'length_swap' as const,
  CAPITAL_SPLIT: 'capital_split' as const,
  NAMED_ENTITY: 'named_entity' as const,
  PARENTHETICAL: 'parenthetical' as const,
  ARTIST_LIST: 'artist_list' as const,
};

/** Default multiplier per heuristic, applied on top of its self-confidence. */
export const DEFAULT_WEIGHTS: WeightTable = {
  separator: 1.0,
  multi_dash: 0.85,
  featured: 0.9,
  brackets: 0.75,
  compact_title: 0.7,
  description: 1.0,
  comma_swap: 0.75,
  cover_by: 0.9,
  by_split: 0.85,
  last_word: 0.7,
  ascii_dominance: 0.8,
  length_swap: 0.8,
  capital_split: 0.7,
  named_entity: 0.85,
  parenthetical: 0.8,
  artist_list: 0.9,
};

export const NO_OPINION: HeuristicOutput = { artist: '', title: '', confidence: 0 };

/** Ordered by preference: earlier separators win. */
export const SEPARATORS = [' - ', ' – ', '|', ' • ', '::', '//'] as const;

const DASH_SPLIT = /\s+[-–—]\s+/;
const FEATURE_MARKER = /\s+(?:ft|feat|featuring|con|with|vs|prod|remix)\.?\s+/i;
const NAME_SPLIT = /\s*(?:,|&|\band\b|\bx\b)\s*/i;
const NAME_JOINER = /,|&|\band\b|\bx\b/i;
const NUMERIC = /^\d+$/;
const TITLE_CASE_WORD = /^[A-Z][a-z]/;
const CAMEL_BOUNDARY = /[a-z][A-Z]/;
const ARTIST_LABEL =
  /^\s*(?:artist|artista|artiste|k[üu]nstler|interpr[eèé]te|performer|singer|cantante)\s*[:：]\s*(.+)$/im;
const TITLE_LABEL =
  /^\s*(?:title|song|track|t[ií]tulo|titre|titel|canci[oó]n|chanson|brano)\s*[:：]\s*(.+)$/im;

const MAX_CREDITED_ARTISTS = 3;

export function isNoOpinion(output: HeuristicOutput): boolean {
  return output.artist.trim() === '' || output.title.trim() === '';
}

/** Build a heuristic output, or no opinion when either part tidies to nothing. */
function pair(artist: string, title: string, confidence: number): HeuristicOutput {
  const a = tidy(artist);
  const t = tidy(title);
  if (!a || !t) return NO_OPINION;
  return { artist: a, title: t, confidence };
}

export function hasSeparator(text: string): boolean {
  return SEPARATORS.some((separator) => text.includes(separator));
}

function splitOnSeparator(text: string): [string, string] | null {
  for (const separator of SEPARATORS) {
    const index = text.indexOf(separator);
    if (index > 0) {
      return [text.slice(0, index), text.slice(index + separator.length)];
    }
  }
  return null;
}

function splitOnce(text: string, separator: string): [string, string] | null {
  const index = text.indexOf(separator);
  if (index <= 0) return null;
  return [text.slice(0, index), text.slice(index + separator.length)];
}

/** Split "A, B & C" style credits into distinct names (case-insensitive). */
function splitNames(credits: string): string[] {
  const seen = new Set<string>();
  const names: string[] = [];
  for (const name of credits.split(NAME_SPLIT).map(tidy)) {
    const key = name.toLowerCase();
    if (!name || seen.has(key)) continue;
    seen.add(key);
    names.push(name);
  }
  return names;
}

function joinArtists(names: readonly string[]): string {
  const seen = new Set<string>();
  const unique = names.filter((name) => {
    const key = name.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
  return unique.slice(0, MAX_CREDITED_ARTISTS).join(', ');
}

function splitAtFeatureMarker(text: string): { head: string; tail: string } | null {
  const match = FEATURE_MARKER.exec(text);
  if (!match) return null;
  return {
    head: text.slice(0, match.index),
    tail: text.slice(match.index + match[0].length),
  };
}

function asciiLetterRatio(text: string): number {
  const chars = text.replace(/\s/g, '');
  if (chars.length === 0) return 0;
  const letters = chars.match(/[A-Za-z]/g)?.length ?? 0;
  return letters / chars.length;
}

/** Drop (...) spans that hold nothing but noise words, e.g. "(Official Video)". */
function dropNoiseParentheticals(text: string): string {
  return collapseWhitespace(
    text.replace(/\(([^()]*)\)/g, (span: string, inner: string) =>
      stripNoiseTokens(inner) ? span : ' '
    )
  );
}

// ---------------------------------------------------------------------------
// Separator family
// ---------------------------------------------------------------------------

export const separatorHeuristic: Heuristic = {
  id: HeuristicId.SEPARATOR,
  run({ title }) {
    const parts = splitOnSeparator(title);
    if (!parts) return NO_OPINION;
    return pair(parts[0], parts[1], 0.9);
  },
};

export const multiDashHeuristic: Heuristic = {
  id: HeuristicId.MULTI_DASH,
  run({ title }) {
    const hyphens = title.split('-').length - 1;
    if (hyphens <= 1) return NO_OPINION;
    const parts = splitOnce(title, '-');
    if (!parts) return NO_OPINION;
    const first = parts[0].trim();
    if (!first || NUMERIC.test(first)) return NO_OPINION;
    return pair(first, parts[1], 0.7);
  },
};

/**
 * "Main ft. Guest - Song", "Main - Song feat. Guest" or "Song feat. Guest".
 * Credited names are deduplicated and capped.
 */
export const featuredHeuristic: Heuristic = {
  id: HeuristicId.FEATURED,
  run({ title }) {
    const halves = splitOnce(title, ' - ');

    if (halves) {
      const [left, right] = halves;
      const inLeft = splitAtFeatureMarker(left);
      if (inLeft) {
        return pair(
          joinArtists([...splitNames(inLeft.head), ...splitNames(inLeft.tail)]),
          right,
          0.8
        );
      }
      const inRight = splitAtFeatureMarker(right);
      if (inRight) {
        return pair(
          joinArtists([...splitNames(left), ...splitNames(inRight.tail)]),
          inRight.head,
          0.8
        );
      }
      return NO_OPINION;
    }

    const split = splitAtFeatureMarker(title);
    if (!split) return NO_OPINION;
    return pair(joinArtists(splitNames(split.tail)), split.head, 0.8);
  },
};

/** "Artist, Other & Third - Song" */
export const artistListHeuristic: Heuristic = {
  id: HeuristicId.ARTIST_LIST,
  run({ title }) {
    const halves = splitOnce(title, ' - ');
    if (!halves) return NO_OPINION;
    const [credits, song] = halves;
    if (!NAME_JOINER.test(credits)) return NO_OPINION;
    const names = splitNames(credits);
    if (names.length < 2) return NO_OPINION;
    return pair(joinArtists(names), song, 0.8);
  },
};

// ---------------------------------------------------------------------------
// Bracket family (reads the structural form)
// ---------------------------------------------------------------------------

/** "Artist [Song]": the one meaningful square/curly span is the title. */
export const bracketsHeuristic: Heuristic = {
  id: HeuristicId.BRACKETS,
  run({ structural }) {
    const spans = [...structural.matchAll(/\[([^[\]]*)\]|\{([^{}]*)\}/g)].filter(
      (match) => stripNoiseTokens(match[1] ?? match[2] ?? '') !== ''
    );
    const span = spans[0];
    if (spans.length !== 1 || !span) return NO_OPINION;

    const start = span.index ?? 0;
    const inner = span[1] ?? span[2] ?? '';
    const outside = `${structural.slice(0, start)} ${structural.slice(start + span[0].length)}`;
    return pair(normalizeTitle(outside), normalizeTitle(inner), 0.6);
  },
};

/** "Song (Artist)" with a trailing, non-noise parenthetical. */
export const parentheticalHeuristic: Heuristic = {
  id: HeuristicId.PARENTHETICAL,
  run({ structural }) {
    const match = /^(.+?)\s*\(([^()]+)\)$/.exec(dropNoiseParentheticals(structural));
    if (!match) return NO_OPINION;
    return pair(normalizeTitle(match[2] ?? ''), normalizeTitle(match[1] ?? ''), 0.6);
  },
};

// ---------------------------------------------------------------------------
// "by" family (reads the structural form)
// ---------------------------------------------------------------------------

export const coverByHeuristic: Heuristic = {
  id: HeuristicId.COVER_BY,
  run({ structural }) {
    const match = /^(.+?)\s*\bcover\s+by\s+(.+)$/i.exec(structural);
    if (!match) return NO_OPINION;
    return pair(normalizeTitle(match[2] ?? ''), normalizeTitle(match[1] ?? ''), 0.85);
  },
};

/** '"Song" by Artist': the artist follows "by". */
export const bySplitHeuristic: Heuristic = {
  id: HeuristicId.BY_SPLIT,
  run({ structural }) {
    if (/\bcover\s+by\b/i.test(structural)) return NO_OPINION;
    const match = /^(.+?)\s+by\s+(.+)$/i.exec(structural);
    if (!match) return NO_OPINION;
    return pair(normalizeTitle(match[2] ?? ''), normalizeTitle(match[1] ?? ''), 0.75);
  },
};

// ---------------------------------------------------------------------------
// Orientation of a two-part dash split
// ---------------------------------------------------------------------------

/** The side written mostly in ASCII letters is taken as the artist. */
export const asciiDominanceHeuristic: Heuristic = {
  id: HeuristicId.ASCII_DOMINANCE,
  run({ raw }) {
    const parts = collapseWhitespace(raw).split(DASH_SPLIT);
    if (parts.length !== 2) return NO_OPINION;
    const [left = '', right = ''] = parts;
    const artistFirst = asciiLetterRatio(left) >= asciiLetterRatio(right);
    const [artist, song] = artistFirst ? [left, right] : [right, left];
    return pair(normalizeTitle(artist), normalizeTitle(song), 0.65);
  },
};

/** A left side at least twice as long as the right is taken as the title. */
export const lengthSwapHeuristic: Heuristic = {
  id: HeuristicId.LENGTH_SWAP,
  run({ title }) {
    const parts = title.split(' - ');
    if (parts.length !== 2) return NO_OPINION;
    const [left = '', right = ''] = parts;
    if (left.trim().length >= 2 * right.trim().length) {
      return pair(right, left, 0.6);
    }
    return pair(left, right, 0.6);
  },
};

// ---------------------------------------------------------------------------
// Separator-less titles
// ---------------------------------------------------------------------------

/** "ArtistNameSongName": split the camel-case words at the middle. */
export const compactTitleHeuristic: Heuristic = {
  id: HeuristicId.COMPACT_TITLE,
  run({ title }) {
    if (hasSeparator(title) || !CAMEL_BOUNDARY.test(title)) return NO_OPINION;
    const words = title
      .split(' ')
      .flatMap((token) => token.split(/(?<=[a-z])(?=[A-Z])/))
      .filter(Boolean);
    if (words.length < 2) return NO_OPINION;
    const middle = Math.ceil(words.length / 2);
    return pair(words.slice(0, middle).join(' '), words.slice(middle).join(' '), 0.5);
  },
};

/** The first Title-Case word after the first token starts the title. */
export const capitalSplitHeuristic: Heuristic = {
  id: HeuristicId.CAPITAL_SPLIT,
  run({ title }) {
    const tokens = title.split(' ');
    const splitAt = tokens.findIndex((token, index) => index >= 1 && TITLE_CASE_WORD.test(token));
    if (splitAt < 1) return NO_OPINION;
    return pair(tokens.slice(0, splitAt).join(' '), tokens.slice(splitAt).join(' '), 0.45);
  },
};

/** "Song Title, Artist" */
export const commaSwapHeuristic: Heuristic = {
  id: HeuristicId.COMMA_SWAP,
  run({ title }) {
    if (title.includes(' - ')) return NO_OPINION;
    const parts = title.split(',');
    if (parts.length !== 2) return NO_OPINION;
    return pair(parts[1] ?? '', parts[0] ?? '', 0.55);
  },
};

/** Weakest signal: with more than four words, the last one is the artist. */
export const lastWordHeuristic: Heuristic = {
  id: HeuristicId.LAST_WORD,
  run({ title }) {
    const words = title.split(' ').filter(Boolean);
    if (words.length <= 4) return NO_OPINION;
    const last = words[words.length - 1] ?? '';
    return pair(last, title.slice(0, title.lastIndexOf(last)), 0.3);
  },
};

// ---------------------------------------------------------------------------
// Metadata and model-backed
// ---------------------------------------------------------------------------

/**
 * Explicit "Artist: ..." / "Title: ..." lines in the description.
 * An author assertion rather than an inference, hence the highest confidence.
 */
export const descriptionHeuristic: Heuristic = {
  id: HeuristicId.DESCRIPTION,
  run({ metadata }) {
    const description = metadata.description;
    if (!description) return NO_OPINION;
    const artist = ARTIST_LABEL.exec(description)?.[1];
    const song = TITLE_LABEL.exec(description)?.[1];
    if (!artist || !song) return NO_OPINION;
    return pair(normalizeTitle(artist), normalizeTitle(song), 0.95);
  },
};

/** First recognized person is the artist; the rest of the text is the title. */
export function createNamedEntityHeuristic(recognizer: PersonRecognizer): Heuristic {
  return {
    id: HeuristicId.NAMED_ENTITY,
    async run({ title }) {
      const [person] = await recognizer.findPeople(title);
      if (!person) return NO_OPINION;
      const start = title.toLowerCase().indexOf(person.toLowerCase());
      if (start < 0) return NO_OPINION;
      const rest = `${title.slice(0, start)} ${title.slice(start + person.length)}`;
      return pair(person, rest, 0.7);
    },
  };
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export type HeuristicSetOptions = {
  /** Include the named-entity heuristic backed by this recognizer */
  readonly entityRecognizer?: PersonRecognizer;
};

/**
 * Build the active heuristic set in declaration order. Declaration order is
 * also the tie-break order among equally scored pairs.
 */
export function createHeuristicSet(options: HeuristicSetOptions = {}): Heuristic[] {
  const heuristics: Heuristic[] = [
    separatorHeuristic,
    multiDashHeuristic,
    featuredHeuristic,
    bracketsHeuristic,
    compactTitleHeuristic,
    descriptionHeuristic,
    commaSwapHeuristic,
    coverByHeuristic,
    bySplitHeuristic,
    lastWordHeuristic,
    asciiDominanceHeuristic,
    lengthSwapHeuristic,
    capitalSplitHeuristic,
  ];
  if (options.entityRecognizer) {
    heuristics.push(createNamedEntityHeuristic(options.entityRecognizer));
  }
  heuristics.push(parentheticalHeuristic, artistListHeuristic);
  return heuristics;
}

export function buildHeuristicInput(raw: string, metadata: TrackMetadata = {}): HeuristicInput {
  return {
    raw,
    structural: structuralForm(raw),
    title: normalizeTitle(raw),
    metadata,
  };
}
