// pattern: Functional Core
// Canonicalize raw media titles before heuristic evaluation.
//
// normalizeTitle() runs the full cleaning pass; structuralForm() keeps the
// brackets, quotes and noise words that some heuristics read structure from.

/** Words that describe the upload rather than the song. */
export const NOISE_TOKENS = [
  'official',
  'video',
  'lyrics',
  'audio',
  'cover',
  'remix',
  'edit',
  'instrumental',
  'karaoke',
  'prod.',
  'live',
  'acoustic',
  'version',
  'original',
  'hd',
  'hq',
  'vevo',
  'channel',
] as const;

const NON_LATIN_RUN = /[^\x00-\x7F]+/g;
const QUOTED_SPAN = /"([^"]+)"/g;
const YEAR_PREFIX = /^\d{4}\s*[-:|./]\s*/;
const BRACKETED_SPAN = /\([^()]*\)|\[[^[\]]*\]|\{[^{}]*\}/g;
const EDGE_SEPARATORS = /^[\s\-|:/,&~]+|[\s\-|:/,&~]+$/g;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// "prod." ends in a non-word character, so only its start is word-bounded
const NOISE_PATTERN = new RegExp(
  NOISE_TOKENS.map((token) =>
    token.endsWith('.') ? `\\b${escapeRegExp(token)}` : `\\b${token}\\b`
  ).join('|'),
  'gi'
);

/** Replace every run of characters outside basic Latin with one space. */
export function replaceNonLatin(text: string): string {
  return text.replace(NON_LATIN_RUN, ' ');
}

/** Collapse whitespace runs to a single space and trim. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Replace the text with its last double-quoted substring, if it has one. */
export function keepLastQuoted(text: string): string {
  const matches = [...text.matchAll(QUOTED_SPAN)];
  const last = matches[matches.length - 1];
  return last?.[1] ?? text;
}

/** Strip a leading "2019 - " style year prefix. */
export function stripYearPrefix(text: string): string {
  return text.replace(YEAR_PREFIX, '');
}

/** Remove noise vocabulary (official, video, lyrics, ...) word by word. */
export function stripNoiseTokens(text: string): string {
  return collapseWhitespace(text.replace(NOISE_PATTERN, ' '));
}

/** Remove (...), [...] and {...} spans. Nested spans need repeated passes. */
export function stripBrackets(text: string): string {
  return text.replace(BRACKETED_SPAN, ' ');
}

/** With more than one pipe, keep only what follows the first. */
export function dropPipePrefix(text: string): string {
  const pipeCount = text.split('|').length - 1;
  if (pipeCount <= 1) return text;
  return text.slice(text.indexOf('|') + 1);
}

/** Trim separator characters left at the edges of an extracted part. */
export function tidy(part: string): string {
  return collapseWhitespace(part.replace(EDGE_SEPARATORS, ''));
}

function normalizeOnce(text: string): string {
  let result = replaceNonLatin(text);
  result = keepLastQuoted(result);
  result = stripYearPrefix(result);
  result = result.replace(NOISE_PATTERN, ' ');
  result = stripBrackets(result);
  result = dropPipePrefix(result);
  return collapseWhitespace(result);
}

/**
 * Full normalization of a raw title.
 *
 * Removing a bracket or a pipe prefix can expose a pattern an earlier step
 * handles (a year prefix, another pipe), so the pass repeats until the text
 * stops changing. Each repeat either shortens the text or only rewrites
 * whitespace, which bounds the loop.
 */
export function normalizeTitle(raw: string): string {
  let current = raw;
  for (;;) {
    const next = normalizeOnce(current);
    if (next === current) return next;
    current = next;
  }
}

/**
 * Light cleanup that keeps structure: non-Latin runs, year prefix and
 * whitespace only. Brackets, quotes, pipes and noise words survive.
 */
export function structuralForm(raw: string): string {
  return collapseWhitespace(stripYearPrefix(collapseWhitespace(replaceNonLatin(raw))));
}
