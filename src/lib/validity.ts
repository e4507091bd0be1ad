// pattern: Functional Core
// Shared acceptance rule applied to every candidate before it may compete.

import type { Candidate } from '../types';

const BANNED_ARTIST_TOKENS = /\b(?:video|official|lyrics|feat|cover|remix)\b/i;
const NUMERIC = /^\d+$/;
// A single token of 6+ letters/digits with at least two digits, e.g. a video id
const CODE_LIKE = /^(?=(?:[a-z]*\d){2})(?=\d*[a-z])[a-z0-9]{6,}$/i;
const TITLE_BAD_START = /^(?:[[({<]|www)/i;

/** True when the artist looks like an identifier rather than a name. */
export function isCodeLike(text: string): boolean {
  return NUMERIC.test(text) || CODE_LIKE.test(text);
}

/**
 * Validity rule for an (artist, title) pair:
 * artist 3–49 characters, not numeric or code-like, free of banned tokens;
 * title 6–149 characters, not starting with a bracket or "www".
 */
export function isValidPair(artist: string, title: string): boolean {
  const a = artist.trim();
  const t = title.trim();

  if (a.length <= 2 || a.length >= 50) return false;
  if (isCodeLike(a)) return false;
  if (BANNED_ARTIST_TOKENS.test(a)) return false;

  if (t.length <= 5 || t.length >= 150) return false;
  if (TITLE_BAD_START.test(t)) return false;

  return true;
}

/** Keep the candidates that pass the validity rule, preserving order. */
export function filterValid(candidates: readonly Candidate[]): Candidate[] {
  return candidates.filter((candidate) => isValidPair(candidate.artist, candidate.title));
}
