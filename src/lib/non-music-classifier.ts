// pattern: Functional Core
// Deny-list for titles that are unlikely to name a song.

/** Normalized titles shorter than this carry too little signal. */
export const MIN_TITLE_LENGTH = 6;

const NON_MUSIC_PATTERNS: readonly RegExp[] = [
  // Spoken-word and how-to content
  /\b(?:podcast|tutorial|interview|entrevista|vlog|episode|lesson|reaction|unboxing)\b/i,
  /\bhow to\b/i,
  // Numbered lists: "10 - Best Moments", "Top 5 - Fails"
  /^(?:top\s+)?\d{1,3}\s*-\s*[a-z]+/i,
  // Long-form compilations
  /\b(?:full album|album completo|mix|megamix|mixtape|compilation|playlist)\b/i,
  /\bcover version\b/i,
  // Broadcast specials: "Programa especial 2021", "Edición 2019"
  /\b(?:programa|special|especial|edici\s?o?n|edition)\b.*\b(?:19|20)\d{2}\b/i,
];

export type ContentClass = 'music' | 'too_short' | 'non_music';

/** True when any deny-list pattern matches one of the given forms of a title. */
export function isNonMusic(...forms: readonly string[]): boolean {
  return forms.some((form) => NON_MUSIC_PATTERNS.some((pattern) => pattern.test(form)));
}

/**
 * Classify a normalized title. The structural form is checked as well so that
 * words the normalizer strips ("cover version") still count.
 */
export function classifyTitle(normalized: string, structural = normalized): ContentClass {
  if (normalized.length < MIN_TITLE_LENGTH) return 'too_short';
  if (isNonMusic(normalized, structural)) return 'non_music';
  return 'music';
}
