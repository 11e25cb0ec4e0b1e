/**
 * Text normalization shared by the lexicon, the query normalizer and the ranker.
 * Lexicon entries and queries go through the same function, so they always meet
 * in the same form.
 */

// Harakat, superscript alef and tatweel carry no meaning for matching
const ARABIC_MARKS = /[\u064B-\u0652\u0670\u0640]/g;
const ALEF_VARIANTS = /[\u0622\u0623\u0625]/g;
const ALEF_MAQSURA = /\u0649/g;

/**
 * Lowercase, drop Arabic diacritics and tatweel, unify alef and final-yaa forms,
 * replace punctuation with spaces and collapse whitespace. Hyphens inside words
 * (t-shirt) survive.
 */
export function normalizeText(str: string | null | undefined): string {
  if (!str) return '';

  return str
    .toLowerCase()
    .replace(ARABIC_MARKS, '')
    .replace(ALEF_VARIANTS, '\u0627')
    .replace(ALEF_MAQSURA, '\u064A')
    .replace(/[^\p{L}\p{N}\s-]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Split normalized text into tokens. Tokens made only of hyphens are dropped.
 */
export function tokenize(text: string | null | undefined): string[] {
  const normalized = normalizeText(text);
  if (!normalized) return [];

  return normalized
    .split(' ')
    .map(token => token.replace(/^-+|-+$/g, ''))
    .filter(token => token.length > 0);
}
