import lexiconData from '../../data/lexicon.json';
import { LexiconError } from '../errors';
import { normalizeText } from '../text/tokenize';
import LibLogger from '../logger';

const logger = LibLogger.get('Lexicon');

export const KEYWORD_CATEGORIES = ['color', 'garment', 'season', 'occasion', 'price', 'outfit'] as const;
export type KeywordCategory = typeof KEYWORD_CATEGORIES[number];

export const PRICE_RANGE_NAMES = ['very_low', 'low', 'medium', 'high', 'very_high'] as const;
export type PriceRangeName = typeof PRICE_RANGE_NAMES[number];

export interface PriceBounds {
  min: number;
  /** null for an open upper bound */
  max: number | null;
}

/**
 * Raw lexicon tables as configured. Entries may be written in any case or with
 * diacritics; {@link createLexicon} normalizes them.
 */
export interface LexiconTables {
  /** variant phrase → canonical phrase */
  substitutions: Record<string, string>;
  /** grammatical filler removed from queries */
  fillers: string[];
  /** canonical negation marker → variants that mean the same */
  negations: Record<string, string[]>;
  categories: Partial<Record<KeywordCategory, string[]>>;
  /** canonical price terms per range */
  priceTerms: Partial<Record<PriceRangeName, string[]>>;
  priceRanges: Record<PriceRangeName, PriceBounds>;
}

/**
 * Normalized, validated view of the lexicon tables.
 */
export interface Lexicon {
  /** Longest phrase, in tokens, the normalizer has to look for */
  readonly maxPhraseLength: number;
  /** Canonical replacement for a variant or negation variant */
  substitutionFor(phrase: string): string | undefined;
  isCanonical(phrase: string): boolean;
  isFiller(phrase: string): boolean;
  /** Whether the phrase is a canonical negation marker */
  isNegation(phrase: string): boolean;
  categoryOf(term: string): KeywordCategory | null;
  /** Canonical terms of one category, in table order */
  termsIn(category: KeywordCategory): readonly string[];
  priceRangeOf(term: string): PriceRangeName | null;
  priceBounds(range: PriceRangeName): PriceBounds;
}

const phraseLength = (phrase: string): number => phrase.split(' ').length;

const normalizeEntry = (entry: string, table: string): string => {
  const normalized = normalizeText(entry);
  if (!normalized) {
    throw new LexiconError(`Empty entry in ${table}: "${entry}"`);
  }
  return normalized;
};

/**
 * Build a lexicon from tables.
 *
 * @throws LexiconError when a substitution key is itself canonical, a
 * substitution target is another substitution key, or a filler or negation
 * variant collides with a canonical phrase
 */
export function createLexicon(tables: LexiconTables): Lexicon {
  const substitutions = new Map<string, string>();
  const canonical = new Set<string>();
  const negationMarkers = new Set<string>();
  const fillers = new Set<string>();
  const categories = new Map<string, KeywordCategory>();
  const priceTerms = new Map<string, PriceRangeName>();

  for (const category of KEYWORD_CATEGORIES) {
    for (const term of tables.categories[category] ?? []) {
      const normalized = normalizeEntry(term, `categories.${category}`);
      const existing = categories.get(normalized);
      if (existing && existing !== category) {
        throw new LexiconError(`"${normalized}" is listed under both ${existing} and ${category}`);
      }
      categories.set(normalized, category);
      canonical.add(normalized);
    }
  }

  for (const [variant, target] of Object.entries(tables.substitutions)) {
    const from = normalizeEntry(variant, 'substitutions');
    const to = normalizeEntry(target, 'substitutions');
    if (from === to) {
      continue;
    }
    substitutions.set(from, to);
    canonical.add(to);
  }

  for (const [marker, variants] of Object.entries(tables.negations)) {
    const to = normalizeEntry(marker, 'negations');
    negationMarkers.add(to);
    canonical.add(to);
    for (const variant of variants) {
      const from = normalizeEntry(variant, `negations.${marker}`);
      if (from !== to) {
        substitutions.set(from, to);
      }
    }
  }

  for (const [from, to] of substitutions) {
    if (canonical.has(from)) {
      throw new LexiconError(`Substitution key "${from}" is also a canonical phrase`);
    }
    if (substitutions.has(to)) {
      throw new LexiconError(`Substitution target "${to}" of "${from}" is itself substituted`);
    }
  }

  for (const filler of tables.fillers) {
    const normalized = normalizeEntry(filler, 'fillers');
    if (canonical.has(normalized) || substitutions.has(normalized)) {
      throw new LexiconError(`Filler "${normalized}" collides with a lexicon phrase`);
    }
    fillers.add(normalized);
  }

  for (const range of PRICE_RANGE_NAMES) {
    for (const term of tables.priceTerms[range] ?? []) {
      const normalized = normalizeEntry(term, `priceTerms.${range}`);
      if (!canonical.has(normalized)) {
        throw new LexiconError(`Price term "${normalized}" is not a canonical phrase`);
      }
      priceTerms.set(normalized, range);
    }
  }

  const ranges = { ...tables.priceRanges };
  for (const range of PRICE_RANGE_NAMES) {
    const bounds = ranges[range];
    if (bounds.min < 0 || (bounds.max !== null && bounds.max < bounds.min)) {
      throw new LexiconError(`Invalid price range ${range}: ${bounds.min}-${bounds.max ?? '∞'}`);
    }
  }

  let maxPhraseLength = 1;
  for (const phrase of [...canonical, ...substitutions.keys(), ...fillers]) {
    maxPhraseLength = Math.max(maxPhraseLength, phraseLength(phrase));
  }

  logger.debug('Lexicon built', {
    substitutions: substitutions.size,
    canonicalPhrases: canonical.size,
    fillers: fillers.size,
    maxPhraseLength
  });

  return Object.freeze({
    maxPhraseLength,
    substitutionFor: (phrase: string) => substitutions.get(phrase),
    isCanonical: (phrase: string) => canonical.has(phrase),
    isFiller: (phrase: string) => fillers.has(phrase),
    isNegation: (phrase: string) => negationMarkers.has(phrase),
    categoryOf: (term: string) => categories.get(term) ?? null,
    termsIn: (category: KeywordCategory) =>
      Array.from(categories).filter(([, owner]) => owner === category).map(([term]) => term),
    priceRangeOf: (term: string) => priceTerms.get(term) ?? null,
    priceBounds: (range: PriceRangeName) => ({ ...ranges[range] })
  });
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(item => typeof item === 'string');

const isKeywordCategory = (value: string): value is KeywordCategory =>
  KEYWORD_CATEGORIES.some(category => category === value);

const isPriceRangeName = (value: string): value is PriceRangeName =>
  PRICE_RANGE_NAMES.some(range => range === value);

const readStringMap = (value: unknown, table: string): Record<string, string> => {
  if (!isRecord(value)) {
    throw new LexiconError(`${table} must be an object`);
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new LexiconError(`${table}.${key} must be a string`);
    }
    result[key] = entry;
  }
  return result;
};

const readListMap = (value: unknown, table: string): Record<string, string[]> => {
  if (!isRecord(value)) {
    throw new LexiconError(`${table} must be an object`);
  }
  const result: Record<string, string[]> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isStringArray(entry)) {
      throw new LexiconError(`${table}.${key} must be a list of strings`);
    }
    result[key] = entry;
  }
  return result;
};

const readBounds = (value: unknown, range: string): PriceBounds => {
  const min = isRecord(value) ? value.min : undefined;
  const max = isRecord(value) ? value.max : undefined;
  if (typeof min !== 'number' || (max !== null && typeof max !== 'number')) {
    throw new LexiconError(`priceRanges.${range} must be { min: number, max: number | null }`);
  }
  return { min, max };
};

/**
 * Validate untyped data (parsed JSON) into lexicon tables
 */
export function parseLexiconTables(data: unknown): LexiconTables {
  if (!isRecord(data)) {
    throw new LexiconError('Lexicon data must be an object');
  }
  if (!isStringArray(data.fillers)) {
    throw new LexiconError('fillers must be a list of strings');
  }

  const categories: Partial<Record<KeywordCategory, string[]>> = {};
  for (const [category, terms] of Object.entries(readListMap(data.categories, 'categories'))) {
    if (!isKeywordCategory(category)) {
      throw new LexiconError(`Unknown keyword category "${category}". Valid categories are: ${KEYWORD_CATEGORIES.join(', ')}`);
    }
    categories[category] = terms;
  }

  const priceTerms: Partial<Record<PriceRangeName, string[]>> = {};
  for (const [range, terms] of Object.entries(readListMap(data.priceTerms ?? {}, 'priceTerms'))) {
    if (!isPriceRangeName(range)) {
      throw new LexiconError(`Unknown price range "${range}". Valid ranges are: ${PRICE_RANGE_NAMES.join(', ')}`);
    }
    priceTerms[range] = terms;
  }

  if (!isRecord(data.priceRanges)) {
    throw new LexiconError('priceRanges must be an object');
  }
  const rawRanges = data.priceRanges;
  const [veryLow, low, medium, high, veryHigh] = PRICE_RANGE_NAMES.map(range => readBounds(rawRanges[range], range));

  return {
    substitutions: readStringMap(data.substitutions, 'substitutions'),
    fillers: data.fillers,
    negations: readListMap(data.negations ?? {}, 'negations'),
    categories,
    priceTerms,
    priceRanges: { very_low: veryLow, low, medium, high, very_high: veryHigh }
  };
}

/**
 * Lexicon built from the bundled `data/lexicon.json`
 */
export function createDefaultLexicon(): Lexicon {
  return createLexicon(parseLexiconTables(lexiconData));
}
