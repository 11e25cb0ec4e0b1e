import { describe, expect, it } from 'vitest';
import { LexiconError } from '../../src/errors';
import {
  createDefaultLexicon,
  createLexicon,
  LexiconTables,
  parseLexiconTables
} from '../../src/lexicon/Lexicon';

const tables = (overrides: Partial<LexiconTables> = {}): LexiconTables => ({
  substitutions: {},
  fillers: [],
  negations: {},
  categories: {},
  priceTerms: {},
  priceRanges: {
    very_low: { min: 0, max: 100 },
    low: { min: 100, max: 200 },
    medium: { min: 200, max: 300 },
    high: { min: 300, max: 400 },
    very_high: { min: 400, max: null }
  },
  ...overrides
});

describe('Lexicon', () => {
  describe('createDefaultLexicon', () => {
    const lexicon = createDefaultLexicon();

    it('should map common misspellings onto canonical terms', () => {
      expect(lexicon.substitutionFor('sumer')).toBe('summer');
      expect(lexicon.substitutionFor('outfitt')).toBe('outfit');
      expect(lexicon.substitutionFor('t shirt')).toBe('t-shirt');
      expect(lexicon.substitutionFor('تيشرت')).toBe('تيشيرت');
    });

    it('should know multi-word garments as canonical phrases', () => {
      expect(lexicon.isCanonical('swim shorts')).toBe(true);
      expect(lexicon.categoryOf('swim shorts')).toBe('garment');
      expect(lexicon.substitutionFor('swim shorts')).toBeUndefined();
    });

    it('should route negation variants to their marker', () => {
      expect(lexicon.substitutionFor('dont')).toBe('not');
      expect(lexicon.substitutionFor('don t')).toBe('not');
      expect(lexicon.substitutionFor('بدون')).toBe('مش');
      expect(lexicon.isNegation('not')).toBe(true);
      expect(lexicon.isNegation('مش')).toBe(true);
      expect(lexicon.isNegation('no')).toBe(false);
    });

    it('should categorize terms in both languages', () => {
      expect(lexicon.categoryOf('red')).toBe('color');
      expect(lexicon.categoryOf('احمر')).toBe('color');
      expect(lexicon.categoryOf('wedding')).toBe('occasion');
      expect(lexicon.categoryOf('beach')).toBeNull();
    });

    it('should list the terms of a category in table order', () => {
      expect(lexicon.termsIn('outfit')).toEqual(['outfit', 'طقم']);
      expect(lexicon.termsIn('price')).toEqual(['cheap', 'expensive', 'luxury', 'رخيص', 'غالي']);
    });

    it('should know fillers', () => {
      expect(lexicon.isFiller('please')).toBe(true);
      expect(lexicon.isFiller('looking for')).toBe(true);
      expect(lexicon.isFiller('عايز')).toBe(true);
      expect(lexicon.isFiller('dress')).toBe(false);
    });

    it('should map price terms onto ranges', () => {
      expect(lexicon.priceRangeOf('cheap')).toBe('low');
      expect(lexicon.priceRangeOf('غالي')).toBe('high');
      expect(lexicon.priceRangeOf('luxury')).toBe('very_high');
      expect(lexicon.priceRangeOf('dress')).toBeNull();
      expect(lexicon.priceBounds('low')).toEqual({ min: 150, max: 350 });
      expect(lexicon.priceBounds('very_high')).toEqual({ min: 1200, max: null });
    });

    it('should look for phrases up to three tokens long', () => {
      expect(lexicon.maxPhraseLength).toBe(3);
    });
  });

  describe('createLexicon', () => {
    it('should normalize entries before use', () => {
      const lexicon = createLexicon(tables({
        substitutions: { 'Colour!': 'COLOR' },
        categories: { color: ['Color'] }
      }));

      expect(lexicon.substitutionFor('colour')).toBe('color');
      expect(lexicon.isCanonical('color')).toBe(true);
    });

    it('should ignore substitutions that map a term onto itself', () => {
      const lexicon = createLexicon(tables({ substitutions: { Red: 'red' }, categories: { color: ['red'] } }));

      expect(lexicon.substitutionFor('red')).toBeUndefined();
    });

    it('should make negation markers canonical', () => {
      const lexicon = createLexicon(tables({ negations: { not: ['never', 'NOT'] } }));

      expect(lexicon.isCanonical('not')).toBe(true);
      expect(lexicon.substitutionFor('never')).toBe('not');
      expect(lexicon.substitutionFor('not')).toBeUndefined();
    });

    it('should measure the longest phrase', () => {
      expect(createLexicon(tables({ fillers: ['do you have'] })).maxPhraseLength).toBe(3);
      expect(createLexicon(tables()).maxPhraseLength).toBe(1);
    });

    it('should hand out copies of price bounds', () => {
      const lexicon = createLexicon(tables());
      const bounds = lexicon.priceBounds('low');
      bounds.min = 0;

      expect(lexicon.priceBounds('low')).toEqual({ min: 100, max: 200 });
    });

    it('should reject a term listed under two categories', () => {
      expect(() => createLexicon(tables({ categories: { color: ['navy'], garment: ['navy'] } }))).toThrow(
        '"navy" is listed under both color and garment'
      );
    });

    it('should reject a substitution whose key is canonical', () => {
      expect(() => createLexicon(tables({ substitutions: { red: 'crimson' }, categories: { color: ['red'] } }))).toThrow(
        'Substitution key "red" is also a canonical phrase'
      );
    });

    it('should reject chained substitutions', () => {
      expect(() => createLexicon(tables({ substitutions: { tshirt: 'tee', tee: 't-shirt' } }))).toThrow(LexiconError);
    });

    it('should reject fillers that collide with lexicon phrases', () => {
      expect(() => createLexicon(tables({ fillers: ['red'], categories: { color: ['red'] } }))).toThrow(
        'Filler "red" collides with a lexicon phrase'
      );
    });

    it('should reject price terms that are not canonical', () => {
      expect(() => createLexicon(tables({ priceTerms: { low: ['bargain'] } }))).toThrow(
        'Price term "bargain" is not a canonical phrase'
      );
    });

    it('should reject inverted price ranges', () => {
      const invalid = tables();
      invalid.priceRanges.medium = { min: 300, max: 200 };

      expect(() => createLexicon(invalid)).toThrow('Invalid price range medium: 300-200');
    });

    it('should reject entries that normalize to nothing', () => {
      expect(() => createLexicon(tables({ fillers: ['!!'] }))).toThrow('Empty entry in fillers: "!!"');
    });
  });

  describe('parseLexiconTables', () => {
    const valid = {
      substitutions: { sumer: 'summer' },
      fillers: ['please'],
      negations: { not: ['no'] },
      categories: { season: ['summer'] },
      priceTerms: {},
      priceRanges: tables().priceRanges
    };

    it('should accept well-formed data', () => {
      const parsed = parseLexiconTables(valid);

      expect(parsed.substitutions).toEqual({ sumer: 'summer' });
      expect(parsed.categories).toEqual({ season: ['summer'] });
      expect(parsed.priceRanges.very_high).toEqual({ min: 400, max: null });
    });

    it('should default missing negations and price terms', () => {
      const parsed = parseLexiconTables({ ...valid, negations: undefined, priceTerms: undefined });

      expect(parsed.negations).toEqual({});
      expect(parsed.priceTerms).toEqual({});
    });

    it('should reject data that is not an object', () => {
      expect(() => parseLexiconTables([])).toThrow('Lexicon data must be an object');
    });

    it('should reject malformed tables', () => {
      expect(() => parseLexiconTables({ ...valid, fillers: 'please' })).toThrow('fillers must be a list of strings');
      expect(() => parseLexiconTables({ ...valid, substitutions: { sumer: 1 } })).toThrow('substitutions.sumer must be a string');
      expect(() => parseLexiconTables({ ...valid, priceRanges: { ...valid.priceRanges, low: { min: '100' } } })).toThrow(
        'priceRanges.low must be { min: number, max: number | null }'
      );
    });

    it('should reject unknown categories and ranges', () => {
      expect(() => parseLexiconTables({ ...valid, categories: { fabric: ['silk'] } })).toThrow('Unknown keyword category "fabric"');
      expect(() => parseLexiconTables({ ...valid, priceTerms: { free: ['gratis'] } })).toThrow('Unknown price range "free"');
    });
  });
});
