import type { KeywordCategory, Lexicon } from '../lexicon/Lexicon';
import { tokenize } from '../text/tokenize';
import LibLogger from '../logger';

const logger = LibLogger.get('QueryNormalizer');

export interface Keyword {
  readonly term: string;
  readonly category: KeywordCategory | null;
  /** Preceded by a negation marker ("not red", "مش احمر") */
  readonly negated: boolean;
}

export interface NormalizedQuery {
  readonly rawText: string;
  readonly canonicalText: string;
  /** Distinct by term, in order of first appearance */
  readonly keywords: readonly Keyword[];
}

const MAX_PASSES = 8;
const MIN_KEYWORD_LENGTH = 2;

/**
 * Rewrites colloquial, misspelt queries into canonical form.
 *
 * Each pass scans left to right and, at every position, takes the longest
 * phrase the lexicon knows. Canonical phrases are kept, variants replaced,
 * fillers dropped. Passes repeat until the output stops changing, so the
 * result of `normalize` is always a fixed point.
 */
export class QueryNormalizer {
  constructor(private readonly lexicon: Lexicon) {}

  /**
   * Passing a NormalizedQuery re-normalizes its canonical text and keeps its raw text.
   */
  normalize(input: string | NormalizedQuery): NormalizedQuery {
    const rawText = typeof input === 'string' ? input : input.rawText;
    let tokens = tokenize(typeof input === 'string' ? input : input.canonicalText);

    let pass = 0;
    for (; pass < MAX_PASSES; pass++) {
      const rewritten = this.rewrite(tokens);
      if (sameTokens(rewritten, tokens)) {
        break;
      }
      tokens = rewritten;
    }
    if (pass === MAX_PASSES) {
      logger.warning('Query did not settle within the pass limit', { rawText, passes: MAX_PASSES });
    }

    const query: NormalizedQuery = {
      rawText,
      canonicalText: tokens.join(' '),
      keywords: Object.freeze(this.extractKeywords(tokens))
    };
    logger.debug('Normalized query', { rawText, canonicalText: query.canonicalText, keywords: query.keywords.length });
    return Object.freeze(query);
  }

  private rewrite(tokens: string[]): string[] {
    const output: string[] = [];
    let position = 0;

    while (position < tokens.length) {
      const maxLength = Math.min(this.lexicon.maxPhraseLength, tokens.length - position);
      let consumed = 0;

      for (let length = maxLength; length >= 1 && consumed === 0; length--) {
        const phrase = tokens.slice(position, position + length).join(' ');
        if (this.lexicon.isCanonical(phrase)) {
          output.push(...phrase.split(' '));
          consumed = length;
          continue;
        }
        const replacement = this.lexicon.substitutionFor(phrase);
        if (typeof replacement !== 'undefined') {
          output.push(...replacement.split(' '));
          consumed = length;
          continue;
        }
        if (this.lexicon.isFiller(phrase)) {
          consumed = length;
        }
      }

      if (consumed === 0) {
        output.push(tokens[position]);
        consumed = 1;
      }
      position += consumed;
    }

    return output;
  }

  private extractKeywords(tokens: string[]): Keyword[] {
    const keywords: Keyword[] = [];
    const seen = new Set<string>();
    let negatePending = false;
    let position = 0;

    while (position < tokens.length) {
      const { phrase, length } = this.longestCanonical(tokens, position);
      position += length;

      if (this.lexicon.isNegation(phrase)) {
        negatePending = true;
        continue;
      }
      if (phrase.length < MIN_KEYWORD_LENGTH) {
        continue;
      }
      if (!seen.has(phrase)) {
        seen.add(phrase);
        keywords.push(Object.freeze({
          term: phrase,
          category: this.lexicon.categoryOf(phrase),
          negated: negatePending
        }));
      }
      negatePending = false;
    }

    return keywords;
  }

  private longestCanonical(tokens: string[], position: number): { phrase: string; length: number } {
    const maxLength = Math.min(this.lexicon.maxPhraseLength, tokens.length - position);
    for (let length = maxLength; length > 1; length--) {
      const phrase = tokens.slice(position, position + length).join(' ');
      if (this.lexicon.isCanonical(phrase)) {
        return { phrase, length };
      }
    }
    return { phrase: tokens[position], length: 1 };
  }
}

const sameTokens = (a: string[], b: string[]): boolean =>
  a.length === b.length && a.every((token, index) => token === b[index]);
