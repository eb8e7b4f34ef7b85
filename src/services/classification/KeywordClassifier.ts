import { logger } from '../../middleware/logging.js';
import { InputValidationError } from '../../errors/index.js';
import { OTHER_CATEGORY } from '../../config/constants.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import defaultPatterns from '../../config/keywordPatterns.json';

/**
 * Keyword Classifier
 *
 * Maps text (usually OCR output) to a category by counting case-insensitive
 * regex matches per category. A deliberately simple fallback.
 *
 * Tie-break: on equal highest nonzero scores the category declared first wins.
 * Declaration order is the insertion order of the pattern table; categories
 * added at runtime go to the end.
 */

interface CompiledPattern {
  source: string;
  regex: RegExp;
}

export interface CategoryScore {
  category: string;
  score: number;
  matchedPatterns: string[];
}

export interface ScoreResult {
  category: string;
  scores: CategoryScore[];
}

export type PatternTable = Record<string, readonly string[]>;

export const DEFAULT_KEYWORD_PATTERNS: PatternTable = defaultPatterns;

/**
 * The part of a pattern table covering the given categories, in table order.
 * Categories without patterns are left out; they can only be reached through "other".
 */
export function patternsForCategories(
  categories: readonly string[],
  table: PatternTable = DEFAULT_KEYWORD_PATTERNS
): PatternTable {
  const selected: Record<string, readonly string[]> = {};
  for (const [category, sources] of Object.entries(table)) {
    if (categories.includes(category)) {
      selected[category] = sources;
    }
  }
  return selected;
}

export class KeywordClassifier {
  private readonly patterns = new Map<string, CompiledPattern[]>();

  constructor(patterns: PatternTable = DEFAULT_KEYWORD_PATTERNS) {
    for (const [category, sources] of Object.entries(patterns)) {
      this.patterns.set(category, sources.map(source => compile(category, source)));
    }

    logger.info('KeywordClassifier initialized', {
      categories: Array.from(this.patterns.keys()),
    });
  }

  /**
   * Classify text. Empty text or no matches at all gives "other".
   */
  classify(text: string): string {
    return this.score(text).category;
  }

  /**
   * Score text against every category (or only the given ones) and pick the winner
   */
  score(text: string, categories?: readonly string[]): ScoreResult {
    if (!text || !text.trim()) {
      logger.debug('Empty text provided, returning other');
      return { category: OTHER_CATEGORY, scores: [] };
    }

    const scores: CategoryScore[] = [];
    for (const [category, compiled] of this.patterns) {
      if (categories && !categories.includes(category)) {
        continue;
      }

      let score = 0;
      const matchedPatterns: string[] = [];
      for (const pattern of compiled) {
        const matches = text.match(pattern.regex);
        if (matches) {
          score += matches.length;
          matchedPatterns.push(pattern.source);
        }
      }
      scores.push({ category, score, matchedPatterns });
    }

    // Strictly greater keeps the first-declared category on ties
    let best: CategoryScore | undefined;
    for (const entry of scores) {
      if (entry.score > 0 && (!best || entry.score > best.score)) {
        best = entry;
      }
    }

    if (!best) {
      logger.debug('No keyword matches found, returning other');
      return { category: OTHER_CATEGORY, scores };
    }

    logger.debug('Classified text', { category: best.category, matches: best.score });
    return { category: best.category, scores };
  }

  /**
   * Register a pattern, creating the category if needed.
   * Classifications already returned are not affected.
   */
  addPattern(category: string, pattern: string): void {
    const compiled = compile(category, pattern);

    let list = this.patterns.get(category);
    if (!list) {
      logger.info('Creating new keyword category', { category });
      list = [];
      this.patterns.set(category, list);
    }

    list.push(compiled);
    logger.info('Added keyword pattern', { category, pattern });
  }

  /**
   * Declared categories plus "other"
   */
  getCategories(): string[] {
    const categories = Array.from(this.patterns.keys());
    if (!categories.includes(OTHER_CATEGORY)) {
      categories.push(OTHER_CATEGORY);
    }
    return categories;
  }

  /**
   * Snapshot of the pattern sources per category
   */
  getPatterns(): Record<string, string[]> {
    const snapshot: Record<string, string[]> = {};
    for (const [category, compiled] of this.patterns) {
      snapshot[category] = compiled.map(pattern => pattern.source);
    }
    return snapshot;
  }
}

function compile(category: string, source: string): CompiledPattern {
  try {
    return { source, regex: new RegExp(source, 'gi') };
  } catch (error) {
    throw new InputValidationError('pattern', source, `Invalid pattern for '${category}': ${getErrorMessage(error)}`, {
      service: 'KeywordClassifier',
      operation: 'compile',
    });
  }
}
