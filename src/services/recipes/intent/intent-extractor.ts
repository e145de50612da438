/**
 * Intent Extractor
 *
 * Maps normalized tokens to a QueryIntent by running an explicit, ordered list of
 * strategies. Each strategy owns one category and one kind of evidence; tokens a
 * strategy matches are consumed and invisible to later strategies.
 *
 * Default order:
 *   cuisine lexicon → cuisine semantic
 *   diet lexicon → diet semantic
 *   mealType lexicon → mealType semantic
 *   explicit time pattern → qualitative time term
 *   ingredient lexicon → ingredient vocabulary scan
 */

import { bestMatch } from '../../../embeddings/similarity.js';
import { logger } from '../../../lib/logger/structured-logger.js';
import { singularizePhrase } from '../../../utils/inflection.js';
import type { Lexicon } from '../lexicon/lexicon.js';
import type { FacetVectors } from './facet-vectors.js';
import { findExplicitTime } from './time-patterns.js';
import {
  TAG_FACET_CATEGORIES,
  VALUE_FACET_CATEGORIES,
  type FacetCategory,
  type QueryIntent,
  type TagFacetCategory,
  type TimeConstraint,
  type ValueFacetCategory,
} from '../types.js';

export type StrategyKind = 'lexicon' | 'semantic' | 'pattern' | 'vocabulary';

/**
 * Mutable per-call state shared by the strategies of one extract() call.
 */
export class ExtractionContext {
  readonly consumed = new Set<number>();
  private readonly values = new Map<ValueFacetCategory, { value: string; position: number }[]>();
  private time: TimeConstraint | undefined;

  constructor(
    readonly tokens: readonly string[],
    readonly queryVector: readonly number[] | null
  ) {}

  has(category: FacetCategory): boolean {
    if (category === 'timeConstraint') return this.time !== undefined;
    return (this.values.get(category)?.length ?? 0) > 0;
  }

  addValue(category: ValueFacetCategory, value: string, position: number): void {
    const list = this.values.get(category) ?? [];
    if (!list.some(v => v.value === value)) list.push({ value, position });
    this.values.set(category, list);
  }

  setTime(constraint: TimeConstraint): void {
    this.time ??= constraint;
  }

  consume(start: number, length: number): void {
    for (let k = start; k < start + length; k++) this.consumed.add(k);
  }

  isFree(start: number, length: number): boolean {
    for (let k = start; k < start + length; k++) {
      if (this.consumed.has(k)) return false;
    }
    return true;
  }

  /** Frozen intent; values ordered by query position */
  toIntent(): QueryIntent {
    const intent: { -readonly [K in keyof QueryIntent]: QueryIntent[K] } = {};
    for (const category of VALUE_FACET_CATEGORIES) {
      const list = this.values.get(category);
      if (list && list.length > 0) {
        const ordered = [...list].sort((a, b) => a.position - b.position).map(v => v.value);
        intent[category] = Object.freeze(ordered);
      }
    }
    if (this.time) intent.timeConstraint = Object.freeze({ ...this.time });
    return Object.freeze(intent);
  }
}

export interface ExtractionStrategy {
  readonly name: string;
  readonly category: FacetCategory;
  readonly kind: StrategyKind;
  apply(ctx: ExtractionContext): void;
}

export interface IntentExtractorOptions {
  /** Cosine cutoff for the semantic fallback; a match must be strictly above it */
  semanticThreshold: number;
  quickMaxMinutes: number;
  slowMinMinutes: number;
  /** Known ingredient names from the dataset, lowercase */
  ingredientVocabulary?: ReadonlySet<string>;
  facetVectors?: FacetVectors | null;
}

interface NgramHit<T> {
  start: number;
  length: number;
  match: T;
}

/**
 * Scan unconsumed n-grams, longest first, and consume every hit.
 */
function scanNgrams<T>(
  ctx: ExtractionContext,
  maxTokens: number,
  match: (phrase: string, words: readonly string[]) => T | undefined
): NgramHit<T>[] {
  const hits: NgramHit<T>[] = [];
  const longest = Math.min(maxTokens, ctx.tokens.length);
  for (let n = longest; n >= 1; n--) {
    for (let start = 0; start + n <= ctx.tokens.length; start++) {
      if (!ctx.isFree(start, n)) continue;
      const words = ctx.tokens.slice(start, start + n);
      const found = match(words.join(' '), words);
      if (found !== undefined) {
        ctx.consume(start, n);
        hits.push({ start, length: n, match: found });
      }
    }
  }
  return hits.sort((a, b) => a.start - b.start);
}

export function lexiconStrategy(category: ValueFacetCategory, lexicon: Lexicon): ExtractionStrategy {
  return {
    name: `${category}:lexicon`,
    category,
    kind: 'lexicon',
    apply(ctx) {
      const hits = scanNgrams(ctx, lexicon.maxPhraseTokens, phrase => {
        const def = lexicon.lookup(phrase);
        return def?.category === category ? def.value : undefined;
      });
      for (const hit of hits) ctx.addValue(category, hit.match, hit.start);
    },
  };
}

export function semanticStrategy(
  category: TagFacetCategory,
  facetVectors: FacetVectors | null | undefined,
  threshold: number
): ExtractionStrategy {
  return {
    name: `${category}:semantic`,
    category,
    kind: 'semantic',
    apply(ctx) {
      const candidates = facetVectors?.get(category);
      if (ctx.has(category) || !ctx.queryVector || !candidates || candidates.length === 0) return;

      const best = bestMatch(ctx.queryVector, candidates.map(c => c.vector));
      const winner = candidates[best.index];
      if (winner && best.similarity > threshold) {
        ctx.addValue(category, winner.definition.value, Number.MAX_SAFE_INTEGER);
      }
    },
  };
}

export function explicitTimeStrategy(): ExtractionStrategy {
  return {
    name: 'timeConstraint:pattern',
    category: 'timeConstraint',
    kind: 'pattern',
    apply(ctx) {
      if (ctx.has('timeConstraint')) return;
      const match = findExplicitTime(ctx.tokens, ctx.consumed);
      if (!match) return;
      ctx.consume(match.start, match.end - match.start);
      ctx.setTime(match.constraint);
    },
  };
}

export function qualitativeTimeStrategy(
  lexicon: Lexicon,
  quickMaxMinutes: number,
  slowMinMinutes: number
): ExtractionStrategy {
  return {
    name: 'timeConstraint:lexicon',
    category: 'timeConstraint',
    kind: 'lexicon',
    apply(ctx) {
      if (ctx.has('timeConstraint')) return;
      const hits = scanNgrams(ctx, lexicon.maxPhraseTokens, phrase => {
        const def = lexicon.lookup(phrase);
        return def?.category === 'timeConstraint' ? def.value : undefined;
      });
      const first = hits[0];
      if (!first) return;
      ctx.setTime(
        first.match === 'slow'
          ? { label: 'slow', maxMinutes: null, minMinutes: slowMinMinutes }
          : { label: 'quick', maxMinutes: quickMaxMinutes, minMinutes: null }
      );
    },
  };
}

/**
 * Content-token n-grams that name a known dataset ingredient.
 * Singular and plural spellings are both tried against the vocabulary.
 */
export function vocabularyStrategy(lexicon: Lexicon, vocabulary: ReadonlySet<string>): ExtractionStrategy {
  return {
    name: 'ingredient:vocabulary',
    category: 'ingredient',
    kind: 'vocabulary',
    apply(ctx) {
      if (vocabulary.size === 0) return;
      const hits = scanNgrams(ctx, 3, (phrase, words) => {
        if (words.some(w => w.length <= 2 || lexicon.isStopWord(w))) return undefined;
        return spellings(phrase).find(s => vocabulary.has(s));
      });
      for (const hit of hits) ctx.addValue('ingredient', hit.match, hit.start);
    },
  };
}

function spellings(phrase: string): string[] {
  const singular = singularizePhrase(phrase);
  return [...new Set([phrase, singular, `${singular}s`, `${singular}es`])];
}

export function defaultStrategies(lexicon: Lexicon, options: IntentExtractorOptions): ExtractionStrategy[] {
  const strategies: ExtractionStrategy[] = [];
  for (const category of TAG_FACET_CATEGORIES) {
    strategies.push(lexiconStrategy(category, lexicon));
    strategies.push(semanticStrategy(category, options.facetVectors, options.semanticThreshold));
  }
  strategies.push(explicitTimeStrategy());
  strategies.push(qualitativeTimeStrategy(lexicon, options.quickMaxMinutes, options.slowMinMinutes));
  strategies.push(lexiconStrategy('ingredient', lexicon));
  if (options.ingredientVocabulary) {
    strategies.push(vocabularyStrategy(lexicon, options.ingredientVocabulary));
  }
  return strategies;
}

export class IntentExtractor {
  readonly strategies: readonly ExtractionStrategy[];

  constructor(lexicon: Lexicon, options: IntentExtractorOptions, strategies?: readonly ExtractionStrategy[]) {
    this.strategies = Object.freeze([...(strategies ?? defaultStrategies(lexicon, options))]);
  }

  /**
   * Never throws: a failing strategy is logged and skipped.
   * @param queryVector - Embedding of the whole normalized query, if available
   */
  extract(tokens: readonly string[], queryVector: readonly number[] | null = null): QueryIntent {
    const ctx = new ExtractionContext(tokens, queryVector);
    for (const strategy of this.strategies) {
      try {
        strategy.apply(ctx);
      } catch (err) {
        logger.warn({
          event: 'intent_strategy_failed',
          strategy: strategy.name,
          error: err instanceof Error ? err.message : String(err)
        }, '[INTENT] Strategy failed, skipped');
      }
    }
    return ctx.toIntent();
  }
}
