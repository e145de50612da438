/**
 * Recipe Recommender
 *
 * One query turn: normalize → special-utterance check → query embedding →
 * intent extraction → ranking → recipe views.
 *
 * Everything shared (lexicon, index, reference vectors) is built once by
 * createRecommender() and read-only afterwards; recommend() keeps its state local.
 */

import type { RecommenderConfig, MatchMode } from '../../config/recommender.config.js';
import { embedWithDeadline } from '../../embeddings/embed-batches.js';
import { createEmbeddingProvider } from '../../embeddings/factory.js';
import type { EmbeddingProvider } from '../../embeddings/types.js';
import { logger, type Logger } from '../../lib/logger/structured-logger.js';
import { isTimeoutError } from '../../lib/reliability/timeout-guard.js';
import { buildRecipeIndex, embedDescriptions, type RecipeIndex } from './index/recipe-index.js';
import { loadRecipesCsv } from './index/recipe-loader.js';
import { buildFacetVectors, type FacetVectors } from './intent/facet-vectors.js';
import { IntentExtractor } from './intent/intent-extractor.js';
import { detectSpecialIntent } from './intent/special-intent.js';
import { Lexicon } from './lexicon/lexicon.js';
import { TextNormalizer, tokenize } from './normalizer/text-normalizer.js';
import { rank, rankingPath } from './ranking/recipe-ranker.js';
import {
  isUnconstrained,
  type QueryIntent,
  type Recipe,
  type RecipeView,
  type RecommendationResult,
  type SpecialIntent,
} from './types.js';

export const SPECIAL_MESSAGES: Readonly<Record<SpecialIntent, string>> = {
  greeting: 'Hello! How can I help you find recipes today?',
  goodbye: 'Goodbye! Happy cooking!',
  help: "Ask me for a cuisine, diet, meal type, cooking time or ingredient, like 'quick vegan dessert' or 'italian chicken'.",
  thanks: "You're welcome! Want another recipe?",
};

export const NO_MATCHES_MESSAGE = "Sorry, I couldn't find any recipes matching your request.";

export interface RecommenderSettings {
  topN: number;
  matchMode: MatchMode;
  /** Bound on the per-query embedding call, for providers without maxDurationMs */
  embeddingTimeoutMs: number;
}

export interface RecommenderDeps {
  lexicon: Lexicon;
  index: RecipeIndex;
  extractor: IntentExtractor;
  embeddingProvider: EmbeddingProvider | null;
  facetVectors: FacetVectors | null;
  settings: RecommenderSettings;
}

export interface RecommendOptions {
  /** Overrides settings.topN for this call */
  topN?: number;
  /** Request-scoped logger (defaults to the root logger) */
  log?: Logger;
}

/**
 * Minimal surface used by the HTTP and CLI layers; lets tests swap in a stub.
 */
export interface Recommender {
  recommend(rawQuery: string, options?: RecommendOptions): Promise<RecommendationResult>;
}

export class RecipeRecommender implements Recommender {
  private readonly normalizer: TextNormalizer;
  private readonly recipesById: ReadonlyMap<string, Recipe>;
  private readonly usesQueryVector: boolean;

  constructor(private readonly deps: RecommenderDeps) {
    this.normalizer = new TextNormalizer(deps.lexicon.fillerPhrases);
    this.recipesById = new Map(deps.index.recipes.map(r => [r.id, r]));
    this.usesQueryVector =
      deps.embeddingProvider !== null &&
      (deps.facetVectors !== null || deps.index.descriptionVectors !== null);
  }

  async recommend(rawQuery: string, options: RecommendOptions = {}): Promise<RecommendationResult> {
    const log = options.log ?? logger;
    const topN = options.topN ?? this.deps.settings.topN;
    const t0 = Date.now();

    const tokens = this.normalizer.normalize(rawQuery);

    const special = detectSpecialIntent(tokenize(rawQuery), this.deps.lexicon);
    if (special && isUnconstrained(this.deps.extractor.extract(tokens))) {
      log.info({ event: 'recommendation_special', special, queryLength: rawQuery.length }, '[RECIPES] Special utterance');
      return { kind: 'special', intent: special, message: SPECIAL_MESSAGES[special] };
    }

    const queryVector = await this.embedQuery(tokens, log);
    const intent = this.deps.extractor.extract(tokens, queryVector);
    const matches = rank(intent, this.deps.index, topN, {
      queryVector,
      matchMode: this.deps.settings.matchMode,
    });

    const recipes = matches.flatMap((match): RecipeView[] => {
      const recipe = this.recipesById.get(match.recipeId);
      return recipe
        ? [{ ...recipe, score: match.score, similarity: match.similarity, matchedFacets: match.matchedFacets }]
        : [];
    });

    const path = rankingPath(intent, this.deps.index, queryVector);
    log.info({
      event: 'recommendation_completed',
      queryLength: rawQuery.length,
      tokenCount: tokens.length,
      intent: summarizeIntent(intent),
      path,
      resultCount: recipes.length,
      durationMs: Date.now() - t0
    }, '[RECIPES] Recommendation completed');

    if (recipes.length === 0) {
      return { kind: 'no_matches', intent, message: NO_MATCHES_MESSAGE };
    }
    return { kind: 'results', intent, path, recipes };
  }

  /**
   * Embedding of the normalized query, or null when there is nothing to
   * compare it with, no provider, or the call fails or times out.
   */
  private async embedQuery(tokens: readonly string[], log: Logger): Promise<number[] | null> {
    const provider = this.deps.embeddingProvider;
    if (!provider || !this.usesQueryVector || tokens.length === 0) return null;

    try {
      const [vector] = await embedWithDeadline(
        provider,
        [tokens.join(' ')],
        this.deps.settings.embeddingTimeoutMs,
        'query_embedding'
      );
      return vector && vector.length > 0 ? vector : null;
    } catch (err) {
      log.warn({
        event: 'query_embedding_unavailable',
        provider: provider.name,
        timeout: isTimeoutError(err),
        error: err instanceof Error ? err.message : String(err)
      }, '[RECIPES] Query embedding failed, semantic steps skipped');
      return null;
    }
  }
}

function summarizeIntent(intent: QueryIntent): Record<string, unknown> {
  const { timeConstraint, ...values } = intent;
  return {
    ...values,
    ...(timeConstraint ? { time: timeConstraint.label, maxMinutes: timeConstraint.maxMinutes, minMinutes: timeConstraint.minMinutes } : {}),
  };
}

export interface CreateRecommenderOverrides {
  /** Replaces the provider named by the configuration (null disables embeddings) */
  embeddingProvider?: EmbeddingProvider | null;
}

/**
 * Load lexicon and dataset, embed reference phrases and descriptions, and wire
 * the recommender. Lexicon and dataset errors propagate; embedding failures
 * only disable the semantic steps.
 */
export async function createRecommender(
  config: RecommenderConfig,
  overrides: CreateRecommenderOverrides = {}
): Promise<RecipeRecommender> {
  const t0 = Date.now();
  const [lexicon, records] = await Promise.all([
    Lexicon.load(config.lexiconPath),
    loadRecipesCsv(config.recipesPath),
  ]);

  const provider = overrides.embeddingProvider !== undefined
    ? overrides.embeddingProvider
    : createEmbeddingProvider(config.embedding);
  const batch = { batchSize: config.embedding.batchSize, timeoutMs: config.embedding.timeoutMs };

  const [facetVectors, index] = await Promise.all([
    buildFacetVectors(lexicon, provider, batch),
    embedDescriptions(
      buildRecipeIndex(records, {
        tagAliases: lexicon.tagAliases(),
        ingredientAliases: lexicon.ingredientAliases(),
      }),
      provider,
      batch
    ),
  ]);

  const extractor = new IntentExtractor(lexicon, {
    semanticThreshold: config.semanticThreshold,
    quickMaxMinutes: config.quickMaxMinutes,
    slowMinMinutes: config.slowMinMinutes,
    ingredientVocabulary: config.useDatasetVocabulary ? index.ingredientVocabulary : undefined,
    facetVectors,
  });

  logger.info({
    event: 'recommender_ready',
    recipes: index.recipes.length,
    embeddingProvider: provider?.name ?? 'none',
    facetVectors: facetVectors !== null,
    descriptionVectors: index.descriptionVectors !== null,
    durationMs: Date.now() - t0
  }, '[RECIPES] Recommender ready');

  return new RecipeRecommender({
    lexicon,
    index,
    extractor,
    embeddingProvider: provider,
    facetVectors,
    settings: {
      topN: config.topN,
      matchMode: config.matchMode,
      embeddingTimeoutMs: config.embedding.timeoutMs,
    },
  });
}
