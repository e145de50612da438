/**
 * Recipe Ranker
 *
 * Scores indexed recipes against a QueryIntent and returns the top N.
 * Pure and deterministic: same intent, index and vector give the same list.
 *
 * Score: +1 per constrained category the recipe satisfies.
 * Order: score desc → similarity desc (null last) → tag popularity desc → timeMinutes asc
 * → dataset order. Popularity is only computed for the default ordering.
 * Unconstrained intent: description similarity to the query when vectors exist,
 * otherwise tag popularity (sum of dataset frequencies of the recipe's tags).
 */

import { cosineSimilarity } from '../../../embeddings/similarity.js';
import type { MatchMode } from '../../../config/recommender.config.js';
import { singularizePhrase } from '../../../utils/inflection.js';
import type { RecipeIndex } from '../index/recipe-index.js';
import {
  constrainedCategories,
  type FacetCategory,
  type QueryIntent,
  type RankingPath,
  type Recipe,
  type ScoredMatch,
  type TimeConstraint,
} from '../types.js';

export interface RankOptions {
  /** Embedding of the normalized query */
  queryVector?: readonly number[] | null;
  /** 'all': every constrained category must match (default). 'any': at least one. */
  matchMode?: MatchMode;
}

interface Candidate {
  position: number;
  recipe: Recipe;
  score: number;
  similarity: number | null;
  /** Secondary key for the default ordering; 0 otherwise */
  popularity: number;
  matchedFacets: FacetCategory[];
}

export function satisfiesTime(minutes: number, constraint: TimeConstraint): boolean {
  if (constraint.maxMinutes !== null && minutes > constraint.maxMinutes) return false;
  if (constraint.minMinutes !== null && minutes < constraint.minMinutes) return false;
  return true;
}

/**
 * Which ordering rank() applies to this intent.
 */
export function rankingPath(
  intent: QueryIntent,
  index: RecipeIndex,
  queryVector: readonly number[] | null | undefined
): RankingPath {
  if (constrainedCategories(intent).length > 0) return 'facets';
  return queryVector && index.descriptionVectors ? 'semantic' : 'default';
}

export function rank(
  intent: QueryIntent,
  index: RecipeIndex,
  topN: number,
  options: RankOptions = {}
): ScoredMatch[] {
  const limit = Math.max(0, Math.floor(topN));
  if (limit === 0 || index.recipes.length === 0) return [];

  const matchMode = options.matchMode ?? 'all';
  const queryVector = options.queryVector ?? null;
  const vectors = queryVector ? index.descriptionVectors : null;
  const constrained = constrainedCategories(intent);
  const hits = new Map(constrained.map(category => [category, positionsFor(category, intent, index)]));

  const candidates: Candidate[] = [];
  index.recipes.forEach((recipe, position) => {
    const matchedFacets = constrained.filter(category => hits.get(category)?.has(position) ?? false);
    const score = matchedFacets.length;

    if (constrained.length > 0) {
      const passes = matchMode === 'all' ? score === constrained.length : score >= 1;
      if (!passes) return;
    }

    const vector = vectors?.[position];
    candidates.push({
      position,
      recipe,
      score,
      similarity: queryVector && vector ? cosineSimilarity(queryVector, vector) : null,
      popularity: constrained.length === 0 && !vectors ? popularity(recipe, index) : 0,
      matchedFacets,
    });
  });

  candidates.sort(compareCandidates);

  return candidates.slice(0, limit).map(c => Object.freeze({
    recipeId: c.recipe.id,
    score: c.score,
    similarity: c.similarity,
    matchedFacets: Object.freeze(c.matchedFacets),
  }));
}

function positionsFor(category: FacetCategory, intent: QueryIntent, index: RecipeIndex): Set<number> {
  const out = new Set<number>();

  if (category === 'timeConstraint') {
    const constraint = intent.timeConstraint;
    if (!constraint) return out;
    index.recipes.forEach((recipe, position) => {
      if (satisfiesTime(recipe.timeMinutes, constraint)) out.add(position);
    });
    return out;
  }

  for (const value of intent[category] ?? []) {
    const keys = category === 'ingredient' ? [value, singularizePhrase(value)] : [value];
    const lookup = category === 'ingredient' ? index.byIngredient : index.byTag;
    for (const key of keys) {
      for (const position of lookup.get(key) ?? []) out.add(position);
    }
  }
  return out;
}

function popularity(recipe: Recipe, index: RecipeIndex): number {
  return recipe.tags.reduce((sum, tag) => sum + (index.tagFrequency.get(tag) ?? 0), 0);
}

/** Descending on a nullable number, null sorting last */
function compareDesc(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  return (
    b.score - a.score ||
    compareDesc(a.similarity, b.similarity) ||
    b.popularity - a.popularity ||
    a.recipe.timeMinutes - b.recipe.timeMinutes ||
    a.position - b.position
  );
}
