/**
 * Recipe recommendation domain types
 */

import { z } from 'zod';

/**
 * Facet categories, in extraction precedence order.
 * Ingredient is last: its vocabulary is open-ended and the most prone to false positives.
 */
export const FacetCategorySchema = z.enum(['cuisine', 'diet', 'mealType', 'timeConstraint', 'ingredient']);
export type FacetCategory = z.infer<typeof FacetCategorySchema>;
export const FACET_CATEGORIES: readonly FacetCategory[] = FacetCategorySchema.options;

/** Categories whose values are matched against recipe tags */
export type TagFacetCategory = 'cuisine' | 'diet' | 'mealType';
export const TAG_FACET_CATEGORIES: readonly TagFacetCategory[] = ['cuisine', 'diet', 'mealType'];

/** Categories with free-text values (everything but the time bound) */
export type ValueFacetCategory = TagFacetCategory | 'ingredient';
export const VALUE_FACET_CATEGORIES: readonly ValueFacetCategory[] = ['cuisine', 'diet', 'mealType', 'ingredient'];

export type TimeLabel = 'quick' | 'slow' | 'explicit';

/**
 * Time bound in minutes. Exactly one of maxMinutes/minMinutes is set.
 */
export interface TimeConstraint {
  readonly label: TimeLabel;
  readonly maxMinutes: number | null;
  readonly minMinutes: number | null;
}

/**
 * Structured facets for one query turn.
 * A missing key means "unconstrained"; a present key is never an empty list.
 */
export interface QueryIntent {
  readonly cuisine?: readonly string[];
  readonly diet?: readonly string[];
  readonly mealType?: readonly string[];
  readonly ingredient?: readonly string[];
  readonly timeConstraint?: TimeConstraint;
}

/** Raw recipe as handed over by the dataset loader */
export const RecipeRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string().default(''),
  tags: z.array(z.string()).default([]),
  ingredients: z.array(z.string()).default([]),
  timeMinutes: z.number().finite().nonnegative(),
});
export type RecipeRecord = z.input<typeof RecipeRecordSchema>;

/**
 * Indexed recipe. Tags and ingredients are lowercase, trimmed and de-duplicated.
 */
export interface Recipe {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly tags: readonly string[];
  readonly ingredients: readonly string[];
  readonly timeMinutes: number;
}

export interface ScoredMatch {
  readonly recipeId: string;
  /** Number of constrained categories the recipe satisfies */
  readonly score: number;
  /** Description-embedding similarity to the query, null when unavailable */
  readonly similarity: number | null;
  readonly matchedFacets: readonly FacetCategory[];
}

export type SpecialIntent = 'greeting' | 'goodbye' | 'help' | 'thanks';
export const SPECIAL_INTENTS: readonly SpecialIntent[] = ['greeting', 'goodbye', 'help', 'thanks'];

export function isUnconstrained(intent: QueryIntent): boolean {
  return constrainedCategories(intent).length === 0;
}

/**
 * Constrained categories in canonical order.
 */
export function constrainedCategories(intent: QueryIntent): FacetCategory[] {
  return FACET_CATEGORIES.filter(category =>
    category === 'timeConstraint'
      ? intent.timeConstraint !== undefined
      : (intent[category]?.length ?? 0) > 0
  );
}

/** How a result list was ordered */
export type RankingPath = 'facets' | 'semantic' | 'default';

/** Recipe as returned to callers, with its ranking evidence */
export interface RecipeView extends Recipe {
  readonly score: number;
  readonly similarity: number | null;
  readonly matchedFacets: readonly FacetCategory[];
}

export type RecommendationResult =
  | { readonly kind: 'special'; readonly intent: SpecialIntent; readonly message: string }
  | {
      readonly kind: 'results';
      readonly intent: QueryIntent;
      readonly path: RankingPath;
      readonly recipes: readonly RecipeView[];
    }
  | { readonly kind: 'no_matches'; readonly intent: QueryIntent; readonly message: string };
