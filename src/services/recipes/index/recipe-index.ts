/**
 * Recipe Index
 *
 * Immutable, position-addressed view of the dataset with the lookups the ranker
 * needs: tag → positions, ingredient key → positions, tag frequencies, and
 * optionally one description vector per recipe.
 *
 * Positions are dataset order and double as the final tie-break.
 */

import type { EmbeddingProvider } from '../../../embeddings/types.js';
import { tryEmbedInBatches, type BatchOptions } from '../../../embeddings/embed-batches.js';
import { logger } from '../../../lib/logger/structured-logger.js';
import { singularizePhrase } from '../../../utils/inflection.js';
import { normalizePhrase } from '../normalizer/text-normalizer.js';
import { RecipeRecordSchema, type Recipe, type RecipeRecord } from '../types.js';

export interface RecipeIndex {
  readonly recipes: readonly Recipe[];
  readonly byTag: ReadonlyMap<string, readonly number[]>;
  readonly byIngredient: ReadonlyMap<string, readonly number[]>;
  /** Full ingredient names and their singular forms */
  readonly ingredientVocabulary: ReadonlySet<string>;
  readonly tagFrequency: ReadonlyMap<string, number>;
  /** Aligned with `recipes`, or null when descriptions were not embedded */
  readonly descriptionVectors: readonly (readonly number[])[] | null;
}

export interface RecipeIndexOptions {
  /** Dataset tag → canonical facet values it also answers to ("desserts" → ["dessert"]) */
  tagAliases?: ReadonlyMap<string, readonly string[]>;
  /** Ingredient key → canonical ingredient values ("spaghetti" → ["pasta"]) */
  ingredientAliases?: ReadonlyMap<string, readonly string[]>;
}

const MAX_INGREDIENT_NGRAM = 3;

/**
 * Lookup keys for one ingredient name: every 1..3-word n-gram, plus the
 * singular form of each ("boneless chicken breasts" → ..., "chicken breasts",
 * "chicken breast", "breasts", "breast").
 */
export function ingredientKeys(name: string): string[] {
  const words = normalizePhrase(name).split(' ').filter(Boolean);
  const keys = new Set<string>();
  for (let n = 1; n <= Math.min(MAX_INGREDIENT_NGRAM, words.length); n++) {
    for (let start = 0; start + n <= words.length; start++) {
      const gram = words.slice(start, start + n).join(' ');
      keys.add(gram);
      keys.add(singularizePhrase(gram));
    }
  }
  return [...keys];
}

function cleanList(items: readonly string[]): string[] {
  const out = new Set<string>();
  for (const item of items) {
    const cleaned = item.trim().toLowerCase().replace(/\s+/g, ' ');
    if (cleaned) out.add(cleaned);
  }
  return [...out];
}

function addPosition(map: Map<string, number[]>, key: string, position: number): void {
  const list = map.get(key);
  if (!list) {
    map.set(key, [position]);
  } else if (list[list.length - 1] !== position) {
    list.push(position);
  }
}

export function buildRecipeIndex(records: readonly RecipeRecord[], options: RecipeIndexOptions = {}): RecipeIndex {
  const recipes: Recipe[] = [];
  const byTag = new Map<string, number[]>();
  const byIngredient = new Map<string, number[]>();
  const vocabulary = new Set<string>();
  const tagFrequency = new Map<string, number>();
  const seenIds = new Set<string>();
  let duplicates = 0;
  let invalid = 0;

  for (const record of records) {
    const parsed = RecipeRecordSchema.safeParse(record);
    if (!parsed.success) {
      invalid++;
      continue;
    }
    const data = parsed.data;
    if (seenIds.has(data.id)) {
      duplicates++;
      continue;
    }
    seenIds.add(data.id);

    const position = recipes.length;
    const tags = cleanList(data.tags);
    const ingredients = cleanList(data.ingredients);

    recipes.push(Object.freeze({
      id: data.id,
      title: data.title.trim(),
      description: data.description.trim(),
      tags: Object.freeze(tags),
      ingredients: Object.freeze(ingredients),
      timeMinutes: data.timeMinutes,
    }));

    for (const tag of tags) {
      tagFrequency.set(tag, (tagFrequency.get(tag) ?? 0) + 1);
      addPosition(byTag, tag, position);
      for (const alias of options.tagAliases?.get(tag) ?? []) {
        addPosition(byTag, alias, position);
      }
    }

    for (const ingredient of ingredients) {
      const full = normalizePhrase(ingredient);
      if (full) {
        vocabulary.add(full);
        vocabulary.add(singularizePhrase(full));
      }
      for (const key of ingredientKeys(ingredient)) {
        addPosition(byIngredient, key, position);
        for (const alias of options.ingredientAliases?.get(key) ?? []) {
          addPosition(byIngredient, alias, position);
        }
      }
    }
  }

  if (duplicates > 0) {
    logger.warn({ event: 'recipe_duplicate_ids', duplicates }, '[INDEX] Duplicate recipe ids dropped, first kept');
  }
  if (invalid > 0) {
    logger.warn({ event: 'recipe_records_invalid', invalid }, '[INDEX] Invalid recipe records dropped');
  }

  return Object.freeze({
    recipes: Object.freeze(recipes),
    byTag: freezeLists(byTag),
    byIngredient: freezeLists(byIngredient),
    ingredientVocabulary: vocabulary,
    tagFrequency,
    descriptionVectors: null,
  });
}

function freezeLists(map: Map<string, number[]>): ReadonlyMap<string, readonly number[]> {
  const out = new Map<string, readonly number[]>();
  for (const [key, list] of map) out.set(key, Object.freeze(list));
  return out;
}

/** Text embedded for a recipe: title plus description */
export function descriptionText(recipe: Recipe): string {
  return recipe.description ? `${recipe.title}. ${recipe.description}` : recipe.title;
}

/**
 * Copy of the index carrying description vectors.
 * Vectors that do not line up one-to-one with the recipes are ignored.
 */
export function withDescriptionVectors(
  index: RecipeIndex,
  vectors: readonly (readonly number[])[] | null
): RecipeIndex {
  if (!vectors) return index;
  if (vectors.length !== index.recipes.length) {
    logger.warn({
      event: 'description_vectors_misaligned',
      expected: index.recipes.length,
      actual: vectors.length
    }, '[INDEX] Description vectors ignored');
    return index;
  }
  return Object.freeze({ ...index, descriptionVectors: Object.freeze(vectors.map(v => Object.freeze([...v]))) });
}

export async function embedDescriptions(
  index: RecipeIndex,
  provider: EmbeddingProvider | null,
  opts: Omit<BatchOptions, 'label'>
): Promise<RecipeIndex> {
  if (index.recipes.length === 0) return index;
  const vectors = await tryEmbedInBatches(
    provider,
    index.recipes.map(descriptionText),
    { ...opts, label: 'recipe_descriptions' }
  );
  return withDescriptionVectors(index, vectors);
}
