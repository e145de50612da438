/**
 * End-to-end query turns against the bundled lexicon and dataset.
 */

import { before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { getRecommenderConfig } from '../src/config/recommender.config.js';
import {
  createRecommender,
  RecipeRecommender,
  SPECIAL_MESSAGES,
} from '../src/services/recipes/recommender.service.js';
import { buildRecipeIndex } from '../src/services/recipes/index/recipe-index.js';
import { IntentExtractor } from '../src/services/recipes/intent/intent-extractor.js';
import { Lexicon } from '../src/services/recipes/lexicon/lexicon.js';
import type { RecommendationResult } from '../src/services/recipes/types.js';
import { lexiconWithoutPasta, testRecipes } from './helpers/fixtures.js';

function recipeIds(result: RecommendationResult): string[] {
  return result.kind === 'results' ? result.recipes.map(r => r.id) : [];
}

describe('recipe finder scenarios', () => {
  let finder: RecipeRecommender;

  before(async () => {
    finder = await createRecommender(getRecommenderConfig({}), { embeddingProvider: null });
  });

  const cases: Array<[string, string[]]> = [
    ['Give me Asian chicken recipes please', ['4', '5', '8']],
    ['Show me quick vegan desserts', ['1']],
    ['something slow', ['2', '8', '6']],
    ['under 20 minutes', ['11', '15', '9']],
    ['gluten free dinner with salmon', ['14']],
    ['keto dinner', ['14']],
    ['asparagus', ['14']],
    ['italian pasta', ['7']],
  ];

  for (const [query, expected] of cases) {
    it(`"${query}"`, async () => {
      assert.deepEqual(recipeIds(await finder.recommend(query)), expected);
    });
  }

  it('extracts the facets of a combined request', async () => {
    const result = await finder.recommend('Show me quick vegan desserts');
    assert.deepEqual(result.kind === 'special' ? null : result.intent, {
      diet: ['vegan'],
      mealType: ['dessert'],
      timeConstraint: { label: 'quick', maxMinutes: 30, minMinutes: null },
    });
  });

  it('answers small talk', async () => {
    assert.deepEqual(await finder.recommend('hello'), {
      kind: 'special', intent: 'greeting', message: SPECIAL_MESSAGES.greeting,
    });
    assert.deepEqual(await finder.recommend('what can you do'), {
      kind: 'special', intent: 'help', message: SPECIAL_MESSAGES.help,
    });
    assert.deepEqual(await finder.recommend('bye'), {
      kind: 'special', intent: 'goodbye', message: SPECIAL_MESSAGES.goodbye,
    });
    assert.deepEqual(await finder.recommend('Thank you!'), {
      kind: 'special', intent: 'thanks', message: "You're welcome! Want another recipe?",
    });
  });

  it('answers with recipes when thanks come with a request', async () => {
    const result = await finder.recommend('thanks, now keto dinner');
    assert.equal(result.kind, 'results');
  });

  it('ranks by description similarity with the local embedder', async () => {
    const semantic = await createRecommender(getRecommenderConfig({ EMBEDDING_PROVIDER: 'local' }));
    const result = await semantic.recommend('something sweet');
    assert.ok(result.kind === 'results');
    assert.equal(result.path, 'semantic');
    assert.equal(result.recipes.length, 3);
  });
});

describe('terms outside the lexicon', () => {
  it('fall back to the default ordering', async () => {
    const lexicon = Lexicon.fromData(lexiconWithoutPasta);
    const index = buildRecipeIndex(testRecipes, { tagAliases: lexicon.tagAliases() });
    const finder = new RecipeRecommender({
      lexicon,
      index,
      extractor: new IntentExtractor(lexicon, { semanticThreshold: 0.5, quickMaxMinutes: 30, slowMinMinutes: 60 }),
      embeddingProvider: null,
      facetVectors: null,
      settings: { topN: 3, matchMode: 'all', embeddingTimeoutMs: 50 },
    });

    const result = await finder.recommend('pasta');

    assert.ok(result.kind === 'results');
    assert.deepEqual(result.intent, {});
    assert.equal(result.path, 'default');
    assert.deepEqual(result.recipes.map(r => r.id), ['r5', 'r4', 'r3']);
  });
});
