import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { rank, rankingPath, satisfiesTime } from './recipe-ranker.js';
import { buildRecipeIndex, withDescriptionVectors } from '../index/recipe-index.js';
import { Lexicon } from '../lexicon/lexicon.js';
import type { QueryIntent, TimeConstraint } from '../types.js';
import { testLexiconData, testRecipes } from '../../../../tests/helpers/fixtures.js';

const lexicon = Lexicon.fromData(testLexiconData);
const index = buildRecipeIndex(testRecipes, {
  tagAliases: lexicon.tagAliases(),
  ingredientAliases: lexicon.ingredientAliases(),
});

// r1 points along the query, r3 halfway, everything else orthogonal
const withVectors = withDescriptionVectors(index, [
  [1, 0], [0, 1], [1, 1], [0, 1], [0, 1], [0, 1], [0, 1], [0, 1],
]);

const quick: TimeConstraint = { label: 'quick', maxMinutes: 30, minMinutes: null };
const slow: TimeConstraint = { label: 'slow', maxMinutes: null, minMinutes: 60 };

const ids = (intent: QueryIntent, topN: number) => rank(intent, index, topN).map(m => m.recipeId);

describe('satisfiesTime', () => {
  it('checks upper and lower bounds inclusively', () => {
    assert.equal(satisfiesTime(30, quick), true);
    assert.equal(satisfiesTime(31, quick), false);
    assert.equal(satisfiesTime(60, slow), true);
    assert.equal(satisfiesTime(59, slow), false);
  });
});

describe('rank', () => {
  describe('with constraints', () => {
    it('returns recipes matching every constrained category, fastest first on ties', () => {
      const matches = rank({ cuisine: ['asian'], ingredient: ['chicken'] }, index, 3);
      assert.deepEqual(matches.map(m => m.recipeId), ['r3', 'r4']);
      assert.deepEqual(matches[0], {
        recipeId: 'r3',
        score: 2,
        similarity: null,
        matchedFacets: ['cuisine', 'ingredient'],
      });
    });

    it('combines tag aliases and time bounds', () => {
      assert.deepEqual(ids({ diet: ['vegan'], mealType: ['dessert'], timeConstraint: quick }, 3), ['r1']);
      assert.deepEqual(ids({ timeConstraint: slow }, 3), ['r4', 'r6']);
    });

    it('matches plural ingredient requests against singular keys', () => {
      assert.deepEqual(ids({ ingredient: ['tomatoes'] }, 5), ['r7', 'r5', 'r4']);
    });

    it('never returns more recipes after adding a constraint', () => {
      const loose = ids({ mealType: ['main-dish'] }, 10);
      const tight = ids({ mealType: ['main-dish'], timeConstraint: quick }, 10);
      assert.deepEqual(loose, ['r8', 'r3', 'r5', 'r4', 'r6']);
      assert.deepEqual(tight, ['r8', 'r3', 'r5']);
    });

    it('returns nothing when no recipe satisfies every category', () => {
      assert.deepEqual(ids({ cuisine: ['mexican'], diet: ['vegan'] }, 3), []);
    });

    it('accepts partial matches in any mode, higher scores first', () => {
      const intent: QueryIntent = { diet: ['vegan'], mealType: ['dessert'], timeConstraint: quick };
      const matches = rank(intent, index, 4, { matchMode: 'any' });
      assert.deepEqual(matches.map(m => m.recipeId), ['r1', 'r2', 'r7', 'r8']);
      assert.deepEqual(matches.map(m => m.score), [3, 2, 1, 1]);
      assert.deepEqual(matches[1]?.matchedFacets, ['diet', 'mealType']);
    });

    it('breaks score ties by description similarity when vectors exist', () => {
      const matches = rank({ mealType: ['main-dish'] }, withVectors, 3, { queryVector: [1, 0] });
      assert.deepEqual(matches.map(m => m.recipeId), ['r3', 'r8', 'r5']);
    });
  });

  describe('without constraints', () => {
    it('orders by tag popularity when there are no vectors', () => {
      const matches = rank({}, index, 3);
      assert.deepEqual(matches.map(m => m.recipeId), ['r5', 'r4', 'r3']);
      assert.ok(matches.every(m => m.score === 0 && m.similarity === null));
    });

    it('orders by description similarity when vectors exist', () => {
      const matches = rank({}, withVectors, 3, { queryVector: [1, 0] });
      assert.deepEqual(matches.map(m => m.recipeId), ['r1', 'r3', 'r7']);
      assert.equal(matches[0]?.similarity, 1);
    });
  });

  it('returns nothing for a non-positive limit or an empty index', () => {
    assert.deepEqual(ids({}, 0), []);
    assert.deepEqual(rank({}, buildRecipeIndex([]), 3), []);
  });

  it('is deterministic and returns frozen matches', () => {
    const first = rank({ diet: ['vegetarian'] }, index, 5);
    const second = rank({ diet: ['vegetarian'] }, index, 5);
    assert.deepEqual(first, second);
    assert.ok(first.every(m => Object.isFrozen(m) && Object.isFrozen(m.matchedFacets)));
  });
});

describe('rankingPath', () => {
  it('names the ordering applied', () => {
    assert.equal(rankingPath({ diet: ['vegan'] }, withVectors, [1, 0]), 'facets');
    assert.equal(rankingPath({}, withVectors, [1, 0]), 'semantic');
    assert.equal(rankingPath({}, withVectors, null), 'default');
    assert.equal(rankingPath({}, index, [1, 0]), 'default');
  });
});
