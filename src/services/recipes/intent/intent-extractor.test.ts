import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { defaultStrategies, IntentExtractor, lexiconStrategy, type ExtractionStrategy } from './intent-extractor.js';
import { groupFacetVectors } from './facet-vectors.js';
import { Lexicon, type FacetDefinition } from '../lexicon/lexicon.js';
import { buildRecipeIndex } from '../index/recipe-index.js';
import { tokenize } from '../normalizer/text-normalizer.js';
import { testLexiconData } from '../../../../tests/helpers/fixtures.js';

const lexicon = Lexicon.fromData(testLexiconData);
const options = { semanticThreshold: 0.5, quickMaxMinutes: 30, slowMinMinutes: 60 };

function definition(category: 'cuisine' | 'diet' | 'mealType', value: string): FacetDefinition {
  const found = lexicon.values(category).find(d => d.value === value);
  assert.ok(found, `${category}:${value} missing from test lexicon`);
  return found;
}

describe('IntentExtractor', () => {
  const extractor = new IntentExtractor(lexicon, options);

  describe('lexicon matching', () => {
    it('fills each category from its own surface forms', () => {
      assert.deepEqual(extractor.extract(['asian', 'chicken']), { cuisine: ['asian'], ingredient: ['chicken'] });
    });

    it('resolves synonyms and plurals to canonical values', () => {
      assert.deepEqual(extractor.extract(['quick', 'vegan', 'desserts']), {
        diet: ['vegan'],
        mealType: ['dessert'],
        timeConstraint: { label: 'quick', maxMinutes: 30, minMinutes: null },
      });
      assert.deepEqual(extractor.extract(['chicken', 'breast', 'and', 'tomatoes']), {
        ingredient: ['chicken', 'tomato'],
      });
    });

    it('gives synonyms the same intent as their canonical value', () => {
      assert.deepEqual(extractor.extract(['fast', 'veggie', 'dinner']), extractor.extract(['quick', 'vegetarian', 'main', 'dish']));
    });

    it('keeps several values of one category in query order', () => {
      assert.deepEqual(extractor.extract(['mexican', 'or', 'italian']), { cuisine: ['mexican', 'italian'] });
    });

    it('matches multi-word phrases before their parts', () => {
      assert.deepEqual(extractor.extract(['gluten', 'free', 'pasta']), {
        diet: ['gluten-free'],
        ingredient: ['pasta'],
      });
    });

    it('returns an empty intent for empty or unknown input', () => {
      assert.deepEqual(extractor.extract([]), {});
      assert.deepEqual(extractor.extract(['surprise']), {});
    });

    it('returns a frozen intent', () => {
      const intent = extractor.extract(['vegan']);
      assert.ok(Object.isFrozen(intent));
      assert.ok(Object.isFrozen(intent.diet));
    });
  });

  describe('time constraints', () => {
    it('maps qualitative terms to the configured bounds', () => {
      assert.deepEqual(extractor.extract(['something', 'slow']).timeConstraint, {
        label: 'slow', maxMinutes: null, minMinutes: 60,
      });
      assert.deepEqual(extractor.extract(['dinner', 'in', 'a', 'hurry']), {
        mealType: ['main-dish'],
        timeConstraint: { label: 'quick', maxMinutes: 30, minMinutes: null },
      });
    });

    it('prefers an explicit duration over a qualitative term', () => {
      assert.deepEqual(extractor.extract(['quick', 'meal', 'under', '20', 'minutes']).timeConstraint, {
        label: 'explicit', maxMinutes: 20, minMinutes: null,
      });
    });

    it('takes the first qualitative term when several appear', () => {
      assert.equal(extractor.extract(['slow', 'or', 'fast']).timeConstraint?.label, 'slow');
    });
  });

  describe('dataset vocabulary', () => {
    const withVocabulary = new IntentExtractor(lexicon, {
      ...options,
      ingredientVocabulary: new Set(['beef', 'rice', 'potato', 'ox', 'italian sausage', 'sausage']),
    });

    it('finds ingredients named in the dataset', () => {
      assert.deepEqual(withVocabulary.extract(['beef', 'with', 'rice']), { ingredient: ['beef', 'rice'] });
    });

    it('matches plural spellings against singular entries', () => {
      assert.deepEqual(withVocabulary.extract(['potatoes']), { ingredient: ['potato'] });
    });

    it('ignores stop words and very short words', () => {
      assert.deepEqual(withVocabulary.extract(['ox']), {});
    });

    it('never reuses tokens consumed by an earlier category', () => {
      assert.deepEqual(withVocabulary.extract(['italian', 'sausage']), {
        cuisine: ['italian'],
        ingredient: ['sausage'],
      });
    });

    it('matches accented dataset ingredients from accented or plain queries', () => {
      const index = buildRecipeIndex([{
        id: '1',
        title: 'loaded nachos',
        description: '',
        tags: [],
        ingredients: ['jalapeño peppers', 'crème fraîche'],
        timeMinutes: 15,
      }]);
      const fromDataset = new IntentExtractor(lexicon, { ...options, ingredientVocabulary: index.ingredientVocabulary });

      const expected = { ingredient: ['jalapeno peppers', 'creme fraiche'] };
      assert.deepEqual(fromDataset.extract(tokenize('jalapeño peppers and crème fraîche')), expected);
      assert.deepEqual(fromDataset.extract(tokenize('jalapeno peppers and creme fraiche')), expected);
    });

    it('is off without a vocabulary', () => {
      assert.deepEqual(extractor.extract(['beef']), {});
    });
  });

  describe('semantic fallback', () => {
    const facetVectors = groupFacetVectors([
      { definition: definition('cuisine', 'italian'), vector: [1, 0] },
      { definition: definition('cuisine', 'mexican'), vector: [0, 1] },
    ]);
    const semantic = new IntentExtractor(lexicon, { ...options, semanticThreshold: 0.8, facetVectors });

    it('picks the closest reference above the threshold', () => {
      assert.deepEqual(semantic.extract(['tacos'], [0.1, 0.9]), { cuisine: ['mexican'] });
    });

    it('requires the similarity to exceed the threshold', () => {
      assert.deepEqual(semantic.extract(['tacos'], [1, 1]), {});
    });

    it('does not run when the lexicon already filled the category', () => {
      assert.deepEqual(semantic.extract(['italian'], [0, 1]), { cuisine: ['italian'] });
    });

    it('does nothing without a query vector', () => {
      assert.deepEqual(semantic.extract(['tacos']), {});
    });
  });

  it('skips a failing strategy and keeps the others', () => {
    const broken: ExtractionStrategy = {
      name: 'broken',
      category: 'cuisine',
      kind: 'lexicon',
      apply() {
        throw new Error('boom');
      },
    };
    const guarded = new IntentExtractor(lexicon, options, [broken, lexiconStrategy('diet', lexicon)]);
    assert.deepEqual(guarded.extract(['vegan']), { diet: ['vegan'] });
  });

  it('runs strategies in category precedence order', () => {
    const names = defaultStrategies(lexicon, { ...options, ingredientVocabulary: new Set() }).map(s => s.name);
    assert.deepEqual(names, [
      'cuisine:lexicon', 'cuisine:semantic',
      'diet:lexicon', 'diet:semantic',
      'mealType:lexicon', 'mealType:semantic',
      'timeConstraint:pattern', 'timeConstraint:lexicon',
      'ingredient:lexicon', 'ingredient:vocabulary',
    ]);
  });
});
