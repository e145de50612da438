/**
 * Small lexicon, dataset and embedding stand-ins shared by unit and scenario tests.
 */

import type { EmbeddingProvider, EmbedOptions } from '../../src/embeddings/types.js';
import type { LexiconFile } from '../../src/services/recipes/lexicon/lexicon.js';
import type { RecipeRecord } from '../../src/services/recipes/types.js';

export const testLexiconData = {
  fillerPhrases: ['give me', 'show me', 'i want', "i'd like", 'please', 'recipes', 'recipe', 'can you'],
  stopWords: [
    'a', 'an', 'the', 'and', 'with', 'for', 'some', 'something', 'me', 'dish', 'food',
    'minutes', 'minute', 'hour', 'hours', 'under', 'over', 'less', 'than', 'in', 'what', 'do',
  ],
  facets: {
    cuisine: [
      { value: 'italian', synonyms: ['italy'], reference: 'italian pasta pizza' },
      { value: 'asian', synonyms: ['oriental'] },
      { value: 'mexican', synonyms: ['tex mex'], reference: 'mexican tacos salsa' },
    ],
    diet: [
      { value: 'vegan', synonyms: ['plant based'] },
      { value: 'vegetarian', synonyms: ['veggie', 'meatless'] },
      { value: 'gluten-free', synonyms: ['gluten free'] },
    ],
    mealType: [
      { value: 'dessert', synonyms: ['desserts', 'sweets'], tags: ['desserts'], reference: 'dessert sweet chocolate' },
      { value: 'main-dish', synonyms: ['dinner', 'main course'] },
      { value: 'breakfast', synonyms: [] },
    ],
    timeConstraint: [
      { value: 'quick', synonyms: ['fast', 'easy', 'in a hurry'] },
      { value: 'slow', synonyms: ['leisurely', 'all day'] },
    ],
    ingredient: [
      { value: 'chicken', synonyms: ['chicken breast'] },
      { value: 'tomato', synonyms: [] },
      { value: 'chocolate', synonyms: ['cocoa'] },
      { value: 'pasta', synonyms: ['spaghetti'] },
    ],
  },
  special: {
    greeting: ['hello', 'hi'],
    goodbye: ['bye', 'goodbye'],
    help: ['help', 'what can you do'],
    thanks: ['thanks', 'thank you'],
  },
} satisfies LexiconFile;

/** Same lexicon without any "pasta" surface form */
export const lexiconWithoutPasta = {
  ...testLexiconData,
  facets: {
    ...testLexiconData.facets,
    ingredient: testLexiconData.facets.ingredient.filter(e => e.value !== 'pasta'),
  },
} satisfies LexiconFile;

export const testRecipes: RecipeRecord[] = [
  {
    id: 'r1', title: 'vegan chocolate mousse', timeMinutes: 20,
    tags: ['desserts', 'vegan', 'easy'],
    ingredients: ['silken tofu', 'dark chocolate', 'maple syrup'],
    description: 'rich chocolate dessert',
  },
  {
    id: 'r2', title: 'vegan coconut pudding', timeMinutes: 45,
    tags: ['desserts', 'vegan'],
    ingredients: ['coconut milk', 'rice', 'sugar'],
    description: 'sweet coconut dessert',
  },
  {
    id: 'r3', title: 'asian chicken stir fry', timeMinutes: 25,
    tags: ['asian', 'main-dish'],
    ingredients: ['chicken breasts', 'soy sauce', 'broccoli'],
    description: 'weeknight chicken stir fry',
  },
  {
    id: 'r4', title: 'chicken tikka', timeMinutes: 75,
    tags: ['asian', 'indian', 'main-dish'],
    ingredients: ['chicken thighs', 'yogurt', 'tomatoes'],
    description: 'spiced chicken curry',
  },
  {
    id: 'r5', title: 'spaghetti pomodoro', timeMinutes: 30,
    tags: ['italian', 'main-dish', 'vegetarian'],
    ingredients: ['spaghetti', 'tomatoes', 'basil'],
    description: 'italian pasta with tomato sauce',
  },
  {
    id: 'r6', title: 'beef stew', timeMinutes: 180,
    tags: ['main-dish', 'gluten-free'],
    ingredients: ['beef', 'potatoes', 'carrots'],
    description: 'slow simmered beef stew',
  },
  {
    id: 'r7', title: 'veggie omelette', timeMinutes: 15,
    tags: ['breakfast', 'vegetarian', 'gluten-free'],
    ingredients: ['eggs', 'spinach', 'tomato'],
    description: 'fluffy eggs with vegetables',
  },
  {
    id: 'r8', title: 'fish tacos', timeMinutes: 20,
    tags: ['mexican', 'main-dish'],
    ingredients: ['white fish', 'corn tortillas', 'salsa'],
    description: 'crispy fish tacos',
  },
];

/**
 * One dimension per keyword; each component counts the keyword's occurrences
 * among the lowercase words of the text.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'keyword-stub';
  readonly calls: string[][] = [];

  constructor(private readonly keywords: readonly string[]) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map(text => {
      const words = text.toLowerCase().split(/[^a-z]+/).filter(Boolean);
      return this.keywords.map(k => words.filter(w => w === k).length);
    });
  }
}

export class FailingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'failing-stub';

  async embed(_texts: string[]): Promise<number[][]> {
    throw new Error('embedding backend unavailable');
  }
}

/** Never settles; exercises the caller's timeout */
export class HangingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hanging-stub';
  readonly signals: AbortSignal[] = [];

  embed(_texts: string[], options?: EmbedOptions): Promise<number[][]> {
    if (options?.signal) this.signals.push(options.signal);
    return new Promise<number[][]>(() => undefined);
  }
}
