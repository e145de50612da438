/**
 * Plain-text rendering of recommendations for the chat CLI.
 */

import type { RecommendationResult } from '../types.js';

export type FormattableRecipe = {
  readonly title: string;
  readonly timeMinutes: number;
  readonly tags: readonly string[];
  readonly ingredients: readonly string[];
  readonly description: string;
};

const MAX_INGREDIENTS = 5;
const MAX_TAGS = 4;
const DIVIDER = '─'.repeat(50);

export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[\s\-(/])([a-z])/g, (_m, lead: string, ch: string) => `${lead}${ch.toUpperCase()}`);
}

/** "45 minutes", "1h 30m" */
export function formatDuration(minutes: number): string {
  const whole = Number.isFinite(minutes) ? Math.max(0, Math.floor(minutes)) : 0;
  if (whole < 60) return `${whole} minutes`;
  return `${Math.floor(whole / 60)}h ${whole % 60}m`;
}

export function formatIngredients(ingredients: readonly string[]): string {
  const shown = ingredients.slice(0, MAX_INGREDIENTS).join(', ');
  const rest = ingredients.length - MAX_INGREDIENTS;
  return rest > 0 ? `${shown} (and ${rest} more)` : shown;
}

export function formatTags(tags: readonly string[]): string {
  return tags.length > 0 ? tags.slice(0, MAX_TAGS).join(' • ') : 'No tags available';
}

/**
 * @param position - 1-based position in the result list
 */
export function formatRecipe(recipe: FormattableRecipe, position: number): string {
  const description = recipe.description.trim() || 'No description available';
  return [
    '',
    `${position}. ${titleCase(recipe.title.trim() || 'Unknown')}`,
    `Cooking Time: ${formatDuration(recipe.timeMinutes)}`,
    `Tags: ${formatTags(recipe.tags)}`,
    `Main Ingredients: ${formatIngredients(recipe.ingredients)}`,
    `Description: ${description}`,
    DIVIDER,
  ].join('\n');
}

export function formatRecommendation(result: RecommendationResult): string {
  switch (result.kind) {
    case 'special':
    case 'no_matches':
      return result.message;
    case 'results':
      return result.recipes.map((recipe, i) => formatRecipe(recipe, i + 1)).join('\n');
  }
}
