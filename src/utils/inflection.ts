/**
 * English plural handling for ingredient and tag words.
 * Heuristic only: "tomatoes" → "tomato", "berries" → "berry", "dishes" → "dish".
 */

const ES_ENDINGS = ['ches', 'shes', 'sses', 'xes', 'zes', 'oes'];

export function singularize(word: string): string {
  if (word.length <= 3) return word;
  if (word.endsWith('ies') && word.length > 4) return `${word.slice(0, -3)}y`;
  if (ES_ENDINGS.some(e => word.endsWith(e)) && word.length > 4) return word.slice(0, -2);
  if (word.endsWith('s') && !word.endsWith('ss') && !word.endsWith('us')) return word.slice(0, -1);
  return word;
}

/**
 * Singularize the last word of a phrase ("chicken thighs" → "chicken thigh").
 */
export function singularizePhrase(phrase: string): string {
  const idx = phrase.lastIndexOf(' ');
  if (idx === -1) return singularize(phrase);
  return `${phrase.slice(0, idx + 1)}${singularize(phrase.slice(idx + 1))}`;
}
