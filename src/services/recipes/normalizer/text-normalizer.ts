/**
 * Text Normalizer
 *
 * Turns a raw utterance into lowercase word tokens with filler phrases
 * ("give me", "i'd like", "recipes", ...) removed. Pure and total: any string,
 * including the empty one, yields a (possibly empty) token list.
 */

/**
 * Lowercase, strip diacritics ("jalapeño" → "jalapeno"), drop apostrophes
 * ("i'd" → "id"), turn every other run of non-letters and non-digits into a
 * single space, trim.
 * Lexicon surface forms go through the same function so they line up with
 * query tokens ("low-fat" → "low fat").
 */
export function normalizePhrase(text: string): string {
  return text
    .toLowerCase()
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .replace(/['’`]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export function tokenize(text: string): string[] {
  const normalized = normalizePhrase(text);
  return normalized ? normalized.split(' ') : [];
}

/**
 * Order filler phrases longest first (by token count, then by length) so that
 * "i would like" is removed before "like"-style fragments can split it.
 */
export function orderFillerPhrases(phrases: readonly string[]): string[][] {
  const unique = new Map<string, string[]>();
  for (const phrase of phrases) {
    const tokens = tokenize(phrase);
    if (tokens.length > 0) unique.set(tokens.join(' '), tokens);
  }
  return [...unique.values()].sort((a, b) =>
    b.length - a.length || b.join(' ').length - a.join(' ').length
  );
}

export class TextNormalizer {
  private readonly fillers: readonly (readonly string[])[];

  /**
   * @param fillerPhrases - Already ordered longest-first (see orderFillerPhrases)
   */
  constructor(fillerPhrases: readonly (readonly string[])[]) {
    this.fillers = fillerPhrases;
  }

  normalize(raw: string): string[] {
    let tokens = tokenize(raw);
    for (const filler of this.fillers) {
      tokens = removeSequence(tokens, filler);
    }
    return tokens;
  }
}

function removeSequence(tokens: string[], sequence: readonly string[]): string[] {
  if (sequence.length === 0 || sequence.length > tokens.length) return tokens;

  const out: string[] = [];
  let i = 0;
  while (i < tokens.length) {
    if (matchesAt(tokens, sequence, i)) {
      i += sequence.length;
    } else {
      out.push(tokens[i]);
      i++;
    }
  }
  return out;
}

function matchesAt(tokens: readonly string[], sequence: readonly string[], start: number): boolean {
  if (start + sequence.length > tokens.length) return false;
  return sequence.every((t, k) => tokens[start + k] === t);
}
