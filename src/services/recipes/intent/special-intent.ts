import type { Lexicon } from '../lexicon/lexicon.js';
import type { SpecialIntent } from '../types.js';

/**
 * First greeting, goodbye, help or thanks phrase in the tokens, longest
 * phrase first at each position. Run on the tokenized query before filler
 * removal, since "what can you do" contains the filler "can you".
 */
export function detectSpecialIntent(tokens: readonly string[], lexicon: Lexicon): SpecialIntent | null {
  for (let start = 0; start < tokens.length; start++) {
    const longest = Math.min(lexicon.maxPhraseTokens, tokens.length - start);
    for (let n = longest; n >= 1; n--) {
      const intent = lexicon.lookupSpecial(tokens.slice(start, start + n).join(' '));
      if (intent) return intent;
    }
  }
  return null;
}
