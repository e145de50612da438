import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { detectSpecialIntent } from './special-intent.js';
import { Lexicon } from '../lexicon/lexicon.js';
import { testLexiconData } from '../../../../tests/helpers/fixtures.js';

describe('detectSpecialIntent', () => {
  const lexicon = Lexicon.fromData(testLexiconData);

  it('detects single-word phrases anywhere in the query', () => {
    assert.equal(detectSpecialIntent(['hello', 'there'], lexicon), 'greeting');
    assert.equal(detectSpecialIntent(['ok', 'bye'], lexicon), 'goodbye');
  });

  it('detects multi-word phrases', () => {
    assert.equal(detectSpecialIntent(['what', 'can', 'you', 'do'], lexicon), 'help');
    assert.equal(detectSpecialIntent(['thank', 'you'], lexicon), 'thanks');
  });

  it('returns the earliest phrase by position', () => {
    assert.equal(detectSpecialIntent(['bye', 'hello'], lexicon), 'goodbye');
  });

  it('returns null when nothing matches', () => {
    assert.equal(detectSpecialIntent(['italian', 'pasta'], lexicon), null);
    assert.equal(detectSpecialIntent([], lexicon), null);
  });
});
