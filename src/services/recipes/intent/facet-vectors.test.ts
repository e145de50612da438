import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildFacetVectors } from './facet-vectors.js';
import { Lexicon } from '../lexicon/lexicon.js';
import {
  FailingEmbeddingProvider,
  KeywordEmbeddingProvider,
  testLexiconData,
} from '../../../../tests/helpers/fixtures.js';

const lexicon = Lexicon.fromData(testLexiconData);
const batch = { batchSize: 4, timeoutMs: 1000 };

describe('buildFacetVectors', () => {
  it('embeds the reference phrase of every tag facet, grouped by category', async () => {
    const provider = new KeywordEmbeddingProvider(['pasta', 'tacos']);
    const vectors = await buildFacetVectors(lexicon, provider, batch);

    assert.ok(vectors);
    assert.deepEqual([...vectors.keys()], ['cuisine', 'diet', 'mealType']);
    assert.deepEqual(vectors.get('cuisine')?.map(v => [v.definition.value, v.vector]), [
      ['italian', [1, 0]],
      ['asian', [0, 0]],
      ['mexican', [0, 1]],
    ]);
    // nine references in batches of four
    assert.deepEqual(provider.calls.map(c => c.length), [4, 4, 1]);
  });

  it('returns null without a working provider', async () => {
    assert.equal(await buildFacetVectors(lexicon, null, batch), null);
    assert.equal(await buildFacetVectors(lexicon, new FailingEmbeddingProvider(), batch), null);
  });
});
