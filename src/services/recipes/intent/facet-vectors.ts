/**
 * Reference-phrase vectors for the semantic fallback of tag facets.
 */

import type { EmbeddingProvider } from '../../../embeddings/types.js';
import { tryEmbedInBatches, type BatchOptions } from '../../../embeddings/embed-batches.js';
import type { FacetDefinition, Lexicon } from '../lexicon/lexicon.js';
import { TAG_FACET_CATEGORIES, type TagFacetCategory } from '../types.js';

export interface FacetVector {
  readonly definition: FacetDefinition;
  readonly vector: readonly number[];
}

export type FacetVectors = ReadonlyMap<TagFacetCategory, readonly FacetVector[]>;

/**
 * Embed every cuisine, diet and meal-type reference phrase, in lexicon order.
 * Null when no provider is configured or embedding fails.
 */
export async function buildFacetVectors(
  lexicon: Lexicon,
  provider: EmbeddingProvider | null,
  opts: Omit<BatchOptions, 'label'>
): Promise<FacetVectors | null> {
  const definitions = TAG_FACET_CATEGORIES.flatMap(category => lexicon.values(category));
  if (definitions.length === 0) return null;

  const vectors = await tryEmbedInBatches(
    provider,
    definitions.map(d => d.reference),
    { ...opts, label: 'facet_references' }
  );
  if (!vectors) return null;

  return groupFacetVectors(definitions.map((definition, i) => ({ definition, vector: vectors[i] ?? [] })));
}

export function groupFacetVectors(entries: readonly FacetVector[]): FacetVectors {
  const grouped = new Map<TagFacetCategory, FacetVector[]>();
  for (const entry of entries) {
    const category = entry.definition.category;
    if (category === 'timeConstraint' || category === 'ingredient') continue;
    const list = grouped.get(category) ?? [];
    list.push(entry);
    grouped.set(category, list);
  }
  return grouped;
}
