/**
 * Lexicon
 *
 * Immutable vocabulary for intent extraction: per facet category, canonical
 * values with their surface-form synonyms, the reference phrase used for
 * semantic fallback, and the dataset tags that count as the value. Also holds
 * filler phrases, stop words and the special-utterance phrases.
 *
 * Built once at startup from data/lexicon.json and passed explicitly to the
 * normalizer and the extractor.
 *
 * INVARIANTS:
 * 1. A normalized surface form resolves to exactly one (category, value)
 * 2. A canonical value belongs to exactly one category
 */

import fs from 'fs/promises';
import { z } from 'zod';
import {
  FACET_CATEGORIES,
  SPECIAL_INTENTS,
  type FacetCategory,
  type SpecialIntent,
  type TagFacetCategory,
} from '../types.js';
import { normalizePhrase, orderFillerPhrases } from '../normalizer/text-normalizer.js';
import { singularizePhrase } from '../../../utils/inflection.js';

export class LexiconError extends Error {
  constructor(message: string, public readonly details?: unknown) {
    super(message);
    this.name = 'LexiconError';
  }
}

const PhraseList = z.array(z.string().trim().min(1)).default([]);

const FacetEntrySchema = z.object({
  value: z.string().trim().min(1),
  synonyms: PhraseList,
  /** Phrase embedded for semantic fallback; defaults to value + synonyms */
  reference: z.string().trim().min(1).optional(),
  /** Dataset tags that count as this value; defaults to [value] */
  tags: z.array(z.string().trim().min(1)).optional(),
}).strict();

const TimeEntrySchema = FacetEntrySchema.extend({
  value: z.enum(['quick', 'slow']),
});

export const LexiconFileSchema = z.object({
  fillerPhrases: PhraseList,
  stopWords: PhraseList,
  facets: z.object({
    cuisine: z.array(FacetEntrySchema).default([]),
    diet: z.array(FacetEntrySchema).default([]),
    mealType: z.array(FacetEntrySchema).default([]),
    timeConstraint: z.array(TimeEntrySchema).default([]),
    ingredient: z.array(FacetEntrySchema).default([]),
  }).strict(),
  special: z.object({
    greeting: PhraseList,
    goodbye: PhraseList,
    help: PhraseList,
    thanks: PhraseList,
  }).strict().default({}),
}).strict();

export type LexiconFile = z.input<typeof LexiconFileSchema>;

export interface FacetDefinition {
  readonly category: FacetCategory;
  readonly value: string;
  readonly reference: string;
  readonly tags: readonly string[];
}

type SurfaceTarget =
  | { kind: 'facet'; definition: FacetDefinition }
  | { kind: 'special'; intent: SpecialIntent };

export class Lexicon {
  readonly fillerPhrases: readonly (readonly string[])[];
  readonly stopWords: ReadonlySet<string>;
  /** Longest surface form, in tokens; bounds the n-gram scan */
  readonly maxPhraseTokens: number;

  private readonly definitions: ReadonlyMap<FacetCategory, readonly FacetDefinition[]>;
  private readonly surfaceForms: ReadonlyMap<string, SurfaceTarget>;

  private constructor(
    fillerPhrases: string[][],
    stopWords: Set<string>,
    definitions: Map<FacetCategory, readonly FacetDefinition[]>,
    surfaceForms: Map<string, SurfaceTarget>
  ) {
    this.fillerPhrases = Object.freeze(fillerPhrases.map(p => Object.freeze(p)));
    this.stopWords = stopWords;
    this.definitions = definitions;
    this.surfaceForms = surfaceForms;
    this.maxPhraseTokens = Math.max(1, ...[...surfaceForms.keys()].map(k => k.split(' ').length));
    Object.freeze(this);
  }

  /**
   * Build and validate a lexicon from its JSON shape.
   * @throws LexiconError on schema violations or surface-form conflicts
   */
  static fromData(data: unknown): Lexicon {
    const parsed = LexiconFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new LexiconError('Invalid lexicon data', parsed.error.flatten());
    }
    const file = parsed.data;

    const definitions = new Map<FacetCategory, readonly FacetDefinition[]>();
    const surfaceForms = new Map<string, SurfaceTarget>();
    const valueOwner = new Map<string, FacetCategory>();

    const register = (phrase: string, target: SurfaceTarget): void => {
      const key = normalizePhrase(phrase);
      if (!key) return;
      const existing = surfaceForms.get(key);
      if (existing && !sameTarget(existing, target)) {
        throw new LexiconError(
          `Surface form "${key}" maps to both ${describe(existing)} and ${describe(target)}`
        );
      }
      surfaceForms.set(key, target);
    };

    for (const category of FACET_CATEGORIES) {
      const list: FacetDefinition[] = [];
      const seen = new Map<string, number>();

      for (const entry of file.facets[category]) {
        const value = entry.value.toLowerCase();
        const owner = valueOwner.get(value);
        if (owner && owner !== category) {
          throw new LexiconError(`Value "${value}" is declared in both ${owner} and ${category}`);
        }
        valueOwner.set(value, category);

        const synonyms = entry.synonyms.map(s => s.toLowerCase());
        const definition: FacetDefinition = Object.freeze({
          category,
          value,
          reference: entry.reference ?? [value.replace(/-/g, ' '), ...synonyms].join(' '),
          tags: Object.freeze(dedupe([value, ...(entry.tags ?? []).map(t => t.toLowerCase())])),
        });

        // Repeated entries for one value merge their synonyms; first definition wins otherwise
        const index = seen.get(value);
        const effective = index === undefined ? definition : list[index];
        if (index === undefined) {
          seen.set(value, list.length);
          list.push(definition);
        }

        register(value, { kind: 'facet', definition: effective });
        for (const synonym of synonyms) {
          register(synonym, { kind: 'facet', definition: effective });
        }
      }
      definitions.set(category, Object.freeze(list));
    }

    for (const intent of SPECIAL_INTENTS) {
      for (const phrase of file.special[intent]) {
        register(phrase, { kind: 'special', intent });
      }
    }

    const stopWords = new Set(file.stopWords.map(w => normalizePhrase(w)).filter(Boolean));

    return new Lexicon(orderFillerPhrases(file.fillerPhrases), stopWords, definitions, surfaceForms);
  }

  /**
   * Load, parse and validate a lexicon JSON file.
   */
  static async load(filePath: string): Promise<Lexicon> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      throw new LexiconError(`Cannot read lexicon file ${filePath}`, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new LexiconError(`Lexicon file ${filePath} is not valid JSON`, err);
    }

    return Lexicon.fromData(json);
  }

  /** Canonical values of a category, in lexicon order */
  values(category: FacetCategory): readonly FacetDefinition[] {
    return this.definitions.get(category) ?? [];
  }

  /**
   * Resolve a normalized phrase to its facet definition.
   * Falls back to the singular form of the last word ("tomatoes" → "tomato").
   */
  lookup(phrase: string): FacetDefinition | undefined {
    const target = this.resolve(phrase);
    return target?.kind === 'facet' ? target.definition : undefined;
  }

  lookupSpecial(phrase: string): SpecialIntent | undefined {
    const target = this.resolve(phrase);
    return target?.kind === 'special' ? target.intent : undefined;
  }

  isStopWord(token: string): boolean {
    return this.stopWords.has(token);
  }

  /**
   * Dataset tag → canonical values it stands for, for tag-matched categories.
   * Used by the recipe index so "desserts" in the data answers a "dessert" request.
   */
  tagAliases(): Map<string, string[]> {
    const aliases = new Map<string, string[]>();
    const tagCategories: readonly TagFacetCategory[] = ['cuisine', 'diet', 'mealType'];
    for (const category of tagCategories) {
      for (const def of this.values(category)) {
        for (const tag of def.tags) {
          const list = aliases.get(tag) ?? [];
          if (!list.includes(def.value)) list.push(def.value);
          aliases.set(tag, list);
        }
      }
    }
    return aliases;
  }

  /**
   * Ingredient surface form → canonical value ("spaghetti" → ["pasta"]).
   * Lets recipes that list a synonym answer a request for the canonical value.
   */
  ingredientAliases(): Map<string, string[]> {
    const aliases = new Map<string, string[]>();
    for (const [form, target] of this.surfaceForms) {
      if (target.kind === 'facet' && target.definition.category === 'ingredient' && form !== target.definition.value) {
        aliases.set(form, [target.definition.value]);
      }
    }
    return aliases;
  }

  private resolve(phrase: string): SurfaceTarget | undefined {
    const direct = this.surfaceForms.get(phrase);
    if (direct) return direct;
    const singular = singularizePhrase(phrase);
    return singular !== phrase ? this.surfaceForms.get(singular) : undefined;
  }
}

function sameTarget(a: SurfaceTarget, b: SurfaceTarget): boolean {
  if (a.kind === 'special' && b.kind === 'special') return a.intent === b.intent;
  if (a.kind === 'facet' && b.kind === 'facet') {
    return a.definition.category === b.definition.category && a.definition.value === b.definition.value;
  }
  return false;
}

function describe(target: SurfaceTarget): string {
  return target.kind === 'facet'
    ? `${target.definition.category}:${target.definition.value}`
    : `special:${target.intent}`;
}

function dedupe(items: string[]): string[] {
  return [...new Set(items)];
}
