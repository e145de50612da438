/**
 * Recommender Configuration
 *
 * Tuning knobs for intent extraction and ranking. The similarity threshold and
 * the quick/slow time bounds are starting values; adjust them against the
 * dataset and lexicon actually deployed.
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

/** Repository root (two levels above src/config) */
export const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

export const EmbeddingProviderKindSchema = z.enum(['openai', 'local', 'none']);
export type EmbeddingProviderKind = z.infer<typeof EmbeddingProviderKindSchema>;

export const MatchModeSchema = z.enum(['all', 'any']);
export type MatchMode = z.infer<typeof MatchModeSchema>;

const booleanFlag = z
  .enum(['true', 'false'])
  .transform(v => v === 'true');

export const RecommenderConfigSchema = z.object({
  RECIPES_PATH: z.string().min(1).default('data/recipes.csv'),
  LEXICON_PATH: z.string().min(1).default('data/lexicon.json'),
  TOP_N: z.coerce.number().int().min(1).max(50).default(3),
  SEMANTIC_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.55),
  QUICK_MAX_MINUTES: z.coerce.number().int().positive().default(30),
  SLOW_MIN_MINUTES: z.coerce.number().int().positive().default(60),
  RANKING_MATCH_MODE: MatchModeSchema.default('all'),
  INGREDIENT_DATASET_VOCABULARY: booleanFlag.default('true'),
  EMBEDDING_PROVIDER: EmbeddingProviderKindSchema.default('local'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(64),
  OPENAI_API_KEY: z.string().optional(),
});

export interface RecommenderConfig {
  recipesPath: string;
  lexiconPath: string;
  topN: number;
  semanticThreshold: number;
  quickMaxMinutes: number;
  slowMinMinutes: number;
  matchMode: MatchMode;
  useDatasetVocabulary: boolean;
  embedding: {
    provider: EmbeddingProviderKind;
    model: string;
    timeoutMs: number;
    batchSize: number;
    openaiApiKey: string | undefined;
  };
}

function resolvePath(p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(PROJECT_ROOT, p);
}

/**
 * Parse recommender settings from the environment.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export function getRecommenderConfig(env: NodeJS.ProcessEnv = process.env): RecommenderConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(RecommenderConfigSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = RecommenderConfigSchema.parse(present);

  return {
    recipesPath: resolvePath(parsed.RECIPES_PATH),
    lexiconPath: resolvePath(parsed.LEXICON_PATH),
    topN: parsed.TOP_N,
    semanticThreshold: parsed.SEMANTIC_THRESHOLD,
    quickMaxMinutes: parsed.QUICK_MAX_MINUTES,
    slowMinMinutes: parsed.SLOW_MIN_MINUTES,
    matchMode: parsed.RANKING_MATCH_MODE,
    useDatasetVocabulary: parsed.INGREDIENT_DATASET_VOCABULARY,
    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL,
      timeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
      batchSize: parsed.EMBEDDING_BATCH_SIZE,
      openaiApiKey: parsed.OPENAI_API_KEY,
    },
  };
}
