import type { EmbeddingProvider } from "./types.js";
import type { RecommenderConfig } from "../config/recommender.config.js";
import { OpenAiEmbeddingProvider } from "./openai.provider.js";
import { HashingEmbeddingProvider } from "./hashing.provider.js";

/**
 * Build the configured embedding provider.
 * Returns null when embeddings are disabled or cannot be used; callers then
 * skip every semantic step.
 */
export function createEmbeddingProvider(
    config: RecommenderConfig["embedding"]
): EmbeddingProvider | null {
    switch (config.provider) {
        case "openai": {
            if (!config.openaiApiKey) return null;
            return new OpenAiEmbeddingProvider({
                apiKey: config.openaiApiKey,
                model: config.model,
                timeoutMs: config.timeoutMs,
            });
        }
        case "local":
            return new HashingEmbeddingProvider();
        case "none":
            return null;
    }
}
