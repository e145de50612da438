/**
 * Configuration Validator
 * Fail fast on misconfiguration
 *
 * Checks cross-field requirements that the per-variable schema cannot express
 * (e.g. the OpenAI embedding provider needs an API key).
 */

import fs from 'fs';
import { logger } from '../logger/structured-logger.js';
import type { RecommenderConfig } from '../../config/recommender.config.js';

export interface ValidationResult {
  valid: boolean;
  missing: string[];
  warnings: string[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConfigValidator {
  constructor(
    private readonly config: RecommenderConfig,
    private readonly fileExists: (p: string) => boolean = fs.existsSync
  ) {}

  /**
   * Validate configuration against requirements
   * Returns result with missing/warning details
   */
  validate(): ValidationResult {
    const missing: string[] = [];
    const warnings: string[] = [];
    const { embedding } = this.config;

    if (embedding.provider === 'openai' && !embedding.openaiApiKey) {
      missing.push('OPENAI_API_KEY');
    }

    if (!this.fileExists(this.config.lexiconPath)) {
      missing.push(`LEXICON_PATH (${this.config.lexiconPath})`);
    }

    if (!this.fileExists(this.config.recipesPath)) {
      missing.push(`RECIPES_PATH (${this.config.recipesPath})`);
    }

    if (embedding.provider === 'none') {
      warnings.push('EMBEDDING_PROVIDER=none: semantic fallback disabled');
    }

    if (this.config.slowMinMinutes < this.config.quickMaxMinutes) {
      warnings.push(
        `SLOW_MIN_MINUTES (${this.config.slowMinMinutes}) is below QUICK_MAX_MINUTES (${this.config.quickMaxMinutes})`
      );
    }

    return {
      valid: missing.length === 0,
      missing,
      warnings
    };
  }

  /**
   * Validate configuration or throw ConfigError
   * Use this at application startup to fail fast
   */
  validateOrThrow(): void {
    const result = this.validate();

    if (!result.valid) {
      const message = `Missing required configuration: ${result.missing.join(', ')}`;

      logger.error({
        missing: result.missing
      }, 'Configuration validation failed');

      throw new ConfigError(message);
    }

    if (result.warnings.length > 0) {
      logger.warn({
        warnings: result.warnings
      }, 'Configuration warnings');
    }

    logger.info(this.getConfigSummary(), 'Configuration validated');
  }

  /**
   * Get current configuration summary (sanitized)
   */
  getConfigSummary(): Record<string, string | number | boolean> {
    return {
      embeddingProvider: this.config.embedding.provider,
      hasOpenAIKey: !!this.config.embedding.openaiApiKey,
      topN: this.config.topN,
      matchMode: this.config.matchMode,
      semanticThreshold: this.config.semanticThreshold,
      nodeEnv: process.env.NODE_ENV || 'development'
    };
  }
}
