#!/usr/bin/env node
import '../config/env.js';
import { getRecommenderConfig } from '../config/recommender.config.js';
import { ConfigValidator } from '../lib/config/config-validator.js';
import { logger } from '../lib/logger/structured-logger.js';
import { createRecommender } from '../services/recipes/recommender.service.js';
import { runChat } from './chat-session.js';

async function main(): Promise<void> {
  const config = getRecommenderConfig();
  new ConfigValidator(config).validateOrThrow();

  const recommender = await createRecommender(config);
  await runChat(recommender, {
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY === true,
  });
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  logger.fatal({ error: message }, '[CHAT] Error initializing recipe finder');
  process.stderr.write(`Error initializing recipe finder: ${message}\n`);
  process.exitCode = 1;
});
