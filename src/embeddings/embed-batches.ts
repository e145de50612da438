/**
 * Startup-time embedding helpers.
 *
 * Reference phrases and recipe descriptions are embedded once, in batches.
 * Any failure is logged and reported as null so the caller runs without the
 * semantic steps instead of refusing to start.
 */

import type { EmbeddingProvider } from './types.js';
import { withTimeout } from '../lib/reliability/timeout-guard.js';
import { logger } from '../lib/logger/structured-logger.js';

export interface BatchOptions {
  batchSize: number;
  timeoutMs: number;
  /** Label for logs */
  label: string;
}

/**
 * One embed() call under a deadline. The deadline is the provider's own
 * maxDurationMs when it declares one, so its retries get to run; on expiry
 * the call is aborted.
 */
export function embedWithDeadline(
  provider: EmbeddingProvider,
  texts: string[],
  timeoutMs: number,
  operation: string
): Promise<number[][]> {
  const controller = new AbortController();
  return withTimeout(
    provider.embed(texts, { signal: controller.signal }),
    provider.maxDurationMs ?? timeoutMs,
    operation,
    () => controller.abort()
  );
}

export async function embedInBatches(
  provider: EmbeddingProvider,
  texts: readonly string[],
  opts: BatchOptions
): Promise<number[][]> {
  const out: number[][] = [];
  for (let start = 0; start < texts.length; start += opts.batchSize) {
    const batch = texts.slice(start, start + opts.batchSize);
    const vectors = await embedWithDeadline(
      provider,
      batch,
      opts.timeoutMs,
      `${opts.label}_batch_${start / opts.batchSize}`
    );
    out.push(...vectors);
  }
  return out;
}

export async function tryEmbedInBatches(
  provider: EmbeddingProvider | null,
  texts: readonly string[],
  opts: BatchOptions
): Promise<number[][] | null> {
  if (!provider) return null;

  const t0 = Date.now();
  try {
    const vectors = await embedInBatches(provider, texts, opts);
    logger.info({
      event: 'embeddings_ready',
      label: opts.label,
      provider: provider.name,
      count: vectors.length,
      durationMs: Date.now() - t0
    }, `[EMBED] ${opts.label} embedded`);
    return vectors;
  } catch (err) {
    logger.warn({
      event: 'embeddings_unavailable',
      label: opts.label,
      provider: provider.name,
      error: err instanceof Error ? err.message : String(err)
    }, `[EMBED] ${opts.label} embedding failed, semantic steps disabled`);
    return null;
  }
}
