import OpenAI from 'openai';
import type { EmbeddingProvider, EmbedOptions } from './types.js';
import { EmbeddingError } from './types.js';
import { sleep } from '../lib/reliability/timeout-guard.js';
import { logger } from '../lib/logger/structured-logger.js';

const EMBED_RETRY_ATTEMPTS = 3;
const EMBED_RETRY_BACKOFF_MS = [0, 250, 750];

/**
 * The slice of the OpenAI SDK this provider calls
 */
export interface EmbeddingsClient {
    embeddings: {
        create(
            body: { model: string; input: string[] },
            options?: { signal?: AbortSignal }
        ): Promise<{ data: Array<{ index: number; embedding: number[] }> }>;
    };
}

export interface OpenAiEmbeddingOptions {
    apiKey: string;
    model: string;
    timeoutMs: number;
    /** Injected for tests; defaults to a client built from apiKey */
    client?: EmbeddingsClient;
}

/**
 * Only transport/server failures are retried; request errors fail fast.
 */
function isRetriable(e: unknown): boolean {
    if (e instanceof OpenAI.APIUserAbortError) return true;
    if (e instanceof OpenAI.APIConnectionError) return true;
    if (e instanceof OpenAI.APIError) {
        const status = e.status;
        return status === 429 || (typeof status === 'number' && status >= 500);
    }
    return false;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'openai';
    /** Every attempt timing out, plus the backoffs between them */
    readonly maxDurationMs: number;
    private readonly client: EmbeddingsClient;

    constructor(private readonly opts: OpenAiEmbeddingOptions) {
        this.client = opts.client ?? new OpenAI({ apiKey: opts.apiKey, maxRetries: 0 });
        this.maxDurationMs = EMBED_RETRY_ATTEMPTS * opts.timeoutMs
            + EMBED_RETRY_BACKOFF_MS.slice(0, EMBED_RETRY_ATTEMPTS).reduce((sum, ms) => sum + ms, 0);
    }

    async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
        if (texts.length === 0) return [];

        const { signal } = options;
        const tStart = Date.now();
        let lastErr: unknown;

        for (let attempt = 0; attempt < EMBED_RETRY_ATTEMPTS; attempt++) {
            const backoff = EMBED_RETRY_BACKOFF_MS[attempt] ?? 0;
            if (backoff > 0) await sleep(backoff);
            if (signal?.aborted) {
                throw new EmbeddingError('OpenAI embedding cancelled', lastErr);
            }

            const controller = new AbortController();
            const t = setTimeout(() => controller.abort(), this.opts.timeoutMs);
            const onCancel = () => controller.abort();
            signal?.addEventListener('abort', onCancel, { once: true });
            try {
                const resp = await this.client.embeddings.create(
                    { model: this.opts.model, input: texts },
                    { signal: controller.signal }
                );
                const vectors = [...resp.data]
                    .sort((a, b) => a.index - b.index)
                    .map(d => d.embedding);

                validateVectors(vectors, texts.length);
                logger.debug({
                    event: 'embedding_ok',
                    provider: this.name,
                    count: texts.length,
                    attempts: attempt + 1,
                    durationMs: Date.now() - tStart
                }, '[EMBED] ok');
                return vectors;
            } catch (e) {
                lastErr = e;
                if (signal?.aborted) {
                    throw new EmbeddingError('OpenAI embedding cancelled', e);
                }
                if (e instanceof EmbeddingError || !isRetriable(e)) {
                    throw e instanceof EmbeddingError ? e : new EmbeddingError('OpenAI embedding request failed', e);
                }
                logger.warn({
                    event: 'embedding_retry',
                    attempt: attempt + 1,
                    maxAttempts: EMBED_RETRY_ATTEMPTS,
                    error: e instanceof Error ? e.message : String(e)
                }, '[EMBED] retriable transport error');
            } finally {
                clearTimeout(t);
                signal?.removeEventListener('abort', onCancel);
            }
        }

        throw new EmbeddingError(`OpenAI embedding failed after ${EMBED_RETRY_ATTEMPTS} attempts`, lastErr);
    }
}

function validateVectors(vectors: number[][], expected: number): void {
    if (vectors.length !== expected) {
        throw new EmbeddingError(`expected ${expected} embeddings, got ${vectors.length}`);
    }
    const dims = vectors[0]?.length ?? 0;
    if (dims === 0 || vectors.some(v => v.length !== dims)) {
        throw new EmbeddingError('embeddings have inconsistent or zero length');
    }
}
