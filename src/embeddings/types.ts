/**
 * Embedding capability injected into intent extraction and ranking.
 * The core only depends on this signature and on cosineSimilarity.
 */
export interface EmbedOptions {
    /** Aborts the call, including any retries still pending */
    signal?: AbortSignal;
}

export interface EmbeddingProvider {
    /** Short identifier for logs ("openai", "local", ...) */
    readonly name: string;

    /**
     * Longest one embed() call can take, own retries included.
     * Callers bound the call by this instead of their own timeout when set.
     */
    readonly maxDurationMs?: number;

    /** One vector per input text, same order, all of equal length */
    embed(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

export class EmbeddingError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'EmbeddingError';
    }
}
