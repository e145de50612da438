import { createHash } from 'crypto';
import type { EmbeddingProvider } from './types.js';
import { singularize } from '../utils/inflection.js';

export const DEFAULT_HASHING_DIMENSIONS = 256;

/**
 * Offline bag-of-words embedder.
 *
 * Each word (and its singular form) is hashed into one of `dimensions`
 * buckets with a sign bit, then the vector is L2-normalized. Texts sharing
 * vocabulary land close together; there is no notion of paraphrase.
 * Deterministic across processes and platforms.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'local';

    constructor(private readonly dimensions: number = DEFAULT_HASHING_DIMENSIONS) {
        if (!Number.isInteger(dimensions) || dimensions <= 0) {
            throw new RangeError(`dimensions must be a positive integer, got ${dimensions}`);
        }
    }

    async embed(texts: string[]): Promise<number[][]> {
        return texts.map(text => this.embedOne(text));
    }

    embedOne(text: string): number[] {
        const vector = new Array<number>(this.dimensions).fill(0);

        for (const feature of features(text)) {
            const digest = createHash('sha256').update(feature, 'utf8').digest();
            const bucket = digest.readUInt32BE(0) % this.dimensions;
            const sign = (digest[4] ?? 0) & 1 ? -1 : 1;
            vector[bucket] = (vector[bucket] ?? 0) + sign;
        }

        const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
        return norm === 0 ? vector : vector.map(v => v / norm);
    }
}

function features(text: string): string[] {
    const words = text
        .toLowerCase()
        .normalize('NFD')
        .replace(/\p{M}/gu, '')
        .replace(/[^\p{L}\p{N}]+/gu, ' ')
        .trim()
        .split(/\s+/)
        .filter(w => w.length >= 2);

    const out: string[] = [];
    for (const word of words) {
        const singular = singularize(word);
        out.push(singular);
        if (singular !== word) out.push(word);
    }
    return out;
}
