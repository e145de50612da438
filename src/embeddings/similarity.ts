/**
 * Cosine similarity in [-1, 1].
 * Zero vectors and mismatched lengths compare as 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length === 0 || a.length !== b.length) return 0;

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dot += x * y;
        normA += x * x;
        normB += y * y;
    }

    if (normA === 0 || normB === 0) return 0;
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Index of the highest similarity in `candidates` (first wins on ties), or -1 when empty.
 */
export function bestMatch(
    query: readonly number[],
    candidates: readonly (readonly number[])[]
): { index: number; similarity: number } {
    let index = -1;
    let similarity = -Infinity;
    candidates.forEach((candidate, i) => {
        const sim = cosineSimilarity(query, candidate);
        if (sim > similarity) {
            similarity = sim;
            index = i;
        }
    });
    return { index, similarity };
}
