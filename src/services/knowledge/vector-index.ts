export type KnowledgeSource = 'local_file' | 'supervisor';

export interface KnowledgePayload {
    question: string;
    answer: string;
    category: string;
    source: KnowledgeSource;
}

export interface VectorPoint {
    id: string;
    vector: number[];
    payload: KnowledgePayload;
}

export interface ScoredPoint {
    id: string;
    score: number;
    payload: KnowledgePayload;
}

/**
 * Nearest-neighbour store for one named collection. Upsert-only: nothing in
 * this codebase deletes knowledge items.
 */
export interface VectorIndex {
    readonly collection: string;
    ensureCollection(dimension: number): Promise<void>;
    upsert(points: VectorPoint[]): Promise<void>;
    search(vector: number[], limit: number): Promise<ScoredPoint[]>;
    count(): Promise<number>;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) return 0;
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
