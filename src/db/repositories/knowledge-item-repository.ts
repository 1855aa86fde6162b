import type { SqliteDatabase } from '../client';
import {
    cosineSimilarity,
    KnowledgePayload,
    ScoredPoint,
    VectorIndex,
    VectorPoint,
} from '../../services/knowledge/vector-index';
import { ConflictError, ValidationError } from '../../utils/errors';
import { logger } from '../../services/logging';

interface ItemRow {
    id: string;
    vector: string;
    payload: string;
}

function isKnowledgePayload(value: unknown): value is KnowledgePayload {
    if (typeof value !== 'object' || value === null) return false;
    return 'question' in value && typeof value.question === 'string'
        && 'answer' in value && typeof value.answer === 'string'
        && 'category' in value && typeof value.category === 'string'
        && 'source' in value && (value.source === 'local_file' || value.source === 'supervisor');
}

function isVector(value: unknown): value is number[] {
    return Array.isArray(value) && value.every(v => typeof v === 'number');
}

/**
 * Vector collection stored beside the documents. Search is a linear cosine scan,
 * which is fine for a salon-sized knowledge base.
 */
export class SqliteVectorIndex implements VectorIndex {
    private dimension: number | null = null;

    constructor(
        private readonly db: SqliteDatabase,
        public readonly collection: string
    ) {}

    private loadDimension(): number | null {
        if (this.dimension !== null) return this.dimension;
        const row = this.db.prepare('SELECT dimension FROM knowledge_collections WHERE name = ?')
            .get(this.collection) as { dimension: number } | undefined;
        this.dimension = row ? row.dimension : null;
        return this.dimension;
    }

    async ensureCollection(dimension: number): Promise<void> {
        const existing = this.loadDimension();
        if (existing === null) {
            this.db.prepare('INSERT INTO knowledge_collections (name, dimension, created_at) VALUES (?, ?, ?)')
                .run(this.collection, dimension, new Date().toISOString());
            this.dimension = dimension;
            logger.info('Knowledge collection created', { collection: this.collection, dimension });
            return;
        }
        if (existing !== dimension) {
            throw new ConflictError(
                `Collection ${this.collection} has dimension ${existing}, embedder produces ${dimension}`
            );
        }
    }

    async upsert(points: VectorPoint[]): Promise<void> {
        if (points.length === 0) return;

        if (this.loadDimension() === null) {
            await this.ensureCollection(points[0].vector.length);
        }
        const dimension = this.loadDimension();
        for (const point of points) {
            if (point.vector.length !== dimension) {
                throw new ValidationError(
                    `Vector for ${point.id} has dimension ${point.vector.length}, collection expects ${dimension}`
                );
            }
        }

        const now = new Date().toISOString();
        const stmt = this.db.prepare(`
            INSERT INTO knowledge_items (id, collection, vector, payload, created_at, updated_at)
            VALUES (?, ?, ?, ?, ?, ?)
            ON CONFLICT(collection, id) DO UPDATE SET
                vector = excluded.vector,
                payload = excluded.payload,
                updated_at = excluded.updated_at
        `);
        const writeAll = this.db.transaction((batch: VectorPoint[]) => {
            for (const point of batch) {
                stmt.run(point.id, this.collection, JSON.stringify(point.vector), JSON.stringify(point.payload), now, now);
            }
        });
        writeAll(points);
    }

    async search(vector: number[], limit: number): Promise<ScoredPoint[]> {
        const rows = this.db.prepare('SELECT id, vector, payload FROM knowledge_items WHERE collection = ?')
            .all(this.collection) as ItemRow[];

        const scored: ScoredPoint[] = [];
        for (const row of rows) {
            let storedVector: unknown;
            let payload: unknown;
            try {
                storedVector = JSON.parse(row.vector);
                payload = JSON.parse(row.payload);
            } catch (error) {
                logger.warn('Skipping unreadable knowledge item', { id: row.id, error });
                continue;
            }
            if (!isVector(storedVector) || !isKnowledgePayload(payload) || storedVector.length !== vector.length) {
                logger.warn('Skipping malformed knowledge item', { id: row.id });
                continue;
            }
            scored.push({ id: row.id, score: cosineSimilarity(vector, storedVector), payload });
        }

        return scored.sort((a, b) => b.score - a.score).slice(0, limit);
    }

    async count(): Promise<number> {
        const row = this.db.prepare('SELECT COUNT(*) AS total FROM knowledge_items WHERE collection = ?')
            .get(this.collection) as { total: number };
        return row.total;
    }
}
