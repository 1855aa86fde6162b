import crypto from 'crypto';
import fs from 'fs';
import { z } from 'zod';
import { Embedder } from './embedder';
import { KnowledgePayload, VectorIndex } from './vector-index';
import { logger } from '../logging';
import { errorMessage } from '../../utils/errors';

export interface FaqEntry {
    question: string;
    answer: string;
}

export interface SemanticMatch {
    id: string;
    score: number;
    question: string;
    answer: string;
    category: string;
}

export interface KnowledgeBaseOptions {
    index: VectorIndex;
    embedder: Embedder;
    faqFilePath: string;
    similarityThreshold: number;
    topK: number;
}

const FaqFileSchema = z.array(z.object({
    question: z.string().min(1),
    answer: z.string().min(1),
}));

/**
 * Curated FAQ ids come from the normalized question text, so a resync
 * overwrites the previous vector instead of adding another one.
 */
export function faqItemId(question: string): string {
    const normalized = question.trim().toLowerCase().replace(/\s+/g, ' ');
    return `faq-${crypto.createHash('sha256').update(normalized).digest('hex').slice(0, 32)}`;
}

export class KnowledgeBase {
    private faqCache: FaqEntry[] = [];
    private refreshTimer: NodeJS.Timeout | null = null;
    private refreshing = false;
    public lastUpdated: Date | null = null;

    constructor(private readonly options: KnowledgeBaseOptions) {}

    get collection(): string {
        return this.options.index.collection;
    }

    getFaqs(): readonly FaqEntry[] {
        return this.faqCache;
    }

    async itemCount(): Promise<number> {
        return this.options.index.count();
    }

    private async readFaqFile(): Promise<FaqEntry[]> {
        const filePath = this.options.faqFilePath;
        let raw: string;
        try {
            raw = await fs.promises.readFile(filePath, 'utf-8');
        } catch (error) {
            logger.error('FAQ file not readable', { filePath, error: errorMessage(error) });
            return [];
        }

        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch (error) {
            logger.error('FAQ file is not valid JSON', { filePath, error: errorMessage(error) });
            return [];
        }

        const parsed = FaqFileSchema.safeParse(data);
        if (!parsed.success) {
            logger.warn('FAQ file is not a list of {question, answer} entries', {
                filePath,
                issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
            });
            return [];
        }
        return parsed.data;
    }

    /** Reloads the curated list from disk and upserts it into the vector collection. */
    async loadFaq(): Promise<number> {
        this.faqCache = await this.readFaqFile();
        this.lastUpdated = new Date();
        logger.info('FAQ loaded', { count: this.faqCache.length, filePath: this.options.faqFilePath });

        await this.syncFaqs();
        return this.faqCache.length;
    }

    async syncFaqs(): Promise<number> {
        if (this.faqCache.length === 0) return 0;

        const { embedder, index } = this.options;
        await index.ensureCollection(await embedder.dimension());

        const vectors = await embedder.embedMany(this.faqCache.map(faq => faq.question));
        const points = this.faqCache.map((faq, i) => ({
            id: faqItemId(faq.question),
            vector: vectors[i],
            payload: {
                question: faq.question,
                answer: faq.answer,
                category: 'faq',
                source: 'local_file',
            } satisfies KnowledgePayload,
        }));

        await index.upsert(points);
        logger.info('FAQs synced to knowledge index', { count: points.length, collection: index.collection });
        return points.length;
    }

    /** Stores a supervisor answer as a learned item; returns the new item id. */
    async addLearnedItem(question: string, answer: string, category = 'general'): Promise<string> {
        const { embedder, index } = this.options;
        const vector = await embedder.embed(question);
        await index.ensureCollection(vector.length);

        const id = crypto.randomUUID();
        await index.upsert([{
            id,
            vector,
            payload: { question, answer, category, source: 'supervisor' },
        }]);

        logger.info('Knowledge item added', { id, category, question: question.slice(0, 50) });
        return id;
    }

    async searchSemantic(query: string): Promise<SemanticMatch | null> {
        const { embedder, index, similarityThreshold, topK } = this.options;
        const vector = await embedder.embed(query);
        const hits = await index.search(vector, topK);
        if (hits.length === 0) return null;

        const best = hits[0];
        if (best.score < similarityThreshold) {
            logger.debug('Best knowledge match below threshold', { score: best.score, threshold: similarityThreshold });
            return null;
        }

        return {
            id: best.id,
            score: best.score,
            question: best.payload.question,
            answer: best.payload.answer,
            category: best.payload.category,
        };
    }

    private async refresh(): Promise<void> {
        if (this.refreshing) return;
        this.refreshing = true;
        try {
            await this.loadFaq();
        } catch (error) {
            logger.error('FAQ refresh failed', { error });
        } finally {
            this.refreshing = false;
        }
    }

    startAutoRefresh(intervalMs: number): void {
        if (this.refreshTimer || intervalMs <= 0) return;
        this.refreshTimer = setInterval(() => {
            void this.refresh();
        }, intervalMs);
        this.refreshTimer.unref();
        logger.info('FAQ auto-refresh started', { intervalMs });
    }

    stopAutoRefresh(): void {
        if (!this.refreshTimer) return;
        clearInterval(this.refreshTimer);
        this.refreshTimer = null;
    }
}
