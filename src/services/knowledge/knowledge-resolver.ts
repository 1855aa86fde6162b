import type { FaqEntry, SemanticMatch } from './knowledge-base';
import { logger } from '../logging';

export interface FaqSource {
    getFaqs(): readonly FaqEntry[];
}

export interface SemanticSearcher {
    searchSemantic(query: string): Promise<SemanticMatch | null>;
}

export type Resolution =
    | { tier: 'faq'; answer: string; matchedQuestion: string }
    | { tier: 'knowledge_base'; answer: string; matchedQuestion: string; score: number }
    | { tier: 'unresolved' };

/**
 * Lexical match: a curated entry wins when any whitespace token of its question
 * occurs inside the query. Deliberately loose; the first entry in list order wins.
 */
export function matchFaq(query: string, faqs: readonly FaqEntry[]): FaqEntry | null {
    const needle = query.toLowerCase();
    for (const faq of faqs) {
        const tokens = faq.question.toLowerCase().split(/\s+/).filter(Boolean);
        if (tokens.some(token => needle.includes(token))) {
            return faq;
        }
    }
    return null;
}

/**
 * Two-tier lookup, stopping at the first hit. Read-only with respect to the
 * knowledge index.
 */
export class KnowledgeResolver {
    constructor(
        private readonly faqs: FaqSource,
        private readonly semantic: SemanticSearcher
    ) {}

    async resolve(query: string): Promise<Resolution> {
        const question = query.trim();
        if (!question) return { tier: 'unresolved' };

        const faq = matchFaq(question, this.faqs.getFaqs());
        if (faq) {
            logger.info('Resolved from FAQ', { question });
            return { tier: 'faq', answer: faq.answer, matchedQuestion: faq.question };
        }

        try {
            const match = await this.semantic.searchSemantic(question);
            if (match) {
                logger.info('Resolved from knowledge base', { question, score: match.score });
                return { tier: 'knowledge_base', answer: match.answer, matchedQuestion: match.question, score: match.score };
            }
        } catch (error) {
            logger.warn('Knowledge search failed, treating as unresolved', { question, error });
        }

        return { tier: 'unresolved' };
    }
}
